/**
 * Custom Error Classes for cmdgate
 *
 * Every failure the gate can surface has its own class and a stable `code`,
 * so callers can branch on `instanceof` or on the code after serialization.
 */

import type { RuleTier } from './types';

/**
 * Base error class for all cmdgate errors
 */
export class CmdgateError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'CmdgateError';
    Object.setPrototypeOf(this, CmdgateError.prototype);
  }
}

/**
 * A command matched the hard blocklist. Never retried, never overridable.
 */
export class PolicyBlockedError extends CmdgateError {
  constructor(
    public readonly ruleId: string,
    public readonly commandIndex: number,
    public readonly command: string,
    public readonly reason: string
  ) {
    super(`Command ${commandIndex + 1} blocked by rule '${ruleId}': ${reason}`, 'POLICY_BLOCKED');
    this.name = 'PolicyBlockedError';
    Object.setPrototypeOf(this, PolicyBlockedError.prototype);
  }
}

/**
 * The user declined, or typed something weaker than the risk tier demands.
 */
export class ConfirmationRejectedError extends CmdgateError {
  constructor(
    public readonly strength: 'affirmative' | 'exact-yes',
    public readonly input: string
  ) {
    super(
      strength === 'exact-yes'
        ? 'High-risk plan requires the exact input YES; execution cancelled'
        : 'Execution cancelled by user',
      'CONFIRMATION_REJECTED'
    );
    this.name = 'ConfirmationRejectedError';
    Object.setPrototypeOf(this, ConfirmationRejectedError.prototype);
  }
}

/**
 * A snapshot could not be made durable. Fatal to the run that asked for it.
 */
export class StorageFailureError extends CmdgateError {
  constructor(message: string, public readonly underlying?: Error) {
    super(underlying ? `${message}: ${underlying.message}` : message, 'STORAGE_FAILURE');
    this.name = 'StorageFailureError';
    Object.setPrototypeOf(this, StorageFailureError.prototype);
  }
}

/**
 * A path resolves outside every permitted root.
 */
export class PathViolationError extends CmdgateError {
  constructor(
    public readonly path: string,
    public readonly allowedRoots: readonly string[]
  ) {
    super(
      `Path '${path}' resolves outside the allowed roots (${allowedRoots.join(', ')})`,
      'PATH_VIOLATION'
    );
    this.name = 'PathViolationError';
    Object.setPrototypeOf(this, PathViolationError.prototype);
  }
}

/**
 * A command exited non-zero or could not be started.
 *
 * Execution failures are recorded in history, not thrown out of `run`; the class
 * exists so outcomes can be classified the same way everywhere.
 */
export class ExecutionFailureError extends CmdgateError {
  constructor(
    public readonly command: string,
    public readonly exitCode: number,
    message?: string,
    code: string = 'EXECUTION_FAILURE'
  ) {
    super(message ?? `Command exited with code ${exitCode}: ${command}`, code);
    this.name = 'ExecutionFailureError';
    Object.setPrototypeOf(this, ExecutionFailureError.prototype);
  }
}

/**
 * A command exceeded its wall-clock bound and was killed.
 */
export class TimeoutError extends ExecutionFailureError {
  constructor(command: string, public readonly timeoutMs: number, exitCode: number) {
    super(command, exitCode, `Command timed out after ${timeoutMs}ms: ${command}`, 'TIMEOUT');
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends CmdgateError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Error thrown when a plan, rule set or manifest fails schema validation
 */
export class ValidationError extends CmdgateError {
  constructor(message: string, public readonly errors?: unknown[]) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * A plan asks clarification questions instead of proposing commands.
 */
export class PlanNotRunnableError extends CmdgateError {
  constructor(public readonly questions: readonly string[]) {
    super(`Plan needs clarification before it can run: ${questions.join(' / ')}`, 'PLAN_NOT_RUNNABLE');
    this.name = 'PlanNotRunnableError';
    Object.setPrototypeOf(this, PlanNotRunnableError.prototype);
  }
}

export class SnapshotNotFoundError extends CmdgateError {
  constructor(public readonly snapshotId: string) {
    super(`Snapshot not found: ${snapshotId}`, 'SNAPSHOT_NOT_FOUND');
    this.name = 'SnapshotNotFoundError';
    Object.setPrototypeOf(this, SnapshotNotFoundError.prototype);
  }
}

export class NothingToUndoError extends CmdgateError {
  constructor(message = 'No executed plan with a snapshot to undo') {
    super(message, 'NOTHING_TO_UNDO');
    this.name = 'NothingToUndoError';
    Object.setPrototypeOf(this, NothingToUndoError.prototype);
  }
}

/**
 * Error raised when a rule set cannot be compiled
 */
export class RuleCompilationError extends CmdgateError {
  constructor(public readonly ruleId: string, public readonly tier: RuleTier, reason: string) {
    super(`Rule '${ruleId}' (${tier}) has an invalid pattern: ${reason}`, 'RULE_COMPILATION_ERROR');
    this.name = 'RuleCompilationError';
    Object.setPrototypeOf(this, RuleCompilationError.prototype);
  }
}

/**
 * Narrow an unknown thrown value to an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
