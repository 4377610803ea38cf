/**
 * Sandboxed Executor
 *
 * Local execution pinned to a sandbox root. Before a command is spawned its
 * write targets are resolved; a target outside the root, or one that depends
 * on shell expansion, fails that command with exit code 126 and nothing is
 * spawned.
 */

import * as path from 'path';
import { EXIT_CODES, TIMEOUTS } from '../constants';
import { StructuredLogger } from '../core/structured_log';
import { canonicalize, canonicalizeWriteTarget, isWithin } from '../snapshot/path_safety';
import { Command, ExecutionResult, ExecutorBackend } from '../types';
import { runProcess } from './process';
import { ExecuteOptions, Executor } from './types';
import { inferWriteTargets } from './write_targets';

export interface SandboxedExecutorOptions {
  root: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  logger?: StructuredLogger;
}

interface Violation {
  path: string;
  message: string;
}

export class SandboxedExecutor implements Executor {
  readonly backend: ExecutorBackend = 'sandboxed';
  readonly root: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: SandboxedExecutorOptions) {
    this.root = path.resolve(options.root);
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.COMMAND;
  }

  /**
   * Write targets of `command` that fall outside the sandbox root or cannot
   * be resolved before it runs
   */
  async findViolations(command: string): Promise<string[]> {
    return (await this.check(command)).map(v => v.path);
  }

  private async check(command: string): Promise<Violation[]> {
    const root = await canonicalize(this.root);
    const violations: Violation[] = [];

    for (const target of inferWriteTargets(command, this.root)) {
      if (target.dynamic) {
        violations.push({ path: target.path, message: `${target.path} depends on shell expansion` });
        continue;
      }
      const canonical = target.follow ? await canonicalize(target.path) : await canonicalizeWriteTarget(target.path);
      if (!isWithin(canonical, root)) {
        violations.push({ path: target.path, message: `${target.path} is outside ${this.root}` });
      }
    }
    return violations;
  }

  async execute(command: Command, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    const violations = await this.check(command.command);

    if (violations.length > 0) {
      this.options.logger?.warn(
        'sandbox_violation',
        { command: command.command, root: this.root, paths: violations.map(v => v.path) },
        options.traceId
      );
      return {
        stdout: '',
        stderr: violations.map(v => `sandbox violation: ${v.message}`).join('\n'),
        exitCode: EXIT_CODES.SANDBOX_VIOLATION,
        durationMs: 0,
        simulated: false,
        timedOut: false,
      };
    }

    return runProcess(command.command, {
      cwd: this.root,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      env: this.options.env,
      logger: this.options.logger,
      traceId: options.traceId,
    });
  }
}
