/**
 * Execution Orchestrator
 *
 * Drives one plan through the gate:
 *
 * ```
 * received -> validated -> blocked
 *                       -> awaiting-confirmation -> cancelled
 *                                                -> dry-run
 *                                                -> snapshotting -> executing -> recorded
 * ```
 *
 * Policy, confirmation and storage outcomes come back as a RunOutcome rather
 * than being thrown; only malformed input and unusable configuration throw.
 *
 * Example:
 * ```typescript
 * const gate = createOrchestrator();
 * const outcome = await gate.run(plan, async request => askUser(request.prompt));
 * if (outcome.state === 'recorded') {
 *   console.log(outcome.record.status);
 * }
 * ```
 */

import { randomUUID } from 'crypto';
import * as path from 'path';
import { CmdgateConfig, ConfigManager } from '../config';
import { StructuredLogger, createSilentLogger, parseLogLevel } from '../core/structured_log';
import {
  ConfirmationRejectedError,
  NothingToUndoError,
  PathViolationError,
  PlanNotRunnableError,
  PolicyBlockedError,
  StorageFailureError,
  toError,
} from '../errors';
import { ContainerClient } from '../executor/docker';
import { createExecutor } from '../executor/factory';
import { aggregateExitCode, runPlanCommands } from '../executor/run_plan';
import { Executor } from '../executor/types';
import { inferWriteTargets } from '../executor/write_targets';
import { HistoryStore, JsonlHistoryStore } from '../history/store';
import { RuleSet, getDefaultRuleSet } from '../policy/rules';
import { validate as validatePlan } from '../policy/validator';
import { assertWithinRoots } from '../snapshot/path_safety';
import { SnapshotStore } from '../snapshot/store';
import {
  ConfirmationCallback,
  HistoryRecord,
  Plan,
  PlanVerdict,
  RestoreReport,
  Snapshot,
  SnapshotSummary,
} from '../types';
import { freezePlan } from '../validation';
import { buildPrompt, isConfirmed, requiredStrength } from './confirmation';

export type OrchestratorState =
  | 'received'
  | 'validated'
  | 'blocked'
  | 'awaiting-confirmation'
  | 'cancelled'
  | 'dry-run'
  | 'snapshotting'
  | 'executing'
  | 'recorded';

export interface DryRunPreview {
  index: number;
  command: string;

  /** What was reported instead of running: the preview form, or the command itself */
  shown: string;
}

interface OutcomeBase {
  traceId: string;
  verdict: PlanVerdict;

  /** States visited, in order */
  states: OrchestratorState[];
}

export type RunOutcome =
  | (OutcomeBase & { state: 'blocked'; error: PolicyBlockedError; record: HistoryRecord })
  | (OutcomeBase & { state: 'cancelled'; error: ConfirmationRejectedError | StorageFailureError })
  | (OutcomeBase & { state: 'dry-run'; previews: DryRunPreview[] })
  | (OutcomeBase & { state: 'recorded'; record: HistoryRecord; snapshot: Snapshot | null });

export interface RunOptions {
  /** The natural-language request the plan answers */
  query?: string;
}

export interface OrchestratorOptions {
  config: CmdgateConfig;
  executor: Executor;
  history: HistoryStore;
  snapshots: SnapshotStore;

  /** Roots snapshot paths and restores must stay within */
  allowedRoots: readonly string[];

  rules?: RuleSet;
  logger?: StructuredLogger;

  /** Directory relative paths resolve against (process cwd when omitted) */
  cwd?: string;

  now?: () => Date;
}

export class ExecutionOrchestrator {
  private readonly config: CmdgateConfig;
  private readonly executor: Executor;
  private readonly historyStore: HistoryStore;
  private readonly snapshots: SnapshotStore;
  private readonly allowedRoots: readonly string[];
  private readonly rules: RuleSet;
  private readonly logger: StructuredLogger;
  private readonly cwd: string;
  private readonly now: () => Date;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.executor = options.executor;
    this.historyStore = options.history;
    this.snapshots = options.snapshots;
    this.allowedRoots = options.allowedRoots;
    this.rules = options.rules ?? getDefaultRuleSet();
    this.logger = options.logger ?? createSilentLogger();
    this.cwd = path.resolve(options.cwd ?? process.cwd());
    this.now = options.now ?? (() => new Date());
  }

  get backend(): Executor['backend'] {
    return this.executor.backend;
  }

  /**
   * Classify a plan without running it
   */
  validate(plan: Plan): PlanVerdict {
    return validatePlan(plan, this.rules);
  }

  /**
   * Take a plan through validation, confirmation, snapshot and execution
   */
  async run(plan: Plan, confirm: ConfirmationCallback, options: RunOptions = {}): Promise<RunOutcome> {
    const traceId = randomUUID().slice(0, 8);
    const states: OrchestratorState[] = [];
    const enter = (state: OrchestratorState) => {
      states.push(state);
      this.logger.debug('state_entered', { state }, traceId);
    };

    enter('received');
    const frozen = freezePlan(plan);
    this.logger.info(
      'plan_received',
      { summary: frozen.summary, commands: frozen.commands.length, backend: this.executor.backend },
      traceId
    );

    if (frozen.clarifications && frozen.clarifications.length > 0) {
      throw new PlanNotRunnableError(frozen.clarifications.map(c => c.question));
    }

    const verdict = this.validate(frozen);
    enter('validated');
    this.logger.info(
      'plan_validated',
      { overall: verdict.overall, declared: frozen.risk, underDeclared: verdict.underDeclared },
      traceId
    );

    // Blocked: terminal, no prompt, recorded
    const firstBlocked = verdict.blocked[0];
    if (firstBlocked) {
      enter('blocked');
      const ruleId = firstBlocked.match?.ruleId ?? 'unknown';
      const reason = firstBlocked.match?.reason ?? 'blocked';
      const error = new PolicyBlockedError(ruleId, firstBlocked.index, firstBlocked.command, reason);
      const record = this.newRecord(frozen, options.query, verdict, {
        status: 'blocked',
        blockedBy: { ruleId, commandIndex: firstBlocked.index, reason },
        outcomes: [],
        exitCode: null,
        snapshotId: null,
      });
      await this.historyStore.append(record);
      this.logger.warn(
        'plan_blocked',
        { ruleId, commandIndex: firstBlocked.index, blockedCount: verdict.blocked.length },
        traceId
      );
      return { state: 'blocked', traceId, verdict, states, error, record };
    }

    // Confirmation
    enter('awaiting-confirmation');
    const strength = requiredStrength(verdict.overall);
    const dryRun = this.config.dryRun;
    const input = await confirm({
      plan: frozen,
      verdict,
      strength,
      prompt: buildPrompt(verdict.overall, strength, dryRun),
      dryRun,
    });

    if (!isConfirmed(input, strength)) {
      enter('cancelled');
      this.logger.info('confirmation_rejected', { strength, verdict: verdict.overall }, traceId);
      return { state: 'cancelled', traceId, verdict, states, error: new ConfirmationRejectedError(strength, input) };
    }

    if (dryRun) {
      enter('dry-run');
      const previews = frozen.commands.map((cmd, index) => ({
        index,
        command: cmd.command,
        shown: cmd.preview ?? cmd.command,
      }));
      this.logger.info('dry_run_completed', { commands: previews.length }, traceId);
      return { state: 'dry-run', traceId, verdict, states, previews };
    }

    // Snapshot
    let snapshot: Snapshot | null = null;
    let snapshotPaths: string[];
    try {
      snapshotPaths = await this.snapshotSet(frozen, traceId);
    } catch (error) {
      if (!(error instanceof StorageFailureError)) {
        throw error;
      }
      enter('cancelled');
      this.logger.error('snapshot_path_rejected', { declared: frozen.affectedFiles ?? [] }, traceId, error);
      return { state: 'cancelled', traceId, verdict, states, error };
    }
    if (snapshotPaths.length > 0) {
      enter('snapshotting');
      try {
        snapshot = await this.snapshots.create(snapshotPaths, traceId);
      } catch (error) {
        const storageError =
          error instanceof StorageFailureError
            ? error
            : new StorageFailureError('Failed to create snapshot', toError(error));
        enter('cancelled');
        this.logger.error('snapshot_failed_cancelled', { paths: snapshotPaths.length }, traceId, storageError);
        return { state: 'cancelled', traceId, verdict, states, error: storageError };
      }
    }

    // Execute
    enter('executing');
    const outcomes = await runPlanCommands(frozen, this.executor, {
      cwd: this.workDir(),
      timeoutMs: this.config.timeoutMs,
      traceId,
      logger: this.logger,
    });

    const succeeded = outcomes.every(o => o.status === 'succeeded');
    const record = this.newRecord(frozen, options.query, verdict, {
      status: succeeded ? 'executed' : 'failed',
      outcomes,
      exitCode: aggregateExitCode(outcomes),
      snapshotId: snapshot ? snapshot.id : null,
    });
    await this.historyStore.append(record);

    enter('recorded');
    this.logger.info(
      'history_recorded',
      { recordId: record.id, status: record.status, exitCode: record.exitCode, snapshotId: record.snapshotId },
      traceId
    );
    return { state: 'recorded', traceId, verdict, states, record, snapshot };
  }

  /**
   * Restore the snapshot of the most recent record that has one, then
   * consume it
   */
  async undo(): Promise<RestoreReport> {
    const records = await this.historyStore.recent(Number.POSITIVE_INFINITY);
    const target = records.find(record => record.snapshotId !== null);
    if (!target || target.snapshotId === null) {
      throw new NothingToUndoError();
    }

    const snapshotId = target.snapshotId;
    if (!(await this.snapshots.has(snapshotId))) {
      throw new NothingToUndoError(`Snapshot ${snapshotId} of the last change is no longer available`);
    }

    const report = await this.snapshots.restore(snapshotId, { allowedRoots: this.allowedRoots });
    await this.snapshots.delete(snapshotId);
    this.logger.info('undo_completed', { recordId: target.id, snapshotId, restored: report.restored.length });
    return report;
  }

  /**
   * Prune snapshots; returns the number deleted
   */
  cleanup(keepNewest: number, olderThanDays: number): Promise<number> {
    return this.snapshots.prune({ keepNewest, olderThanDays });
  }

  /**
   * Prune with the default retention once the store grows past its threshold
   */
  autoPrune(): Promise<number> {
    return this.snapshots.autoPrune();
  }

  listSnapshots(): Promise<SnapshotSummary[]> {
    return this.snapshots.list();
  }

  /**
   * Most recent history records, newest first
   */
  history(limit: number): Promise<HistoryRecord[]> {
    return this.historyStore.recent(limit);
  }

  /**
   * The query and plan of the last record, for resubmission
   */
  async again(): Promise<{ query: string; plan: Plan } | undefined> {
    const last = await this.historyStore.last();
    return last ? { query: last.query, plan: last.plan } : undefined;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private workDir(): string {
    return this.config.sandboxRoot ?? this.cwd;
  }

  /**
   * Declared affected files plus the write targets of every command. Empty
   * unless the plan declares files or auto-snapshot is on. A declared file
   * outside the allowed roots throws StorageFailureError; inferred targets
   * outside them, or that depend on shell expansion, are skipped.
   */
  private async snapshotSet(plan: Plan, traceId: string): Promise<string[]> {
    const declared = plan.affectedFiles ?? [];
    if (declared.length === 0 && !this.config.autoSnapshot) {
      return [];
    }

    const base = this.workDir();
    const accepted = new Set<string>();
    for (const file of declared) {
      const candidate = path.resolve(base, file);
      try {
        await assertWithinRoots(candidate, this.allowedRoots);
      } catch (error) {
        if (error instanceof PathViolationError) {
          throw new StorageFailureError(`Cannot snapshot declared file ${file}`, error);
        }
        throw error;
      }
      accepted.add(candidate);
    }

    for (const cmd of plan.commands) {
      for (const target of inferWriteTargets(cmd.command, base)) {
        if (target.glob || target.dynamic || accepted.has(target.path)) {
          continue;
        }
        try {
          await assertWithinRoots(target.path, this.allowedRoots);
          accepted.add(target.path);
        } catch (error) {
          if (!(error instanceof PathViolationError)) {
            throw error;
          }
          this.logger.warn('snapshot_path_skipped', { path: target.path, allowedRoots: this.allowedRoots }, traceId);
        }
      }
    }
    return Array.from(accepted);
  }

  private newRecord(
    plan: Plan,
    query: string | undefined,
    verdict: PlanVerdict,
    fields: Pick<HistoryRecord, 'status' | 'outcomes' | 'exitCode' | 'snapshotId'> &
      Partial<Pick<HistoryRecord, 'blockedBy'>>
  ): HistoryRecord {
    return {
      id: randomUUID(),
      timestamp: this.now().toISOString(),
      query: query ?? plan.summary,
      plan,
      verdict: verdict.overall,
      backend: this.executor.backend,
      ...fields,
    };
  }
}

// ============================================================================
// Wiring
// ============================================================================

export interface CreateOrchestratorOptions {
  /** Overrides applied on top of the environment */
  config?: Partial<CmdgateConfig>;
  env?: Record<string, string | undefined>;
  logger?: StructuredLogger;
  rules?: RuleSet;
  cwd?: string;
  executor?: Executor;
  history?: HistoryStore;
  containerClient?: ContainerClient;
}

/**
 * Build an orchestrator from configuration: JSONL history and snapshots
 * under the state directory, the configured executor backend
 */
export function createOrchestrator(options: CreateOrchestratorOptions = {}): ExecutionOrchestrator {
  const manager = new ConfigManager(options.config, options.env);
  const config = manager.getConfig();
  const logger =
    options.logger ?? new StructuredLogger({ minLevel: parseLogLevel(config.logLevel), consoleOutput: true });
  const allowedRoots = manager.getAllowedRoots();

  return new ExecutionOrchestrator({
    config,
    executor:
      options.executor ??
      createExecutor(config, { logger, cwd: options.cwd, containerClient: options.containerClient }),
    history: options.history ?? new JsonlHistoryStore({ filePath: manager.getHistoryFile(), logger }),
    snapshots: new SnapshotStore({ rootDir: manager.getSnapshotsDir(), allowedRoots, logger }),
    allowedRoots,
    rules: options.rules,
    logger,
    cwd: options.cwd,
  });
}
