/**
 * cmdgate Types
 *
 * Type definitions shared by the policy engine, executors, snapshot store,
 * history log and orchestrator.
 */

// ============================================================================
// Plan Types
// ============================================================================

/**
 * Risk tier the plan generator declares for its own plan
 */
export type DeclaredRisk = 'low' | 'medium' | 'high';

/**
 * A single shell invocation proposed by the generator
 */
export interface Command {
  /** Shell command to execute */
  readonly command: string;

  /** Human-readable description */
  readonly description?: string;

  /** Non-mutating alternate form, shown in dry-run */
  readonly preview?: string;
}

/**
 * Question the generator asks instead of proposing commands
 */
export interface ClarificationQuestion {
  readonly question: string;
  readonly options?: readonly string[];
}

/**
 * A batch of commands plus metadata, as produced by the plan generator
 */
export interface Plan {
  readonly summary: string;
  readonly risk: DeclaredRisk;
  readonly commands: readonly Command[];
  readonly explanation?: string;

  /** Files the plan expects to touch; drives snapshot creation */
  readonly affectedFiles?: readonly string[];

  readonly clarifications?: readonly ClarificationQuestion[];

  /** Commands do not depend on each other; a failure does not stop the rest */
  readonly independent?: boolean;
}

// ============================================================================
// Policy Types
// ============================================================================

/**
 * Classification of a command, least to most severe: LOW < MEDIUM < HIGH < BLOCKED
 */
export type Verdict = 'LOW' | 'MEDIUM' | 'HIGH' | 'BLOCKED';

/**
 * Rule tier, evaluated in this order: blocked, high, medium
 */
export type RuleTier = 'blocked' | 'high' | 'medium';

/**
 * A policy rule as stored in rule data files
 */
export interface PolicyRule {
  readonly id: string;
  readonly tier: RuleTier;
  readonly pattern: string;
  readonly reason: string;
}

/**
 * The rule that decided a verdict
 */
export interface RuleMatch {
  readonly ruleId: string;
  readonly tier: RuleTier;
  readonly reason: string;

  /** Normalized text the rule matched: the whole command or one sub-command */
  readonly matchedText: string;
}

export interface CommandClassification {
  readonly command: string;
  readonly normalized: string;
  readonly subCommands: readonly string[];
  readonly verdict: Verdict;
  readonly match?: RuleMatch;
}

export interface CommandVerdict extends CommandClassification {
  readonly index: number;
}

export interface PlanVerdict {
  readonly overall: Verdict;
  readonly perCommand: readonly CommandVerdict[];

  /** Commands with a BLOCKED verdict, in plan order */
  readonly blocked: readonly CommandVerdict[];

  readonly declaredRisk?: DeclaredRisk;

  /** The generator declared a lower tier than the classifier found */
  readonly underDeclared: boolean;
}

// ============================================================================
// Execution Types
// ============================================================================

export type ExecutorBackend = 'mock' | 'local' | 'sandboxed' | 'docker';

/**
 * Result of one command
 */
export interface ExecutionResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;

  /** True when nothing was actually run */
  simulated: boolean;

  timedOut: boolean;
}

export type CommandStatus = 'succeeded' | 'failed' | 'timed-out' | 'error' | 'skipped';

/**
 * What happened to one command of an executed plan
 */
export interface CommandOutcome {
  index: number;
  command: string;
  status: CommandStatus;
  result?: ExecutionResult;
  error?: string;
}

// ============================================================================
// Snapshot Types
// ============================================================================

export type SnapshotEntryKind = 'file' | 'directory' | 'absent';

export interface SnapshotEntry {
  /** Absolute path at snapshot time */
  originalPath: string;

  /** False when the path did not exist; restore then deletes it */
  existed: boolean;

  kind: SnapshotEntryKind;

  /** Name of the backup under the snapshot's files directory; null when absent */
  backupKey: string | null;

  sizeBytes: number;
}

export interface Snapshot {
  id: string;
  createdAt: string;
  entries: SnapshotEntry[];
  sizeBytes: number;
}

export interface SnapshotSummary {
  id: string;
  createdAt: string;
  entryCount: number;
  sizeBytes: number;
}

export interface RestoreReport {
  snapshotId: string;
  restored: string[];
  removed: string[];
  unchanged: string[];
}

// ============================================================================
// History Types
// ============================================================================

export type HistoryStatus = 'executed' | 'failed' | 'blocked';

export interface BlockedBy {
  ruleId: string;
  commandIndex: number;
  reason: string;
}

/**
 * Append-only log entry for one executed or blocked plan
 */
export interface HistoryRecord {
  id: string;
  timestamp: string;
  query: string;
  plan: Plan;
  status: HistoryStatus;
  verdict: Verdict;
  blockedBy?: BlockedBy;
  backend: ExecutorBackend;
  outcomes: CommandOutcome[];

  /** Exit code of the last command that ran; null when nothing ran */
  exitCode: number | null;

  snapshotId: string | null;
}

// ============================================================================
// Confirmation Types
// ============================================================================

/**
 * `affirmative` accepts y/yes; `exact-yes` accepts only the literal YES
 */
export type ConfirmationStrength = 'affirmative' | 'exact-yes';

export interface ConfirmationRequest {
  plan: Plan;
  verdict: PlanVerdict;
  strength: ConfirmationStrength;
  prompt: string;
  dryRun: boolean;
}

/**
 * Supplied by the presentation layer; returns the literal string the user typed
 */
export type ConfirmationCallback = (request: ConfirmationRequest) => string | Promise<string>;

// ============================================================================
// Validation Types
// ============================================================================

export interface ValidationErrorDetail {
  path: string;
  message: string;
  code: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationErrorDetail[];
}
