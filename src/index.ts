/**
 * cmdgate - a safety gate between a command generator and the shell
 *
 * Classifies proposed shell commands, asks for confirmation in proportion to
 * their risk, snapshots what they touch and runs them through a swappable
 * backend.
 *
 * @packageDocumentation
 */

// Version
export { VERSION, getVersion } from './version';

// Types
export * from './types';

// Errors
export {
  CmdgateError,
  PolicyBlockedError,
  ConfirmationRejectedError,
  StorageFailureError,
  PathViolationError,
  ExecutionFailureError,
  TimeoutError,
  ConfigurationError,
  ValidationError,
  PlanNotRunnableError,
  SnapshotNotFoundError,
  NothingToUndoError,
  RuleCompilationError,
} from './errors';

// Constants
export * from './constants';

// Config Module
export * from './config';

// Logging
export { StructuredLogger, LogLevel, parseLogLevel, createSilentLogger } from './core/structured_log';
export type { LogEntry, LoggerConfig } from './core/structured_log';

// Validation Module (schema helpers; plan validation is `validate` below)
export {
  validateOrThrow,
  parsePlan,
  parsePlanJson,
  planSchema,
  historyRecordSchema,
  snapshotManifestSchema,
} from './validation';

// Policy Module
export * from './policy';

// Snapshot Module
export * from './snapshot';

// History Module
export * from './history';

// Executor Module
export * from './executor';

// Orchestrator Module
export * from './orchestrator';
