/**
 * Constants for cmdgate
 *
 * This module contains all constant values used throughout the library.
 */

/**
 * Default timeout values (in milliseconds)
 */
export const TIMEOUTS = {
  COMMAND: 300000,
  CONTAINER: 300000,
  KILL_GRACE: 2000,
} as const;

/**
 * Captured output limit per stream
 */
export const OUTPUT_LIMITS = {
  MAX_BYTES: 1000000,
} as const;

/**
 * Environment variable names
 */
export const ENV_VARS = {
  HOME: 'CMDGATE_HOME',
  EXECUTOR: 'CMDGATE_EXECUTOR',
  SANDBOX_ROOT: 'CMDGATE_SANDBOX_ROOT',
  DRY_RUN: 'CMDGATE_DRY_RUN',
  AUTO_SNAPSHOT: 'CMDGATE_AUTO_SNAPSHOT',
  TIMEOUT_MS: 'CMDGATE_TIMEOUT_MS',
  DOCKER_IMAGE: 'CMDGATE_DOCKER_IMAGE',
  LOG_LEVEL: 'CMDGATE_LOG_LEVEL',
} as const;

/**
 * On-disk state layout
 */
export const STATE_LAYOUT = {
  DIR_NAME: '.cmdgate',
  HISTORY_FILE: 'history.jsonl',
  SNAPSHOTS_DIR: 'snapshots',
  STAGING_DIR: '.staging',
  MANIFEST_FILE: 'manifest.json',
  FILES_DIR: 'files',
} as const;

/**
 * History log limits
 */
export const HISTORY_DEFAULTS = {
  MAX_FILE_BYTES: 10 * 1024 * 1024,
  DISPLAY_LIMIT: 10,
} as const;

/**
 * Snapshot retention defaults
 */
export const RETENTION_DEFAULTS = {
  KEEP_NEWEST: 50,
  OLDER_THAN_DAYS: 30,
  AUTO_PRUNE_THRESHOLD: 100,
} as const;

/**
 * Container backend defaults
 */
export const CONTAINER_DEFAULTS = {
  IMAGE: 'ubuntu:22.04',
  WORKDIR: '/work',
  MEMORY: '512m',
  PIDS_LIMIT: 128,
} as const;

/**
 * Exit codes reported for outcomes that never produced a real exit status
 */
export const EXIT_CODES = {
  SPAWN_FAILURE: -1,
  TIMEOUT: 124,
  SANDBOX_VIOLATION: 126,
  NOT_FOUND: 127,
} as const;

/**
 * Confirmation inputs
 */
export const CONFIRMATION = {
  HIGH_RISK_LITERAL: 'YES',
  AFFIRMATIVES: ['y', 'yes'],
} as const;

/**
 * Executor backends
 */
export const EXECUTOR_BACKENDS = ['mock', 'local', 'sandboxed', 'docker'] as const;

/**
 * Log levels accepted in configuration
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'fatal'] as const;
