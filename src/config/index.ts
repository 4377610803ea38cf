/**
 * Configuration Module
 *
 * Resolves cmdgate configuration from `.env`, environment variables and
 * explicit overrides, in increasing order of precedence.
 */

import * as dotenv from 'dotenv';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from '../errors';
import {
  CONTAINER_DEFAULTS,
  ENV_VARS,
  EXECUTOR_BACKENDS,
  LOG_LEVELS,
  STATE_LAYOUT,
  TIMEOUTS,
} from '../constants';
import { ExecutorBackend } from '../types';

// Load environment variables from .env file
dotenv.config();

export type LogLevelName = (typeof LOG_LEVELS)[number];

/**
 * Resolved configuration
 */
export interface CmdgateConfig {
  /** State directory holding the history log and snapshots */
  homeDir: string;

  executor: ExecutorBackend;

  /** Directory outside of which the sandboxed backend refuses to write */
  sandboxRoot?: string;

  /** Force dry-run: nothing is snapshotted or executed */
  dryRun: boolean;

  /** Snapshot every confirmed plan, even without declared affected files */
  autoSnapshot: boolean;

  timeoutMs: number;
  dockerImage: string;
  logLevel: LogLevelName;
}

const configSchema = z.object({
  homeDir: z.string().min(1, 'homeDir cannot be empty'),
  executor: z.enum(EXECUTOR_BACKENDS),
  sandboxRoot: z.string().min(1).optional(),
  dryRun: z.boolean(),
  autoSnapshot: z.boolean(),
  timeoutMs: z.number().int().positive('timeoutMs must be a positive integer'),
  dockerImage: z.string().min(1),
  logLevel: z.enum(LOG_LEVELS),
});

type Env = Record<string, string | undefined>;

/**
 * Get environment variable
 */
function getEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  return value && value.trim() !== '' ? value.trim() : undefined;
}

/**
 * Get environment variable as number
 */
function getEnvNumber(env: Env, key: string): number | undefined {
  const value = getEnv(env, key);
  if (value === undefined) {
    return undefined;
  }

  const num = parseInt(value, 10);
  if (isNaN(num)) {
    throw new ConfigurationError(`Invalid number for ${key}: ${value}`);
  }

  return num;
}

/**
 * Get environment variable as boolean (`1`, `true`, `yes`)
 */
function getEnvBoolean(env: Env, key: string): boolean | undefined {
  const value = getEnv(env, key);
  if (value === undefined) {
    return undefined;
  }
  return ['1', 'true', 'yes'].includes(value.toLowerCase());
}

function isBackend(value: string): value is ExecutorBackend {
  return (EXECUTOR_BACKENDS as readonly string[]).includes(value);
}

function isLogLevel(value: string): value is LogLevelName {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Configuration Manager
 */
export class ConfigManager {
  private config: CmdgateConfig;

  constructor(overrides?: Partial<CmdgateConfig>, env: Env = process.env) {
    this.config = this.loadConfig(overrides, env);
  }

  private loadConfig(overrides: Partial<CmdgateConfig> | undefined, env: Env): CmdgateConfig {
    let backendValue: ExecutorBackend | undefined;
    const rawBackend = getEnv(env, ENV_VARS.EXECUTOR)?.toLowerCase();
    if (rawBackend !== undefined) {
      if (!isBackend(rawBackend)) {
        throw new ConfigurationError(
          `Unknown executor backend '${rawBackend}' (expected one of ${EXECUTOR_BACKENDS.join(', ')})`
        );
      }
      backendValue = rawBackend;
    }

    let levelValue: LogLevelName | undefined;
    const rawLevel = getEnv(env, ENV_VARS.LOG_LEVEL)?.toLowerCase();
    if (rawLevel !== undefined) {
      if (!isLogLevel(rawLevel)) {
        throw new ConfigurationError(`Unknown log level '${rawLevel}'`);
      }
      levelValue = rawLevel;
    }

    const sandboxRoot = overrides?.sandboxRoot ?? getEnv(env, ENV_VARS.SANDBOX_ROOT);
    let executor: ExecutorBackend = overrides?.executor ?? backendValue ?? 'mock';
    if (executor === 'local' && sandboxRoot) {
      executor = 'sandboxed';
    }
    if (executor === 'sandboxed' && !sandboxRoot) {
      throw new ConfigurationError(`The sandboxed backend needs ${ENV_VARS.SANDBOX_ROOT} to be set`);
    }

    const candidate: CmdgateConfig = {
      homeDir: path.resolve(
        overrides?.homeDir ?? getEnv(env, ENV_VARS.HOME) ?? path.join(os.homedir(), STATE_LAYOUT.DIR_NAME)
      ),
      executor,
      sandboxRoot: sandboxRoot ? path.resolve(sandboxRoot) : undefined,
      dryRun: overrides?.dryRun ?? getEnvBoolean(env, ENV_VARS.DRY_RUN) ?? false,
      autoSnapshot: overrides?.autoSnapshot ?? getEnvBoolean(env, ENV_VARS.AUTO_SNAPSHOT) ?? false,
      timeoutMs: overrides?.timeoutMs ?? getEnvNumber(env, ENV_VARS.TIMEOUT_MS) ?? TIMEOUTS.COMMAND,
      dockerImage: overrides?.dockerImage ?? getEnv(env, ENV_VARS.DOCKER_IMAGE) ?? CONTAINER_DEFAULTS.IMAGE,
      logLevel: overrides?.logLevel ?? levelValue ?? 'warn',
    };

    const parsed = configSchema.safeParse(candidate);
    if (!parsed.success) {
      const details = parsed.error.errors.map(err => `${err.path.join('.')}: ${err.message}`).join(', ');
      throw new ConfigurationError(`Invalid configuration: ${details}`);
    }

    return candidate;
  }

  getConfig(): CmdgateConfig {
    return this.config;
  }

  /**
   * Roots a snapshot restore may write under: the sandbox root in sandbox
   * mode, the user's home directory otherwise
   */
  getAllowedRoots(): string[] {
    return this.config.sandboxRoot ? [this.config.sandboxRoot] : [os.homedir()];
  }

  getHistoryFile(): string {
    return path.join(this.config.homeDir, STATE_LAYOUT.HISTORY_FILE);
  }

  getSnapshotsDir(): string {
    return path.join(this.config.homeDir, STATE_LAYOUT.SNAPSHOTS_DIR);
  }
}

/**
 * Load configuration from environment variables
 */
export function loadFromEnv(env: Env = process.env): CmdgateConfig {
  return new ConfigManager(undefined, env).getConfig();
}
