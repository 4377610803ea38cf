/**
 * Local Executor
 *
 * Runs commands on the host in a working directory, bounded by a wall-clock
 * timeout.
 */

import { TIMEOUTS } from '../constants';
import { StructuredLogger } from '../core/structured_log';
import { Command, ExecutionResult, ExecutorBackend } from '../types';
import { runProcess } from './process';
import { ExecuteOptions, Executor } from './types';

export interface LocalExecutorOptions {
  /** Default working directory (process cwd when omitted) */
  cwd?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
  logger?: StructuredLogger;
}

export class LocalExecutor implements Executor {
  readonly backend: ExecutorBackend = 'local';
  private readonly cwd: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: LocalExecutorOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.COMMAND;
  }

  execute(command: Command, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    return runProcess(command.command, {
      cwd: options.cwd ?? this.cwd,
      timeoutMs: options.timeoutMs ?? this.timeoutMs,
      env: this.options.env,
      logger: this.options.logger,
      traceId: options.traceId,
    });
  }
}
