/**
 * Executor contract shared by every backend
 */

import { Command, ExecutionResult, ExecutorBackend } from '../types';

export interface ExecuteOptions {
  /** Working directory; backends with a fixed root ignore it */
  cwd?: string;

  timeoutMs?: number;

  /** Trace id of the run, for log correlation */
  traceId?: string;
}

export interface Executor {
  readonly backend: ExecutorBackend;

  /**
   * Run one command. Resolves with the result for every outcome the command
   * itself produced (non-zero exit, timeout, missing binary); rejects only
   * when the backend itself is unusable.
   */
  execute(command: Command, options?: ExecuteOptions): Promise<ExecutionResult>;
}
