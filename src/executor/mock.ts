/**
 * Mock Executor
 *
 * Records what would run and touches nothing. The default backend.
 */

import { StructuredLogger } from '../core/structured_log';
import { Command, ExecutionResult, ExecutorBackend } from '../types';
import { ExecuteOptions, Executor } from './types';

export interface MockInvocation {
  command: string;
  cwd?: string;
  at: string;
}

export class MockExecutor implements Executor {
  readonly backend: ExecutorBackend = 'mock';
  private readonly invocations: MockInvocation[] = [];

  constructor(private readonly logger?: StructuredLogger) {}

  async execute(command: Command, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    this.invocations.push({ command: command.command, cwd: options.cwd, at: new Date().toISOString() });
    this.logger?.debug('mock_execute', { command: command.command }, options.traceId);

    return {
      stdout: `[mock] would execute: ${command.command}\n`,
      stderr: '',
      exitCode: 0,
      durationMs: 0,
      simulated: true,
      timedOut: false,
    };
  }

  /**
   * Everything this executor was asked to run, in order
   */
  getLog(): MockInvocation[] {
    return [...this.invocations];
  }

  clear(): void {
    this.invocations.length = 0;
  }
}
