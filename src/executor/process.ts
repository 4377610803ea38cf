/**
 * Process Runner
 *
 * Spawns one command for the local backends. Plain commands are tokenised
 * and run as an argv vector; commands that need shell syntax go through
 * `/bin/sh -c`. Each child leads its own process group so a timeout can kill
 * everything it started.
 */

import { ChildProcess } from 'child_process';
import spawn from 'cross-spawn';
import { parse } from 'shell-quote';
import { EXIT_CODES, OUTPUT_LIMITS, TIMEOUTS } from '../constants';
import { StructuredLogger } from '../core/structured_log';
import { needsShell } from '../policy/command_split';
import { ExecutionResult } from '../types';

export interface ProcessOptions {
  cwd: string;
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
  logger?: StructuredLogger;
  traceId?: string;

  /** Captured bytes per stream before truncation */
  maxOutputBytes?: number;
}

export interface SpawnTarget {
  file: string;
  args: string[];
  shell: boolean;
}

/**
 * Tokenise a command into argv, or null when it needs a shell
 */
export function toArgv(command: string): string[] | null {
  if (needsShell(command)) {
    return null;
  }

  const argv: string[] = [];
  for (const entry of parse(command)) {
    if (typeof entry !== 'string') {
      return null;
    }
    argv.push(entry);
  }
  return argv.length > 0 ? argv : null;
}

export function resolveSpawnTarget(command: string): SpawnTarget {
  const argv = toArgv(command);
  if (argv) {
    return { file: argv[0], args: argv.slice(1), shell: false };
  }
  return { file: '/bin/sh', args: ['-c', command], shell: true };
}

class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  private truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    if (this.size >= this.limit) {
      this.truncated = true;
      return;
    }
    const room = this.limit - this.size;
    const piece = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.truncated = this.truncated || piece.length < chunk.length;
    this.chunks.push(piece);
    this.size += piece.length;
  }

  toString(): string {
    const text = Buffer.concat(this.chunks).toString('utf-8');
    return this.truncated ? `${text}\n... (output truncated)` : text;
  }
}

function killGroup(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) {
    return;
  }
  try {
    process.kill(-child.pid, signal);
  } catch {
    // Group already gone or never formed; fall back to the direct child
    child.kill(signal);
  }
}

/**
 * Run one command to completion or timeout
 */
export function runProcess(command: string, options: ProcessOptions): Promise<ExecutionResult> {
  const startTime = Date.now();
  const target = resolveSpawnTarget(command);
  const limit = options.maxOutputBytes ?? OUTPUT_LIMITS.MAX_BYTES;
  const stdout = new OutputBuffer(limit);
  const stderr = new OutputBuffer(limit);

  return new Promise(resolve => {
    let settled = false;
    let timedOut = false;
    let killTimer: NodeJS.Timeout | undefined;

    const child = spawn(target.file, target.args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    const timer = setTimeout(() => {
      timedOut = true;
      options.logger?.warn(
        'command_timeout',
        { command, timeoutMs: options.timeoutMs, pid: child.pid },
        options.traceId
      );
      killGroup(child, 'SIGTERM');
      killTimer = setTimeout(() => killGroup(child, 'SIGKILL'), TIMEOUTS.KILL_GRACE);
    }, options.timeoutMs);

    const finish = (result: Omit<ExecutionResult, 'durationMs' | 'simulated' | 'timedOut'>) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      if (killTimer) {
        clearTimeout(killTimer);
      }
      resolve({ ...result, durationMs: Date.now() - startTime, simulated: false, timedOut });
    };

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (error: NodeJS.ErrnoException) => {
      const notFound = error.code === 'ENOENT';
      options.logger?.warn(
        'command_spawn_failed',
        { command, file: target.file, code: error.code, message: error.message },
        options.traceId
      );
      finish({
        stdout: stdout.toString(),
        stderr: notFound ? `command not found: ${target.file}` : error.message,
        exitCode: notFound ? EXIT_CODES.NOT_FOUND : EXIT_CODES.SPAWN_FAILURE,
      });
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      if (timedOut) {
        const err = stderr.toString();
        finish({
          stdout: stdout.toString(),
          stderr: `${err}${err && !err.endsWith('\n') ? '\n' : ''}Command timed out after ${options.timeoutMs}ms`,
          exitCode: EXIT_CODES.TIMEOUT,
        });
        return;
      }
      finish({
        stdout: stdout.toString(),
        stderr: signal ? `${stderr.toString()}Terminated by ${signal}` : stderr.toString(),
        exitCode: code ?? EXIT_CODES.SPAWN_FAILURE,
      });
    });
  });
}
