/**
 * Container Executor
 *
 * Runs each command with `sh -c` in a fresh container:
 * - the sandbox root bind-mounted at /work, which is also the working directory
 * - network disabled
 * - all capabilities dropped
 * - memory and pid limits
 * - killed on timeout and always removed afterwards
 *
 * dockerode sits behind a narrow ContainerClient interface so the executor
 * can be exercised without a Docker daemon.
 */

import Docker from 'dockerode';
import * as path from 'path';
import { CONTAINER_DEFAULTS, EXIT_CODES, TIMEOUTS } from '../constants';
import { StructuredLogger } from '../core/structured_log';
import { ExecutionFailureError, toError } from '../errors';
import { Command, ExecutionResult, ExecutorBackend } from '../types';
import { ExecuteOptions, Executor } from './types';

// ============================================================================
// Client abstraction
// ============================================================================

export interface ContainerSpec {
  image: string;
  cmd: string[];
  workingDir: string;
  binds: string[];
  memoryBytes: number;
  pidsLimit: number;
}

export interface ContainerHandle {
  readonly id: string;
  start(): Promise<void>;
  wait(): Promise<{ exitCode: number }>;

  /** Raw log stream, multiplexed with 8-byte frame headers */
  logs(): Promise<Buffer>;

  kill(): Promise<void>;
  remove(): Promise<void>;
}

export interface ContainerClient {
  ping(): Promise<void>;
  hasImage(image: string): Promise<boolean>;
  pullImage(image: string): Promise<void>;
  createContainer(spec: ContainerSpec): Promise<ContainerHandle>;
}

/**
 * ContainerClient backed by the local Docker daemon
 */
export class DockerodeClient implements ContainerClient {
  private readonly docker: Docker;

  constructor(docker: Docker = new Docker()) {
    this.docker = docker;
  }

  async ping(): Promise<void> {
    await this.docker.ping();
  }

  async hasImage(image: string): Promise<boolean> {
    const images = await this.docker.listImages({ filters: { reference: [image] } });
    return images.length > 0;
  }

  async pullImage(image: string): Promise<void> {
    const stream: NodeJS.ReadableStream = await this.docker.pull(image);
    await new Promise<void>((resolve, reject) => {
      this.docker.modem.followProgress(stream, (err: Error | null) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  async createContainer(spec: ContainerSpec): Promise<ContainerHandle> {
    const container = await this.docker.createContainer({
      Image: spec.image,
      Cmd: spec.cmd,
      WorkingDir: spec.workingDir,
      AttachStdout: true,
      AttachStderr: true,
      Tty: false,
      NetworkDisabled: true,
      HostConfig: {
        Binds: spec.binds,
        Memory: spec.memoryBytes,
        MemorySwap: spec.memoryBytes,
        PidsLimit: spec.pidsLimit,
        NetworkMode: 'none',
        CapDrop: ['ALL'],
        SecurityOpt: ['no-new-privileges'],
        AutoRemove: false,
      },
    });
    return new DockerodeHandle(container);
  }
}

class DockerodeHandle implements ContainerHandle {
  constructor(private readonly container: Docker.Container) {}

  get id(): string {
    return this.container.id;
  }

  async start(): Promise<void> {
    await this.container.start();
  }

  async wait(): Promise<{ exitCode: number }> {
    const data: unknown = await this.container.wait();
    if (typeof data === 'object' && data !== null && 'StatusCode' in data && typeof data.StatusCode === 'number') {
      return { exitCode: data.StatusCode };
    }
    return { exitCode: EXIT_CODES.SPAWN_FAILURE };
  }

  logs(): Promise<Buffer> {
    return this.container.logs({ stdout: true, stderr: true, follow: false });
  }

  async kill(): Promise<void> {
    await this.container.kill();
  }

  async remove(): Promise<void> {
    await this.container.remove({ force: true });
  }
}

// ============================================================================
// Log demultiplexing
// ============================================================================

/**
 * Split a Docker log stream into stdout and stderr. Each frame is an 8-byte
 * header (stream type, three zero bytes, big-endian payload size) followed by
 * the payload. A buffer without frame headers is treated as plain stdout.
 */
export function demultiplexLogs(buffer: Buffer): { stdout: string; stderr: string } {
  const looksFramed =
    buffer.length >= 8 && buffer[0] <= 2 && buffer[1] === 0 && buffer[2] === 0 && buffer[3] === 0;
  if (!looksFramed) {
    return { stdout: buffer.toString('utf-8'), stderr: '' };
  }

  const stdout: Buffer[] = [];
  const stderr: Buffer[] = [];
  let offset = 0;

  while (offset + 8 <= buffer.length) {
    const type = buffer[offset];
    const size = buffer.readUInt32BE(offset + 4);
    const start = offset + 8;
    const end = Math.min(start + size, buffer.length);
    (type === 2 ? stderr : stdout).push(buffer.subarray(start, end));
    offset = end;
  }

  return {
    stdout: Buffer.concat(stdout).toString('utf-8'),
    stderr: Buffer.concat(stderr).toString('utf-8'),
  };
}

/**
 * Parse a memory limit such as `512m` to bytes
 */
export function parseMemoryLimit(limit: string): number {
  const match = limit.trim().match(/^(\d+)([kmg])?$/i);
  if (!match) {
    throw new Error(`Invalid memory limit: ${limit}`);
  }

  const value = parseInt(match[1], 10);
  switch ((match[2] ?? '').toLowerCase()) {
    case 'k':
      return value * 1024;
    case 'm':
      return value * 1024 * 1024;
    case 'g':
      return value * 1024 * 1024 * 1024;
    default:
      return value;
  }
}

// ============================================================================
// Executor
// ============================================================================

export interface ContainerExecutorOptions {
  /** Host directory mounted read-write at the container's working directory */
  hostDir: string;
  image?: string;
  timeoutMs?: number;
  memory?: string;
  pidsLimit?: number;
  client?: ContainerClient;
  logger?: StructuredLogger;
}

export class ContainerExecutor implements Executor {
  readonly backend: ExecutorBackend = 'docker';
  readonly image: string;
  private readonly hostDir: string;
  private readonly timeoutMs: number;
  private readonly memoryBytes: number;
  private readonly pidsLimit: number;
  private readonly client: ContainerClient;
  private readonly logger?: StructuredLogger;
  private ready: Promise<void> | null = null;

  constructor(options: ContainerExecutorOptions) {
    this.hostDir = path.resolve(options.hostDir);
    this.image = options.image ?? CONTAINER_DEFAULTS.IMAGE;
    this.timeoutMs = options.timeoutMs ?? TIMEOUTS.CONTAINER;
    this.memoryBytes = parseMemoryLimit(options.memory ?? CONTAINER_DEFAULTS.MEMORY);
    this.pidsLimit = options.pidsLimit ?? CONTAINER_DEFAULTS.PIDS_LIMIT;
    this.client = options.client ?? new DockerodeClient();
    this.logger = options.logger;
  }

  /**
   * Verify the daemon is reachable and the image present, pulling it if not
   */
  initialize(): Promise<void> {
    if (!this.ready) {
      this.ready = this.prepare().catch(error => {
        this.ready = null;
        throw new ExecutionFailureError(
          '',
          EXIT_CODES.SPAWN_FAILURE,
          `Docker initialization failed: ${toError(error).message}`
        );
      });
    }
    return this.ready;
  }

  private async prepare(): Promise<void> {
    await this.client.ping();
    if (!(await this.client.hasImage(this.image))) {
      this.logger?.info('container_image_pull', { image: this.image });
      await this.client.pullImage(this.image);
    }
  }

  async execute(command: Command, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    await this.initialize();

    const startTime = Date.now();
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const handle = await this.client.createContainer({
      image: this.image,
      cmd: ['sh', '-c', command.command],
      workingDir: CONTAINER_DEFAULTS.WORKDIR,
      binds: [`${this.hostDir}:${CONTAINER_DEFAULTS.WORKDIR}`],
      memoryBytes: this.memoryBytes,
      pidsLimit: this.pidsLimit,
    });

    try {
      await handle.start();
      const { exitCode, timedOut } = await this.waitWithTimeout(handle, timeoutMs, command.command, options.traceId);
      const logs = demultiplexLogs(await handle.logs());

      return {
        stdout: logs.stdout,
        stderr: timedOut ? `${logs.stderr}Command timed out after ${timeoutMs}ms` : logs.stderr,
        exitCode,
        durationMs: Date.now() - startTime,
        simulated: false,
        timedOut,
      };
    } finally {
      await this.removeContainer(handle, options.traceId);
    }
  }

  private async waitWithTimeout(
    handle: ContainerHandle,
    timeoutMs: number,
    command: string,
    traceId?: string
  ): Promise<{ exitCode: number; timedOut: boolean }> {
    const waiting = handle.wait();
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>(resolve => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    try {
      const winner = await Promise.race([waiting, timeout]);
      if (winner !== 'timeout') {
        return { exitCode: winner.exitCode, timedOut: false };
      }
    } finally {
      clearTimeout(timer);
    }

    this.logger?.warn('command_timeout', { command, timeoutMs, containerId: handle.id }, traceId);
    await handle.kill();
    await waiting.catch(error => {
      this.logger?.debug('container_wait_after_kill', { message: toError(error).message }, traceId);
    });
    return { exitCode: EXIT_CODES.TIMEOUT, timedOut: true };
  }

  private async removeContainer(handle: ContainerHandle, traceId?: string): Promise<void> {
    try {
      await handle.remove();
    } catch (error) {
      this.logger?.warn(
        'container_cleanup_failed',
        { containerId: handle.id, message: toError(error).message },
        traceId
      );
    }
  }
}
