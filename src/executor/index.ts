/**
 * Executor Module
 *
 * Backends: mock (log only), local, sandboxed local, container.
 */

export type { Executor, ExecuteOptions } from './types';
export { MockExecutor } from './mock';
export type { MockInvocation } from './mock';
export { LocalExecutor } from './local';
export type { LocalExecutorOptions } from './local';
export { SandboxedExecutor } from './sandboxed';
export type { SandboxedExecutorOptions } from './sandboxed';
export { ContainerExecutor, DockerodeClient, demultiplexLogs, parseMemoryLimit } from './docker';
export type { ContainerClient, ContainerHandle, ContainerSpec, ContainerExecutorOptions } from './docker';
export { createExecutor } from './factory';
export type { ExecutorFactoryOptions } from './factory';
export { runPlanCommands, aggregateExitCode, statusOf } from './run_plan';
export type { RunPlanOptions } from './run_plan';
export { runProcess, toArgv, resolveSpawnTarget } from './process';
export type { ProcessOptions, SpawnTarget } from './process';
export { inferWriteTargets } from './write_targets';
export type { WriteTarget } from './write_targets';
