/**
 * Executor Factory
 */

import { CmdgateConfig } from '../config';
import { StructuredLogger } from '../core/structured_log';
import { ConfigurationError } from '../errors';
import { ContainerClient, ContainerExecutor } from './docker';
import { LocalExecutor } from './local';
import { MockExecutor } from './mock';
import { SandboxedExecutor } from './sandboxed';
import { Executor } from './types';

export interface ExecutorFactoryOptions {
  logger?: StructuredLogger;

  /** Working directory of the local backend */
  cwd?: string;

  /** Container client override for the docker backend */
  containerClient?: ContainerClient;
}

/**
 * Build the executor the configuration selects
 */
export function createExecutor(
  config: Pick<CmdgateConfig, 'executor' | 'sandboxRoot' | 'timeoutMs' | 'dockerImage'>,
  options: ExecutorFactoryOptions = {}
): Executor {
  switch (config.executor) {
    case 'mock':
      return new MockExecutor(options.logger);

    case 'local':
      return new LocalExecutor({ cwd: options.cwd, timeoutMs: config.timeoutMs, logger: options.logger });

    case 'sandboxed':
      if (!config.sandboxRoot) {
        throw new ConfigurationError('The sandboxed backend needs a sandbox root');
      }
      return new SandboxedExecutor({ root: config.sandboxRoot, timeoutMs: config.timeoutMs, logger: options.logger });

    case 'docker':
      return new ContainerExecutor({
        hostDir: config.sandboxRoot ?? options.cwd ?? process.cwd(),
        image: config.dockerImage,
        timeoutMs: config.timeoutMs,
        client: options.containerClient,
        logger: options.logger,
      });
  }
}
