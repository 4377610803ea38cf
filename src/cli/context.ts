/**
 * Shared CLI wiring: global options to an orchestrator
 */

import { CmdgateConfig } from '../config';
import { EXECUTOR_BACKENDS } from '../constants';
import { ConfigurationError } from '../errors';
import { ExecutionOrchestrator, createOrchestrator } from '../orchestrator';
import { loadRuleFile } from '../policy/rules';
import { ExecutorBackend } from '../types';

/**
 * Options accepted by every command
 */
export type GlobalOptions = {
  home?: string;
  executor?: string;
  sandbox?: string;
  dryRun?: boolean;
  autoSnapshot?: boolean;
  timeout?: string;
  rules?: string;
  verbose?: boolean;
};

function parseBackend(value: string): ExecutorBackend {
  const backend = EXECUTOR_BACKENDS.find(name => name === value.toLowerCase());
  if (!backend) {
    throw new ConfigurationError(`Unknown executor '${value}' (expected one of ${EXECUTOR_BACKENDS.join(', ')})`);
  }
  return backend;
}

export function toConfigOverrides(options: GlobalOptions): Partial<CmdgateConfig> {
  const overrides: Partial<CmdgateConfig> = {};

  if (options.home) {
    overrides.homeDir = options.home;
  }
  if (options.executor) {
    overrides.executor = parseBackend(options.executor);
  }
  if (options.sandbox) {
    overrides.sandboxRoot = options.sandbox;
  }
  if (options.dryRun) {
    overrides.dryRun = true;
  }
  if (options.autoSnapshot) {
    overrides.autoSnapshot = true;
  }
  if (options.timeout) {
    const timeoutMs = parseInt(options.timeout, 10);
    if (isNaN(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(`Invalid timeout: ${options.timeout}`);
    }
    overrides.timeoutMs = timeoutMs;
  }
  if (options.verbose) {
    overrides.logLevel = 'info';
  }
  return overrides;
}

export async function buildOrchestrator(options: GlobalOptions): Promise<ExecutionOrchestrator> {
  const rules = options.rules ? await loadRuleFile(options.rules) : undefined;
  return createOrchestrator({ config: toConfigOverrides(options), rules });
}
