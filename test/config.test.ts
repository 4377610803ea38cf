import * as os from 'os';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { toConfigOverrides } from '../src/cli/context';
import { ConfigManager, loadFromEnv } from '../src/config';
import { ConfigurationError } from '../src/errors';

describe('ConfigManager', () => {
  it('uses defaults when nothing is set', () => {
    const config = loadFromEnv({});
    expect(config).toEqual({
      homeDir: path.join(os.homedir(), '.cmdgate'),
      executor: 'mock',
      sandboxRoot: undefined,
      dryRun: false,
      autoSnapshot: false,
      timeoutMs: 300000,
      dockerImage: 'ubuntu:22.04',
      logLevel: 'warn',
    });
  });

  it('reads the environment', () => {
    const config = loadFromEnv({
      CMDGATE_HOME: '/var/lib/cmdgate',
      CMDGATE_EXECUTOR: 'Docker',
      CMDGATE_DRY_RUN: 'yes',
      CMDGATE_AUTO_SNAPSHOT: 'off',
      CMDGATE_TIMEOUT_MS: '1500',
      CMDGATE_DOCKER_IMAGE: 'alpine:3.19',
      CMDGATE_LOG_LEVEL: 'DEBUG',
    });
    expect(config.homeDir).toBe('/var/lib/cmdgate');
    expect(config.executor).toBe('docker');
    expect(config.dryRun).toBe(true);
    expect(config.autoSnapshot).toBe(false);
    expect(config.timeoutMs).toBe(1500);
    expect(config.dockerImage).toBe('alpine:3.19');
    expect(config.logLevel).toBe('debug');
  });

  it('confines the local backend when a sandbox root is set', () => {
    const config = loadFromEnv({ CMDGATE_EXECUTOR: 'local', CMDGATE_SANDBOX_ROOT: '/srv/app' });
    expect(config.executor).toBe('sandboxed');
    expect(config.sandboxRoot).toBe('/srv/app');
  });

  it('requires a root for the sandboxed backend', () => {
    expect(() => loadFromEnv({ CMDGATE_EXECUTOR: 'sandboxed' })).toThrow(ConfigurationError);
  });

  it('rejects unknown backends and bad numbers', () => {
    expect(() => loadFromEnv({ CMDGATE_EXECUTOR: 'podman' })).toThrow(/Unknown executor backend 'podman'/);
    expect(() => loadFromEnv({ CMDGATE_TIMEOUT_MS: 'soon' })).toThrow('Invalid number for CMDGATE_TIMEOUT_MS: soon');
    expect(() => loadFromEnv({ CMDGATE_TIMEOUT_MS: '0' })).toThrow(/^Invalid configuration: timeoutMs/);
  });

  it('lets overrides win over the environment', () => {
    const manager = new ConfigManager({ executor: 'mock', homeDir: '/tmp/state' }, { CMDGATE_EXECUTOR: 'local' });
    expect(manager.getConfig().executor).toBe('mock');
    expect(manager.getHistoryFile()).toBe('/tmp/state/history.jsonl');
    expect(manager.getSnapshotsDir()).toBe('/tmp/state/snapshots');
  });

  it('restricts restores to the sandbox root or the home directory', () => {
    expect(new ConfigManager({ sandboxRoot: '/srv/app', executor: 'sandboxed' }, {}).getAllowedRoots()).toEqual([
      '/srv/app',
    ]);
    expect(new ConfigManager(undefined, {}).getAllowedRoots()).toEqual([os.homedir()]);
  });
});

describe('toConfigOverrides', () => {
  it('maps CLI flags to configuration', () => {
    expect(toConfigOverrides({ executor: 'Local', timeout: '5000', verbose: true, dryRun: true })).toEqual({
      executor: 'local',
      timeoutMs: 5000,
      logLevel: 'info',
      dryRun: true,
    });
  });

  it('rejects bad flag values', () => {
    expect(() => toConfigOverrides({ executor: 'vm' })).toThrow(ConfigurationError);
    expect(() => toConfigOverrides({ timeout: '-5' })).toThrow('Invalid timeout: -5');
  });
});
