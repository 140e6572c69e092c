/**
 * Tests for the CLI configuration module.
 *
 * Covers: getDefaultConfig, loadConfig, saveConfig, ensureConfigDir,
 * configExists, the path helpers, env var resolution, deep merge,
 * validation, and ConfigLoadError.
 */

import { vi } from 'vitest';
import { mkdirSync, writeFileSync, existsSync, readFileSync, rmSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { tmpdir } from 'node:os';
import { ConfigError } from '@rigkeeper/core';

// ---------------------------------------------------------------------------
// Mock homedir to use a temp directory
// ---------------------------------------------------------------------------

const TEST_HOME = join(tmpdir(), `rigkeeper-config-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);

vi.mock('node:os', async () => {
  const actual = await vi.importActual<typeof import('node:os')>('node:os');
  return {
    ...actual,
    homedir: () => TEST_HOME,
  };
});

import {
  getRigkeeperDir,
  getConfigPath,
  getLogsDir,
  getDefaultConfig,
  loadConfig,
  saveConfig,
  ensureConfigDir,
  configExists,
  ConfigLoadError,
} from './config.js';

// ---------------------------------------------------------------------------
// Setup / Teardown
// ---------------------------------------------------------------------------

beforeEach(() => {
  mkdirSync(TEST_HOME, { recursive: true });
});

afterEach(() => {
  rmSync(TEST_HOME, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function writeTestConfig(config: Record<string, unknown>): void {
  const dir = join(TEST_HOME, '.rigkeeper');
  mkdirSync(dir, { recursive: true });
  writeFileSync(join(dir, 'config.json'), JSON.stringify(config));
}

function loadError(): ConfigLoadError {
  try {
    loadConfig();
  } catch (err) {
    if (err instanceof ConfigLoadError) return err;
    throw err;
  }
  throw new Error('loadConfig did not throw');
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Config paths', () => {
  it('getRigkeeperDir returns ~/.rigkeeper', () => {
    expect(getRigkeeperDir()).toBe(resolve(TEST_HOME, '.rigkeeper'));
  });

  it('getConfigPath returns ~/.rigkeeper/config.json', () => {
    expect(getConfigPath()).toBe(join(resolve(TEST_HOME, '.rigkeeper'), 'config.json'));
  });

  it('getLogsDir returns ~/.rigkeeper/logs', () => {
    expect(getLogsDir()).toBe(join(resolve(TEST_HOME, '.rigkeeper'), 'logs'));
  });
});

describe('getDefaultConfig', () => {
  it('has the restart policy defaults', () => {
    expect(getDefaultConfig().policy).toEqual({
      targetThroughput: 11_500,
      hotRestartThresholdMinutes: 5,
      maxRunTimeMinutes: 40,
      settleMinutes: 2,
      pollIntervalSeconds: 20,
      killGraceSeconds: 5,
      coldStartCommands: [],
      coldStartIntervalSeconds: 16,
    });
  });

  it('points at the local status endpoint', () => {
    const { endpoint } = getDefaultConfig();

    expect(endpoint.host).toBe('127.0.0.1');
    expect(endpoint.port).toBe(4580);
    expect(endpoint.page).toBe('api.json');
    expect(endpoint.format).toBe('json');
    expect(endpoint.parser).toBe('hashrate-total');
    expect(endpoint.timeoutMs).toBe(6_000);
  });

  it('launches in a new console with no worker path', () => {
    const { worker } = getDefaultConfig();

    expect(worker.path).toBe('');
    expect(worker.newConsole).toBe(true);
  });

  it('has correct observability defaults', () => {
    const { observability } = getDefaultConfig();

    expect(observability.observers).toEqual(['console', 'file']);
    expect(observability.logLevel).toBe('info');
  });

  it('returns a fresh object every call', () => {
    const a = getDefaultConfig();
    a.policy.coldStartCommands.push('mutated');
    expect(getDefaultConfig().policy.coldStartCommands).toEqual([]);
  });
});

describe('ensureConfigDir', () => {
  it('creates ~/.rigkeeper and ~/.rigkeeper/logs directories', () => {
    expect(existsSync(getRigkeeperDir())).toBe(false);
    expect(existsSync(getLogsDir())).toBe(false);

    ensureConfigDir();

    expect(existsSync(getRigkeeperDir())).toBe(true);
    expect(existsSync(getLogsDir())).toBe(true);
  });

  it('is idempotent', () => {
    ensureConfigDir();
    expect(() => ensureConfigDir()).not.toThrow();
  });
});

describe('configExists', () => {
  it('returns false when no config file exists', () => {
    expect(configExists()).toBe(false);
  });

  it('returns true when config file exists', () => {
    writeTestConfig({ worker: { path: '/opt/miner/miner' } });
    expect(configExists()).toBe(true);
  });

  it('checks an explicit path', () => {
    const path = join(TEST_HOME, 'elsewhere.json');
    expect(configExists(path)).toBe(false);
    writeFileSync(path, '{}');
    expect(configExists(path)).toBe(true);
  });
});

describe('loadConfig', () => {
  it('returns defaults when no config file exists', () => {
    expect(loadConfig()).toEqual(getDefaultConfig());
  });

  it('deep-merges user config over defaults', () => {
    writeTestConfig({
      worker: { path: '/opt/miner/miner' },
      policy: { targetThroughput: 9_000 },
    });

    const config = loadConfig();

    expect(config.worker.path).toBe('/opt/miner/miner');
    expect(config.policy.targetThroughput).toBe(9_000);

    expect(config.worker.newConsole).toBe(true);
    expect(config.policy.maxRunTimeMinutes).toBe(40);
    expect(config.endpoint.port).toBe(4580);
  });

  it('resolves environment variables in string values', () => {
    const savedEnv = process.env['RIGKEEPER_TEST_PASSWORD'];
    process.env['RIGKEEPER_TEST_PASSWORD'] = 'test-secret';

    try {
      writeTestConfig({
        endpoint: { user: 'admin', password: '${RIGKEEPER_TEST_PASSWORD}' },
      });

      expect(loadConfig().endpoint.password).toBe('test-secret');
    } finally {
      if (savedEnv === undefined) {
        delete process.env['RIGKEEPER_TEST_PASSWORD'];
      } else {
        process.env['RIGKEEPER_TEST_PASSWORD'] = savedEnv;
      }
    }
  });

  it('resolves missing env vars to empty string', () => {
    delete process.env['RIGKEEPER_TEST_UNSET'];
    writeTestConfig({ worker: { path: '${RIGKEEPER_TEST_UNSET}' } });

    expect(loadConfig().worker.path).toBe('');
  });

  it('resolves env vars inside arrays', () => {
    process.env['RIGKEEPER_TEST_GPU'] = '0';
    try {
      writeTestConfig({ policy: { coldStartCommands: ['reset --gpu ${RIGKEEPER_TEST_GPU}'] } });
      expect(loadConfig().policy.coldStartCommands).toEqual(['reset --gpu 0']);
    } finally {
      delete process.env['RIGKEEPER_TEST_GPU'];
    }
  });

  it('replaces arrays during merge (no concatenation)', () => {
    writeTestConfig({ observability: { observers: ['file'] } });

    expect(loadConfig().observability.observers).toEqual(['file']);
  });

  it('reads an explicit config path', () => {
    const path = join(TEST_HOME, 'rig.json');
    writeFileSync(path, JSON.stringify({ endpoint: { port: 8080 } }));

    expect(loadConfig(path).endpoint.port).toBe(8080);
  });

  it('throws ConfigLoadError when an explicit path is missing', () => {
    expect(() => loadConfig(join(TEST_HOME, 'missing.json'))).toThrow(ConfigLoadError);
  });

  it('throws ConfigLoadError for invalid JSON', () => {
    const dir = join(TEST_HOME, '.rigkeeper');
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, 'config.json'), 'not valid json{{{');

    expect(() => loadConfig()).toThrow(ConfigLoadError);
  });

  it('throws ConfigLoadError when the file is not an object', () => {
    const dir = join(TEST_HOME, '.rigkeeper');
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, 'config.json'), '[1, 2, 3]');

    expect(loadError().message).toContain('must contain a JSON object');
  });

  it('ConfigLoadError is a ConfigError', () => {
    writeTestConfig({ endpoint: { port: 'abc' } });
    const error = loadError();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error.code).toBe('CONFIG_ERROR');
    expect(error.name).toBe('ConfigLoadError');
  });

  describe('validation', () => {
    it('rejects an out-of-range port', () => {
      writeTestConfig({ endpoint: { port: 99999 } });
      expect(loadError().message).toContain('endpoint.port must be at most 65535');
    });

    it('rejects a fractional port', () => {
      writeTestConfig({ endpoint: { port: 80.5 } });
      expect(loadError().message).toContain('endpoint.port must be an integer');
    });

    it('rejects an empty host', () => {
      writeTestConfig({ endpoint: { host: ' ' } });
      expect(loadError().message).toContain('endpoint.host must not be empty');
    });

    it('rejects an unknown parser', () => {
      writeTestConfig({ endpoint: { parser: 'gpu-temp' } });
      expect(loadError().message).toContain('endpoint.parser must be one of: total-hash-rate, hashrate-total');
    });

    it('rejects an unsupported format', () => {
      writeTestConfig({ endpoint: { format: 'xml' } });
      expect(loadError().message).toContain('endpoint.format must be one of: json');
    });

    it('rejects a non-positive target', () => {
      writeTestConfig({ policy: { targetThroughput: 0 } });
      expect(loadError().message).toContain('policy.targetThroughput must be greater than 0');
    });

    it('rejects a negative settle time', () => {
      writeTestConfig({ policy: { settleMinutes: -1 } });
      expect(loadError().message).toContain('policy.settleMinutes must be at least 0');
    });

    it('rejects non-string cold-start commands', () => {
      writeTestConfig({ policy: { coldStartCommands: ['ok', 42] } });
      expect(loadError().message).toContain('policy.coldStartCommands must contain only strings');
    });

    it('rejects an unknown log level', () => {
      writeTestConfig({ observability: { logLevel: 'verbose' } });
      expect(loadError().message).toContain('observability.logLevel must be one of: debug, info, warn, error');
    });

    it('rejects observers that are not an array', () => {
      writeTestConfig({ observability: { observers: 'console' } });
      expect(loadError().message).toContain('observability.observers must be an array of strings');
    });

    it('rejects a section that is not an object', () => {
      writeTestConfig({ worker: 'miner.exe' });
      expect(loadError().message).toContain('worker must be an object');
    });

    it('reports every bad field at once', () => {
      writeTestConfig({ endpoint: { port: 0 }, policy: { pollIntervalSeconds: 0 } });
      const error = loadError();

      expect(error.context?.['problems']).toEqual([
        'endpoint.port must be at least 1',
        'policy.pollIntervalSeconds must be greater than 0',
      ]);
    });

    it('accepts an empty worker path', () => {
      writeTestConfig({ worker: { path: '' } });
      expect(() => loadConfig()).not.toThrow();
    });
  });
});

describe('saveConfig', () => {
  it('writes a config that loads back unchanged', () => {
    const config = getDefaultConfig();
    config.worker.path = '/opt/miner/miner';
    config.policy.coldStartCommands = ['reset-a', 'reset-b'];

    saveConfig(config);

    expect(existsSync(getConfigPath())).toBe(true);
    expect(loadConfig()).toEqual(config);
  });

  it('writes pretty-printed JSON with a trailing newline', () => {
    const path = join(TEST_HOME, 'nested', 'out.json');
    saveConfig(getDefaultConfig(), path);

    const text = readFileSync(path, 'utf8');
    expect(text.endsWith('}\n')).toBe(true);
    expect(text).toContain('\n  "worker": {');
  });
});
