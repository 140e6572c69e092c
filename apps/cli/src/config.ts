/**
 * Configuration loading for the rigkeeper CLI.
 *
 * The config lives at ~/.rigkeeper/config.json (or wherever --config points).
 * User values are deep-merged over the defaults, arrays replace rather than
 * concatenate, and `${VAR}` references in strings are resolved from the
 * environment before validation.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { ConfigError } from '@rigkeeper/core';
import type {
  HealthEndpoint,
  LogLevel,
  ObservabilityConfig,
  RestartPolicyConfig,
  RigkeeperConfig,
  WorkerSpec,
} from '@rigkeeper/core';
import { BUILTIN_PARSERS } from '@rigkeeper/supervisor';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class ConfigLoadError extends ConfigError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, context);
    this.name = 'ConfigLoadError';
  }
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

export function getRigkeeperDir(): string {
  return resolve(homedir(), '.rigkeeper');
}

export function getConfigPath(): string {
  return join(getRigkeeperDir(), 'config.json');
}

export function getLogsDir(): string {
  return join(getRigkeeperDir(), 'logs');
}

export function ensureConfigDir(): void {
  mkdirSync(getRigkeeperDir(), { recursive: true });
  mkdirSync(getLogsDir(), { recursive: true });
}

export function configExists(configPath: string = getConfigPath()): boolean {
  return existsSync(configPath);
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export function getDefaultConfig(): RigkeeperConfig {
  return {
    worker: {
      path: '',
      args: [],
      newConsole: true,
    },
    endpoint: {
      host: '127.0.0.1',
      port: 4580,
      page: 'api.json',
      user: '',
      password: '',
      format: 'json',
      parser: 'hashrate-total',
      timeoutMs: 6_000,
    },
    policy: {
      targetThroughput: 11_500,
      hotRestartThresholdMinutes: 5,
      maxRunTimeMinutes: 40,
      settleMinutes: 2,
      pollIntervalSeconds: 20,
      killGraceSeconds: 5,
      coldStartCommands: [],
      coldStartIntervalSeconds: 16,
    },
    observability: {
      observers: ['console', 'file'],
      logLevel: 'info',
    },
  };
}

// ---------------------------------------------------------------------------
// Load / save
// ---------------------------------------------------------------------------

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Objects merge key by key; everything else (arrays included) replaces. */
function deepMerge(base: JsonObject, override: JsonObject): JsonObject {
  const result: JsonObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = result[key];
    result[key] = isObject(existing) && isObject(value) ? deepMerge(existing, value) : value;
  }
  return result;
}

/** Replace `${VAR}` with the environment value, or '' when unset. */
function resolveEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => process.env[name] ?? '');
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvVars);
  }
  if (isObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, inner]) => [key, resolveEnvVars(inner)]));
  }
  return value;
}

function readJsonFile(configPath: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigLoadError(`Cannot read config ${configPath}: ${reason}`, { path: configPath });
  }
  if (!isObject(parsed)) {
    throw new ConfigLoadError(`Config ${configPath} must contain a JSON object`, { path: configPath });
  }
  return parsed;
}

/**
 * Load and validate the configuration.
 *
 * Without `configPath` a missing ~/.rigkeeper/config.json means "use the
 * defaults"; an explicit path that does not exist is an error.
 */
export function loadConfig(configPath?: string): RigkeeperConfig {
  const path = configPath ?? getConfigPath();
  let user: JsonObject = {};

  if (existsSync(path)) {
    user = readJsonFile(path);
  } else if (configPath !== undefined) {
    throw new ConfigLoadError(`Config file not found: ${path}`, { path });
  }

  const defaults: unknown = JSON.parse(JSON.stringify(getDefaultConfig()));
  const merged = deepMerge(isObject(defaults) ? defaults : {}, user);
  const resolved = resolveEnvVars(merged);
  return validateConfig(isObject(resolved) ? resolved : {}, path);
}

export function saveConfig(config: RigkeeperConfig, configPath: string = getConfigPath()): void {
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf8');
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface NumberRule {
  integer?: boolean;
  positive?: boolean;
  min?: number;
  max?: number;
}

/** Reads typed fields out of untyped JSON, collecting a message per bad field. */
class FieldReader {
  readonly problems: string[] = [];

  section(root: JsonObject, name: string): JsonObject {
    const value = root[name];
    if (isObject(value)) return value;
    this.problems.push(`${name} must be an object`);
    return {};
  }

  string(obj: JsonObject, key: string, field: string, opts: { nonEmpty?: boolean } = {}): string {
    const value = obj[key];
    if (typeof value !== 'string') {
      this.problems.push(`${field} must be a string`);
      return '';
    }
    if (opts.nonEmpty && value.trim() === '') {
      this.problems.push(`${field} must not be empty`);
    }
    return value;
  }

  optionalString(obj: JsonObject, key: string, field: string): string | undefined {
    return obj[key] === undefined ? undefined : this.string(obj, key, field);
  }

  number(obj: JsonObject, key: string, field: string, opts: NumberRule = {}): number {
    const value = obj[key];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.problems.push(`${field} must be a number`);
      return 0;
    }
    if (opts.integer && !Number.isInteger(value)) {
      this.problems.push(`${field} must be an integer`);
    } else if (opts.positive && value <= 0) {
      this.problems.push(`${field} must be greater than 0`);
    } else if (opts.min !== undefined && value < opts.min) {
      this.problems.push(`${field} must be at least ${opts.min}`);
    } else if (opts.max !== undefined && value > opts.max) {
      this.problems.push(`${field} must be at most ${opts.max}`);
    }
    return value;
  }

  optionalNumber(obj: JsonObject, key: string, field: string): number | undefined {
    return obj[key] === undefined ? undefined : this.number(obj, key, field, { positive: true });
  }

  boolean(obj: JsonObject, key: string, field: string): boolean {
    const value = obj[key];
    if (typeof value !== 'boolean') {
      this.problems.push(`${field} must be true or false`);
      return false;
    }
    return value;
  }

  stringArray(obj: JsonObject, key: string, field: string): string[] {
    const value = obj[key];
    if (!Array.isArray(value)) {
      this.problems.push(`${field} must be an array of strings`);
      return [];
    }
    const strings: string[] = [];
    for (const item of value) {
      if (typeof item === 'string') {
        strings.push(item);
      } else {
        this.problems.push(`${field} must contain only strings`);
        return [];
      }
    }
    return strings;
  }

  oneOf<T extends string>(obj: JsonObject, key: string, field: string, allowed: readonly T[], fallback: T): T {
    const value = obj[key];
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      this.problems.push(`${field} must be one of: ${allowed.join(', ')}`);
      return fallback;
    }
    return match;
  }
}

function validateConfig(raw: JsonObject, path: string): RigkeeperConfig {
  const r = new FieldReader();

  const w = r.section(raw, 'worker');
  const worker: WorkerSpec = {
    // An empty path is allowed here; `run` refuses to start without one.
    path: r.string(w, 'path', 'worker.path'),
    args: r.stringArray(w, 'args', 'worker.args'),
    newConsole: r.boolean(w, 'newConsole', 'worker.newConsole'),
  };

  const e = r.section(raw, 'endpoint');
  const endpoint: HealthEndpoint = {
    host: r.string(e, 'host', 'endpoint.host', { nonEmpty: true }),
    port: r.number(e, 'port', 'endpoint.port', { integer: true, min: 1, max: 65_535 }),
    page: r.string(e, 'page', 'endpoint.page'),
    user: r.optionalString(e, 'user', 'endpoint.user'),
    password: r.optionalString(e, 'password', 'endpoint.password'),
    format: r.oneOf(e, 'format', 'endpoint.format', ['json'] as const, 'json'),
    parser: r.oneOf(e, 'parser', 'endpoint.parser', Object.keys(BUILTIN_PARSERS), 'hashrate-total'),
    timeoutMs: r.optionalNumber(e, 'timeoutMs', 'endpoint.timeoutMs'),
  };

  const p = r.section(raw, 'policy');
  const policy: RestartPolicyConfig = {
    targetThroughput: r.number(p, 'targetThroughput', 'policy.targetThroughput', { positive: true }),
    hotRestartThresholdMinutes: r.number(p, 'hotRestartThresholdMinutes', 'policy.hotRestartThresholdMinutes', { min: 0 }),
    maxRunTimeMinutes: r.number(p, 'maxRunTimeMinutes', 'policy.maxRunTimeMinutes', { positive: true }),
    settleMinutes: r.number(p, 'settleMinutes', 'policy.settleMinutes', { min: 0 }),
    pollIntervalSeconds: r.number(p, 'pollIntervalSeconds', 'policy.pollIntervalSeconds', { positive: true }),
    killGraceSeconds: r.number(p, 'killGraceSeconds', 'policy.killGraceSeconds', { min: 0 }),
    coldStartCommands: r.stringArray(p, 'coldStartCommands', 'policy.coldStartCommands'),
    coldStartIntervalSeconds: r.number(p, 'coldStartIntervalSeconds', 'policy.coldStartIntervalSeconds', { min: 0 }),
  };

  const o = r.section(raw, 'observability');
  const observability: ObservabilityConfig = {
    observers: r.stringArray(o, 'observers', 'observability.observers'),
    logLevel: r.oneOf(o, 'logLevel', 'observability.logLevel', LOG_LEVELS, 'info'),
    logPath: r.optionalString(o, 'logPath', 'observability.logPath'),
    maxLogSize: r.optionalNumber(o, 'maxLogSize', 'observability.maxLogSize'),
  };

  if (r.problems.length > 0) {
    throw new ConfigLoadError(`Invalid config ${path}: ${r.problems.join('; ')}`, {
      path,
      problems: r.problems,
    });
  }

  return { worker, endpoint, policy, observability };
}
