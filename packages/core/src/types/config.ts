/**
 * Configuration shapes. A single RigkeeperConfig is built once at start-up
 * and passed down to the keeper and its collaborators.
 */

/** Executable the keeper launches and supervises. */
export interface WorkerSpec {
  /** Path to the worker executable. Its directory becomes the working directory. */
  path: string;
  /** Extra arguments; the worker normally starts with none. */
  args?: string[];
  /** Give the worker a visible console window (Windows only). */
  newConsole: boolean;
}

export type EndpointFormat = 'json';

/** Where and how to read the worker's throughput. */
export interface HealthEndpoint {
  host: string;
  port: number;
  /** Path after the first slash; may be empty. */
  page: string;
  user?: string;
  password?: string;
  format: EndpointFormat;
  /** Name of a registered throughput parser. */
  parser: string;
  /** Request timeout in ms. Default 6 000. */
  timeoutMs?: number;
}

export interface RestartPolicyConfig {
  /** Throughput floor; anything lower triggers a restart. */
  targetThroughput: number;
  /** A restart sooner than this after the last start is cold. */
  hotRestartThresholdMinutes: number;
  maxRunTimeMinutes: number;
  settleMinutes: number;
  pollIntervalSeconds: number;
  killGraceSeconds: number;
  /** Shell commands run in order before a cold start. */
  coldStartCommands: string[];
  coldStartIntervalSeconds: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ObservabilityConfig {
  /** Observer names to activate (e.g. ["console", "file"]). */
  observers: string[];
  /** Minimum log level for console output. */
  logLevel?: LogLevel;
  /** Path for the JSONL file observer. */
  logPath?: string;
  /** Max log file size in bytes before rotation. */
  maxLogSize?: number;
}

export interface RigkeeperConfig {
  worker: WorkerSpec;
  endpoint: HealthEndpoint;
  policy: RestartPolicyConfig;
  observability: ObservabilityConfig;
}
