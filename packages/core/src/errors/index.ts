/**
 * Error hierarchy shared by every rigkeeper package.
 *
 * Each subclass carries a stable `code` plus optional structured context so
 * that the operational log can record failures without string parsing.
 */

export class RigkeeperError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'RigkeeperError';
    this.code = code;
    this.context = context;
  }
}

export class ConfigError extends RigkeeperError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', context);
    this.name = 'ConfigError';
  }
}

/** A health probe that did not yield a usable throughput figure. */
export class ProbeError extends RigkeeperError {
  readonly url: string;

  constructor(message: string, url: string, context?: Record<string, unknown>) {
    super(message, 'PROBE_ERROR', { ...context, url });
    this.name = 'ProbeError';
    this.url = url;
  }
}

export class ProcessError extends RigkeeperError {
  readonly pid?: number;

  constructor(message: string, pid?: number, context?: Record<string, unknown>) {
    super(message, 'PROCESS_ERROR', pid === undefined ? context : { ...context, pid });
    this.name = 'ProcessError';
    this.pid = pid;
  }
}
