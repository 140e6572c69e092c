/**
 * ConsoleObserver -- structured console logging with ANSI color coding.
 *
 * Formats keeper lifecycle events as human-readable console output,
 * respecting the configured log level. Failed health checks and dispatch
 * errors go to stderr; everything else to stdout.
 */

import type {
  IObserver,
  LogLevel,
  ColdStartEvent,
  ColdCommandEvent,
  WorkerStartEvent,
  HealthCheckEvent,
  RestartEvent,
  KillEvent,
} from '@rigkeeper/core';

// ---------------------------------------------------------------------------
// ANSI escape codes
// ---------------------------------------------------------------------------

const RESET = '\x1b[0m';
const BOLD = '\x1b[1m';
const DIM = '\x1b[2m';

const FG = {
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
} as const;

// ---------------------------------------------------------------------------
// Log-level gate
// ---------------------------------------------------------------------------

export type { LogLevel };

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const STOP_REASON_LABEL: Record<RestartEvent['reason'], string> = {
  'worker-exited': 'worker process is dead',
  'probe-failed': 'could not read throughput',
  'below-target': 'throughput below target',
  'max-run-time': 'max run time reached',
};

// ---------------------------------------------------------------------------
// ConsoleObserver
// ---------------------------------------------------------------------------

export class ConsoleObserver implements IObserver {
  private readonly minLevel: number;

  constructor(logLevel: LogLevel = 'info') {
    this.minLevel = LEVEL_RANK[logLevel];
  }

  // ---- helpers ------------------------------------------------------------

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= this.minLevel;
  }

  private timestamp(date: Date = new Date()): string {
    return date.toISOString();
  }

  private tag(label: string, color: string): string {
    return `${color}${BOLD}[${label}]${RESET}`;
  }

  private formatDuration(ms: number): string {
    if (ms < 1000) return `${ms.toFixed(0)}ms`;
    if (ms < 60_000) return `${(ms / 1000).toFixed(2)}s`;
    return `${(ms / 60_000).toFixed(1)}m`;
  }

  // ---- IObserver ----------------------------------------------------------

  onColdStart(event: ColdStartEvent): void {
    if (!this.shouldLog('info')) return;
    console.log(
      `${DIM}${this.timestamp(event.timestamp)}${RESET} ${this.tag('COLD', FG.cyan)}` +
        ` ${FG.yellow}reset sequence${RESET}` +
        ` ${DIM}reason=${RESET}${event.reason}` +
        ` ${DIM}commands=${RESET}${event.commands.length}`,
    );
  }

  onColdCommand(event: ColdCommandEvent): void {
    if (event.error) {
      if (!this.shouldLog('error')) return;
      console.error(
        `${DIM}${this.timestamp(event.timestamp)}${RESET} ${this.tag('COLD', FG.cyan)} ${FG.red}FAIL${RESET}` +
          ` ${BOLD}${event.command}${RESET}` +
          ` ${DIM}error=${RESET}${event.error.message}`,
      );
      return;
    }
    if (!this.shouldLog('info')) return;
    console.log(
      `${DIM}${this.timestamp(event.timestamp)}${RESET} ${this.tag('COLD', FG.cyan)} running` +
        ` ${BOLD}${event.command}${RESET}`,
    );
  }

  onWorkerStart(event: WorkerStartEvent): void {
    if (!this.shouldLog('info')) return;
    console.log(
      `${DIM}${this.timestamp(event.timestamp)}${RESET} ${this.tag('WORKER', FG.blue)} ${FG.green}started${RESET}` +
        ` ${DIM}pid=${RESET}${event.pid}` +
        ` ${DIM}mode=${RESET}${event.mode}` +
        ` ${DIM}settle=${RESET}${this.formatDuration(event.settleMs)}` +
        ` ${DIM}path=${RESET}${event.path}`,
    );
  }

  onHealthCheck(event: HealthCheckEvent): void {
    const ts = this.timestamp(event.timestamp);
    if (event.status === 'ok') {
      if (!this.shouldLog('info')) return;
      console.log(
        `${DIM}${ts}${RESET} ${this.tag('HEALTH', FG.magenta)} ${FG.green}OK${RESET}` +
          ` ${DIM}throughput=${RESET}${event.throughput}` +
          ` ${DIM}target=${RESET}${event.target}`,
      );
      return;
    }

    if (!this.shouldLog('error')) return;
    const detail =
      event.status === 'probe-failed'
        ? 'could not read throughput'
        : `throughput ${event.throughput} is below target ${event.target}`;
    console.error(
      `${DIM}${ts}${RESET} ${this.tag('HEALTH', FG.magenta)} ${FG.red}FAIL${RESET} ${detail}` +
        ` ${DIM}pid=${RESET}${event.pid}`,
    );
  }

  onRestart(event: RestartEvent): void {
    if (!this.shouldLog('info')) return;
    console.log(
      `${DIM}${this.timestamp(event.timestamp)}${RESET} ${this.tag('RESTART', FG.yellow)}` +
        ` ${STOP_REASON_LABEL[event.reason]}` +
        ` ${DIM}pid=${RESET}${event.pid}` +
        ` ${DIM}uptime=${RESET}${this.formatDuration(event.uptimeMs)}`,
    );
  }

  onKill(event: KillEvent): void {
    if (!this.shouldLog('warn')) return;
    console.warn(
      `${DIM}${this.timestamp(event.timestamp)}${RESET} ${this.tag('KILL', FG.red)}` +
        ` ${DIM}pid=${RESET}${event.pid}` +
        ` ${DIM}grace=${RESET}${this.formatDuration(event.graceMs)}`,
    );
  }

  onError(error: Error, context: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const ctx = Object.keys(context).length > 0 ? ` ${DIM}ctx=${RESET}${JSON.stringify(context)}` : '';
    console.error(
      `${DIM}${this.timestamp()}${RESET} ${this.tag('ERROR', FG.red)} ${BOLD}${error.name}${RESET}: ${error.message}${ctx}`,
    );
  }

  async flush(): Promise<void> {
    // Console output is unbuffered; nothing to flush.
  }
}
