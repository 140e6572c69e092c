/**
 * FileObserver -- append-only JSONL operational log.
 *
 * Each event becomes one JSON object per line. When the file grows past
 * `maxBytes` it is renamed to `<file>.1` (replacing any previous rotation)
 * and a fresh file is started.
 */

import { appendFileSync, mkdirSync, renameSync, statSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { isNodeError } from '@rigkeeper/core';
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

export interface FileObserverOptions {
  /** Defaults to ~/.rigkeeper/logs/rigkeeper.jsonl. */
  filePath?: string;
  /** Rotate once the file exceeds this many bytes. Default 10 MB. */
  maxBytes?: number;
}

const DEFAULT_MAX_BYTES = 10 * 1024 * 1024;

export class FileObserver implements IObserver {
  readonly filePath: string;
  private readonly maxBytes: number;

  constructor(options: FileObserverOptions = {}) {
    this.filePath = options.filePath ?? join(homedir(), '.rigkeeper', 'logs', 'rigkeeper.jsonl');
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    mkdirSync(dirname(this.filePath), { recursive: true });
  }

  onColdStart(event: ColdStartEvent): void {
    this.write('info', 'cold_start', event.timestamp, {
      reason: event.reason,
      commands: event.commands,
    });
  }

  onColdCommand(event: ColdCommandEvent): void {
    if (event.error) {
      this.write('error', 'cold_command', event.timestamp, {
        command: event.command,
        error: event.error.message,
      });
      return;
    }
    this.write('info', 'cold_command', event.timestamp, { command: event.command });
  }

  onWorkerStart(event: WorkerStartEvent): void {
    this.write('info', 'worker_start', event.timestamp, {
      pid: event.pid,
      mode: event.mode,
      path: event.path,
      settleMs: event.settleMs,
    });
  }

  onHealthCheck(event: HealthCheckEvent): void {
    this.write(event.status === 'ok' ? 'info' : 'error', 'health_check', event.timestamp, {
      pid: event.pid,
      throughput: event.throughput,
      target: event.target,
      status: event.status,
    });
  }

  onRestart(event: RestartEvent): void {
    this.write('info', 'restart', event.timestamp, {
      pid: event.pid,
      reason: event.reason,
      uptimeMs: event.uptimeMs,
    });
  }

  onKill(event: KillEvent): void {
    this.write('warn', 'kill', event.timestamp, { pid: event.pid, graceMs: event.graceMs });
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.write('error', 'error', new Date(), {
      name: error.name,
      message: error.message,
      context,
    });
  }

  async flush(): Promise<void> {
    // Writes are synchronous; nothing is buffered.
  }

  // ---- internal -----------------------------------------------------------

  private write(level: LogLevel, event: string, ts: Date, fields: Record<string, unknown>): void {
    const line = JSON.stringify({ ts: ts.toISOString(), level, event, ...fields }) + '\n';
    try {
      this.rotateIfNeeded();
      appendFileSync(this.filePath, line, 'utf8');
    } catch (err) {
      if (!isNodeError(err)) throw err;
      console.error(`[FileObserver] cannot write ${this.filePath}: ${err.message}`);
    }
  }

  private rotateIfNeeded(): void {
    let size: number;
    try {
      size = statSync(this.filePath).size;
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return;
      throw err;
    }
    if (size >= this.maxBytes) {
      renameSync(this.filePath, `${this.filePath}.1`);
    }
  }
}
