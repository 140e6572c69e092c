/**
 * Run command -- supervise the configured worker until interrupted.
 *
 * Usage:
 *   rigkeeper run
 *   rigkeeper run --config /etc/rigkeeper/rig.json
 *
 * SIGINT and SIGTERM stop the keeper and flush the operational log. The
 * worker itself is left running: it is a peer process, not a child the
 * keeper owns.
 */

import { join } from 'node:path';
import type { IObserver, ObservabilityConfig, RigkeeperConfig } from '@rigkeeper/core';
import { createObserver } from '@rigkeeper/observability';
import { WorkerKeeper } from '@rigkeeper/supervisor';
import type { KeeperConfig } from '@rigkeeper/supervisor';
import { parseCommonArgs } from '../args.js';
import { getLogsDir, loadConfig } from '../config.js';
import { observeKeeper } from '../observe.js';
import { BOLD, DIM, RED, RESET, box, kvRow } from '../ui.js';

type ShutdownSignal = 'SIGINT' | 'SIGTERM';

/** The slice of `process` used to catch shutdown signals. */
export interface SignalSource {
  once(event: ShutdownSignal, listener: () => void): unknown;
  off(event: ShutdownSignal, listener: () => void): unknown;
}

export interface RunDeps {
  createKeeper?: (config: KeeperConfig) => WorkerKeeper;
  createObserver?: (config: ObservabilityConfig) => IObserver;
  signals?: SignalSource;
}

const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

function withDefaultLogPath(observability: ObservabilityConfig): ObservabilityConfig {
  return { ...observability, logPath: observability.logPath ?? join(getLogsDir(), 'rigkeeper.jsonl') };
}

function banner(config: RigkeeperConfig, configPath: string | undefined): string {
  const { worker, endpoint, policy } = config;
  return box('rigkeeper', [
    kvRow('Worker', worker.path, 10),
    kvRow('Endpoint', `${endpoint.host}:${endpoint.port}/${endpoint.page}`, 10),
    kvRow('Target', String(policy.targetThroughput), 10),
    kvRow('Max run', `${policy.maxRunTimeMinutes} min`, 10),
    kvRow('Config', configPath ?? 'default', 10),
  ]);
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

export async function run(args: string[], deps: RunDeps = {}): Promise<void> {
  const { configPath } = parseCommonArgs(args);

  let config: RigkeeperConfig;
  try {
    config = loadConfig(configPath);
  } catch (err) {
    const errMessage = err instanceof Error ? err.message : String(err);
    console.error(`\n  ${RED}Failed to load config:${RESET} ${errMessage}\n`);
    process.exitCode = 1;
    return;
  }

  if (config.worker.path.trim() === '') {
    console.error(`\n  ${RED}Error:${RESET} worker.path is not set.`);
    console.error(`  ${DIM}Set it in the config file, then run ${BOLD}rigkeeper run${RESET}${DIM} again.${RESET}\n`);
    process.exitCode = 1;
    return;
  }

  const observer = (deps.createObserver ?? createObserver)(withDefaultLogPath(config.observability));
  const keeperConfig: KeeperConfig = {
    worker: config.worker,
    endpoint: config.endpoint,
    policy: config.policy,
  };
  const keeper = deps.createKeeper ? deps.createKeeper(keeperConfig) : new WorkerKeeper(keeperConfig);
  const detach = observeKeeper(keeper, observer, config.worker);

  const abort = new AbortController();
  const signals: SignalSource = deps.signals ?? process;
  const onSignal = () => abort.abort();
  for (const signal of SHUTDOWN_SIGNALS) signals.once(signal, onSignal);

  console.log(`\n${banner(config, configPath)}\n`);

  try {
    await keeper.run(abort.signal);
  } finally {
    for (const signal of SHUTDOWN_SIGNALS) signals.off(signal, onSignal);
    detach();
    await observer.flush?.();
  }

  const { pid } = keeper.getState();
  console.log(
    pid === null
      ? `\n  ${DIM}Stopped.${RESET}\n`
      : `\n  ${DIM}Stopped. Worker pid ${pid} is still running.${RESET}\n`,
  );
}
