/**
 * Probe command -- read the worker's throughput once and classify it.
 *
 * Usage:
 *   rigkeeper probe [--config path]
 *
 * Exits with code 1 unless the reading meets the configured target.
 */

import type { HealthStatus, ProbeError, RigkeeperConfig } from '@rigkeeper/core';
import { HealthProber, buildProbeUrl, classifyThroughput } from '@rigkeeper/supervisor';
import { parseCommonArgs } from '../args.js';
import { loadConfig } from '../config.js';
import { DIM, RED, RESET, kvRow, sectionHeader, statusBadge } from '../ui.js';
import type { Status } from '../ui.js';

export interface ProbeDeps {
  /** Replaces the global fetch used by the prober. */
  fetch?: typeof fetch;
}

const STATUS_DISPLAY: Record<HealthStatus, Status> = {
  ok: 'ok',
  'below-target': 'warn',
  'probe-failed': 'fail',
};

export async function probe(args: string[], deps: ProbeDeps = {}): Promise<void> {
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

  const { endpoint, policy } = config;
  const failures: ProbeError[] = [];
  const prober = new HealthProber({
    fetch: deps.fetch,
    onFailure: (error) => failures.push(error),
  });

  const throughput = await prober.probe(endpoint);
  const status = classifyThroughput(throughput, policy.targetThroughput);

  console.log('');
  console.log(sectionHeader('Health probe'));
  console.log(kvRow('Endpoint', buildProbeUrl({ ...endpoint, user: undefined, password: undefined })));
  console.log(kvRow('Parser', endpoint.parser));
  console.log(kvRow('Throughput', String(throughput)));
  console.log(kvRow('Target', String(policy.targetThroughput)));
  console.log(kvRow('Status', `${statusBadge(STATUS_DISPLAY[status])} ${DIM}${status}${RESET}`));
  const failure = failures.at(-1);
  if (failure) {
    console.log(kvRow('Reason', `${RED}${failure.message}${RESET}`));
  }
  console.log('');

  if (status !== 'ok') {
    process.exitCode = 1;
  }
}
