/**
 * WorkerKeeper -- the supervision loop for a single worker process.
 *
 *   STARTING → SETTLING → MONITORING → STOPPING → STARTING …
 *
 * One cycle launches the worker (after the reset sequence on a cold start),
 * lets it settle, polls liveness and throughput until it dies, falls short
 * or reaches its maximum run time, then kills it if it is still alive.
 * Every decision is emitted as an event; the keeper itself never logs.
 */

import { EventEmitter } from 'node:events';
import {
  AbortedError,
  ProcessError,
  minutesToMs,
  secondsToMs,
  sleep,
} from '@rigkeeper/core';
import type {
  HealthEndpoint,
  HealthStatus,
  ProbeError,
  RestartPolicyConfig,
  StartMode,
  StartReason,
  StopReason,
  WorkerSpec,
} from '@rigkeeper/core';
import { HealthProber } from './health-prober.js';
import { ProcessController } from './process-controller.js';
import type { WorkerController, WorkerHandle } from './process-controller.js';
import { runColdStartSequence } from './cold-start.js';
import type { ColdStartRunner } from './cold-start.js';
import { classifyThroughput, decideStart, runTimeExpired } from './restart-policy.js';

// ── Types ────────────────────────────────────────────────────────────────

export interface KeeperConfig {
  worker: WorkerSpec;
  endpoint: HealthEndpoint;
  policy: RestartPolicyConfig;
}

export interface ThroughputProbe {
  probe(endpoint: HealthEndpoint): Promise<number>;
}

export interface KeeperClock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export interface KeeperDeps {
  controller?: WorkerController;
  prober?: ThroughputProbe;
  runColdStart?: ColdStartRunner;
  clock?: KeeperClock;
}

export type KeeperPhase = 'idle' | 'starting' | 'settling' | 'monitoring' | 'stopping';

export interface SupervisionState {
  phase: KeeperPhase;
  /** Pid of the worker this keeper launched last, while it is believed alive. */
  pid: number | null;
  lastStartAt: number | null;
  cycles: number;
}

export interface CycleOutcome {
  /** Null when the worker could not be launched. */
  pid: number | null;
  mode: StartMode;
  reason: StopReason;
  killed: boolean;
  uptimeMs: number;
}

export interface KeeperEvents {
  'cold-start': [reason: StartReason, commands: readonly string[]];
  'cold-command': [command: string, error: Error | undefined];
  'worker:started': [pid: number, mode: StartMode, settleMs: number];
  'launch:error': [error: ProcessError];
  settling: [pid: number, settleMs: number];
  'health:checked': [pid: number, throughput: number, target: number, status: HealthStatus];
  'probe:error': [error: ProbeError];
  'worker:exited': [pid: number];
  'worker:stopping': [pid: number, reason: StopReason, uptimeMs: number];
  'worker:killed': [pid: number, graceMs: number];
  'kill:error': [error: ProcessError];
  'cycle:ended': [outcome: CycleOutcome];
}

export const systemClock: KeeperClock = {
  now: () => Date.now(),
  sleep,
};

// ── WorkerKeeper ─────────────────────────────────────────────────────────

export class WorkerKeeper extends EventEmitter<KeeperEvents> {
  private readonly config: KeeperConfig;
  private readonly controller: WorkerController;
  private readonly prober: ThroughputProbe;
  private readonly runColdStart: ColdStartRunner;
  private readonly clock: KeeperClock;

  private phase: KeeperPhase = 'idle';
  private current: WorkerHandle | null = null;
  private lastStartAt: number | null = null;
  private cycles = 0;

  constructor(config: KeeperConfig, deps: KeeperDeps = {}) {
    super();
    this.config = config;
    this.controller =
      deps.controller ??
      new ProcessController({ onKillError: (error) => this.emit('kill:error', error) });
    this.prober =
      deps.prober ?? new HealthProber({ onFailure: (error) => this.emit('probe:error', error) });
    this.runColdStart = deps.runColdStart ?? runColdStartSequence;
    this.clock = deps.clock ?? systemClock;
  }

  getState(): SupervisionState {
    return {
      phase: this.phase,
      pid: this.current?.pid ?? null,
      lastStartAt: this.lastStartAt,
      cycles: this.cycles,
    };
  }

  /**
   * Supervise until `signal` aborts. Abort interrupts whatever sleep is in
   * progress; the worker is left running.
   */
  async run(signal?: AbortSignal): Promise<void> {
    while (!signal?.aborted) {
      try {
        await this.runCycle(signal);
      } catch (err) {
        if (err instanceof AbortedError) return;
        throw err;
      }
    }
  }

  /** One full STARTING … STOPPING pass. Rejects with AbortedError on abort. */
  async runCycle(signal?: AbortSignal): Promise<CycleOutcome> {
    const { policy } = this.config;
    const settleMs = minutesToMs(policy.settleMinutes);

    try {
      // ── STARTING ──
      this.phase = 'starting';
      const decision = decideStart(
        this.lastStartAt,
        this.clock.now(),
        minutesToMs(policy.hotRestartThresholdMinutes),
      );

      if (decision.mode === 'cold') {
        this.emit('cold-start', decision.reason, policy.coldStartCommands);
        await this.runColdStart(policy.coldStartCommands, secondsToMs(policy.coldStartIntervalSeconds), {
          sleep: (ms) => this.clock.sleep(ms, signal),
          onCommand: (command, error) => this.emit('cold-command', command, error),
        });
      }

      let handle: WorkerHandle;
      try {
        handle = await this.controller.launch(this.config.worker);
      } catch (err) {
        if (!(err instanceof ProcessError)) throw err;
        return await this.launchFailed(err, decision.mode, settleMs, signal);
      }

      const startedAt = this.clock.now();
      this.lastStartAt = startedAt;
      this.current = handle;
      this.emit('worker:started', handle.pid, decision.mode, settleMs);

      // ── SETTLING ──
      this.phase = 'settling';
      this.emit('settling', handle.pid, settleMs);
      await this.clock.sleep(settleMs, signal);

      // ── MONITORING ──
      this.phase = 'monitoring';
      const reason = await this.monitor(handle, startedAt, signal);

      // ── STOPPING ──
      this.phase = 'stopping';
      const uptimeMs = this.clock.now() - startedAt;
      this.emit('worker:stopping', handle.pid, reason, uptimeMs);

      this.current = null;
      let killed = false;
      if (this.controller.isAlive(handle)) {
        const graceMs = secondsToMs(policy.killGraceSeconds);
        this.controller.forceKill(handle);
        killed = true;
        this.emit('worker:killed', handle.pid, graceMs);
        await this.clock.sleep(graceMs, signal);
      }

      return this.endCycle({ pid: handle.pid, mode: decision.mode, reason, killed, uptimeMs });
    } finally {
      this.phase = 'idle';
    }
  }

  // ── Internal ─────────────────────────────────────────────────────────

  private async monitor(handle: WorkerHandle, startedAt: number, signal?: AbortSignal): Promise<StopReason> {
    const { policy, endpoint } = this.config;
    const maxRunMs = minutesToMs(policy.maxRunTimeMinutes);
    const pollMs = secondsToMs(policy.pollIntervalSeconds);

    while (!runTimeExpired(startedAt, this.clock.now(), maxRunMs)) {
      await this.clock.sleep(pollMs, signal);

      if (!this.controller.isAlive(handle)) {
        this.emit('worker:exited', handle.pid);
        return 'worker-exited';
      }

      const throughput = await this.prober.probe(endpoint);
      const status = classifyThroughput(throughput, policy.targetThroughput);
      this.emit('health:checked', handle.pid, throughput, policy.targetThroughput, status);
      if (status !== 'ok') return status;
    }

    return 'max-run-time';
  }

  /**
   * A worker that cannot be launched is treated like one that died during
   * settle: the attempt counts as a start (so the next one is cold) and the
   * keeper waits out the settle time before retrying.
   */
  private async launchFailed(
    error: ProcessError,
    mode: StartMode,
    settleMs: number,
    signal?: AbortSignal,
  ): Promise<CycleOutcome> {
    this.lastStartAt = this.clock.now();
    this.current = null;
    this.emit('launch:error', error);
    await this.clock.sleep(settleMs, signal);
    return this.endCycle({ pid: null, mode, reason: 'worker-exited', killed: false, uptimeMs: 0 });
  }

  private endCycle(outcome: CycleOutcome): CycleOutcome {
    this.cycles++;
    this.emit('cycle:ended', outcome);
    return outcome;
  }
}
