/**
 * NoopObserver -- silent observer that discards all events.
 */

import type {
  IObserver,
  ColdStartEvent,
  ColdCommandEvent,
  WorkerStartEvent,
  HealthCheckEvent,
  RestartEvent,
  KillEvent,
} from '@rigkeeper/core';

export class NoopObserver implements IObserver {
  onColdStart(_event: ColdStartEvent): void {
    // intentionally empty
  }

  onColdCommand(_event: ColdCommandEvent): void {
    // intentionally empty
  }

  onWorkerStart(_event: WorkerStartEvent): void {
    // intentionally empty
  }

  onHealthCheck(_event: HealthCheckEvent): void {
    // intentionally empty
  }

  onRestart(_event: RestartEvent): void {
    // intentionally empty
  }

  onKill(_event: KillEvent): void {
    // intentionally empty
  }

  onError(_error: Error, _context: Record<string, unknown>): void {
    // intentionally empty
  }

  async flush(): Promise<void> {
    // intentionally empty
  }
}
