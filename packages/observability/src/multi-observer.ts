/**
 * MultiObserver -- fan-out observer that delegates to multiple child observers.
 *
 * Every IObserver method is forwarded to each child. Errors thrown by
 * individual children are caught and logged to stderr so that a single
 * broken observer never takes down the keeper loop.
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

export class MultiObserver implements IObserver {
  private readonly children: IObserver[];

  constructor(children: IObserver[]) {
    this.children = [...children];
  }

  // ---- helpers ------------------------------------------------------------

  private safely(fn: (child: IObserver) => void): void {
    for (const child of this.children) {
      try {
        fn(child);
      } catch (err) {
        console.error('[MultiObserver] child observer threw:', err);
      }
    }
  }

  // ---- IObserver ----------------------------------------------------------

  onColdStart(event: ColdStartEvent): void {
    this.safely((c) => c.onColdStart(event));
  }

  onColdCommand(event: ColdCommandEvent): void {
    this.safely((c) => c.onColdCommand(event));
  }

  onWorkerStart(event: WorkerStartEvent): void {
    this.safely((c) => c.onWorkerStart(event));
  }

  onHealthCheck(event: HealthCheckEvent): void {
    this.safely((c) => c.onHealthCheck(event));
  }

  onRestart(event: RestartEvent): void {
    this.safely((c) => c.onRestart(event));
  }

  onKill(event: KillEvent): void {
    this.safely((c) => c.onKill(event));
  }

  onError(error: Error, context: Record<string, unknown>): void {
    this.safely((c) => c.onError(error, context));
  }

  async flush(): Promise<void> {
    const results = this.children.map(async (child) => {
      try {
        await child.flush?.();
      } catch (err) {
        console.error('[MultiObserver] flush error in child observer:', err);
      }
    });
    await Promise.all(results);
  }
}
