/**
 * Bridges WorkerKeeper events onto an IObserver, turning positional event
 * arguments into timestamped observer events.
 */

import type { EventEmitter } from 'node:events';
import type {
  HealthStatus,
  IObserver,
  ProbeError,
  ProcessError,
  StartMode,
  StartReason,
  StopReason,
  WorkerSpec,
} from '@rigkeeper/core';
import type { KeeperEvents } from '@rigkeeper/supervisor';

/** Subscribe `observer` to `keeper`. Returns a function that unsubscribes. */
export function observeKeeper(
  keeper: EventEmitter<KeeperEvents>,
  observer: IObserver,
  worker: WorkerSpec,
  clock: () => Date = () => new Date(),
): () => void {
  const onColdStart = (reason: StartReason, commands: readonly string[]) => {
    observer.onColdStart({ reason, commands, timestamp: clock() });
  };
  const onColdCommand = (command: string, error: Error | undefined) => {
    observer.onColdCommand({ command, error, timestamp: clock() });
  };
  const onStarted = (pid: number, mode: StartMode, settleMs: number) => {
    observer.onWorkerStart({ pid, path: worker.path, mode, settleMs, timestamp: clock() });
  };
  const onLaunchError = (error: ProcessError) => {
    observer.onError(error, { source: 'launch', path: worker.path });
  };
  const onChecked = (pid: number, throughput: number, target: number, status: HealthStatus) => {
    observer.onHealthCheck({ pid, throughput, target, status, timestamp: clock() });
  };
  const onProbeError = (error: ProbeError) => {
    observer.onError(error, { source: 'probe', url: error.url });
  };
  const onStopping = (pid: number, reason: StopReason, uptimeMs: number) => {
    observer.onRestart({ pid, reason, uptimeMs, timestamp: clock() });
  };
  const onKilled = (pid: number, graceMs: number) => {
    observer.onKill({ pid, graceMs, timestamp: clock() });
  };
  const onKillError = (error: ProcessError) => {
    observer.onError(error, { source: 'kill', pid: error.pid });
  };

  keeper.on('cold-start', onColdStart);
  keeper.on('cold-command', onColdCommand);
  keeper.on('worker:started', onStarted);
  keeper.on('launch:error', onLaunchError);
  keeper.on('health:checked', onChecked);
  keeper.on('probe:error', onProbeError);
  keeper.on('worker:stopping', onStopping);
  keeper.on('worker:killed', onKilled);
  keeper.on('kill:error', onKillError);

  return () => {
    keeper.off('cold-start', onColdStart);
    keeper.off('cold-command', onColdCommand);
    keeper.off('worker:started', onStarted);
    keeper.off('launch:error', onLaunchError);
    keeper.off('health:checked', onChecked);
    keeper.off('probe:error', onProbeError);
    keeper.off('worker:stopping', onStopping);
    keeper.off('worker:killed', onKilled);
    keeper.off('kill:error', onKillError);
  };
}
