/**
 * IObserver -- operational log contract
 *
 * Every lifecycle decision the keeper makes (cold start, launch, health
 * check, restart, kill) is reported here. Implementations live in
 * @rigkeeper/observability.
 */

/** Whether the reset sequence ran before a launch. */
export type StartMode = 'cold' | 'hot';

export type StartReason = 'first-start' | 'recent-restart' | 'stable-run';

export type HealthStatus = 'ok' | 'probe-failed' | 'below-target';

/** Why a monitoring phase ended. */
export type StopReason = 'worker-exited' | 'probe-failed' | 'below-target' | 'max-run-time';

export interface ColdStartEvent {
  reason: StartReason;
  commands: readonly string[];
  timestamp: Date;
}

export interface ColdCommandEvent {
  command: string;
  timestamp: Date;
  /** Set when the shell could not be spawned at all. */
  error?: Error;
}

export interface WorkerStartEvent {
  pid: number;
  path: string;
  mode: StartMode;
  settleMs: number;
  timestamp: Date;
}

export interface HealthCheckEvent {
  pid: number;
  throughput: number;
  target: number;
  status: HealthStatus;
  timestamp: Date;
}

export interface RestartEvent {
  pid: number;
  reason: StopReason;
  uptimeMs: number;
  timestamp: Date;
}

export interface KillEvent {
  pid: number;
  graceMs: number;
  timestamp: Date;
}

export interface IObserver {
  onColdStart(event: ColdStartEvent): void;
  onColdCommand(event: ColdCommandEvent): void;
  onWorkerStart(event: WorkerStartEvent): void;
  onHealthCheck(event: HealthCheckEvent): void;
  onRestart(event: RestartEvent): void;
  onKill(event: KillEvent): void;
  onError(error: Error, context: Record<string, unknown>): void;
  flush?(): Promise<void>;
}
