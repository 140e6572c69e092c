/**
 * Restart policy -- pure decisions the keeper loop makes from timing
 * history and health readings.
 */

import type { HealthStatus, StartMode, StartReason } from '@rigkeeper/core';

export interface StartDecision {
  mode: StartMode;
  reason: StartReason;
}

/**
 * Cold when there is no previous start in this session, or when the
 * previous start was less than `thresholdMs` ago (the worker crash-looped
 * and the environment likely needs a reset). Exactly at the threshold is hot.
 */
export function decideStart(lastStartAt: number | null, now: number, thresholdMs: number): StartDecision {
  if (lastStartAt === null) {
    return { mode: 'cold', reason: 'first-start' };
  }
  if (now - lastStartAt < thresholdMs) {
    return { mode: 'cold', reason: 'recent-restart' };
  }
  return { mode: 'hot', reason: 'stable-run' };
}

export function needsColdStart(lastStartAt: number | null, now: number, thresholdMs: number): boolean {
  return decideStart(lastStartAt, now, thresholdMs).mode === 'cold';
}

/** Non-positive readings are probe failures; anything under target is too slow. */
export function classifyThroughput(value: number, target: number): HealthStatus {
  if (value <= 0) return 'probe-failed';
  if (value < target) return 'below-target';
  return 'ok';
}

export function runTimeExpired(startedAt: number, now: number, maxRunMs: number): boolean {
  return now - startedAt >= maxRunMs;
}
