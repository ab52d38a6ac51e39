/**
 * Scrimkeeper — src/lib/schedulerHealth.ts
 * WHAT: Run/failure bookkeeping for the background reconciliation loops.
 * WHY: A tick that keeps failing (store locked, Discord down) should be loud,
 *      and /scrim status should be able to say when each loop last succeeded.
 * FLOWS:
 *  - recordSchedulerRun(name, success) → update health state → alert if threshold exceeded
 *  - getSchedulerHealth() → snapshot for status output
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";

export interface SchedulerHealth {
  name: string;
  lastRunAt: number | null;
  lastSuccessAt: number | null;
  lastErrorAt: number | null;
  /** Failures since the last success */
  consecutiveFailures: number;
  totalRuns: number;
  totalFailures: number;
}

// Three minutes of failed one-minute ticks before we shout about it
const CONSECUTIVE_FAILURE_ALERT_THRESHOLD = 3;

const schedulerHealth = new Map<string, SchedulerHealth>();

export function recordSchedulerRun(name: string, success: boolean, now: number = Date.now()): void {
  const health: SchedulerHealth = schedulerHealth.get(name) ?? {
    name,
    lastRunAt: null,
    lastSuccessAt: null,
    lastErrorAt: null,
    consecutiveFailures: 0,
    totalRuns: 0,
    totalFailures: 0,
  };

  health.lastRunAt = now;
  health.totalRuns++;

  if (success) {
    health.lastSuccessAt = now;
    health.consecutiveFailures = 0;
  } else {
    health.lastErrorAt = now;
    health.consecutiveFailures++;
    health.totalFailures++;
  }

  schedulerHealth.set(name, health);

  if (health.consecutiveFailures === CONSECUTIVE_FAILURE_ALERT_THRESHOLD) {
    logger.error(
      {
        evt: "scheduler_degraded",
        scheduler: name,
        consecutiveFailures: health.consecutiveFailures,
        totalFailures: health.totalFailures,
      },
      "[scheduler] Multiple consecutive failures - requires attention"
    );
  }
}

/**
 * Copies, so callers can't mutate the live records.
 */
export function getSchedulerHealth(): SchedulerHealth[] {
  return [...schedulerHealth.values()].map((h) => ({ ...h }));
}

export function getSchedulerHealthByName(name: string): SchedulerHealth | undefined {
  const health = schedulerHealth.get(name);
  return health ? { ...health } : undefined;
}

/** Test helper */
export function _clearAllSchedulerHealth(): void {
  schedulerHealth.clear();
}
