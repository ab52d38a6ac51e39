/**
 * Scrimkeeper — src/scheduler/scrimScheduler.ts
 * WHAT: The two periodic scrim loops: voice-presence reconcile and lifecycle poll.
 * WHY: Voice moves and start times don't arrive as events we can trust, so both
 *      are re-checked on a fixed tick while a scrim is active.
 * FLOWS:
 *  - every SCRIM_TICK_INTERVAL_SECONDS → runVoiceTick → reconcileVoicePresence
 *  - every SCRIM_TICK_INTERVAL_SECONDS → runLifecycleTick → controller.tick()
 *  - both are no-ops while controller.isScrimActive() is false
 *  - failures: recoverable → warn, anything else → error (and Sentry via the logger)
 * DOCS:
 *  - setInterval: https://nodejs.org/api/timers.html#setinterval
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Client, Guild } from "discord.js";
import { logger } from "../lib/logger.js";
import { classifyError, isRecoverable } from "../lib/errors.js";
import { recordSchedulerRun } from "../lib/schedulerHealth.js";
import type { ScrimLifecycleController, TickOutcome } from "../features/scrim/lifecycle.js";
import { reconcileVoicePresence } from "../features/scrim/voicePresence.js";
import type { ScrimSettings, VoicePresenceReport } from "../features/scrim/types.js";

export const VOICE_LOOP = "scrimVoicePresence";
export const LIFECYCLE_LOOP = "scrimLifecycle";

let _voiceInterval: NodeJS.Timeout | null = null;
let _lifecycleInterval: NodeJS.Timeout | null = null;

async function resolveGuild(client: Client, guildId: string): Promise<Guild> {
  return client.guilds.cache.get(guildId) ?? (await client.guilds.fetch(guildId));
}

/**
 * One voice-presence tick. Returns null when no scrim is active.
 * Throws on pass-level failure; the interval wrapper records and logs it.
 */
export async function runVoiceTick(
  client: Client,
  controller: ScrimLifecycleController,
  settings: ScrimSettings
): Promise<VoicePresenceReport | null> {
  if (!controller.isScrimActive() || controller.isTearingDown()) return null;
  const guild = await resolveGuild(client, settings.guildId);
  return reconcileVoicePresence(guild, settings.meetingChannelId, settings.activeRoleId, settings.spectatorRoleId);
}

/**
 * One lifecycle tick. Returns null when no scrim is active.
 */
export async function runLifecycleTick(controller: ScrimLifecycleController): Promise<TickOutcome | null> {
  if (!controller.isScrimActive()) return null;
  return controller.tick();
}

/**
 * Run a loop body, record the outcome, never throw. Idle ticks aren't recorded
 * so the health numbers only reflect work that actually happened. Transient
 * failures log at warn; the next interval is the retry.
 */
async function guarded(name: string, body: () => Promise<unknown>): Promise<void> {
  try {
    const result = await body();
    if (result !== null) recordSchedulerRun(name, true);
  } catch (err) {
    recordSchedulerRun(name, false);
    const classified = classifyError(err);
    if (isRecoverable(classified)) {
      logger.warn({ evt: "scrim_tick_deferred", loop: name, kind: classified.kind, err }, "Scrim tick hit a transient failure");
      return;
    }
    logger.error({ evt: "scrim_tick_failed", loop: name, err }, "Scrim tick failed; retrying next interval");
  }
}

export function startScrimScheduler(
  client: Client,
  controller: ScrimLifecycleController,
  settings: ScrimSettings
): void {
  // Opt-out for tests; live intervals keep vitest from exiting
  if (process.env.SCRIM_SCHEDULER_DISABLED === "1") {
    logger.debug({ evt: "scrim_scheduler_disabled" }, "Scrim scheduler disabled via env flag");
    return;
  }
  if (_voiceInterval || _lifecycleInterval) {
    logger.warn({ evt: "scrim_scheduler_already_running" }, "Scrim scheduler already running");
    return;
  }

  logger.info({ evt: "scrim_scheduler_start", intervalMs: settings.tickIntervalMs }, "Starting scrim scheduler");

  _voiceInterval = setInterval(() => {
    void guarded(VOICE_LOOP, () => runVoiceTick(client, controller, settings));
  }, settings.tickIntervalMs);
  _lifecycleInterval = setInterval(() => {
    void guarded(LIFECYCLE_LOOP, () => runLifecycleTick(controller));
  }, settings.tickIntervalMs);

  // Don't hold the process open on shutdown
  _voiceInterval.unref();
  _lifecycleInterval.unref();
}

export function stopScrimScheduler(): void {
  if (_voiceInterval) clearInterval(_voiceInterval);
  if (_lifecycleInterval) clearInterval(_lifecycleInterval);
  if (_voiceInterval || _lifecycleInterval) {
    logger.info({ evt: "scrim_scheduler_stop" }, "Scrim scheduler stopped");
  }
  _voiceInterval = null;
  _lifecycleInterval = null;
}
