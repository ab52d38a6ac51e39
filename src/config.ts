/**
 * Scrimkeeper — src/config.ts
 * WHAT: Builds the typed scrim settings from validated environment variables.
 * WHY: Feature code takes a ScrimSettings object instead of reading env, so
 *      tests (and a second guild, one day) can hand in their own.
 *
 * ENV VARS: see src/lib/env.ts for the full list and defaults.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Env } from "./lib/env.js";
import type { ScrimSettings } from "./features/scrim/types.js";

const MINUTE_MS = 60_000;

export function buildScrimSettings(env: Env): ScrimSettings {
  return {
    guildId: env.GUILD_ID,
    signupChannelId: env.SCRIM_SIGNUP_CHANNEL_ID,
    // Announcements fall back to the signup channel, which is what small servers want
    announceChannelId: env.SCRIM_ANNOUNCE_CHANNEL_ID ?? env.SCRIM_SIGNUP_CHANNEL_ID,
    meetingChannelId: env.SCRIM_MEETING_CHANNEL_ID,
    registeredRoleId: env.SCRIM_REGISTERED_ROLE_ID,
    activeRoleId: env.SCRIM_ACTIVE_ROLE_ID,
    spectatorRoleId: env.SCRIM_SPECTATOR_ROLE_ID,
    mentionRoleIds: env.SCRIM_MENTION_ROLE_IDS,
    adminRoleIds: env.SCRIM_ADMIN_ROLE_IDS,
    markerEmoji: env.SCRIM_MARKER_EMOJI,
    tickIntervalMs: env.SCRIM_TICK_INTERVAL_SECONDS * 1000,
    warningLeadMs: env.SCRIM_WARNING_LEAD_MINUTES * MINUTE_MS,
    warningToleranceMs: env.SCRIM_WARNING_TOLERANCE_MINUTES * MINUTE_MS,
    startToleranceMs: env.SCRIM_START_TOLERANCE_MINUTES * MINUTE_MS,
  };
}
