/**
 * Scrimkeeper — src/features/scrim/types.ts
 * WHAT: Type definitions for scrim sessions, settings and reconciliation reports
 * WHY: Shared across the reconcilers, the lifecycle controller and commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { RoleAssignmentResult } from "../roleAutomation.js";

// ============================================================================
// Session Types
// ============================================================================

/**
 * Logical session status. Deliberately not Discord's GuildScheduledEventStatus:
 * "ended by Discord while we still think it's live" and "ended on purpose"
 * need to look different to the controller.
 */
export type ScrimStatus = "scheduled" | "warned" | "active" | "ended" | "cancelled";

/** Statuses that count toward the one-live-session rule */
export const LIVE_STATUSES: ReadonlySet<ScrimStatus> = new Set(["scheduled", "warned", "active"]);

export interface TrackedSession {
  /** Discord scheduled event ID */
  sessionId: string;
  signupMessageId: string;
  status: ScrimStatus;
  name: string;
  description: string;
  /** Voice channel the scheduled event points at */
  voiceChannelId: string;
  /** Unix timestamp in ms */
  scheduledStartAt: number;
}

export interface BeginSessionParams {
  name: string;
  description: string;
  /** Unix timestamp in ms */
  startAt: number;
  /** Defaults to the meeting channel when omitted */
  voiceChannelId?: string;
}

// ============================================================================
// Settings
// ============================================================================

/**
 * Everything the scrim features need from configuration. Built from env in
 * src/config.ts; tests build it by hand.
 */
export interface ScrimSettings {
  guildId: string;
  signupChannelId: string;
  announceChannelId: string;
  meetingChannelId: string;
  registeredRoleId: string;
  activeRoleId: string;
  spectatorRoleId: string;
  mentionRoleIds: string[];
  adminRoleIds: string[];
  /** Unicode emoji ("✅") or a custom emoji ID */
  markerEmoji: string;
  tickIntervalMs: number;
  warningLeadMs: number;
  warningToleranceMs: number;
  startToleranceMs: number;
}

// ============================================================================
// Reports
// ============================================================================

/**
 * Per-pass outcome of a role convergence. Every mutation gets a result, so a
 * failure for one member shows up here instead of aborting the pass.
 */
export interface RoleSyncReport {
  roleId: string;
  /** Target holder set the pass converged toward */
  desired: string[];
  added: string[];
  removed: string[];
  failed: RoleAssignmentResult[];
}

export interface RegistrationReport extends RoleSyncReport {
  /** Tracked message IDs that no longer exist and were untracked */
  droppedMessageIds: string[];
  /**
   * False when some tracked message couldn't be read for a transient reason.
   * The desired set is then a lower bound, so removals were skipped.
   */
  complete: boolean;
}

export interface VoicePresenceReport {
  inMeeting: string[];
  inOtherVC: string[];
  active: RoleSyncReport;
  spectator: RoleSyncReport;
}

export interface AttendanceReport {
  sessionId: string;
  registered: string[];
  present: string[];
  /** Members whose registeredCount went up in this run */
  creditedRegistered: string[];
  /** Members whose attendedCount went up in this run */
  creditedAttended: string[];
}
