/**
 * Scrimkeeper — src/features/scrim/attendance.ts
 * WHAT: The manual "/scrim update" pass: registration + voice reconcile, then attendance credit.
 * WHY: Attendance is a point sample. Whoever is signed up and sitting in voice
 *      at the moment an admin runs the update gets credited, once per session.
 *      A session is counted by its signup message, which survives resurrection;
 *      the scheduled event ID does not.
 * FLOWS:
 *  - reconcileRegistration → registered set
 *  - reconcileVoicePresence → present set (meeting ∪ other VC)
 *  - AttendanceStore.creditSession(signupMessageId, registered, present)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { GuildTextBasedChannel } from "discord.js";
import { logger } from "../../lib/logger.js";
import type { AttendanceStore } from "../../store/attendanceStore.js";
import type { ScrimSessionStore } from "../../store/scrimSessionStore.js";
import { reconcileRegistration } from "./registrationSync.js";
import { reconcileVoicePresence } from "./voicePresence.js";
import type {
  AttendanceReport,
  RegistrationReport,
  ScrimSettings,
  TrackedSession,
  VoicePresenceReport,
} from "./types.js";

export interface AttendanceUpdateDeps {
  settings: ScrimSettings;
  sessions: ScrimSessionStore;
  attendance: AttendanceStore;
}

export interface ScrimUpdateReport {
  registration: RegistrationReport;
  voice: VoicePresenceReport;
  attendance: AttendanceReport;
}

export async function runAttendanceUpdate(
  signupChannel: GuildTextBasedChannel,
  session: Pick<TrackedSession, "sessionId" | "signupMessageId">,
  deps: AttendanceUpdateDeps
): Promise<ScrimUpdateReport> {
  const { settings, sessions, attendance } = deps;
  const { sessionId, signupMessageId } = session;
  const guild = signupChannel.guild;

  const registration = await reconcileRegistration(
    signupChannel,
    sessions.trackedMessageIds(),
    settings.registeredRoleId,
    { sessions, markerEmoji: settings.markerEmoji }
  );
  const voice = await reconcileVoicePresence(
    guild,
    settings.meetingChannelId,
    settings.activeRoleId,
    settings.spectatorRoleId
  );

  const present = new Set([...voice.inMeeting, ...voice.inOtherVC]);
  const credit = attendance.creditSession(signupMessageId, registration.desired, present);

  const report: AttendanceReport = {
    sessionId,
    registered: registration.desired,
    present: [...present],
    creditedRegistered: credit.creditedRegistered,
    creditedAttended: credit.creditedAttended,
  };

  logger.info(
    {
      evt: "scrim_attendance_credited",
      guildId: guild.id,
      sessionId,
      registered: report.registered.length,
      present: report.present.length,
      creditedRegistered: report.creditedRegistered.length,
      creditedAttended: report.creditedAttended.length,
    },
    "Scrim attendance updated"
  );

  return { registration, voice, attendance: report };
}
