/**
 * Scrimkeeper — src/features/scrim/voicePresence.ts
 * WHAT: Moves members between the active and spectator roles by which voice channel they sit in.
 * WHY: Meeting-channel occupants are spectators, anyone in another VC is playing,
 *      anyone out of voice holds neither.
 * FLOWS:
 *  - one snapshot of guild.voiceStates → partitionVoiceOccupancy → { inMeeting, inOtherVC }
 *  - syncRoleHolders(active, inOtherVC) then syncRoleHolders(spectator, inMeeting)
 *  - clearVoiceRoles at teardown → both roles to nobody
 *
 * Someone who switches channels between the snapshot and the role call gets
 * fixed on the next tick.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild } from "discord.js";
import { logger } from "../../lib/logger.js";
import { syncRoleHolders } from "../roleAutomation.js";
import type { RoleSyncReport, VoicePresenceReport } from "./types.js";

/** The slice of a discord.js VoiceState the partition needs */
export interface VoiceOccupant {
  id: string;
  channelId: string | null;
  member: { user: { bot: boolean } } | null;
}

export interface VoicePartition {
  inMeeting: Set<string>;
  inOtherVC: Set<string>;
}

/**
 * Split voice occupants into meeting / elsewhere. Bots and states without a
 * channel (left voice, cached stale) are skipped. A user appears at most once
 * since Discord gives one voice state per user. `isBot` answers for occupants
 * whose member isn't cached.
 */
export function partitionVoiceOccupancy(
  states: Iterable<VoiceOccupant>,
  meetingChannelId: string,
  isBot: (userId: string) => boolean = () => false
): VoicePartition {
  const inMeeting = new Set<string>();
  const inOtherVC = new Set<string>();

  for (const state of states) {
    if (!state.channelId) continue;
    if (state.member ? state.member.user.bot : isBot(state.id)) continue;
    if (state.channelId === meetingChannelId) {
      inMeeting.add(state.id);
    } else {
      inOtherVC.add(state.id);
    }
  }

  return { inMeeting, inOtherVC };
}

/**
 * One voice pass. Role holders are read from the member cache, which the
 * startup registration pass fills with a full fetch and the GuildMembers
 * intent keeps current.
 */
export async function reconcileVoicePresence(
  guild: Guild,
  meetingChannelId: string,
  activeRoleId: string,
  spectatorRoleId: string
): Promise<VoicePresenceReport> {
  const { inMeeting, inOtherVC } = partitionVoiceOccupancy(
    guild.voiceStates.cache.values(),
    meetingChannelId,
    (userId) => guild.client.users.cache.get(userId)?.bot ?? false
  );

  const active = await syncRoleHolders(guild, activeRoleId, inOtherVC, { reason: "Scrim voice: playing" });
  const spectator = await syncRoleHolders(guild, spectatorRoleId, inMeeting, { reason: "Scrim voice: spectating" });

  logger.debug(
    {
      evt: "scrim_voice_reconciled",
      guildId: guild.id,
      inMeeting: inMeeting.size,
      inOtherVC: inOtherVC.size,
      failed: active.failed.length + spectator.failed.length,
    },
    "Voice presence reconciled"
  );

  return { inMeeting: [...inMeeting], inOtherVC: [...inOtherVC], active, spectator };
}

/**
 * Strip both voice roles from everyone. Used when a session ends or is cancelled.
 */
export async function clearVoiceRoles(
  guild: Guild,
  activeRoleId: string,
  spectatorRoleId: string
): Promise<{ active: RoleSyncReport; spectator: RoleSyncReport }> {
  const none = new Set<string>();
  const active = await syncRoleHolders(guild, activeRoleId, none, { reason: "Scrim over" });
  const spectator = await syncRoleHolders(guild, spectatorRoleId, none, { reason: "Scrim over" });
  logger.info(
    { evt: "scrim_voice_cleared", guildId: guild.id, removed: active.removed.length + spectator.removed.length },
    "Voice roles cleared"
  );
  return { active, spectator };
}
