/**
 * Scrimkeeper — src/commands/scrim/shared.ts
 * WHAT: Dependencies and access check shared by the /scrim handlers
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { PermissionFlagsBits, type GuildMember } from "discord.js";
import type { ScrimLifecycleController } from "../../features/scrim/lifecycle.js";
import type { ScrimSettings } from "../../features/scrim/types.js";
import type { AttendanceStore } from "../../store/attendanceStore.js";
import type { ScrimSessionStore } from "../../store/scrimSessionStore.js";
import type { WinTallyStore } from "../../store/winTallyStore.js";

export interface ScrimCommandDeps {
  settings: ScrimSettings;
  controller: ScrimLifecycleController;
  sessions: ScrimSessionStore;
  attendance: AttendanceStore;
  wins: WinTallyStore;
  clock?: () => number;
}

/**
 * Scrim admins: Manage Server, or any of the configured admin roles.
 */
export function canRunScrimCommands(member: GuildMember, adminRoleIds: readonly string[]): boolean {
  if (member.permissions.has(PermissionFlagsBits.ManageGuild)) return true;
  return adminRoleIds.some((roleId) => member.roles.cache.has(roleId));
}

export function formatList(ids: readonly string[], render: (id: string) => string = (id) => `<@${id}>`): string {
  if (ids.length === 0) return "none";
  const shown = ids.slice(0, 20).map(render).join(", ");
  return ids.length > 20 ? `${shown} and ${ids.length - 20} more` : shown;
}
