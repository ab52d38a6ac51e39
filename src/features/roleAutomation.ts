// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * Scrimkeeper — src/features/roleAutomation.ts
 * WHAT: Role mutation service: permission checks, add/remove with per-item results, holder convergence
 * WHY: Every reconciler funnels through here, so one member failing never aborts a pass
 * FLOWS:
 *  - planRoleDiff(desired, current) → { toAdd, toRemove }
 *  - syncRoleHolders(guild, roleId, desired) → assign/remove each diff entry → RoleSyncReport
 * DOCS:
 *  - Discord.js Roles: https://discord.js.org/#/docs/discord.js/main/class/Role
 *  - Discord.js Permissions: https://discord.js.org/#/docs/discord.js/main/class/PermissionsBitField
 */

import type { Guild, GuildMember } from "discord.js";
import { PermissionFlagsBits } from "discord.js";
import { logger } from "../lib/logger.js";
import { classifyError, isNotFound, type ClassifiedError } from "../lib/errors.js";
import type { RoleSyncReport } from "./scrim/types.js";

// ============================================================================
// Types
// ============================================================================

// "skipped" covers three cases: already in the wanted state (success: true),
// member/role gone (not_found), or we're not allowed to (permission).
// errorKind tells them apart.
export interface RoleAssignmentResult {
  success: boolean;
  userId: string;
  roleId: string;
  action: "add" | "remove" | "skipped";
  reason?: string;
  error?: string;
  errorKind?: ClassifiedError["kind"];
}

export interface RoleDiff {
  toAdd: string[];
  toRemove: string[];
}

export interface SyncRoleOptions {
  /** Audit-log reason shown in Discord */
  reason: string;
  /**
   * When false, holders outside the desired set keep the role this pass.
   * Used when the desired set is known to be incomplete.
   */
  allowRemovals?: boolean;
}

// ============================================================================
// Permission & Hierarchy Checks
// ============================================================================

/**
 * Pre-flight check before any role operation. Bot needs MANAGE_ROLES and its
 * highest role must sit strictly above the target role. Checking here turns a
 * cryptic 50013 into a readable reason.
 */
export function canManageRole(guild: Guild, roleId: string): { canManage: boolean; reason?: string } {
  const botMember = guild.members.me;
  if (!botMember) {
    return { canManage: false, reason: "Bot member not found in guild" };
  }

  if (!botMember.permissions.has(PermissionFlagsBits.ManageRoles)) {
    return { canManage: false, reason: "Bot missing MANAGE_ROLES permission" };
  }

  const targetRole = guild.roles.cache.get(roleId);
  if (!targetRole) {
    return { canManage: false, reason: "Target role not found" };
  }

  const botHighestRole = botMember.roles.highest;
  if (botHighestRole.position <= targetRole.position) {
    return {
      canManage: false,
      reason: `Role hierarchy violation: bot role (${botHighestRole.name} @${botHighestRole.position}) is not above target role (${targetRole.name} @${targetRole.position})`,
    };
  }

  return { canManage: true };
}

// ============================================================================
// Core Role Assignment
// ============================================================================

async function resolveMember(guild: Guild, userId: string): Promise<GuildMember> {
  return guild.members.cache.get(userId) ?? (await guild.members.fetch(userId));
}

function failure(
  userId: string,
  roleId: string,
  err: unknown
): RoleAssignmentResult {
  const classified = classifyError(err);
  return {
    success: false,
    userId,
    roleId,
    action: "skipped",
    error: classified.message,
    errorKind: classified.kind,
  };
}

/**
 * Add a role to a member. Idempotent: already holding it is a successful skip.
 * Never throws; callers read result.success.
 */
export async function assignRole(
  guild: Guild,
  userId: string,
  roleId: string,
  reason: string
): Promise<RoleAssignmentResult> {
  try {
    const member = await resolveMember(guild, userId);

    if (member.roles.cache.has(roleId)) {
      return { success: true, userId, roleId, action: "skipped", reason: "User already has role" };
    }

    const permCheck = canManageRole(guild, roleId);
    if (!permCheck.canManage) {
      logger.error({ evt: "role_assign_perm_fail", guildId: guild.id, roleId, reason: permCheck.reason });
      return {
        success: false,
        userId,
        roleId,
        action: "skipped",
        error: permCheck.reason,
        errorKind: "permission",
      };
    }

    await member.roles.add(roleId, reason);
    logger.info({ evt: "role_assignment", guildId: guild.id, userId, roleId, action: "add", reason }, "Role added");
    return { success: true, userId, roleId, action: "add" };
  } catch (err) {
    const result = failure(userId, roleId, err);
    // Members leave mid-pass all the time; that's a warn, not an error
    const level = result.errorKind === "not_found" ? "warn" : "error";
    logger[level]({ evt: "role_assign_error", guildId: guild.id, userId, roleId, err }, "Error assigning role");
    return result;
  }
}

/**
 * Remove a role from a member. Not holding it is a successful skip, and so is
 * a member who already left the guild (they can't hold anything).
 */
export async function removeRole(
  guild: Guild,
  userId: string,
  roleId: string,
  reason: string
): Promise<RoleAssignmentResult> {
  try {
    const member = await resolveMember(guild, userId);

    if (!member.roles.cache.has(roleId)) {
      return { success: true, userId, roleId, action: "skipped", reason: "User doesn't have role" };
    }

    const permCheck = canManageRole(guild, roleId);
    if (!permCheck.canManage) {
      logger.error({ evt: "role_remove_perm_fail", guildId: guild.id, roleId, reason: permCheck.reason });
      return {
        success: false,
        userId,
        roleId,
        action: "skipped",
        error: permCheck.reason,
        errorKind: "permission",
      };
    }

    await member.roles.remove(roleId, reason);
    logger.info({ evt: "role_assignment", guildId: guild.id, userId, roleId, action: "remove", reason }, "Role removed");
    return { success: true, userId, roleId, action: "remove" };
  } catch (err) {
    const classified = classifyError(err);
    if (isNotFound(classified)) {
      return { success: true, userId, roleId, action: "skipped", reason: "Member no longer in guild" };
    }
    logger.error({ evt: "role_remove_error", guildId: guild.id, userId, roleId, err }, "Error removing role");
    return failure(userId, roleId, err);
  }
}

// ============================================================================
// Holder Convergence
// ============================================================================

/**
 * Pure diff between the holder set we want and the one Discord reports.
 * Output order follows input iteration order.
 */
export function planRoleDiff(desired: ReadonlySet<string>, current: ReadonlySet<string>): RoleDiff {
  const toAdd: string[] = [];
  const toRemove: string[] = [];
  for (const userId of desired) {
    if (!current.has(userId)) toAdd.push(userId);
  }
  for (const userId of current) {
    if (!desired.has(userId)) toRemove.push(userId);
  }
  return { toAdd, toRemove };
}

/**
 * Current holders according to the member cache. Callers refresh the cache
 * (guild.members.fetch()) once per pass before calling this.
 */
export function currentRoleHolders(guild: Guild, roleId: string): Set<string> {
  const role = guild.roles.cache.get(roleId);
  if (!role) {
    throw new Error(`Role ${roleId} not found in guild ${guild.id}`);
  }
  return new Set(role.members.keys());
}

/**
 * Converge one role's holders onto `desired`. The role's existing holders are
 * treated as a stale cache: whatever they are, the result is holders == desired
 * (unless removals are disabled for this pass). Each mutation is independent.
 */
export async function syncRoleHolders(
  guild: Guild,
  roleId: string,
  desired: ReadonlySet<string>,
  options: SyncRoleOptions
): Promise<RoleSyncReport> {
  const current = currentRoleHolders(guild, roleId);
  const { toAdd, toRemove } = planRoleDiff(desired, current);
  const allowRemovals = options.allowRemovals ?? true;

  const report: RoleSyncReport = {
    roleId,
    desired: [...desired],
    added: [],
    removed: [],
    failed: [],
  };

  for (const userId of toAdd) {
    const result = await assignRole(guild, userId, roleId, options.reason);
    if (result.action === "add") report.added.push(userId);
    else if (!result.success) report.failed.push(result);
  }

  if (allowRemovals) {
    for (const userId of toRemove) {
      const result = await removeRole(guild, userId, roleId, options.reason);
      if (result.action === "remove") report.removed.push(userId);
      else if (!result.success) report.failed.push(result);
    }
  }

  logger.debug(
    {
      evt: "role_sync_pass",
      guildId: guild.id,
      roleId,
      desired: report.desired.length,
      added: report.added.length,
      removed: report.removed.length,
      failed: report.failed.length,
      allowRemovals,
    },
    "Role holders reconciled"
  );

  return report;
}
