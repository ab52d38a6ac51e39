/**
 * Scrimkeeper — src/features/scrim/registrationSync.ts
 * WHAT: Keeps the "registered" role equal to the set of members holding the
 *       signup marker on any tracked signup message.
 * WHY: Reaction events get missed (restarts, partial caches, bulk deletes),
 *      so the full pass re-derives everything; the hooks are just fast paths.
 * FLOWS:
 *  - reconcileRegistration: fetch each tracked message → union marker holders → syncRoleHolders
 *  - onMarkerAdded: tracked + marker + human → assignRole
 *  - onMarkerRemoved: union over the other tracked messages → removeRole if absent
 *  - onTrackedMessageDeleted: untrack → full pass
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type {
  Guild,
  GuildTextBasedChannel,
  Message,
  MessageReaction,
  PartialMessageReaction,
  PartialUser,
  TextBasedChannel,
  User,
} from "discord.js";
import { logger } from "../../lib/logger.js";
import { classifyError, isNotFound } from "../../lib/errors.js";
import type { ScrimSessionStore } from "../../store/scrimSessionStore.js";
import {
  assignRole,
  removeRole,
  syncRoleHolders,
  type RoleAssignmentResult,
} from "../roleAutomation.js";
import type { RegistrationReport } from "./types.js";

const REACTION_PAGE_SIZE = 100;
const SYNC_REASON = "Scrim signup reconcile";

export interface RegistrationDeps {
  sessions: ScrimSessionStore;
  markerEmoji: string;
}

export interface MarkerContext extends RegistrationDeps {
  registeredRoleId: string;
}

type AnyReaction = MessageReaction | PartialMessageReaction;
type AnyUser = User | PartialUser;

/**
 * Custom emoji are configured by ID, unicode ones by the character itself.
 */
export function isMarkerEmoji(emoji: { id: string | null; name: string | null }, markerEmoji: string): boolean {
  return (emoji.id ?? emoji.name) === markerEmoji;
}

/**
 * Every non-bot user holding the marker on one message. Pages through the
 * reaction's users so signups past 100 aren't cut off.
 */
export async function collectMarkerHolders(message: Message, markerEmoji: string): Promise<Set<string>> {
  const holders = new Set<string>();
  const reaction = message.reactions.cache.find((r) => isMarkerEmoji(r.emoji, markerEmoji));
  if (!reaction) return holders;

  let after: string | undefined;
  for (;;) {
    const page = await reaction.users.fetch({ limit: REACTION_PAGE_SIZE, after });
    for (const user of page.values()) {
      if (!user.bot) holders.add(user.id);
    }
    const last = page.lastKey();
    if (page.size < REACTION_PAGE_SIZE || last === undefined) break;
    after = last;
  }
  return holders;
}

/**
 * Untrack a message whose signup post is gone. A store failure here only
 * means we try again on the next pass.
 */
function untrackMessage(sessions: ScrimSessionStore, messageId: string): void {
  try {
    const orphaned = sessions.removeMessage(messageId);
    logger.info({ evt: "scrim_signup_untracked", messageId, orphaned }, "Signup message gone, untracked");
  } catch (err) {
    logger.warn({ evt: "scrim_signup_untrack_failed", messageId, err }, "Could not untrack deleted signup message");
  }
}

/**
 * Full registration pass. The role's current holders carry no authority:
 * after a complete pass they equal the union of marker holders exactly.
 *
 * A tracked message that no longer exists is dropped from the store. Any other
 * fetch failure makes the desired set a lower bound, so that pass only adds.
 */
export async function reconcileRegistration(
  signupChannel: GuildTextBasedChannel,
  trackedMessageIds: readonly string[],
  registeredRoleId: string,
  deps: RegistrationDeps
): Promise<RegistrationReport> {
  const guild = signupChannel.guild;
  const desired = new Set<string>();
  const droppedMessageIds: string[] = [];
  let complete = true;

  for (const messageId of trackedMessageIds) {
    try {
      const message = await signupChannel.messages.fetch(messageId);
      for (const userId of await collectMarkerHolders(message, deps.markerEmoji)) {
        desired.add(userId);
      }
    } catch (err) {
      if (isNotFound(classifyError(err))) {
        droppedMessageIds.push(messageId);
        untrackMessage(deps.sessions, messageId);
        continue;
      }
      complete = false;
      logger.warn(
        { evt: "scrim_signup_fetch_failed", guildId: guild.id, messageId, err },
        "Could not read signup message; skipping removals this pass"
      );
    }
  }

  await refreshMemberCache(guild);
  const sync = await syncRoleHolders(guild, registeredRoleId, desired, {
    reason: SYNC_REASON,
    allowRemovals: complete,
  });

  logger.info(
    {
      evt: "scrim_registration_reconciled",
      guildId: guild.id,
      tracked: trackedMessageIds.length,
      desired: sync.desired.length,
      added: sync.added.length,
      removed: sync.removed.length,
      failed: sync.failed.length,
      dropped: droppedMessageIds.length,
      complete,
    },
    "Registration reconciled"
  );

  return { ...sync, droppedMessageIds, complete };
}

/**
 * role.members reads the member cache, so one full fetch per pass keeps the
 * holder set honest.
 */
export async function refreshMemberCache(guild: Guild): Promise<void> {
  await guild.members.fetch();
}

async function resolveUser(user: AnyUser): Promise<User> {
  return user.partial ? user.fetch() : user;
}

/**
 * Fast path for a new marker reaction on a tracked message.
 * Returns null when the reaction isn't ours to act on.
 */
export async function onMarkerAdded(
  reaction: AnyReaction,
  rawUser: AnyUser,
  ctx: MarkerContext
): Promise<RoleAssignmentResult | null> {
  // Emoji and message IDs are present even on partial reactions
  if (!ctx.sessions.isTrackedMessage(reaction.message.id)) return null;
  if (!isMarkerEmoji(reaction.emoji, ctx.markerEmoji)) return null;

  const user = await resolveUser(rawUser);
  if (user.bot) return null;

  const guild = reaction.message.guild;
  if (!guild) return null;

  return assignRole(guild, user.id, ctx.registeredRoleId, "Scrim signup");
}

/**
 * Fast path for a removed marker. Registration is a union across tracked
 * messages, so the role only goes if the user holds the marker on none of the
 * others. The other messages' holder sets are built once for this check.
 */
export async function onMarkerRemoved(
  reaction: AnyReaction,
  rawUser: AnyUser,
  ctx: MarkerContext
): Promise<RoleAssignmentResult | null> {
  const messageId = reaction.message.id;
  if (!ctx.sessions.isTrackedMessage(messageId)) return null;
  if (!isMarkerEmoji(reaction.emoji, ctx.markerEmoji)) return null;

  const user = await resolveUser(rawUser);
  if (user.bot) return null;

  const guild = reaction.message.guild;
  if (!guild) return null;

  const others = ctx.sessions.trackedMessageIds().filter((id) => id !== messageId);
  const stillRegistered = await holdsMarkerElsewhere(reaction.message.channel, others, user.id, ctx);
  if (stillRegistered !== false) {
    logger.debug(
      { evt: "scrim_unmark_kept", guildId: guild.id, userId: user.id, messageId, reason: stillRegistered },
      "Marker removed but registration kept"
    );
    return null;
  }

  return removeRole(guild, user.id, ctx.registeredRoleId, "Scrim signup withdrawn");
}

/**
 * false → the user holds the marker on none of `messageIds`.
 * Otherwise a short reason the role stays ("reacted" or "unknown" when some
 * message couldn't be read and we can't be sure).
 */
async function holdsMarkerElsewhere(
  channel: TextBasedChannel,
  messageIds: readonly string[],
  userId: string,
  ctx: MarkerContext
): Promise<false | "reacted" | "unknown"> {
  const union = new Set<string>();
  let uncertain = false;

  for (const id of messageIds) {
    try {
      const message = await channel.messages.fetch(id);
      for (const holder of await collectMarkerHolders(message, ctx.markerEmoji)) {
        union.add(holder);
      }
    } catch (err) {
      if (isNotFound(classifyError(err))) {
        untrackMessage(ctx.sessions, id);
        continue;
      }
      uncertain = true;
      logger.warn({ evt: "scrim_signup_fetch_failed", messageId: id, err }, "Could not read signup message");
    }
  }

  if (union.has(userId)) return "reacted";
  if (uncertain) return "unknown";
  return false;
}

/**
 * A tracked signup post was deleted. Untrack it and re-derive the role from
 * whatever signup posts remain. Returns null for untracked messages.
 */
export async function onTrackedMessageDeleted(
  messageId: string,
  signupChannel: GuildTextBasedChannel,
  ctx: MarkerContext
): Promise<RegistrationReport | null> {
  if (!ctx.sessions.isTrackedMessage(messageId)) return null;

  const orphaned = ctx.sessions.removeMessage(messageId);
  logger.info(
    { evt: "scrim_signup_deleted", messageId, orphaned },
    "Tracked signup message deleted"
  );

  return reconcileRegistration(signupChannel, ctx.sessions.trackedMessageIds(), ctx.registeredRoleId, ctx);
}
