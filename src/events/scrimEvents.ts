/**
 * Scrimkeeper — src/events/scrimEvents.ts
 * WHAT: Gateway event → scrim reconciler routing.
 * WHY: Keeps index.ts down to boot and shutdown; every handler here is a thin
 *      filter in front of a reconciler or the lifecycle controller.
 * FLOWS:
 *  - MessageReactionAdd/Remove → onMarkerAdded / onMarkerRemoved
 *  - MessageDelete / MessageBulkDelete → untrack → registration pass
 *  - GuildScheduledEventUpdate (Completed/Canceled) / Delete → controller.onExternalSessionEnded
 *  - InteractionCreate (/scrim) → command handler
 *  - ClientReady → runReadySequence (restore → scheduler → command sync)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  Events,
  GuildScheduledEventStatus,
  type Client,
  type Guild,
  type GuildScheduledEvent,
  type Interaction,
  type MessageReaction,
  type PartialGuildScheduledEvent,
  type PartialMessageReaction,
  type PartialUser,
  type User,
} from "discord.js";
import { wrapEvent } from "../lib/eventWrap.js";
import { logger } from "../lib/logger.js";
import { createScrimCommandHandler, type ScrimCommandDeps } from "../commands/scrim/index.js";
import { fetchTextChannel } from "../features/scrim/channels.js";
import {
  onMarkerAdded,
  onMarkerRemoved,
  onTrackedMessageDeleted,
  reconcileRegistration,
  type MarkerContext,
} from "../features/scrim/registrationSync.js";

type AnyScheduledEvent = GuildScheduledEvent | PartialGuildScheduledEvent;

/**
 * Statuses that mean "this event is over" from Discord's side.
 */
export function isTerminalEventStatus(status: GuildScheduledEventStatus | null | undefined): boolean {
  return status === GuildScheduledEventStatus.Completed || status === GuildScheduledEventStatus.Canceled;
}

function markerContext(app: ScrimCommandDeps): MarkerContext {
  return {
    sessions: app.sessions,
    markerEmoji: app.settings.markerEmoji,
    registeredRoleId: app.settings.registeredRoleId,
  };
}

/**
 * Bulk deletes untrack every affected signup post and then run one pass,
 * rather than one pass per message. Returns how many tracked posts were hit.
 */
export async function handleBulkDelete(guild: Guild, messageIds: Iterable<string>, app: ScrimCommandDeps): Promise<number> {
  const tracked = [...messageIds].filter((id) => app.sessions.isTrackedMessage(id));
  if (tracked.length === 0) return 0;

  for (const id of tracked) {
    app.sessions.removeMessage(id);
  }
  logger.info({ evt: "scrim_signup_bulk_deleted", count: tracked.length }, "Tracked signup posts bulk-deleted");

  const channel = await fetchTextChannel(guild, app.settings.signupChannelId);
  await reconcileRegistration(channel, app.sessions.trackedMessageIds(), app.settings.registeredRoleId, markerContext(app));
  return tracked.length;
}

/**
 * Startup recovery: rebuild the controller from the session map, then run the
 * full registration pass to catch every reaction made while we were offline.
 */
export async function restoreScrimState(client: Client, app: ScrimCommandDeps): Promise<void> {
  const guild = await client.guilds.fetch(app.settings.guildId);
  const session = await app.controller.restore(guild);

  const channel = await fetchTextChannel(guild, app.settings.signupChannelId);
  const report = await reconcileRegistration(
    channel,
    app.sessions.trackedMessageIds(),
    app.settings.registeredRoleId,
    markerContext(app)
  );
  logger.info(
    {
      evt: "scrim_startup_resync",
      session: session?.sessionId ?? null,
      status: session?.status ?? null,
      registered: report.desired.length,
      complete: report.complete,
    },
    "Scrim state restored"
  );
}

export interface ReadySteps {
  startScheduler: () => void;
  syncCommands: () => Promise<unknown>;
}

/**
 * Startup after login. Each step runs even if an earlier one failed; restore
 * goes first because every /scrim command needs the controller's guild.
 * Returns the names of the steps that failed.
 */
export async function runReadySequence(client: Client, app: ScrimCommandDeps, steps: ReadySteps): Promise<string[]> {
  const failed: string[] = [];
  const attempt = async (name: string, fn: () => unknown) => {
    try {
      await fn();
    } catch (err) {
      failed.push(name);
      logger.error({ evt: "scrim_ready_step_failed", step: name, err }, `Startup step ${name} failed`);
    }
  };

  await attempt("restore", () => restoreScrimState(client, app));
  // Ticks are no-ops until restore marks a scrim active
  await attempt("start_scheduler", steps.startScheduler);
  await attempt("sync_commands", steps.syncCommands);
  return failed;
}

export function registerScrimEvents(client: Client, app: ScrimCommandDeps): void {
  const { settings, controller } = app;
  const inScope = (guildId: string | null | undefined) => guildId === settings.guildId;
  const runScrimCommand = createScrimCommandHandler(app);

  client.on(
    Events.MessageReactionAdd,
    wrapEvent("messageReactionAdd", async (reaction: MessageReaction | PartialMessageReaction, user: User | PartialUser) => {
      if (!inScope(reaction.message.guildId)) return;
      await onMarkerAdded(reaction, user, markerContext(app));
    })
  );

  client.on(
    Events.MessageReactionRemove,
    wrapEvent("messageReactionRemove", async (reaction: MessageReaction | PartialMessageReaction, user: User | PartialUser) => {
      if (!inScope(reaction.message.guildId)) return;
      await onMarkerRemoved(reaction, user, markerContext(app));
    })
  );

  client.on(
    Events.MessageDelete,
    wrapEvent("messageDelete", async (message: { id: string; guild: Guild | null }) => {
      if (!message.guild || !inScope(message.guild.id)) return;
      if (!app.sessions.isTrackedMessage(message.id)) return;
      const channel = await fetchTextChannel(message.guild, settings.signupChannelId);
      await onTrackedMessageDeleted(message.id, channel, markerContext(app));
    })
  );

  client.on(
    Events.MessageBulkDelete,
    wrapEvent("messageBulkDelete", async (messages: ReadonlyMap<string, unknown>, channel: { guild: Guild }) => {
      if (!inScope(channel.guild.id)) return;
      await handleBulkDelete(channel.guild, messages.keys(), app);
    })
  );

  client.on(
    Events.GuildScheduledEventUpdate,
    wrapEvent("guildScheduledEventUpdate", async (_old: AnyScheduledEvent | null, event: GuildScheduledEvent) => {
      if (!inScope(event.guildId)) return;
      if (!isTerminalEventStatus(event.status)) return;
      const outcome = await controller.onExternalSessionEnded(event.id);
      logger.debug({ evt: "scrim_event_update", sessionId: event.id, status: event.status, outcome });
    })
  );

  client.on(
    Events.GuildScheduledEventDelete,
    wrapEvent("guildScheduledEventDelete", async (event: AnyScheduledEvent) => {
      if (!inScope(event.guildId)) return;
      const outcome = await controller.onExternalSessionEnded(event.id);
      logger.debug({ evt: "scrim_event_delete", sessionId: event.id, outcome });
    })
  );

  client.on(
    Events.InteractionCreate,
    wrapEvent("interactionCreate", async (interaction: Interaction) => {
      if (!interaction.isChatInputCommand() || interaction.commandName !== "scrim") return;
      await runScrimCommand(interaction);
    })
  );
}
