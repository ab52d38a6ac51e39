/**
 * Scrimkeeper — src/index.ts
 * WHAT: Main process entrypoint. Opens the database, boots the Discord client,
 *       restores scrim state and starts the reconciliation loops.
 * WHY: Startup and shutdown order in one place.
 * FLOWS:
 *  - main: open DB → build stores + controller → register handlers → login
 *  - Ready: restore controller + registration resync → scheduler → command sync
 *  - SIGINT/SIGTERM: stop scheduler → flush Sentry → destroy client → close DB
 * DOCS:
 *  - discord.js v14 Client: https://discord.js.org/#/docs/discord.js/main/class/Client
 *  - Gateway intents: https://discord.com/developers/docs/topics/gateway#gateway-intents
 *  - Partials: https://discordjs.guide/popular-topics/partials.html
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { initializeSentry, captureException, flushSentry, setTag } from "./lib/sentry.js";
import {
  SHUTDOWN_FORCE_EXIT_MS,
  SHUTDOWN_SENTRY_FLUSH_MS,
  UNCAUGHT_EXCEPTION_EXIT_DELAY_MS,
} from "./lib/constants.js";
initializeSentry();

import { Client, Events, GatewayIntentBits, Partials } from "discord.js";
import { logger } from "./lib/logger.js";
import { env } from "./lib/env.js";
import { wrapEvent } from "./lib/eventWrap.js";
import { buildScrimSettings } from "./config.js";
import { closeDatabase, openDatabase, type Db } from "./db/db.js";
import { DocumentStore } from "./store/documentStore.js";
import { ScrimSessionStore } from "./store/scrimSessionStore.js";
import { AttendanceStore } from "./store/attendanceStore.js";
import { WinTallyStore } from "./store/winTallyStore.js";
import { ScrimLifecycleController } from "./features/scrim/lifecycle.js";
import { startScrimScheduler, stopScrimScheduler } from "./scheduler/scrimScheduler.js";
import { registerScrimEvents, runReadySequence } from "./events/scrimEvents.js";
import { syncCommandsToGuild } from "./commands/sync.js";
import type { ScrimCommandDeps } from "./commands/scrim/index.js";

// ===== Global Error Handlers =====

process.on("unhandledRejection", (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logger.error({ evt: "unhandled_rejection", err: error }, "[process] Unhandled promise rejection");
  captureException(error, { context: "unhandledRejection" });
  // Don't exit; discord.js recovers from most rejections
});

process.on("uncaughtException", (error, origin) => {
  logger.error({ evt: "uncaught_exception", err: error, origin }, "[process] Uncaught exception");
  captureException(error, { context: "uncaughtException", origin });
  setTimeout(() => process.exit(1), UNCAUGHT_EXCEPTION_EXIT_DELAY_MS);
});

export const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMembers, // role.members needs the full member list
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.GuildMessageReactions,
    GatewayIntentBits.GuildVoiceStates,
    GatewayIntentBits.GuildScheduledEvents,
  ],
  // Reactions on signup posts from before the last restart arrive uncached
  partials: [Partials.Message, Partials.Reaction, Partials.User, Partials.GuildScheduledEvent],
});

function installShutdownHandlers(db: Db): void {
  let shuttingDown = false;

  const gracefulShutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ evt: "shutdown", signal }, "[shutdown] Graceful shutdown starting");

    // Don't let a hung step keep the process around forever
    setTimeout(() => process.exit(1), SHUTDOWN_FORCE_EXIT_MS).unref();

    try {
      stopScrimScheduler();

      await flushSentry(SHUTDOWN_SENTRY_FLUSH_MS);

      client.removeAllListeners();
      await client.destroy();

      try {
        closeDatabase(db);
      } catch (err) {
        logger.warn({ err }, "[shutdown] Database close failed (non-fatal)");
      }

      logger.info("[shutdown] Graceful shutdown complete");
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "[shutdown] Error during graceful shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
}

async function main(): Promise<void> {
  const settings = buildScrimSettings(env);
  const db = openDatabase(env.DB_PATH);
  const docs = new DocumentStore(db);
  const sessions = new ScrimSessionStore(docs);

  const app: ScrimCommandDeps = {
    settings,
    sessions,
    attendance: new AttendanceStore(docs),
    wins: new WinTallyStore(docs),
    controller: new ScrimLifecycleController({ settings, sessions }),
  };

  registerScrimEvents(client, app);

  client.once(
    Events.ClientReady,
    wrapEvent(
      "clientReady",
      async (ready: Client<true>) => {
        logger.info({ evt: "ready", tag: ready.user.tag, id: ready.user.id }, "Bot ready");
        setTag("bot_id", ready.user.id);

        await runReadySequence(ready, app, {
          startScheduler: () => startScrimScheduler(ready, app.controller, settings),
          syncCommands: () => syncCommandsToGuild(env.DISCORD_TOKEN, env.CLIENT_ID, settings.guildId),
        });
      },
      // The startup resync pages every signup post; give it room
      120_000
    )
  );

  installShutdownHandlers(db);
  await client.login(env.DISCORD_TOKEN);
}

// Only start the bot if not running in test environment
if (!process.env.VITEST_WORKER_ID) {
  main().catch((err: unknown) => {
    logger.error({ err }, "Fatal startup error");
    process.exit(1);
  });
}
