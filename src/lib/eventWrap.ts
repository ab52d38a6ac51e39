/**
 * Scrimkeeper — src/lib/eventWrap.ts
 * WHAT: Safe wrapper for Discord.js event handlers
 * WHY: Events never crash the bot; failures are logged with error classification
 * FLOWS:
 *  - wrapEvent(name, handler) → wrapped handler that catches errors
 *  - Error classification applied to all caught errors
 *  - Sentry capture only for reportable errors
 * USAGE:
 *  client.on(Events.MessageReactionAdd, wrapEvent("messageReactionAdd", async (reaction, user) => { ... }));
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { logger } from "./logger.js";
import { captureException } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry } from "./errors.js";

type EventHandler<T extends unknown[]> = (...args: T) => Promise<void> | void;

/**
 * Reaction handlers may page through reaction users on several tracked
 * messages, so the budget is a bit more generous than a plain gateway handler.
 */
const DEFAULT_EVENT_TIMEOUT_MS = parseInt(process.env.EVENT_TIMEOUT_MS ?? "20000", 10);

/**
 * Wrap an event handler with error protection and a time bound.
 *
 * The timeout only stops us from *waiting*; the handler itself keeps running.
 * That's fine for reconciliation handlers because a late finish just converges
 * roles a little later.
 */
export function wrapEvent<T extends unknown[]>(
  eventName: string,
  handler: EventHandler<T>,
  timeoutMs: number = DEFAULT_EVENT_TIMEOUT_MS
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        handler(...args),
        new Promise<void>((_, reject) => {
          timer = setTimeout(
            () => reject(new Error(`Event handler timeout after ${timeoutMs}ms`)),
            timeoutMs
          );
        }),
      ]);
    } catch (err) {
      const classified = classifyError(err);
      const contextIds = extractEventContext(args);

      logger.error(
        {
          evt: "event_error",
          event: eventName,
          ...errorContext(classified, contextIds),
          err,
        },
        `[${eventName}] event handler failed: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(err instanceof Error ? err : new Error(String(err)), {
          event: eventName,
          errorKind: classified.kind,
          ...contextIds,
        });
      }
      // Never re-throw: one failed handler must not take the gateway down
    } finally {
      if (timer) clearTimeout(timer);
    }
  };
}

/**
 * Probe common Discord.js payload shapes for guild/user/channel/message IDs
 * so error logs are reproducible without each handler passing them in.
 */
export function extractEventContext(args: unknown[]): Record<string, unknown> {
  const context: Record<string, unknown> = {};

  for (const arg of args) {
    if (!arg || typeof arg !== "object") continue;
    const obj = arg as Record<string, unknown>;

    if (typeof obj.guildId === "string") {
      context.guildId = obj.guildId;
    }
    if (typeof obj.channelId === "string") {
      context.channelId = obj.channelId;
    }
    if ("message" in obj && obj.message && typeof obj.message === "object") {
      const message = obj.message as Record<string, unknown>;
      if (typeof message.id === "string") {
        context.messageId = message.id;
      }
    }
    if (typeof obj.id === "string" && !context.entityId) {
      context.entityId = obj.id;
    }
  }

  return context;
}
