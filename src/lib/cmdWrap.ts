/**
 * Scrimkeeper — src/lib/cmdWrap.ts
 * WHAT: Standard lifecycle for slash commands: trace ID, step logging, error reply, safe defer/reply.
 * WHY: Discord wants a first response within 3 seconds and scrim operations
 *      talk to Discord several times; every command gets the same handling.
 * FLOWS:
 *  - wrapCommand(): enter → step(...) → try/catch → classified error reply
 *  - ensureDeferred(): deferReply if not already acknowledged (ephemeral)
 *  - replyOrEdit(): reply / editReply / followUp based on interaction state
 * DOCS:
 *  - Interactions: https://discord.js.org/#/docs/discord.js/main/class/ChatInputCommandInteraction
 *  - Response rules (3-second window): https://discord.com/developers/docs/interactions/receiving-and-responding
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { randomBytes } from "node:crypto";
import {
  MessageFlags,
  type ChatInputCommandInteraction,
  type InteractionReplyOptions,
} from "discord.js";
import { logger } from "./logger.js";
import { captureException, setTag } from "./sentry.js";
import { classifyError, errorContext, shouldReportToSentry, userFriendlyMessage } from "./errors.js";

type Phase = string;

export type CommandContext = {
  interaction: ChatInputCommandInteraction;
  /** Mark the current execution phase (e.g. "validate", "begin", "reply") */
  step: (phase: Phase) => void;
  currentPhase: () => Phase;
  readonly traceId: string;
};

type CommandExecutor = (ctx: CommandContext) => Promise<void>;

const BASE62 = "0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz";

/**
 * 11-char base62 trace ID. Modulo bias is irrelevant for correlation IDs.
 */
export function newTraceId(): string {
  const bytes = randomBytes(11);
  let out = "";
  for (const byte of bytes) {
    out += BASE62[byte % BASE62.length];
  }
  return out;
}

/**
 * Decorate a command handler with tracing, step logging and error replies.
 * Never throws to the caller.
 */
export function wrapCommand(name: string, fn: CommandExecutor) {
  return async (interaction: ChatInputCommandInteraction): Promise<void> => {
    const traceId = newTraceId();
    const startedAt = Date.now();
    let phase: Phase = "enter";

    const commandCtx: CommandContext = {
      interaction,
      step: (newPhase: Phase) => {
        phase = newPhase;
        logger.debug({ evt: "cmd_step", traceId, cmd: name, phase });
      },
      currentPhase: () => phase,
      traceId,
    };

    logger.info(
      {
        evt: "cmd_start",
        traceId,
        cmd: name,
        userId: interaction.user.id,
        guildId: interaction.guildId ?? "dm",
      },
      "command start"
    );
    setTag("cmd", name);

    try {
      await fn(commandCtx);
      logger.info({ evt: "cmd_ok", traceId, cmd: name, ms: Date.now() - startedAt }, "command ok");
    } catch (error) {
      const classified = classifyError(error);
      // Conflicts are user mistakes ("no scrim running"), not failures
      const level = classified.kind === "conflict" ? "info" : "error";
      logger[level](
        { evt: "cmd_error", traceId, cmd: name, phase, ...errorContext(classified), err: error },
        `command error: ${classified.message}`
      );

      if (shouldReportToSentry(classified)) {
        captureException(error, { cmd: name, phase, traceId, errorKind: classified.kind });
      }

      try {
        await replyOrEdit(interaction, { content: `${userFriendlyMessage(classified)} (trace \`${traceId}\`)` });
      } catch (replyErr) {
        logger.error({ evt: "cmd_error_reply_fail", traceId, err: replyErr }, "Failed to post error reply");
      }
    }
  };
}

function discordCode(err: unknown): unknown {
  return typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
}

/**
 * First acknowledgement. 10062 (interaction expired) is logged and swallowed.
 */
export async function ensureDeferred(interaction: ChatInputCommandInteraction, ephemeral = true): Promise<void> {
  if (interaction.deferred || interaction.replied) return;
  try {
    await interaction.deferReply(ephemeral ? { flags: MessageFlags.Ephemeral } : {});
  } catch (err) {
    const code = discordCode(err);
    if (code === 10062) {
      logger.warn({ evt: "cmd_defer_fail", code, err }, "defer failed (interaction expired)");
      return;
    }
    throw err;
  }
}

/**
 * Reply with the right API for the interaction's state. Replies default to
 * ephemeral; public output has to ask for it.
 */
export async function replyOrEdit(
  interaction: ChatInputCommandInteraction,
  payload: InteractionReplyOptions,
  ephemeral = true
): Promise<void> {
  try {
    if (interaction.deferred) {
      // The defer already decided visibility
      const { flags: _flags, ...editPayload } = payload;
      await interaction.editReply(editPayload);
      return;
    }
    const withFlags: InteractionReplyOptions = ephemeral ? { ...payload, flags: MessageFlags.Ephemeral } : payload;
    if (interaction.replied) {
      await interaction.followUp(withFlags);
      return;
    }
    await interaction.reply(withFlags);
  } catch (err) {
    const code = discordCode(err);
    if (code === 10062 || code === 40060) {
      logger.warn({ evt: "cmd_reply_fail", code, err }, "reply skipped; interaction expired or acknowledged");
      return;
    }
    throw err;
  }
}
