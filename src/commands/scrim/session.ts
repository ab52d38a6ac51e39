/**
 * Scrimkeeper — src/commands/scrim/session.ts
 * WHAT: /scrim create | end | cancel | update | sync | status
 * WHY: Thin layer over the lifecycle controller and reconcilers; all state
 *      decisions live there.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, type ChatInputCommandInteraction } from "discord.js";
import { ensureDeferred, replyOrEdit, type CommandContext } from "../../lib/cmdWrap.js";
import { ScrimConflictError } from "../../lib/errors.js";
import { logger, redact } from "../../lib/logger.js";
import { getSchedulerHealth } from "../../lib/schedulerHealth.js";
import { runAttendanceUpdate } from "../../features/scrim/attendance.js";
import { fetchTextChannel } from "../../features/scrim/channels.js";
import type { TeardownReport } from "../../features/scrim/lifecycle.js";
import { discordTimestamp } from "../../features/scrim/messages.js";
import { reconcileRegistration } from "../../features/scrim/registrationSync.js";
import { LIVE_STATUSES, type RoleSyncReport, type TrackedSession } from "../../features/scrim/types.js";
import { formatList, type ScrimCommandDeps } from "./shared.js";

type GuildInteraction = ChatInputCommandInteraction<"cached">;

function requireLiveSession(deps: ScrimCommandDeps): TrackedSession {
  const session = deps.controller.getSession();
  if (!session || !LIVE_STATUSES.has(session.status)) {
    throw new ScrimConflictError("No scrim is scheduled or running.");
  }
  return session;
}

function summarizeSync(label: string, report: RoleSyncReport): string {
  const parts = [`**${label}:** +${report.added.length} / -${report.removed.length}`];
  if (report.failed.length > 0) {
    parts.push(`(${report.failed.length} failed: ${formatList(report.failed.map((f) => f.userId))})`);
  }
  return parts.join(" ");
}

function summarizeTeardown(report: TeardownReport): string {
  const failed = report.steps.filter((s) => !s.ok);
  if (failed.length === 0) return "All cleanup steps succeeded.";
  return `Some cleanup steps failed and will self-correct on the next sync: ${failed
    .map((s) => `\`${s.step}\` (${s.error ?? "unknown"})`)
    .join(", ")}`;
}

export async function handleCreate(
  ctx: CommandContext,
  interaction: GuildInteraction,
  deps: ScrimCommandDeps
): Promise<void> {
  const name = interaction.options.getString("name", true).trim();
  const startSeconds = interaction.options.getInteger("start", true);
  const description = interaction.options.getString("description", true).trim();
  const channel = interaction.options.getChannel("channel");
  const now = (deps.clock ?? Date.now)();
  const startAt = startSeconds * 1000;

  ctx.step("validate");
  if (!name) {
    await replyOrEdit(interaction, { content: "The scrim needs a name." });
    return;
  }
  if (startAt <= now) {
    await replyOrEdit(interaction, {
      content: `That start time (${discordTimestamp(startAt)}) is in the past.`,
    });
    return;
  }

  await ensureDeferred(interaction);
  ctx.step("begin_session");
  const session = await deps.controller.beginSession({
    name,
    description,
    startAt,
    voiceChannelId: channel?.id,
  });

  logger.info(
    { evt: "scrim_cmd_create", traceId: ctx.traceId, sessionId: session.sessionId, name: redact(name) },
    "Scrim created via command"
  );

  ctx.step("reply");
  const link = `https://discord.com/channels/${interaction.guildId}/${deps.settings.signupChannelId}/${session.signupMessageId}`;
  await replyOrEdit(interaction, {
    content: `Scheduled **${name}** for ${discordTimestamp(startAt)} (${discordTimestamp(startAt, "R")}).\nSignup post: ${link}`,
  });
}

export async function handleEnd(ctx: CommandContext, interaction: GuildInteraction, deps: ScrimCommandDeps): Promise<void> {
  await ensureDeferred(interaction);
  ctx.step("end_session");
  const report = await deps.controller.endSession();
  await replyOrEdit(interaction, { content: `Scrim ended. ${summarizeTeardown(report)}` });
}

export async function handleCancel(
  ctx: CommandContext,
  interaction: GuildInteraction,
  deps: ScrimCommandDeps
): Promise<void> {
  await ensureDeferred(interaction);
  ctx.step("cancel_session");
  const report = await deps.controller.cancelSession();
  await replyOrEdit(interaction, { content: `Scrim cancelled. ${summarizeTeardown(report)}` });
}

export async function handleUpdate(
  ctx: CommandContext,
  interaction: GuildInteraction,
  deps: ScrimCommandDeps
): Promise<void> {
  const session = requireLiveSession(deps);
  await ensureDeferred(interaction);

  ctx.step("attendance_update");
  const channel = await fetchTextChannel(interaction.guild, deps.settings.signupChannelId);
  const report = await runAttendanceUpdate(channel, session, deps);

  const lines = [
    summarizeSync("Registered", report.registration),
    summarizeSync("Active", report.voice.active),
    summarizeSync("Spectator", report.voice.spectator),
    `**Attendance:** ${report.attendance.creditedAttended.length} credited as present, ${report.attendance.creditedRegistered.length} newly credited as registered`,
  ];
  if (!report.registration.complete) {
    lines.push("⚠️ Some signup posts couldn't be read; removals were skipped this time.");
  }
  await replyOrEdit(interaction, { content: lines.join("\n") });
}

export async function handleSync(ctx: CommandContext, interaction: GuildInteraction, deps: ScrimCommandDeps): Promise<void> {
  await ensureDeferred(interaction);
  ctx.step("reconcile_registration");
  const channel = await fetchTextChannel(interaction.guild, deps.settings.signupChannelId);
  const report = await reconcileRegistration(
    channel,
    deps.sessions.trackedMessageIds(),
    deps.settings.registeredRoleId,
    { sessions: deps.sessions, markerEmoji: deps.settings.markerEmoji }
  );

  const lines = [summarizeSync("Registered", report)];
  if (report.droppedMessageIds.length > 0) {
    lines.push(`Untracked ${report.droppedMessageIds.length} deleted signup post(s).`);
  }
  if (!report.complete) {
    lines.push("⚠️ Some signup posts couldn't be read; removals were skipped this time.");
  }
  await replyOrEdit(interaction, { content: lines.join("\n") });
}

export async function handleStatus(
  ctx: CommandContext,
  interaction: GuildInteraction,
  deps: ScrimCommandDeps
): Promise<void> {
  ctx.step("render");
  const session = deps.controller.getSession();
  const embed = new EmbedBuilder().setTitle("Scrim status").setColor(session ? 0x3ba55d : 0x99aab5);

  if (session) {
    embed.addFields(
      { name: "Name", value: session.name, inline: true },
      { name: "Status", value: session.status, inline: true },
      { name: "Start", value: discordTimestamp(session.scheduledStartAt), inline: true },
      { name: "Event ID", value: session.sessionId, inline: true }
    );
  } else {
    embed.setDescription("No scrim is being tracked.");
  }

  embed.addFields({
    name: "Tracked signup posts",
    value: String(deps.sessions.trackedMessageIds().length),
    inline: true,
  });

  const loops = getSchedulerHealth();
  if (loops.length > 0) {
    embed.addFields({
      name: "Loops",
      value: loops
        .map(
          (h) =>
            `\`${h.name}\`: ${h.totalRuns} runs, ${h.consecutiveFailures} failing` +
            (h.lastSuccessAt ? `, last ok ${discordTimestamp(h.lastSuccessAt, "R")}` : "")
        )
        .join("\n"),
    });
  }

  await replyOrEdit(interaction, { embeds: [embed] });
}
