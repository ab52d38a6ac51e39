/**
 * Scrimkeeper — src/commands/scrim/tally.ts
 * WHAT: /scrim win and /scrim leaderboard
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, type ChatInputCommandInteraction } from "discord.js";
import { replyOrEdit, type CommandContext } from "../../lib/cmdWrap.js";
import { MAX_WINNERS } from "./data.js";
import type { ScrimCommandDeps } from "./shared.js";

type GuildInteraction = ChatInputCommandInteraction<"cached">;

const MEDALS = ["🥇", "🥈", "🥉"];

export async function handleWin(ctx: CommandContext, interaction: GuildInteraction, deps: ScrimCommandDeps): Promise<void> {
  const winners: string[] = [];
  for (let i = 1; i <= MAX_WINNERS; i++) {
    const user = interaction.options.getUser(`player${i}`);
    if (user && !user.bot) winners.push(user.id);
  }

  if (winners.length === 0) {
    await replyOrEdit(interaction, { content: "No (non-bot) players given." });
    return;
  }

  ctx.step("record_win");
  const totals = deps.wins.recordWin(winners);
  const lines = Object.entries(totals).map(([userId, wins]) => `<@${userId}>: ${wins} win${wins === 1 ? "" : "s"}`);

  await replyOrEdit(
    interaction,
    { content: `🏆 Win recorded!\n${lines.join("\n")}`, allowedMentions: { parse: [] } },
    false
  );
}

export async function handleLeaderboard(
  ctx: CommandContext,
  interaction: GuildInteraction,
  deps: ScrimCommandDeps
): Promise<void> {
  const limit = interaction.options.getInteger("limit") ?? 10;

  ctx.step("render");
  const entries = deps.wins.leaderboard(limit);
  const attendance = deps.attendance.getAll();

  const embed = new EmbedBuilder().setTitle("Scrim leaderboard").setColor(0xf1c40f);
  if (entries.length === 0) {
    embed.setDescription("No wins recorded yet.");
  } else {
    embed.setDescription(
      entries
        .map((entry, i) => {
          const rank = MEDALS[i] ?? `**${i + 1}.**`;
          const record = attendance[entry.userId];
          const attended = record ? ` · attended ${record.attendedCount}/${record.registeredCount}` : "";
          return `${rank} <@${entry.userId}>: ${entry.wins} win${entry.wins === 1 ? "" : "s"}${attended}`;
        })
        .join("\n")
    );
  }

  await replyOrEdit(interaction, { embeds: [embed] }, false);
}
