/**
 * Scrimkeeper — src/commands/scrim/data.ts
 * WHAT: SlashCommandBuilder for /scrim and its subcommands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { ChannelType, SlashCommandBuilder } from "discord.js";

export const MAX_WINNERS = 5;

export const data = new SlashCommandBuilder()
  .setName("scrim")
  .setDescription("Scrim session management")
  .addSubcommand((sub) =>
    sub
      .setName("create")
      .setDescription("Schedule a scrim and post the signup message")
      .addStringOption((opt) =>
        opt.setName("name").setDescription("Scrim title").setMaxLength(100).setRequired(true)
      )
      .addIntegerOption((opt) =>
        opt
          .setName("start")
          .setDescription("Start time as a Unix timestamp (seconds)")
          .setMinValue(0)
          .setRequired(true)
      )
      .addStringOption((opt) =>
        opt.setName("description").setDescription("Details shown on the signup post").setMaxLength(1000).setRequired(true)
      )
      .addChannelOption((opt) =>
        opt
          .setName("channel")
          .setDescription("Voice channel for the event (defaults to the meeting channel)")
          .addChannelTypes(ChannelType.GuildVoice, ChannelType.GuildStageVoice)
          .setRequired(false)
      )
  )
  .addSubcommand((sub) => sub.setName("end").setDescription("End the running scrim"))
  .addSubcommand((sub) => sub.setName("cancel").setDescription("Cancel the scrim and delete its signup post"))
  .addSubcommand((sub) =>
    sub.setName("update").setDescription("Sync signup and voice roles, then credit attendance")
  )
  .addSubcommand((sub) => sub.setName("sync").setDescription("Re-sync the registered role from signup reactions"))
  .addSubcommand((sub) => sub.setName("status").setDescription("Show the current scrim and loop health"))
  .addSubcommand((sub) => {
    sub.setName("win").setDescription("Record a win for up to five players");
    for (let i = 1; i <= MAX_WINNERS; i++) {
      sub.addUserOption((opt) =>
        opt.setName(`player${i}`).setDescription(`Winning player ${i}`).setRequired(i === 1)
      );
    }
    return sub;
  })
  .addSubcommand((sub) =>
    sub
      .setName("leaderboard")
      .setDescription("Top players by wins")
      .addIntegerOption((opt) =>
        opt.setName("limit").setDescription("How many players to show (default 10)").setMinValue(1).setMaxValue(25)
      )
  );
