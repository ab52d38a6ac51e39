/**
 * Scrimkeeper — src/features/scrim/messages.ts
 * WHAT: Signup embed and announcement payloads for the scrim lifecycle.
 * WHY: Keeps copy out of the controller so the state machine reads as a state machine.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { EmbedBuilder, type MessageCreateOptions } from "discord.js";

const SIGNUP_COLOR = 0x3ba55d;

/** Discord timestamp markdown; `ms` is epoch milliseconds */
export function discordTimestamp(ms: number, style: "F" | "R" | "t" = "F"): string {
  return `<t:${Math.floor(ms / 1000)}:${style}>`;
}

function mentionLine(roleIds: readonly string[]): string | undefined {
  if (roleIds.length === 0) return undefined;
  return roleIds.map((id) => `<@&${id}>`).join(" ");
}

/**
 * Announcements only ever ping the configured mention roles, whatever the
 * scrim name or description contains.
 */
function withMentions(roleIds: readonly string[], text: string): MessageCreateOptions {
  const mentions = mentionLine(roleIds);
  return {
    content: mentions ? `${mentions}\n${text}` : text,
    allowedMentions: { parse: [], roles: [...roleIds] },
  };
}

export interface SignupPostInput {
  name: string;
  description: string;
  startAt: number;
  voiceChannelId: string;
  markerEmoji: string;
  mentionRoleIds: readonly string[];
}

export function buildSignupPost(input: SignupPostInput): MessageCreateOptions {
  // A custom emoji is configured by ID; show it as <:_:id>
  const marker = /^\d+$/.test(input.markerEmoji) ? `<:_:${input.markerEmoji}>` : input.markerEmoji;

  const embed = new EmbedBuilder()
    .setColor(SIGNUP_COLOR)
    .setTitle(input.name)
    .setDescription(input.description || null)
    .addFields(
      { name: "Date", value: discordTimestamp(input.startAt, "F"), inline: false },
      { name: "Voice", value: `<#${input.voiceChannelId}>`, inline: true },
      { name: "Sign up", value: `React with ${marker}`, inline: true }
    );

  const mentions = mentionLine(input.mentionRoleIds);
  return {
    content: mentions,
    embeds: [embed],
    allowedMentions: { parse: [], roles: [...input.mentionRoleIds] },
  };
}

export function warningNotice(name: string, startAt: number, roleIds: readonly string[]): MessageCreateOptions {
  return withMentions(roleIds, `⏰ **${name}** starts ${discordTimestamp(startAt, "R")}. Get ready!`);
}

export function startedNotice(name: string, voiceChannelId: string, roleIds: readonly string[]): MessageCreateOptions {
  return withMentions(roleIds, `▶️ **${name}** has started. Join <#${voiceChannelId}>!`);
}

export function resurrectedNotice(name: string): MessageCreateOptions {
  return withMentions([], `🔁 Discord closed the event for **${name}** early; it has been reopened.`);
}

export function endedNotice(name: string): MessageCreateOptions {
  return withMentions([], `🏁 **${name}** is over. Thanks for playing!`);
}

export function cancelledNotice(name: string): MessageCreateOptions {
  return withMentions([], `❌ **${name}** has been cancelled.`);
}
