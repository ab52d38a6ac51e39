/**
 * Scrimkeeper — src/features/scrim/channels.ts
 * WHAT: Resolve a configured channel ID to a guild text channel.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Guild, GuildTextBasedChannel } from "discord.js";

/**
 * Throws when the channel is missing or can't hold messages. That's a config
 * problem, so callers let it surface as a pass-level failure.
 */
export async function fetchTextChannel(guild: Guild, channelId: string): Promise<GuildTextBasedChannel> {
  const channel = guild.channels.cache.get(channelId) ?? (await guild.channels.fetch(channelId));
  if (!channel || !channel.isTextBased()) {
    throw new Error(`Channel ${channelId} is not a text channel in guild ${guild.id}`);
  }
  return channel;
}
