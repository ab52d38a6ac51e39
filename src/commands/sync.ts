/**
 * Scrimkeeper — src/commands/sync.ts
 * WHAT: Guild-scoped slash command sync on startup.
 * WHY: Guild commands update instantly; a bulk PUT also removes stale ones.
 * DOCS:
 *  - Bulk overwrite (guild): https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-guild-application-commands
 *  - REST client: https://discord.js.org/#/docs/rest/main/class/REST
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST, Routes } from "discord.js";
import { logger } from "../lib/logger.js";
import { data as scrimCommand } from "./scrim/data.js";

export function getAllSlashCommands() {
  return [scrimCommand.toJSON()];
}

/**
 * Never throws: a failed sync leaves the previous command set in place.
 */
export async function syncCommandsToGuild(token: string, clientId: string, guildId: string): Promise<boolean> {
  try {
    const body = getAllSlashCommands();
    const rest = new REST({ version: "10" }).setToken(token);
    await rest.put(Routes.applicationGuildCommands(clientId, guildId), { body });
    logger.info({ evt: "cmd_sync_ok", guildId, count: body.length }, "Synced slash commands");
    return true;
  } catch (err) {
    logger.warn({ evt: "cmd_sync_failed", guildId, err }, "Failed to sync slash commands");
    return false;
  }
}
