/**
 * Scrimkeeper — src/commands/scrim/index.ts
 * WHAT: /scrim command: access check and subcommand routing
 * FLOWS:
 *  - /scrim create|end|cancel|update|sync|status → session.ts
 *  - /scrim win|leaderboard → tally.ts
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { CommandContext } from "../../lib/cmdWrap.js";
import { replyOrEdit, wrapCommand } from "../../lib/cmdWrap.js";
import { data } from "./data.js";
import {
  handleCancel,
  handleCreate,
  handleEnd,
  handleStatus,
  handleSync,
  handleUpdate,
} from "./session.js";
import { canRunScrimCommands, type ScrimCommandDeps } from "./shared.js";
import { handleLeaderboard, handleWin } from "./tally.js";

export { data };
export type { ScrimCommandDeps } from "./shared.js";

// Anyone may look at the leaderboard
const PUBLIC_SUBCOMMANDS = new Set(["leaderboard"]);

export async function execute(ctx: CommandContext, deps: ScrimCommandDeps): Promise<void> {
  const interaction = ctx.interaction;

  if (!interaction.inCachedGuild()) {
    await replyOrEdit(interaction, { content: "This command can only be used in a server." });
    return;
  }

  const subcommand = interaction.options.getSubcommand(true);
  if (!PUBLIC_SUBCOMMANDS.has(subcommand) && !canRunScrimCommands(interaction.member, deps.settings.adminRoleIds)) {
    await replyOrEdit(interaction, { content: "You need Manage Server or a scrim admin role to do that." });
    return;
  }

  switch (subcommand) {
    case "create":
      await handleCreate(ctx, interaction, deps);
      break;
    case "end":
      await handleEnd(ctx, interaction, deps);
      break;
    case "cancel":
      await handleCancel(ctx, interaction, deps);
      break;
    case "update":
      await handleUpdate(ctx, interaction, deps);
      break;
    case "sync":
      await handleSync(ctx, interaction, deps);
      break;
    case "status":
      await handleStatus(ctx, interaction, deps);
      break;
    case "win":
      await handleWin(ctx, interaction, deps);
      break;
    case "leaderboard":
      await handleLeaderboard(ctx, interaction, deps);
      break;
    default:
      await replyOrEdit(interaction, { content: "Unknown scrim subcommand." });
  }
}

/**
 * Bind deps and wrap for the interaction router.
 */
export function createScrimCommandHandler(deps: ScrimCommandDeps) {
  return wrapCommand("scrim", (ctx) => execute(ctx, deps));
}
