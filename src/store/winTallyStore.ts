/**
 * Scrimkeeper — src/store/winTallyStore.ts
 * WHAT: Per-member scrim win counts.
 * WHY: /scrim win and /scrim leaderboard. Flat map, no history.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import type { DocumentStore } from "./documentStore.js";

export const WIN_TALLY_KEY = "win_tally";

const winTallySchema = z.record(z.string(), z.number().int().nonnegative());

export type WinTally = Record<string, number>;

export interface LeaderboardEntry {
  userId: string;
  wins: number;
}

export class WinTallyStore {
  constructor(private readonly docs: DocumentStore) {}

  getAll(): WinTally {
    return this.docs.read(WIN_TALLY_KEY, winTallySchema) ?? {};
  }

  /**
   * +1 for each listed member (duplicates collapse). Returns the new totals.
   */
  recordWin(userIds: Iterable<string>): WinTally {
    const unique = [...new Set(userIds)];
    const updated = this.docs.update<WinTally>(WIN_TALLY_KEY, winTallySchema, () => ({}), (tally) => {
      const next: WinTally = { ...tally };
      for (const userId of unique) {
        next[userId] = (next[userId] ?? 0) + 1;
      }
      return next;
    });

    const totals: WinTally = {};
    for (const userId of unique) {
      totals[userId] = updated[userId] ?? 0;
    }
    return totals;
  }

  /**
   * Highest first; ties broken by user ID so output is stable between calls.
   */
  leaderboard(limit = 10): LeaderboardEntry[] {
    return Object.entries(this.getAll())
      .map(([userId, wins]) => ({ userId, wins }))
      .sort((a, b) => b.wins - a.wins || a.userId.localeCompare(b.userId))
      .slice(0, limit);
  }
}
