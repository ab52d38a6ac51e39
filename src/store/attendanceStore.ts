/**
 * Scrimkeeper — src/store/attendanceStore.ts
 * WHAT: Per-member scrim attendance counters (registered / attended).
 * WHY: Feeds /scrim status and the leaderboard; counters only ever go up.
 * FLOWS:
 *  - /scrim update → creditSession(scrimKey, registered, present)
 *  - getRecord(userId) / getAll() for display
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import type { DocumentStore } from "./documentStore.js";

export const ATTENDANCE_KEY = "attendance";

const attendanceRecordSchema = z.object({
  registeredCount: z.number().int().nonnegative(),
  attendedCount: z.number().int().nonnegative(),
  // Last scrim credited, keyed by its signup message, so a second /scrim update
  // in the same scrim credits nobody twice
  lastRegisteredSessionId: z.string().optional(),
  lastAttendedSessionId: z.string().optional(),
});

const attendanceMapSchema = z.record(z.string(), attendanceRecordSchema);

export type AttendanceRecord = z.infer<typeof attendanceRecordSchema>;
export type AttendanceMap = Record<string, AttendanceRecord>;

export interface CreditResult {
  creditedRegistered: string[];
  creditedAttended: string[];
}

const EMPTY_RECORD: AttendanceRecord = { registeredCount: 0, attendedCount: 0 };

export class AttendanceStore {
  constructor(private readonly docs: DocumentStore) {}

  getAll(): AttendanceMap {
    return this.docs.read(ATTENDANCE_KEY, attendanceMapSchema) ?? {};
  }

  getRecord(userId: string): AttendanceRecord {
    return this.getAll()[userId] ?? { ...EMPTY_RECORD };
  }

  /**
   * Credit one point-sample for a session. Every registered member gets
   * registeredCount+1; registered members who are also present get
   * attendedCount+1. Present-but-unregistered members get nothing.
   * Each counter moves at most once per member per session.
   */
  creditSession(scrimKey: string, registered: Iterable<string>, present: ReadonlySet<string>): CreditResult {
    const result: CreditResult = { creditedRegistered: [], creditedAttended: [] };
    const registeredIds = [...new Set(registered)];

    this.docs.update(ATTENDANCE_KEY, attendanceMapSchema, () => ({}), (map) => {
      const next: AttendanceMap = { ...map };
      for (const userId of registeredIds) {
        const record: AttendanceRecord = { ...(next[userId] ?? EMPTY_RECORD) };

        if (record.lastRegisteredSessionId !== scrimKey) {
          record.registeredCount += 1;
          record.lastRegisteredSessionId = scrimKey;
          result.creditedRegistered.push(userId);
        }
        if (present.has(userId) && record.lastAttendedSessionId !== scrimKey) {
          record.attendedCount += 1;
          record.lastAttendedSessionId = scrimKey;
          result.creditedAttended.push(userId);
        }

        next[userId] = record;
      }
      return next;
    });

    return result;
  }
}
