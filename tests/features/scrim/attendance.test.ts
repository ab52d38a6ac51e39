/**
 * Scrimkeeper — tests/features/scrim/attendance.test.ts
 * WHAT: Tests for the /scrim update pass (registration + voice + attendance credit).
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { openDatabase, closeDatabase, type Db } from "../../../src/db/db.js";
import { DocumentStore } from "../../../src/store/documentStore.js";
import { ScrimSessionStore } from "../../../src/store/scrimSessionStore.js";
import { AttendanceStore } from "../../../src/store/attendanceStore.js";
import { runAttendanceUpdate, type AttendanceUpdateDeps } from "../../../src/features/scrim/attendance.js";
import {
  ACTIVE_ROLE_ID,
  createScrimGuild,
  createTestSettings,
  MEETING_CHANNEL_ID,
  OTHER_VOICE_CHANNEL_ID,
  REGISTERED_ROLE_ID,
  SPECTATOR_ROLE_ID,
  type ScrimGuildHarness,
} from "../../utils/discordMocks.js";

const A = "200000000000000001"; // signed up, spectating
const B = "200000000000000002"; // signed up, not in voice
const C = "200000000000000003"; // in voice, never signed up
const POST = "300000000000000001";
const SESSION = { sessionId: "event-1", signupMessageId: POST };

describe("runAttendanceUpdate", () => {
  let db: Db;
  let h: ScrimGuildHarness;
  let deps: AttendanceUpdateDeps;

  beforeEach(() => {
    db = openDatabase(":memory:");
    const docs = new DocumentStore(db);
    deps = {
      settings: createTestSettings(),
      sessions: new ScrimSessionStore(docs),
      attendance: new AttendanceStore(docs),
    };
    h = createScrimGuild();
    h.addMember(A);
    h.addMember(B);
    h.addMember(C);
    h.addMessage(h.signupChannel, POST, [A, B]);
    deps.sessions.track("event-1", POST);
    h.setVoice(A, MEETING_CHANNEL_ID);
    h.setVoice(C, OTHER_VOICE_CHANNEL_ID);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  it("syncs all three roles and credits registered members who are in voice", async () => {
    const report = await runAttendanceUpdate(h.signupTextChannel, SESSION, deps);

    expect(h.holders(REGISTERED_ROLE_ID)).toEqual([A, B]);
    expect(h.holders(SPECTATOR_ROLE_ID)).toEqual([A]);
    expect(h.holders(ACTIVE_ROLE_ID)).toEqual([C]);
    expect(report.attendance).toEqual({
      sessionId: "event-1",
      registered: [A, B],
      present: [A, C],
      creditedRegistered: [A, B],
      creditedAttended: [A],
    });
    expect(deps.attendance.getRecord(C)).toEqual({ registeredCount: 0, attendedCount: 0 });
  });

  it("credits nobody twice in the same session", async () => {
    await runAttendanceUpdate(h.signupTextChannel, SESSION, deps);
    h.setVoice(B, OTHER_VOICE_CHANNEL_ID);

    const second = await runAttendanceUpdate(h.signupTextChannel, SESSION, deps);

    expect(second.attendance.creditedRegistered).toEqual([]);
    expect(second.attendance.creditedAttended).toEqual([B]);
    expect(deps.attendance.getRecord(A)).toMatchObject({ registeredCount: 1, attendedCount: 1 });
    expect(deps.attendance.getRecord(B)).toMatchObject({ registeredCount: 1, attendedCount: 1 });
  });

  it("counts a resurrected scrim as the same session", async () => {
    await runAttendanceUpdate(h.signupTextChannel, SESSION, deps);
    deps.sessions.rekey("event-1", "event-2");

    const second = await runAttendanceUpdate(h.signupTextChannel, { sessionId: "event-2", signupMessageId: POST }, deps);

    expect(second.attendance.sessionId).toBe("event-2");
    expect(second.attendance.creditedRegistered).toEqual([]);
    expect(second.attendance.creditedAttended).toEqual([]);
    expect(deps.attendance.getRecord(A)).toMatchObject({ registeredCount: 1, attendedCount: 1 });
  });
});
