/**
 * Scrimkeeper — tests/features/scrim/lifecycle.test.ts
 * WHAT: Tests for the scrim session state machine.
 * WHY: Warnings and starts must fire once, a deliberate teardown must never
 *      be undone, and a session Discord closes early must come back exactly once.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { GuildScheduledEventStatus, type Guild } from "discord.js";

vi.mock("../../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  redact: (value: string) => value,
}));

import { openDatabase, closeDatabase, type Db } from "../../../src/db/db.js";
import { DocumentStore } from "../../../src/store/documentStore.js";
import { ScrimSessionStore } from "../../../src/store/scrimSessionStore.js";
import { ScrimConflictError } from "../../../src/lib/errors.js";
import { classifyRemaining, ScrimLifecycleController } from "../../../src/features/scrim/lifecycle.js";
import {
  ACTIVE_ROLE_ID,
  createScrimGuild,
  createTestSettings,
  MEETING_CHANNEL_ID,
  REGISTERED_ROLE_ID,
  type ScrimGuildHarness,
} from "../../utils/discordMocks.js";

const MINUTE = 60_000;
const T0 = Date.UTC(2030, 0, 4, 18, 0, 0);
const settings = createTestSettings();

type CreatedEvent = Awaited<ReturnType<Guild["scheduledEvents"]["create"]>>;

describe("classifyRemaining", () => {
  it.each([
    [31 * MINUTE, "before_warning"],
    [30 * MINUTE + 1, "before_warning"],
    [30 * MINUTE, "warning"],
    [28 * MINUTE + 1, "warning"],
    [28 * MINUTE, "between"],
    [1, "between"],
    [0, "start"],
    [-5 * MINUTE + 1, "start"],
    [-5 * MINUTE, "missed"],
  ] as const)("%i ms remaining → %s", (remaining, expected) => {
    expect(classifyRemaining(remaining, settings)).toBe(expected);
  });
});

describe("ScrimLifecycleController", () => {
  let db: Db;
  let sessions: ScrimSessionStore;
  let h: ScrimGuildHarness;
  let now: number;
  let controller: ScrimLifecycleController;

  const announcements = () =>
    h.signupChannel.sent.filter(
      (p): p is { content: string } => typeof p === "object" && p !== null && "content" in p && typeof p.content === "string"
    );

  beforeEach(async () => {
    db = openDatabase(":memory:");
    sessions = new ScrimSessionStore(new DocumentStore(db));
    h = createScrimGuild();
    now = T0;
    controller = new ScrimLifecycleController({ settings, sessions, clock: () => now });
    await controller.restore(h.guild);
  });

  afterEach(() => {
    closeDatabase(db);
  });

  const begin = (startAt: number) =>
    controller.beginSession({ name: "Friday scrim", description: "Bring snacks", startAt });

  describe("beginSession", () => {
    it("creates the event, posts the signup and tracks both", async () => {
      const session = await begin(T0 + 60 * MINUTE);

      expect(h.events.get(session.sessionId)).toMatchObject({
        name: "Friday scrim",
        channelId: MEETING_CHANNEL_ID,
        scheduledStartTimestamp: T0 + 60 * MINUTE,
      });
      expect(h.signupChannel.store.has(session.signupMessageId)).toBe(true);
      expect(h.signupChannel.store.get(session.signupMessageId)?.react).toHaveBeenCalledWith("✅");
      expect(sessions.getAll()).toEqual({ [session.sessionId]: session.signupMessageId });
      expect(session.status).toBe("scheduled");
      expect(controller.isScrimActive()).toBe(true);
    });

    it("refuses a second live session", async () => {
      await begin(T0 + 60 * MINUTE);
      await expect(begin(T0 + 120 * MINUTE)).rejects.toBeInstanceOf(ScrimConflictError);
      expect(h.guild.scheduledEvents.create).toHaveBeenCalledTimes(1);
    });

    it("deletes the event again when the signup post can't be sent", async () => {
      h.signupChannel.send.mockRejectedValueOnce(new Error("Missing Access"));

      await expect(begin(T0 + 60 * MINUTE)).rejects.toThrow("Missing Access");

      expect(h.events.size).toBe(0);
      expect(sessions.getAll()).toEqual({});
      expect(controller.isScrimActive()).toBe(false);
    });
  });

  describe("tick", () => {
    it("warns exactly once for a start just inside the warning lead", async () => {
      await begin(T0 + 29 * MINUTE + 50_000);

      const outcomes: string[] = [];
      for (let i = 0; i < 10; i++) {
        outcomes.push(await controller.tick(T0 + i * MINUTE));
      }

      expect(outcomes.filter((o) => o === "warned")).toHaveLength(1);
      expect(outcomes[0]).toBe("warned");
      expect(announcements().filter((a) => a.content.includes("⏰"))).toHaveLength(1);
      expect(controller.getSession()?.status).toBe("warned");
    });

    it("starts the event once when the start time arrives", async () => {
      const session = await begin(T0 + 10 * MINUTE);

      expect(await controller.tick(T0 + 10 * MINUTE)).toBe("started");
      expect(await controller.tick(T0 + 11 * MINUTE)).toBe("waiting");

      const event = h.events.get(session.sessionId);
      expect(event?.status).toBe(GuildScheduledEventStatus.Active);
      expect(event?.setStatus).toHaveBeenCalledTimes(1);
      expect(controller.getSession()?.status).toBe("active");
      expect(announcements().filter((a) => a.content.includes("▶️"))).toHaveLength(1);
    });

    it("lets only one of two overlapping ticks start the session", async () => {
      const session = await begin(T0 + 10 * MINUTE);

      const [first, second] = await Promise.all([
        controller.tick(T0 + 10 * MINUTE),
        controller.tick(T0 + 10 * MINUTE),
      ]);

      expect([first, second]).toEqual(["started", "waiting"]);
      expect(h.events.get(session.sessionId)?.setStatus).toHaveBeenCalledTimes(1);
    });

    it("retries the start on the next tick if setting the status failed", async () => {
      const session = await begin(T0 + 10 * MINUTE);
      h.events.get(session.sessionId)?.setStatus.mockRejectedValueOnce(new Error("Discord 502"));

      await expect(controller.tick(T0 + 10 * MINUTE)).rejects.toThrow("Discord 502");
      expect(await controller.tick(T0 + 11 * MINUTE)).toBe("started");
    });

    it("is idle with no session", async () => {
      expect(await controller.tick(T0)).toBe("idle");
    });
  });

  describe("external end", () => {
    it("resurrects a running session exactly once and keeps its signup post", async () => {
      const original = await begin(T0 + 10 * MINUTE);
      now = T0 + 10 * MINUTE;
      await controller.tick(now);
      const oldEvent = h.events.get(original.sessionId);
      if (oldEvent) oldEvent.status = GuildScheduledEventStatus.Completed;

      now = T0 + 40 * MINUTE;
      expect(await controller.onExternalSessionEnded(original.sessionId)).toBe("resurrected");
      // Discord's delete notification for the same old event
      expect(await controller.onExternalSessionEnded(original.sessionId)).toBe("ignored_untracked");

      expect(h.guild.scheduledEvents.create).toHaveBeenCalledTimes(2);
      const current = controller.getSession();
      expect(current?.sessionId).not.toBe(original.sessionId);
      expect(current?.status).toBe("active");
      expect(current?.signupMessageId).toBe(original.signupMessageId);
      expect(sessions.getAll()).toEqual({ [current?.sessionId ?? ""]: original.signupMessageId });

      const replacement = h.events.get(current?.sessionId ?? "");
      expect(replacement?.status).toBe(GuildScheduledEventStatus.Active);
      expect(replacement?.scheduledStartTimestamp).toBe(T0 + 41 * MINUTE);
      expect(announcements().filter((a) => a.content.includes("🔁"))).toHaveLength(1);
    });

    it("retries a failed resurrection on the next tick", async () => {
      const original = await begin(T0 + 10 * MINUTE);
      await controller.tick(T0 + 10 * MINUTE);
      vi.mocked(h.guild.scheduledEvents.create).mockRejectedValueOnce(new Error("Discord 503"));

      await expect(controller.onExternalSessionEnded(original.sessionId)).rejects.toThrow("Discord 503");
      expect(await controller.tick(T0 + 11 * MINUTE)).toBe("resurrected");
      expect(await controller.tick(T0 + 12 * MINUTE)).toBe("waiting");
      expect(h.guild.scheduledEvents.create).toHaveBeenCalledTimes(3);
    });

    it("deletes the replacement event when starting it fails", async () => {
      const original = await begin(T0 + 10 * MINUTE);
      await controller.tick(T0 + 10 * MINUTE);
      const oldEvent = h.events.get(original.sessionId);
      if (oldEvent) oldEvent.status = GuildScheduledEventStatus.Completed;
      vi.mocked(h.guild.scheduledEvents.create).mockImplementationOnce(async () => {
        const event = h.addEvent({ id: "900000000000000099" });
        event.setStatus.mockRejectedValueOnce(new Error("Discord 503"));
        return event as unknown as CreatedEvent;
      });

      await expect(controller.onExternalSessionEnded(original.sessionId)).rejects.toThrow("Discord 503");
      expect(h.events.has("900000000000000099")).toBe(false);
      expect(sessions.getAll()).toEqual({ [original.sessionId]: original.signupMessageId });

      expect(await controller.tick(T0 + 11 * MINUTE)).toBe("resurrected");
      const live = [...h.events.values()].filter((e) => e.status !== GuildScheduledEventStatus.Completed);
      expect(live.map((e) => e.id)).toEqual([controller.getSession()?.sessionId]);
      expect(live[0]?.status).toBe(GuildScheduledEventStatus.Active);
    });

    it("drops a session Discord ends before it starts", async () => {
      const session = await begin(T0 + 60 * MINUTE);

      expect(await controller.onExternalSessionEnded(session.sessionId)).toBe("cancelled_before_start");

      expect(sessions.getAll()).toEqual({});
      expect(controller.isScrimActive()).toBe(false);
      expect(h.guild.scheduledEvents.create).toHaveBeenCalledTimes(1);
      expect(await controller.onExternalSessionEnded(session.sessionId)).toBe("ignored_finished");
    });
  });

  describe("teardown", () => {
    it("ignores Discord's end notification while ending on purpose", async () => {
      const session = await begin(T0 + 10 * MINUTE);
      await controller.tick(T0 + 10 * MINUTE);

      const ending = controller.endSession();
      expect(controller.isTearingDown()).toBe(true);
      expect(await controller.onExternalSessionEnded(session.sessionId)).toBe("ignored_teardown");
      const report = await ending;

      expect(report.status).toBe("ended");
      expect(report.steps.map((s) => s.step)).toEqual([
        "finish_event",
        "untrack",
        "clear_voice_roles",
        "reconcile_registration",
      ]);
      expect(report.steps.every((s) => s.ok)).toBe(true);
      expect(h.guild.scheduledEvents.create).toHaveBeenCalledTimes(1);
      expect(h.events.get(session.sessionId)?.status).toBe(GuildScheduledEventStatus.Completed);
      expect(sessions.getAll()).toEqual({});
      expect(controller.isTearingDown()).toBe(false);
      expect(controller.isScrimActive()).toBe(false);

      // The Completed update arrives after the guard is released
      expect(await controller.onExternalSessionEnded(session.sessionId)).toBe("ignored_finished");
      expect(h.guild.scheduledEvents.create).toHaveBeenCalledTimes(1);
    });

    it("ending clears voice roles and re-derives registration", async () => {
      h.addMember("200000000000000001", { roles: [ACTIVE_ROLE_ID, REGISTERED_ROLE_ID] });
      await begin(T0 + 10 * MINUTE);
      await controller.tick(T0 + 10 * MINUTE);

      await controller.endSession();

      // No signup posts remain tracked, so nobody stays registered
      expect(h.holders(ACTIVE_ROLE_ID)).toEqual([]);
      expect(h.holders(REGISTERED_ROLE_ID)).toEqual([]);
    });

    it("cancel deletes the event and the signup post", async () => {
      const session = await begin(T0 + 60 * MINUTE);

      const report = await controller.cancelSession();

      expect(report.status).toBe("cancelled");
      expect(report.steps.every((s) => s.ok)).toBe(true);
      expect(h.events.has(session.sessionId)).toBe(false);
      expect(h.signupChannel.store.has(session.signupMessageId)).toBe(false);
      expect(sessions.getAll()).toEqual({});
      expect(announcements().filter((a) => a.content.includes("❌"))).toHaveLength(1);
    });

    it("keeps going when one cleanup step fails", async () => {
      const session = await begin(T0 + 60 * MINUTE);
      h.signupChannel.messages.delete.mockRejectedValueOnce(new Error("Missing Permissions"));

      const report = await controller.cancelSession();

      expect(report.steps.find((s) => s.step === "delete_signup")).toEqual({
        step: "delete_signup",
        ok: false,
        error: "Missing Permissions",
      });
      expect(report.steps.find((s) => s.step === "untrack")?.ok).toBe(true);
      expect(sessions.getAll()).toEqual({});
      expect(h.events.has(session.sessionId)).toBe(false);
    });

    it("refuses to end when nothing is live", async () => {
      await expect(controller.endSession()).rejects.toThrow("There is no scrim to end");
    });

    it("allows a new session once the previous one is cancelled", async () => {
      await begin(T0 + 60 * MINUTE);
      await controller.cancelSession();
      await expect(begin(T0 + 120 * MINUTE)).resolves.toMatchObject({ status: "scheduled" });
    });
  });

  describe("restore", () => {
    it("rebuilds from the stored map and the guild's events", async () => {
      h.addEvent({ id: "700000000000000001", status: GuildScheduledEventStatus.Scheduled, scheduledStartTimestamp: T0 });
      h.addEvent({
        id: "700000000000000002",
        status: GuildScheduledEventStatus.Active,
        scheduledStartTimestamp: T0 + MINUTE,
        name: "Running",
      });
      h.addEvent({ id: "700000000000000003", status: GuildScheduledEventStatus.Completed });
      sessions.putAll({
        "700000000000000001": "300000000000000001",
        "700000000000000002": "300000000000000002",
        "700000000000000003": "300000000000000003",
        "700000000000000004": "300000000000000004",
      });

      const fresh = new ScrimLifecycleController({ settings, sessions, clock: () => now });
      const restored = await fresh.restore(h.guild);

      expect(restored).toMatchObject({
        sessionId: "700000000000000002",
        signupMessageId: "300000000000000002",
        status: "active",
        name: "Running",
      });
      expect(fresh.isScrimActive()).toBe(true);
      expect(sessions.getAll()).toEqual({
        "700000000000000001": "300000000000000001",
        "700000000000000002": "300000000000000002",
      });
      // Already running: no second start
      expect(await fresh.tick(T0 + 2 * MINUTE)).toBe("waiting");
    });

    it("keeps entries whose event can't be fetched right now", async () => {
      sessions.track("700000000000000001", "300000000000000001");
      vi.mocked(h.guild.scheduledEvents.fetch).mockRejectedValueOnce(
        Object.assign(new Error("socket hang up"), { code: "ECONNRESET" })
      );

      const restored = await new ScrimLifecycleController({ settings, sessions }).restore(h.guild);

      expect(restored).toBeNull();
      expect(sessions.getAll()).toEqual({ "700000000000000001": "300000000000000001" });
    });
  });
});
