/**
 * Scrimkeeper — tests/scheduler/scrimScheduler.test.ts
 * WHAT: Tests for the voice-presence and lifecycle loops.
 * WHY: Both loops must be inert without an active scrim, and a failing tick
 *      must be recorded and survived rather than killing the interval.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Client } from "discord.js";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import {
  LIFECYCLE_LOOP,
  runLifecycleTick,
  runVoiceTick,
  startScrimScheduler,
  stopScrimScheduler,
  VOICE_LOOP,
} from "../../src/scheduler/scrimScheduler.js";
import { logger } from "../../src/lib/logger.js";
import { _clearAllSchedulerHealth, getSchedulerHealthByName } from "../../src/lib/schedulerHealth.js";
import type { ScrimLifecycleController, TickOutcome } from "../../src/features/scrim/lifecycle.js";
import {
  ACTIVE_ROLE_ID,
  createScrimGuild,
  createTestSettings,
  GUILD_ID,
  OTHER_VOICE_CHANNEL_ID,
  type ScrimGuildHarness,
} from "../utils/discordMocks.js";

const settings = createTestSettings();
const P = "200000000000000002";

function fakeController(state: { active: boolean; tearingDown?: boolean; tick?: () => Promise<TickOutcome> }) {
  const tick = vi.fn(state.tick ?? (async (): Promise<TickOutcome> => "waiting"));
  const controller = {
    isScrimActive: () => state.active,
    isTearingDown: () => state.tearingDown ?? false,
    tick,
  } as unknown as ScrimLifecycleController;
  return { controller, tick };
}

function fakeClient(h: ScrimGuildHarness): Client {
  return {
    guilds: {
      cache: new Map([[GUILD_ID, h.guild]]),
      fetch: vi.fn(),
    },
  } as unknown as Client;
}

describe("scrim loop bodies", () => {
  let h: ScrimGuildHarness;

  beforeEach(() => {
    h = createScrimGuild();
    h.addMember(P);
    h.setVoice(P, OTHER_VOICE_CHANNEL_ID);
  });

  it("do nothing while no scrim is active", async () => {
    const { controller, tick } = fakeController({ active: false });

    expect(await runVoiceTick(fakeClient(h), controller, settings)).toBeNull();
    expect(await runLifecycleTick(controller)).toBeNull();
    expect(tick).not.toHaveBeenCalled();
    expect(h.mutationCount()).toBe(0);
  });

  it("voice tick stays out of the way of a teardown", async () => {
    const { controller } = fakeController({ active: true, tearingDown: true });
    expect(await runVoiceTick(fakeClient(h), controller, settings)).toBeNull();
  });

  it("voice tick reconciles roles while active", async () => {
    const { controller } = fakeController({ active: true });

    const report = await runVoiceTick(fakeClient(h), controller, settings);

    expect(report?.inOtherVC).toEqual([P]);
    expect(h.holders(ACTIVE_ROLE_ID)).toEqual([P]);
  });

  it("lifecycle tick delegates to the controller", async () => {
    const { controller, tick } = fakeController({ active: true, tick: async () => "warned" });
    expect(await runLifecycleTick(controller)).toBe("warned");
    expect(tick).toHaveBeenCalledTimes(1);
  });
});

describe("startScrimScheduler", () => {
  beforeEach(() => {
    _clearAllSchedulerHealth();
    vi.useFakeTimers();
  });

  afterEach(() => {
    stopScrimScheduler();
    vi.unstubAllEnvs();
  });

  it("respects the disable flag", async () => {
    vi.stubEnv("SCRIM_SCHEDULER_DISABLED", "1");
    const { controller, tick } = fakeController({ active: true });

    startScrimScheduler(fakeClient(createScrimGuild()), controller, settings);
    await vi.advanceTimersByTimeAsync(settings.tickIntervalMs * 3);

    expect(tick).not.toHaveBeenCalled();
  });

  it("runs both loops every interval and records their health", async () => {
    vi.stubEnv("SCRIM_SCHEDULER_DISABLED", "0");
    const { controller, tick } = fakeController({ active: true });

    startScrimScheduler(fakeClient(createScrimGuild()), controller, settings);
    await vi.advanceTimersByTimeAsync(settings.tickIntervalMs * 2);

    expect(tick).toHaveBeenCalledTimes(2);
    expect(getSchedulerHealthByName(LIFECYCLE_LOOP)).toMatchObject({ totalRuns: 2, consecutiveFailures: 0 });
    expect(getSchedulerHealthByName(VOICE_LOOP)).toMatchObject({ totalRuns: 2, consecutiveFailures: 0 });
  });

  it("records a failing tick and keeps the interval alive", async () => {
    vi.stubEnv("SCRIM_SCHEDULER_DISABLED", "0");
    let calls = 0;
    const { controller, tick } = fakeController({
      active: true,
      tick: async () => {
        calls++;
        if (calls === 1) throw new Error("store locked");
        return "waiting";
      },
    });

    startScrimScheduler(fakeClient(createScrimGuild()), controller, settings);
    await vi.advanceTimersByTimeAsync(settings.tickIntervalMs * 2);

    expect(tick).toHaveBeenCalledTimes(2);
    expect(getSchedulerHealthByName(LIFECYCLE_LOOP)).toMatchObject({
      totalRuns: 2,
      totalFailures: 1,
      consecutiveFailures: 0,
    });
  });

  it("does not record idle ticks", async () => {
    vi.stubEnv("SCRIM_SCHEDULER_DISABLED", "0");
    const { controller } = fakeController({ active: false });

    startScrimScheduler(fakeClient(createScrimGuild()), controller, settings);
    await vi.advanceTimersByTimeAsync(settings.tickIntervalMs * 2);

    expect(getSchedulerHealthByName(LIFECYCLE_LOOP)).toBeUndefined();
    expect(getSchedulerHealthByName(VOICE_LOOP)).toBeUndefined();
  });

  it("logs a transient failure as a warning and anything else as an error", async () => {
    vi.stubEnv("SCRIM_SCHEDULER_DISABLED", "0");
    let calls = 0;
    const { controller } = fakeController({
      active: true,
      tick: async () => {
        calls++;
        if (calls === 1) throw Object.assign(new Error("socket timed out"), { code: "ETIMEDOUT" });
        throw new Error("state corrupted");
      },
    });

    startScrimScheduler(fakeClient(createScrimGuild()), controller, settings);
    await vi.advanceTimersByTimeAsync(settings.tickIntervalMs * 2);

    expect(vi.mocked(logger.warn)).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "scrim_tick_deferred", loop: LIFECYCLE_LOOP, kind: "network" }),
      "Scrim tick hit a transient failure"
    );
    expect(vi.mocked(logger.error)).toHaveBeenCalledTimes(1);
    expect(vi.mocked(logger.error)).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "scrim_tick_failed", loop: LIFECYCLE_LOOP }),
      "Scrim tick failed; retrying next interval"
    );
  });
});
