/**
 * Scrimkeeper — src/features/scrim/lifecycle.ts
 * WHAT: The scrim session state machine: scheduled → warned → active → ended | cancelled,
 *       plus resurrection when Discord ends a session we still consider running.
 * WHY: Discord's scheduled-event subsystem ends events on its own (empty channel,
 *      host leaves). The controller decides whether that end was wanted.
 * FLOWS:
 *  - beginSession → create scheduled event → signup post + marker → track → scheduled
 *  - tick(now) → warning window → warned; start window → setStatus(Active) → active
 *  - endSession / cancelSession → teardown guard on → event/post cleanup → untrack → roles → guard off
 *  - onExternalSessionEnded → guard? ignore : active? resurrect : untrack as cancelled
 *  - restore(guild) → rebuild bookkeeping from the session map and the guild's events
 *
 * All mutable lifecycle state lives on the instance. Claims (warned set, start
 * claim, resurrection claim, teardown guard) are taken synchronously before the
 * first await, so overlapping ticks and gateway events can't double-fire.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import {
  GuildScheduledEventEntityType,
  GuildScheduledEventPrivacyLevel,
  GuildScheduledEventStatus,
  type Guild,
  type GuildScheduledEvent,
  type MessageCreateOptions,
} from "discord.js";
import { logger, redact } from "../../lib/logger.js";
import { classifyError, isNotFound, ScrimConflictError } from "../../lib/errors.js";
import type { ScrimSessionStore } from "../../store/scrimSessionStore.js";
import { fetchTextChannel } from "./channels.js";
import {
  buildSignupPost,
  cancelledNotice,
  endedNotice,
  resurrectedNotice,
  startedNotice,
  warningNotice,
} from "./messages.js";
import { reconcileRegistration } from "./registrationSync.js";
import { clearVoiceRoles } from "./voicePresence.js";
import {
  LIVE_STATUSES,
  type BeginSessionParams,
  type ScrimSettings,
  type TrackedSession,
} from "./types.js";

/** How far ahead a resurrected session is scheduled before being started */
const RESURRECT_LEAD_MS = 60_000;

export type TickOutcome = "idle" | "waiting" | "warned" | "started" | "resurrected";

export type ExternalEndOutcome =
  | "ignored_teardown"
  | "ignored_untracked"
  | "ignored_finished"
  | "ignored_in_flight"
  | "resurrected"
  | "cancelled_before_start";

export interface TeardownStep {
  step: string;
  ok: boolean;
  error?: string;
}

export interface TeardownReport {
  sessionId: string;
  status: "ended" | "cancelled";
  steps: TeardownStep[];
}

export interface LifecycleDeps {
  settings: ScrimSettings;
  sessions: ScrimSessionStore;
  /** Injectable clock, epoch ms */
  clock?: () => number;
}

/**
 * Where the remaining time-to-start sits relative to the two trigger bands.
 * The bands are half-open so a coarse poll can't land in one twice by
 * rounding, and wide enough that one skipped tick doesn't miss them.
 */
export function classifyRemaining(
  remainingMs: number,
  settings: Pick<ScrimSettings, "warningLeadMs" | "warningToleranceMs" | "startToleranceMs">
): "before_warning" | "warning" | "between" | "start" | "missed" {
  const { warningLeadMs, warningToleranceMs, startToleranceMs } = settings;
  if (remainingMs > warningLeadMs) return "before_warning";
  if (remainingMs > warningLeadMs - warningToleranceMs) return "warning";
  if (remainingMs > 0) return "between";
  if (remainingMs > -startToleranceMs) return "start";
  return "missed";
}

export class ScrimLifecycleController {
  private readonly settings: ScrimSettings;
  private readonly sessions: ScrimSessionStore;
  private readonly clock: () => number;

  private guild: Guild | null = null;
  private session: TrackedSession | null = null;

  private scrimActive = false;
  private tearingDown = false;
  private beginning = false;
  private resurrecting = false;
  /** Set when a resurrection attempt failed; the next tick retries it */
  private resurrectionPending = false;
  private readonly warned = new Set<string>();
  private readonly startClaims = new Set<string>();

  constructor(deps: LifecycleDeps) {
    this.settings = deps.settings;
    this.sessions = deps.sessions;
    this.clock = deps.clock ?? Date.now;
  }

  // ===== Read-only views =====

  isScrimActive(): boolean {
    return this.scrimActive;
  }

  isTearingDown(): boolean {
    return this.tearingDown;
  }

  getSession(): TrackedSession | null {
    return this.session ? { ...this.session } : null;
  }

  private requireGuild(): Guild {
    if (!this.guild) {
      throw new Error("Scrim lifecycle controller used before restore(guild)");
    }
    return this.guild;
  }

  // ===== Startup =====

  /**
   * Rebuild bookkeeping after a restart. The session map is the only thing
   * that survived; the guild's scheduled events say what state each entry is in.
   * Entries whose event is gone or already over are dropped. If more than one
   * entry is still live the soonest one wins and the rest stay tracked for
   * registration only.
   */
  async restore(guild: Guild): Promise<TrackedSession | null> {
    this.guild = guild;
    const map = this.sessions.getAll();
    const live: TrackedSession[] = [];

    for (const [sessionId, signupMessageId] of Object.entries(map)) {
      let event: GuildScheduledEvent;
      try {
        event = await guild.scheduledEvents.fetch(sessionId);
      } catch (err) {
        if (isNotFound(classifyError(err))) {
          this.sessions.removeSession(sessionId);
          logger.info({ evt: "scrim_restore_dropped", sessionId, reason: "event_missing" }, "Dropped stale session");
          continue;
        }
        // Can't tell what it is; leave it tracked and let the next restart or command sort it out
        logger.warn({ evt: "scrim_restore_fetch_failed", sessionId, err }, "Could not fetch scheduled event");
        continue;
      }

      if (event.isActive() || event.isScheduled()) {
        live.push({
          sessionId,
          signupMessageId,
          status: event.isActive() ? "active" : "scheduled",
          name: event.name,
          description: event.description ?? "",
          voiceChannelId: event.channelId ?? this.settings.meetingChannelId,
          scheduledStartAt: event.scheduledStartTimestamp ?? this.clock(),
        });
      } else {
        this.sessions.removeSession(sessionId);
        logger.info(
          { evt: "scrim_restore_dropped", sessionId, reason: "event_finished", status: event.status },
          "Dropped finished session"
        );
      }
    }

    // Running sessions first, then by start time
    live.sort(
      (a, b) =>
        Number(b.status === "active") - Number(a.status === "active") || a.scheduledStartAt - b.scheduledStartAt
    );
    const [current, ...extra] = live;
    if (extra.length > 0) {
      logger.warn(
        { evt: "scrim_restore_multiple_live", kept: current?.sessionId, extra: extra.map((s) => s.sessionId) },
        "More than one live scrim tracked; managing only the first"
      );
    }

    this.session = current ?? null;
    this.scrimActive = this.session !== null;
    if (this.session?.status === "active") {
      this.startClaims.add(this.session.sessionId);
    }

    logger.info(
      { evt: "scrim_restored", guildId: guild.id, tracked: Object.keys(map).length, session: this.session?.sessionId },
      "Scrim lifecycle restored"
    );
    return this.getSession();
  }

  // ===== Begin =====

  /**
   * Create the scheduled event and the signup post, and start tracking them.
   * Refuses while another session is live. If anything after the event
   * creation fails, what was already created is removed again.
   */
  async beginSession(params: BeginSessionParams): Promise<TrackedSession> {
    const guild = this.requireGuild();
    if (this.beginning || this.tearingDown) {
      throw new ScrimConflictError("Another scrim operation is in progress");
    }
    if (this.session && LIVE_STATUSES.has(this.session.status)) {
      throw new ScrimConflictError(`A scrim is already scheduled or running: ${this.session.name}`);
    }
    this.beginning = true;

    try {
      const voiceChannelId = params.voiceChannelId ?? this.settings.meetingChannelId;
      const event = await guild.scheduledEvents.create({
        name: params.name,
        description: params.description || undefined,
        scheduledStartTime: new Date(params.startAt),
        privacyLevel: GuildScheduledEventPrivacyLevel.GuildOnly,
        entityType: GuildScheduledEventEntityType.Voice,
        channel: voiceChannelId,
        reason: "Scrim created",
      });

      let signupMessageId: string;
      try {
        const channel = await fetchTextChannel(guild, this.settings.signupChannelId);
        const post = await channel.send(
          buildSignupPost({
            name: params.name,
            description: params.description,
            startAt: params.startAt,
            voiceChannelId,
            markerEmoji: this.settings.markerEmoji,
            mentionRoleIds: this.settings.mentionRoleIds,
          })
        );
        signupMessageId = post.id;
        try {
          await post.react(this.settings.markerEmoji);
          this.sessions.track(event.id, post.id);
        } catch (err) {
          await post.delete().catch((cleanupErr: unknown) => {
            logger.warn({ evt: "scrim_begin_cleanup_failed", what: "signup_post", err: cleanupErr });
          });
          throw err;
        }
      } catch (err) {
        await event.delete().catch((cleanupErr: unknown) => {
          logger.warn({ evt: "scrim_begin_cleanup_failed", what: "scheduled_event", err: cleanupErr });
        });
        throw err;
      }

      this.session = {
        sessionId: event.id,
        signupMessageId,
        status: "scheduled",
        name: params.name,
        description: params.description,
        voiceChannelId,
        scheduledStartAt: params.startAt,
      };
      this.scrimActive = true;
      this.resurrectionPending = false;

      logger.info(
        {
          evt: "scrim_begin",
          guildId: guild.id,
          sessionId: event.id,
          signupMessageId,
          name: redact(params.name),
          startAt: params.startAt,
        },
        "Scrim scheduled"
      );
      return { ...this.session };
    } finally {
      this.beginning = false;
    }
  }

  // ===== Periodic poll =====

  /**
   * One poll of the time-based transitions. Safe to call at any rate; each
   * transition fires at most once per session.
   */
  async tick(now: number = this.clock()): Promise<TickOutcome> {
    const session = this.session;
    if (!session || !this.scrimActive || this.tearingDown) return "idle";

    if (session.status === "active") {
      if (this.resurrectionPending && !this.resurrecting) {
        await this.resurrect(session);
        return "resurrected";
      }
      return "waiting";
    }
    if (session.status !== "scheduled" && session.status !== "warned") return "idle";

    const window = classifyRemaining(session.scheduledStartAt - now, this.settings);

    if (window === "warning") {
      if (session.status !== "scheduled" || this.warned.has(session.sessionId)) return "waiting";
      this.warned.add(session.sessionId);
      session.status = "warned";
      logger.info({ evt: "scrim_warning", sessionId: session.sessionId }, "Scrim warning window reached");
      await this.announce(warningNotice(session.name, session.scheduledStartAt, this.settings.mentionRoleIds));
      return "warned";
    }

    if (window === "start") {
      if (this.startClaims.has(session.sessionId)) return "waiting";
      this.startClaims.add(session.sessionId);
      try {
        const event = await this.requireGuild().scheduledEvents.fetch(session.sessionId);
        if (!event.isActive()) {
          await event.setStatus(GuildScheduledEventStatus.Active, "Scrim start time reached");
        }
      } catch (err) {
        // Let the next tick inside the window try again
        this.startClaims.delete(session.sessionId);
        throw err;
      }
      // A teardown that began while we were starting owns the session now
      if (this.session !== session || !LIVE_STATUSES.has(session.status)) return "idle";
      session.status = "active";
      logger.info({ evt: "scrim_started", sessionId: session.sessionId }, "Scrim started");
      await this.announce(startedNotice(session.name, session.voiceChannelId, this.settings.mentionRoleIds));
      return "started";
    }

    if (window === "missed") {
      logger.debug(
        { evt: "scrim_start_missed", sessionId: session.sessionId, startAt: session.scheduledStartAt, now },
        "Start window passed without a start"
      );
    }
    return "waiting";
  }

  // ===== External notifications =====

  /**
   * Discord reports that a scheduled event ended or was cancelled/deleted.
   * Only a session we still consider running comes back; a deliberate
   * teardown never does.
   */
  async onExternalSessionEnded(sessionId: string): Promise<ExternalEndOutcome> {
    if (this.tearingDown) {
      logger.debug({ evt: "scrim_external_end_ignored", sessionId, reason: "teardown" }, "Teardown in progress");
      return "ignored_teardown";
    }

    const session = this.session;
    if (!session || session.sessionId !== sessionId) {
      if (this.sessions.getMessageId(sessionId) !== undefined) {
        this.sessions.removeSession(sessionId);
        logger.info({ evt: "scrim_external_end_untracked", sessionId }, "Untracked session ended externally");
      }
      return "ignored_untracked";
    }

    if (session.status === "ended" || session.status === "cancelled") return "ignored_finished";

    if (session.status === "active") {
      if (this.resurrecting) return "ignored_in_flight";
      logger.warn({ evt: "scrim_external_end", sessionId }, "Running scrim ended by Discord; resurrecting");
      await this.resurrect(session);
      return "resurrected";
    }

    // Ended before it ever started: nothing to bring back
    session.status = "cancelled";
    this.scrimActive = false;
    logger.info({ evt: "scrim_external_cancel", sessionId }, "Scrim dropped by Discord before start");
    const steps: TeardownStep[] = [];
    await this.step(steps, "untrack", async () => {
      this.sessions.removeSession(sessionId);
    });
    await this.step(steps, "reconcile_registration", () => this.reconcileRegistrationNow());
    await this.announce(cancelledNotice(session.name));
    return "cancelled_before_start";
  }

  /**
   * Replace a dead event with a fresh one starting now, start it, and move the
   * signup message over to the new ID. The resurrection claim keeps a second
   * notification from creating a second event.
   */
  private async resurrect(session: TrackedSession): Promise<void> {
    const guild = this.requireGuild();
    this.resurrecting = true;
    const oldSessionId = session.sessionId;

    try {
      const startAt = this.clock() + RESURRECT_LEAD_MS;
      const event = await guild.scheduledEvents.create({
        name: session.name,
        description: session.description || undefined,
        scheduledStartTime: new Date(startAt),
        privacyLevel: GuildScheduledEventPrivacyLevel.GuildOnly,
        entityType: GuildScheduledEventEntityType.Voice,
        channel: session.voiceChannelId,
        reason: "Scrim resurrected after external end",
      });
      let moved: boolean;
      try {
        await event.setStatus(GuildScheduledEventStatus.Active, "Scrim resurrected");
        moved = this.sessions.rekey(oldSessionId, event.id);
      } catch (err) {
        // The retry creates its own event; this one must not outlive the failure
        await event.delete().catch((cleanupErr: unknown) => {
          logger.warn({ evt: "scrim_resurrect_cleanup_failed", newSessionId: event.id, err: cleanupErr });
        });
        throw err;
      }
      if (!moved) {
        logger.warn(
          { evt: "scrim_resurrect_no_signup", oldSessionId, newSessionId: event.id },
          "Resurrected session has no tracked signup message"
        );
      }

      session.sessionId = event.id;
      session.scheduledStartAt = startAt;
      session.status = "active";
      this.warned.add(event.id);
      this.startClaims.add(event.id);
      this.resurrectionPending = false;

      logger.info(
        { evt: "scrim_resurrected", guildId: guild.id, oldSessionId, newSessionId: event.id },
        "Scrim resurrected"
      );
    } catch (err) {
      this.resurrectionPending = true;
      throw err;
    } finally {
      this.resurrecting = false;
    }

    await this.announce(resurrectedNotice(session.name));
  }

  // ===== Intentional teardown =====

  /**
   * End the running (or scheduled) scrim on purpose. The Discord event is
   * completed, or deleted if it never started.
   */
  async endSession(): Promise<TeardownReport> {
    const session = this.claimTeardown("end");
    try {
      session.status = "ended";
      this.scrimActive = false;
      const steps: TeardownStep[] = [];

      await this.step(steps, "finish_event", () => this.finishEvent(session.sessionId, "complete"));
      await this.teardownCommon(session, steps);
      await this.announce(endedNotice(session.name));

      logger.info({ evt: "scrim_ended", sessionId: session.sessionId, steps }, "Scrim ended");
      return { sessionId: session.sessionId, status: "ended", steps };
    } finally {
      this.tearingDown = false;
    }
  }

  /**
   * Cancel the scrim: delete the Discord event and the signup post.
   */
  async cancelSession(): Promise<TeardownReport> {
    const session = this.claimTeardown("cancel");
    try {
      session.status = "cancelled";
      this.scrimActive = false;
      const steps: TeardownStep[] = [];

      await this.step(steps, "delete_event", () => this.finishEvent(session.sessionId, "delete"));
      await this.step(steps, "delete_signup", async () => {
        const channel = await fetchTextChannel(this.requireGuild(), this.settings.signupChannelId);
        await ignoreNotFound(channel.messages.delete(session.signupMessageId));
      });
      await this.teardownCommon(session, steps);
      await this.announce(cancelledNotice(session.name));

      logger.info({ evt: "scrim_cancelled", sessionId: session.sessionId, steps }, "Scrim cancelled");
      return { sessionId: session.sessionId, status: "cancelled", steps };
    } finally {
      this.tearingDown = false;
    }
  }

  /**
   * Synchronous check-and-set of the teardown guard. Throws if there is
   * nothing live to tear down or another teardown holds the guard.
   */
  private claimTeardown(kind: "end" | "cancel"): TrackedSession {
    this.requireGuild();
    if (this.tearingDown) {
      throw new ScrimConflictError("A scrim teardown is already in progress");
    }
    const session = this.session;
    if (!session || !LIVE_STATUSES.has(session.status)) {
      throw new ScrimConflictError(`There is no scrim to ${kind}`);
    }
    if (this.resurrecting) {
      throw new ScrimConflictError("The scrim is being reopened; try again in a moment");
    }
    this.tearingDown = true;
    return session;
  }

  private async teardownCommon(session: TrackedSession, steps: TeardownStep[]): Promise<void> {
    await this.step(steps, "untrack", async () => {
      this.sessions.removeSession(session.sessionId);
    });
    await this.step(steps, "clear_voice_roles", async () => {
      await clearVoiceRoles(this.requireGuild(), this.settings.activeRoleId, this.settings.spectatorRoleId);
    });
    await this.step(steps, "reconcile_registration", () => this.reconcileRegistrationNow());
    this.resurrectionPending = false;
  }

  private async finishEvent(sessionId: string, mode: "complete" | "delete"): Promise<void> {
    const guild = this.requireGuild();
    let event: GuildScheduledEvent;
    try {
      event = await guild.scheduledEvents.fetch(sessionId);
    } catch (err) {
      if (isNotFound(classifyError(err))) return;
      throw err;
    }
    // Discord only lets an active event be completed; a scheduled one is deleted instead
    if (mode === "complete" && event.isActive()) {
      await event.setStatus(GuildScheduledEventStatus.Completed, "Scrim ended");
      return;
    }
    await ignoreNotFound(event.delete());
  }

  private async reconcileRegistrationNow(): Promise<void> {
    const channel = await fetchTextChannel(this.requireGuild(), this.settings.signupChannelId);
    await reconcileRegistration(channel, this.sessions.trackedMessageIds(), this.settings.registeredRoleId, {
      sessions: this.sessions,
      markerEmoji: this.settings.markerEmoji,
    });
  }

  /**
   * Run one teardown step, recording its outcome. A failing step never stops
   * the ones after it.
   */
  private async step(steps: TeardownStep[], name: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
      steps.push({ step: name, ok: true });
    } catch (err) {
      const classified = classifyError(err);
      logger.warn({ evt: "scrim_teardown_step_failed", step: name, err }, "Teardown step failed");
      steps.push({ step: name, ok: false, error: classified.message });
    }
  }

  /**
   * Announcements happen after the state change they describe; losing one
   * doesn't undo the transition.
   */
  private async announce(payload: MessageCreateOptions): Promise<void> {
    try {
      const channel = await fetchTextChannel(this.requireGuild(), this.settings.announceChannelId);
      await channel.send(payload);
    } catch (err) {
      logger.warn({ evt: "scrim_announce_failed", err }, "Could not post scrim announcement");
    }
  }
}

async function ignoreNotFound(op: Promise<unknown>): Promise<void> {
  try {
    await op;
  } catch (err) {
    if (!isNotFound(classifyError(err))) throw err;
  }
}
