/**
 * Scrimkeeper — src/store/scrimSessionStore.ts
 * WHAT: The persisted session map: scheduled event ID → signup message ID.
 * WHY: The only scrim state that has to survive a restart. Everything else
 *      (role holders, voice partition) is re-derived from Discord every pass.
 * FLOWS:
 *  - /scrim create → track(sessionId, messageId)
 *  - resurrection → rekey(oldId, newId) keeps the same signup message
 *  - cancel/end → removeSession(id); deleted signup post → removeMessage(id)
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import type { DocumentStore } from "./documentStore.js";

export const SESSION_MAP_KEY = "scrim_sessions";

const sessionMapSchema = z.record(z.string(), z.string());

export type SessionMap = Record<string, string>;

export class ScrimSessionStore {
  constructor(private readonly docs: DocumentStore) {}

  getAll(): SessionMap {
    return this.docs.read(SESSION_MAP_KEY, sessionMapSchema) ?? {};
  }

  putAll(map: SessionMap): void {
    this.docs.write(SESSION_MAP_KEY, map);
  }

  /**
   * Every read-modify-write below goes through update() so two handlers
   * touching the map at once can't lose each other's change.
   */
  private mutate(fn: (map: SessionMap) => SessionMap): SessionMap {
    return this.docs.update(SESSION_MAP_KEY, sessionMapSchema, () => ({}), fn);
  }

  track(sessionId: string, signupMessageId: string): void {
    this.mutate((map) => ({ ...map, [sessionId]: signupMessageId }));
  }

  /**
   * Move the signup message from one session ID to another. If the old ID was
   * never tracked (e.g. its signup post was deleted), nothing is written.
   * Returns whether an entry moved.
   */
  rekey(oldSessionId: string, newSessionId: string): boolean {
    let moved = false;
    this.mutate((map) => {
      const messageId = map[oldSessionId];
      if (messageId === undefined) return map;
      const { [oldSessionId]: _old, ...rest } = map;
      moved = true;
      return { ...rest, [newSessionId]: messageId };
    });
    return moved;
  }

  /**
   * Returns the signup message ID that was tracked for the session, if any.
   */
  removeSession(sessionId: string): string | undefined {
    let removed: string | undefined;
    this.mutate((map) => {
      const { [sessionId]: messageId, ...rest } = map;
      removed = messageId;
      return rest;
    });
    return removed;
  }

  /**
   * Drop every entry pointing at this message. Returns the session IDs that
   * lost their signup message.
   */
  removeMessage(signupMessageId: string): string[] {
    const orphaned: string[] = [];
    this.mutate((map) => {
      const next: SessionMap = {};
      for (const [sessionId, messageId] of Object.entries(map)) {
        if (messageId === signupMessageId) {
          orphaned.push(sessionId);
        } else {
          next[sessionId] = messageId;
        }
      }
      return next;
    });
    return orphaned;
  }

  getMessageId(sessionId: string): string | undefined {
    return this.getAll()[sessionId];
  }

  trackedMessageIds(): string[] {
    return [...new Set(Object.values(this.getAll()))];
  }

  isTrackedMessage(messageId: string): boolean {
    return Object.values(this.getAll()).includes(messageId);
  }
}
