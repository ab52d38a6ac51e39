/**
 * Scrimkeeper -- tests/utils/discordMocks.ts
 * WHAT: A small in-memory guild for scrim tests: members, roles, voice states,
 *       text channels with reactable messages, and scheduled events.
 * WHY: The reconcilers read and write real-looking discord.js shapes. Role
 *      add/remove mutate the same maps role.members reads, so a second pass
 *      sees the first pass's writes.
 * USAGE:
 *  import { createScrimGuild } from "../utils/discordMocks.js";
 *  const h = createScrimGuild();
 *  h.addMember("200000000000000001");
 *  const post = h.addMessage(h.signupChannel, "300000000000000001", ["200000000000000001"]);
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { vi, type Mock } from "vitest";
import {
  Collection,
  GuildScheduledEventStatus,
  type Guild,
  type GuildTextBasedChannel,
  type MessageReaction,
  type User,
} from "discord.js";
import type { ScrimSettings } from "../../src/features/scrim/types.js";

// ===== IDs =====

export const GUILD_ID = "100000000000000002";
export const SIGNUP_CHANNEL_ID = "100000000000000010";
export const MEETING_CHANNEL_ID = "100000000000000011";
export const OTHER_VOICE_CHANNEL_ID = "100000000000000012";
export const REGISTERED_ROLE_ID = "100000000000000020";
export const ACTIVE_ROLE_ID = "100000000000000021";
export const SPECTATOR_ROLE_ID = "100000000000000022";
export const MARKER = "✅";

export function createTestSettings(overrides: Partial<ScrimSettings> = {}): ScrimSettings {
  return {
    guildId: GUILD_ID,
    signupChannelId: SIGNUP_CHANNEL_ID,
    announceChannelId: SIGNUP_CHANNEL_ID,
    meetingChannelId: MEETING_CHANNEL_ID,
    registeredRoleId: REGISTERED_ROLE_ID,
    activeRoleId: ACTIVE_ROLE_ID,
    spectatorRoleId: SPECTATOR_ROLE_ID,
    mentionRoleIds: [],
    adminRoleIds: [],
    markerEmoji: MARKER,
    tickIntervalMs: 60_000,
    warningLeadMs: 30 * 60_000,
    warningToleranceMs: 2 * 60_000,
    startToleranceMs: 5 * 60_000,
    ...overrides,
  };
}

/** Shape of a Discord REST error as classifyError sees it */
export function discordError(code: number, message = `Discord error ${code}`): Error & { code: number } {
  return Object.assign(new Error(message), { code });
}

// ===== Users =====

export interface MockUserInit {
  id: string;
  bot?: boolean;
}

export function createMockUser(init: MockUserInit): User {
  return {
    id: init.id,
    bot: init.bot ?? false,
    partial: false,
    username: `user-${init.id.slice(-4)}`,
    fetch: vi.fn(),
  } as unknown as User;
}

// ===== Members & roles =====

export interface MockMember {
  id: string;
  user: { id: string; bot: boolean };
  roles: {
    cache: Map<string, MockRole>;
    add: Mock<(roleId: string, reason?: string) => Promise<void>>;
    remove: Mock<(roleId: string, reason?: string) => Promise<void>>;
  };
}

export interface MockRole {
  id: string;
  name: string;
  position: number;
  readonly members: Map<string, MockMember>;
}

// ===== Messages =====

export interface MockReaction {
  emoji: { id: string | null; name: string | null };
  users: { fetch: Mock<(opts: { limit: number; after?: string }) => Promise<Collection<string, User>>> };
  message: MockMessage;
}

export interface MockMessage {
  id: string;
  guildId: string;
  guild: Guild;
  channel: MockTextChannel;
  reactions: { cache: Collection<string, MockReaction> };
  react: Mock<(emoji: string) => Promise<undefined>>;
  delete: Mock<() => Promise<void>>;
}

export interface MockTextChannel {
  id: string;
  guild: Guild;
  /** Messages currently in the channel */
  store: Map<string, MockMessage>;
  sent: unknown[];
  isTextBased: () => boolean;
  send: Mock<(payload: unknown) => Promise<MockMessage>>;
  messages: {
    fetch: Mock<(messageId: string) => Promise<MockMessage>>;
    delete: Mock<(messageId: string) => Promise<void>>;
  };
}

// ===== Scheduled events =====

export interface MockScheduledEvent {
  id: string;
  guildId: string;
  name: string;
  description: string | null;
  channelId: string | null;
  status: GuildScheduledEventStatus;
  scheduledStartTimestamp: number | null;
  isActive: () => boolean;
  isScheduled: () => boolean;
  setStatus: Mock<(status: GuildScheduledEventStatus, reason?: string) => Promise<MockScheduledEvent>>;
  delete: Mock<() => Promise<MockScheduledEvent>>;
}

// ===== Guild harness =====

export interface ScrimGuildHarness {
  guild: Guild;
  members: Map<string, MockMember>;
  roles: Map<string, MockRole>;
  voice: Map<string, { id: string; channelId: string | null; member: MockMember | null }>;
  events: Map<string, MockScheduledEvent>;
  signupChannel: MockTextChannel;
  /** Typed view of the signup channel for functions that take a GuildTextBasedChannel */
  signupTextChannel: GuildTextBasedChannel;
  addMember(id: string, opts?: { bot?: boolean; roles?: string[] }): MockMember;
  /** A user the client knows about who isn't in the member cache */
  cacheUser(id: string, opts?: { bot?: boolean }): void;
  /** Move a user into a voice channel (or out of voice with null) */
  setVoice(userId: string, channelId: string | null): void;
  /** Omit markerHolders for a post nobody (not even the bot) has reacted to */
  addMessage(channel: MockTextChannel, id: string, markerHolders?: string[]): MockMessage;
  /** Replace who holds the marker on a message */
  setMarkers(message: MockMessage, userIds: string[]): void;
  addEvent(init: Partial<MockScheduledEvent> & { id: string }): MockScheduledEvent;
  /** Give a member a role without counting it as a mutation */
  grantRole(userId: string, roleId: string): void;
  holders(roleId: string): string[];
  /** Total role add/remove calls across all members */
  mutationCount(): number;
  /** Typed view of a mock reaction for the reaction hooks */
  reactionOn(message: MockMessage): MessageReaction;
}

const SNOWFLAKE_BASE = 900000000000000000n;

export function createScrimGuild(): ScrimGuildHarness {
  const members = new Map<string, MockMember>();
  const roles = new Map<string, MockRole>();
  const voice = new Map<string, { id: string; channelId: string | null; member: MockMember | null }>();
  const events = new Map<string, MockScheduledEvent>();
  const channels = new Map<string, MockTextChannel>();
  const users = new Map<string, User>();
  let mutations = 0;
  let nextId = SNOWFLAKE_BASE;
  const newId = () => (nextId++).toString();

  const guildShell: Record<string, unknown> = { id: GUILD_ID, name: "Test Guild" };
  const guild = guildShell as unknown as Guild;

  function makeRole(id: string, name: string, position: number): MockRole {
    return {
      id,
      name,
      position,
      get members() {
        const holders = new Map<string, MockMember>();
        for (const member of members.values()) {
          if (member.roles.cache.has(id)) holders.set(member.id, member);
        }
        return holders;
      },
    };
  }
  roles.set(REGISTERED_ROLE_ID, makeRole(REGISTERED_ROLE_ID, "Registered", 5));
  roles.set(ACTIVE_ROLE_ID, makeRole(ACTIVE_ROLE_ID, "Playing", 5));
  roles.set(SPECTATOR_ROLE_ID, makeRole(SPECTATOR_ROLE_ID, "Spectating", 5));

  function addMember(id: string, opts: { bot?: boolean; roles?: string[] } = {}): MockMember {
    const cache = new Map<string, MockRole>();
    const member: MockMember = {
      id,
      user: { id, bot: opts.bot ?? false },
      roles: {
        cache,
        add: vi.fn(async (roleId: string, _reason?: string) => {
          mutations++;
          const role = roles.get(roleId);
          if (role) cache.set(roleId, role);
        }),
        remove: vi.fn(async (roleId: string, _reason?: string) => {
          mutations++;
          cache.delete(roleId);
        }),
      },
    };
    for (const roleId of opts.roles ?? []) {
      const role = roles.get(roleId);
      if (role) cache.set(roleId, role);
    }
    members.set(id, member);
    users.set(id, createMockUser({ id, bot: opts.bot }));
    return member;
  }

  function userFor(id: string): User {
    return users.get(id) ?? createMockUser({ id });
  }

  function createChannel(id: string): MockTextChannel {
    const store = new Map<string, MockMessage>();
    const channel: MockTextChannel = {
      id,
      guild,
      store,
      sent: [],
      isTextBased: () => true,
      send: vi.fn(async (payload: unknown) => {
        channel.sent.push(payload);
        return addMessage(channel, newId());
      }),
      messages: {
        fetch: vi.fn(async (messageId: string) => {
          const message = store.get(messageId);
          if (!message) throw discordError(10008, "Unknown Message");
          return message;
        }),
        delete: vi.fn(async (messageId: string) => {
          if (!store.delete(messageId)) throw discordError(10008, "Unknown Message");
        }),
      },
    };
    channels.set(id, channel);
    return channel;
  }

  function addMessage(channel: MockTextChannel, id: string, markerHolders?: string[]): MockMessage {
    const message: MockMessage = {
      id,
      guildId: GUILD_ID,
      guild,
      channel,
      reactions: { cache: new Collection() },
      react: vi.fn(async (_emoji: string) => undefined),
      delete: vi.fn(async () => {
        channel.store.delete(id);
      }),
    };
    channel.store.set(id, message);
    if (markerHolders) setMarkers(message, markerHolders);
    return message;
  }

  function setMarkers(message: MockMessage, userIds: string[]): void {
    const sorted = [...userIds].sort();
    const reaction: MockReaction = {
      emoji: { id: null, name: MARKER },
      message,
      users: {
        // Pages by ascending ID after `after`, like Discord does
        fetch: vi.fn(async ({ limit, after }: { limit: number; after?: string }) => {
          const page = new Collection<string, User>();
          for (const userId of sorted) {
            if (after !== undefined && userId <= after) continue;
            if (page.size >= limit) break;
            page.set(userId, userFor(userId));
          }
          return page;
        }),
      },
    };
    message.reactions.cache.set(MARKER, reaction);
  }

  function makeEvent(init: Partial<MockScheduledEvent> & { id: string }): MockScheduledEvent {
    const event: MockScheduledEvent = {
      guildId: GUILD_ID,
      name: "Scrim",
      description: null,
      channelId: MEETING_CHANNEL_ID,
      status: GuildScheduledEventStatus.Scheduled,
      scheduledStartTimestamp: null,
      ...init,
      isActive: () => event.status === GuildScheduledEventStatus.Active,
      isScheduled: () => event.status === GuildScheduledEventStatus.Scheduled,
      setStatus: vi.fn(async (status: GuildScheduledEventStatus, _reason?: string) => {
        event.status = status;
        return event;
      }),
      delete: vi.fn(async () => {
        if (!events.delete(event.id)) throw discordError(10070, "Unknown Guild Scheduled Event");
        return event;
      }),
    };
    events.set(event.id, event);
    return event;
  }

  const signupChannel = createChannel(SIGNUP_CHANNEL_ID);

  Object.assign(guildShell, {
    client: { users: { cache: users } },
    roles: { cache: roles },
    members: {
      cache: members,
      me: {
        permissions: { has: () => true },
        roles: { highest: { name: "Bot", position: 100 } },
      },
      fetch: vi.fn(async (id?: string) => {
        if (id === undefined) return members;
        const member = members.get(id);
        if (!member) throw discordError(10007, "Unknown Member");
        return member;
      }),
    },
    channels: {
      cache: channels,
      fetch: vi.fn(async (id: string) => channels.get(id) ?? null),
    },
    voiceStates: { cache: voice },
    scheduledEvents: {
      create: vi.fn(
        async (opts: { name: string; description?: string; scheduledStartTime: Date; channel: string }) =>
          makeEvent({
            id: newId(),
            name: opts.name,
            description: opts.description ?? null,
            channelId: opts.channel,
            scheduledStartTimestamp: opts.scheduledStartTime.getTime(),
          })
      ),
      fetch: vi.fn(async (id: string) => {
        const event = events.get(id);
        if (!event) throw discordError(10070, "Unknown Guild Scheduled Event");
        return event;
      }),
    },
  });

  return {
    guild,
    members,
    roles,
    voice,
    events,
    signupChannel,
    signupTextChannel: signupChannel as unknown as GuildTextBasedChannel,
    addMember,
    cacheUser(id, opts = {}) {
      users.set(id, createMockUser({ id, bot: opts.bot }));
    },
    setVoice(userId, channelId) {
      voice.set(userId, { id: userId, channelId, member: members.get(userId) ?? null });
    },
    addMessage,
    setMarkers,
    addEvent: makeEvent,
    grantRole(userId, roleId) {
      const role = roles.get(roleId);
      const member = members.get(userId);
      if (!role || !member) throw new Error(`cannot grant ${roleId} to ${userId}`);
      member.roles.cache.set(roleId, role);
    },
    holders(roleId) {
      const role = roles.get(roleId);
      return role ? [...role.members.keys()].sort() : [];
    },
    mutationCount: () => mutations,
    reactionOn(message) {
      const reaction = message.reactions.cache.get(MARKER);
      if (!reaction) throw new Error(`message ${message.id} has no marker reaction`);
      return reaction as unknown as MessageReaction;
    },
  };
}
