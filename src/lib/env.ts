/**
 * Scrimkeeper — src/lib/env.ts
 * WHAT: Environment loading/validation via dotenv + zod.
 * WHY: Fail-fast on missing secrets and IDs; keep process.env access centralized.
 * FLOWS: load .env → parse/validate → export typed env object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import dotenv from "dotenv";
import path from "node:path";
import { z } from "zod";

// override: true outside tests so .env wins over a stale shell;
// false in tests so tests/setup.ts values survive.
const isTest = process.env.NODE_ENV === "test" || !!process.env.VITEST_WORKER_ID;
dotenv.config({ path: path.join(process.cwd(), ".env"), override: !isTest });

// Discord snowflakes are 17-20 digit integers serialized as strings
const snowflake = (name: string) =>
  z.string().regex(/^\d{17,20}$/, `${name} must be a Discord ID (17-20 digits)`);

/**
 * Comma-separated ID lists ("123, 456, ") → ["123", "456"].
 * Empty or missing means no entries.
 */
const idList = z
  .string()
  .optional()
  .transform((val) =>
    (val ?? "")
      .split(",")
      .map((id) => id.trim())
      .filter((id) => id.length > 0)
  );

/**
 * Raw environment extraction. Every variable gets trimmed to handle
 * stray whitespace in .env files.
 */
const raw = {
  DISCORD_TOKEN: process.env.DISCORD_TOKEN?.trim(),
  CLIENT_ID: process.env.CLIENT_ID?.trim(),
  GUILD_ID: process.env.GUILD_ID?.trim(),
  NODE_ENV: process.env.NODE_ENV?.trim(),
  DB_PATH: process.env.DB_PATH?.trim(),
  SENTRY_DSN: process.env.SENTRY_DSN?.trim(),
  SENTRY_ENVIRONMENT: process.env.SENTRY_ENVIRONMENT?.trim(),
  SENTRY_TRACES_SAMPLE_RATE: process.env.SENTRY_TRACES_SAMPLE_RATE?.trim(),
  LOG_LEVEL: process.env.LOG_LEVEL?.trim(),

  // Scrim channels and roles
  SCRIM_SIGNUP_CHANNEL_ID: process.env.SCRIM_SIGNUP_CHANNEL_ID?.trim(),
  SCRIM_ANNOUNCE_CHANNEL_ID: process.env.SCRIM_ANNOUNCE_CHANNEL_ID?.trim(),
  SCRIM_MEETING_CHANNEL_ID: process.env.SCRIM_MEETING_CHANNEL_ID?.trim(),
  SCRIM_REGISTERED_ROLE_ID: process.env.SCRIM_REGISTERED_ROLE_ID?.trim(),
  SCRIM_ACTIVE_ROLE_ID: process.env.SCRIM_ACTIVE_ROLE_ID?.trim(),
  SCRIM_SPECTATOR_ROLE_ID: process.env.SCRIM_SPECTATOR_ROLE_ID?.trim(),
  SCRIM_MENTION_ROLE_IDS: process.env.SCRIM_MENTION_ROLE_IDS?.trim(),
  SCRIM_ADMIN_ROLE_IDS: process.env.SCRIM_ADMIN_ROLE_IDS?.trim(),
  SCRIM_MARKER_EMOJI: process.env.SCRIM_MARKER_EMOJI?.trim(),

  // Scrim timing
  SCRIM_TICK_INTERVAL_SECONDS: process.env.SCRIM_TICK_INTERVAL_SECONDS?.trim(),
  SCRIM_WARNING_LEAD_MINUTES: process.env.SCRIM_WARNING_LEAD_MINUTES?.trim(),
  SCRIM_WARNING_TOLERANCE_MINUTES: process.env.SCRIM_WARNING_TOLERANCE_MINUTES?.trim(),
  SCRIM_START_TOLERANCE_MINUTES: process.env.SCRIM_START_TOLERANCE_MINUTES?.trim(),
};

/**
 * Schema defines what's required vs optional. Channel and role IDs are required
 * because every reconciliation pass needs them; there is no sane default.
 */
const schema = z.object({
  DISCORD_TOKEN: z.string().min(1, "Missing DISCORD_TOKEN"),
  CLIENT_ID: z.string().min(1, "Missing CLIENT_ID"),
  GUILD_ID: snowflake("GUILD_ID"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  DB_PATH: z.string().default("data/data.db"),

  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),

  LOG_LEVEL: z.string().optional(),

  SCRIM_SIGNUP_CHANNEL_ID: snowflake("SCRIM_SIGNUP_CHANNEL_ID"),
  SCRIM_ANNOUNCE_CHANNEL_ID: snowflake("SCRIM_ANNOUNCE_CHANNEL_ID").optional(),
  SCRIM_MEETING_CHANNEL_ID: snowflake("SCRIM_MEETING_CHANNEL_ID"),
  SCRIM_REGISTERED_ROLE_ID: snowflake("SCRIM_REGISTERED_ROLE_ID"),
  SCRIM_ACTIVE_ROLE_ID: snowflake("SCRIM_ACTIVE_ROLE_ID"),
  SCRIM_SPECTATOR_ROLE_ID: snowflake("SCRIM_SPECTATOR_ROLE_ID"),
  SCRIM_MENTION_ROLE_IDS: idList,
  SCRIM_ADMIN_ROLE_IDS: idList,
  SCRIM_MARKER_EMOJI: z.string().min(1).default("✅"),

  SCRIM_TICK_INTERVAL_SECONDS: z.coerce.number().int().min(10).default(60),
  SCRIM_WARNING_LEAD_MINUTES: z.coerce.number().int().min(1).default(30),
  SCRIM_WARNING_TOLERANCE_MINUTES: z.coerce.number().int().min(1).default(2),
  SCRIM_START_TOLERANCE_MINUTES: z.coerce.number().int().min(1).default(5),
});

export type Env = z.infer<typeof schema>;

/**
 * safeParse so every problem is listed at once instead of one per restart.
 */
const parsed = schema.safeParse(raw);
if (!parsed.success) {
  const issues = parsed.error.issues.map((i) => `- ${i.path.join(".")}: ${i.message}`).join("\n");
  console.error(`Environment validation failed:\n${issues}`);
  process.exit(1);
}
export const env: Env = parsed.data;
