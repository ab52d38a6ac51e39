/**
 * Scrimkeeper — src/lib/errors.ts
 * WHAT: Discriminated union error types for precise error handling
 * WHY: Reconciliation treats "gone", "forbidden" and "try again later" differently
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isNotFound(err) → stale reference, self-heal and move on
 *  - isRecoverable(err) → transient, leave it for the next tick
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  import { classifyError, isNotFound } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (isNotFound(classified)) { untrack(...) }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Type Definitions =====

/**
 * Base shape of the union. `kind` is the discriminator so switch statements
 * narrow without instanceof checks across module boundaries.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/** SQLite errors surfaced by better-sqlite3 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
}

/**
 * Discord API errors that aren't covered by a more specific kind below.
 * See: https://discord.com/developers/docs/topics/opcodes-and-status-codes
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

/**
 * A message, member, channel, role or scheduled event that no longer exists.
 * Always self-healing: drop the reference and keep going.
 */
export interface NotFoundError extends AppError {
  kind: "not_found";
  code: number;
  entity: "channel" | "guild" | "member" | "message" | "role" | "scheduled_event" | "user" | "unknown";
}

/** Missing Discord permissions (50013) or access (50001) */
export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
}

/** Node system-level network errors; transient */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

/** Document store failure (I/O or a document that doesn't parse) */
export interface StoreFailure extends AppError {
  kind: "store";
  reason: "io" | "corrupt";
  key: string;
}

/** Scrim state conflicts (a second live session, nothing to end) */
export interface ConflictError extends AppError {
  kind: "conflict";
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DbError
  | DiscordApiError
  | NotFoundError
  | PermissionError
  | NetworkError
  | StoreFailure
  | ConflictError
  | UnknownError;

// ===== Thrown Error Classes =====

/**
 * Thrown by the document store. Carries the document key so logs say which
 * snapshot couldn't be read or written.
 */
export class StoreError extends Error {
  override readonly name = "StoreError";

  constructor(
    readonly reason: "io" | "corrupt",
    readonly key: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Thrown when a lifecycle operation contradicts the single-session rule.
 * Commands turn these into a plain reply; they are never reported to Sentry.
 */
export class ScrimConflictError extends Error {
  override readonly name = "ScrimConflictError";
}

// ===== Error Classification =====

/**
 * Discord JSON error codes meaning "that thing is gone".
 * 10003 Unknown Channel, 10004 Unknown Guild, 10007 Unknown Member,
 * 10008 Unknown Message, 10011 Unknown Role, 10013 Unknown User,
 * 10070 Unknown Guild Scheduled Event.
 */
const NOT_FOUND_CODES: Record<number, NotFoundError["entity"]> = {
  10003: "channel",
  10004: "guild",
  10007: "member",
  10008: "message",
  10011: "role",
  10013: "user",
  10070: "scheduled_event",
};

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function readProp(obj: object, key: string): unknown {
  return (obj as Record<string, unknown>)[key];
}

/**
 * Classify any caught error into the union. Ordered from most specific to
 * least: our own error classes, SQLite, Discord not-found/permission, other
 * Discord API errors, network, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;

  if (err instanceof StoreError) {
    return { kind: "store", reason: err.reason, key: err.key, message: err.message, cause };
  }
  if (err instanceof ScrimConflictError) {
    return { kind: "conflict", message: err.message, cause };
  }

  if (typeof err !== "object") {
    return { kind: "unknown", message: String(err) };
  }

  const messageProp = readProp(err, "message");
  const message = typeof messageProp === "string" ? messageProp : String(err);
  const code = readProp(err, "code");
  const nameProp = readProp(err, "name");
  const name = typeof nameProp === "string" ? nameProp : undefined;

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    return { kind: "db_error", code: typeof code === "string" ? code : "UNKNOWN", message, cause };
  }

  if (typeof code === "number") {
    const entity = NOT_FOUND_CODES[code];
    if (entity) {
      return { kind: "not_found", code, entity, message, cause };
    }
    // 50013 = Missing Permissions, 50001 = Missing Access
    if (code === 50013) {
      return { kind: "permission", needed: ["ManageRoles"], message, cause };
    }
    if (code === 50001) {
      return { kind: "permission", needed: ["ViewChannel"], message, cause };
    }
    if (name === "DiscordAPIError" || name?.includes("Discord")) {
      const status = readProp(err, "status");
      const method = readProp(err, "method");
      const url = readProp(err, "url");
      return {
        kind: "discord_api",
        code,
        httpStatus: typeof status === "number" ? status : undefined,
        method: typeof method === "string" ? method : undefined,
        path: typeof url === "string" ? url : undefined,
        message,
        cause,
      };
    }
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    const host = readProp(err, "hostname") ?? readProp(err, "host");
    return {
      kind: "network",
      code,
      host: typeof host === "string" ? host : undefined,
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

export function isNotFound(err: ClassifiedError): err is NotFoundError {
  return err.kind === "not_found";
}

/**
 * Transient failures worth deferring to the next tick rather than giving up on.
 * Rate limits (429) are queued by discord.js itself and never reach us.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;
    case "db_error":
      return err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED";
    case "store":
      return err.reason === "io";
    case "discord_api": {
      const status = err.httpStatus ?? 0;
      return status >= 500 && status < 600;
    }
    default:
      return false;
  }
}

/**
 * Sentry should mean "something is broken", not "a member left mid-pass".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "not_found":
    case "permission":
    case "network":
    case "conflict":
      return false;
    case "discord_api":
      // 10062 Unknown interaction, 40060 already acknowledged
      return err.code !== 10062 && err.code !== 40060;
    default:
      return true;
  }
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "db_error":
      return { ...base, sqlCode: err.code };
    case "discord_api":
      return { ...base, discordCode: err.code, httpStatus: err.httpStatus, method: err.method, path: err.path };
    case "not_found":
      return { ...base, discordCode: err.code, entity: err.entity };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "permission":
      return { ...base, neededPerms: err.needed };
    case "store":
      return { ...base, storeKey: err.key, storeReason: err.reason };
    default:
      return base;
  }
}

/**
 * Get a user-friendly error message for command replies
 */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "conflict":
      return err.message;
    case "permission":
      return `I'm missing permissions: ${err.needed.join(", ")}`;
    case "not_found":
      return `That ${err.entity.replace("_", " ")} no longer exists.`;
    case "store":
      return "Scrim data is temporarily unavailable. Please try again in a minute.";
    case "network":
      return "Network error talking to Discord. Please try again.";
    case "db_error":
      return err.code === "SQLITE_BUSY"
        ? "Database is temporarily busy. Please try again."
        : "A database error occurred.";
    default:
      return "An unexpected error occurred.";
  }
}
