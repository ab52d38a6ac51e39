/**
 * Scrimkeeper — src/lib/constants.ts
 * WHAT: Process-level timeouts and delays
 * WHY: Single source of truth for magic numbers the entrypoint needs
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

/** Grace period before exit on uncaught exception (for Sentry flush) */
export const UNCAUGHT_EXCEPTION_EXIT_DELAY_MS = 1000;

/** How long shutdown waits for Sentry to drain */
export const SHUTDOWN_SENTRY_FLUSH_MS = 2000;

/** Hard stop if graceful shutdown hangs */
export const SHUTDOWN_FORCE_EXIT_MS = 10_000;
