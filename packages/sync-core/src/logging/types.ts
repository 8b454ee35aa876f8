/**
 * Logging Types
 *
 * Log levels (most to least verbose):
 * - DEBUG: per-record detail, request traces
 * - INFO: run and supplier milestones
 * - REPORT: run summaries (JSON output)
 * - WARN: flagged changes, catalog data problems, degraded behaviour
 * - ERROR: supplier failures, write failures, aborted runs
 */

import type { UnknownRecord } from "../types.js";

export const LOG_LEVELS = ["DEBUG", "INFO", "REPORT", "WARN", "ERROR"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Priority mapping for log levels.
 * Lower numbers are more verbose.
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  REPORT: 2,
  WARN: 3,
  ERROR: 4,
};

export const DEFAULT_LOG_LEVEL: LogLevel = "INFO";

/**
 * Logger interface.
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Sync", "DEBUG");
 *
 * logger.debug("Record resolved", { ean: "5901234567890", quantity: 4 });
 * logger.info("Supplier fetched", { supplier: "acme", records: 120 });
 * logger.warn("Change flagged", { itemId: "inv-1", reason: "quantity_drop_82%" });
 * logger.error("Supplier failed", { supplier: "acme", error: "timeout" });
 * ```
 */
export interface Logger {
  debug(message: string, data?: UnknownRecord): void;
  info(message: string, data?: UnknownRecord): void;
  /**
   * Aggregated metrics and summaries, emitted as one JSON object.
   */
  report(message: string, data?: UnknownRecord): void;
  warn(message: string, data?: UnknownRecord): void;
  error(message: string, data?: UnknownRecord): void;
}

/**
 * Check if a message at the given level should be logged.
 *
 * @example
 * ```typescript
 * shouldLog("DEBUG", "INFO"); // false - DEBUG is below INFO
 * shouldLog("WARN", "INFO");  // true - WARN is at or above INFO
 * ```
 */
export function shouldLog(messageLevel: LogLevel, configuredLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[messageLevel] >= LOG_LEVEL_PRIORITY[configuredLevel];
}

const LOG_LEVEL_SET = new Set<string>(LOG_LEVELS);

/**
 * Type guard for level names read from flags or the environment.
 */
export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVEL_SET.has(value);
}

/**
 * Parse a level name case-insensitively, falling back to `fallback`.
 */
export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = DEFAULT_LOG_LEVEL
): LogLevel {
  const upper = value?.trim().toUpperCase();
  return isLogLevel(upper) ? upper : fallback;
}
