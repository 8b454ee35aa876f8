/**
 * ## Scoped Loggers
 *
 * Component loggers: every line carries a `[scope]` prefix and lines below
 * the configured level are dropped. Each level writes through its own
 * console method, so `--log-level` and the host's stream routing compose.
 *
 * | Level | Console method | Line |
 * |-------|----------------|------|
 * | DEBUG | `debug` | `[scope] message {data}` |
 * | INFO | `info` | `[scope] message {data}` |
 * | REPORT | `log` | `{"scope":...,"message":...,...data,"timestamp":...}` |
 * | WARN | `warn` | `[scope] message {data}` |
 * | ERROR | `error` | `[scope] message {data}` |
 *
 * @example
 * ```typescript
 * const logger = createScopedLogger("Sync", "INFO");
 *
 * logger.debug("Record resolved");                     // dropped
 * logger.error("Supplier failed", { supplier: "acme" });
 * // [Sync] Supplier failed {"supplier":"acme"}
 * ```
 */

import type { UnknownRecord } from "../types.js";
import type { Logger, LogLevel } from "./types.js";
import { DEFAULT_LOG_LEVEL, shouldLog } from "./types.js";

type ConsoleMethod = "debug" | "info" | "log" | "warn" | "error";

const CONSOLE_METHOD: Record<LogLevel, ConsoleMethod> = {
  DEBUG: "debug",
  INFO: "info",
  REPORT: "log",
  WARN: "warn",
  ERROR: "error",
};

/**
 * Looked up on every call so tests can spy on console after import.
 */
function write(method: ConsoleMethod, line: string): void {
  globalThis.console[method](line);
}

function formatLine(prefix: string, message: string, data: UnknownRecord | undefined): string {
  return data !== undefined && Object.keys(data).length > 0
    ? `${prefix} ${message} ${JSON.stringify(data)}`
    : `${prefix} ${message}`;
}

/**
 * Create a scoped logger with level filtering.
 *
 * @param scope - Prefix for log lines (e.g. "Supplier:acme")
 * @param level - Minimum level to emit
 */
export function createScopedLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const prefix = `[${scope}]`;

  const emit =
    (messageLevel: LogLevel) =>
    (message: string, data?: UnknownRecord): void => {
      if (!shouldLog(messageLevel, level)) {
        return;
      }
      const line =
        messageLevel === "REPORT"
          ? JSON.stringify({ scope, message, ...data, timestamp: Date.now() })
          : formatLine(prefix, message, data);
      write(CONSOLE_METHOD[messageLevel], line);
    };

  return {
    debug: emit("DEBUG"),
    info: emit("INFO"),
    report: emit("REPORT"),
    warn: emit("WARN"),
    error: emit("ERROR"),
  };
}

/**
 * Logger that discards everything; the default wherever a logger is optional.
 */
export function createNoOpLogger(): Logger {
  const discard = (): void => {};
  return { debug: discard, info: discard, report: discard, warn: discard, error: discard };
}

/**
 * Logger scoped `parentScope:childScope`.
 *
 * @example
 * ```typescript
 * createChildLogger("Supplier", "acme", "DEBUG"); // logs as [Supplier:acme]
 * ```
 */
export function createChildLogger(
  parentScope: string,
  childScope: string,
  level: LogLevel = DEFAULT_LOG_LEVEL
): Logger {
  return createScopedLogger(`${parentScope}:${childScope}`, level);
}
