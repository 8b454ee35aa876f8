/**
 * Logging Module
 *
 * @example
 * ```typescript
 * import { createScopedLogger, parseLogLevel } from "@stockrecon/sync-core";
 *
 * const level = parseLogLevel(process.env["LOG_LEVEL"]);
 * const logger = createScopedLogger("Sync", level);
 * ```
 */

// Types
export type { Logger, LogLevel } from "./types.js";
export {
  LOG_LEVELS,
  LOG_LEVEL_PRIORITY,
  DEFAULT_LOG_LEVEL,
  shouldLog,
  isLogLevel,
  parseLogLevel,
} from "./types.js";

// Factories
export { createScopedLogger, createNoOpLogger, createChildLogger } from "./scoped.js";

// Testing utilities
export type { LogCall, MockLogger } from "./testing.js";
export { createMockLogger } from "./testing.js";
