/**
 * Testing utilities for logging.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * await new SyncOrchestrator({ ...deps, logger }).run();
 *
 * expect(logger.hasLoggedAt("ERROR", "Supplier skipped")).toBe(true);
 * expect(logger.getLastCallAt("REPORT")?.data).toMatchObject({ status: "completed" });
 * ```
 */

import type { Logger, LogLevel } from "./types.js";
import type { UnknownRecord } from "../types.js";

export interface LogCall {
  level: LogLevel;
  message: string;
  data: UnknownRecord | undefined;
  timestamp: number;
}

/**
 * Logger that records every call instead of writing it.
 */
export interface MockLogger extends Logger {
  readonly calls: ReadonlyArray<LogCall>;

  clear(): void;

  getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall>;

  /** Substring match on the message, any level. */
  hasLoggedMessage(message: string): boolean;

  /** Substring match on the message at one level. */
  hasLoggedAt(level: LogLevel, message: string): boolean;

  getLastCallAt(level: LogLevel): LogCall | undefined;
}

class RecordingLogger implements MockLogger {
  private readonly recorded: LogCall[] = [];

  readonly debug = this.recorder("DEBUG");
  readonly info = this.recorder("INFO");
  readonly report = this.recorder("REPORT");
  readonly warn = this.recorder("WARN");
  readonly error = this.recorder("ERROR");

  get calls(): ReadonlyArray<LogCall> {
    return this.recorded;
  }

  clear(): void {
    this.recorded.length = 0;
  }

  getCallsAtLevel(level: LogLevel): ReadonlyArray<LogCall> {
    return this.recorded.filter((call) => call.level === level);
  }

  hasLoggedMessage(message: string): boolean {
    return this.recorded.some((call) => call.message.includes(message));
  }

  hasLoggedAt(level: LogLevel, message: string): boolean {
    return this.getCallsAtLevel(level).some((call) => call.message.includes(message));
  }

  getLastCallAt(level: LogLevel): LogCall | undefined {
    const atLevel = this.getCallsAtLevel(level);
    return atLevel[atLevel.length - 1];
  }

  private recorder(level: LogLevel): (message: string, data?: UnknownRecord) => void {
    return (message, data) => {
      this.recorded.push({ level, message, data, timestamp: Date.now() });
    };
  }
}

/**
 * Create a mock logger for tests. `calls` grows without bound; `clear()`
 * between phases of a long test.
 */
export function createMockLogger(): MockLogger {
  return new RecordingLogger();
}
