/**
 * Sync Errors
 *
 * Every failure the sync pipeline raises or records carries a code from
 * `SyncErrorCodes`. Connectors throw `SyncError`; the orchestrator turns it
 * into a report entry.
 */

import type { UnknownRecord } from "./types.js";

export const SyncErrorCodes = {
  /** Missing or malformed configuration; fatal before a run starts */
  CONFIGURATION_INVALID: "CONFIGURATION_INVALID",
  /** Catalog listing failed; fatal to the run */
  CATALOG_SNAPSHOT_FAILED: "CATALOG_SNAPSHOT_FAILED",
  AUTHENTICATION_FAILED: "AUTHENTICATION_FAILED",
  FETCH_FAILED: "FETCH_FAILED",
  FETCH_TIMEOUT: "FETCH_TIMEOUT",
  /** A lookup supplier found none of the identifiers it was asked for */
  SUPPLIER_EMPTY_RESULT: "SUPPLIER_EMPTY_RESULT",
  INVALID_RECORD: "INVALID_RECORD",
  UNMAPPED_STATUS: "UNMAPPED_STATUS",
  CATALOG_WRITE_FAILED: "CATALOG_WRITE_FAILED",
  NOTIFICATION_FAILED: "NOTIFICATION_FAILED",
  /** A persisted report failed schema validation */
  REPORT_INVALID: "REPORT_INVALID",
  /** Non-retryable HTTP status or retries exhausted */
  HTTP_REQUEST_FAILED: "HTTP_REQUEST_FAILED",
} as const;

export type SyncErrorCode = (typeof SyncErrorCodes)[keyof typeof SyncErrorCodes];

/**
 * Typed error for sync failures.
 *
 * @example
 * ```typescript
 * throw new SyncError(SyncErrorCodes.AUTHENTICATION_FAILED, "Login rejected", {
 *   supplier: "acme",
 *   status: 401,
 * });
 * ```
 */
export class SyncError<TCode extends string = SyncErrorCode> extends Error {
  /**
   * Error code for programmatic handling.
   */
  public readonly code: TCode;

  /**
   * Additional context for debugging and the report entry.
   */
  public readonly context?: UnknownRecord;

  constructor(code: TCode, message: string, context?: UnknownRecord, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    // Only set context if provided (satisfies exactOptionalPropertyTypes)
    if (context !== undefined) {
      this.context = context;
    }
    this.name = "SyncError";
  }

  static isSyncError(error: unknown): error is SyncError {
    return error instanceof SyncError;
  }

  /**
   * Type guard for a specific code.
   */
  static hasCode<T extends string>(error: unknown, code: T): error is SyncError<T> {
    return SyncError.isSyncError(error) && error.code === code;
  }
}

/**
 * Message text of any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
