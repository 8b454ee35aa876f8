/**
 * Shared utility types.
 */

/**
 * Structured log and error context.
 */
export type UnknownRecord = Record<string, unknown>;
