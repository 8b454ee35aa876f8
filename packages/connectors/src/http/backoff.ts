/**
 * Exponential backoff for retried catalog and supplier requests:
 * `min(maxMs, initialMs * base^attempt * jitter)`, where `attempt` counts
 * retries from 0 and `jitter` is a multiplier (random in [0.5, 1.5] unless
 * overridden).
 *
 * @module http/backoff
 */

export interface BackoffOptions {
  initialMs: number;
  /** Growth factor per retry. */
  base: number;
  /** Cap on any single delay. */
  maxMs: number;
  /** Pass `noJitter` for deterministic delays. */
  jitterFn?: (() => number) | undefined;
}

export const BACKOFF_DEFAULTS = {
  initialMs: 1_000,
  base: 2,
  maxMs: 30_000,
} as const;

export const defaultJitter = (): number => 0.5 + Math.random();

export const noJitter = (): number => 1.0;

function requirePositive(name: string, value: number): void {
  if (value <= 0) {
    throw new Error(`Invalid ${name}: ${value}. Must be > 0.`);
  }
}

/**
 * Delay in milliseconds before retry number `attempt` (0-indexed).
 *
 * @example
 * ```typescript
 * calculateBackoff(2, { ...BACKOFF_DEFAULTS, jitterFn: noJitter }); // 4000
 * ```
 */
export function calculateBackoff(attempt: number, options: BackoffOptions): number {
  if (!Number.isInteger(attempt) || attempt < 0) {
    throw new Error(`Invalid attempt number: ${attempt}. Must be an integer >= 0.`);
  }
  requirePositive("initialMs", options.initialMs);
  requirePositive("base", options.base);
  requirePositive("maxMs", options.maxMs);

  const jitter = (options.jitterFn ?? defaultJitter)();
  if (!Number.isFinite(jitter) || jitter <= 0) {
    throw new Error(`Invalid jitter value: ${jitter}. Must be a finite number > 0.`);
  }

  const delay = options.initialMs * options.base ** attempt * jitter;
  return Math.min(options.maxMs, Math.round(delay));
}
