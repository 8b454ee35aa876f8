/**
 * HTTP Client
 *
 * `fetch` with throttling, bounded retries and typed failures. Shared by the
 * catalog client and every supplier connector.
 *
 * - Network errors and 5xx responses are retried up to `maxRetries` times
 *   with exponential backoff.
 * - 429 responses wait for `Retry-After` and do not count as retries (up to
 *   `maxRateLimitWaits`).
 * - Any other status is returned to the caller; `expectOk` turns it into a
 *   `SyncError`.
 *
 * @module http/HttpClient
 */

import type { z } from "zod";
import { SyncError, SyncErrorCodes, createNoOpLogger, errorMessage } from "@stockrecon/sync-core";
import type { Logger, SyncErrorCode } from "@stockrecon/sync-core";
import { BACKOFF_DEFAULTS, calculateBackoff, type BackoffOptions } from "./backoff.js";
import { defaultSleep, type RequestThrottle, type Sleep } from "./throttle.js";

// =============================================================================
// Types
// =============================================================================

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  fetch?: FetchLike | undefined;
  sleep?: Sleep | undefined;
  throttle?: RequestThrottle | undefined;
  logger?: Logger | undefined;
  /** @default 3 */
  maxRetries?: number | undefined;
  /** @default 20 */
  maxRateLimitWaits?: number | undefined;
  backoff?: Partial<BackoffOptions> | undefined;
}

// =============================================================================
// Constants
// =============================================================================

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_MAX_RATE_LIMIT_WAITS = 20;

/** Wait applied to a 429 without a usable `Retry-After`. */
export const DEFAULT_RETRY_AFTER_MS = 2_000;
const MAX_RETRY_AFTER_MS = 60_000;

const ERROR_BODY_LIMIT = 200;

// =============================================================================
// Helpers
// =============================================================================

/**
 * `Retry-After` as milliseconds: delta-seconds or an HTTP date.
 * Returns undefined when absent or unparseable.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null || value.trim() === "") {
    return undefined;
  }
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Math.min(MAX_RETRY_AFTER_MS, Number(trimmed) * 1000);
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return undefined;
  }
  return Math.min(MAX_RETRY_AFTER_MS, Math.max(0, date - now));
}

async function discardBody(response: Response): Promise<void> {
  if (response.body !== null && !response.bodyUsed) {
    await response.body.cancel();
  }
}

/**
 * Throws a `SyncError` unless the response is 2xx.
 */
export async function expectOk(
  response: Response,
  url: string,
  code: SyncErrorCode = SyncErrorCodes.HTTP_REQUEST_FAILED
): Promise<Response> {
  if (response.ok) {
    return response;
  }
  const body = (await response.text()).slice(0, ERROR_BODY_LIMIT);
  throw new SyncError(code, `HTTP ${response.status} from ${url}`, {
    url,
    status: response.status,
    ...(body === "" ? {} : { body }),
  });
}

/**
 * Response body as parsed JSON.
 */
export async function readJson(response: Response, url: string): Promise<unknown> {
  const text = await response.text();
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new SyncError(
      SyncErrorCodes.HTTP_REQUEST_FAILED,
      `Response from ${url} is not valid JSON`,
      { url },
      { cause: error }
    );
  }
}

/**
 * Validate a response body against the shape the caller reads.
 */
export function parseBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  url: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new SyncError(SyncErrorCodes.HTTP_REQUEST_FAILED, `Unexpected response shape from ${url}`, {
      url,
      issues: result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    });
  }
  return result.data;
}

// =============================================================================
// Client
// =============================================================================

export class HttpClient {
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly throttle: RequestThrottle | undefined;
  private readonly logger: Logger;
  private readonly maxRetries: number;
  private readonly maxRateLimitWaits: number;
  private readonly backoff: BackoffOptions;

  constructor(options: HttpClientOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.throttle = options.throttle;
    this.logger = options.logger ?? createNoOpLogger();
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.maxRateLimitWaits = options.maxRateLimitWaits ?? DEFAULT_MAX_RATE_LIMIT_WAITS;
    this.backoff = { ...BACKOFF_DEFAULTS, ...options.backoff };
  }

  /**
   * Perform a request, retrying transient failures.
   *
   * @throws SyncError HTTP_REQUEST_FAILED when the network keeps failing or
   * the rate limit never lifts. Aborts rethrow the signal's reason.
   */
  async request(url: string, init: RequestInit = {}): Promise<Response> {
    const method = init.method ?? "GET";
    let retries = 0;
    let rateLimitWaits = 0;

    for (;;) {
      init.signal?.throwIfAborted();
      await this.throttle?.acquire();

      let response: Response;
      try {
        response = await this.fetchImpl(url, init);
      } catch (error) {
        if (init.signal?.aborted === true) {
          throw error;
        }
        if (retries >= this.maxRetries) {
          throw new SyncError(
            SyncErrorCodes.HTTP_REQUEST_FAILED,
            `${method} ${url} failed after ${retries + 1} attempts: ${errorMessage(error)}`,
            { url, attempts: retries + 1 },
            { cause: error }
          );
        }
        const delayMs = calculateBackoff(retries, this.backoff);
        retries += 1;
        this.logger.warn("Request failed, retrying", {
          url,
          error: errorMessage(error),
          attempt: retries,
          delayMs,
        });
        await this.pause(delayMs, init.signal);
        continue;
      }

      if (response.status === 429) {
        if (rateLimitWaits >= this.maxRateLimitWaits) {
          await discardBody(response);
          throw new SyncError(
            SyncErrorCodes.HTTP_REQUEST_FAILED,
            `${method} ${url} rate limited ${rateLimitWaits + 1} times`,
            { url, status: 429 }
          );
        }
        const delayMs =
          parseRetryAfter(response.headers.get("Retry-After")) ?? DEFAULT_RETRY_AFTER_MS;
        rateLimitWaits += 1;
        this.logger.info("Rate limited, waiting", { url, delayMs });
        await discardBody(response);
        await this.pause(delayMs, init.signal);
        continue;
      }

      if (response.status >= 500 && retries < this.maxRetries) {
        const delayMs = calculateBackoff(retries, this.backoff);
        retries += 1;
        this.logger.warn("Server error, retrying", {
          url,
          status: response.status,
          attempt: retries,
          delayMs,
        });
        await discardBody(response);
        await this.pause(delayMs, init.signal);
        continue;
      }

      this.logger.debug("Request completed", { method, url, status: response.status });
      return response;
    }
  }

  private async pause(ms: number, signal: AbortSignal | null | undefined): Promise<void> {
    try {
      await this.sleep(ms, signal ?? undefined);
    } catch (error) {
      signal?.throwIfAborted();
      throw error;
    }
  }
}
