export {
  calculateBackoff,
  defaultJitter,
  noJitter,
  BACKOFF_DEFAULTS,
  type BackoffOptions,
} from "./backoff.js";
export { RequestThrottle, defaultSleep, type Sleep, type ThrottleOptions } from "./throttle.js";
export {
  HttpClient,
  expectOk,
  readJson,
  parseBody,
  parseRetryAfter,
  DEFAULT_MAX_RETRIES,
  DEFAULT_MAX_RATE_LIMIT_WAITS,
  DEFAULT_RETRY_AFTER_MS,
  type FetchLike,
  type HttpClientOptions,
} from "./HttpClient.js";
