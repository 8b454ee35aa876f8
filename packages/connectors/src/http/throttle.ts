/**
 * Request Throttle
 *
 * Spaces calls so that no more than `requestsPerSecond` start in any second.
 * One throttle is shared by every request a client makes.
 *
 * @module http/throttle
 */

import { setTimeout as delay } from "node:timers/promises";

/**
 * Waits `ms`; rejects early once `signal` aborts.
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, signal === undefined ? undefined : { signal });
};

export interface ThrottleOptions {
  now?: (() => number) | undefined;
  sleep?: Sleep | undefined;
}

export class RequestThrottle {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly sleep: Sleep;
  private nextSlot = Number.NEGATIVE_INFINITY;

  constructor(requestsPerSecond: number, options: ThrottleOptions = {}) {
    if (!(requestsPerSecond > 0)) {
      throw new Error(`Invalid requestsPerSecond: ${requestsPerSecond}. Must be > 0.`);
    }
    this.intervalMs = 1000 / requestsPerSecond;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Resolves when the caller may start its request.
   */
  async acquire(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    // Reserve before waiting so concurrent callers queue behind each other
    this.nextSlot = slot + this.intervalMs;
    const wait = slot - now;
    if (wait > 0) {
      await this.sleep(wait);
    }
  }
}
