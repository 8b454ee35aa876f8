/**
 * Unit tests for RequestThrottle.
 */
import { describe, it, expect } from "vitest";
import { RequestThrottle } from "../../src/index.js";

function manualClock() {
  let time = 0;
  const delays: number[] = [];
  return {
    delays,
    now: () => time,
    sleep: async (ms: number) => {
      delays.push(ms);
      time += ms;
    },
    advance: (ms: number) => {
      time += ms;
    },
  };
}

describe("RequestThrottle", () => {
  it("spaces back-to-back requests by 1/rps seconds", async () => {
    const clock = manualClock();
    const throttle = new RequestThrottle(2, clock);

    await throttle.acquire();
    await throttle.acquire();
    await throttle.acquire();

    expect(clock.delays).toEqual([500, 500]);
  });

  it("does not wait after an idle period", async () => {
    const clock = manualClock();
    const throttle = new RequestThrottle(2, clock);

    await throttle.acquire();
    clock.advance(5000);
    await throttle.acquire();

    expect(clock.delays).toEqual([]);
  });

  it("queues concurrent callers behind each other", async () => {
    const clock = manualClock();
    const throttle = new RequestThrottle(4, { now: () => 0, sleep: clock.sleep });

    await Promise.all([throttle.acquire(), throttle.acquire(), throttle.acquire()]);

    expect(clock.delays).toEqual([250, 500]);
  });

  it("rejects a non-positive rate", () => {
    expect(() => new RequestThrottle(0)).toThrow(
      "Invalid requestsPerSecond: 0. Must be > 0."
    );
  });
});
