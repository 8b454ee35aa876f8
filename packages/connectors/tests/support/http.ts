/**
 * In-process stand-ins for fetch and timers.
 */
import type { FetchLike, Sleep } from "../../src/index.js";

export interface RecordedRequest {
  url: string;
  method: string;
  /** Lower-cased header names */
  headers: Record<string, string>;
  body: string | undefined;
}

export type RequestHandler = (request: RecordedRequest) => Response | Promise<Response>;

export interface FetchStub {
  fetch: FetchLike;
  requests: RecordedRequest[];
}

export function stubFetch(handler: RequestHandler): FetchStub {
  const requests: RecordedRequest[] = [];
  const fetch: FetchLike = async (input, init) => {
    const request: RecordedRequest = {
      url: input,
      method: init?.method ?? "GET",
      headers: Object.fromEntries(new Headers(init?.headers).entries()),
      body: typeof init?.body === "string" ? init.body : undefined,
    };
    requests.push(request);
    return handler(request);
  };
  return { fetch, requests };
}

/**
 * Replies in order; the last reply repeats.
 */
export function sequence(...replies: Array<() => Response | Promise<Response>>): RequestHandler {
  let next = 0;
  return () => {
    const reply = replies[Math.min(next, replies.length - 1)];
    next += 1;
    if (reply === undefined) {
      throw new Error("sequence() needs at least one reply");
    }
    return reply();
  };
}

export function json(
  body: unknown,
  init: { status?: number; headers?: Record<string, string> } = {}
): Response {
  return new Response(JSON.stringify(body), {
    status: init.status ?? 200,
    headers: { "Content-Type": "application/json", ...init.headers },
  });
}

export function status(code: number, body = "", headers: Record<string, string> = {}): Response {
  return new Response(body === "" ? null : body, { status: code, headers });
}

export interface SleepRecorder {
  sleep: Sleep;
  delays: number[];
}

/**
 * Resolves immediately and records every requested delay.
 */
export function recordSleeps(): SleepRecorder {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms) => {
      delays.push(ms);
    },
  };
}
