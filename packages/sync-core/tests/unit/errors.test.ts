/**
 * Unit tests for SyncError.
 */
import { describe, it, expect } from "vitest";
import { errorMessage, SyncError, SyncErrorCodes } from "../../src/index.js";

describe("SyncError", () => {
  it("carries code, message and context", () => {
    const error = new SyncError(SyncErrorCodes.AUTHENTICATION_FAILED, "Login rejected", {
      status: 401,
    });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("SyncError");
    expect(error.code).toBe("AUTHENTICATION_FAILED");
    expect(error.message).toBe("Login rejected");
    expect(error.context).toEqual({ status: 401 });
  });

  it("leaves context unset when not provided", () => {
    const error = new SyncError(SyncErrorCodes.FETCH_FAILED, "boom");
    expect("context" in error).toBe(false);
  });

  it("keeps the cause", () => {
    const cause = new Error("socket hang up");
    const error = new SyncError(SyncErrorCodes.FETCH_FAILED, "fetch failed", undefined, { cause });
    expect(error.cause).toBe(cause);
  });

  it("type guards by class and code", () => {
    const error = new SyncError(SyncErrorCodes.FETCH_TIMEOUT, "slow");

    expect(SyncError.isSyncError(error)).toBe(true);
    expect(SyncError.isSyncError(new Error("plain"))).toBe(false);
    expect(SyncError.hasCode(error, SyncErrorCodes.FETCH_TIMEOUT)).toBe(true);
    expect(SyncError.hasCode(error, SyncErrorCodes.FETCH_FAILED)).toBe(false);
  });
});

describe("errorMessage", () => {
  it("reads Error messages and stringifies anything else", () => {
    expect(errorMessage(new Error("bad"))).toBe("bad");
    expect(errorMessage("text")).toBe("text");
    expect(errorMessage(42)).toBe("42");
  });
});
