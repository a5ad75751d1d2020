import { describe, it, expect, beforeEach, vi } from "vitest";
import { InvalidInputError, RetrievalCancelledError, TimeoutError } from "../errors/index.js";
import { MAX_ATTEMPTS, callExternal, sleep, withTimeout } from "./index.js";

const base = { dependency: "graph", timeoutMs: 50, retryBackoffMs: 0, queryHash: "abc123" };

beforeEach(() => {
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

describe("withTimeout", () => {
  it("resolves with the call's value", async () => {
    await expect(withTimeout(async () => 42, "index", 50)).resolves.toBe(42);
  });

  it("rejects with TimeoutError and aborts the attempt's signal", async () => {
    let attemptSignal: AbortSignal | undefined;
    const never = (signal: AbortSignal): Promise<never> => {
      attemptSignal = signal;
      return new Promise(() => {});
    };
    await expect(withTimeout(never, "index", 10)).rejects.toBeInstanceOf(TimeoutError);
    expect(attemptSignal?.aborted).toBe(true);
  });

  it("rejects with RetrievalCancelledError when the outer signal aborts", async () => {
    const controller = new AbortController();
    const pending = withTimeout(() => new Promise<never>(() => {}), "index", 1000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(RetrievalCancelledError);
  });
});

describe("callExternal", () => {
  it("retries a transient failure once", async () => {
    const fn = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValueOnce(new Error("connection reset"))
      .mockResolvedValueOnce("ok");

    await expect(callExternal(fn, base)).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringMatching(
        /^\[graph\] attempt 1\/2 failed after \d+ms \(query abc123\): connection reset - retrying in 0ms$/,
      ),
    );
  });

  it("gives up after MAX_ATTEMPTS", async () => {
    const fn = vi.fn<(signal: AbortSignal) => Promise<string>>().mockRejectedValue(new Error("down"));
    await expect(callExternal(fn, base)).rejects.toThrow("down");
    expect(fn).toHaveBeenCalledTimes(MAX_ATTEMPTS);
  });

  it("retries a timeout", async () => {
    const fn = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockImplementationOnce(() => new Promise(() => {}))
      .mockResolvedValueOnce("late but fine");
    await expect(callExternal(fn, { ...base, timeoutMs: 10 })).resolves.toBe("late but fine");
  });

  it("does not retry invalid input", async () => {
    const fn = vi
      .fn<(signal: AbortSignal) => Promise<string>>()
      .mockRejectedValue(new InvalidInputError("bad"));
    await expect(callExternal(fn, base)).rejects.toBeInstanceOf(InvalidInputError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("never starts when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn<(signal: AbortSignal) => Promise<string>>().mockResolvedValue("ok");
    await expect(callExternal(fn, { ...base, signal: controller.signal })).rejects.toBeInstanceOf(
      RetrievalCancelledError,
    );
    expect(fn).not.toHaveBeenCalled();
  });

  it("does not retry or log a cancelled attempt", async () => {
    const controller = new AbortController();
    const fn = vi.fn<(signal: AbortSignal) => Promise<string>>().mockImplementation(() => {
      controller.abort();
      return new Promise(() => {});
    });
    await expect(callExternal(fn, { ...base, signal: controller.signal })).rejects.toBeInstanceOf(
      RetrievalCancelledError,
    );
    expect(fn).toHaveBeenCalledTimes(1);
    expect(console.warn).not.toHaveBeenCalled();
  });
});

describe("sleep", () => {
  it("rejects early on abort", async () => {
    const controller = new AbortController();
    const pending = sleep(1000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(RetrievalCancelledError);
  });
});
