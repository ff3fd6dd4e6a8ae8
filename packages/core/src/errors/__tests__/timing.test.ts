import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { abortableSleep, throwIfAborted, withTimeout } from "../timing.js";
import { CancelledError } from "../types.js";

describe("abortableSleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve after the delay", async () => {
    const done = vi.fn();
    const sleeping = abortableSleep(100).then(done);

    await vi.advanceTimersByTimeAsync(99);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    await sleeping;
    expect(done).toHaveBeenCalledTimes(1);
  });

  it("should reject with CancelledError when aborted mid-sleep", async () => {
    const controller = new AbortController();
    const sleeping = abortableSleep(1000, controller.signal);
    const assertion = expect(sleeping).rejects.toBeInstanceOf(CancelledError);

    controller.abort();

    await assertion;
  });

  it("should reject immediately when already aborted", async () => {
    await expect(abortableSleep(10, AbortSignal.abort())).rejects.toBeInstanceOf(CancelledError);
  });
});

describe("throwIfAborted", () => {
  it("should pass a live signal", () => {
    expect(() => throwIfAborted(new AbortController().signal)).not.toThrow();
  });

  it("should throw for an aborted signal", () => {
    expect(() => throwIfAborted(AbortSignal.abort(), "stop")).toThrow("stop");
  });
});

describe("withTimeout", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should resolve when the work finishes in time", async () => {
    const result = withTimeout(async () => "done", 100, { onTimeout: () => new Error("late") });
    await expect(result).resolves.toBe("done");
  });

  it("should reject with the timeout error and abort the inner signal", async () => {
    let inner: AbortSignal | undefined;
    const result = withTimeout(
      (signal) => {
        inner = signal;
        return new Promise<string>(() => undefined);
      },
      100,
      { onTimeout: () => new Error("late") }
    );
    const assertion = expect(result).rejects.toThrow("late");

    await vi.advanceTimersByTimeAsync(100);

    await assertion;
    expect(inner?.aborted).toBe(true);
  });

  it("should reject with CancelledError when the outer signal fired before starting", async () => {
    const work = vi.fn(async () => "done");

    await expect(
      withTimeout(work, 100, { signal: AbortSignal.abort(), onTimeout: () => new Error("late") })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(work).not.toHaveBeenCalled();
  });

  it("should let started work finish when the outer signal aborts", async () => {
    const controller = new AbortController();
    let inner: AbortSignal | undefined;
    const result = withTimeout(
      (signal) => {
        inner = signal;
        return new Promise<string>((resolve) => setTimeout(() => resolve("done"), 50));
      },
      1000,
      { signal: controller.signal, onTimeout: () => new Error("late") }
    );

    controller.abort();
    await vi.advanceTimersByTimeAsync(50);

    await expect(result).resolves.toBe("done");
    expect(inner?.aborted).toBe(false);
  });
});
