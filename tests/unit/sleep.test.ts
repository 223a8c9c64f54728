import { describe, it, expect, afterEach, beforeEach, vi } from "vitest";
import { sleep } from "../../src/utils/sleep.js";

describe("sleep", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("resolves after the delay", async () => {
    let done = false;
    const pending = sleep(1000).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(999);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await pending;
    expect(done).toBe(true);
  });

  it("resolves early when aborted", async () => {
    const controller = new AbortController();
    let done = false;
    const pending = sleep(60_000, controller.signal).then(() => {
      done = true;
    });

    controller.abort();
    await pending;
    expect(done).toBe(true);
    expect(vi.getTimerCount()).toBe(0);
  });

  it("returns immediately for an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();

    await sleep(60_000, controller.signal);
    expect(vi.getTimerCount()).toBe(0);
  });
});
