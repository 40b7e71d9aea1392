import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("./logger", () => ({
  getLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

import { PollLoop, calculateNextDelay } from "./poll-loop";

const config = { intervalMs: 2000, minDelayMs: 100 };

describe("calculateNextDelay", () => {
  it("returns interval minus execution time when result is above minDelay", () => {
    expect(calculateNextDelay(300, 2000, 100)).toBe(1700);
  });

  it("returns minDelay when execution time exceeds interval", () => {
    expect(calculateNextDelay(5000, 2000, 100)).toBe(100);
  });
});

describe("PollLoop", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-02T09:00:00Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("starts idle and polls immediately after start()", async () => {
    const task = vi.fn();
    const loop = new PollLoop(config, task);
    expect(loop.getState().status).toBe("idle");

    loop.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(task).toHaveBeenCalledTimes(1);
    expect(loop.getState().pollCount).toBe(1);
    loop.stop();
  });

  it("polls once per interval", async () => {
    const task = vi.fn();
    const loop = new PollLoop(config, task);

    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(6000);

    expect(task).toHaveBeenCalledTimes(4);
    loop.stop();
  });

  it("shortens the next delay by the time the task took", async () => {
    const task = vi.fn(() => new Promise<void>((resolve) => setTimeout(resolve, 500)));
    const loop = new PollLoop(config, task);

    loop.start();
    await vi.advanceTimersByTimeAsync(500);
    await vi.advanceTimersByTimeAsync(0);

    expect(loop.getState().nextPollTime).toBe(Date.now() + 1500);
    loop.stop();
  });

  it("keeps polling after a task failure and counts it", async () => {
    const task = vi
      .fn<() => void>()
      .mockImplementationOnce(() => {
        throw new Error("window query failed");
      })
      .mockImplementation(() => undefined);
    const loop = new PollLoop(config, task);

    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    await vi.advanceTimersByTimeAsync(2000);

    expect(task).toHaveBeenCalledTimes(2);
    expect(loop.getState().errorCount).toBe(1);
    expect(loop.getState().pollCount).toBe(1);
    loop.stop();
  });

  it("stops polling after stop()", async () => {
    const task = vi.fn();
    const loop = new PollLoop(config, task);

    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    loop.stop();
    await vi.advanceTimersByTimeAsync(10000);

    expect(task).toHaveBeenCalledTimes(1);
    expect(loop.getState().status).toBe("stopped");
    expect(loop.getState().nextPollTime).toBeNull();
  });

  it("ignores a poll that finishes after stop()", async () => {
    let release: () => void = () => undefined;
    const task = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        })
    );
    const loop = new PollLoop(config, task);

    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    loop.stop();
    release();
    await vi.advanceTimersByTimeAsync(5000);

    expect(loop.getState().pollCount).toBe(0);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("can be restarted after stop()", async () => {
    const task = vi.fn();
    const loop = new PollLoop(config, task);

    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    loop.stop();
    loop.start();
    await vi.advanceTimersByTimeAsync(0);

    expect(loop.getState().status).toBe("running");
    expect(loop.getState().pollCount).toBe(1);
    expect(task).toHaveBeenCalledTimes(2);
    loop.stop();
  });
});
