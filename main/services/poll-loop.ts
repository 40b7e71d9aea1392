/**
 * PollLoop - self-correcting activity polling with delay compensation
 *
 * Drives SessionTracker.update() at a fixed cadence. A slow or failing poll
 * never stops the loop: the next delay is shortened by the time the poll took,
 * down to minDelayMs.
 */

import { getLogger } from "./logger";

const logger = getLogger("poll-loop");

export type PollLoopStatus = "idle" | "running" | "stopped";

export interface PollLoopConfig {
  intervalMs: number;
  minDelayMs: number;
}

export interface PollLoopState {
  status: PollLoopStatus;
  lastPollTime: number | null;
  nextPollTime: number | null;
  pollCount: number;
  errorCount: number;
}

export type PollTask = () => void | Promise<void>;

/** Calculate next delay with compensation for execution time */
export function calculateNextDelay(
  executionTime: number,
  interval: number,
  minDelay: number
): number {
  const compensatedDelay = interval - executionTime;
  return Math.max(compensatedDelay, minDelay);
}

function initialState(): PollLoopState {
  return {
    status: "idle",
    lastPollTime: null,
    nextPollTime: null,
    pollCount: 0,
    errorCount: 0,
  };
}

export class PollLoop {
  private readonly config: PollLoopConfig;
  private state: PollLoopState = initialState();
  private timerId: ReturnType<typeof setTimeout> | null = null;
  private generation = 0;

  constructor(
    config: PollLoopConfig,
    private readonly task: PollTask
  ) {
    this.config = { ...config };
  }

  start(): void {
    if (this.state.status === "running") {
      return;
    }

    if (this.state.status === "stopped") {
      this.state = initialState();
    }

    this.generation++;
    this.state.status = "running";
    logger.info({ intervalMs: this.config.intervalMs }, "Poll loop started");
    // First poll runs right away so a fresh session opens without waiting a full interval
    this.scheduleNext(0);
  }

  stop(): void {
    if (this.state.status === "stopped") {
      return;
    }

    this.cancelTimer();
    this.generation++;
    this.state.status = "stopped";
    this.state.nextPollTime = null;
    logger.info(
      { pollCount: this.state.pollCount, errorCount: this.state.errorCount },
      "Poll loop stopped"
    );
  }

  getState(): PollLoopState {
    return { ...this.state };
  }

  private scheduleNext(delay: number): void {
    this.state.nextPollTime = Date.now() + delay;
    this.timerId = setTimeout(() => {
      this.timerId = null;
      void this.executePoll();
    }, delay);
  }

  private async executePoll(): Promise<void> {
    if (this.state.status !== "running") {
      return;
    }

    const generationAtStart = this.generation;
    const startTime = Date.now();

    try {
      await this.task();

      if (this.generation !== generationAtStart || this.state.status !== "running") {
        return;
      }
      this.state.lastPollTime = startTime;
      this.state.pollCount++;
    } catch (error) {
      if (this.generation !== generationAtStart || this.state.status !== "running") {
        return;
      }

      this.state.errorCount++;
      logger.error({ error, errorCount: this.state.errorCount }, "Poll task failed");
    }

    const executionTime = Date.now() - startTime;
    this.scheduleNext(
      calculateNextDelay(executionTime, this.config.intervalMs, this.config.minDelayMs)
    );
  }

  private cancelTimer(): void {
    if (this.timerId !== null) {
      clearTimeout(this.timerId);
      this.timerId = null;
    }
  }

}
