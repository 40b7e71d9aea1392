import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as fc from "fast-check";

vi.mock("../logger", () => ({
  getLogger: vi.fn(() => ({
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  })),
}));

import { createActivityContext } from "@shared/activity-context";
import { SessionTracker } from "./session-tracker";
import type { SessionEvent } from "./types";

const context = createActivityContext({ appName: "Cursor", windowTitle: "main.ts", detectedAt: 0 });

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

function run(
  thresholds: { warnThresholdSec: number; longThresholdSec: number; followUpIntervalSec: number },
  steps: number[]
): SessionEvent[] {
  vi.setSystemTime(new Date("2026-01-05T09:00:00.000Z"));
  const tracker = new SessionTracker(thresholds);
  const events: SessionEvent[] = [];
  tracker.onSessionEvent((event) => {
    events.push(event);
  });
  tracker.update(context);
  for (const step of steps) {
    vi.advanceTimersByTime(step);
    tracker.update(context);
  }
  return events;
}

const thresholdsArb = fc.record({
  warnThresholdSec: fc.integer({ min: 0, max: 20 }),
  longThresholdSec: fc.integer({ min: 1, max: 30 }),
  followUpIntervalSec: fc.integer({ min: 1, max: 15 }),
});

const stepsArb = fc.array(fc.integer({ min: 1, max: 3000 }), { minLength: 1, maxLength: 80 });

describe("SessionTracker Property Tests", () => {
  /**
   * For any update sequence on a fixed context with increasing time, WARN and
   * LONG fire at most once and follow-ups are spaced by the configured interval.
   */
  describe("Property 1: once-only thresholds", () => {
    it("emits WARN_THRESHOLD and LONG_THRESHOLD at most once", () => {
      fc.assert(
        fc.property(thresholdsArb, stepsArb, (thresholds, steps) => {
          const events = run(thresholds, steps);
          const count = (type: SessionEvent["type"]) =>
            events.filter((event) => event.type === type).length;

          expect(count("CONTEXT_CHANGED")).toBe(1);
          expect(count("WARN_THRESHOLD")).toBeLessThanOrEqual(1);
          expect(count("LONG_THRESHOLD")).toBeLessThanOrEqual(1);
        }),
        { numRuns: 100 }
      );
    });

    it("spaces follow-ups by at least the interval and only after the long threshold", () => {
      fc.assert(
        fc.property(thresholdsArb, stepsArb, (thresholds, steps) => {
          const events = run(thresholds, steps);
          const longIndex = events.findIndex((event) => event.type === "LONG_THRESHOLD");
          const followUps = events.filter((event) => event.type === "FOLLOW_UP");

          if (followUps.length > 0) {
            expect(longIndex).toBeGreaterThanOrEqual(0);
          }

          let previous = longIndex >= 0 ? events[longIndex].timestamp : 0;
          for (const followUp of followUps) {
            expect(followUp.timestamp - previous).toBeGreaterThanOrEqual(
              thresholds.followUpIntervalSec * 1000
            );
            previous = followUp.timestamp;
          }
        }),
        { numRuns: 100 }
      );
    });

    it("orders events by strictly increasing duration with warn before long", () => {
      fc.assert(
        fc.property(thresholdsArb, stepsArb, (thresholds, steps) => {
          const events = run(thresholds, steps);
          for (let i = 1; i < events.length; i++) {
            expect(events[i].durationSeconds).toBeGreaterThan(events[i - 1].durationSeconds);
          }

          const order = events.map((event) => event.type);
          const warnIndex = order.indexOf("WARN_THRESHOLD");
          const longIndex = order.indexOf("LONG_THRESHOLD");
          if (warnIndex >= 0 && longIndex >= 0) {
            expect(warnIndex).toBeLessThan(longIndex);
          }
        }),
        { numRuns: 100 }
      );
    });
  });
});
