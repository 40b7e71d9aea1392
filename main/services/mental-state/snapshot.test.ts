import { describe, it, expect } from "vitest";
import {
  emptySnapshot,
  labelFromSnapshot,
  normalizeMentalStateLabel,
  snapshotFromMetrics,
} from "./snapshot";

describe("snapshotFromMetrics", () => {
  it("maps short headset keys to snapshot fields", () => {
    const raw = { eng: 0.3, str: 0.6, rel: 0.2, attention: 0.5, int: 0.4, exc: 0.1 };
    expect(snapshotFromMetrics(raw)).toEqual({
      engagement: 0.3,
      stress: 0.6,
      relaxation: 0.2,
      focus: 0.5,
      interest: 0.4,
      excitement: 0.1,
      metrics: raw,
    });
  });

  it("accepts canonical names as-is", () => {
    const snapshot = snapshotFromMetrics({ engagement: 0.8, focus: 0.7 });
    expect(snapshot.engagement).toBe(0.8);
    expect(snapshot.focus).toBe(0.7);
    expect(snapshot.stress).toBeNull();
  });

  it("treats values outside [0,1] as absent", () => {
    const snapshot = snapshotFromMetrics({ eng: 1.5, str: -0.1, rel: 1 });
    expect(snapshot.engagement).toBeNull();
    expect(snapshot.stress).toBeNull();
    expect(snapshot.relaxation).toBe(1);
  });

  it("ignores unrelated keys but keeps them in metrics", () => {
    const snapshot = snapshotFromMetrics({ gyroX: 0.5 });
    expect(snapshot).toEqual(emptySnapshot({ gyroX: 0.5 }));
  });
});

describe("labelFromSnapshot", () => {
  it("is unknown without any reading", () => {
    expect(labelFromSnapshot(emptySnapshot())).toBe("unknown");
  });

  it("labels low engagement under stress as stuck", () => {
    expect(labelFromSnapshot(snapshotFromMetrics({ eng: 0.3, str: 0.6 }))).toBe("stuck");
  });

  it("checks stuck before distracted", () => {
    expect(labelFromSnapshot(snapshotFromMetrics({ eng: 0.3, str: 0.6, attention: 0.2 }))).toBe(
      "stuck"
    );
  });

  it("labels low focus as distracted", () => {
    expect(labelFromSnapshot(snapshotFromMetrics({ attention: 0.3 }))).toBe("distracted");
  });

  it("defaults to focused when some reading is present", () => {
    expect(labelFromSnapshot(snapshotFromMetrics({ rel: 0.5 }))).toBe("focused");
    expect(labelFromSnapshot(snapshotFromMetrics({ eng: 0.3 }))).toBe("focused");
  });
});

describe("normalizeMentalStateLabel", () => {
  it("maps the historical wandering label to distracted", () => {
    expect(normalizeMentalStateLabel("wandering")).toBe("distracted");
    expect(normalizeMentalStateLabel(" Wandering ")).toBe("distracted");
  });

  it("keeps canonical labels", () => {
    expect(normalizeMentalStateLabel("STUCK")).toBe("stuck");
    expect(normalizeMentalStateLabel("focused")).toBe("focused");
  });

  it("maps anything else to unknown", () => {
    expect(normalizeMentalStateLabel("sleepy")).toBe("unknown");
    expect(normalizeMentalStateLabel("constructor")).toBe("unknown");
  });
});
