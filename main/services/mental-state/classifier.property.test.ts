import { describe, it, expect, vi } from "vitest";
import * as fc from "fast-check";

vi.mock("../logger", () => ({
  getLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  })),
}));

import { MENTAL_STATE_VALUES } from "@shared/mental-state-types";
import { classifyDecoded, MentalStateClassifier } from "./classifier";
import { decodeMetrics } from "./metric-decoder";
import { MetricBuffer } from "./metric-buffer";

const unit = fc.double({ min: 0, max: 1, noNaN: true });
const maybeUnit = fc.option(unit, { nil: undefined });

const performancePayload = fc.record(
  { eng: maybeUnit, attention: maybeUnit, str: maybeUnit, rel: maybeUnit },
  { requiredKeys: [] }
);

const anyPayload = fc.oneof(
  fc.record({ attention: unit, cognitiveStress: unit }),
  performancePayload,
  fc.record({ gyroX: fc.double({ noNaN: true }) })
);

describe("MentalStateClassifier properties", () => {
  it("classification is deterministic and leaves the buffer untouched", () => {
    fc.assert(
      fc.property(fc.array(anyPayload, { maxLength: 20 }), (payloads) => {
        const buffer = new MetricBuffer({ capacity: 15 });
        payloads.forEach((payload, i) => buffer.store(payload, i));
        const before = [...buffer.newestFirst()];
        const classifier = new MentalStateClassifier(buffer);

        const first = classifier.classify();
        const second = classifier.classify();

        expect(second).toBe(first);
        expect(MENTAL_STATE_VALUES).toContain(first);
        expect([...buffer.newestFirst()]).toEqual(before);
      }),
      { numRuns: 100 }
    );
  });

  it("the result matches the newest definite per-sample label", () => {
    fc.assert(
      fc.property(fc.array(anyPayload, { minLength: 1, maxLength: 15 }), (payloads) => {
        const buffer = new MetricBuffer({ capacity: 15 });
        payloads.forEach((payload, i) => buffer.store(payload, i));

        const labels = payloads
          .map((payload) => {
            const raw: Record<string, number> = {};
            for (const [key, value] of Object.entries(payload)) {
              if (typeof value === "number") raw[key] = value;
            }
            return classifyDecoded(decodeMetrics(raw));
          })
          .reverse();
        const expected = labels.find((label) => label !== "unknown") ?? "unknown";

        expect(new MentalStateClassifier(buffer).classify()).toBe(expected);
      }),
      { numRuns: 100 }
    );
  });

  it("payloads without engagement, attention or the stress pair are unknown", () => {
    fc.assert(
      fc.property(
        fc.dictionary(
          fc.string().filter((key) => !["eng", "attention", "cognitiveStress", "met"].includes(key)),
          fc.double({ noNaN: true })
        ),
        (payload) => {
          const buffer = new MetricBuffer({ capacity: 3 });
          buffer.store(payload, 0);
          expect(new MentalStateClassifier(buffer).classify()).toBe("unknown");
        }
      ),
      { numRuns: 100 }
    );
  });
});
