/**
 * Metric decoding
 *
 * Headset payloads arrive in several shapes. They are flattened to a record of
 * finite numbers, then decoded once into a DecodedMetrics union so the
 * classifier never re-inspects raw keys. Decoded fields outside [0,1] are
 * absent, as in snapshots.
 */

import type { DecodedMetrics, RawMetrics } from "@shared/mental-state-types";

// Alternating (isActive, value) layout of the met stream
const ALTERNATING_MIN_LENGTH = 13;
const ALTERNATING_INDICES: ReadonlyArray<readonly [key: string, index: number]> = [
  ["eng", 1],
  ["exc", 3],
  ["str", 6],
  ["rel", 8],
  ["int", 10],
  ["attention", 12],
];

// Positional layout of a short numeric met array
const FLAT_ARRAY_KEYS = ["eng", "int", "rel", "str", "attention"] as const;

/** Finite number or null. Booleans, strings, NaN and infinities are all absent. */
export function toFiniteOrNull(value: unknown): number | null {
  return typeof value === "number" && Number.isFinite(value) ? value : null;
}

/** Reading in [0,1] or null. Both the classifier and snapshots read fields through this. */
export function unitOrNull(value: unknown): number | null {
  const numeric = toFiniteOrNull(value);
  return numeric !== null && numeric >= 0 && numeric <= 1 ? numeric : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function flattenArray(values: readonly unknown[]): RawMetrics {
  const result: RawMetrics = {};

  if (values.length >= ALTERNATING_MIN_LENGTH) {
    for (const [key, index] of ALTERNATING_INDICES) {
      const value = toFiniteOrNull(values[index]);
      if (value !== null) {
        result[key] = value;
      }
    }
    return result;
  }

  const numeric = values
    .map((value) => toFiniteOrNull(value))
    .filter((value): value is number => value !== null);
  FLAT_ARRAY_KEYS.forEach((key, i) => {
    if (i < numeric.length) {
      result[key] = numeric[i];
    }
  });
  return result;
}

/**
 * Flatten a headset payload into finite numeric fields.
 *
 * Accepts a flat record, a `{ met, time }` wrapper, an alternating
 * (isActive, value) array or a short positional array.
 */
export function flattenMetricPayload(input: unknown): RawMetrics {
  if (Array.isArray(input)) {
    return flattenArray(input);
  }

  if (!isRecord(input)) {
    return {};
  }

  if ("met" in input && input.met !== undefined && input.met !== null) {
    return flattenMetricPayload(input.met);
  }

  const result: RawMetrics = {};
  for (const [key, value] of Object.entries(input)) {
    const numeric = toFiniteOrNull(value);
    if (numeric !== null) {
      result[key] = numeric;
    }
  }
  return result;
}

export function decodeMetrics(raw: RawMetrics): DecodedMetrics {
  const attention = unitOrNull(raw.attention);
  const cognitiveStress = unitOrNull(raw.cognitiveStress);

  if (attention !== null && cognitiveStress !== null) {
    return { schema: "attention-stress", attention, cognitiveStress };
  }

  const eng = unitOrNull(raw.eng);
  if (eng !== null || attention !== null) {
    return {
      schema: "performance",
      eng,
      attention,
      str: unitOrNull(raw.str),
      rel: unitOrNull(raw.rel),
    };
  }

  return { schema: "unrecognized" };
}
