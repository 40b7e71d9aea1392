/**
 * Shared types for mental state classification
 */

export const MENTAL_STATE_VALUES = ["focused", "stuck", "distracted", "unknown"] as const;

export type MentalState = (typeof MENTAL_STATE_VALUES)[number];

export const SNAPSHOT_FIELDS = [
  "engagement",
  "stress",
  "focus",
  "relaxation",
  "excitement",
  "interest",
] as const;

export type SnapshotField = (typeof SNAPSHOT_FIELDS)[number];

/** Flattened numeric metric payload as received from the headset stream */
export type RawMetrics = Record<string, number>;

/**
 * Normalized [0,1] scalars. Absent readings are null, never 0:
 * zero is a valid low-end reading.
 */
export type MentalStateSnapshot = {
  [K in SnapshotField]: number | null;
} & {
  metrics: RawMetrics;
};

/**
 * Metrics decoded once at ingestion.
 *
 * - "attention-stress": firmware reporting `attention` + `cognitiveStress`
 * - "performance": firmware reporting `eng` / `attention` / `str` / `rel`
 */
export type DecodedMetrics =
  | {
      schema: "attention-stress";
      attention: number;
      cognitiveStress: number;
    }
  | {
      schema: "performance";
      eng: number | null;
      attention: number | null;
      str: number | null;
      rel: number | null;
    }
  | { schema: "unrecognized" };

export interface MetricSample {
  /** timestamp ms */
  timestamp: number;
  decoded: DecodedMetrics;
  raw: RawMetrics;
}
