import type {
  MentalState,
  MentalStateSnapshot,
  RawMetrics,
  SnapshotField,
} from "@shared/mental-state-types";
import { MENTAL_STATE_VALUES, SNAPSHOT_FIELDS } from "@shared/mental-state-types";
import { unitOrNull } from "./metric-decoder";

const SHORT_KEYS = new Map<string, SnapshotField>([
  ["eng", "engagement"],
  ["str", "stress"],
  ["rel", "relaxation"],
  ["attention", "focus"],
  ["int", "interest"],
  ["exc", "excitement"],
]);

// Older collectors still send this label
const LABEL_ALIASES = new Map<string, MentalState>([["wandering", "distracted"]]);

function isSnapshotField(key: string): key is SnapshotField {
  return SNAPSHOT_FIELDS.some((field) => field === key);
}

export function emptySnapshot(metrics: RawMetrics = {}): MentalStateSnapshot {
  return {
    engagement: null,
    stress: null,
    focus: null,
    relaxation: null,
    excitement: null,
    interest: null,
    metrics,
  };
}

/**
 * Build a snapshot from flattened metrics. Short headset keys and canonical
 * names are both accepted; values outside [0,1] are absent.
 */
export function snapshotFromMetrics(raw: RawMetrics): MentalStateSnapshot {
  const snapshot = emptySnapshot({ ...raw });

  for (const [key, value] of Object.entries(raw)) {
    const field = SHORT_KEYS.get(key) ?? (isSnapshotField(key) ? key : undefined);
    if (field === undefined) continue;

    const normalized = unitOrNull(value);
    if (normalized !== null) {
      snapshot[field] = normalized;
    }
  }
  return snapshot;
}

export function hasAnyReading(snapshot: MentalStateSnapshot): boolean {
  return SNAPSHOT_FIELDS.some((field) => snapshot[field] !== null);
}

/** Coarse single-snapshot label. Stuck is checked before distracted. */
export function labelFromSnapshot(snapshot: MentalStateSnapshot): MentalState {
  if (!hasAnyReading(snapshot)) {
    return "unknown";
  }

  const { engagement, stress, focus } = snapshot;
  if (engagement !== null && stress !== null && engagement < 0.4 && stress > 0.5) {
    return "stuck";
  }
  if (focus !== null && focus < 0.35) {
    return "distracted";
  }
  return "focused";
}

export function normalizeMentalStateLabel(label: string): MentalState {
  const key = label.trim().toLowerCase();
  const alias = LABEL_ALIASES.get(key);
  if (alias !== undefined) {
    return alias;
  }
  return MENTAL_STATE_VALUES.find((value) => value === key) ?? "unknown";
}
