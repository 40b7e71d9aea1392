/**
 * Mental state classification over the metric buffer.
 *
 * Each sample is labelled on its own; the newest sample with a definite
 * label decides. No smoothing across samples.
 */

import type { DecodedMetrics, MentalState } from "@shared/mental-state-types";
import type { MetricBuffer } from "./metric-buffer";

export function classifyDecoded(decoded: DecodedMetrics): MentalState {
  switch (decoded.schema) {
    case "attention-stress": {
      const { attention, cognitiveStress } = decoded;
      if (attention > 0.5 && cognitiveStress < 0.5) return "focused";
      if (attention > 0.4 && cognitiveStress > 0.5) return "stuck";
      if (attention < 0.4) return "distracted";
      return "unknown";
    }
    case "performance": {
      const proxy = decoded.attention ?? decoded.eng;
      if (proxy === null) return "unknown";

      const { str, rel } = decoded;
      if (proxy > 0.5 && (str === null || str < 0.5) && (rel === null || rel >= 0.3)) {
        return "focused";
      }
      if (str !== null && str > 0.5 && proxy > 0.3) return "stuck";
      if (proxy < 0.35) return "distracted";
      return "unknown";
    }
    case "unrecognized":
      return "unknown";
  }
}

export class MentalStateClassifier {
  constructor(private readonly buffer: MetricBuffer) {}

  classify(): MentalState {
    for (const sample of this.buffer.newestFirst()) {
      const state = classifyDecoded(sample.decoded);
      if (state !== "unknown") {
        return state;
      }
    }
    return "unknown";
  }
}
