import type { MetricSample, RawMetrics } from "@shared/mental-state-types";
import { ErrorCode, ServiceError } from "@shared/errors";
import { getLogger } from "../logger";
import { decodeMetrics, flattenMetricPayload } from "./metric-decoder";
import { RingBuffer } from "./ring-buffer";

const logger = getLogger("metric-buffer");

export interface MetricBufferOptions {
  capacity: number;
}

/**
 * Recent headset samples, decoded on arrival.
 */
export class MetricBuffer {
  private readonly samples: RingBuffer<MetricSample>;

  constructor(options: MetricBufferOptions) {
    if (!Number.isInteger(options.capacity) || options.capacity <= 0) {
      throw new ServiceError(
        ErrorCode.INVALID_CONFIG,
        "Metric buffer capacity must be a positive integer",
        { capacity: options.capacity }
      );
    }
    this.samples = new RingBuffer<MetricSample>(options.capacity);
  }

  store(payload: unknown, timestamp: number = Date.now()): MetricSample {
    const raw = flattenMetricPayload(payload);
    const sample: MetricSample = { timestamp, decoded: decodeMetrics(raw), raw };
    this.samples.push(sample);

    if (sample.decoded.schema === "unrecognized") {
      logger.debug({ keys: Object.keys(raw) }, "Stored sample with unrecognized metric layout");
    }
    return sample;
  }

  /** Newest raw payload, copied */
  getLastMetrics(): RawMetrics | null {
    const last = this.samples.getLast();
    return last ? { ...last.raw } : null;
  }

  newestFirst(): IterableIterator<MetricSample> {
    return this.samples.newestFirst();
  }

  size(): number {
    return this.samples.size();
  }

  clear(): void {
    this.samples.clear();
  }
}
