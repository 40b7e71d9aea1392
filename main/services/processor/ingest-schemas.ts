/**
 * Collector payload schemas
 *
 * Collectors post activity, headset metrics and help requests in one
 * envelope. Every part is optional.
 */

import { z } from "zod";
import { CONTEXT_TYPE_VALUES } from "@shared/activity-types";

export const ActivityPayloadSchema = z.object({
  appName: z.string().trim().min(1),
  windowTitle: z.string().nullish(),
  contextType: z.enum([...CONTEXT_TYPE_VALUES]).optional(),
  readingSection: z.string().nullish(),
  pageContent: z.string().nullish(),
});

/** A label such as "stuck", or a metrics object such as `{ engagement: 0.3, stress: 0.6 }` */
export const MentalStatePayloadSchema = z.union([
  z.string().trim().min(1),
  z.record(z.string(), z.unknown()),
]);

export const IngestPayloadSchema = z.object({
  /** epoch ms; defaults to arrival time */
  timestamp: z.number().finite().nonnegative().optional(),
  activity: ActivityPayloadSchema.optional(),
  /** Raw headset metrics in any layout the decoder accepts */
  eeg: z.unknown().optional(),
  mentalState: MentalStatePayloadSchema.optional(),
  userFeedback: z.string().optional(),
});

export type ActivityPayload = z.infer<typeof ActivityPayloadSchema>;
export type IngestPayload = z.infer<typeof IngestPayloadSchema>;
