/**
 * Processor Configuration
 *
 * Typed defaults for every policy knob, overridable from environment variables.
 * The algorithms take these values through their constructors; nothing reads
 * this module as ambient state.
 */

import os from "node:os";
import path from "node:path";
import { z } from "zod";

import { ErrorCode, ServiceError } from "@shared/errors";

// ============================================================================
// Session Configuration
// ============================================================================

export interface SessionConfig {
  /** Early warning dwell time in seconds (default: 120) */
  warnThresholdSec: number;
  /** Dwell time that triggers a mental state check in seconds (default: 180) */
  longThresholdSec: number;
  /** Interval between follow-ups once the long threshold fired, in seconds (default: 90) */
  followUpIntervalSec: number;
}

export const DEFAULT_SESSION_CONFIG: SessionConfig = {
  warnThresholdSec: 120,
  longThresholdSec: 180,
  followUpIntervalSec: 90,
};

// ============================================================================
// Metric Configuration
// ============================================================================

export interface MetricConfig {
  /** Samples kept for classification (default: 15, ~30s at 0.5 Hz) */
  bufferCapacity: number;
}

export const DEFAULT_METRIC_CONFIG: MetricConfig = {
  bufferCapacity: 15,
};

// ============================================================================
// Intervention Configuration
// ============================================================================

export interface InterventionConfig {
  /** Minimum time between two non-follow-up interventions in seconds (default: 180) */
  cooldownSec: number;
  /** Upper bound for one assistant round trip in milliseconds (default: 30000) */
  assistantTimeoutMs: number;
  /** Recent sessions passed to the assistant (default: 8) */
  recentSessionLimit: number;
}

export const DEFAULT_INTERVENTION_CONFIG: InterventionConfig = {
  cooldownSec: 180,
  assistantTimeoutMs: 30_000,
  recentSessionLimit: 8,
};

// ============================================================================
// Poll Loop Configuration
// ============================================================================

export interface PollConfig {
  /** Activity poll interval in milliseconds (default: 2000) */
  intervalMs: number;
  /** Minimum delay between polls (default: 100) */
  minDelayMs: number;
}

export const DEFAULT_POLL_CONFIG: PollConfig = {
  intervalMs: 2000,
  minDelayMs: 100,
};

// ============================================================================
// Assistant Configuration
// ============================================================================

export interface AssistantConfig {
  name: string;
  apiKey: string;
  baseURL: string;
  model: string;
}

export const DEFAULT_ASSISTANT_CONFIG: AssistantConfig = {
  name: "focus-assistant",
  apiKey: "",
  baseURL: "https://api.openai.com/v1",
  model: "gpt-4o-mini",
};

// ============================================================================
// Storage Configuration
// ============================================================================

export interface StorageConfig {
  /** SQLite file path; ":memory:" keeps everything in process */
  dbPath: string;
}

export const DEFAULT_STORAGE_CONFIG: StorageConfig = {
  dbPath: path.join(os.homedir(), ".focus-sentinel", "sessions.db"),
};

export interface ProcessorConfig {
  session: SessionConfig;
  metrics: MetricConfig;
  intervention: InterventionConfig;
  poll: PollConfig;
  assistant: AssistantConfig;
  storage: StorageConfig;
}

// ============================================================================
// Environment overrides
// ============================================================================

const seconds = z.coerce.number().finite().nonnegative();
const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  WARN_SESSION_THRESHOLD: seconds.optional(),
  LONG_SESSION_THRESHOLD: seconds.optional(),
  FOLLOW_UP_INTERVAL: seconds.optional(),
  FEEDBACK_COOLDOWN_SEC: seconds.optional(),
  ASSISTANT_TIMEOUT_MS: positiveInt.optional(),
  RECENT_SESSION_LIMIT: positiveInt.optional(),
  METRIC_BUFFER_SIZE: positiveInt.optional(),
  POLL_INTERVAL_MS: positiveInt.optional(),
  LLM_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().optional(),
  LLM_MODEL: z.string().min(1).optional(),
  FOCUS_SENTINEL_DB_PATH: z.string().min(1).optional(),
});

type EnvSource = Record<string, string | undefined>;

/**
 * Build the processor configuration from defaults plus environment overrides.
 * Empty strings count as unset.
 */
export function loadConfig(env: EnvSource = process.env): Readonly<ProcessorConfig> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ServiceError(
      ErrorCode.INVALID_CONFIG,
      `Invalid environment configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      parsed.error.issues
    );
  }
  const values = parsed.data;

  return Object.freeze({
    session: {
      warnThresholdSec: values.WARN_SESSION_THRESHOLD ?? DEFAULT_SESSION_CONFIG.warnThresholdSec,
      longThresholdSec: values.LONG_SESSION_THRESHOLD ?? DEFAULT_SESSION_CONFIG.longThresholdSec,
      followUpIntervalSec: values.FOLLOW_UP_INTERVAL ?? DEFAULT_SESSION_CONFIG.followUpIntervalSec,
    },
    metrics: {
      bufferCapacity: values.METRIC_BUFFER_SIZE ?? DEFAULT_METRIC_CONFIG.bufferCapacity,
    },
    intervention: {
      cooldownSec: values.FEEDBACK_COOLDOWN_SEC ?? DEFAULT_INTERVENTION_CONFIG.cooldownSec,
      assistantTimeoutMs:
        values.ASSISTANT_TIMEOUT_MS ?? DEFAULT_INTERVENTION_CONFIG.assistantTimeoutMs,
      recentSessionLimit:
        values.RECENT_SESSION_LIMIT ?? DEFAULT_INTERVENTION_CONFIG.recentSessionLimit,
    },
    poll: {
      ...DEFAULT_POLL_CONFIG,
      intervalMs: values.POLL_INTERVAL_MS ?? DEFAULT_POLL_CONFIG.intervalMs,
    },
    assistant: {
      ...DEFAULT_ASSISTANT_CONFIG,
      apiKey: values.LLM_API_KEY ?? DEFAULT_ASSISTANT_CONFIG.apiKey,
      baseURL: values.LLM_BASE_URL ?? DEFAULT_ASSISTANT_CONFIG.baseURL,
      model: values.LLM_MODEL ?? DEFAULT_ASSISTANT_CONFIG.model,
    },
    storage: {
      dbPath: values.FOCUS_SENTINEL_DB_PATH ?? DEFAULT_STORAGE_CONFIG.dbPath,
    },
  });
}
