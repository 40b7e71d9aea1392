import type { ActivityContext } from "@shared/activity-types";

// ============================================================================
// Session Types
// ============================================================================

/**
 * The session currently open on one ActivityContext.
 * Timestamps are epoch milliseconds.
 */
export interface ActiveSession {
  readonly context: ActivityContext;
  readonly startedAt: number;
  readonly lastActivityAt: number;
}

export function sessionDurationSeconds(session: ActiveSession, now: number = Date.now()): number {
  return Math.max(0, now - session.startedAt) / 1000;
}

/**
 * Threshold configuration, all in seconds. No defaults here: policy lives in config.ts.
 */
export interface SessionThresholds {
  warnThresholdSec: number;
  longThresholdSec: number;
  followUpIntervalSec: number;
}

// ============================================================================
// Event Types
// ============================================================================

export const SESSION_EVENT_TYPES = [
  "CONTEXT_CHANGED",
  "WARN_THRESHOLD",
  "LONG_THRESHOLD",
  "FOLLOW_UP",
] as const;

export type SessionEventType = (typeof SESSION_EVENT_TYPES)[number];

/**
 * A session that was replaced by a context change
 */
export interface ClosedSession {
  context: ActivityContext;
  durationSeconds: number;
}

interface SessionEventBase {
  context: ActivityContext;
  durationSeconds: number;
  timestamp: number;
}

/**
 * Emitted with duration 0 whenever a new session opens
 */
export interface ContextChangedEvent extends SessionEventBase {
  type: "CONTEXT_CHANGED";
  /** The session that was closed out, so the caller can persist its duration */
  previous: ClosedSession | null;
}

export interface ThresholdEvent extends SessionEventBase {
  type: "WARN_THRESHOLD" | "LONG_THRESHOLD" | "FOLLOW_UP";
}

export type SessionEvent = ContextChangedEvent | ThresholdEvent;

export type ActionableSessionEvent = ThresholdEvent & { type: "LONG_THRESHOLD" | "FOLLOW_UP" };

export function isActionableEvent(event: SessionEvent): event is ActionableSessionEvent {
  return event.type === "LONG_THRESHOLD" || event.type === "FOLLOW_UP";
}

export interface SessionTrackerEventMap {
  "session:event": SessionEvent;
}

export type SessionEventHandler = (event: SessionEvent) => void | Promise<void>;
