/**
 * SessionTracker - dwell-time tracking with once-only threshold events
 *
 * Converts a polling stream of ActivityContext into discrete events:
 * CONTEXT_CHANGED on every new context, WARN_THRESHOLD and LONG_THRESHOLD at
 * most once per session, then FOLLOW_UP every followUpIntervalSec for as long
 * as the session continues. Timing only depends on wall-clock time, not on
 * how often update() is called.
 */

import type { ActivityContext } from "@shared/activity-types";
import { describeContext, isSameActivity } from "@shared/activity-context";
import { ErrorCode, ServiceError } from "@shared/errors";
import { TypedEventBus } from "../event-bus";
import { getLogger } from "../logger";
import type {
  ActiveSession,
  ContextChangedEvent,
  SessionEventHandler,
  SessionThresholds,
  SessionTrackerEventMap,
  ThresholdEvent,
} from "./types";
import { sessionDurationSeconds } from "./types";

const logger = getLogger("session-tracker");

interface MutableSession {
  context: ActivityContext;
  startedAt: number;
  lastActivityAt: number;
}

function assertThreshold(name: keyof SessionThresholds, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ServiceError(
      ErrorCode.INVALID_CONFIG,
      `${name} must be a non-negative number of seconds`,
      { [name]: value }
    );
  }
}

export class SessionTracker {
  private readonly thresholds: SessionThresholds;
  private readonly bus = new TypedEventBus<SessionTrackerEventMap>("session-tracker");

  private session: MutableSession | null = null;
  private warnEmitted = false;
  private longEmitted = false;
  private lastFollowUpAt = 0;

  constructor(thresholds: SessionThresholds) {
    assertThreshold("warnThresholdSec", thresholds.warnThresholdSec);
    assertThreshold("longThresholdSec", thresholds.longThresholdSec);
    assertThreshold("followUpIntervalSec", thresholds.followUpIntervalSec);

    if (thresholds.warnThresholdSec >= thresholds.longThresholdSec) {
      logger.warn(
        { ...thresholds },
        "warnThresholdSec >= longThresholdSec, WARN_THRESHOLD will never fire"
      );
    }
    this.thresholds = { ...thresholds };
  }

  /**
   * Register an observer. Returns an unsubscribe function.
   */
  onSessionEvent(handler: SessionEventHandler): () => void {
    return this.bus.on("session:event", handler);
  }

  /**
   * Feed the latest poll result.
   *
   * A null context is a transient detection failure: the current session is
   * kept as-is and nothing is emitted.
   */
  update(context: ActivityContext | null): ActiveSession | null {
    if (context === null) {
      return this.getCurrentSession();
    }

    const now = Date.now();

    if (this.session === null || !isSameActivity(this.session.context, context)) {
      this.openSession(context, now);
      return this.getCurrentSession();
    }

    this.session.lastActivityAt = now;
    this.evaluateThresholds(this.session, now);
    return this.getCurrentSession();
  }

  getCurrentSession(): ActiveSession | null {
    if (!this.session) {
      return null;
    }
    return { ...this.session };
  }

  /**
   * Drop the current session without emitting anything
   */
  reset(): void {
    this.session = null;
    this.warnEmitted = false;
    this.longEmitted = false;
    this.lastFollowUpAt = 0;
  }

  private openSession(context: ActivityContext, now: number): void {
    const previous = this.session
      ? {
          context: this.session.context,
          durationSeconds: sessionDurationSeconds(this.session, now),
        }
      : null;

    this.session = { context, startedAt: now, lastActivityAt: now };
    this.warnEmitted = false;
    this.longEmitted = false;
    this.lastFollowUpAt = 0;

    logger.info(
      { contextId: context.contextId, previousDurationSec: previous?.durationSeconds ?? null },
      `Context changed: ${describeContext(context)}`
    );

    const event: ContextChangedEvent = {
      type: "CONTEXT_CHANGED",
      context,
      durationSeconds: 0,
      timestamp: now,
      previous,
    };
    this.bus.emit("session:event", event);
  }

  /**
   * At most one event per call, in strict priority order:
   * LONG_THRESHOLD, then FOLLOW_UP, then WARN_THRESHOLD.
   */
  private evaluateThresholds(session: MutableSession, now: number): void {
    const duration = sessionDurationSeconds(session, now);
    const { warnThresholdSec, longThresholdSec, followUpIntervalSec } = this.thresholds;

    let type: ThresholdEvent["type"] | null = null;

    if (duration >= longThresholdSec && !this.longEmitted) {
      this.longEmitted = true;
      // A skipped warning is never emitted late: events stay ordered by duration.
      this.warnEmitted = true;
      this.lastFollowUpAt = now;
      type = "LONG_THRESHOLD";
    } else if (
      duration >= longThresholdSec &&
      (now - this.lastFollowUpAt) / 1000 >= followUpIntervalSec
    ) {
      this.lastFollowUpAt = now;
      type = "FOLLOW_UP";
    } else if (duration >= warnThresholdSec && !this.warnEmitted) {
      this.warnEmitted = true;
      type = "WARN_THRESHOLD";
    }

    if (type === null) {
      return;
    }

    logger.info({ type, contextId: session.context.contextId, duration }, "Session threshold event");

    const event: ThresholdEvent = {
      type,
      context: session.context,
      durationSeconds: duration,
      timestamp: now,
    };
    this.bus.emit("session:event", event);
  }
}
