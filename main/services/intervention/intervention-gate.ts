/**
 * InterventionGate - decides whether and what to tell the user
 *
 * Long dwell and follow-up events reach the assistant at most once per
 * cooldown window (follow-ups bypass it). Whatever the assistant does, the
 * user gets a message: failures and empty answers map to a fixed fallback
 * for the current mental state.
 */

import type { ActivityContext, RecentSession } from "@shared/activity-types";
import type { MentalState } from "@shared/mental-state-types";
import { ErrorCode, ServiceError, toServiceError } from "@shared/errors";
import type { InterventionConfig } from "../../config";
import { TypedEventBus } from "../event-bus";
import type { EventHandler } from "../event-bus";
import { getLogger } from "../logger";
import { labelFromSnapshot } from "../mental-state/snapshot";
import type { SessionEvent } from "../session/types";
import { isActionableEvent } from "../session/types";
import { fallbackMessageFor, FOLLOW_UP_NUDGE } from "./fallback-messages";
import { Semaphore } from "./semaphore";
import type {
  Assistant,
  AssistantDecision,
  AssistantRequest,
  FeedbackEvent,
  HelpRequest,
  InterventionEventType,
  InterventionGateEventMap,
  InterventionOutcome,
  MentalStateEvent,
  MentalStateSource,
  SessionStore,
} from "./types";

const logger = getLogger("intervention-gate");

export interface InterventionGateDeps {
  classifier: MentalStateSource;
  assistant: Assistant;
  store: SessionStore;
  /** Storage id of the open session, null before the first one */
  currentSessionId: () => number | null;
  getLastMetrics?: () => Record<string, number> | null;
}

interface Decision {
  /** Storage session open when the event arrived */
  sessionId: number | null;
  context: ActivityContext;
  durationSeconds: number;
  mentalState: MentalState;
  eventType: InterventionEventType;
  isFollowUp: boolean;
  bypassCooldown: boolean;
  userFeedback?: string;
}

export class InterventionGate {
  private readonly config: InterventionConfig;
  private readonly bus = new TypedEventBus<InterventionGateEventMap>("intervention-gate");
  private readonly decisionLock = new Semaphore(1);

  private lastActionAt = 0;
  private latestFeedback = "";

  constructor(
    config: InterventionConfig,
    private readonly deps: InterventionGateDeps
  ) {
    if (!Number.isFinite(config.cooldownSec) || config.cooldownSec < 0) {
      throw new ServiceError(ErrorCode.INVALID_CONFIG, "cooldownSec must be non-negative", {
        cooldownSec: config.cooldownSec,
      });
    }
    if (!Number.isFinite(config.assistantTimeoutMs) || config.assistantTimeoutMs <= 0) {
      throw new ServiceError(ErrorCode.INVALID_CONFIG, "assistantTimeoutMs must be positive", {
        assistantTimeoutMs: config.assistantTimeoutMs,
      });
    }
    this.config = { ...config };
  }

  /**
   * Handle one tracker event. Only LONG_THRESHOLD and FOLLOW_UP are
   * actionable. Never rejects.
   */
  async onSessionEvent(event: SessionEvent): Promise<InterventionOutcome> {
    if (!isActionableEvent(event)) {
      return { kind: "ignored" };
    }

    const isFollowUp = event.type === "FOLLOW_UP";
    const sessionId = this.captureSessionId();
    return this.decideExclusive(() => ({
      sessionId,
      context: event.context,
      durationSeconds: event.durationSeconds,
      mentalState: this.deps.classifier.classify(),
      eventType: event.type,
      isFollowUp,
      bypassCooldown: isFollowUp,
      userFeedback: isFollowUp ? FOLLOW_UP_NUDGE : undefined,
    }));
  }

  /**
   * Explicit help request from a collector. Non-blank user feedback bypasses
   * the cooldown. The mental state comes from the reported label, else the
   * snapshot, else the classifier.
   */
  async requestHelp(request: HelpRequest): Promise<InterventionOutcome> {
    const userFeedback = request.userFeedback?.trim() || undefined;
    const sessionId = this.captureSessionId();
    return this.decideExclusive(() => ({
      sessionId,
      context: request.context,
      durationSeconds: request.durationSeconds,
      mentalState: this.resolveHelpState(request),
      eventType: "HELP_REQUEST",
      isFollowUp: false,
      bypassCooldown: userFeedback !== undefined,
      userFeedback,
    }));
  }

  getLatestFeedback(): string {
    return this.latestFeedback;
  }

  onFeedback(handler: EventHandler<FeedbackEvent>): () => void {
    return this.bus.on("feedback", handler);
  }

  onMentalState(handler: EventHandler<MentalStateEvent>): () => void {
    return this.bus.on("mental-state", handler);
  }

  private resolveHelpState(request: HelpRequest): MentalState {
    if (request.mentalState !== undefined && request.mentalState !== "unknown") {
      return request.mentalState;
    }
    const snapshotLabel = request.snapshot ? labelFromSnapshot(request.snapshot) : "unknown";
    if (snapshotLabel !== "unknown") {
      return snapshotLabel;
    }
    return this.deps.classifier.classify();
  }

  private async decideExclusive(build: () => Decision): Promise<InterventionOutcome> {
    try {
      return await this.decisionLock.runExclusive(() => this.decide(build()));
    } catch (error) {
      logger.error({ error }, "Intervention decision failed");
      return { kind: "ignored" };
    }
  }

  private async decide(decision: Decision): Promise<InterventionOutcome> {
    const { context, durationSeconds, mentalState, isFollowUp } = decision;

    this.bus.emit("mental-state", { context, durationSeconds, mentalState, isFollowUp });
    this.recordEvent(decision);

    const sinceLastSec = (Date.now() - this.lastActionAt) / 1000;
    if (!decision.bypassCooldown && this.lastActionAt !== 0 && sinceLastSec < this.config.cooldownSec) {
      const remainingCooldownSec = Math.ceil(this.config.cooldownSec - sinceLastSec);
      logger.debug(
        { contextId: context.contextId, mentalState, remainingCooldownSec },
        "Intervention suppressed by cooldown"
      );
      return { kind: "suppressed", mentalState, remainingCooldownSec };
    }

    const request: AssistantRequest = {
      context,
      durationSeconds,
      mentalState,
      isFollowUp,
      recentSessions: this.loadRecentSessions(),
      metrics: this.deps.getLastMetrics?.() ?? null,
      userFeedback: decision.userFeedback,
    };

    let message = "";
    try {
      const result = await this.callAssistant(request);
      message = result.shouldHelp && typeof result.message === "string" ? result.message.trim() : "";
    } catch (error) {
      const serviceError = toServiceError(error, ErrorCode.ASSISTANT_ERROR);
      logger.warn(
        { code: serviceError.code, error: serviceError.message, contextId: context.contextId },
        "Assistant call failed, using fallback message"
      );
    }

    const source = message ? "assistant" : "fallback";
    if (!message) {
      message = fallbackMessageFor(mentalState);
    }

    this.latestFeedback = message;
    this.lastActionAt = Date.now();

    logger.info(
      { contextId: context.contextId, mentalState, source, eventType: decision.eventType },
      "Intervention delivered"
    );
    this.bus.emit("feedback", {
      message,
      source,
      context,
      mentalState,
      timestamp: this.lastActionAt,
    });

    return { kind: "delivered", mentalState, message, source };
  }

  private async callAssistant(request: AssistantRequest): Promise<AssistantDecision> {
    const controller = new AbortController();
    const pending = this.deps.assistant.decide(request, { abortSignal: controller.signal });
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        // The late settlement no longer has a reader
        pending.catch((error: unknown) => {
          logger.debug({ error }, "Assistant settled after timeout");
        });
        reject(
          new ServiceError(
            ErrorCode.ASSISTANT_TIMEOUT,
            `Assistant did not answer within ${this.config.assistantTimeoutMs}ms`
          )
        );
      }, this.config.assistantTimeoutMs);
    });

    try {
      return await Promise.race([pending, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private loadRecentSessions(): RecentSession[] {
    try {
      return this.deps.store.getRecentSessions(this.config.recentSessionLimit);
    } catch (error) {
      logger.warn({ error }, "Failed to load recent sessions");
      return [];
    }
  }

  private captureSessionId(): number | null {
    try {
      return this.deps.currentSessionId();
    } catch (error) {
      logger.warn({ error }, "Failed to read the current session id");
      return null;
    }
  }

  private recordEvent(decision: Decision): void {
    try {
      this.deps.store.recordEvent({
        sessionId: decision.sessionId,
        eventType: decision.eventType,
        durationSeconds: decision.durationSeconds,
        mentalState: decision.mentalState === "unknown" ? null : decision.mentalState,
      });
    } catch (error) {
      logger.warn({ error, eventType: decision.eventType }, "Failed to record intervention event");
    }
  }
}
