/**
 * FocusProcessor - wires activity, metrics and interventions together
 *
 * Activity reaches the SessionTracker from the poll loop and from ingest();
 * metrics land in the MetricBuffer; tracker events go to the
 * InterventionGate without blocking the poll path.
 */

import { createActivityContext } from "@shared/activity-context";
import type { ActivityContext } from "@shared/activity-types";
import { ErrorCode, ServiceError } from "@shared/errors";
import type { MentalState, MetricSample } from "@shared/mental-state-types";
import type { ProcessorConfig } from "../../config";
import { InterventionGate } from "../intervention/intervention-gate";
import type { Assistant, InterventionOutcome, SessionStore } from "../intervention/types";
import { getLogger } from "../logger";
import { MentalStateClassifier } from "../mental-state/classifier";
import { MetricBuffer } from "../mental-state/metric-buffer";
import { flattenMetricPayload } from "../mental-state/metric-decoder";
import { normalizeMentalStateLabel, snapshotFromMetrics } from "../mental-state/snapshot";
import { PollLoop } from "../poll-loop";
import type { PollLoopState } from "../poll-loop";
import { SessionTracker } from "../session/session-tracker";
import type { ActiveSession, SessionEvent } from "../session/types";
import { sessionDurationSeconds } from "../session/types";
import { IngestPayloadSchema } from "./ingest-schemas";
import type { IngestPayload } from "./ingest-schemas";

const logger = getLogger("focus-processor");

export interface ActivitySource {
  poll(): ActivityContext | null | Promise<ActivityContext | null>;
}

export type MetricHandler = (timestamp: number, payload: unknown) => void;

export interface MetricSource {
  subscribe(handler: MetricHandler): () => void;
}

export interface FocusProcessorDeps {
  config: ProcessorConfig;
  assistant: Assistant;
  store: SessionStore;
  /** Polled for the foreground context; without one, the last ingested activity is used */
  activitySource?: ActivitySource;
  metricSource?: MetricSource;
}

export type ProcessorStatus = "idle" | "running" | "stopped";

export interface ProcessorState {
  status: ProcessorStatus;
  session: ActiveSession | null;
  durationSeconds: number | null;
  mentalState: MentalState;
  latestFeedback: string;
  bufferedSamples: number;
  poll: PollLoopState;
}

export interface IngestResult {
  context: ActivityContext | null;
  sample: MetricSample | null;
  /** Pending help decision; null when none was requested or there is no context yet */
  help: Promise<InterventionOutcome> | null;
}

export class FocusProcessor {
  readonly tracker: SessionTracker;
  readonly buffer: MetricBuffer;
  readonly classifier: MentalStateClassifier;
  readonly gate: InterventionGate;

  private readonly pollLoop: PollLoop;
  private readonly pendingDecisions = new Set<Promise<InterventionOutcome>>();
  private status: ProcessorStatus = "idle";
  private storageSessionId: number | null = null;
  private latestContext: ActivityContext | null = null;
  private unsubscribeMetrics: (() => void) | null = null;

  constructor(private readonly deps: FocusProcessorDeps) {
    const { config } = deps;

    this.tracker = new SessionTracker(config.session);
    this.buffer = new MetricBuffer({ capacity: config.metrics.bufferCapacity });
    this.classifier = new MentalStateClassifier(this.buffer);
    this.gate = new InterventionGate(config.intervention, {
      classifier: this.classifier,
      assistant: deps.assistant,
      store: deps.store,
      currentSessionId: () => this.storageSessionId,
      getLastMetrics: () => this.buffer.getLastMetrics(),
    });
    this.pollLoop = new PollLoop(config.poll, () => this.pollActivity());

    this.tracker.onSessionEvent((event) => this.handleSessionEvent(event));
  }

  start(): void {
    if (this.status === "running") {
      return;
    }

    if (this.deps.metricSource) {
      this.unsubscribeMetrics = this.deps.metricSource.subscribe((timestamp, payload) => {
        this.buffer.store(payload, timestamp);
      });
    }
    this.pollLoop.start();
    this.status = "running";
    logger.info(
      {
        pollIntervalMs: this.deps.config.poll.intervalMs,
        longThresholdSec: this.deps.config.session.longThresholdSec,
      },
      "Focus processor started"
    );
  }

  /**
   * Stop polling, close the open storage session and wait for in-flight
   * decisions. Safe to call more than once.
   */
  async stop(): Promise<void> {
    if (this.status === "stopped") {
      return;
    }

    this.pollLoop.stop();
    this.unsubscribeMetrics?.();
    this.unsubscribeMetrics = null;

    const session = this.tracker.getCurrentSession();
    if (session) {
      this.endStorageSession(sessionDurationSeconds(session));
    }
    this.tracker.reset();
    this.status = "stopped";

    await Promise.allSettled([...this.pendingDecisions]);
    logger.info("Focus processor stopped");
  }

  /**
   * Accept one collector payload. Throws ServiceError(INVALID_PAYLOAD) when
   * the envelope does not validate. A help decision is started but not
   * awaited, so the caller can keep feeding activity and metrics while the
   * assistant answers.
   */
  ingest(input: unknown): IngestResult {
    const parsed = IngestPayloadSchema.safeParse(input);
    if (!parsed.success) {
      throw new ServiceError(
        ErrorCode.INVALID_PAYLOAD,
        `Invalid collector payload: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; ")}`,
        parsed.error.issues
      );
    }

    const payload = parsed.data;
    const timestamp = payload.timestamp ?? Date.now();
    const result: IngestResult = { context: null, sample: null, help: null };

    if (payload.activity) {
      const context = createActivityContext({ ...payload.activity, detectedAt: timestamp });
      this.latestContext = context;
      this.tracker.update(context);
      result.context = context;
    }

    if (payload.eeg !== undefined && payload.eeg !== null) {
      result.sample = this.buffer.store(payload.eeg, timestamp);
    }

    const userFeedback = payload.userFeedback?.trim();
    if (payload.mentalState !== undefined || userFeedback) {
      result.help = this.requestHelp(payload, userFeedback);
    }

    return result;
  }

  getState(): ProcessorState {
    const session = this.tracker.getCurrentSession();
    return {
      status: this.status,
      session,
      durationSeconds: session ? sessionDurationSeconds(session) : null,
      mentalState: this.classifier.classify(),
      latestFeedback: this.gate.getLatestFeedback(),
      bufferedSamples: this.buffer.size(),
      poll: this.pollLoop.getState(),
    };
  }

  private async pollActivity(): Promise<void> {
    const source = this.deps.activitySource;
    const context = source ? await source.poll() : this.latestContext;
    this.tracker.update(context);
  }

  private requestHelp(
    payload: IngestPayload,
    userFeedback: string | undefined
  ): Promise<InterventionOutcome> | null {
    const session = this.tracker.getCurrentSession();
    const context = session?.context ?? this.latestContext;
    if (!context) {
      logger.warn("Help requested before any activity was reported");
      return null;
    }

    const durationSeconds = session ? sessionDurationSeconds(session) : 0;
    const { mentalState } = payload;

    return this.track(
      this.gate.requestHelp({
        context,
        durationSeconds,
        userFeedback,
        ...(typeof mentalState === "string"
          ? { mentalState: normalizeMentalStateLabel(mentalState) }
          : mentalState
            ? { snapshot: snapshotFromMetrics(flattenMetricPayload(mentalState)) }
            : {}),
      })
    );
  }

  private handleSessionEvent(event: SessionEvent): void {
    if (event.type === "CONTEXT_CHANGED") {
      if (event.previous) {
        this.endStorageSession(event.previous.durationSeconds);
        this.deps.assistant.clearConversation?.(event.previous.context.contextId);
      }
      this.startStorageSession(event.context);
    }

    // Decisions may wait on the assistant; the poll path never does
    void this.track(this.gate.onSessionEvent(event));
  }

  private track(decision: Promise<InterventionOutcome>): Promise<InterventionOutcome> {
    this.pendingDecisions.add(decision);
    void decision.finally(() => this.pendingDecisions.delete(decision));
    return decision;
  }

  private startStorageSession(context: ActivityContext): void {
    try {
      this.storageSessionId = this.deps.store.startSession(context);
    } catch (error) {
      this.storageSessionId = null;
      logger.warn({ error, contextId: context.contextId }, "Failed to start storage session");
    }
  }

  private endStorageSession(durationSeconds: number): void {
    if (this.storageSessionId === null) {
      return;
    }
    try {
      this.deps.store.endSession(this.storageSessionId, durationSeconds);
    } catch (error) {
      logger.warn({ error, sessionId: this.storageSessionId }, "Failed to end storage session");
    } finally {
      this.storageSessionId = null;
    }
  }
}
