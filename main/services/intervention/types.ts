import type { ActivityContext, RecentSession } from "@shared/activity-types";
import type { MentalState, MentalStateSnapshot, RawMetrics } from "@shared/mental-state-types";
import type { SessionEventType } from "../session/types";

// ============================================================================
// Assistant
// ============================================================================

export const ACTION_TYPES = [
  "offer_explanation",
  "suggest_break",
  "encourage_focus",
  "offer_resources",
  "follow_up",
  "none",
] as const;

export type ActionType = (typeof ACTION_TYPES)[number];

export interface AssistantRequest {
  context: ActivityContext;
  durationSeconds: number;
  mentalState: MentalState;
  isFollowUp: boolean;
  recentSessions: RecentSession[];
  /** Latest flattened headset metrics, when any arrived */
  metrics: RawMetrics | null;
  /** Free text from the user, or the follow-up nudge */
  userFeedback?: string;
}

export interface AssistantDecision {
  shouldHelp: boolean;
  message: string;
  reason: string;
  actionType: ActionType;
}

export interface AssistantCallOptions {
  abortSignal: AbortSignal;
}

export interface Assistant {
  decide(request: AssistantRequest, options: AssistantCallOptions): Promise<AssistantDecision>;
  /** Forget the per-context conversation, called when the user switches context */
  clearConversation?(contextId: string): void;
}

// ============================================================================
// Storage
// ============================================================================

export type InterventionEventType = Extract<SessionEventType, "LONG_THRESHOLD" | "FOLLOW_UP"> | "HELP_REQUEST";

export interface InterventionEventRecord {
  sessionId: number | null;
  eventType: InterventionEventType;
  durationSeconds: number;
  /** null when the classifier had no definite label */
  mentalState: MentalState | null;
}

/**
 * Session history persistence. Implementations may throw; callers log and
 * carry on.
 */
export interface SessionStore {
  startSession(context: ActivityContext): number;
  endSession(sessionId: number, durationSeconds: number): void;
  recordEvent(event: InterventionEventRecord): void;
  /** Most recently ended sessions first */
  getRecentSessions(limit: number): RecentSession[];
}

// ============================================================================
// Gate
// ============================================================================

export interface MentalStateSource {
  classify(): MentalState;
}

export interface HelpRequest {
  context: ActivityContext;
  durationSeconds: number;
  /** Label reported by the collector; wins over snapshot and classifier */
  mentalState?: MentalState;
  snapshot?: MentalStateSnapshot;
  userFeedback?: string;
}

export type FeedbackSource = "assistant" | "fallback";

export type InterventionOutcome =
  | { kind: "ignored" }
  | { kind: "suppressed"; mentalState: MentalState; remainingCooldownSec: number }
  | { kind: "delivered"; mentalState: MentalState; message: string; source: FeedbackSource };

export interface FeedbackEvent {
  message: string;
  source: FeedbackSource;
  context: ActivityContext;
  mentalState: MentalState;
  timestamp: number;
}

export interface MentalStateEvent {
  context: ActivityContext;
  durationSeconds: number;
  mentalState: MentalState;
  isFollowUp: boolean;
}

export interface InterventionGateEventMap {
  feedback: FeedbackEvent;
  "mental-state": MentalStateEvent;
}
