import { vi } from "vitest";
import { createActivityContext } from "@shared/activity-context";
import type { ActivityContext, ActivityContextInput } from "@shared/activity-types";
import type { MentalState } from "@shared/mental-state-types";
import type {
  Assistant,
  AssistantCallOptions,
  AssistantDecision,
  AssistantRequest,
  MentalStateSource,
} from "../intervention/types";

export function helpDecision(message: string): AssistantDecision {
  return { shouldHelp: true, message, reason: "test", actionType: "offer_explanation" };
}

export const NO_HELP: AssistantDecision = {
  shouldHelp: false,
  message: "",
  reason: "No intervention",
  actionType: "none",
};

export type DecideImpl = (
  request: AssistantRequest,
  options: AssistantCallOptions
) => Promise<AssistantDecision>;

/**
 * Assistant double whose decide() is a vi.fn, answering NO_HELP by default
 */
export function createAssistantStub(impl?: DecideImpl) {
  const decide = vi.fn<DecideImpl>(impl ?? (async () => NO_HELP));
  const clearConversation = vi.fn<(contextId: string) => void>();
  const assistant: Assistant = { decide, clearConversation };
  return { assistant, decide, clearConversation };
}

export function fixedClassifier(state: MentalState) {
  const classify = vi.fn<() => MentalState>(() => state);
  const source: MentalStateSource = { classify };
  return { source, classify };
}

export function makeContext(input: Partial<ActivityContextInput> = {}): ActivityContext {
  return createActivityContext({
    appName: "Preview",
    windowTitle: "transformers.pdf – Page 4 of 15",
    detectedAt: Date.now(),
    ...input,
  });
}
