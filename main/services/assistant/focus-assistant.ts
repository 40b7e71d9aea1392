/**
 * FocusAssistant - LLM-backed Assistant with per-context conversations
 *
 * Each contextId keeps its own short turn history so follow-ups can build on
 * what was already said. The history is dropped when the user switches away.
 */

import { generateObject } from "ai";
import type { ModelMessage } from "ai";
import { ErrorCode, toServiceError } from "@shared/errors";
import { getLogger } from "../logger";
import type {
  Assistant,
  AssistantCallOptions,
  AssistantDecision,
  AssistantRequest,
} from "../intervention/types";
import type { AISDKService } from "./ai-sdk-service";
import { buildContextPrompt, CONTINUE_PROMPT, FOCUS_SYSTEM_PROMPT } from "./prompt-templates";
import { AssistantDecisionProcessedSchema, AssistantDecisionSchema } from "./schemas";

const logger = getLogger("focus-assistant");

const DEFAULT_MAX_TURNS = 6;

// Phrases that turn a message into a question back to the user
const QUESTION_PHRASES = [
  "what's blocking",
  "whats blocking",
  "need help?",
  "want me to help",
  "want me to explain",
  "want me to walk",
];

interface ConversationTurn {
  role: "user" | "assistant";
  content: string;
}

export interface FocusAssistantOptions {
  /** Turns of history replayed per request (default: 6) */
  maxTurns?: number;
}

/** Empty string when the model asked a question instead of answering */
export function rewriteIfQuestion(message: string): string {
  const lower = message.trim().toLowerCase();
  return QUESTION_PHRASES.some((phrase) => lower.includes(phrase)) ? "" : message;
}

export class FocusAssistant implements Assistant {
  private readonly conversations = new Map<string, ConversationTurn[]>();
  private readonly maxTurns: number;

  constructor(
    private readonly ai: Pick<AISDKService, "isInitialized" | "getClient">,
    options: FocusAssistantOptions = {}
  ) {
    this.maxTurns = options.maxTurns ?? DEFAULT_MAX_TURNS;
  }

  async decide(
    request: AssistantRequest,
    options: AssistantCallOptions
  ): Promise<AssistantDecision> {
    const contextId = request.context.contextId;
    const userFeedback = request.userFeedback?.trim();
    if (userFeedback) {
      this.addTurn(contextId, { role: "user", content: userFeedback });
    }

    if (!this.ai.isInitialized()) {
      return { shouldHelp: false, message: "", reason: "Assistant not configured", actionType: "none" };
    }

    const messages: ModelMessage[] = [{ role: "user", content: buildContextPrompt(request) }];
    const history = this.conversations.get(contextId) ?? [];
    if (history.length > 0) {
      for (const turn of history.slice(-this.maxTurns)) {
        messages.push(
          turn.role === "user"
            ? { role: "user", content: turn.content }
            : { role: "assistant", content: turn.content }
        );
      }
      messages.push({ role: "user", content: CONTINUE_PROMPT });
    }

    const startTime = Date.now();
    try {
      const { object: rawResult } = await generateObject({
        model: this.ai.getClient(),
        system: FOCUS_SYSTEM_PROMPT,
        schema: AssistantDecisionSchema,
        messages,
        abortSignal: options.abortSignal,
      });

      const parsed = AssistantDecisionProcessedSchema.parse(rawResult);
      const message = rewriteIfQuestion(parsed.message);
      if (message !== parsed.message) {
        logger.debug({ contextId }, "Dropped question-style reply");
      }
      if (message) {
        this.addTurn(contextId, { role: "assistant", content: message });
      }

      logger.debug(
        {
          contextId,
          durationMs: Date.now() - startTime,
          shouldHelp: parsed.shouldHelp,
          actionType: parsed.actionType,
        },
        "Assistant decision completed"
      );
      return { ...parsed, message };
    } catch (error) {
      const serviceError = toServiceError(error, ErrorCode.ASSISTANT_ERROR);
      logger.warn(
        { contextId, durationMs: Date.now() - startTime, error: serviceError.message },
        "Assistant request failed"
      );
      throw serviceError;
    }
  }

  clearConversation(contextId: string): void {
    this.conversations.delete(contextId);
  }

  private addTurn(contextId: string, turn: ConversationTurn): void {
    const turns = this.conversations.get(contextId) ?? [];
    turns.push(turn);
    // Older turns never get replayed
    if (turns.length > this.maxTurns * 2) {
      turns.splice(0, turns.length - this.maxTurns * 2);
    }
    this.conversations.set(contextId, turns);
  }
}
