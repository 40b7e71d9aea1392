/**
 * Assistant output schemas
 *
 * The strict schema is what the model is asked to produce; the processed
 * schema re-reads its output leniently so a partially wrong answer still
 * yields a usable decision.
 */

import { z } from "zod";
import { ACTION_TYPES } from "../intervention/types";

export const ActionTypeEnum = z.enum([...ACTION_TYPES]);

export const AssistantDecisionSchema = z.object({
  shouldHelp: z.boolean().describe("Whether to show the message to the user"),
  message: z.string().describe("Guidance for the user, prose only, never a question"),
  reason: z.string().describe("Short internal justification"),
  actionType: ActionTypeEnum,
});

export const AssistantDecisionProcessedSchema = z.object({
  shouldHelp: z.boolean().catch(false),
  message: z.string().trim().catch(""),
  reason: z.string().catch(""),
  actionType: ActionTypeEnum.catch("none"),
});

export type AssistantDecisionOutput = z.infer<typeof AssistantDecisionSchema>;
