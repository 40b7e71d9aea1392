import type { RawMetrics } from "@shared/mental-state-types";
import { SNAPSHOT_FIELDS } from "@shared/mental-state-types";
import type { AssistantRequest } from "../intervention/types";
import { snapshotFromMetrics } from "../mental-state/snapshot";

const RECENT_SESSIONS_IN_PROMPT = 5;

export const FOCUS_SYSTEM_PROMPT = `You are a focus assistant watching over someone who is reading or working.
When the headset reports the user as stuck, you DELIVER guidance. NEVER ask questions.

Your message must be helpful prose: 2-4 short paragraphs explaining the key concepts of what
the user is looking at. Do not output raw link lists.
When the user is distracted, gently point them back to the content.
When the user is focused, keep it to one short line of encouragement, or set shouldHelp to false.

actionType: "offer_explanation" | "suggest_break" | "encourage_focus" | "offer_resources" | "follow_up" | "none"`;

export const CONTINUE_PROMPT = "Based on the conversation and any user response, what do you say next?";

function minutes(seconds: number): number {
  return Math.round((seconds / 60) * 10) / 10;
}

/** "engagement 0.21, stress 0.77", or null without any [0,1] reading */
export function formatReadings(metrics: RawMetrics | null): string | null {
  if (!metrics) {
    return null;
  }
  const snapshot = snapshotFromMetrics(metrics);
  const parts: string[] = [];
  for (const field of SNAPSHOT_FIELDS) {
    const value = snapshot[field];
    if (value !== null) {
      parts.push(`${field} ${Math.round(value * 100) / 100}`);
    }
  }
  return parts.length > 0 ? parts.join(", ") : null;
}

/**
 * User message describing where the user is and how long they have been there
 */
export function buildContextPrompt(request: AssistantRequest): string {
  const { context, durationSeconds, mentalState, recentSessions } = request;
  const lines = [
    `User is on: ${context.windowTitle || context.appName}`,
    `- App: ${context.appName} | Type: ${context.contextType}`,
    `- Time on this: ${minutes(durationSeconds)} min | Mental state: ${mentalState}`,
  ];
  const readings = formatReadings(request.metrics);
  if (readings) {
    lines.push(`- Headset readings: ${readings}`);
  }
  lines.push("");

  if (context.readingSection) {
    lines.push(`Section user is reading: ${context.readingSection}`, "");
  }
  if (mentalState === "stuck") {
    lines.push("EEG = stuck. Your message = the explanation (prose only).", "");
  }
  if (context.pageContent) {
    lines.push(`Page content:\n${context.pageContent}`, "");
  }

  if (recentSessions.length > 0) {
    lines.push("Recent activity (last sessions):");
    for (const session of recentSessions.slice(0, RECENT_SESSIONS_IN_PROMPT)) {
      const duration = session.durationSeconds ? `${minutes(session.durationSeconds)}m` : "?";
      lines.push(`- ${session.appName}: ${session.windowTitle || "?"} (${duration})`);
    }
  }

  return lines.join("\n").trimEnd();
}
