import type { MentalState } from "@shared/mental-state-types";

export const FALLBACK_MESSAGES = {
  stuck: "You appear stuck. Try a different section or take a short break.",
  distracted: "Your focus seems to have drifted. Try getting back to the content.",
  focused: "Good job, keep going!",
  unknown: "Good job, keep going!",
} as const satisfies Record<MentalState, string>;

export function fallbackMessageFor(state: MentalState): string {
  return FALLBACK_MESSAGES[state];
}

/** Sent to the assistant in place of user text when a follow-up fires */
export const FOLLOW_UP_NUDGE = "(Still on this - try a different angle)";
