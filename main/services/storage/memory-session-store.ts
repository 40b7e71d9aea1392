import type { ActivityContext, RecentSession } from "@shared/activity-types";
import type { InterventionEventRecord, SessionStore } from "../intervention/types";

interface StoredSession extends RecentSession {
  id: number;
  contextId: string;
  endedAt: number | null;
}

/**
 * Process-local SessionStore, used when persistence is disabled and in tests.
 */
export class MemorySessionStore implements SessionStore {
  private readonly sessions: StoredSession[] = [];
  private readonly events: InterventionEventRecord[] = [];
  private nextId = 1;

  startSession(context: ActivityContext): number {
    const id = this.nextId++;
    this.sessions.push({
      id,
      appName: context.appName,
      windowTitle: context.windowTitle,
      contextType: context.contextType,
      contextId: context.contextId,
      startedAt: context.detectedAt,
      endedAt: null,
      durationSeconds: null,
    });
    return id;
  }

  endSession(sessionId: number, durationSeconds: number): void {
    const session = this.sessions.find((candidate) => candidate.id === sessionId);
    if (session) {
      session.endedAt = Date.now();
      session.durationSeconds = durationSeconds;
    }
  }

  recordEvent(event: InterventionEventRecord): void {
    this.events.push({ ...event });
  }

  getRecentSessions(limit: number): RecentSession[] {
    return this.sessions
      .filter((session) => session.endedAt !== null)
      .sort((a, b) => (b.endedAt ?? 0) - (a.endedAt ?? 0) || b.id - a.id)
      .slice(0, Math.max(0, limit))
      .map(({ appName, windowTitle, contextType, durationSeconds, startedAt }) => ({
        appName,
        windowTitle,
        contextType,
        durationSeconds,
        startedAt,
      }));
  }

  getEvents(): InterventionEventRecord[] {
    return this.events.map((event) => ({ ...event }));
  }
}
