import { desc, eq, isNotNull } from "drizzle-orm";
import type { ActivityContext, RecentSession } from "@shared/activity-types";
import { ErrorCode, ServiceError, toServiceError } from "@shared/errors";
import type { DrizzleDB } from "../../database";
import { interventionEvents, sessions } from "../../database";
import { getLogger } from "../logger";
import type { InterventionEventRecord, SessionStore } from "../intervention/types";

const logger = getLogger("sqlite-session-store");

/**
 * SessionStore on SQLite through Drizzle. Every failure surfaces as a
 * ServiceError(STORAGE_ERROR).
 */
export class SqliteSessionStore implements SessionStore {
  constructor(private readonly db: DrizzleDB) {}

  startSession(context: ActivityContext): number {
    return this.guard("startSession", () => {
      const row = this.db
        .insert(sessions)
        .values({
          appName: context.appName,
          windowTitle: context.windowTitle,
          contextType: context.contextType,
          contextId: context.contextId,
          startedAt: context.detectedAt,
        })
        .returning({ id: sessions.id })
        .get();

      if (!row) {
        throw new ServiceError(ErrorCode.STORAGE_ERROR, "Session insert returned no row");
      }
      logger.debug({ sessionId: row.id, contextId: context.contextId }, "Session started");
      return row.id;
    });
  }

  endSession(sessionId: number, durationSeconds: number): void {
    this.guard("endSession", () => {
      this.db
        .update(sessions)
        .set({ endedAt: Date.now(), durationSeconds })
        .where(eq(sessions.id, sessionId))
        .run();
    });
  }

  recordEvent(event: InterventionEventRecord): void {
    this.guard("recordEvent", () => {
      this.db
        .insert(interventionEvents)
        .values({
          sessionId: event.sessionId,
          eventType: event.eventType,
          durationSeconds: event.durationSeconds,
          mentalState: event.mentalState,
          createdAt: Date.now(),
        })
        .run();
    });
  }

  getRecentSessions(limit: number): RecentSession[] {
    return this.guard("getRecentSessions", () =>
      this.db
        .select({
          appName: sessions.appName,
          windowTitle: sessions.windowTitle,
          contextType: sessions.contextType,
          durationSeconds: sessions.durationSeconds,
          startedAt: sessions.startedAt,
        })
        .from(sessions)
        .where(isNotNull(sessions.endedAt))
        .orderBy(desc(sessions.endedAt), desc(sessions.id))
        .limit(limit)
        .all()
    );
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      const serviceError = toServiceError(error, ErrorCode.STORAGE_ERROR);
      logger.error({ operation, error: serviceError.message }, "Session storage operation failed");
      throw serviceError;
    }
  }
}
