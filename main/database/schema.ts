import { sqliteTable, text, integer, real, index } from "drizzle-orm/sqlite-core";
import { CONTEXT_TYPE_VALUES } from "@shared/activity-types";
import { MENTAL_STATE_VALUES } from "@shared/mental-state-types";

export const INTERVENTION_EVENT_TYPE_VALUES = [
  "LONG_THRESHOLD",
  "FOLLOW_UP",
  "HELP_REQUEST",
] as const;

/**
 * Sessions table
 * One row per dwell session; ended_at and duration are filled when the user moves on
 */
export const sessions = sqliteTable(
  "sessions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),

    appName: text("app_name").notNull(),
    windowTitle: text("window_title").notNull(),
    contextType: text("context_type", { enum: CONTEXT_TYPE_VALUES }).notNull(),
    contextId: text("context_id").notNull(),

    // Epoch ms
    startedAt: integer("started_at").notNull(),
    endedAt: integer("ended_at"),
    durationSeconds: real("duration_seconds"),
  },
  (table) => [
    index("idx_sessions_context").on(table.contextId),
    index("idx_sessions_started").on(table.startedAt),
    index("idx_sessions_ended").on(table.endedAt),
  ]
);

/**
 * Intervention events table
 * Every actionable event, whether or not the cooldown let it through
 */
export const interventionEvents = sqliteTable(
  "intervention_events",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sessionId: integer("session_id").references(() => sessions.id, { onDelete: "set null" }),
    eventType: text("event_type", { enum: INTERVENTION_EVENT_TYPE_VALUES }).notNull(),
    durationSeconds: real("duration_seconds").notNull(),
    mentalState: text("mental_state", { enum: MENTAL_STATE_VALUES }),
    createdAt: integer("created_at").notNull(),
  },
  (table) => [index("idx_intervention_events_session").on(table.sessionId)]
);

// Mirrors the table definitions above; applied with CREATE IF NOT EXISTS on open
export const BOOTSTRAP_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  app_name TEXT NOT NULL,
  window_title TEXT NOT NULL,
  context_type TEXT NOT NULL,
  context_id TEXT NOT NULL,
  started_at INTEGER NOT NULL,
  ended_at INTEGER,
  duration_seconds REAL
);
CREATE INDEX IF NOT EXISTS idx_sessions_context ON sessions(context_id);
CREATE INDEX IF NOT EXISTS idx_sessions_started ON sessions(started_at);
CREATE INDEX IF NOT EXISTS idx_sessions_ended ON sessions(ended_at);

CREATE TABLE IF NOT EXISTS intervention_events (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id INTEGER REFERENCES sessions(id) ON DELETE SET NULL,
  event_type TEXT NOT NULL,
  duration_seconds REAL NOT NULL,
  mental_state TEXT,
  created_at INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_intervention_events_session ON intervention_events(session_id);
`;

// ============================================================================
// Type Exports
// ============================================================================

export type SessionRecord = typeof sessions.$inferSelect;
export type NewSessionRecord = typeof sessions.$inferInsert;

export type InterventionEventRow = typeof interventionEvents.$inferSelect;
export type NewInterventionEventRow = typeof interventionEvents.$inferInsert;
