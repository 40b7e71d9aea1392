/**
 * Shared types for activity tracking
 * Used by the session tracker, the intervention gate and the collectors
 */

export const CONTEXT_TYPE_VALUES = ["app", "website", "file", "browser", "terminal", "pdf"] as const;

export type ContextType = (typeof CONTEXT_TYPE_VALUES)[number];

/**
 * What the user is doing right now.
 *
 * Two contexts with the same `contextId` are the same activity for session
 * purposes, even if the other fields differ.
 */
export interface ActivityContext {
  readonly appName: string;
  readonly windowTitle: string;
  readonly contextType: ContextType;
  /** `${appName}::${windowTitle[0..50]}` */
  readonly contextId: string;
  /** timestamp ms */
  readonly detectedAt: number;
  /** Section of a paper or document the user is on */
  readonly readingSection?: string;
  /** Extracted page text, only consumed by assistant collaborators */
  readonly pageContent?: string;
}

export interface ActivityContextInput {
  appName: string;
  windowTitle?: string | null;
  contextType?: ContextType;
  detectedAt?: number;
  readingSection?: string | null;
  pageContent?: string | null;
}

export interface PdfTitleInfo {
  docName: string;
  pageNum: number;
  totalPages: number;
  readingSection: string;
}

/**
 * Row shape returned by session storage for recent history
 */
export interface RecentSession {
  appName: string;
  windowTitle: string;
  contextType: ContextType;
  durationSeconds: number | null;
  startedAt: number;
}
