import contextKeywords from "./context-keywords.json";
import type {
  ActivityContext,
  ActivityContextInput,
  ContextType,
  PdfTitleInfo,
} from "./activity-types";

const CONTEXT_ID_TITLE_LENGTH = 50;
const DISPLAY_TITLE_LENGTH = 60;

const PDF_PAGE_PATTERN = /(.+?\.pdf)\s*[–—-]\s*Page\s+(\d+)\s+of\s+(\d+)/i;
const TITLE_SEPARATOR = /\s*[–—-]\s*/;

function includesAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some((needle) => haystack.includes(needle));
}

/**
 * Stable session key for an (app, title) pair
 */
export function contextIdFor(appName: string, windowTitle: string): string {
  return `${appName}::${windowTitle.slice(0, CONTEXT_ID_TITLE_LENGTH)}`;
}

/**
 * Parse a PDF viewer window title such as "Paper.pdf – Page 7 of 21".
 * Returns null when the app is not a known PDF viewer or the title names no PDF.
 */
export function parsePdfWindowTitle(appName: string, windowTitle: string): PdfTitleInfo | null {
  if (!includesAny(appName.toLowerCase(), contextKeywords.pdfViewers)) {
    return null;
  }

  const title = windowTitle.trim();
  if (!title || !title.toLowerCase().includes(".pdf")) {
    return null;
  }

  const match = PDF_PAGE_PATTERN.exec(title);
  if (match) {
    const pageNum = Number.parseInt(match[2], 10);
    const totalPages = Number.parseInt(match[3], 10);
    return {
      docName: match[1].trim(),
      pageNum,
      totalPages,
      readingSection: `Page ${pageNum} of ${totalPages}`,
    };
  }

  const docName = title.split(TITLE_SEPARATOR)[0]?.trim() ?? "";
  if (!docName) {
    return null;
  }
  return { docName, pageNum: 1, totalPages: 1, readingSection: "Page 1" };
}

export function inferContextType(appName: string, windowTitle: string): ContextType {
  if (parsePdfWindowTitle(appName, windowTitle)) {
    return "pdf";
  }

  const app = appName.toLowerCase();
  const title = windowTitle.toLowerCase();

  if (includesAny(app, contextKeywords.browsers)) {
    return includesAny(title, contextKeywords.websiteHints) ? "website" : "browser";
  }
  if (includesAny(app, contextKeywords.editors)) {
    return "file";
  }
  if (includesAny(app, contextKeywords.terminals)) {
    return "terminal";
  }
  return "app";
}

/**
 * Build an immutable ActivityContext. The contextId is always derived from
 * (appName, windowTitle); contextType and readingSection are inferred when absent.
 */
export function createActivityContext(input: ActivityContextInput): ActivityContext {
  const windowTitle = input.windowTitle ?? "";
  const contextType = input.contextType ?? inferContextType(input.appName, windowTitle);
  const readingSection =
    input.readingSection ??
    (contextType === "pdf"
      ? parsePdfWindowTitle(input.appName, windowTitle)?.readingSection
      : undefined);

  const context: ActivityContext = {
    appName: input.appName,
    windowTitle,
    contextType,
    contextId: contextIdFor(input.appName, windowTitle),
    detectedAt: input.detectedAt ?? Date.now(),
    ...(readingSection ? { readingSection } : {}),
    ...(input.pageContent ? { pageContent: input.pageContent } : {}),
  };
  return Object.freeze(context);
}

export function isSameActivity(a: ActivityContext | null, b: ActivityContext | null): boolean {
  return a !== null && b !== null && a.contextId === b.contextId;
}

/**
 * Human-readable description used in logs and prompts
 */
export function describeContext(context: ActivityContext): string {
  const shortTitle = context.windowTitle.slice(0, DISPLAY_TITLE_LENGTH);
  if (context.contextType === "website" && context.windowTitle) {
    return `${context.appName}: ${shortTitle}...`;
  }
  if (context.windowTitle) {
    return `${context.appName} - ${shortTitle}`;
  }
  return context.appName;
}
