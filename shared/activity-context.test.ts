import { describe, it, expect } from "vitest";
import {
  contextIdFor,
  createActivityContext,
  describeContext,
  inferContextType,
  isSameActivity,
  parsePdfWindowTitle,
} from "./activity-context";

describe("parsePdfWindowTitle", () => {
  it("extracts document name and page from an en-dash title", () => {
    expect(parsePdfWindowTitle("Preview", "Neural_Nets.pdf – Page 7 of 21")).toEqual({
      docName: "Neural_Nets.pdf",
      pageNum: 7,
      totalPages: 21,
      readingSection: "Page 7 of 21",
    });
  });

  it("accepts a plain hyphen separator", () => {
    expect(parsePdfWindowTitle("Adobe Acrobat", "thesis.PDF - page 2 of 9")?.readingSection).toBe(
      "Page 2 of 9"
    );
  });

  it("falls back to page 1 when the title carries no page info", () => {
    expect(parsePdfWindowTitle("Preview", "notes.pdf")).toEqual({
      docName: "notes.pdf",
      pageNum: 1,
      totalPages: 1,
      readingSection: "Page 1",
    });
  });

  it("returns null for non-viewer apps and non-pdf titles", () => {
    expect(parsePdfWindowTitle("Safari", "paper.pdf")).toBeNull();
    expect(parsePdfWindowTitle("Preview", "Untitled")).toBeNull();
    expect(parsePdfWindowTitle("Preview", "   ")).toBeNull();
  });
});

describe("inferContextType", () => {
  it.each([
    ["Preview", "paper.pdf – Page 1 of 3", "pdf"],
    ["Google Chrome", "GitHub - www.github.com", "website"],
    ["Firefox", "New Tab", "browser"],
    ["Cursor", "session-tracker.ts", "file"],
    ["Visual Studio Code", "README.md", "file"],
    ["iTerm2", "zsh", "terminal"],
    ["Finder", "Downloads", "app"],
  ] as const)("%s / %s -> %s", (appName, title, expected) => {
    expect(inferContextType(appName, title)).toBe(expected);
  });
});

describe("createActivityContext", () => {
  it("derives contextId from app and the first 50 title characters", () => {
    const title = "x".repeat(60);
    const context = createActivityContext({ appName: "Cursor", windowTitle: title, detectedAt: 1 });
    expect(context.contextId).toBe(`Cursor::${"x".repeat(50)}`);
    expect(context.contextId).toBe(contextIdFor("Cursor", title));
  });

  it("infers the pdf type and reading section", () => {
    const context = createActivityContext({
      appName: "Preview",
      windowTitle: "Paper.pdf - Page 3 of 10",
      detectedAt: 1000,
    });
    expect(context).toEqual({
      appName: "Preview",
      windowTitle: "Paper.pdf - Page 3 of 10",
      contextType: "pdf",
      contextId: "Preview::Paper.pdf - Page 3 of 10",
      detectedAt: 1000,
      readingSection: "Page 3 of 10",
    });
    expect(Object.isFrozen(context)).toBe(true);
  });

  it("keeps an explicit context type and reading section", () => {
    const context = createActivityContext({
      appName: "Cursor",
      windowTitle: "main.ts",
      contextType: "app",
      readingSection: "Section 2",
      detectedAt: 5,
    });
    expect(context.contextType).toBe("app");
    expect(context.readingSection).toBe("Section 2");
  });

  it("treats contexts with equal ids as the same activity", () => {
    const a = createActivityContext({ appName: "Cursor", windowTitle: "a.ts", detectedAt: 1 });
    const b = createActivityContext({
      appName: "Cursor",
      windowTitle: "a.ts",
      detectedAt: 2,
      pageContent: "changed",
    });
    const c = createActivityContext({ appName: "Cursor", windowTitle: "b.ts", detectedAt: 3 });
    expect(isSameActivity(a, b)).toBe(true);
    expect(isSameActivity(a, c)).toBe(false);
    expect(isSameActivity(null, a)).toBe(false);
  });
});

describe("describeContext", () => {
  it("formats websites, titled windows and bare apps", () => {
    const site = createActivityContext({ appName: "Safari", windowTitle: "https://example.com docs" });
    const file = createActivityContext({ appName: "Cursor", windowTitle: "main.ts" });
    const bare = createActivityContext({ appName: "Finder" });
    expect(describeContext(site)).toBe("Safari: https://example.com docs...");
    expect(describeContext(file)).toBe("Cursor - main.ts");
    expect(describeContext(bare)).toBe("Finder");
  });
});
