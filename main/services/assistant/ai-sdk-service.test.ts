import { describe, it, expect } from "vitest";
import { ErrorCode, ServiceError } from "@shared/errors";
import { DEFAULT_ASSISTANT_CONFIG } from "../../config";
import { AISDKService } from "./ai-sdk-service";

function codeOf(fn: () => unknown): ErrorCode | null {
  try {
    fn();
  } catch (error) {
    return error instanceof ServiceError ? error.code : null;
  }
  return null;
}

describe("AISDKService", () => {
  it("starts uninitialized", () => {
    const service = new AISDKService();
    expect(service.isInitialized()).toBe(false);
    expect(codeOf(() => service.getClient())).toBe(ErrorCode.NOT_INITIALIZED);
  });

  it("refuses a blank API key", () => {
    const service = new AISDKService();
    expect(codeOf(() => service.initialize({ ...DEFAULT_ASSISTANT_CONFIG, apiKey: "  " }))).toBe(
      ErrorCode.API_KEY_MISSING
    );
    expect(service.isInitialized()).toBe(false);
  });

  it("creates a client once configured", () => {
    const service = new AISDKService();
    service.initialize({ ...DEFAULT_ASSISTANT_CONFIG, apiKey: "test-secret", model: "test-model" });

    expect(service.isInitialized()).toBe(true);
    expect(service.getClient()).toBeDefined();
  });
});
