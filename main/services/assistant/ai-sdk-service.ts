import { createOpenAICompatible, type OpenAICompatibleProvider } from "@ai-sdk/openai-compatible";
import type { LanguageModel } from "ai";
import { ServiceError, ErrorCode } from "@shared/errors";
import type { AssistantConfig } from "../../config";

/**
 * Holds the OpenAI-compatible provider the assistant talks to.
 */
export class AISDKService {
  private client: OpenAICompatibleProvider | null = null;
  private config: AssistantConfig | null = null;
  private _initialized = false;

  initialize(config: AssistantConfig): void {
    if (!config.apiKey || config.apiKey.trim() === "") {
      this._initialized = false;
      this.client = null;
      throw new ServiceError(ErrorCode.API_KEY_MISSING, "Please configure LLM_API_KEY");
    }

    try {
      this.client = createOpenAICompatible({
        name: config.name,
        baseURL: config.baseURL,
        apiKey: config.apiKey,
      });
      this.config = { ...config };
      this._initialized = true;
    } catch (error) {
      this._initialized = false;
      this.client = null;
      throw new ServiceError(
        ErrorCode.INITIALIZATION_ERROR,
        `AI SDK initialization failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  isInitialized(): boolean {
    return this._initialized;
  }

  getClient(): LanguageModel {
    if (!this._initialized || !this.client || !this.config) {
      throw new ServiceError(ErrorCode.NOT_INITIALIZED, "AI SDK not initialized");
    }
    return this.client(this.config.model);
  }
}
