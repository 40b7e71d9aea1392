/**
 * Process entry point
 *
 * Reads collector payloads as JSON lines on stdin and writes delivered
 * feedback as JSON lines on stdout. Logs go to stderr and the log file.
 */

import { ErrorCode, ServiceError } from "@shared/errors";
import { runJsonlCollector } from "./adapters/jsonl-collector";
import { loadConfig } from "./config";
import { DatabaseService } from "./database";
import { AISDKService } from "./services/assistant/ai-sdk-service";
import { FocusAssistant } from "./services/assistant/focus-assistant";
import type { SessionStore } from "./services/intervention/types";
import { initializeLogger } from "./services/logger";
import { FocusProcessor } from "./services/processor/focus-processor";
import { MemorySessionStore } from "./services/storage/memory-session-store";
import { SqliteSessionStore } from "./services/storage/sqlite-session-store";

async function main(): Promise<void> {
  const logger = initializeLogger();
  const config = loadConfig();

  const ai = new AISDKService();
  try {
    ai.initialize(config.assistant);
  } catch (error) {
    if (error instanceof ServiceError && error.code === ErrorCode.API_KEY_MISSING) {
      logger.warn("LLM_API_KEY not set, only fallback messages will be shown");
    } else {
      throw error;
    }
  }

  const database = new DatabaseService(config.storage.dbPath);
  let store: SessionStore;
  try {
    store = new SqliteSessionStore(database.initialize());
  } catch (error) {
    if (!(error instanceof ServiceError) || error.code !== ErrorCode.STORAGE_ERROR) {
      throw error;
    }
    logger.warn(
      { dbPath: config.storage.dbPath, error: error.message },
      "Session database unavailable, history will not outlive this process"
    );
    store = new MemorySessionStore();
  }

  const processor = new FocusProcessor({
    config,
    assistant: new FocusAssistant(ai),
    store,
  });
  processor.gate.onMentalState((event) => {
    logger.debug(
      {
        contextId: event.context.contextId,
        mentalState: event.mentalState,
        durationSeconds: event.durationSeconds,
        isFollowUp: event.isFollowUp,
      },
      "Mental state at decision"
    );
  });

  const shutdown = async (reason: string) => {
    logger.info({ reason }, "Shutting down");
    await processor.stop();
    database.close();
  };

  process.once("SIGINT", () => {
    shutdown("SIGINT").then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ error }, "Shutdown failed");
        process.exit(1);
      }
    );
  });

  processor.start();
  const accepted = await runJsonlCollector(processor, {
    input: process.stdin,
    output: process.stdout,
  });
  logger.info({ accepted }, "Collector input closed");
  await shutdown("stdin closed");
}

main().catch((error: unknown) => {
  // The logger may not exist yet when configuration fails
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
