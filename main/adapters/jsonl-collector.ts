/**
 * JSON-lines collector transport
 *
 * Reads one collector payload per line and writes one JSON line per
 * delivered message. Bad lines are logged and skipped. Help decisions run
 * in the background; the next line is read without waiting for them.
 */

import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { toServiceError } from "@shared/errors";
import type { FeedbackEvent, InterventionOutcome } from "../services/intervention/types";
import { getLogger } from "../services/logger";
import type { FocusProcessor } from "../services/processor/focus-processor";

const logger = getLogger("jsonl-collector");

export interface JsonlCollectorOptions {
  input: Readable;
  output: Writable;
}

export interface FeedbackLine {
  type: "feedback";
  message: string;
  source: FeedbackEvent["source"];
  mentalState: FeedbackEvent["mentalState"];
  contextId: string;
  timestamp: number;
}

export function toFeedbackLine(event: FeedbackEvent): FeedbackLine {
  return {
    type: "feedback",
    message: event.message,
    source: event.source,
    mentalState: event.mentalState,
    contextId: event.context.contextId,
    timestamp: event.timestamp,
  };
}

/**
 * Pump lines from `input` into the processor until the stream ends.
 * Resolves with the number of accepted lines once pending help decisions
 * have settled.
 */
export async function runJsonlCollector(
  processor: Pick<FocusProcessor, "ingest" | "gate">,
  options: JsonlCollectorOptions
): Promise<number> {
  const unsubscribe = processor.gate.onFeedback((event) => {
    options.output.write(`${JSON.stringify(toFeedbackLine(event))}\n`);
  });

  const lines = readline.createInterface({ input: options.input, crlfDelay: Infinity });
  const pendingHelp = new Set<Promise<InterventionOutcome>>();
  let accepted = 0;
  let lineNumber = 0;

  try {
    for await (const line of lines) {
      lineNumber++;
      if (line.trim() === "") continue;

      let payload: unknown;
      try {
        payload = JSON.parse(line);
      } catch (error) {
        logger.warn({ lineNumber, error }, "Skipping line that is not JSON");
        continue;
      }

      try {
        const { help } = processor.ingest(payload);
        accepted++;
        if (help) {
          pendingHelp.add(help);
          void help.finally(() => pendingHelp.delete(help));
        }
      } catch (error) {
        const serviceError = toServiceError(error);
        logger.warn(
          { lineNumber, code: serviceError.code, error: serviceError.message },
          "Collector payload rejected"
        );
      }
    }
  } finally {
    await Promise.allSettled([...pendingHelp]);
    unsubscribe();
    lines.close();
  }

  return accepted;
}
