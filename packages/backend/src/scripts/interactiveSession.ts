import { createInterface } from "node:readline/promises";
import type { QueryResponse } from "@taxograph/shared";
import { ensureRuntimeReady, shutdownRuntime } from "../runtime/graphRuntime.js";
import { ConversationState } from "../services/ConversationState.js";
import { logger } from "../utils/logger.js";

const EXIT_WORDS = new Set(["exit", "quit"]);

function render(response: QueryResponse): string {
  const lines = [response.summary];
  if (response.type === "classification_result" && response.confidence) {
    lines.push(`(confidence: ${response.confidence})`);
  }
  return lines.join("\n");
}

async function main(): Promise<void> {
  const runtime = await ensureRuntimeReady();
  const state = new ConversationState();
  const rl = createInterface({ input: process.stdin, output: process.stdout });

  console.log(`Commodity code assistant ready (${runtime.documentCount} codes loaded).`);
  console.log('Describe a product, enter an 8-digit code, or type "exit" to leave.');

  try {
    for (;;) {
      const query = (await rl.question("\nYou: ")).trim();
      if (EXIT_WORDS.has(query.toLowerCase())) {
        break;
      }
      if (!query) {
        continue;
      }

      try {
        const response = await runtime.queryProcessor.processQuery(query, state);
        console.log(`\nAssistant: ${render(response)}`);
      } catch (error) {
        logger.error({ err: error }, "Query failed");
        console.log("\nAssistant: Something went wrong while processing that query. Please try again.");
      }
    }
  } finally {
    rl.close();
    await shutdownRuntime();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "Interactive session failed");
  process.exit(1);
});
