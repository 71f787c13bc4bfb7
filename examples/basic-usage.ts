/**
 * Interactive demo: routes each question to the knowledge base or a direct
 * answer. Commands: `history`, `clear`, `quit`.
 *
 * Needs GOOGLE_API_KEY in .env (see .env.example).
 */

import { createInterface } from "node:readline/promises";
import { loadGlobalConfig, requireApiKey } from "../config/index.js";
import {
  createConsoleLogger,
  createDirectAnswerTool,
  createGeminiClient,
  createRetrievalTool,
  createRoutingAgent,
  createToolRegistry,
  createVectorRetriever,
} from "../src/index.js";
import { embed, knowledgeBase } from "./knowledge-base.js";

async function main(): Promise<void> {
  const config = loadGlobalConfig();
  const logger = createConsoleLogger(config.logLevel);

  const agent = createRoutingAgent({
    engine: createGeminiClient({
      apiKey: requireApiKey(config),
      model: config.model,
      temperature: config.temperature,
      timeoutMs: config.timeoutMs,
      logger,
    }),
    toolRegistry: createToolRegistry([
      createRetrievalTool(
        createVectorRetriever({
          embed,
          documents: knowledgeBase,
          topK: config.retrievalTopK,
        })
      ),
      createDirectAnswerTool(),
    ]),
    logger,
  });

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  console.log("Ask a question. Commands: history, clear, quit.");

  try {
    while (true) {
      const input = (await rl.question("\nYou: ")).trim();
      if (!input) {
        continue;
      }
      const command = input.toLowerCase();
      if (command === "quit") {
        break;
      }
      if (command === "history") {
        const history = agent.getHistory();
        if (history.length === 0) {
          console.log("No conversation history yet.");
        }
        history.forEach((record, i) => {
          console.log(`${i + 1}. [${record.toolChosen}] ${record.userQuery} -> ${record.reply.slice(0, 100)}`);
        });
        continue;
      }
      if (command === "clear") {
        agent.clearHistory();
        console.log("History cleared.");
        continue;
      }

      try {
        const result = await agent.process(input);
        console.log(`\n[Tool]: ${result.toolChosen}`);
        console.log(`[Reasoning]: ${result.toolReasoning}`);
        console.log(`\nAgent: ${result.reply}`);
        console.log(`[Word count]: ${result.wordCount}`);
        if (result.retrievedContext) {
          console.log(`\n[Context]: ${result.retrievedContext.slice(0, 200)}`);
        }
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  } finally {
    rl.close();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
