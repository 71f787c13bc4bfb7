/**
 * One-shot RAG: retrieve, then answer from the retrieved context only.
 *
 *   npm run example:rag -- "How long do refunds take?"
 */

import { createInterface } from "node:readline/promises";
import { loadGlobalConfig, requireApiKey } from "../config/index.js";
import {
  createConsoleLogger,
  createGeminiClient,
  createRagPipeline,
  createVectorRetriever,
} from "../src/index.js";
import { embed, knowledgeBase } from "./knowledge-base.js";

async function readQuestion(): Promise<string> {
  const fromArgs = process.argv.slice(2).join(" ").trim();
  if (fromArgs) {
    return fromArgs;
  }
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question("Enter your question: ");
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  const config = loadGlobalConfig();
  const logger = createConsoleLogger(config.logLevel);

  const rag = createRagPipeline({
    retriever: createVectorRetriever({
      embed,
      documents: knowledgeBase,
      topK: config.retrievalTopK,
    }),
    engine: createGeminiClient({
      apiKey: requireApiKey(config),
      model: config.model,
      temperature: config.temperature,
      timeoutMs: config.timeoutMs,
      logger,
    }),
    logger,
  });

  const answer = await rag.answer(await readQuestion());
  console.log(JSON.stringify({ reply: answer.reply, word_count: answer.wordCount }, null, 2));
  for (const doc of answer.documents) {
    console.log(`[Source: ${doc.source ?? "unknown"} | Score: ${doc.score.toFixed(2)}]`);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
