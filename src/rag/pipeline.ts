import { validateQuery } from "../agent/agent.js";
import { buildRagPrompt } from "../agent/prompts.js";
import { countWords, parseFinalAnswer } from "../agent/synthesis.js";
import type { ProtocolDeps } from "../agent/types.js";
import { createConsoleLogger } from "../logger.js";
import { createOutputController } from "../output/controller.js";
import { formatDocuments, searchDocuments } from "../tools/retrieval-tool.js";
import type { RagAnswer, RagPipeline, RagPipelineDeps } from "./types.js";

export const NO_CONTEXT_REPLY =
  "I cannot answer because no relevant context was retrieved.";

export function createRagPipeline(deps: RagPipelineDeps): RagPipeline {
  const protocolDeps: ProtocolDeps = {
    engine: deps.engine,
    outputController: deps.outputController ?? createOutputController(),
    logger: deps.logger ?? createConsoleLogger("info"),
  };

  return {
    async answer(rawQuery: string): Promise<RagAnswer> {
      const query = validateQuery(rawQuery);
      const documents = await searchDocuments(deps.retriever, query);

      // Nothing to ground on: answer without calling the model.
      if (documents.length === 0) {
        return {
          query,
          documents,
          reply: NO_CONTEXT_REPLY,
          wordCount: countWords(NO_CONTEXT_REPLY),
          fallback: false,
        };
      }

      const prompt = buildRagPrompt(query, formatDocuments(documents));
      const content = await protocolDeps.engine.complete(prompt);
      return {
        query,
        documents,
        ...parseFinalAnswer(protocolDeps, content, "rag"),
      };
    },
  };
}
