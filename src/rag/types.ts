import type { AgentLogger, FinalAnswer, ReasoningEngine } from "../agent/types.js";
import type { OutputController } from "../output/types.js";
import type { RetrievedDocument, Retriever } from "../retrieval/types.js";

export interface RagPipelineDeps {
  retriever: Retriever;
  engine: ReasoningEngine;
  outputController?: OutputController;
  logger?: AgentLogger;
}

export interface RagAnswer extends FinalAnswer {
  query: string;
  /** Documents the answer was grounded on; empty when nothing was retrieved. */
  documents: RetrievedDocument[];
}

/** Retrieve, then answer from the retrieved context only. No routing, no history. */
export interface RagPipeline {
  answer(query: string): Promise<RagAnswer>;
}
