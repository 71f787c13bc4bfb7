import { vi } from "vitest";
import type {
  AgentLogger,
  FailureLog,
  FallbackLog,
  ReasoningEngine,
  StepLog,
} from "../src/agent/types.js";
import type { RetrievedDocument, Retriever } from "../src/retrieval/types.js";
import { createDirectAnswerTool } from "../src/tools/direct-answer-tool.js";
import { createToolRegistry } from "../src/tools/registry.js";
import { createRetrievalTool } from "../src/tools/retrieval-tool.js";
import type { ToolRegistry } from "../src/tools/types.js";

/** Engine that replays canned replies in order and records every prompt. */
export function createStubEngine(replies: Array<string | Error>): {
  engine: ReasoningEngine;
  prompts: string[];
} {
  const queue = [...replies];
  const prompts: string[] = [];
  return {
    prompts,
    engine: {
      async complete(prompt: string): Promise<string> {
        prompts.push(prompt);
        const next = queue.shift();
        if (next === undefined) {
          throw new Error("Stub engine has no reply left");
        }
        if (next instanceof Error) {
          throw next;
        }
        return next;
      },
    },
  };
}

export interface RecordingLogger extends AgentLogger {
  steps: StepLog[];
  fallbacks: FallbackLog[];
  failures: FailureLog[];
}

export function createRecordingLogger(): RecordingLogger {
  const steps: StepLog[] = [];
  const fallbacks: FallbackLog[] = [];
  const failures: FailureLog[] = [];
  return {
    steps,
    fallbacks,
    failures,
    logStep: (entry) => steps.push(entry),
    logFallback: (entry) => fallbacks.push(entry),
    logFailure: (entry) => failures.push(entry),
  };
}

export function createStubRetriever(
  result: RetrievedDocument[] | Error = []
) {
  const search = vi.fn(async (_query: string): Promise<RetrievedDocument[]> => {
    if (result instanceof Error) {
      throw result;
    }
    return result;
  });
  const retriever: Retriever = { search };
  return { retriever, search };
}

export function createDefaultRegistry(retriever: Retriever): ToolRegistry {
  return createToolRegistry([
    createRetrievalTool(retriever),
    createDirectAnswerTool(),
  ]);
}
