/**
 * Agent types: one routing decision, one tool execution, one synthesized
 * answer per query, recorded in an append-only session history.
 */

import type { OutputController } from "../output/types.js";
import type { ToolInput, ToolName, ToolRegistry } from "../tools/types.js";

/** `complete(prompt) -> text`; failures are the transport's to raise. */
export interface ReasoningEngine {
  complete(prompt: string): Promise<string>;
}

export interface ToolDecision {
  toolChoice: ToolName;
  reasoning: string;
  toolInput: ToolInput;
  /** True when the model output could not be used and the fallback was applied. */
  fallback: boolean;
}

export interface ExecutionResult {
  toolName: ToolName;
  /** Empty when the direct-answer tool ran or retrieval found nothing. */
  output: string;
}

export interface FinalAnswer {
  reply: string;
  /** Reported by the model; only counted locally on fallback. */
  wordCount: number;
  fallback: boolean;
}

export interface QueryRecord {
  readonly userQuery: string;
  readonly toolChosen: ToolName;
  readonly toolReasoning: string;
  /** Present only when the retrieval tool was chosen. */
  readonly retrievedContext?: string;
  readonly reply: string;
  readonly wordCount: number;
}

export interface ProcessResult extends QueryRecord {
  /** History snapshot taken right after this record was appended. */
  readonly conversationHistory: readonly QueryRecord[];
}

/** Append-only log of completed queries. */
export interface SessionState {
  append(record: QueryRecord): void;
  snapshot(): readonly QueryRecord[];
  clear(): void;
  readonly size: number;
}

export type AgentStep = "decision" | "execution" | "synthesis" | "record";

export interface StepLog {
  timestamp: string;
  step: AgentStep;
  message: string;
  data?: Record<string, string | number | boolean>;
}

export interface FallbackLog {
  timestamp: string;
  /** `rag` is the one-shot pipeline in src/rag. */
  protocol: "decision" | "synthesis" | "rag";
  errors: string[];
  raw: string;
}

export interface FailureLog {
  timestamp: string;
  step: AgentStep;
  error: { name: string; message: string; code?: string };
}

export interface AgentLogger {
  logStep(entry: StepLog): void;
  logFallback(entry: FallbackLog): void;
  logFailure(entry: FailureLog): void;
}

/** What the decision and synthesis protocols need. */
export interface ProtocolDeps {
  engine: ReasoningEngine;
  outputController: OutputController;
  logger: AgentLogger;
}

export interface AgentDeps {
  engine: ReasoningEngine;
  toolRegistry: ToolRegistry;
  /** Defaults to a fresh, empty session. */
  session?: SessionState;
  outputController?: OutputController;
  logger?: AgentLogger;
}

export interface RoutingAgent {
  process(query: string): Promise<ProcessResult>;
  getHistory(): readonly QueryRecord[];
  clearHistory(): void;
}
