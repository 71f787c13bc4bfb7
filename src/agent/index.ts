export { createRoutingAgent, validateQuery } from "./agent.js";
export {
  DECISION_FALLBACK_REASONING,
  decideTool,
  fallbackDecision,
  parseToolDecision,
  TOOL_DECISION_SCHEMA,
  type DecisionParseResult,
} from "./decision.js";
export { executeDecision } from "./execution.js";
export {
  buildDecisionPrompt,
  buildRagPrompt,
  buildSynthesisPrompt,
  NO_RELEVANT_CONTEXT,
} from "./prompts.js";
export { createSessionState } from "./session.js";
export {
  countWords,
  fallbackAnswer,
  FINAL_ANSWER_SCHEMA,
  parseFinalAnswer,
  synthesizeAnswer,
} from "./synthesis.js";
export type {
  AgentDeps,
  AgentLogger,
  AgentStep,
  ExecutionResult,
  FailureLog,
  FallbackLog,
  FinalAnswer,
  ProcessResult,
  QueryRecord,
  ReasoningEngine,
  RoutingAgent,
  SessionState,
  StepLog,
  ToolDecision,
} from "./types.js";
