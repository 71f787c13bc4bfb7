/**
 * Routing agent: decision -> execution -> synthesis -> history, one query at a time.
 */

import { AgentError, ConfigurationError, InvalidQueryError } from "../errors.js";
import { createConsoleLogger } from "../logger.js";
import { createOutputController } from "../output/controller.js";
import { DIRECT_ANSWER_TOOL, RETRIEVE_CONTEXT_TOOL } from "../tools/types.js";
import { decideTool } from "./decision.js";
import { executeDecision } from "./execution.js";
import { createSessionState } from "./session.js";
import { synthesizeAnswer } from "./synthesis.js";
import type {
  AgentDeps,
  AgentLogger,
  AgentStep,
  ProcessResult,
  ProtocolDeps,
  QueryRecord,
  RoutingAgent,
} from "./types.js";

function nowIso(): string {
  return new Date().toISOString();
}

export function validateQuery(query: unknown): string {
  if (typeof query !== "string" || !query.trim()) {
    throw new InvalidQueryError();
  }
  return query.trim();
}

/** Log a failed step and rethrow the original error. */
async function runStep<T>(
  logger: AgentLogger,
  step: AgentStep,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    logger.logFailure({
      timestamp: nowIso(),
      step,
      error: {
        name: err instanceof Error ? err.name : "Error",
        message: err instanceof Error ? err.message : String(err),
        code: err instanceof AgentError ? err.code : undefined,
      },
    });
    throw err;
  }
}

export function createRoutingAgent(deps: AgentDeps): RoutingAgent {
  const registry = deps.toolRegistry;
  // Decision fallback always routes here.
  if (!registry.get(DIRECT_ANSWER_TOOL)) {
    throw new ConfigurationError(
      `The tool registry must contain "${DIRECT_ANSWER_TOOL}".`
    );
  }
  const session = deps.session ?? createSessionState();
  const logger = deps.logger ?? createConsoleLogger("info");
  const protocolDeps: ProtocolDeps = {
    engine: deps.engine,
    outputController: deps.outputController ?? createOutputController(),
    logger,
  };

  async function process(query: string): Promise<ProcessResult> {
    const userQuery = validateQuery(query);

    const decision = await runStep(logger, "decision", () =>
      decideTool(protocolDeps, registry, userQuery)
    );
    logger.logStep({
      timestamp: nowIso(),
      step: "decision",
      message: `Tool chosen: ${decision.toolChoice}`,
      data: { reasoning: decision.reasoning, fallback: decision.fallback },
    });

    const execution = await runStep(logger, "execution", () =>
      executeDecision(registry, decision)
    );
    logger.logStep({
      timestamp: nowIso(),
      step: "execution",
      message: `Executed ${execution.toolName}`,
      data: { outputChars: execution.output.length },
    });

    const answer = await runStep(logger, "synthesis", () =>
      synthesizeAnswer(protocolDeps, userQuery, execution)
    );

    const record: QueryRecord = {
      userQuery,
      toolChosen: decision.toolChoice,
      toolReasoning: decision.reasoning,
      ...(decision.toolChoice === RETRIEVE_CONTEXT_TOOL
        ? { retrievedContext: execution.output }
        : {}),
      reply: answer.reply,
      wordCount: answer.wordCount,
    };
    session.append(record);

    const conversationHistory = session.snapshot();
    logger.logStep({
      timestamp: nowIso(),
      step: "record",
      message: "Query recorded",
      data: { historySize: conversationHistory.length, wordCount: answer.wordCount },
    });

    return { ...record, conversationHistory };
  }

  return {
    process,
    getHistory: () => session.snapshot(),
    clearHistory: () => session.clear(),
  };
}
