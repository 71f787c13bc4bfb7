/**
 * Decision protocol: ask the model to pick a tool, then validate its answer
 * against the registry. Unusable output falls back to the direct-answer tool.
 */

import type { JsonSchema } from "../output/types.js";
import {
  DIRECT_ANSWER_TOOL,
  type ToolInput,
  type ToolRegistry,
} from "../tools/types.js";
import { buildDecisionPrompt } from "./prompts.js";
import type { ProtocolDeps, ToolDecision } from "./types.js";

export const DECISION_FALLBACK_REASONING =
  "fallback: could not parse tool decision";

interface RawToolDecision {
  reasoning?: unknown;
  tool_choice: string;
  tool_input: Record<string, unknown>;
}

export const TOOL_DECISION_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    tool_choice: { type: "string", description: "Registered tool name" },
    tool_input: {
      type: "object",
      additionalProperties: true,
      description: "Arguments for the tool; should carry a query",
    },
  },
  required: ["tool_choice", "tool_input"],
  additionalProperties: true,
};

export type DecisionParseResult =
  | { success: true; decision: ToolDecision }
  | { success: false; errors: string[] };

export function fallbackDecision(query: string): ToolDecision {
  return {
    toolChoice: DIRECT_ANSWER_TOOL,
    reasoning: DECISION_FALLBACK_REASONING,
    toolInput: { query },
    fallback: true,
  };
}

function normalizeToolInput(
  raw: Record<string, unknown>,
  query: string
): ToolInput {
  const input: ToolInput = { query };
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === "string") {
      input[key] = value;
    } else if (
      key !== "query" &&
      (typeof value === "number" || typeof value === "boolean")
    ) {
      input[key] = String(value);
    }
  }
  if (!input.query.trim()) {
    input.query = query;
  }
  return input;
}

/** Parse the model's decision; never throws. */
export function parseToolDecision(
  deps: Pick<ProtocolDeps, "outputController">,
  registry: ToolRegistry,
  content: string,
  query: string
): DecisionParseResult {
  const result = deps.outputController.parseAndValidate<RawToolDecision>(
    content,
    { schema: TOOL_DECISION_SCHEMA }
  );
  if (!result.success) {
    return { success: false, errors: result.errors };
  }

  const { data } = result;
  const tool = registry.resolve(data.tool_choice);
  if (!tool) {
    return {
      success: false,
      errors: [`Unknown tool: ${data.tool_choice}`],
    };
  }

  return {
    success: true,
    decision: {
      toolChoice: tool.name,
      reasoning: typeof data.reasoning === "string" ? data.reasoning : "",
      toolInput: normalizeToolInput(data.tool_input, query),
      fallback: false,
    },
  };
}

/**
 * One decision round trip. Engine failures propagate; anything wrong with
 * the reply itself resolves to the fallback decision.
 */
export async function decideTool(
  deps: ProtocolDeps,
  registry: ToolRegistry,
  query: string
): Promise<ToolDecision> {
  const prompt = buildDecisionPrompt(registry.list(), query);
  const content = await deps.engine.complete(prompt);

  const parsed = parseToolDecision(deps, registry, content, query);
  if (parsed.success) {
    return parsed.decision;
  }

  deps.logger.logFallback({
    timestamp: new Date().toISOString(),
    protocol: "decision",
    errors: parsed.errors,
    raw: content.slice(0, 500),
  });
  return fallbackDecision(query);
}
