/**
 * Answer synthesis protocol: the second round trip, turning the query and
 * tool output into a reply. An unusable reply is kept verbatim.
 */

import type { JsonSchema } from "../output/types.js";
import { buildSynthesisPrompt } from "./prompts.js";
import type {
  ExecutionResult,
  FallbackLog,
  FinalAnswer,
  ProtocolDeps,
} from "./types.js";

interface RawFinalAnswer {
  reply: string;
  word_count: number;
}

export const FINAL_ANSWER_SCHEMA: JsonSchema = {
  type: "object",
  properties: {
    reply: { type: "string" },
    word_count: { type: "integer", minimum: 0 },
  },
  required: ["reply", "word_count"],
  additionalProperties: true,
};

export function countWords(text: string): number {
  return text.split(/\s+/).filter((token) => token.length > 0).length;
}

export function fallbackAnswer(raw: string): FinalAnswer {
  return { reply: raw, wordCount: countWords(raw), fallback: true };
}

/**
 * Validate a `{reply, word_count}` reply; anything else is logged under
 * `protocol` and kept verbatim as the answer.
 */
export function parseFinalAnswer(
  deps: ProtocolDeps,
  content: string,
  protocol: FallbackLog["protocol"]
): FinalAnswer {
  const result = deps.outputController.parseAndValidate<RawFinalAnswer>(
    content,
    { schema: FINAL_ANSWER_SCHEMA }
  );
  if (result.success) {
    return {
      reply: result.data.reply,
      wordCount: result.data.word_count,
      fallback: false,
    };
  }

  deps.logger.logFallback({
    timestamp: new Date().toISOString(),
    protocol,
    errors: result.errors,
    raw: content.slice(0, 500),
  });
  return fallbackAnswer(content);
}

export async function synthesizeAnswer(
  deps: ProtocolDeps,
  query: string,
  execution: ExecutionResult
): Promise<FinalAnswer> {
  const prompt = buildSynthesisPrompt(query, execution);
  const content = await deps.engine.complete(prompt);
  return parseFinalAnswer(deps, content, "synthesis");
}
