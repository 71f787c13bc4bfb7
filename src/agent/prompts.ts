import type { Tool } from "../tools/types.js";
import type { ExecutionResult } from "./types.js";
import { RETRIEVE_CONTEXT_TOOL } from "../tools/types.js";

export const NO_RELEVANT_CONTEXT = "(no relevant context found in the knowledge base)";

/** Router prompt: lists every tool and asks for one JSON decision object. */
export function buildDecisionPrompt(tools: Tool[], query: string): string {
  const toolDescriptions = tools
    .map((t) => `- ${t.name}: ${t.description}`)
    .join("\n");
  const names = tools.map((t) => t.name).join(", ");

  return `You are a routing agent that decides which tool to use to answer the user's question.

Available tools:
${toolDescriptions}

User query: ${query}

Respond with exactly one JSON object and nothing else (no markdown, no text outside the JSON):
{
  "reasoning": "<brief explanation of why you chose this tool>",
  "tool_choice": "<one of: ${names}>",
  "tool_input": { "query": "<the query to pass to the tool>" }
}

Rules:
1. "tool_choice" must be exactly one of the tool names listed above.
2. "tool_input" must be a JSON object with a "query" string.`;
}

function describeContext(execution: ExecutionResult): string {
  if (execution.toolName !== RETRIEVE_CONTEXT_TOOL) {
    return "No context was retrieved. Answer from general knowledge.";
  }
  const context = execution.output.trim() ? execution.output : NO_RELEVANT_CONTEXT;
  return `Retrieved context:\n${context}`;
}

/** Answer prompt: the original question plus whatever the tool produced. */
export function buildSynthesisPrompt(
  query: string,
  execution: ExecutionResult
): string {
  return `Provide a helpful answer to the user's question.

User question: ${query}

${describeContext(execution)}

Respond with exactly one JSON object and nothing else (no markdown, no text outside the JSON):
{
  "reply": "<your answer>",
  "word_count": <number of words in reply>
}

Rules:
1. When retrieved context is given, base the answer on it.
2. When the knowledge base had no relevant context, say politely that you cannot answer from it.
3. Count the words in your reply accurately.`;
}

/** One-shot RAG prompt: answer from the given context only. */
export function buildRagPrompt(query: string, context: string): string {
  return `Context:
${context}

Question: ${query}

Use ONLY the context above. If the context does not contain the answer, reply that you cannot answer.

Respond with exactly one JSON object and nothing else (no markdown, no text outside the JSON):
{
  "reply": "<your answer>",
  "word_count": <number of words in reply>
}`;
}
