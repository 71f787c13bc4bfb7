import type { ToolRegistry } from "../tools/types.js";
import type { ExecutionResult, ToolDecision } from "./types.js";

/** Run the decided tool. Tool errors (RetrievalError) propagate as-is. */
export async function executeDecision(
  registry: ToolRegistry,
  decision: ToolDecision
): Promise<ExecutionResult> {
  const output = await registry.execute(decision.toolChoice, decision.toolInput);
  return { toolName: decision.toolChoice, output };
}
