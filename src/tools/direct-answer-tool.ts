import { DIRECT_ANSWER_TOOL, type DirectAnswerTool } from "./types.js";

/** Marker tool: produces no context, so synthesis answers from the model alone. */
export function createDirectAnswerTool(): DirectAnswerTool {
  return {
    name: DIRECT_ANSWER_TOOL,
    description:
      "Answer directly without retrieving context. Use this for general knowledge, common sense or simple questions.",
    async execute() {
      return "";
    },
  };
}
