export { createDirectAnswerTool } from "./direct-answer-tool.js";
export { createToolRegistry } from "./registry.js";
export {
  createRetrievalTool,
  formatDocuments,
  searchDocuments,
} from "./retrieval-tool.js";
export {
  DIRECT_ANSWER_TOOL,
  RETRIEVE_CONTEXT_TOOL,
  type DirectAnswerTool,
  type RetrievalTool,
  type Tool,
  type ToolInput,
  type ToolName,
  type ToolRegistry,
} from "./types.js";
