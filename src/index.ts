export * from "./agent/index.js";
export * from "./errors.js";
export * from "./llm/index.js";
export {
  createConsoleLogger,
  parseLogLevel,
  type LogLevel,
  type Logger,
} from "./logger.js";
export * from "./output/index.js";
export * from "./rag/index.js";
export * from "./retrieval/index.js";
export * from "./tools/index.js";
