export {
  createGeminiClient,
  DEFAULT_GEMINI_BASE_URL,
  DEFAULT_GEMINI_MODEL,
} from "./gemini-client.js";
export type {
  GeminiClientConfig,
  LlmErrorLog,
  LlmLogger,
  LlmRequestLog,
  LlmResponseLog,
} from "./types.js";
