/**
 * Gemini transport: the reasoning engine behind the agent's two round trips.
 */

export interface GeminiClientConfig {
  apiKey: string;
  /** Defaults to gemini-2.5-flash. */
  model?: string;
  baseUrl?: string;
  temperature?: number;
  maxOutputTokens?: number;
  /** Aborts a call that takes longer; no timeout when unset. */
  timeoutMs?: number;
  logger?: LlmLogger;
  /** Injected for tests; defaults to the global fetch. */
  fetch?: typeof fetch;
}

export interface LlmRequestLog {
  timestamp: string;
  requestId: string;
  model: string;
  promptChars: number;
}

export interface LlmResponseLog {
  timestamp: string;
  requestId: string;
  model: string;
  durationMs: number;
  finishReason?: string;
  totalTokens?: number;
}

export interface LlmErrorLog {
  timestamp: string;
  requestId: string;
  model: string;
  durationMs: number;
  error: { name: string; message: string; status?: number };
}

export interface LlmLogger {
  logRequest(entry: LlmRequestLog): void;
  logResponse(entry: LlmResponseLog): void;
  logError(entry: LlmErrorLog): void;
}
