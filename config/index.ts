import "dotenv/config";

import { parseLogLevel, type LogLevel } from "../src/logger.js";

type Env = NodeJS.ProcessEnv;

export interface GlobalConfig {
  /** Undefined when GOOGLE_API_KEY is not set. */
  apiKey?: string;
  model?: string;
  logLevel: LogLevel;
  /** Documents returned per retrieval. */
  retrievalTopK: number;
  /** Sampling temperature for every model call. */
  temperature: number;
  /** Per-request timeout for the reasoning engine, if any. */
  timeoutMs?: number;
}

function readNumber(
  value: string | undefined,
  fallback: number,
  accept: (n: number) => boolean
): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) && accept(parsed) ? parsed : fallback;
}

// Read everything from the environment here so callers never touch process.env.
export function loadGlobalConfig(env: Env = process.env): GlobalConfig {
  const timeoutMs = readNumber(env.LLM_TIMEOUT_MS, 0, (n) => n > 0);
  return {
    apiKey: env.GOOGLE_API_KEY?.trim() || undefined,
    model: env.GEMINI_MODEL?.trim() || undefined,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    retrievalTopK: readNumber(
      env.RETRIEVAL_TOP_K,
      3,
      (n) => Number.isInteger(n) && n > 0
    ),
    temperature: readNumber(env.AGENT_TEMPERATURE, 0.1, (n) => n >= 0 && n <= 2),
    timeoutMs: timeoutMs > 0 ? timeoutMs : undefined,
  };
}

export function requireApiKey(config: GlobalConfig): string {
  if (!config.apiKey) {
    throw new Error("No API key found. Set GOOGLE_API_KEY in .env.");
  }
  return config.apiKey;
}
