import { randomUUID } from "node:crypto";
import type { ReasoningEngine } from "../agent/types.js";
import { errorMessage, TransportError } from "../errors.js";
import { createConsoleLogger } from "../logger.js";
import type { GeminiClientConfig } from "./types.js";

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-flash";
export const DEFAULT_GEMINI_BASE_URL =
  "https://generativelanguage.googleapis.com/v1beta";

interface GenerateContentPayload {
  candidates?: Array<{
    content?: { parts?: Array<{ text?: string }> };
    finishReason?: string;
  }>;
  usageMetadata?: { totalTokenCount?: number };
  error?: { message?: string };
}

function parsePayload(body: string): GenerateContentPayload {
  try {
    const value: unknown = JSON.parse(body);
    return typeof value === "object" && value !== null ? value : {};
  } catch {
    return {};
  }
}

/**
 * `complete(prompt)` over Gemini's generateContent endpoint. The prompt goes
 * out as one user turn; every failure surfaces as a TransportError.
 */
export function createGeminiClient(config: GeminiClientConfig): ReasoningEngine {
  const model = config.model ?? DEFAULT_GEMINI_MODEL;
  const url = `${config.baseUrl ?? DEFAULT_GEMINI_BASE_URL}/models/${model}:generateContent`;
  const fetchFn = config.fetch ?? fetch;
  const logger = config.logger ?? createConsoleLogger("info");

  async function send(prompt: string): Promise<{ text: string; payload: GenerateContentPayload }> {
    let response: Response;
    try {
      response = await fetchFn(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-goog-api-key": config.apiKey,
        },
        body: JSON.stringify({
          contents: [{ parts: [{ text: prompt }] }],
          generationConfig: {
            temperature: config.temperature ?? 0.1,
            maxOutputTokens: config.maxOutputTokens,
          },
        }),
        signal: config.timeoutMs ? AbortSignal.timeout(config.timeoutMs) : undefined,
      });
    } catch (err) {
      throw new TransportError(`Gemini request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const payload = parsePayload(await response.text());
    if (!response.ok) {
      throw new TransportError(
        payload.error?.message ?? `Gemini request failed with status ${response.status}`,
        { status: response.status }
      );
    }

    const candidate = payload.candidates?.[0];
    const text = candidate?.content?.parts?.map((p) => p.text ?? "").join("") ?? "";
    if (!text) {
      const reason = candidate?.finishReason;
      throw new TransportError(
        reason
          ? `Gemini returned no text (finishReason: ${reason}).`
          : "Gemini returned no candidates."
      );
    }
    return { text, payload };
  }

  return {
    async complete(prompt: string): Promise<string> {
      if (!config.apiKey) {
        throw new TransportError("A Gemini API key is required.");
      }
      const requestId = randomUUID();
      const startedAt = Date.now();
      logger.logRequest({
        timestamp: new Date().toISOString(),
        requestId,
        model,
        promptChars: prompt.length,
      });

      try {
        const { text, payload } = await send(prompt);
        logger.logResponse({
          timestamp: new Date().toISOString(),
          requestId,
          model,
          durationMs: Date.now() - startedAt,
          finishReason: payload.candidates?.[0]?.finishReason,
          totalTokens: payload.usageMetadata?.totalTokenCount,
        });
        return text;
      } catch (err) {
        logger.logError({
          timestamp: new Date().toISOString(),
          requestId,
          model,
          durationMs: Date.now() - startedAt,
          error: {
            name: err instanceof Error ? err.name : "Error",
            message: errorMessage(err),
            status: err instanceof TransportError ? err.status : undefined,
          },
        });
        throw err;
      }
    },
  };
}
