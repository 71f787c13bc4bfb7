import type {
  AgentLogger,
  FailureLog,
  FallbackLog,
  StepLog,
} from "./agent/types.js";
import type {
  LlmErrorLog,
  LlmLogger,
  LlmRequestLog,
  LlmResponseLog,
} from "./llm/types.js";

export type LogLevel = "silent" | "error" | "info";

export type Logger = LlmLogger & AgentLogger;

const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "info"];

export function parseLogLevel(
  value: string | undefined,
  fallback: LogLevel = "info"
): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? fallback;
}

type LogEntry =
  | LlmRequestLog
  | LlmResponseLog
  | LlmErrorLog
  | StepLog
  | FallbackLog
  | FailureLog;

function toJson(event: string, entry: LogEntry): string {
  return JSON.stringify({ event, ...entry });
}

/** JSON-lines logger on the console. `error` keeps fallbacks and failures only. */
export function createConsoleLogger(level: LogLevel = "info"): Logger {
  const info = level === "info";
  const errors = level === "info" || level === "error";

  return {
    logRequest(entry: LlmRequestLog) {
      if (info) {
        console.log(toJson("llm.request", entry));
      }
    },
    logResponse(entry: LlmResponseLog) {
      if (info) {
        console.log(toJson("llm.response", entry));
      }
    },
    logError(entry: LlmErrorLog) {
      if (errors) {
        console.error(toJson("llm.error", entry));
      }
    },
    logStep(entry: StepLog) {
      if (info) {
        console.log(toJson("agent.step", entry));
      }
    },
    logFallback(entry: FallbackLog) {
      if (errors) {
        console.warn(toJson("agent.fallback", entry));
      }
    },
    logFailure(entry: FailureLog) {
      if (errors) {
        console.error(toJson("agent.failure", entry));
      }
    },
  };
}
