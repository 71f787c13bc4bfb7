/**
 * Errors raised by the agent pipeline. Failures to interpret model output are
 * never raised; they resolve to fallbacks inside the protocols.
 */

export type AgentErrorCode =
  | "INVALID_QUERY"
  | "RETRIEVAL_FAILED"
  | "TRANSPORT_FAILED"
  | "INVALID_CONFIGURATION";

export class AgentError extends Error {
  readonly code: AgentErrorCode;

  constructor(code: AgentErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "AgentError";
    this.code = code;
  }
}

/** Empty or whitespace-only query; raised before any external call. */
export class InvalidQueryError extends AgentError {
  constructor(message = "Query must be a non-empty string.") {
    super("INVALID_QUERY", message);
    this.name = "InvalidQueryError";
  }
}

/** The retriever failed while the retrieval tool was executing. */
export class RetrievalError extends AgentError {
  constructor(message: string, options?: ErrorOptions) {
    super("RETRIEVAL_FAILED", message, options);
    this.name = "RetrievalError";
  }
}

/** The reasoning engine could not be reached or returned an error. */
export class TransportError extends AgentError {
  /** HTTP status, when the engine answered with one. */
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super("TRANSPORT_FAILED", message, options);
    this.name = "TransportError";
    this.status = options?.status;
  }
}

/** The agent was built with collaborators it cannot run with. */
export class ConfigurationError extends AgentError {
  constructor(message: string) {
    super("INVALID_CONFIGURATION", message);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
