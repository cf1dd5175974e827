/**
 * Error classes for the companion engine.
 * Each error carries a code for programmatic handling and guidance for operators.
 */

/**
 * Base error class for engine errors.
 */
export class KindredError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;
  /** Guidance for the operator */
  readonly guidance: string;
  /** Whether retrying the same call can succeed */
  readonly retryable: boolean;

  constructor(
    message: string,
    code: string,
    guidance: string,
    retryable = false
  ) {
    super(`${message}. ${guidance}`);
    this.name = "KindredError";
    this.code = code;
    this.guidance = guidance;
    this.retryable = retryable;
  }
}

/**
 * Caller supplied an empty or malformed value.
 * The only error processMessage lets escape.
 */
export class InvalidInputError extends KindredError {
  /** Name of the offending field */
  readonly field: string;

  constructor(field: string, reason: string) {
    super(
      `Invalid ${field}: ${reason}`,
      "INVALID_INPUT",
      `Provide a valid ${field} and try again.`
    );
    this.name = "InvalidInputError";
    this.field = field;
  }
}

/**
 * The language model call failed, timed out, or returned nothing usable.
 */
export class LLMUnavailableError extends KindredError {
  /** HTTP status if the endpoint answered */
  readonly status: number | null;

  constructor(reason: string, status: number | null = null) {
    super(
      `Language model unavailable: ${reason}`,
      "LLM_UNAVAILABLE",
      "Check that the model endpoint (llm.endpoint) is running and reachable.",
      true
    );
    this.name = "LLMUnavailableError";
    this.status = status;
  }
}

/**
 * The embedding provider could not produce a vector.
 */
export class EmbeddingUnavailableError extends KindredError {
  /** The provider that failed */
  readonly provider: string;

  constructor(provider: string, reason: string) {
    let guidance: string;
    switch (provider) {
      case "ollama":
        guidance =
          "Ensure Ollama is running (embedding.url) and the embedding model is pulled, e.g. 'ollama pull nomic-embed-text'.";
        break;
      case "openai":
        guidance =
          "Check embedding.apiKey or the OPENAI_API_KEY environment variable.";
        break;
      default:
        guidance = "Check embedding.provider in your configuration.";
    }
    super(
      `Embedding provider unavailable: ${provider} (${reason})`,
      "EMBEDDING_UNAVAILABLE",
      guidance,
      true
    );
    this.name = "EmbeddingUnavailableError";
    this.provider = provider;
  }
}

/**
 * A single capability dispatch failed.
 */
export class ToolDispatchError extends KindredError {
  readonly toolName: string;

  constructor(toolName: string, reason: string) {
    super(
      `Tool '${toolName}' failed: ${reason}`,
      "TOOL_DISPATCH_FAILED",
      "Inspect the tool arguments and the tool's own requirements."
    );
    this.name = "ToolDispatchError";
    this.toolName = toolName;
  }
}

/**
 * No capability is registered under the requested name.
 */
export class UnknownCapabilityError extends KindredError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(
      `Tool '${toolName}' not found`,
      "UNKNOWN_CAPABILITY",
      "Only tools listed in the capability manifest can be invoked."
    );
    this.name = "UnknownCapabilityError";
    this.toolName = toolName;
  }
}

/**
 * The model's answer to the memory evaluation could not be read.
 */
export class MemoryDecisionUnparseableError extends KindredError {
  /** The raw text that failed to parse */
  readonly raw: string;

  constructor(raw: string, reason: string) {
    super(
      `Memory decision unparseable: ${reason}`,
      "MEMORY_DECISION_UNPARSEABLE",
      "The exchange is not saved. No action needed."
    );
    this.name = "MemoryDecisionUnparseableError";
    this.raw = raw;
  }
}

/**
 * The database stayed locked through every retry.
 */
export class DatabaseLockedError extends KindredError {
  /** Number of retry attempts made */
  readonly attempts: number;

  constructor(attempts: number, originalError?: string) {
    super(
      `Database locked after ${attempts} attempts${originalError ? `: ${originalError}` : ""}`,
      "DATABASE_LOCKED",
      "The database is busy with other operations. Try again in a moment. If this persists, check for hung processes accessing the database.",
      true
    );
    this.name = "DatabaseLockedError";
    this.attempts = attempts;
  }
}

/**
 * Normalise any thrown value to a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
