export type RagErrorKind =
  | "embedding_service"
  | "index_corrupt"
  | "generation_fatal"
  | "generation_unavailable"
  | "budget_exceeded"
  | "conversation_log"
  | "configuration";

export abstract class RagError extends Error {
  abstract readonly kind: RagErrorKind;

  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The embedding model could not be reached or returned an unusable response. */
export class EmbeddingServiceError extends RagError {
  readonly kind = "embedding_service";

  readonly retryable = true;
}

/** A persisted snapshot failed validation and was rejected as a whole. */
export class IndexCorruptError extends RagError {
  readonly kind = "index_corrupt";

  readonly retryable = false;
}

export class GenerationFatalError extends RagError {
  readonly kind = "generation_fatal";

  readonly retryable = false;
}

export class GenerationUnavailableError extends RagError {
  readonly kind = "generation_unavailable";

  readonly retryable = true;

  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

// Raised and caught inside context assembly only.
export class BudgetExceededError extends RagError {
  readonly kind = "budget_exceeded";

  readonly retryable = false;

  constructor(
    readonly requested: number,
    readonly remaining: number,
  ) {
    super(`Budget exceeded (${requested} > ${remaining}).`);
  }
}

/** The relational conversation log rejected a read or an append. */
export class ConversationLogError extends RagError {
  readonly kind = "conversation_log";

  readonly retryable = true;
}

export class ConfigurationError extends RagError {
  readonly kind = "configuration";

  readonly retryable = false;
}

export type RequestErrorKind =
  | "invalid_request"
  | "embedding_unavailable"
  | "generation_failed"
  | "generation_unavailable"
  | "index_store_unavailable"
  | "conversation_log_unavailable"
  | "configuration"
  | "internal";

/** The single error type the engine raises to its callers. */
export class RagRequestError extends Error {
  constructor(
    readonly kind: RequestErrorKind,
    message: string,
    readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "RagRequestError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
