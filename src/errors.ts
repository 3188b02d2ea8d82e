/**
 * errors.ts - Typed failures for embedding generation and similarity search
 *
 * What this file does:
 * Defines one error class per failure the core can report. Callers branch on
 * `instanceof` (or the `code` string when the error has crossed a process
 * boundary, e.g. an MCP response) instead of parsing messages.
 *
 * Which paths catch what:
 * - Entity creation and backfill catch EmptyContentError, ProviderError and
 *   StoreUnavailableError, log them, and carry on without an embedding.
 * - Similarity search catches nothing. "No matches" is an empty array;
 *   "search failed" is always one of these errors.
 *
 * There is no AccessDenied error: a caller with no grants gets
 * an empty result set, the same as a caller whose grants match nothing.
 */

export type SimilarityErrorCode =
  | "EMPTY_CONTENT"
  | "PROVIDER_ERROR"
  | "EMBEDDING_MISSING"
  | "STORE_UNAVAILABLE"
  | "ENTITY_NOT_FOUND"
  | "INVALID_QUERY"
  | "CONFIGURATION";

/**
 * Base class for every error this package throws on purpose.
 */
export abstract class SimilarityError extends Error {
  abstract readonly code: SimilarityErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * The composed text for an entity (or a text passed to embed()) is empty
 * after trimming. A caller bug; never sent to the provider and never retried.
 */
export class EmptyContentError extends SimilarityError {
  readonly code = "EMPTY_CONTENT";

  constructor(subject = "text") {
    super(`Cannot generate an embedding for empty ${subject}`);
  }
}

/**
 * The embedding provider failed: network, auth, quota, timeout, or a
 * response that is not a D-length vector.
 *
 * `retryable` is a hint for callers that want to back off and try again.
 * Nothing in this package retries on its own.
 */
export class ProviderError extends SimilarityError {
  readonly code = "PROVIDER_ERROR";
  readonly retryable: boolean;
  readonly status?: number;

  constructor(
    message: string,
    options: { cause?: unknown; retryable?: boolean; status?: number } = {}
  ) {
    super(message, { cause: options.cause });
    this.retryable = options.retryable ?? false;
    this.status = options.status;
  }
}

/**
 * The source entity has no stored embedding yet, so there is nothing to
 * search with.
 */
export class EmbeddingMissingError extends SimilarityError {
  readonly code = "EMBEDDING_MISSING";
  readonly entityKind?: string;
  readonly entityId?: string;

  constructor(entityKind?: string, entityId?: string) {
    super(
      entityKind && entityId
        ? `This ${entityKind} (${entityId}) has no embedding yet. Edit it or run a backfill to generate one.`
        : "No query vector was supplied."
    );
    this.entityKind = entityKind;
    this.entityId = entityId;
  }
}

/**
 * The database behind the entity store could not be reached or the query
 * failed. The original pg error is kept as `cause`.
 */
export class StoreUnavailableError extends SimilarityError {
  readonly code = "STORE_UNAVAILABLE";

  constructor(operation: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Entity store unavailable during ${operation}${detail}`, { cause });
  }
}

export class EntityNotFoundError extends SimilarityError {
  readonly code = "ENTITY_NOT_FOUND";

  constructor(entityKind: string, entityId: string) {
    super(`No ${entityKind} with id ${entityId}`);
  }
}

/**
 * The request is malformed: wrong vector length, a finding-only filter on a
 * report query, a limit out of range.
 */
export class InvalidQueryError extends SimilarityError {
  readonly code = "INVALID_QUERY";
}

export class ConfigurationError extends SimilarityError {
  readonly code = "CONFIGURATION";
}

/**
 * Maps any thrown value to a one-line message fit for a CLI or MCP user.
 */
export function describeError(error: unknown): string {
  if (error instanceof EmbeddingMissingError) {
    return error.message;
  }
  if (error instanceof StoreUnavailableError) {
    return `${error.message}. Check DATABASE_URL and that the database is running.`;
  }
  if (error instanceof ProviderError) {
    const hint = error.retryable ? " Try again in a moment." : " Check OPENAI_API_KEY.";
    return `Embedding provider error: ${error.message}.${hint}`;
  }
  if (error instanceof SimilarityError) {
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}
