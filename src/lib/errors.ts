/**
 * Error kinds surfaced by the store, the providers and the HTTP layer.
 * Each carries a stable `code` and the HTTP status the API answers with.
 */
export class CoachError extends Error {
  readonly code: string;
  readonly status: number;

  constructor(message: string, code: string, status: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
  }
}

export class ValidationError extends CoachError {
  constructor(message: string) {
    super(message, "validation_error", 400);
  }
}

/** Missing, expired or rejected credentials. */
export class Unauthorized extends CoachError {
  constructor(message = "Authentication required") {
    super(message, "unauthorized", 401);
  }
}

/** Row-level policy refused the operation for the caller's identity. */
export class AccessDenied extends CoachError {
  constructor(message = "Access denied") {
    super(message, "access_denied", 403);
  }
}

export class NotFoundError extends CoachError {
  constructor(message: string) {
    super(message, "not_found", 404);
  }
}

export class DimensionMismatch extends CoachError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`Expected a vector of ${expected} dimensions, got ${actual}`, "dimension_mismatch", 422);
    this.expected = expected;
    this.actual = actual;
  }
}

/** Embedding or generation backend unreachable, unauthorized or rate-limited. */
export class ProviderError extends CoachError {
  constructor(message: string, options?: { cause?: unknown; code?: string; status?: number }) {
    super(message, options?.code ?? "provider_error", options?.status ?? 502, { cause: options?.cause });
  }
}

export class EmbeddingUnavailable extends ProviderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause, code: "embedding_unavailable", status: 503 });
  }
}

export class StoreError extends CoachError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "store_error", 502, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
