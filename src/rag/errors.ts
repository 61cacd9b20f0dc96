/**
 * RAG Errors
 * ==========
 *
 * Error taxonomy for ingestion, persistence and retrieval.
 * Low-level failures are wrapped into one of these kinds at component
 * boundaries so callers can tell a retryable provider outage apart from
 * a corrupt index or a bad configuration.
 */

// =============================================================================
// Base
// =============================================================================

/**
 * Error codes, one per error class.
 */
export type RagErrorCode =
  | 'CONFIG_ERROR'
  | 'PROVIDER_ERROR'
  | 'CORRUPT_INDEX'
  | 'BUILD_ERROR'
  | 'INDEX_MISMATCH'
  | 'INDEX_IO_ERROR'
  | 'CORPUS_READ_ERROR'
  | 'CANCELLED';

/**
 * Base class for all RAG errors.
 */
export class RagError extends Error {
  constructor(
    public readonly code: RagErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RagError';
  }
}

// =============================================================================
// Configuration
// =============================================================================

/**
 * Invalid chunking, ranking or environment parameters.
 * Always raised before any I/O happens.
 */
export class ConfigError extends RagError {
  constructor(
    public readonly field: string,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super('CONFIG_ERROR', message, { field, ...details });
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Embedding Provider
// =============================================================================

/**
 * Provider failure categories.
 */
export type ProviderErrorKind =
  | 'RATE_LIMITED'
  | 'TIMEOUT'
  | 'NETWORK_ERROR'
  | 'SERVER_ERROR'
  | 'AUTH_ERROR'
  | 'INVALID_REQUEST'
  | 'MALFORMED_RESPONSE'
  | 'RETRY_EXHAUSTED'
  | 'UNKNOWN';

/**
 * An embedding call failed.
 */
export class ProviderError extends RagError {
  constructor(
    public readonly kind: ProviderErrorKind,
    message: string,
    public readonly retryable: boolean = false,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super('PROVIDER_ERROR', message, { kind, retryable, ...details }, options);
    this.name = 'ProviderError';
  }
}

/**
 * Normalize anything thrown by a provider into a ProviderError.
 * Plain errors are classified from their message.
 */
export function toProviderError(error: unknown): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const lower = message.toLowerCase();

  let kind: ProviderErrorKind = 'UNKNOWN';
  if (lower.includes('rate limit') || lower.includes('429')) {
    kind = 'RATE_LIMITED';
  } else if (lower.includes('timeout') || lower.includes('timed out')) {
    kind = 'TIMEOUT';
  } else if (
    lower.includes('network') ||
    lower.includes('econnreset') ||
    lower.includes('econnrefused') ||
    lower.includes('enotfound') ||
    lower.includes('fetch failed')
  ) {
    kind = 'NETWORK_ERROR';
  } else if (/\b50[0-4]\b/.test(lower)) {
    kind = 'SERVER_ERROR';
  }

  return new ProviderError(kind, message, kind !== 'UNKNOWN', {}, { cause: error });
}

// =============================================================================
// Index
// =============================================================================

/**
 * The persisted index failed validation on load.
 */
export class CorruptIndexError extends RagError {
  constructor(
    public readonly path: string,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super('CORRUPT_INDEX', `Corrupt index at ${path}: ${message}`, { path, ...details }, options);
    this.name = 'CorruptIndexError';
  }
}

/**
 * Index and embedder disagree on model or dimensionality.
 */
export class IndexMismatchError extends RagError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super('INDEX_MISMATCH', message, details);
    this.name = 'IndexMismatchError';
  }
}

/**
 * Reading or writing the index file failed.
 */
export class IndexIOError extends RagError {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('INDEX_IO_ERROR', message, { path }, options);
    this.name = 'IndexIOError';
  }
}

// =============================================================================
// Build
// =============================================================================

/**
 * Why a build was aborted.
 */
export type BuildFailureReason =
  | 'PROVIDER_FAILURE'
  | 'CANCELLED'
  | 'EMPTY_CORPUS'
  | 'INVALID_CORPUS'
  | 'DIMENSION_MISMATCH';

/**
 * Aggregated failure during corpus processing. Nothing is persisted.
 */
export class BuildError extends RagError {
  constructor(
    public readonly reason: BuildFailureReason,
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super('BUILD_ERROR', message, { reason, ...details }, options);
    this.name = 'BuildError';
  }
}

/**
 * A source document could not be read or extracted.
 */
export class CorpusReadError extends RagError {
  constructor(
    public readonly file: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super('CORPUS_READ_ERROR', message, { file }, options);
    this.name = 'CorpusReadError';
  }
}

/**
 * An abort signal was observed at a cooperative checkpoint.
 */
export class OperationCancelledError extends RagError {
  constructor(message: string = 'Operation cancelled') {
    super('CANCELLED', message);
    this.name = 'OperationCancelledError';
  }
}

/**
 * Throw if the signal has been aborted.
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
}

/**
 * The `code` of a Node system error, if there is one.
 */
export function errnoCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}
