/**
 * Standardized error types for ragline.
 *
 * All errors extend from RaglineError, providing:
 * - Error code for programmatic handling
 * - Cause chaining for debugging
 * - Consistent error messages
 *
 * ## Taxonomy
 *
 * | Class | Raised for | Retried |
 * |-------|------------|---------|
 * | `ValidationError` | empty or invalid input | never |
 * | `TransientError` | timeouts, transport failures | embedding only |
 * | `PermanentError` | provider rejected the input | never |
 * | `RetrievalError` | candidate search / fusion failure | never |
 * | `StorageError` | database failures inside adapters | never |
 * | `ConfigError` | invalid configuration | never |
 *
 * Partial batch failures are not exceptions: see `BatchEmbedResult`.
 *
 * ## Usage
 *
 * ```typescript
 * import { RetrievalError } from './errors.js';
 *
 * try {
 *   await index.searchByVector(vector, 10);
 * } catch (err) {
 *   throw new RetrievalError('Vector search failed', 'VECTOR_SEARCH_FAILED', err);
 * }
 * ```
 *
 * @module utils/errors
 */

/**
 * Base error class for all ragline errors.
 *
 * Provides:
 * - `code`: Programmatic error identifier (e.g., 'EMPTY_TEXT')
 * - `cause`: Original error that caused this one (for chaining)
 * - `name`: Error class name (e.g., 'TransientError')
 */
export class RaglineError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Original error that caused this one */
  declare readonly cause?: Error;

  constructor(message: string, code: string, cause?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;

    if (cause instanceof Error) {
      this.cause = cause;
    } else if (cause !== undefined) {
      this.cause = new Error(String(cause));
    }

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Get a formatted string including cause chain.
   */
  toDetailedString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;

    if (this.cause) {
      result += `\n  Caused by: ${this.cause.message}`;
      if (this.cause instanceof RaglineError) {
        result += ` [${this.cause.code}]`;
      }
    }

    return result;
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Input Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Empty or invalid input. Reported to the caller, never retried.
 *
 * Common codes:
 * - `INVALID_OPTIONS`: Component options out of range
 * - `EMPTY_QUERY`: Query text is empty
 * - `INVALID_FILTER`: Metadata filter key or value not supported
 * - `UNSUPPORTED_FILE_TYPE`: Document loader cannot read the file
 */
export class ValidationError extends RaglineError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Provider Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Timeout or transport failure at a provider boundary.
 *
 * Common codes:
 * - `TIMEOUT`: Call exceeded its time limit
 * - `TRANSPORT_FAILED`: Network-level failure
 * - `PROVIDER_UNAVAILABLE`: Provider answered with a retryable status
 */
export class TransientError extends RaglineError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

/**
 * The provider rejected the input. Never retried.
 *
 * Common codes:
 * - `EMPTY_TEXT`: Text to embed is empty or whitespace
 * - `PROVIDER_REJECTED`: Provider answered with a non-retryable status
 * - `DIMENSION_MISMATCH`: Vector has the wrong dimension
 * - `UNPARSEABLE_SCORE`: Relevance reply contained no number
 */
export class PermanentError extends RaglineError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Retrieval Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors during candidate search and fusion. The pipeline aborts the query.
 *
 * Common codes:
 * - `CANDIDATE_SEARCH_FAILED`: Vector or lexical index failed
 * - `QUERY_EMBED_FAILED`: Query embedding failed
 */
export class RetrievalError extends RaglineError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Storage Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors from the storage adapters.
 *
 * Common codes:
 * - `DB_OPEN_FAILED`: Database file could not be opened
 * - `DB_QUERY_FAILED`: Query execution failed
 * - `DB_WRITE_FAILED`: Insert or update failed
 * - `DIMENSION_MISMATCH`: Stored vector and query vector disagree
 */
export class StorageError extends RaglineError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Configuration Errors
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Errors in configuration loading or validation.
 *
 * Common codes:
 * - `CONFIG_PARSE_FAILED`: Failed to parse a configuration file
 * - `CONFIG_INVALID`: Configuration validation failed
 */
export class ConfigError extends RaglineError {
  constructor(message: string, code: string, cause?: unknown) {
    super(message, code, cause);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Check if an error is a ragline error with a specific code.
 */
export function isErrorWithCode(error: unknown, code: string): boolean {
  return error instanceof RaglineError && error.code === code;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isTransientError(error: unknown): error is TransientError {
  return error instanceof TransientError;
}

export function isPermanentError(error: unknown): error is PermanentError {
  return error instanceof PermanentError;
}

export function isRetrievalError(error: unknown): error is RetrievalError {
  return error instanceof RetrievalError;
}

export function isStorageError(error: unknown): error is StorageError {
  return error instanceof StorageError;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Message of any thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error in a RaglineError.
 *
 * If the error is already a RaglineError, returns it unchanged.
 * Otherwise wraps it in a new RaglineError with UNKNOWN code.
 */
export function wrapError(error: unknown, message?: string): RaglineError {
  if (error instanceof RaglineError) {
    return error;
  }

  return new RaglineError(message ?? errorMessage(error), 'UNKNOWN', error);
}
