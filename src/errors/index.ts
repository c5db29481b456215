/**
 * Error Handling Module
 *
 * Standardized error hierarchy for the consolidation pipeline.
 * All errors extend from ConsolidationError which provides:
 * - Error codes for programmatic handling
 * - Context data naming the offending files, columns or codes
 * - Cause chaining for debugging
 *
 * Error Hierarchy:
 * - ConsolidationError (base class)
 *   - ValidationError (shard naming, schema, dates, contiguity)
 *   - ParseError (malformed delimited text)
 *   - NotFoundError (missing source directory)
 *   - StorageError (output write failures)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for consolidation failures.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',

  // Discovery
  INVALID_SHARD_NAME = 'INVALID_SHARD_NAME',
  TOO_FEW_SHARDS = 'TOO_FEW_SHARDS',
  DIRECTORY_NOT_FOUND = 'DIRECTORY_NOT_FOUND',

  // Schema
  VALIDATION_FAILED = 'VALIDATION_FAILED',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  UNMAPPED_ISO_CODE = 'UNMAPPED_ISO_CODE',
  INVALID_DATE = 'INVALID_DATE',

  // Temporal contiguity
  EMPTY_SHARD = 'EMPTY_SHARD',
  SHARD_GAP = 'SHARD_GAP',

  // Parsing
  PARSE_ERROR = 'PARSE_ERROR',

  // Storage
  STORAGE_READ_ERROR = 'STORAGE_READ_ERROR',
  STORAGE_WRITE_ERROR = 'STORAGE_WRITE_ERROR',
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all consolidation errors.
 *
 * @example
 * ```typescript
 * throw new ConsolidationError('Merge produced duplicates', ErrorCode.INTERNAL, {
 *   duplicates: ['ABC01'],
 * })
 * ```
 */
export class ConsolidationError extends Error {
  override readonly name: string = 'ConsolidationError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when input data or layout fails validation.
 *
 * Used for:
 * - Shard files that break the naming convention
 * - Too few shards to merge
 * - Missing columns and unmappable country codes
 * - Unparseable event dates
 * - Empty shards and date gaps between consecutive shards
 */
export class ValidationError extends ConsolidationError {
  override readonly name = 'ValidationError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, ValidationError.prototype)
  }
}

// =============================================================================
// Parse Errors
// =============================================================================

/**
 * Error thrown when a shard cannot be read as delimited text.
 */
export class ParseError extends ConsolidationError {
  override readonly name = 'ParseError'

  constructor(file: string, cause?: Error) {
    super(
      `Failed to parse ${file}: ${cause?.message ?? 'unknown error'}`,
      ErrorCode.PARSE_ERROR,
      { file },
      cause
    )
    Object.setPrototypeOf(this, ParseError.prototype)
  }

  get file(): string {
    return String(this.context.file)
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

/**
 * Error thrown when the source directory does not exist.
 */
export class NotFoundError extends ConsolidationError {
  override readonly name = 'NotFoundError'

  constructor(path: string, cause?: Error) {
    super(
      `Directory not found: ${path}`,
      ErrorCode.DIRECTORY_NOT_FOUND,
      { path },
      cause
    )
    Object.setPrototypeOf(this, NotFoundError.prototype)
  }

  get path(): string {
    return String(this.context.path)
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

/**
 * Error thrown when reading a shard or writing the output fails.
 */
export class StorageError extends ConsolidationError {
  override readonly name = 'StorageError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.STORAGE_WRITE_ERROR,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, StorageError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if a value is a ConsolidationError
 */
export function isConsolidationError(error: unknown): error is ConsolidationError {
  return error instanceof ConsolidationError
}

/**
 * Check if a value is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

/**
 * Coerce an unknown thrown value into an Error for cause chaining
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
