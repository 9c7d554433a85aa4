/**
 * Error types for outline extraction.
 *
 * The classification stages themselves never fail: empty or ambiguous input
 * degrades to empty results. Only a broken input contract and the I/O around
 * the pipeline surface as errors, each as a Schema.TaggedError so callers can
 * match on `_tag`.
 */

import { Schema } from 'effect'

// =============================================================================
// Pipeline Input
// =============================================================================

/**
 * The span collector handed over data that violates the input contract
 * (non-positive font size, page numbers below 1, non-finite coordinates).
 */
export class SpanContractError
  extends Schema.TaggedError<SpanContractError>()('SpanContractError', {
    message: Schema.String,
    cause: Schema.optional(Schema.Unknown),
  })
{}

// =============================================================================
// Batch Processing
// =============================================================================

/**
 * The batch input or output directory is unusable.
 */
export class BatchInputError extends Schema.TaggedError<BatchInputError>()('BatchInputError', {
  message: Schema.String,
  directory: Schema.String,
  cause: Schema.optional(Schema.Unknown),
}) {}

/**
 * A single document in a batch could not be read or written.
 */
export class DocumentProcessingError
  extends Schema.TaggedError<DocumentProcessingError>()('DocumentProcessingError', {
    message: Schema.String,
    fileName: Schema.String,
    cause: Schema.optional(Schema.Unknown),
  })
{}

/**
 * A document exceeded its processing deadline.
 */
export class TimeoutError extends Schema.TaggedError<TimeoutError>()('TimeoutError', {
  message: Schema.String,
  fileName: Schema.optional(Schema.String),
}) {}

// =============================================================================
// Union Type
// =============================================================================

/**
 * Union of the per-document batch failures.
 *
 * @example
 * ```typescript
 * pipe(
 *   processDocument(file),
 *   Effect.catchTags({
 *     SpanContractError: (e) => reportContract(e),
 *     DocumentProcessingError: (e) => reportIo(e),
 *     TimeoutError: (e) => reportTimeout(e),
 *   })
 * )
 * ```
 */
export type DocumentError = SpanContractError | DocumentProcessingError | TimeoutError
