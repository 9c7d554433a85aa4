/**
 * PDF Service Factory
 *
 * Creates span collectors and manages their lifecycle, either manually or as
 * Effect-scoped resources.
 */

import { Context, Data, Effect, Layer, type Scope } from 'effect'
import type { PdfService } from './types'

// -----------------------------------------------------------------------------
// Errors
// -----------------------------------------------------------------------------

/**
 * Error type for PdfService initialization and read failures.
 */
export class PdfServiceError extends Data.TaggedError('PdfServiceError')<{
  readonly message: string
  readonly cause?: unknown
}> {}

// -----------------------------------------------------------------------------
// Factory
// -----------------------------------------------------------------------------

/**
 * Create and load a Node.js PDF service.
 *
 * @example
 * ```typescript
 * const service = await createPdfService(pdfBuffer)
 * try {
 *   const { spans } = await service.getPageSpans(1)
 * } finally {
 *   service.destroy()
 * }
 * ```
 */
export async function createPdfService(data: Uint8Array): Promise<PdfService> {
  const { NodePdfService } = await import('./node')
  const service = new NodePdfService()
  await service.load(data)
  return service
}

// -----------------------------------------------------------------------------
// Effect Service Tag
// -----------------------------------------------------------------------------

export interface PdfLoader {
  /** Open a document; the caller owns the returned service */
  open(data: Uint8Array): Promise<PdfService>
}

/**
 * Context Tag for the loader that turns file bytes into a PdfService.
 *
 * @example
 * ```typescript
 * const program = Effect.scoped(
 *   Effect.gen(function*() {
 *     const pdf = yield* makePdfServiceScoped(data)
 *     return pdf.getPageCount()
 *   })
 * ).pipe(Effect.provide(NodePdfLoaderLive))
 * ```
 */
export class PdfLoaderTag extends Context.Tag('PdfLoader')<PdfLoaderTag, PdfLoader>() {}

/**
 * Loader backed by pdfjs-dist.
 */
export const NodePdfLoaderLive = Layer.succeed(PdfLoaderTag, { open: createPdfService })

// -----------------------------------------------------------------------------
// Effect-based Scoped Lifecycle Management
// -----------------------------------------------------------------------------

/**
 * Open a PdfService that is destroyed when the surrounding scope closes,
 * including on failure or interruption.
 */
export const makePdfServiceScoped = (
  data: Uint8Array,
): Effect.Effect<PdfService, PdfServiceError, Scope.Scope | PdfLoaderTag> =>
  Effect.acquireRelease(
    Effect.gen(function*() {
      const loader = yield* PdfLoaderTag
      return yield* Effect.tryPromise({
        try: () => loader.open(data),
        catch: error =>
          new PdfServiceError({
            message: `Failed to open PDF: ${error instanceof Error ? error.message : String(error)}`,
            cause: error,
          }),
      })
    }),
    service => Effect.sync(() => service.destroy()),
  )

// Re-export types
export * from './types'
