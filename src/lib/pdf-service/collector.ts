/**
 * Span Collector
 *
 * Reads the pages of an open PdfService into the pipeline's DocumentInput.
 */

import { Effect } from 'effect'
import type { DocumentInput, TextSpan } from '../pipeline/types/outline'
import { PdfServiceError } from './index'
import type { PdfService } from './types'

export interface CollectOptions {
  /** Stop after this many pages */
  maxPages?: number
  /** Stop reading further pages once resident memory reaches this many MB */
  memoryLimitMb?: number
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function residentMemoryMb(): number {
  return process.memoryUsage().rss / 1024 / 1024
}

/**
 * Collect spans (in page order), metadata title, the number of pages read and
 * the tallest page height of a document.
 */
export function collectDocument(
  pdfService: PdfService,
  options: CollectOptions = {},
): Effect.Effect<DocumentInput, PdfServiceError> {
  const { maxPages = Number.POSITIVE_INFINITY, memoryLimitMb } = options

  return Effect.gen(function*() {
    const pageCount = yield* Effect.try({
      try: () => pdfService.getPageCount(),
      catch: error =>
        new PdfServiceError({ message: `Failed to read page count: ${describe(error)}`, cause: error }),
    })

    const metadata = yield* Effect.tryPromise({
      try: () => pdfService.getMetadata(),
      catch: error =>
        new PdfServiceError({ message: `Failed to read metadata: ${describe(error)}`, cause: error }),
    })

    const spans: TextSpan[] = []
    let pageHeight = 0
    let pagesRead = 0
    const lastPage = Math.min(pageCount, maxPages)

    for (let pageNum = 1; pageNum <= lastPage; pageNum++) {
      if (memoryLimitMb !== undefined && residentMemoryMb() >= memoryLimitMb) {
        yield* Effect.logWarning(
          `Memory limit of ${memoryLimitMb}MB reached, stopping after ${pagesRead} page(s)`,
        )
        break
      }

      const page = yield* Effect.tryPromise({
        try: () => pdfService.getPageSpans(pageNum),
        catch: error =>
          new PdfServiceError({
            message: `Failed to read page ${pageNum}: ${describe(error)}`,
            cause: error,
          }),
      })
      spans.push(...page.spans)
      pageHeight = Math.max(pageHeight, page.height)
      pagesRead = pageNum
    }

    yield* Effect.logDebug(`Collected ${spans.length} span(s) from ${pagesRead} of ${pageCount} page(s)`)

    return {
      spans,
      metadata: { title: metadata.title },
      pageCount: pagesRead,
      ...(pageHeight > 0 ? { pageHeight } : {}),
    }
  })
}
