/**
 * Outline Pipeline
 *
 * Runs the classification stages in order over one document's spans:
 *   Language → Title → Scoring (with pattern matching) → Level clustering
 *   → Candidate filtering → Assembly
 *
 * Every stage is a pure function that may return empty results. The only
 * failure is a span sequence that breaks the input contract.
 */

import { Effect, Schema } from 'effect'
import { DEFAULT_OUTLINE_CONFIG, type OutlineConfig } from './config'
import { filterCandidates } from './candidate-filter'
import { computeBodyFontSize, scoreSpans, selectHeadingCandidates } from './feature-scorer'
import { identifyScript } from './language-identifier'
import { resolveGeometry } from './layout'
import { clusterLevels } from './level-clusterer'
import { assembleOutline } from './outline-assembler'
import { extractTitle, usableMetadataTitle } from './title-extractor'
import { SpanContractError } from './types/errors'
import { DocumentInput, type OutlineResult } from './types/outline'

// =============================================================================
// Input Validation
// =============================================================================

/**
 * Check the collector's output against the input contract.
 */
export function decodeDocument(input: unknown): Effect.Effect<DocumentInput, SpanContractError> {
  return Schema.decodeUnknown(DocumentInput)(input).pipe(
    Effect.mapError(error =>
      new SpanContractError({
        message: `Span input violates the collector contract: ${error.message}`,
        cause: error,
      })
    ),
  )
}

// =============================================================================
// Main Export
// =============================================================================

/**
 * Extract the title and heading outline of one document.
 *
 * @param input - collector output; validated before classification
 * @param config - process-wide configuration
 */
export function extractOutline(
  input: unknown,
  config: OutlineConfig = DEFAULT_OUTLINE_CONFIG,
): Effect.Effect<OutlineResult, SpanContractError> {
  return Effect.gen(function*() {
    const startTime = Date.now()
    const decoded = yield* decodeDocument(input)
    const { maxPages } = config.document
    const spans = decoded.spans.filter(span => span.page <= maxPages)
    if (spans.length < decoded.spans.length) {
      yield* Effect.logDebug(`Analysing the first ${maxPages} page(s) only`)
    }
    const document: DocumentInput = { ...decoded, spans }

    const language = identifyScript(spans)
    const geometry = resolveGeometry(document, config)

    const title = extractTitle(document, geometry, config)
    const rawTitle = document.metadata?.title
    if (rawTitle !== undefined && usableMetadataTitle(rawTitle) === null) {
      yield* Effect.logDebug(`Ignoring placeholder metadata title "${rawTitle}"`)
    }

    const bodyFontSize = computeBodyFontSize(spans)
    if (bodyFontSize === 0) {
      yield* Effect.logDebug('No body text baseline, document has no spans')
    }

    const scored = scoreSpans(spans, language, bodyFontSize, config)
    // Let a surrounding deadline interrupt between the heavier stages.
    yield* Effect.yieldNow()
    const candidates = selectHeadingCandidates(scored, config)
    const { cluster, leveled } = clusterLevels(candidates, config)
    if (candidates.length > 0 && cluster.centroids.length < config.clustering.maxLevels) {
      yield* Effect.logDebug(
        `Heading sizes collapsed to ${cluster.centroids.length} level(s): ${
          cluster.centroids.map(c => c.toFixed(2)).join(', ')
        }`,
      )
    }

    const kept = filterCandidates(leveled, {
      profile: language,
      geometry,
      config,
      documentSpans: spans,
      title,
    })
    const outline = assembleOutline(title, kept)

    const pagesProcessed = Math.min(
      maxPages,
      document.pageCount ?? spans.reduce((max, span) => Math.max(max, span.page), 0),
    )

    yield* Effect.logDebug(
      `Found ${outline.entries.length} heading(s) from ${candidates.length} candidate(s)`,
    )

    return {
      outline,
      metadata: {
        language,
        bodyFontSize,
        pagesProcessed,
        headingsFound: outline.entries.length,
        centroids: cluster.centroids,
        processingTimeMs: Date.now() - startTime,
      },
    }
  }).pipe(Effect.annotateLogs({ stage: 'outline' }))
}

/**
 * Synchronous wrapper for callers outside Effect.
 * Throws a FiberFailure carrying the SpanContractError on malformed input.
 */
export function extractOutlineSync(
  input: unknown,
  config: OutlineConfig = DEFAULT_OUTLINE_CONFIG,
): OutlineResult {
  return Effect.runSync(extractOutline(input, config))
}
