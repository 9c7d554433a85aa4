/**
 * Title Extractor
 *
 * Prefers a usable metadata title; otherwise takes the largest text on the
 * first page, outside the header and footer bands.
 */

import type { OutlineConfig } from './config'
import { groupLines, marginBand, type PageGeometry } from './layout'
import { normalizeText } from './stats'
import type { DocumentInput, TextSpan } from './types/outline'

// ============================================================================
// Metadata
// ============================================================================

const PLACEHOLDER_TITLES = [
  /^(untitled|unknown|document|title|none|null|no title)(\s*\d+)?$/i,
  /\.(pdf|docx?|odt|rtf|txt|pptx?|xlsx?|indd|tex)$/i,
  /^microsoft (word|powerpoint|excel)\s*-/i,
]

/**
 * Metadata title after trimming, or `null` when it is empty or a placeholder
 * written by the producing application.
 */
export function usableMetadataTitle(raw: string | undefined): string | null {
  if (raw === undefined) return null
  const title = normalizeText(raw)
  if (!title) return null
  if (PLACEHOLDER_TITLES.some(pattern => pattern.test(title))) return null
  return title
}

// ============================================================================
// First-Page Layout
// ============================================================================

/**
 * Title from the first page: the first contiguous run of spans at the
 * largest font size, joined line by line in reading order.
 */
export function titleFromFirstPage(
  spans: readonly TextSpan[],
  geometry: PageGeometry,
  config: OutlineConfig,
): string {
  const candidates = spans.filter(span =>
    span.page === 1
    && /\p{L}/u.test(span.text)
    && marginBand(span.bbox, geometry) === null
  )
  if (candidates.length === 0) return ''

  const maxSize = Math.max(...candidates.map(span => span.fontSize))
  const isMax = (span: TextSpan) => maxSize - span.fontSize <= config.title.sizeTolerance

  const start = candidates.findIndex(isMax)
  const run: TextSpan[] = []
  for (let i = start; i < candidates.length && isMax(candidates[i]); i++) {
    run.push(candidates[i])
  }

  return normalizeText(
    groupLines(run)
      .map(line => line.spans.map(span => span.text).join(' '))
      .join(' '),
  )
}

// ============================================================================
// Main Export
// ============================================================================

export function extractTitle(
  input: DocumentInput,
  geometry: PageGeometry,
  config: OutlineConfig,
): string {
  return usableMetadataTitle(input.metadata?.title)
    ?? titleFromFirstPage(input.spans, geometry, config)
}
