/**
 * Feature Scorer
 *
 * Assigns every span a heading score in [0, 1] from its size relative to the
 * body text, boldness, vertical isolation, length and structural pattern.
 * The acceptance threshold is taken from the score distribution itself.
 */

import type { OutlineConfig } from './config'
import { groupLines, lineGaps } from './layout'
import { matchPattern } from './pattern-matcher'
import { clamp, codePointLength, median, normalizeText } from './stats'
import type { ScoredSpan, ScriptProfile, TextSpan } from './types/outline'

// ============================================================================
// Body Baseline
// ============================================================================

/**
 * Most common font size, weighted by character count. Sizes are rounded to
 * half points; ties go to the smaller size. Returns 0 for no spans.
 */
export function computeBodyFontSize(spans: readonly TextSpan[]): number {
  const weights = new Map<number, number>()
  for (const span of spans) {
    const size = Math.round(span.fontSize * 2) / 2
    const weight = Math.max(1, codePointLength(span.text.trim()))
    weights.set(size, (weights.get(size) ?? 0) + weight)
  }

  let best = 0
  let bestWeight = 0
  for (const [size, weight] of weights) {
    if (weight > bestWeight || (weight === bestWeight && size < best)) {
      best = size
      bestWeight = weight
    }
  }
  return best
}

// ============================================================================
// Individual Factors
// ============================================================================

export function sizeFactor(fontSize: number, bodyFontSize: number, config: OutlineConfig): number {
  if (bodyFontSize <= 0) return 0
  const ratio = fontSize / bodyFontSize
  return clamp((ratio - 1) / (config.scoring.sizeSaturationRatio - 1), 0, 1)
}

export function lengthFactor(text: string, config: OutlineConfig): number {
  const { shortTextLength, longTextLength } = config.scoring
  const normalized = normalizeText(text)
  const length = codePointLength(normalized)
  if (length <= shortTextLength) return 1

  const sentences = normalized
    .split(/(?<=[.!?。！？])\s+/)
    .filter(part => /\p{L}/u.test(part))
  if (sentences.length > 1) return 0

  if (length >= longTextLength) return 0
  return 1 - (length - shortTextLength) / (longTextLength - shortTextLength)
}

/**
 * Spans whose line carries no other font size and has more than the median
 * inter-line gap above and below. Indexed by the span's `index`.
 */
export function isolatedSpans<T extends TextSpan & { index: number }>(
  spans: readonly T[],
): Set<number> {
  const lines = groupLines(spans)
  const gaps = lineGaps(lines)
  const medianGap = median(gaps.map(g => g.above).filter(Number.isFinite))

  const isolated = new Set<number>()
  lines.forEach((line, i) => {
    const { above, below } = gaps[i]
    if (above <= medianGap || below <= medianGap) return

    const size = line.spans[0].fontSize
    if (line.spans.some(span => Math.abs(span.fontSize - size) > 0.01)) return

    for (const span of line.spans) isolated.add(span.index)
  })
  return isolated
}

// ============================================================================
// Scoring
// ============================================================================

/**
 * Score every span. Output keeps input order and carries the document-order
 * `index` used downstream for stable sorting.
 */
export function scoreSpans(
  spans: readonly TextSpan[],
  profile: ScriptProfile,
  bodyFontSize: number,
  config: OutlineConfig,
): ScoredSpan[] {
  const { weights, smallTextRatio } = config.scoring
  const indexed = spans.map((span, index) => ({ ...span, index }))
  const isolated = isolatedSpans(indexed)

  return indexed.map(span => {
    const length = lengthFactor(span.text, config)
    const pattern = matchPattern(span.text, profile, config)

    let score = weights.size * sizeFactor(span.fontSize, bodyFontSize, config)
      + weights.bold * (span.isBold ? 1 : 0)
      + weights.isolation * (isolated.has(span.index) ? 1 : 0)
      + weights.length * length
      + (pattern ? pattern.boost * length : 0)

    if (bodyFontSize > 0 && span.fontSize < bodyFontSize * smallTextRatio) {
      score *= 0.5
    }

    const scored: ScoredSpan = { ...span, headingScore: clamp(score, 0, 1) }
    if (pattern) {
      scored.patternTag = pattern.tag
      if (pattern.depth !== undefined) scored.patternDepth = pattern.depth
    }
    return scored
  })
}

/**
 * Threshold above the median score. Most spans of a document are body text,
 * so the median sits on the body-text score.
 */
export function acceptanceThreshold(spans: readonly ScoredSpan[], config: OutlineConfig): number {
  const { acceptanceMargin, minAcceptance, maxAcceptance } = config.scoring
  const scores = spans.map(span => span.headingScore)
  return clamp(median(scores) + acceptanceMargin, minAcceptance, maxAcceptance)
}

export function selectHeadingCandidates(
  spans: readonly ScoredSpan[],
  config: OutlineConfig,
): ScoredSpan[] {
  if (spans.length === 0) return []
  const threshold = acceptanceThreshold(spans, config)
  return spans.filter(span => span.headingScore >= threshold)
}
