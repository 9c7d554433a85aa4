/**
 * Candidate Filter
 *
 * Removes leveled spans that are not headings. Rules run in a fixed order:
 *   1. repeated (text, page) pairs, first occurrence kept
 *   2. dates, numbers and other text without letters
 *   3. text below the minimum length (single ideographs allowed for CJK)
 *   4. prefix/suffix fragments of an adjacent span on the same page
 *   5. running headers and footers repeated in the margin bands
 *   6. headings repeating the document title
 */

import type { OutlineConfig } from './config'
import { classifyCodePoint } from './language-identifier'
import { marginBand, type PageGeometry } from './layout'
import { codePointLength, normalizeForRepetition, normalizeText } from './stats'
import type { ScoredSpan, ScriptProfile, TextSpan } from './types/outline'

export interface FilterContext {
  profile: ScriptProfile
  geometry: PageGeometry
  config: OutlineConfig
  /** Every span of the document, for repetition checks */
  documentSpans: readonly TextSpan[]
  /** Extracted title; headings equal to it are dropped */
  title?: string
}

// ============================================================================
// Rules
// ============================================================================

export function dropDuplicates<T extends TextSpan>(spans: readonly T[]): T[] {
  const seen = new Set<string>()
  return spans.filter(span => {
    const key = `${span.page}\u0000${normalizeText(span.text)}`
    if (seen.has(key)) return false
    seen.add(key)
    return true
  })
}

const MONTH =
  'jan(uary)?|feb(ruary)?|mar(ch)?|apr(il)?|may|june?|july?|aug(ust)?|sep(t(ember)?)?|oct(ober)?|nov(ember)?|dec(ember)?'

// "March 3, 2024", "12 Jan. 2024", "Sept 2024"
const MONTH_DATE = new RegExp(
  `^(\\d{1,2}(st|nd|rd|th)?\\s+)?(${MONTH})\\b\\.?\\s+(\\d{1,2}(st|nd|rd|th)?,?\\s+)?\\d{4}$`,
  'i',
)

export function isDateOrNumber(text: string): boolean {
  const normalized = normalizeText(text)
  if (!/\p{L}/u.test(normalized)) return true
  return MONTH_DATE.test(normalized)
}

export function isTooShort(text: string, profile: ScriptProfile, minLength: number): boolean {
  const normalized = normalizeText(text)
  const length = codePointLength(normalized)
  if (length >= minLength) return false

  const codePoint = normalized.codePointAt(0)
  return !(
    length === 1
    && profile === 'cjk'
    && codePoint !== undefined
    && classifyCodePoint(codePoint) === 'cjk'
  )
}

function isStrictFragment(text: string, of: string): boolean {
  return of.length > text.length && (of.startsWith(text) || of.endsWith(text))
}

export function dropFragments<T extends TextSpan>(spans: readonly T[]): T[] {
  const texts = spans.map(span => normalizeText(span.text))
  return spans.filter((span, i) => {
    for (const j of [i - 1, i + 1]) {
      const neighbour = spans[j]
      if (neighbour === undefined || neighbour.page !== span.page) continue
      if (isStrictFragment(texts[i], texts[j])) return false
    }
    return true
  })
}

/**
 * Normalized texts found in a margin band on at least `minPages` pages.
 */
export function runningHeaderKeys(
  spans: readonly TextSpan[],
  geometry: PageGeometry,
  minPages: number,
): Set<string> {
  const pagesByKey = new Map<string, Set<number>>()
  for (const span of spans) {
    if (marginBand(span.bbox, geometry) === null) continue
    const key = normalizeForRepetition(span.text)
    if (!key) continue
    const pages = pagesByKey.get(key) ?? new Set<number>()
    pages.add(span.page)
    pagesByKey.set(key, pages)
  }

  const keys = new Set<string>()
  for (const [key, pages] of pagesByKey) {
    if (pages.size >= minPages) keys.add(key)
  }
  return keys
}

export function matchesTitle(text: string, title: string | undefined): boolean {
  if (!title) return false
  return normalizeText(text).toLowerCase() === normalizeText(title).toLowerCase()
}

// ============================================================================
// Main Export
// ============================================================================

export function filterCandidates<T extends ScoredSpan>(
  spans: readonly T[],
  context: FilterContext,
): T[] {
  const { profile, geometry, config } = context

  const unique = dropDuplicates(spans)
  const lettered = unique.filter(span => !isDateOrNumber(span.text))
  const longEnough = lettered.filter(
    span => !isTooShort(span.text, profile, config.filter.minHeadingLength),
  )
  const whole = dropFragments(longEnough)

  const running = runningHeaderKeys(
    context.documentSpans,
    geometry,
    config.filter.runningHeaderPages,
  )
  const inBody = whole.filter(span =>
    marginBand(span.bbox, geometry) === null
    || !running.has(normalizeForRepetition(span.text))
  )

  return inBody.filter(span => !matchesTitle(span.text, context.title))
}
