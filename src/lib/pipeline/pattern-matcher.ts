/**
 * Pattern Matcher
 *
 * Detects script-specific structural markers at the start of a span's text:
 * section numbering, Roman numerals and chapter/section keywords. Each script
 * profile has its own strategy; the set of scripts is closed so dispatch goes
 * through a plain record rather than a class hierarchy.
 */

import type { KeywordRule, OutlineConfig } from './config'
import type { PatternMatch, PatternTag, ScriptProfile } from './types/outline'

// =============================================================================
// Types
// =============================================================================

interface MarkerHit {
  tag: PatternTag
  depth?: number
}

type PatternStrategy = (text: string, keywords: readonly KeywordRule[]) => MarkerHit | null

// =============================================================================
// Shared Matchers
// =============================================================================

const ROMAN_NUMERAL = /^M{0,3}(CM|CD|D?C{0,3})(XC|XL|L?X{0,3})(IX|IV|V?I{0,3})$/

// Bidi controls that extraction sometimes leaves around RTL text.
const BIDI_CONTROLS = /[\u061C\u200E\u200F\u202A-\u202E\u2066-\u2069]/g

function segmentCount(numbering: string): number {
  return numbering.split(/[.．٫]/).filter(Boolean).length
}

/**
 * Leading section number such as "2", "1.2" or "1.2.3", followed by a letter.
 */
function matchLeadingNumber(text: string, digits: string, separators: string): MarkerHit | null {
  const pattern = new RegExp(
    `^([${digits}]{1,3}(?:[.．٫][${digits}]{1,3})*)${separators}\\p{L}`,
    'u',
  )
  const match = text.match(pattern)
  if (!match) return null
  return { tag: 'NumberedList', depth: segmentCount(match[1]) }
}

function matchRoman(text: string): MarkerHit | null {
  const match = text.match(/^([IVXLCDM]+)\.\s+\S/)
  if (!match || !ROMAN_NUMERAL.test(match[1])) return null
  return { tag: 'RomanNumeral', depth: 1 }
}

function matchKeyword(
  text: string,
  keywords: readonly KeywordRule[],
  digits: string,
): MarkerHit | null {
  const lower = text.toLowerCase()
  for (const rule of keywords) {
    if (!lower.startsWith(rule.token)) continue

    // The keyword must end at a word boundary: "Parts list" is not "Part".
    const rest = text.slice(rule.token.length)
    if (/^[\p{L}\p{M}]/u.test(rest)) continue

    const numbering = rest.match(new RegExp(`^\\s*([${digits}]+(?:[.．٫][${digits}]+)*)`, 'u'))
    const segments = numbering ? segmentCount(numbering[1]) : 0
    return { tag: rule.tag, depth: segments > 1 ? segments : rule.depth }
  }
  return null
}

function firstHit(...candidates: Array<() => MarkerHit | null>): MarkerHit | null {
  for (const candidate of candidates) {
    const hit = candidate()
    if (hit) return hit
  }
  return null
}

// =============================================================================
// Per-Script Strategies
// =============================================================================

const LATIN_DIGITS = '0-9'
const DEVANAGARI_DIGITS = '0-9०-९'
const ARABIC_DIGITS = '0-9٠-٩۰-۹'
const FULLWIDTH_DIGITS = '0-9０-９'

const CJK_NUMERALS = '0-9０-９一二三四五六七八九十百千〇零'
const SINO_KOREAN_NUMERALS = '0-9일이삼사오육칠팔구십백'

const latin: PatternStrategy = (text, keywords) =>
  firstHit(
    () => matchLeadingNumber(text, LATIN_DIGITS, '[.)]?\\s+'),
    () => matchRoman(text),
    () => matchKeyword(text, keywords, LATIN_DIGITS),
  )

const devanagari: PatternStrategy = (text, keywords) =>
  firstHit(
    () => matchLeadingNumber(text, DEVANAGARI_DIGITS, '[.)।]?\\s+'),
    () => matchKeyword(text, keywords, DEVANAGARI_DIGITS),
  )

const cjk: PatternStrategy = (text, keywords) =>
  firstHit(
    () => new RegExp(`^第\\s*[${CJK_NUMERALS}]+\\s*[章部編编]`, 'u').test(text)
      ? { tag: 'ChapterKeyword', depth: 1 }
      : null,
    () => new RegExp(`^第\\s*[${CJK_NUMERALS}]+\\s*[節节]`, 'u').test(text)
      ? { tag: 'SectionKeyword', depth: 2 }
      : null,
    () => /^[一二三四五六七八九十]+、/u.test(text) ? { tag: 'NumberedList', depth: 1 } : null,
    () => /^[（(][一二三四五六七八九十]+[）)]/u.test(text)
      ? { tag: 'NumberedList', depth: 2 }
      : null,
    // No space needed before CJK text, but "12月" and "2024年" are dates.
    () => matchLeadingNumber(text, FULLWIDTH_DIGITS, '[.．、)）]?\\s*(?![年月日時])'),
    () => matchKeyword(text, keywords, FULLWIDTH_DIGITS),
  )

const hangul: PatternStrategy = (text, keywords) =>
  firstHit(
    () => new RegExp(`^제\\s*[${SINO_KOREAN_NUMERALS}]+\\s*[장편]`, 'u').test(text)
      ? { tag: 'ChapterKeyword', depth: 1 }
      : null,
    () => new RegExp(`^제\\s*[${SINO_KOREAN_NUMERALS}]+\\s*절`, 'u').test(text)
      ? { tag: 'SectionKeyword', depth: 2 }
      : null,
    () => matchLeadingNumber(text, LATIN_DIGITS, '[.)]?\\s+'),
    () => matchRoman(text),
    () => /^[가나다라마바사아자차카타파하]\s*[.)]\s*\S/u.test(text)
      ? { tag: 'NumberedList', depth: 2 }
      : null,
    () => matchKeyword(text, keywords, LATIN_DIGITS),
  )

const arabic: PatternStrategy = (raw, keywords) => {
  const text = raw.replace(BIDI_CONTROLS, '').trim()
  return firstHit(
    () => matchLeadingNumber(text, ARABIC_DIGITS, '(?:[.)\\-–]\\s*|\\s+)'),
    // Text extracted in visual order puts the number at the end.
    () => {
      const match = text.match(
        new RegExp(`\\p{L}\\s*[.)\\-–]?\\s+([${ARABIC_DIGITS}]{1,3}(?:[.٫][${ARABIC_DIGITS}]{1,3})*)$`, 'u'),
      )
      return match ? { tag: 'NumberedList', depth: segmentCount(match[1]) } : null
    },
    () => matchKeyword(text, keywords, ARABIC_DIGITS),
  )
}

const STRATEGIES: Readonly<Record<ScriptProfile, PatternStrategy>> = {
  latin,
  devanagari,
  cjk,
  hangul,
  arabic,
}

// =============================================================================
// Main Export
// =============================================================================

/**
 * Match structural markers in `text` for the active script profile.
 *
 * @returns the tag, the configured boost and, where the marker implies one,
 * a nesting depth; `null` when nothing matches
 */
export function matchPattern(
  text: string,
  profile: ScriptProfile,
  config: OutlineConfig,
): PatternMatch | null {
  const trimmed = text.trim()
  if (!trimmed) return null

  const hit = STRATEGIES[profile](trimmed, config.patterns.keywords[profile])
  if (!hit) return null

  return {
    tag: hit.tag,
    boost: config.patterns.boost,
    ...(hit.depth !== undefined ? { depth: hit.depth } : {}),
  }
}
