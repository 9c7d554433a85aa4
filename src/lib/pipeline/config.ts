/**
 * Outline Configuration
 *
 * One immutable configuration object is built at process start and passed to
 * every pipeline stage. Thresholds can be overridden from the environment
 * through Effect's Config module; keyword tables are fixed per script.
 */

import { Config, Effect } from 'effect'
import type { PatternTag, ScriptProfile } from './types/outline'

// ============================================================================
// Types
// ============================================================================

export interface KeywordRule {
  /** Keyword as it appears at the start of a heading */
  token: string
  tag: PatternTag
  /** Depth when the keyword carries no numbering of its own */
  depth: number
}

export interface ScoringWeights {
  size: number
  bold: number
  isolation: number
  length: number
}

export interface OutlineConfig {
  document: {
    /** Pages after this one are not analysed */
    maxPages: number
  }
  scoring: {
    weights: ScoringWeights
    /** Size ratio (span / body) at which the size factor saturates */
    sizeSaturationRatio: number
    /** Text at or below this many characters gets the full length factor */
    shortTextLength: number
    /** Text at or above this many characters gets no length factor */
    longTextLength: number
    /** Spans smaller than this fraction of the body size get their score halved */
    smallTextRatio: number
    /** Added to the median score to form the acceptance threshold */
    acceptanceMargin: number
    minAcceptance: number
    maxAcceptance: number
  }
  patterns: {
    /** Score added on a structural pattern match */
    boost: number
    keywords: Readonly<Record<ScriptProfile, readonly KeywordRule[]>>
  }
  clustering: {
    maxLevels: number
    /** Sizes within this ratio of a band's largest size share the band */
    bandRatio: number
    maxIterations: number
  }
  filter: {
    minHeadingLength: number
    /** A margin-band text recurring on this many pages is a running header */
    runningHeaderPages: number
  }
  layout: {
    /** Fraction of the page height treated as header band */
    headerBand: number
    /** Fraction of the page height treated as footer band */
    footerBand: number
  }
  title: {
    sizeTolerance: number
  }
}

// ============================================================================
// Keyword Tables
// ============================================================================

const LATIN_KEYWORDS: readonly KeywordRule[] = [
  { token: 'chapter', tag: 'ChapterKeyword', depth: 1 },
  { token: 'part', tag: 'ChapterKeyword', depth: 1 },
  { token: 'appendix', tag: 'SectionKeyword', depth: 1 },
  { token: 'section', tag: 'SectionKeyword', depth: 2 },
]

const DEVANAGARI_KEYWORDS: readonly KeywordRule[] = [
  { token: 'अध्याय', tag: 'ChapterKeyword', depth: 1 },
  { token: 'भाग', tag: 'ChapterKeyword', depth: 1 },
  { token: 'परिशिष्ट', tag: 'SectionKeyword', depth: 1 },
  { token: 'खंड', tag: 'SectionKeyword', depth: 2 },
  { token: 'अनुभाग', tag: 'SectionKeyword', depth: 2 },
]

const ARABIC_KEYWORDS: readonly KeywordRule[] = [
  { token: 'الفصل', tag: 'ChapterKeyword', depth: 1 },
  { token: 'الباب', tag: 'ChapterKeyword', depth: 1 },
  { token: 'الملحق', tag: 'SectionKeyword', depth: 1 },
  { token: 'القسم', tag: 'SectionKeyword', depth: 2 },
  { token: 'المبحث', tag: 'SectionKeyword', depth: 2 },
]

// CJK and Hangul chapter markers are positional (第…章, 제…장) and live in
// the matcher; these cover the free-standing words.
const CJK_KEYWORDS: readonly KeywordRule[] = [
  { token: '付録', tag: 'SectionKeyword', depth: 1 },
  { token: '附录', tag: 'SectionKeyword', depth: 1 },
  { token: '序章', tag: 'ChapterKeyword', depth: 1 },
]

const HANGUL_KEYWORDS: readonly KeywordRule[] = [
  { token: '부록', tag: 'SectionKeyword', depth: 1 },
  { token: '서론', tag: 'ChapterKeyword', depth: 1 },
  { token: '결론', tag: 'ChapterKeyword', depth: 1 },
]

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_OUTLINE_CONFIG: OutlineConfig = {
  document: {
    maxPages: 50,
  },
  scoring: {
    weights: { size: 0.45, bold: 0.2, isolation: 0.15, length: 0.2 },
    sizeSaturationRatio: 1.8,
    shortTextLength: 60,
    longTextLength: 200,
    smallTextRatio: 0.9,
    acceptanceMargin: 0.2,
    minAcceptance: 0.3,
    maxAcceptance: 0.6,
  },
  patterns: {
    boost: 0.35,
    keywords: {
      latin: LATIN_KEYWORDS,
      devanagari: DEVANAGARI_KEYWORDS,
      cjk: CJK_KEYWORDS,
      hangul: HANGUL_KEYWORDS,
      arabic: ARABIC_KEYWORDS,
    },
  },
  clustering: {
    maxLevels: 4,
    bandRatio: 1.08,
    maxIterations: 50,
  },
  filter: {
    minHeadingLength: 2,
    runningHeaderPages: 2,
  },
  layout: {
    headerBand: 0.06,
    footerBand: 0.06,
  },
  title: {
    sizeTolerance: 0.1,
  },
}

// ============================================================================
// Environment Overrides
// ============================================================================

const unitInterval = (name: string, fallback: number) =>
  Config.number(name).pipe(
    Config.validate({
      message: `${name} must be between 0 and 1`,
      validation: n => n >= 0 && n <= 1,
    }),
    Config.withDefault(fallback),
  )

/**
 * Build the process-wide configuration, applying `OUTLINE_*` overrides.
 *
 * Recognised variables: OUTLINE_ACCEPTANCE_MARGIN, OUTLINE_PATTERN_BOOST,
 * OUTLINE_MIN_HEADING_LENGTH, OUTLINE_MAX_LEVELS (1-4), OUTLINE_MAX_PAGES.
 */
export const loadOutlineConfig = Effect.gen(function*() {
  const base = DEFAULT_OUTLINE_CONFIG

  const acceptanceMargin = yield* unitInterval(
    'OUTLINE_ACCEPTANCE_MARGIN',
    base.scoring.acceptanceMargin,
  )
  const boost = yield* unitInterval('OUTLINE_PATTERN_BOOST', base.patterns.boost)
  const minHeadingLength = yield* Config.integer('OUTLINE_MIN_HEADING_LENGTH').pipe(
    Config.validate({
      message: 'OUTLINE_MIN_HEADING_LENGTH must be at least 1',
      validation: n => n >= 1,
    }),
    Config.withDefault(base.filter.minHeadingLength),
  )
  const maxLevels = yield* Config.integer('OUTLINE_MAX_LEVELS').pipe(
    Config.validate({
      message: 'OUTLINE_MAX_LEVELS must be between 1 and 4',
      validation: n => n >= 1 && n <= 4,
    }),
    Config.withDefault(base.clustering.maxLevels),
  )

  const maxPages = yield* Config.integer('OUTLINE_MAX_PAGES').pipe(
    Config.validate({
      message: 'OUTLINE_MAX_PAGES must be at least 1',
      validation: n => n >= 1,
    }),
    Config.withDefault(base.document.maxPages),
  )

  const config: OutlineConfig = {
    ...base,
    document: { maxPages },
    scoring: { ...base.scoring, acceptanceMargin },
    patterns: { ...base.patterns, boost },
    clustering: { ...base.clustering, maxLevels },
    filter: { ...base.filter, minHeadingLength },
  }
  return config
})
