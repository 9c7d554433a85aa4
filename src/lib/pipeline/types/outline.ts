/**
 * Data model for the outline extraction pipeline.
 *
 * Spans come in from the span collector, are scored and tagged, clustered into
 * heading levels, filtered and finally assembled into an Outline.
 */

import { Schema } from 'effect'

// =============================================================================
// Input: Spans
// =============================================================================

/**
 * Bounding box in page units. Origin is the top-left corner of the page and
 * `y` grows downwards, so a smaller `y0` is higher on the page.
 */
export const BBox = Schema.Struct({
  x0: Schema.Number.pipe(Schema.finite()),
  y0: Schema.Number.pipe(Schema.finite()),
  x1: Schema.Number.pipe(Schema.finite()),
  y1: Schema.Number.pipe(Schema.finite()),
})
export type BBox = typeof BBox.Type

/**
 * A contiguous run of text sharing font attributes.
 */
export const TextSpan = Schema.Struct({
  text: Schema.String,
  fontSize: Schema.Number.pipe(Schema.finite(), Schema.positive()),
  isBold: Schema.Boolean,
  isItalic: Schema.Boolean,
  bbox: BBox,
  /** 1-based page number */
  page: Schema.Number.pipe(Schema.int(), Schema.greaterThanOrEqualTo(1)),
})
export type TextSpan = typeof TextSpan.Type

export const DocumentMetadata = Schema.Struct({
  title: Schema.optional(Schema.String),
})
export type DocumentMetadata = typeof DocumentMetadata.Type

/**
 * Everything the span collector hands over for one document.
 */
export const DocumentInput = Schema.Struct({
  spans: Schema.Array(TextSpan),
  metadata: Schema.optional(DocumentMetadata),
  pageCount: Schema.optional(Schema.Number.pipe(Schema.int(), Schema.nonNegative())),
  /** Page height in the same units as the span bboxes */
  pageHeight: Schema.optional(Schema.Number.pipe(Schema.finite(), Schema.positive())),
})
export type DocumentInput = typeof DocumentInput.Type

// =============================================================================
// Classification
// =============================================================================

export type ScriptProfile = 'latin' | 'devanagari' | 'cjk' | 'hangul' | 'arabic'

export const SCRIPT_PROFILES: readonly ScriptProfile[] = [
  'latin',
  'devanagari',
  'cjk',
  'hangul',
  'arabic',
]

export type PatternTag = 'NumberedList' | 'RomanNumeral' | 'ChapterKeyword' | 'SectionKeyword'

export interface PatternMatch {
  tag: PatternTag
  /** Score added to the span's heading score */
  boost: number
  /** Nesting depth suggested by the marker, e.g. 3 for "1.2.3" */
  depth?: number
}

export interface ScoredSpan extends TextSpan {
  /** Position of the span in document reading order */
  index: number
  /** Heading likelihood in [0, 1] */
  headingScore: number
  patternTag?: PatternTag
  patternDepth?: number
}

export type HeadingLevel = 'H1' | 'H2' | 'H3' | 'H4'

export const HEADING_LEVELS: readonly HeadingLevel[] = ['H1', 'H2', 'H3', 'H4']

export interface LeveledSpan extends ScoredSpan {
  level: HeadingLevel
}

/**
 * Font-size centroids ordered from H1 (largest) down, at most four.
 */
export interface LevelCluster {
  centroids: number[]
}

// =============================================================================
// Output
// =============================================================================

export interface HeadingEntry {
  level: HeadingLevel
  text: string
  page: number
}

export interface Outline {
  title: string
  entries: HeadingEntry[]
}

/**
 * Wire shape handed to the serializer.
 */
export interface OutlineJson {
  title: string
  outline: HeadingEntry[]
}

export interface OutlineMetadata {
  language: ScriptProfile
  bodyFontSize: number
  pagesProcessed: number
  headingsFound: number
  centroids: number[]
  processingTimeMs: number
}

export interface OutlineResult {
  outline: Outline
  metadata: OutlineMetadata
}
