import { describe, expect, it } from 'vitest'
import { DEFAULT_OUTLINE_CONFIG } from '../../../src/lib/pipeline/config'
import {
  acceptanceThreshold,
  computeBodyFontSize,
  isolatedSpans,
  lengthFactor,
  scoreSpans,
  selectHeadingCandidates,
  sizeFactor,
} from '../../../src/lib/pipeline/feature-scorer'
import { scoredSpan, textSpan } from '../../utils/span-factory'

const config = DEFAULT_OUTLINE_CONFIG

// =============================================================================
// Test Helpers
// =============================================================================

function withScores(scores: number[]) {
  return scores.map((headingScore, i) => scoredSpan(textSpan(`span ${i}`), i, { headingScore }))
}

// =============================================================================
// Tests
// =============================================================================

describe('feature scorer', () => {
  describe('computeBodyFontSize', () => {
    it('should weight sizes by character count', () => {
      const spans = [
        textSpan('Results', { size: 18 }),
        textSpan('The measured values are listed below.', { size: 11 }),
      ]

      expect(computeBodyFontSize(spans)).toBe(11)
    })

    it('should prefer the smaller size on a tie', () => {
      expect(computeBodyFontSize([textSpan('abcd', { size: 12 }), textSpan('wxyz', { size: 10 })]))
        .toBe(10)
    })

    it('should round sizes to half points', () => {
      expect(computeBodyFontSize([textSpan('body', { size: 10.3 })])).toBe(10.5)
      expect(computeBodyFontSize([textSpan('body', { size: 10.2 })])).toBe(10)
    })

    it('should return 0 without spans', () => {
      expect(computeBodyFontSize([])).toBe(0)
    })
  })

  describe('sizeFactor', () => {
    it('should grow linearly and saturate at 1.8x the body size', () => {
      expect(sizeFactor(11, 11, config)).toBe(0)
      expect(sizeFactor(12, 10, config)).toBeCloseTo(0.25, 10)
      expect(sizeFactor(18, 10, config)).toBeCloseTo(1, 10)
      expect(sizeFactor(30, 10, config)).toBe(1)
    })

    it('should be 0 for smaller text or a missing baseline', () => {
      expect(sizeFactor(9, 10, config)).toBe(0)
      expect(sizeFactor(12, 0, config)).toBe(0)
    })
  })

  describe('lengthFactor', () => {
    it('should give short text the full factor', () => {
      expect(lengthFactor('Short heading', config)).toBe(1)
    })

    it('should decay linearly between the short and long limits', () => {
      expect(lengthFactor('x'.repeat(130), config)).toBeCloseTo(0.5, 10)
      expect(lengthFactor('x'.repeat(250), config)).toBe(0)
    })

    it('should not penalize short text with sentence punctuation', () => {
      expect(lengthFactor('Chapter 1. Overview', config)).toBe(1)
    })

    it('should reject long text spanning several sentences', () => {
      const paragraph = 'This is the first sentence of a paragraph. And here is the second one after it.'

      expect(lengthFactor(paragraph, config)).toBe(0)
    })
  })

  describe('isolatedSpans', () => {
    it('should flag lines with more than the median gap on both sides', () => {
      const spans = [
        textSpan('Body line one', { y: 100 }),
        textSpan('Body line two', { y: 115 }),
        textSpan('Body line three', { y: 130 }),
        textSpan('Methods', { y: 170, size: 14 }),
        textSpan('Body line four', { y: 200 }),
        textSpan('Body line five', { y: 215 }),
      ].map((span, index) => ({ ...span, index }))

      expect([...isolatedSpans(spans)]).toEqual([3])
    })

    it('should skip lines mixing font sizes', () => {
      const spans = [
        textSpan('Intro', { y: 100, size: 14 }),
        textSpan('duction', { x: 200, y: 100, size: 11 }),
      ].map((span, index) => ({ ...span, index }))

      expect(isolatedSpans(spans).size).toBe(0)
    })
  })

  describe('scoreSpans', () => {
    it('should score a large, bold, isolated short span at the maximum', () => {
      const [scored] = scoreSpans([textSpan('Overview', { size: 22, bold: true })], 'latin', 11, config)

      expect(scored.headingScore).toBeCloseTo(1, 10)
      expect(scored.index).toBe(0)
      expect(scored.patternTag).toBeUndefined()
    })

    it('should add the pattern boost and record the tag', () => {
      const [scored] = scoreSpans([textSpan('1. Introduction')], 'latin', 11, config)

      // isolation 0.15 + length 0.2 + boost 0.35
      expect(scored.headingScore).toBeCloseTo(0.7, 10)
      expect(scored.patternTag).toBe('NumberedList')
      expect(scored.patternDepth).toBe(1)
    })

    it('should halve the score of text smaller than the body', () => {
      const [scored] = scoreSpans([textSpan('footnote', { size: 8 })], 'latin', 11, config)

      expect(scored.headingScore).toBeCloseTo(0.175, 10)
    })

    it('should keep input order and assign document indexes', () => {
      const scored = scoreSpans(
        [textSpan('b', { page: 2 }), textSpan('a', { page: 1 })],
        'latin',
        11,
        config,
      )

      expect(scored.map(s => [s.text, s.index])).toEqual([['b', 0], ['a', 1]])
    })
  })

  describe('acceptanceThreshold', () => {
    it('should sit a margin above the median score', () => {
      expect(acceptanceThreshold(withScores([0.1, 0.2, 0.9]), config)).toBeCloseTo(0.4, 10)
    })

    it('should be clamped to the configured range', () => {
      expect(acceptanceThreshold(withScores([0, 0, 0]), config)).toBe(0.3)
      expect(acceptanceThreshold(withScores([0.9, 0.9]), config)).toBe(0.6)
    })
  })

  describe('selectHeadingCandidates', () => {
    it('should keep spans at or above the threshold', () => {
      const selected = selectHeadingCandidates(withScores([0.2, 0.2, 0.2, 0.4, 0.9]), config)

      expect(selected.map(s => s.index)).toEqual([3, 4])
    })

    it('should return nothing for no spans', () => {
      expect(selectHeadingCandidates([], config)).toEqual([])
    })
  })
})
