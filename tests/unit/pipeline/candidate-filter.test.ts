import { describe, expect, it } from 'vitest'
import {
  dropDuplicates,
  dropFragments,
  filterCandidates,
  type FilterContext,
  isDateOrNumber,
  isTooShort,
  matchesTitle,
  runningHeaderKeys,
} from '../../../src/lib/pipeline/candidate-filter'
import { DEFAULT_OUTLINE_CONFIG } from '../../../src/lib/pipeline/config'
import type { PageGeometry } from '../../../src/lib/pipeline/layout'
import { leveledSpan, textSpan } from '../../utils/span-factory'

// Header band ends at y=48, footer band starts at y=752.
const geometry: PageGeometry = { pageHeight: 800, headerBand: 0.06, footerBand: 0.06 }

describe('candidate filter', () => {
  describe('dropDuplicates', () => {
    it('should keep the first occurrence per page', () => {
      const spans = [
        textSpan('Overview', { y: 100 }),
        textSpan('Overview ', { y: 300 }),
        textSpan('Overview', { page: 2 }),
      ]

      expect(dropDuplicates(spans).map(s => [s.page, s.bbox.y0])).toEqual([[1, 100], [2, 100]])
    })
  })

  describe('isDateOrNumber', () => {
    it('should flag text without letters', () => {
      expect(isDateOrNumber('2024-01-01')).toBe(true)
      expect(isDateOrNumber('42')).toBe(true)
      expect(isDateOrNumber('3.1.4')).toBe(true)
    })

    it('should flag spelled-out dates', () => {
      expect(isDateOrNumber('March 3, 2024')).toBe(true)
      expect(isDateOrNumber('12 January 2024')).toBe(true)
      expect(isDateOrNumber('Sept 2024')).toBe(true)
      expect(isDateOrNumber('Jan. 2024')).toBe(true)
    })

    it('should keep headings that merely start like a month', () => {
      expect(isDateOrNumber('Marketing 2024')).toBe(false)
      expect(isDateOrNumber('Decade 2024')).toBe(false)
      expect(isDateOrNumber('Junior 2024')).toBe(false)
      expect(isDateOrNumber('Octopus 2024')).toBe(false)
      expect(isDateOrNumber('Mayor 2024')).toBe(false)
    })

    it('should keep headings', () => {
      expect(isDateOrNumber('Introduction')).toBe(false)
      expect(isDateOrNumber('Chapter 2024')).toBe(false)
    })
  })

  describe('isTooShort', () => {
    it('should apply the minimum length', () => {
      expect(isTooShort('A', 'latin', 2)).toBe(true)
      expect(isTooShort('AB', 'latin', 2)).toBe(false)
    })

    it('should allow a single ideograph in CJK documents', () => {
      expect(isTooShort('章', 'cjk', 2)).toBe(false)
      expect(isTooShort('章', 'latin', 2)).toBe(true)
      expect(isTooShort('A', 'cjk', 2)).toBe(true)
    })
  })

  describe('dropFragments', () => {
    it('should drop strict prefixes and suffixes of a neighbour on the same page', () => {
      const spans = [
        textSpan('Introduction to', { y: 100 }),
        textSpan('Introduction to Methods', { y: 120 }),
        textSpan('Methods', { y: 140 }),
      ]

      expect(dropFragments(spans).map(s => s.text)).toEqual(['Introduction to Methods'])
    })

    it('should keep fragments on different pages', () => {
      const spans = [
        textSpan('Results', { page: 1 }),
        textSpan('Results and Discussion', { page: 2 }),
      ]

      expect(dropFragments(spans)).toHaveLength(2)
    })
  })

  describe('runningHeaderKeys', () => {
    it('should collect margin texts repeated across pages', () => {
      const spans = [
        textSpan('Page 1', { page: 1, y: 770 }),
        textSpan('Page 2', { page: 2, y: 770 }),
        textSpan('Draft', { page: 1, y: 10 }),
        textSpan('Results', { page: 1, y: 400 }),
        textSpan('Results', { page: 2, y: 400 }),
      ]

      expect([...runningHeaderKeys(spans, geometry, 2)]).toEqual(['page #'])
    })
  })

  describe('matchesTitle', () => {
    it('should compare normalized text case-insensitively', () => {
      expect(matchesTitle('  ANNUAL   report ', 'Annual Report')).toBe(true)
      expect(matchesTitle('Annual Report 2024', 'Annual Report')).toBe(false)
      expect(matchesTitle('Annual Report', '')).toBe(false)
      expect(matchesTitle('Annual Report', undefined)).toBe(false)
    })
  })

  describe('filterCandidates', () => {
    it('should apply every rule in order', () => {
      const runningHeader = textSpan('Annual Report', { page: 1, y: 10, size: 14 })
      const candidates = [
        leveledSpan(runningHeader, 0, 'H1'),
        leveledSpan(textSpan('2024-01-01', { y: 100 }), 1, 'H1'),
        leveledSpan(textSpan('Methods', { y: 150 }), 2, 'H2'),
        leveledSpan(textSpan('Methods', { y: 300 }), 3, 'H2'),
        leveledSpan(textSpan('X', { y: 400 }), 4, 'H3'),
      ]
      const context: FilterContext = {
        profile: 'latin',
        geometry,
        config: DEFAULT_OUTLINE_CONFIG,
        documentSpans: [
          ...candidates,
          textSpan('Annual Report', { page: 2, y: 10, size: 14 }),
        ],
      }

      expect(filterCandidates(candidates, context).map(s => s.index)).toEqual([2])
    })

    it('should keep margin text that does not repeat', () => {
      const preface = leveledSpan(textSpan('Preface', { y: 10, size: 14 }), 0, 'H1')
      const context: FilterContext = {
        profile: 'latin',
        geometry,
        config: DEFAULT_OUTLINE_CONFIG,
        documentSpans: [preface],
      }

      expect(filterCandidates([preface], context)).toEqual([preface])
    })

    it('should drop headings repeating the title', () => {
      const candidates = [
        leveledSpan(textSpan('Annual Report', { y: 100, size: 24 }), 0, 'H1'),
        leveledSpan(textSpan('Background', { y: 300, size: 14 }), 1, 'H2'),
      ]
      const context: FilterContext = {
        profile: 'latin',
        geometry,
        config: DEFAULT_OUTLINE_CONFIG,
        documentSpans: candidates,
        title: 'annual report',
      }

      expect(filterCandidates(candidates, context).map(s => s.text)).toEqual(['Background'])
    })
  })
})
