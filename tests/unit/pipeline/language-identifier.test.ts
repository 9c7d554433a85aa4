import { describe, expect, it } from 'vitest'
import {
  classifyCodePoint,
  identifyScript,
  tallyScripts,
} from '../../../src/lib/pipeline/language-identifier'
import { textSpan } from '../../utils/span-factory'

describe('language identifier', () => {
  describe('classifyCodePoint', () => {
    it('should map code points to their script profile', () => {
      expect(classifyCodePoint(0x0041)).toBe('latin') // A
      expect(classifyCodePoint(0x0915)).toBe('devanagari') // क
      expect(classifyCodePoint(0x3042)).toBe('cjk') // あ
      expect(classifyCodePoint(0x7ae0)).toBe('cjk') // 章
      expect(classifyCodePoint(0xd55c)).toBe('hangul') // 한
      expect(classifyCodePoint(0x0645)).toBe('arabic') // م
    })

    it('should count characters outside the known ranges as latin', () => {
      expect(classifyCodePoint(0x0021)).toBe('latin') // !
      expect(classifyCodePoint(0x00e9)).toBe('latin') // é
    })
  })

  describe('tallyScripts', () => {
    it('should skip whitespace and count each remaining character once', () => {
      const counts = tallyScripts([textSpan('第1章 概要')])

      expect(counts).toEqual({ latin: 1, devanagari: 0, cjk: 4, hangul: 0, arabic: 0 })
    })
  })

  describe('identifyScript', () => {
    it('should pick the script with the largest character share', () => {
      expect(identifyScript([textSpan('अध्याय एक')])).toBe('devanagari')
      expect(identifyScript([textSpan('제1장 서론')])).toBe('hangul')
      expect(identifyScript([textSpan('الفصل الأول')])).toBe('arabic')
      expect(identifyScript([textSpan('第1章 概要'), textSpan('No')])).toBe('cjk')
    })

    it('should aggregate over the whole document', () => {
      const spans = [
        textSpan('概要'),
        textSpan('Summary of results', { page: 2 }),
      ]

      expect(identifyScript(spans)).toBe('latin')
    })

    it('should default to latin for empty input', () => {
      expect(identifyScript([])).toBe('latin')
    })

    it('should resolve ties in favour of latin', () => {
      expect(identifyScript([textSpan('ab'), textSpan('कख')])).toBe('latin')
    })
  })
})
