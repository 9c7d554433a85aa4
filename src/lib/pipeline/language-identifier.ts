/**
 * Language Identifier
 *
 * Picks the script profile for a whole document from the Unicode ranges of
 * its characters. One profile per document, no per-page switching.
 */

import { SCRIPT_PROFILES, type ScriptProfile, type TextSpan } from './types/outline'

type Range = readonly [number, number]

const SCRIPT_RANGES: Readonly<Record<Exclude<ScriptProfile, 'latin'>, readonly Range[]>> = {
  devanagari: [[0x0900, 0x097f]],
  cjk: [
    [0x3040, 0x309f], // Hiragana
    [0x30a0, 0x30ff], // Katakana
    [0x3400, 0x4dbf], // CJK Extension A
    [0x4e00, 0x9fff], // CJK Unified Ideographs
    [0xff66, 0xff9f], // Half-width Katakana
  ],
  hangul: [
    [0xac00, 0xd7a3],
    [0x1100, 0x11ff],
    [0x3130, 0x318f],
  ],
  arabic: [
    [0x0600, 0x06ff],
    [0x0750, 0x077f],
  ],
}

export function classifyCodePoint(codePoint: number): ScriptProfile {
  for (const profile of SCRIPT_PROFILES) {
    if (profile === 'latin') continue
    if (SCRIPT_RANGES[profile].some(([lo, hi]) => codePoint >= lo && codePoint <= hi)) {
      return profile
    }
  }
  return 'latin'
}

/**
 * Count non-whitespace characters per script.
 */
export function tallyScripts(spans: readonly TextSpan[]): Record<ScriptProfile, number> {
  const counts: Record<ScriptProfile, number> = {
    latin: 0,
    devanagari: 0,
    cjk: 0,
    hangul: 0,
    arabic: 0,
  }

  for (const span of spans) {
    for (const char of span.text) {
      if (/\s/.test(char)) continue
      const codePoint = char.codePointAt(0)
      if (codePoint === undefined) continue
      counts[classifyCodePoint(codePoint)]++
    }
  }
  return counts
}

/**
 * Select the script profile with the largest character share. Ties go to
 * the profile listed first, which puts Latin ahead of everything.
 */
export function identifyScript(spans: readonly TextSpan[]): ScriptProfile {
  const counts = tallyScripts(spans)

  let best: ScriptProfile = 'latin'
  for (const profile of SCRIPT_PROFILES) {
    if (counts[profile] > counts[best]) {
      best = profile
    }
  }
  return best
}
