/**
 * Outline Assembler
 *
 * Orders the surviving headings by page, vertical position and document order
 * and pairs them with the title.
 */

import { normalizeText } from './stats'
import type { HeadingEntry, LeveledSpan, Outline, OutlineJson } from './types/outline'

export function assembleOutline(title: string, spans: readonly LeveledSpan[]): Outline {
  const ordered = [...spans].sort((a, b) =>
    (a.page - b.page)
    || (a.bbox.y0 - b.bbox.y0)
    || (a.index - b.index)
  )

  const entries: HeadingEntry[] = ordered.map(span => ({
    level: span.level,
    // Downstream consumers expect a single trailing space on heading text.
    text: `${normalizeText(span.text)} `,
    page: span.page,
  }))

  return { title, entries }
}

/**
 * Serializer shape: `{ title, outline: [...] }`.
 */
export function toOutlineJson(outline: Outline): OutlineJson {
  return {
    title: outline.title,
    outline: outline.entries.map(entry => ({ ...entry })),
  }
}
