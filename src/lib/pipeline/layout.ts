/**
 * Page geometry shared by the title extractor, feature scorer and filter:
 * line grouping, inter-line gaps and header/footer margin bands.
 */

import type { OutlineConfig } from './config'
import { stableSortBy } from './stats'
import type { BBox, DocumentInput, TextSpan } from './types/outline'

export type MarginBand = 'header' | 'footer'

export interface Line<T extends TextSpan> {
  page: number
  spans: T[]
  bbox: BBox
}

export interface PageGeometry {
  pageHeight: number
  headerBand: number
  footerBand: number
}

export function resolveGeometry(input: DocumentInput, config: OutlineConfig): PageGeometry {
  // Without an explicit height, the lowest span edge stands in for the page bottom.
  const pageHeight = input.pageHeight
    ?? input.spans.reduce((max, span) => Math.max(max, span.bbox.y1), 0)
  return {
    pageHeight,
    headerBand: config.layout.headerBand,
    footerBand: config.layout.footerBand,
  }
}

export function marginBand(bbox: BBox, geometry: PageGeometry): MarginBand | null {
  const { pageHeight } = geometry
  if (pageHeight <= 0) return null
  if (bbox.y1 <= pageHeight * geometry.headerBand) return 'header'
  if (bbox.y0 >= pageHeight * (1 - geometry.footerBand)) return 'footer'
  return null
}

function unionBBox(a: BBox, b: BBox): BBox {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  }
}

function sharesLine(a: BBox, b: BBox): boolean {
  const overlap = Math.min(a.y1, b.y1) - Math.max(a.y0, b.y0)
  const minHeight = Math.min(a.y1 - a.y0, b.y1 - b.y0)
  if (minHeight <= 0) return Math.abs(a.y0 - b.y0) < 1
  return overlap >= minHeight * 0.5
}

/**
 * Group spans into visual lines, ordered by page then top edge. Spans inside a
 * line keep reading order by `x0`.
 */
export function groupLines<T extends TextSpan>(spans: readonly T[]): Line<T>[] {
  const lines: Line<T>[] = []
  const sorted = stableSortBy(spans, span => span.page * 1_000_000 + span.bbox.y0)

  let pageStart = 0
  for (const span of sorted) {
    if (lines[pageStart]?.page !== span.page) pageStart = lines.length

    // Only lines of the current page can match; the earliest match wins.
    let line: Line<T> | undefined
    for (let i = lines.length - 1; i >= pageStart; i--) {
      if (sharesLine(lines[i].bbox, span.bbox)) line = lines[i]
    }
    if (line) {
      line.spans.push(span)
      line.bbox = unionBBox(line.bbox, span.bbox)
    } else {
      lines.push({ page: span.page, spans: [span], bbox: { ...span.bbox } })
    }
  }

  for (const line of lines) {
    line.spans = stableSortBy(line.spans, span => span.bbox.x0)
  }
  return stableSortBy(lines, line => line.page * 1_000_000 + line.bbox.y0)
}

export interface LineGaps {
  above: number
  below: number
}

/**
 * Vertical whitespace above and below each line on its page. A line with no
 * neighbour on that side gets `Infinity`.
 */
export function lineGaps<T extends TextSpan>(lines: readonly Line<T>[]): LineGaps[] {
  return lines.map((line, i) => {
    const prev = lines[i - 1]
    const next = lines[i + 1]
    const above = prev && prev.page === line.page
      ? Math.max(0, line.bbox.y0 - prev.bbox.y1)
      : Number.POSITIVE_INFINITY
    const below = next && next.page === line.page
      ? Math.max(0, next.bbox.y0 - line.bbox.y1)
      : Number.POSITIVE_INFINITY
    return { above, below }
  })
}
