/**
 * Node.js PDF Service Implementation
 *
 * Uses PDF.js (legacy build) to read text content and font information.
 */

import path from 'path'
import type { PDFDocumentProxy, PDFPageProxy } from 'pdfjs-dist'
import { getDocument, GlobalWorkerOptions } from 'pdfjs-dist/legacy/build/pdf.mjs'
import type { TextItem } from 'pdfjs-dist/types/src/display/api'
import { fileURLToPath } from 'url'
import type { TextSpan } from '../pipeline/types/outline'
import type { PageSpans, PdfMetadata, PdfService } from './types'

// Configure PDF.js worker path for Node.js
const __dirname = path.dirname(fileURLToPath(import.meta.url))
GlobalWorkerOptions.workerSrc = path.join(
  __dirname,
  '../../../node_modules/pdfjs-dist/legacy/build/pdf.worker.mjs',
)

const BOLD_FONT = /bold|black|heavy|semibold|demibold|w[6-9]\b/i
const ITALIC_FONT = /italic|oblique/i

/**
 * A text item positioned in top-left page coordinates.
 */
export interface PlacedItem {
  text: string
  fontName: string
  fontSize: number
  x0: number
  x1: number
  baseline: number
}

function readString(source: unknown, key: string): string | undefined {
  if (typeof source !== 'object' || source === null || !(key in source)) return undefined
  const value: unknown = Reflect.get(source, key)
  return typeof value === 'string' ? value : undefined
}

function isTextItem(item: unknown): item is TextItem {
  return typeof item === 'object' && item !== null && 'str' in item && 'transform' in item
}

/**
 * Merge consecutive items that share a baseline, font and size into one span.
 */
export function mergeItems(
  items: readonly PlacedItem[],
  fonts: ReadonlyMap<string, string>,
  pageNumber: number,
): TextSpan[] {
  const spans: TextSpan[] = []
  let current: PlacedItem | null = null

  const flush = () => {
    if (!current) return
    const text = current.text.replace(/\s+/g, ' ').trim()
    if (text) {
      const realName = fonts.get(current.fontName) ?? current.fontName
      spans.push({
        text,
        fontSize: current.fontSize,
        isBold: BOLD_FONT.test(realName),
        isItalic: ITALIC_FONT.test(realName),
        bbox: {
          x0: current.x0,
          y0: current.baseline - current.fontSize,
          x1: current.x1,
          y1: current.baseline,
        },
        page: pageNumber,
      })
    }
    current = null
  }

  for (const item of items) {
    if (
      current
      && current.fontName === item.fontName
      && Math.abs(current.fontSize - item.fontSize) < 0.01
      && Math.abs(current.baseline - item.baseline) < 0.5
    ) {
      const gap = item.x0 - current.x1
      const joiner = gap > current.fontSize * 0.15 && !/\s$/.test(current.text) ? ' ' : ''
      current.text += joiner + item.text
      current.x1 = Math.max(current.x1, item.x1)
      continue
    }
    flush()
    current = { ...item }
  }
  flush()

  return spans
}

/**
 * Node.js implementation of PdfService using PDF.js
 */
export class NodePdfService implements PdfService {
  private pdfDoc: PDFDocumentProxy | null = null

  async load(data: Uint8Array): Promise<void> {
    const loadingTask = getDocument({
      data,
      useSystemFonts: true,
      isEvalSupported: false,
      standardFontDataUrl: path.join(
        __dirname,
        '../../../node_modules/pdfjs-dist/standard_fonts/',
      ),
      cMapUrl: path.join(__dirname, '../../../node_modules/pdfjs-dist/cmaps/'),
      cMapPacked: true,
    })

    this.pdfDoc = await loadingTask.promise
  }

  destroy(): void {
    if (this.pdfDoc) {
      this.pdfDoc.destroy().catch(error => {
        console.warn('Failed to release PDF document:', error)
      })
      this.pdfDoc = null
    }
  }

  private ensureLoaded(): PDFDocumentProxy {
    if (!this.pdfDoc) {
      throw new Error('PDF not loaded. Call load() first.')
    }
    return this.pdfDoc
  }

  getPageCount(): number {
    return this.ensureLoaded().numPages
  }

  async getMetadata(): Promise<PdfMetadata> {
    const pdf = this.ensureLoaded()
    const metadata = await pdf.getMetadata()
    const info: unknown = metadata.info

    return {
      pageCount: pdf.numPages,
      title: readString(info, 'Title'),
      author: readString(info, 'Author'),
      subject: readString(info, 'Subject'),
      creator: readString(info, 'Creator'),
      producer: readString(info, 'Producer'),
    }
  }

  async getPageSpans(pageNum: number): Promise<PageSpans> {
    const pdf = this.ensureLoaded()
    const page = await pdf.getPage(pageNum)
    const viewport = page.getViewport({ scale: 1.0 })

    // Building the operator list loads the page fonts into commonObjs,
    // which is where the real (PostScript) font names live.
    await page.getOperatorList()
    const textContent = await page.getTextContent()

    const items: PlacedItem[] = []
    for (const item of textContent.items) {
      if (!isTextItem(item) || !item.str) continue

      const [, , c, d, e, f] = item.transform.map(Number)
      const fontSize = Math.hypot(c, d) || item.height
      if (!(fontSize > 0)) continue

      items.push({
        text: item.str,
        fontName: item.fontName,
        fontSize,
        x0: e,
        x1: e + item.width,
        baseline: viewport.height - f,
      })
    }

    const fonts = resolveFontNames(page, items)
    return {
      pageNumber: pageNum,
      width: viewport.width,
      height: viewport.height,
      spans: mergeItems(items, fonts, pageNum),
    }
  }
}

/**
 * Map PDF.js internal font ids (g_d0_f1) to the embedded font names.
 */
function resolveFontNames(page: PDFPageProxy, items: readonly PlacedItem[]): Map<string, string> {
  const names = new Map<string, string>()
  for (const { fontName } of items) {
    if (names.has(fontName)) continue
    try {
      if (!page.commonObjs.has(fontName)) continue
      const font: unknown = page.commonObjs.get(fontName)
      const name = readString(font, 'name')
      if (name) names.set(fontName, name)
    } catch (error) {
      console.warn(`[Page ${page.pageNumber}] Could not resolve font ${fontName}:`, error)
    }
  }
  return names
}
