/**
 * PDF Service Types
 *
 * The span collector's interface: load a PDF and read, page by page, the
 * styled text runs the outline pipeline classifies.
 */

import type { TextSpan } from '../pipeline/types/outline'

export interface PdfMetadata {
  pageCount: number
  title?: string
  author?: string
  subject?: string
  creator?: string
  producer?: string
}

/**
 * Text runs of one page, with the page size in PDF units.
 */
export interface PageSpans {
  pageNumber: number
  width: number
  height: number
  spans: TextSpan[]
}

/**
 * Unified PDF Service Interface
 *
 * The Node implementation reads documents through pdfjs-dist. Tests supply
 * in-memory implementations.
 */
export interface PdfService {
  // Lifecycle

  /** Load a PDF document from binary data */
  load(data: Uint8Array): Promise<void>

  /** Release resources. Always call when done with the PDF. */
  destroy(): void

  // Metadata

  /** Get the number of pages in the document */
  getPageCount(): number

  /** Get document metadata (title, author, etc.) */
  getMetadata(): Promise<PdfMetadata>

  // Text extraction

  /**
   * Extract styled text runs from a page, in reading order.
   * @param pageNum - 1-indexed page number
   */
  getPageSpans(pageNum: number): Promise<PageSpans>
}
