/**
 * In-memory PdfService and loader for tests that must not parse real PDFs.
 */

import type { PageSpans, PdfLoader, PdfMetadata, PdfService } from '../../src/lib/pdf-service/index'
import type { DocumentInput } from '../../src/lib/pipeline/types/outline'

export class FakePdfService implements PdfService {
  destroyed = false

  constructor(
    private readonly pages: PageSpans[],
    private readonly title?: string,
  ) {}

  async load(): Promise<void> {
    // Pages are supplied up front.
  }

  destroy(): void {
    this.destroyed = true
  }

  getPageCount(): number {
    return this.pages.length
  }

  async getMetadata(): Promise<PdfMetadata> {
    return { pageCount: this.pages.length, title: this.title }
  }

  async getPageSpans(pageNum: number): Promise<PageSpans> {
    const page = this.pages[pageNum - 1]
    if (!page) throw new Error(`Page ${pageNum} out of range`)
    return page
  }
}

/**
 * A document whose pages never finish loading.
 */
export class StalledPdfService extends FakePdfService {
  override getPageSpans(): Promise<PageSpans> {
    return new Promise(() => {})
  }
}

/**
 * Split a document's spans into letter-sized pages.
 */
export function pagesOf(document: DocumentInput, height = 800): PageSpans[] {
  const count = document.pageCount ?? Math.max(0, ...document.spans.map(span => span.page))
  return Array.from({ length: count }, (_, i) => ({
    pageNumber: i + 1,
    width: 612,
    height,
    spans: document.spans.filter(span => span.page === i + 1),
  }))
}

/**
 * Loader that decodes the file bytes as a fixture name and opens the
 * matching fake document.
 */
export function fakeLoader(
  fixtures: Record<string, () => FakePdfService>,
  opened: FakePdfService[] = [],
): PdfLoader {
  return {
    open: async data => {
      const name = new TextDecoder().decode(data)
      const fixture = fixtures[name]
      if (!fixture) throw new Error('Invalid PDF structure')
      const service = fixture()
      opened.push(service)
      return service
    },
  }
}
