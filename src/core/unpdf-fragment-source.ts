import type { SourceOptions } from '../types/config.js';
import type { FragmentPage } from '../types/fragment.js';
import type { PDFJSPage } from './pdfjs-text-extractor.js';
import { PDFJSTextExtractor } from './pdfjs-text-extractor.js';

type PDFJSDocument = {
  numPages: number;
  getPage(pageNumber: number): Promise<PDFJSPage>;
  destroy?(): Promise<void>;
};

type UnpdfModule = typeof import('unpdf');

let cachedUnpdf: Promise<UnpdfModule> | null = null;

function getUnpdf(): Promise<UnpdfModule> {
  if (!cachedUnpdf) {
    cachedUnpdf = import('unpdf');
  }
  return cachedUnpdf;
}

/**
 * Reads a PDF through unpdf's bundled pdf.js and yields its text fragments
 * page by page. One instance holds one document.
 */
export class UnPDFFragmentSource {
  private document: PDFJSDocument | null = null;
  private readonly textExtractor = new PDFJSTextExtractor();

  constructor(private readonly options: SourceOptions = {}) {}

  async loadDocument(data: ArrayBuffer | Uint8Array): Promise<void> {
    const unpdf = await getUnpdf();
    // pdf.js may transfer the buffer it is given; keep the caller's bytes intact
    const bytes = new Uint8Array(data);
    this.document = await unpdf.getDocumentProxy(bytes);
  }

  getPageCount(): number {
    if (!this.document) {
      throw new Error('Document not loaded');
    }
    return this.document.numPages;
  }

  async *pages(): AsyncGenerator<FragmentPage> {
    const document = this.document;
    if (!document) {
      throw new Error('Document not loaded');
    }

    for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
      const page = await document.getPage(pageNumber);
      const { width, height } = page.getViewport({ scale: 1 });
      const fragments = await this.textExtractor.extractFragments(page, pageNumber, height, this.options);
      yield { pageNumber, width, height, fragments };
    }
  }

  async dispose(): Promise<void> {
    const document = this.document;
    this.document = null;
    if (document?.destroy) {
      await document.destroy();
    }
  }
}
