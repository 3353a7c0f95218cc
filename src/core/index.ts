export * from './outline-pipeline/index.js';
export { UnPDFFragmentSource } from './unpdf-fragment-source.js';
export { PDFJSTextExtractor } from './pdfjs-text-extractor.js';
export { DocumentStatisticsAnalyzer } from './layout/stats.js';
export type { TextLine, PageLines, FontStatistics, DocumentStatistics } from './layout/types.js';
