import { readdir, readFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { DocumentOutline } from '../types/outline.js';
import { writeOutlineFile } from '../output/outline-emitter.js';

export interface DocumentOutlineExtractor {
  extract(data: Uint8Array): Promise<DocumentOutline>;
}

export interface BatchOptions {
  extractor: DocumentOutlineExtractor;
  maxConcurrentDocuments?: number;
  // Called once per document; an error it throws is logged and does not stop the batch
  onDocumentComplete?: (result: BatchDocumentResult) => void;
}

export interface BatchDocumentResult {
  file: string;
  outputPath: string;
  success: boolean;
  error?: string;
  headingCount: number;
  processingTime: number;
}

export interface BatchReport {
  results: BatchDocumentResult[];
}

const DEFAULT_MAX_CONCURRENT_DOCUMENTS = 2;

export async function listPdfFiles(inputDir: string): Promise<string[]> {
  const entries = await readdir(inputDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && extname(e.name).toLowerCase() === '.pdf')
    .map((e) => e.name)
    .sort();
}

/**
 * Extracts the outline of every PDF in `inputDir` and writes `<name>.json`
 * into `outputDir`. A failing document is reported in its result and does not
 * stop the others.
 */
export async function extractOutlinesFromDirectory(
  inputDir: string,
  outputDir: string,
  options: BatchOptions
): Promise<BatchReport> {
  const files = await listPdfFiles(inputDir);
  if (files.length === 0) {
    console.warn(`No PDF files found in ${inputDir}`);
    return { results: [] };
  }

  const concurrency = Math.max(1, Math.floor(options.maxConcurrentDocuments ?? DEFAULT_MAX_CONCURRENT_DOCUMENTS));
  const results: BatchDocumentResult[] = new Array(files.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < files.length) {
      const index = next++;
      const result = await processDocument(files[index], inputDir, outputDir, options.extractor);
      results[index] = result;
      try {
        options.onDocumentComplete?.(result);
      } catch (error) {
        console.error(`onDocumentComplete failed for ${result.file}:`, error);
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, files.length) }, () => worker()));
  return { results };
}

async function processDocument(
  file: string,
  inputDir: string,
  outputDir: string,
  extractor: DocumentOutlineExtractor
): Promise<BatchDocumentResult> {
  const outputPath = join(outputDir, `${basename(file, extname(file))}.json`);
  const startTime = Date.now();

  try {
    const data = await readFile(join(inputDir, file));
    const outline = await extractor.extract(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
    await writeOutlineFile(outputPath, outline);
    return {
      file,
      outputPath,
      success: true,
      headingCount: outline.outline.length,
      processingTime: Date.now() - startTime
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Failed to process ${file}:`, error);
    return {
      file,
      outputPath,
      success: false,
      error: message,
      headingCount: 0,
      processingTime: Date.now() - startTime
    };
  }
}
