#!/usr/bin/env node
/**
 * Batch outline extraction
 *
 * Reads every PDF in OUTLINE_INPUT_DIR and writes one JSON outline per file
 * into OUTLINE_OUTPUT_DIR.
 */

import 'dotenv/config';
import { resolve } from 'path';
import { OutlineExtractor } from '../src/index.js';

function readConcurrency(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return 2;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`OUTLINE_MAX_CONCURRENCY must be a positive integer, got "${raw}"`);
  }
  return value;
}

async function main(): Promise<void> {
  const inputDir = resolve(process.env.OUTLINE_INPUT_DIR || 'input');
  const outputDir = resolve(process.env.OUTLINE_OUTPUT_DIR || 'output');
  const maxConcurrentDocuments = readConcurrency(process.env.OUTLINE_MAX_CONCURRENCY);

  console.log(`Input:  ${inputDir}`);
  console.log(`Output: ${outputDir}`);
  console.log('─'.repeat(60));

  const extractor = new OutlineExtractor({ maxConcurrentDocuments });
  const startTime = Date.now();
  const report = await extractor.extractDirectory(inputDir, outputDir);

  for (const result of report.results) {
    if (result.success) {
      console.log(`✓ ${result.file}: ${result.headingCount} headings (${result.processingTime}ms)`);
    } else {
      console.log(`✗ ${result.file}: ${result.error}`);
    }
  }

  const failed = report.results.filter((r) => !r.success).length;
  console.log('─'.repeat(60));
  console.log(`Processed ${report.results.length} files in ${Date.now() - startTime}ms, ${failed} failed`);

  if (failed > 0) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('Outline extraction failed:', error);
  process.exit(1);
});
