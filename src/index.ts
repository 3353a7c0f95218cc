import type {
  DocumentOutline,
  FragmentSource,
  OutlineExtractorConfig,
  OutlineTuning,
  ProgressCallback
} from './types/index.js';
import { OutlinePipeline } from './core/outline-pipeline/pipeline.js';
import { UnPDFFragmentSource } from './core/unpdf-fragment-source.js';
import type { BatchReport } from './batch/batch-runner.js';
import { extractOutlinesFromDirectory } from './batch/batch-runner.js';

// Convenience configuration presets
export const ConfigPresets = {
  /**
   * Defaults: font tiers plus every structural signal
   */
  standard: {},

  /**
   * Fewer false positives for dense prose. Bold body lines stay body text
   * and headings must be shorter.
   */
  strict: {
    tuning: {
      boldLinesAsHeadings: false,
      maxHeadingWords: 10,
      maxHeadingChars: 80
    }
  },

  // Skips font-name resolution; bold and italic then come from style names only
  fast: {
    sourceOptions: { resolveFontNames: false }
  }
} satisfies Record<string, OutlineExtractorConfig>;

export type ConfigPresetName = keyof typeof ConfigPresets;

const DEFAULT_MAX_CONCURRENT_DOCUMENTS = 2;

export class OutlineExtractor {
  private config: OutlineExtractorConfig;
  private pipeline: OutlinePipeline;

  constructor(config: OutlineExtractorConfig = {}) {
    this.config = {
      maxConcurrentDocuments: DEFAULT_MAX_CONCURRENT_DOCUMENTS,
      ...config
    };
    this.pipeline = new OutlinePipeline(this.config.tuning);
  }

  // Chainable configuration methods
  setTuning(tuning: Partial<OutlineTuning>): this {
    const merged = { ...this.config.tuning, ...tuning };
    // Validate before committing so a bad value leaves the extractor unchanged
    this.pipeline = new OutlinePipeline(merged);
    this.config.tuning = merged;
    return this;
  }

  setResolveFontNames(enabled: boolean = true): this {
    this.config.sourceOptions = { ...this.config.sourceOptions, resolveFontNames: enabled };
    return this;
  }

  setMaxConcurrentDocuments(max: number): this {
    if (!Number.isInteger(max) || max < 1) {
      throw new Error(`Invalid maxConcurrentDocuments: ${max}`);
    }
    this.config.maxConcurrentDocuments = max;
    return this;
  }

  applyPreset(preset: ConfigPresetName): this {
    const presetConfig: OutlineExtractorConfig = ConfigPresets[preset];
    if (!presetConfig) {
      throw new Error(`Unknown preset: ${preset}. Available presets: ${Object.keys(ConfigPresets).join(', ')}`);
    }
    if (presetConfig.tuning) this.setTuning(presetConfig.tuning);
    if (presetConfig.sourceOptions) {
      this.config.sourceOptions = { ...this.config.sourceOptions, ...presetConfig.sourceOptions };
    }
    return this;
  }

  getConfig(): Readonly<OutlineExtractorConfig> {
    return this.config;
  }

  async extract(data: ArrayBuffer | Uint8Array, progressCallback?: ProgressCallback): Promise<DocumentOutline> {
    const source = new UnPDFFragmentSource(this.config.sourceOptions);

    try {
      this.reportProgress(progressCallback, { stage: 'parsing', progress: 0, message: 'Loading PDF document...' });
      await source.loadDocument(data);
      const totalPages = source.getPageCount();
      this.reportProgress(progressCallback, {
        stage: 'parsing',
        progress: 10,
        totalPages,
        message: `Loaded ${totalPages} pages`
      });

      return await this.pipeline.run(source.pages(), (progress) => {
        if (progress.stage === 'lines' && progress.currentPage !== undefined) {
          // Line reconstruction covers 10-20%; the pipeline cannot know the page count up front
          this.reportProgress(progressCallback, {
            ...progress,
            progress: Math.round(10 + (10 * progress.currentPage) / Math.max(1, totalPages)),
            totalPages
          });
          return;
        }
        this.reportProgress(progressCallback, progress);
      });
    } finally {
      // Always release the document, even if an error occurs
      await source.dispose();
    }
  }

  async extractFromPages(pages: FragmentSource, progressCallback?: ProgressCallback): Promise<DocumentOutline> {
    return this.pipeline.run(pages, progressCallback);
  }

  async extractDirectory(inputDir: string, outputDir: string): Promise<BatchReport> {
    return extractOutlinesFromDirectory(inputDir, outputDir, {
      extractor: this,
      maxConcurrentDocuments: this.config.maxConcurrentDocuments
    });
  }

  private reportProgress(callback: ProgressCallback | undefined, progress: Parameters<ProgressCallback>[0]): void {
    if (callback) {
      callback(progress);
    }
  }

  // Static convenience for one-off extraction
  static async extractOutline(data: ArrayBuffer | Uint8Array, config?: OutlineExtractorConfig): Promise<DocumentOutline> {
    return new OutlineExtractor(config).extract(data);
  }
}

export * from './types/index.js';
export * from './core/index.js';
export * from './output/outline-emitter.js';
export * from './batch/batch-runner.js';
export * from './fonts/font-style.js';
