import type { OutlineProgress, OutlineTuning, ProgressCallback } from '../../types/config.js';
import type { FragmentSource } from '../../types/fragment.js';
import type { DocumentOutline, HeadingLevel, OutlineEntry } from '../../types/outline.js';
import { DocumentStatisticsAnalyzer } from '../layout/stats.js';
import type { DocumentStatistics, PageLines } from '../layout/types.js';
import type { FontLevelMap } from './font-hierarchy.js';
import { buildFontLevelMap } from './font-hierarchy.js';
import type { FurnitureResult } from './furniture-filter.js';
import { filterFurniture } from './furniture-filter.js';
import { collapseDuplicates, refineHierarchy } from './hierarchy-refiner.js';
import type { ClassifiedLine } from './line-classifier.js';
import { classifyLines } from './line-classifier.js';
import { reconstructLines } from './line-reconstructor.js';
import type { TitleResult } from './title-detector.js';
import { detectTitle } from './title-detector.js';
import { resolveTuning } from './tuning.js';

export type OutlineAnalysis = {
  pages: PageLines[];
  statistics: DocumentStatistics;
  title: TitleResult;
  fontMap: FontLevelMap;
  furniture: FurnitureResult;
  classified: ClassifiedLine[];
  outline: DocumentOutline;
};

/**
 * Runs the outline heuristics over one document. Every per-document structure
 * is created inside `analyze`, so one instance can serve concurrent documents.
 */
export class OutlinePipeline {
  private readonly tuning: OutlineTuning;
  private readonly statistics = new DocumentStatisticsAnalyzer();

  constructor(tuning: Partial<OutlineTuning> = {}) {
    this.tuning = resolveTuning(tuning);
  }

  async run(source: FragmentSource, onProgress?: ProgressCallback): Promise<DocumentOutline> {
    const analysis = await this.analyze(source, onProgress);
    return analysis.outline;
  }

  async analyze(source: FragmentSource, onProgress?: ProgressCallback): Promise<OutlineAnalysis> {
    const pages: PageLines[] = [];

    for await (const page of source) {
      const lines = reconstructLines(page, this.tuning);
      pages.push({ pageNumber: page.pageNumber, height: page.height, lines });
      this.report(onProgress, {
        stage: 'lines',
        progress: 0,
        currentPage: page.pageNumber,
        message: `Reconstructed ${lines.length} lines on page ${page.pageNumber}`
      });
    }

    return this.analyzePages(pages, onProgress);
  }

  analyzePages(pages: PageLines[], onProgress?: ProgressCallback): OutlineAnalysis {
    const tuning = this.tuning;
    const allLines = pages.flatMap((p) => p.lines);
    const statistics = this.statistics.analyze(pages);
    const bodySize = statistics.fonts.bodyFontSize;

    this.report(onProgress, { stage: 'title', progress: 20, totalPages: pages.length });
    const title = detectTitle(pages[0]?.lines ?? [], tuning);
    this.debug('title', { text: title.text, fontSize: title.fontSize });

    this.report(onProgress, { stage: 'fonts', progress: 35 });
    const fontMap = buildFontLevelMap(allLines, title.fontSize, bodySize, tuning);
    this.debug('fonts', { bodySize, levels: fontMap.entries });

    this.report(onProgress, { stage: 'furniture', progress: 50 });
    const furniture = filterFurniture(pages, bodySize, tuning);
    this.debug('furniture', {
      discarded: furniture.discarded.map((d) => ({ page: d.line.pageNumber, reason: d.reason, text: d.line.text.slice(0, 80) }))
    });

    this.report(onProgress, { stage: 'classification', progress: 70 });
    const classified = classifyLines(furniture.pages.flatMap((p) => p.lines), { fontMap, title }, tuning);

    this.report(onProgress, { stage: 'refinement', progress: 90 });
    const entries: OutlineEntry[] = [];
    for (const c of classified) {
      if (!isHeading(c.level)) continue;
      this.debug('heading', { level: c.level, rule: c.rule, page: c.line.pageNumber, text: c.text.slice(0, 80) });
      entries.push({ level: c.level, text: c.text, page: c.line.pageNumber });
    }
    const outline: DocumentOutline = {
      title: title.text,
      outline: refineHierarchy(collapseDuplicates(entries))
    };

    this.report(onProgress, {
      stage: 'complete',
      progress: 100,
      totalPages: pages.length,
      message: `Found ${outline.outline.length} headings`
    });

    return { pages, statistics, title, fontMap, furniture, classified, outline };
  }

  private report(callback: ProgressCallback | undefined, progress: OutlineProgress): void {
    if (callback) callback(progress);
  }

  private debugEnabled(): boolean {
    if (Reflect.get(globalThis, '__PDF_OUTLINE_DEBUG__') === true) return true;
    return process.env.PDF_OUTLINE_DEBUG === '1';
  }

  private debug(...args: unknown[]): void {
    if (!this.debugEnabled()) return;
    console.log('[outline]', ...args);
  }
}

function isHeading(level: string): level is HeadingLevel {
  return level === 'H1' || level === 'H2' || level === 'H3';
}
