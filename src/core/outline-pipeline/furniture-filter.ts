import type { OutlineTuning } from '../../types/config.js';
import type { PageLines, TextLine } from '../layout/types.js';
import { numberedLevel } from './heading-rules.js';
import { normalizeForRepetition } from './normalizer.js';

export type FurnitureReason = 'page-number' | 'boilerplate' | 'running-text' | 'margin';

export type FurnitureDecision = {
  line: TextLine;
  reason: FurnitureReason;
};

export type FurnitureResult = {
  pages: PageLines[];
  discarded: FurnitureDecision[];
};

type FurnitureTuning = Pick<
  OutlineTuning,
  | 'marginBandRatio'
  | 'repetitionBandTolerance'
  | 'repetitionMinPages'
  | 'repetitionMinFraction'
  | 'repetitionWindow'
  | 'repetitionWindowMinPages'
>;

const PAGE_NUMBER_PATTERNS: readonly RegExp[] = [
  /^\d{1,4}$/,
  /^page\s+\d+(?:\s+of\s+\d+)?$/i,
  /^\d+\s+page\s+\d+\s+of\s+\d+$/i,
  /^[-–—]\s*\d+\s*[-–—]$/,
  /^\d+\s*\/\s*\d+$/,
  /^\d+\s*:\s*\d+$/
];

const IDENTIFIER = /(https?:\/\/|www\.|\bdoi:|doi\.org\/|\bissn\b|\barxiv:|[\w.+-]+@[\w-]+\.[\w.-]+)/i;
const PUBLICATION = /(\b(?:journal of|proceedings of|conference on|vol\.\s*\d+|volume\s+\d+|copyright|all rights reserved)\b|©)/i;

const EPSILON = 1e-9;

type Occurrence = { page: number; position: number };

/**
 * Tracks, per normalized line text, where on which pages it occurs so that
 * running headers and footers can be recognised by repetition.
 */
class RepetitionCensus {
  private readonly occurrences = new Map<string, Occurrence[]>();

  constructor(
    private readonly pageCount: number,
    private readonly tuning: FurnitureTuning
  ) {}

  record(key: string, occurrence: Occurrence): void {
    if (!key) return;
    const list = this.occurrences.get(key);
    if (list) list.push(occurrence);
    else this.occurrences.set(key, [occurrence]);
  }

  isRepeated(key: string, position: number): boolean {
    const list = this.occurrences.get(key);
    if (!list) return false;

    const pages = [
      ...new Set(
        list
          .filter((o) => Math.abs(o.position - position) <= this.tuning.repetitionBandTolerance + EPSILON)
          .map((o) => o.page)
      )
    ].sort((a, b) => a - b);

    if (pages.length < this.tuning.repetitionMinPages) return false;
    if (pages.length / Math.max(1, this.pageCount) >= this.tuning.repetitionMinFraction) return true;
    return this.maxInWindow(pages) >= this.tuning.repetitionWindowMinPages;
  }

  private maxInWindow(sortedPages: number[]): number {
    let best = 0;
    for (let i = 0; i < sortedPages.length; i++) {
      const end = sortedPages[i] + this.tuning.repetitionWindow;
      let count = 0;
      for (let j = i; j < sortedPages.length && sortedPages[j] < end; j++) count++;
      best = Math.max(best, count);
    }
    return best;
  }
}

export function filterFurniture(pages: PageLines[], bodySize: number, tuning: FurnitureTuning): FurnitureResult {
  const census = new RepetitionCensus(pages.length, tuning);
  const heights = new Map<number, number>();

  for (const page of pages) {
    const height = pageExtent(page);
    heights.set(page.pageNumber, height);
    for (const line of page.lines) {
      census.record(repetitionKey(line.text), {
        page: page.pageNumber,
        position: verticalPosition(line, height)
      });
    }
  }

  const discarded: FurnitureDecision[] = [];
  const kept: PageLines[] = pages.map((page) => {
    const height = heights.get(page.pageNumber) ?? pageExtent(page);
    const lines = page.lines.filter((line) => {
      const reason = furnitureReason(line, height, bodySize, census, tuning);
      if (reason) {
        discarded.push({ line, reason });
        return false;
      }
      return true;
    });
    return { ...page, lines };
  });

  return { pages: kept, discarded };
}

function furnitureReason(
  line: TextLine,
  pageHeight: number,
  bodySize: number,
  census: RepetitionCensus,
  tuning: FurnitureTuning
): FurnitureReason | null {
  const text = line.text.trim();
  const atMostBody = line.fontSize <= bodySize + EPSILON;

  if (PAGE_NUMBER_PATTERNS.some((p) => p.test(text))) return 'page-number';
  if (IDENTIFIER.test(text)) return 'boilerplate';
  if (atMostBody && PUBLICATION.test(text)) return 'boilerplate';

  const position = verticalPosition(line, pageHeight);
  if (census.isRepeated(repetitionKey(text), position)) return 'running-text';

  const inMargin = position < tuning.marginBandRatio || position > 1 - tuning.marginBandRatio;
  if (inMargin && atMostBody) return 'margin';

  return null;
}

// Numbered headings keep their digits so "Chapter 1" and "Chapter 2" stay distinct
function repetitionKey(text: string): string {
  return normalizeForRepetition(text, numberedLevel(text.trim()) === null);
}

function pageExtent(page: PageLines): number {
  if (page.height > 0) return page.height;
  const bottom = page.lines.reduce((max, l) => Math.max(max, l.y1), 0);
  return bottom > 0 ? bottom : 1;
}

function verticalPosition(line: TextLine, pageHeight: number): number {
  return (line.y0 + line.y1) / 2 / pageHeight;
}
