import type { DocumentStatistics, PageLines } from './types.js';

export class DocumentStatisticsAnalyzer {
  analyze(pages: PageLines[]): DocumentStatistics {
    // rounded size -> number of characters set in it
    const charsBySize = new Map<number, number>();

    for (const line of pages.flatMap((p) => p.lines)) {
      const size = roundSize(line.fontSize);
      const chars = line.text.replace(/\s+/g, '').length;
      charsBySize.set(size, (charsBySize.get(size) || 0) + chars);
    }

    // Body text is the size carrying the most characters; ties go to the smaller size.
    let bodyFontSize = 0;
    let maxCount = -1;
    for (const [size, count] of charsBySize) {
      if (count > maxCount || (count === maxCount && size < bodyFontSize)) {
        maxCount = count;
        bodyFontSize = size;
      }
    }

    return { fonts: { bodyFontSize } };
  }
}

export function roundSize(size: number): number {
  return Math.round(size * 100) / 100;
}
