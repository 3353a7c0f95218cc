import type { OutlineTuning } from '../../types/config.js';
import type { FragmentPage, TextFragment } from '../../types/fragment.js';
import type { TextLine } from '../layout/types.js';
import { roundSize } from '../layout/stats.js';
import { collapseWhitespace, stripZeroWidth } from './normalizer.js';

type LineTuning = Pick<OutlineTuning, 'lineProximity' | 'wordGapRatio'>;

/**
 * Groups a page's fragments into visual lines, top to bottom.
 *
 * A fragment joins the open line while its top edge stays within
 * `lineProximity` of the line's first fragment.
 */
export function reconstructLines(page: FragmentPage, tuning: LineTuning): TextLine[] {
  const usable = page.fragments.filter((f) => stripZeroWidth(f.text).trim().length > 0);
  if (usable.length === 0) return [];

  const ordered = [...usable].sort((a, b) => a.bbox.y0 - b.bbox.y0);

  const groups: TextFragment[][] = [];
  let current: TextFragment[] = [];
  let anchorY = 0;

  for (const fragment of ordered) {
    if (current.length > 0 && Math.abs(fragment.bbox.y0 - anchorY) < tuning.lineProximity) {
      current.push(fragment);
      continue;
    }
    if (current.length > 0) groups.push(current);
    current = [fragment];
    anchorY = fragment.bbox.y0;
  }
  if (current.length > 0) groups.push(current);

  return groups.map((group) => buildLine(group, page.pageNumber, tuning.wordGapRatio));
}

export function buildLine(fragments: TextFragment[], pageNumber: number, wordGapRatio: number): TextLine {
  const sorted = [...fragments].sort((a, b) => a.bbox.x0 - b.bbox.x0 || a.bbox.y0 - b.bbox.y0);

  let text = '';
  let prev: TextFragment | null = null;
  for (const fragment of sorted) {
    if (prev && needsSpace(prev, fragment, wordGapRatio)) text += ' ';
    text += stripZeroWidth(fragment.text);
    prev = fragment;
  }

  return {
    fragments: sorted,
    text: collapseWhitespace(text),
    fontSize: dominantFontSize(sorted),
    isBold: sorted.some((f) => f.isBold),
    isItalic: sorted.some((f) => f.isItalic),
    allBold: sorted.every((f) => f.isBold),
    x0: Math.min(...sorted.map((f) => f.bbox.x0)),
    x1: Math.max(...sorted.map((f) => f.bbox.x1)),
    y0: Math.min(...sorted.map((f) => f.bbox.y0)),
    y1: Math.max(...sorted.map((f) => f.bbox.y1)),
    pageNumber
  };
}

function needsSpace(prev: TextFragment, next: TextFragment, wordGapRatio: number): boolean {
  // Existing whitespace already separates the two; collapse handles the rest.
  if (/\s$/.test(prev.text) || /^\s/.test(next.text)) return false;

  const gap = next.bbox.x0 - prev.bbox.x1;
  const avgFontSize = Math.max(1, (prev.fontSize + next.fontSize) / 2);
  return gap >= avgFontSize * wordGapRatio;
}

// Character-weighted mode of the fragment sizes; ties go to the larger size.
function dominantFontSize(fragments: TextFragment[]): number {
  const weights = new Map<number, number>();
  for (const f of fragments) {
    const size = roundSize(f.fontSize);
    weights.set(size, (weights.get(size) || 0) + Math.max(1, f.text.trim().length));
  }

  let best = 0;
  let bestWeight = -1;
  for (const [size, weight] of weights) {
    if (weight > bestWeight || (weight === bestWeight && size > best)) {
      best = size;
      bestWeight = weight;
    }
  }
  return best;
}
