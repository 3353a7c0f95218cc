import type { OutlineTuning } from '../../types/config.js';
import type { TextLine } from '../layout/types.js';
import { collapseWhitespace, hasLetters } from './normalizer.js';

export type TitleResult = {
  text: string;
  // Size tier the title was taken from; null when no title was found
  fontSize: number | null;
  lines: TextLine[];
  pageNumber: number;
};

type TitleTuning = Pick<OutlineTuning, 'titleSizeTolerance' | 'titleMaxLines'>;

const MARKER_CHARS = '*†‡§¹²³⁴⁵⁶⁷⁸⁹⁰';
const SUPERSCRIPT_MARKER = new RegExp(`[\\p{L}\\p{N}][${MARKER_CHARS}]`, 'u');
const MARKERS_AND_DIGITS = new RegExp(`[\\d${MARKER_CHARS}]+`, 'gu');
const EMAIL = /[\w.+-]+@[\w-]+\.[\w.-]+/;
const URL_LIKE = /(https?:\/\/|www\.)/i;
const AFFILIATION = /\b(universit(?:y|ies)|department|institute|college|laborator(?:y|ies)|school of)\b/i;
const PERSON_NAME = /^\p{Lu}[\p{L}.'’-]*(?:\s+\p{Lu}[\p{L}.'’-]*){1,3}$/u;

/**
 * Picks the title from the first page: the topmost contiguous block of the
 * largest font tier, skipping author and affiliation lines. When a whole tier
 * is excluded the next smaller tier is tried.
 */
export function detectTitle(firstPageLines: TextLine[], tuning: TitleTuning): TitleResult {
  const pageNumber = firstPageLines[0]?.pageNumber ?? 1;
  const none: TitleResult = { text: '', fontSize: null, lines: [], pageNumber };
  if (firstPageLines.length === 0) return none;

  const tiers = [...new Set(firstPageLines.map((l) => l.fontSize))].sort((a, b) => b - a);

  for (const tier of tiers) {
    const isCandidate = (line: TextLine): boolean =>
      Math.abs(line.fontSize - tier) <= tuning.titleSizeTolerance && !isExcludedFromTitle(line.text);

    const start = firstPageLines.findIndex(isCandidate);
    if (start === -1) continue;

    const block: TextLine[] = [];
    for (let i = start; i < firstPageLines.length && block.length < tuning.titleMaxLines; i++) {
      const line = firstPageLines[i];
      if (!isCandidate(line)) break;
      block.push(line);
    }

    return {
      text: collapseWhitespace(block.map((l) => l.text).join(' ')),
      fontSize: tier,
      lines: block,
      pageNumber
    };
  }

  return none;
}

export function isExcludedFromTitle(text: string): boolean {
  if (!hasLetters(text)) return true;
  if (EMAIL.test(text) || URL_LIKE.test(text)) return true;
  if (AFFILIATION.test(text)) return true;
  if (SUPERSCRIPT_MARKER.test(text)) return true;
  return looksLikeAuthorList(text);
}

// "Ada Lovelace1, Charles Babbage2 and Mary Somerville"
export function looksLikeAuthorList(text: string): boolean {
  const parts = text
    .replace(MARKERS_AND_DIGITS, ' ')
    .split(/\s*(?:,|;|&|\band\b)\s*/)
    .map((p) => collapseWhitespace(p))
    .filter((p) => p.length > 0);

  if (parts.length < 2) return false;
  return parts.every((p) => PERSON_NAME.test(p));
}
