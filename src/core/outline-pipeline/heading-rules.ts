import type { OutlineTuning } from '../../types/config.js';
import type { HeadingLevel } from '../../types/outline.js';
import type { TextLine } from '../layout/types.js';
import type { FontLevelMap } from './font-hierarchy.js';
import { endsWithSentencePeriod, hasLetters, stripZeroWidth, wordCount } from './normalizer.js';

export type ClassifierTuning = Pick<
  OutlineTuning,
  | 'maxHeadingWords'
  | 'maxHeadingChars'
  | 'numberedMaxWords'
  | 'bulletMaxChars'
  | 'colonMaxWords'
  | 'styleBoostMargin'
  | 'boldLinesAsHeadings'
>;

export type RuleContext = {
  line: TextLine;
  text: string;
  words: number;
  fontLevel: HeadingLevel | null;
  fontMap: FontLevelMap;
  tuning: ClassifierTuning;
  // Following line on the same page, if any
  next: TextLine | null;
};

export type HeadingRuleName =
  | 'numbered'
  | 'bold-prefix'
  | 'bullet'
  | 'keyword'
  | 'colon'
  | 'bold-line'
  | 'style-boost';

export type HeadingFilter = 'length' | 'period';

export type HeadingRule = {
  name: HeadingRuleName;
  // Filters a match is exempt from
  exempt: readonly HeadingFilter[];
  match: (ctx: RuleContext) => HeadingLevel | null;
  // Heading text when it is only part of the line
  headingText?: (ctx: RuleContext) => string | null;
};

export type RuleMatch = {
  rule: HeadingRule;
  level: HeadingLevel;
  text: string;
};

const LEVEL_RANK: Record<HeadingLevel, number> = { H1: 1, H2: 2, H3: 3 };

const NUMBERED = /^(\d{1,2}(?:\.\d{1,2}){0,3})\.?\s+(?=[\p{Lu}\p{N}])/u;
const KEYWORD = /^(chapter|part|appendix|section)\s+/i;
// Case-sensitive: "Part a" and "Part civil" are prose
const KEYWORD_LABEL = /^(\d{1,3}(?:\.\d{1,3})*|[IVXLC]{1,6}|[A-Z])(?:[.:]|\s+[:–—-])?(?:\s+|$)/u;
const HEADING_START = /^[\p{Lu}\p{N}]/u;
const LETTERED = /^[A-Z]\.\s+\p{Lu}/u;
const BULLET = /^(?:[•●▪◦‣∙]\s*|[*\-–]\s+)(?=\S)/u;
const LIST_START = /^(?:\d|\p{Lu}|[•●▪◦‣∙*\-–])/u;
const STATEMENT =
  /^(?:theorem|de(?:fi|ﬁ)nition|lemma|corollary|proposition|conjecture|remark|example|proof)(?:\s+\d+(?:\.\d+)*)?\s*([:.])?(?:\s+(.*))?$/iu;
const TITLE_START = /^[\p{Lu}(]/u;

function depthLevel(depth: number): HeadingLevel {
  if (depth <= 1) return 'H1';
  if (depth === 2) return 'H2';
  return 'H3';
}

// "Chapter 3", "Section 2.1 Data", "Appendix A: Tables"; the text after the label must read as a title
function keywordLevel(text: string): HeadingLevel | null {
  const keyword = KEYWORD.exec(text);
  if (!keyword) return null;

  const rest = text.slice(keyword[0].length);
  const label = KEYWORD_LABEL.exec(rest);
  if (!label) return null;

  const tail = rest.slice(label[0].length);
  if (tail.length > 0 && (!HEADING_START.test(tail) || endsWithSentencePeriod(tail))) return null;

  const number = label[1];
  if (keyword[1].toLowerCase() === 'section' && /^\d/.test(number)) return depthLevel(number.split('.').length);
  return 'H1';
}

export function numberedLevel(text: string): HeadingLevel | null {
  const numeric = NUMBERED.exec(text);
  if (numeric) return depthLevel(numeric[1].split('.').length);

  const keyword = keywordLevel(text);
  if (keyword) return keyword;

  return LETTERED.test(text) ? 'H1' : null;
}

// Text of the leading run of bold fragments, as it appears in the line
function boldPrefix(line: TextLine): string | null {
  const fragments = line.fragments;
  let count = 0;
  let chars = 0;
  while (count < fragments.length && fragments[count].isBold) {
    chars += stripZeroWidth(fragments[count].text).replace(/\s/g, '').length;
    count++;
  }
  if (count === 0 || chars === 0) return null;

  let seen = 0;
  let end = 0;
  while (end < line.text.length && seen < chars) {
    if (!/\s/.test(line.text[end])) seen++;
    end++;
  }
  return line.text.slice(0, end).trim();
}

function runInHeading({ line, tuning }: RuleContext): string | null {
  const prefix = boldPrefix(line);
  if (!prefix || !prefix.endsWith(':') || !hasLetters(prefix)) return null;
  return wordCount(prefix) <= tuning.colonMaxWords ? prefix : null;
}

// "Theorem 2.1", "Proof:", "Definition 3 (Compactness)"; unstyled prose after the number is not a heading
function isStatementHeading({ line, text, words, tuning }: RuleContext): boolean {
  const statement = STATEMENT.exec(text);
  if (!statement) return false;
  const styled = line.isBold || line.isItalic;
  if (styled) return true;
  if (words >= tuning.maxHeadingWords) return false;
  const [, separator, rest] = statement;
  return separator !== undefined || rest === undefined || TITLE_START.test(rest);
}

// A bullet whose text carries on directly below is a list item, not a heading
function continuesBelow(line: TextLine, next: TextLine | null): boolean {
  if (!next) return false;
  const gap = next.y0 - line.y1;
  return gap < line.fontSize && !next.isBold && !LIST_START.test(next.text);
}

/**
 * Structural heading rules in priority order. The first rule that matches
 * supplies the structural level; it can only raise the font-based level.
 */
export const HEADING_RULES: readonly HeadingRule[] = [
  {
    name: 'numbered',
    exempt: ['length', 'period'],
    match: ({ text, words, tuning }) => (words <= tuning.numberedMaxWords ? numberedLevel(text) : null)
  },
  {
    name: 'bold-prefix',
    exempt: [],
    match: (ctx) => {
      const heading = runInHeading(ctx);
      if (!heading) return null;
      return BULLET.test(heading) ? 'H3' : 'H2';
    },
    headingText: runInHeading
  },
  {
    name: 'bullet',
    exempt: [],
    match: ({ line, text, next, tuning }) =>
      BULLET.test(text) && text.length <= tuning.bulletMaxChars && !continuesBelow(line, next) ? 'H3' : null
  },
  {
    name: 'keyword',
    exempt: ['period'],
    match: (ctx) => (isStatementHeading(ctx) ? 'H3' : null)
  },
  {
    name: 'colon',
    exempt: [],
    match: ({ text, words, tuning }) =>
      text.endsWith(':') && words <= tuning.colonMaxWords && hasLetters(text) ? 'H3' : null
  },
  {
    name: 'bold-line',
    exempt: [],
    match: ({ line, text, words, tuning }) =>
      tuning.boldLinesAsHeadings &&
      line.allBold &&
      !endsWithSentencePeriod(text) &&
      words <= tuning.maxHeadingWords &&
      text.length <= tuning.maxHeadingChars
        ? 'H3'
        : null
  },
  {
    name: 'style-boost',
    exempt: [],
    match: ({ line, text, words, fontLevel, fontMap, tuning }) => {
      if (fontLevel !== null || !(line.isBold || line.isItalic)) return null;
      const smallest = fontMap.smallest;
      if (!smallest) return null;
      const borderline = line.fontSize < smallest.minSize && smallest.minSize - line.fontSize <= tuning.styleBoostMargin;
      const short = words <= tuning.maxHeadingWords && text.length <= tuning.maxHeadingChars;
      return borderline && short && !endsWithSentencePeriod(text) ? 'H3' : null;
    }
  }
];

export function firstMatchingRule(ctx: RuleContext): RuleMatch | null {
  for (const rule of HEADING_RULES) {
    const level = rule.match(ctx);
    if (level) return { rule, level, text: rule.headingText?.(ctx) ?? ctx.text };
  }
  return null;
}

export function isStronger(a: HeadingLevel, b: HeadingLevel | null): boolean {
  return b === null || LEVEL_RANK[a] < LEVEL_RANK[b];
}
