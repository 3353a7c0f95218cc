import type { LineLevel } from '../../types/outline.js';
import type { TextLine } from '../layout/types.js';
import type { FontLevelMap } from './font-hierarchy.js';
import type { ClassifierTuning, HeadingFilter } from './heading-rules.js';
import { firstMatchingRule, isStronger } from './heading-rules.js';
import { endsWithSentencePeriod, hasLetters, normalizeForComparison, wordCount } from './normalizer.js';
import type { TitleResult } from './title-detector.js';

export type ClassifiedLine = {
  line: TextLine;
  level: LineLevel;
  // Name of the signal that decided the level
  rule: string;
  // Outline text; a run-in heading keeps only its bold lead
  text: string;
};

export type ClassifierContext = {
  fontMap: FontLevelMap;
  title: TitleResult;
};

const TOC_LEADER = /(?:\.{4,}|(?:\s\.){3,}|…{2,})\s*\d+$/;

export function classifyLines(lines: TextLine[], context: ClassifierContext, tuning: ClassifierTuning): ClassifiedLine[] {
  const normalizedTitle = normalizeForComparison(context.title.text);
  return lines.map((line, i) => {
    const following = lines[i + 1];
    const next = following && following.pageNumber === line.pageNumber ? following : null;
    return classifyLine(line, context, tuning, next, normalizedTitle);
  });
}

export function classifyLine(
  line: TextLine,
  context: ClassifierContext,
  tuning: ClassifierTuning,
  next: TextLine | null = null,
  normalizedTitle: string = normalizeForComparison(context.title.text)
): ClassifiedLine {
  const text = line.text.trim();
  const body = (rule: string): ClassifiedLine => ({ line, level: 'body', rule, text });
  const { fontMap, title } = context;

  if (normalizedTitle && line.pageNumber === title.pageNumber) {
    const normalized = normalizeForComparison(text);
    if (title.lines.includes(line) || (normalized.length > 0 && normalizedTitle.includes(normalized))) {
      return { line, level: 'title', rule: 'title', text };
    }
  }

  if (!hasLetters(text)) return body('no-letters');
  if (TOC_LEADER.test(text)) return body('toc-leader');

  const words = wordCount(text);
  const fontLevel = fontMap.levelFor(line.fontSize);
  const structural = firstMatchingRule({ line, text, words, fontLevel, fontMap, tuning, next });

  let level = fontLevel;
  let rule = fontLevel ? 'font' : 'none';
  let headingText = text;
  if (structural && isStronger(structural.level, fontLevel)) {
    level = structural.level;
    rule = structural.rule.name;
    headingText = structural.text;
  }

  if (!level) return body(rule);

  const exempt = new Set<HeadingFilter>(structural?.rule.exempt ?? []);
  if (line.isBold && (fontLevel === 'H1' || fontLevel === 'H2')) {
    exempt.add('length');
    exempt.add('period');
  }
  if (!exempt.has('length') && (wordCount(headingText) > tuning.maxHeadingWords || headingText.length > tuning.maxHeadingChars)) {
    return body('length');
  }
  if (!exempt.has('period') && endsWithSentencePeriod(headingText)) return body('period');

  return { line, level, rule, text: headingText };
}
