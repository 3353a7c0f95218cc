import type { OutlineTuning } from '../../types/config.js';

/**
 * Heuristic constants. Distances are in PDF points, ratios are fractions of
 * the page height.
 */
export const DEFAULT_TUNING: Readonly<OutlineTuning> = Object.freeze({
  lineProximity: 3,
  wordGapRatio: 0.15,

  titleSizeTolerance: 0.5,
  titleMaxLines: 4,

  fontClusterTolerance: 1,
  fontMatchTolerance: 1,

  marginBandRatio: 0.06,
  repetitionBandTolerance: 0.03,
  repetitionMinPages: 3,
  repetitionMinFraction: 0.3,
  repetitionWindow: 5,
  repetitionWindowMinPages: 3,

  maxHeadingWords: 15,
  maxHeadingChars: 120,
  numberedMaxWords: 20,
  bulletMaxChars: 60,
  colonMaxWords: 10,
  styleBoostMargin: 1.5,
  boldLinesAsHeadings: true
});

const RATIO_KEYS: ReadonlySet<string> = new Set<keyof OutlineTuning>([
  'wordGapRatio',
  'marginBandRatio',
  'repetitionBandTolerance',
  'repetitionMinFraction'
]);

export function resolveTuning(overrides: Partial<OutlineTuning> = {}): OutlineTuning {
  const tuning: OutlineTuning = { ...DEFAULT_TUNING, ...overrides };

  for (const [key, value] of Object.entries(tuning)) {
    if (typeof value === 'boolean') continue;
    if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
      throw new Error(`Invalid tuning value for ${key}: ${String(value)}`);
    }
    if (RATIO_KEYS.has(key) && value >= 1) {
      throw new Error(`Invalid tuning value for ${key}: ${value} (expected a fraction below 1)`);
    }
  }

  return tuning;
}
