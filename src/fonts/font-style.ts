export type FontStyle = 'normal' | 'italic' | 'oblique';

// Checked in order; the first matching token decides the weight
const WEIGHT_TOKENS: ReadonlyArray<readonly [RegExp, number]> = [
  [/thin|hairline/, 100],
  [/extra-?light|ultra-?light/, 200],
  [/light/, 300],
  [/semi-?bold|demi-?bold|(^|[^a-z])demi([^a-z]|$)/, 600],
  [/extra-?bold|ultra-?bold/, 800],
  [/black|heavy/, 900],
  [/bold|(^|[^a-z])bd([^a-z]|$)/, 700],
  [/medium|(^|[^a-z])md([^a-z]|$)/, 500]
];

export function deriveFontWeightFromName(name: string): number {
  const s = name.toLowerCase();

  const numeric = /(^|[^0-9])([1-9]00)([^0-9]|$)/.exec(s);
  if (numeric) return Number(numeric[2]);

  for (const [pattern, weight] of WEIGHT_TOKENS) {
    if (pattern.test(s)) return weight;
  }
  return 400;
}

export function deriveFontStyleFromName(name: string): FontStyle {
  const s = name.toLowerCase();
  if (/italic|(^|[^a-z])(it|ital)([^a-z]|$)/.test(s)) return 'italic';
  if (/oblique|(^|[^a-z])obl([^a-z]|$)/.test(s)) return 'oblique';
  return 'normal';
}

/**
 * Guesses weight and style from a font's PostScript name and family. The name
 * wins for style; the heavier of the two wins for weight.
 */
export function deriveFontWeightAndStyle(args: { fontName?: string; fontFamily?: string }): {
  fontWeight: number;
  fontStyle: FontStyle;
} {
  const fontName = args.fontName ?? '';
  const fontFamily = args.fontFamily ?? '';

  const fontWeight = Math.max(deriveFontWeightFromName(fontName), deriveFontWeightFromName(fontFamily));
  const nameStyle = deriveFontStyleFromName(fontName);
  const fontStyle = nameStyle !== 'normal' ? nameStyle : deriveFontStyleFromName(fontFamily);

  return { fontWeight, fontStyle };
}
