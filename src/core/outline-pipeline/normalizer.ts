export function stripZeroWidth(s: string): string {
  return s
    .split('\u200B').join('')
    .split('\u200C').join('')
    .split('\u200D').join('')
    .split('\uFEFF').join('');
}

export function collapseWhitespace(s: string): string {
  return s.replace(/\s+/g, ' ').trim();
}

// Case-folded, whitespace-collapsed form used for title containment checks.
export function normalizeForComparison(s: string): string {
  return collapseWhitespace(stripZeroWidth(s)).toLowerCase();
}

// Signature used by the repetition census. With `collapseDigits`, "Draft 3" and "Draft 4" match.
export function normalizeForRepetition(s: string, collapseDigits: boolean = false): string {
  const folded = normalizeForComparison(s);
  return collapseWhitespace(
    (collapseDigits ? folded.replace(/\d+/g, '#') : folded).replace(/[^\p{L}\p{N}#\s]/gu, ' ')
  );
}

export function wordCount(s: string): number {
  const t = s.trim();
  return t.length === 0 ? 0 : t.split(/\s+/).length;
}

export function hasLetters(s: string): boolean {
  return /\p{L}/u.test(s);
}

// A trailing "." that ends a sentence; ellipses do not count.
export function endsWithSentencePeriod(s: string): boolean {
  const t = s.trimEnd();
  return t.endsWith('.') && !t.endsWith('..') && !t.endsWith('…');
}
