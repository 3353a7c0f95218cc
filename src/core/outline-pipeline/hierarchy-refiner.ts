import type { OutlineEntry } from '../../types/outline.js';

type RefinerState = {
  lastH1Index: number;
  lastH2Index: number;
};

/**
 * Repairs the H1 → H3 skip: an H3 directly following an H1, with no H2 in
 * between, becomes an H2. No other level changes are made.
 */
export function refineHierarchy(entries: OutlineEntry[]): OutlineEntry[] {
  const state: RefinerState = { lastH1Index: -1, lastH2Index: -1 };

  return entries.map((entry, index) => {
    let level = entry.level;
    if (level === 'H3' && index > 0 && state.lastH1Index === index - 1 && state.lastH2Index < state.lastH1Index) {
      level = 'H2';
    }

    if (level === 'H1') state.lastH1Index = index;
    else if (level === 'H2') state.lastH2Index = index;

    return { ...entry, level };
  });
}

// Text drawn twice at the same spot (fake bold) shows up as back-to-back duplicates.
export function collapseDuplicates(entries: OutlineEntry[]): OutlineEntry[] {
  const out: OutlineEntry[] = [];
  for (const entry of entries) {
    const prev = out[out.length - 1];
    if (prev && prev.text === entry.text && prev.page === entry.page) continue;
    out.push(entry);
  }
  return out;
}
