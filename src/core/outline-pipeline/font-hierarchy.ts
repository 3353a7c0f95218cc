import type { OutlineTuning } from '../../types/config.js';
import type { HeadingLevel } from '../../types/outline.js';
import type { TextLine } from '../layout/types.js';
import { roundSize } from '../layout/stats.js';

const EPSILON = 1e-9;
const LEVELS: readonly HeadingLevel[] = ['H1', 'H2', 'H3'];

export type SizeCluster = {
  anchor: number;
  min: number;
  max: number;
  members: number[];
};

export type FontLevelEntry = Readonly<{
  level: HeadingLevel;
  size: number;
  minSize: number;
  maxSize: number;
}>;

/**
 * Per-document mapping from clustered font sizes to heading levels.
 * Entries are ordered by strictly descending size and never change once built.
 */
export class FontLevelMap {
  readonly entries: readonly FontLevelEntry[];

  constructor(
    entries: FontLevelEntry[],
    readonly excludedSize: number | null,
    readonly bodySize: number,
    private readonly matchTolerance: number
  ) {
    this.entries = Object.freeze(entries.map((e) => Object.freeze({ ...e })));
    Object.freeze(this);
  }

  get sizes(): number[] {
    return this.entries.map((e) => e.size);
  }

  get smallest(): FontLevelEntry | null {
    return this.entries[this.entries.length - 1] ?? null;
  }

  levelFor(size: number): HeadingLevel | null {
    const member = this.entries.find((e) => size >= e.minSize - EPSILON && size <= e.maxSize + EPSILON);
    if (member) return member.level;

    let best: FontLevelEntry | null = null;
    let bestDistance = Number.POSITIVE_INFINITY;
    for (const entry of this.entries) {
      const distance = Math.abs(size - entry.size);
      if (distance <= this.matchTolerance + EPSILON && distance < bestDistance) {
        best = entry;
        bestDistance = distance;
      }
    }
    return best ? best.level : null;
  }
}

// Sort-and-merge over distinct sizes: a size joins the open cluster while it is
// within `tolerance` of that cluster's largest size.
export function clusterSizes(sizes: number[], tolerance: number): SizeCluster[] {
  const sorted = [...new Set(sizes)].sort((a, b) => b - a);
  const clusters: SizeCluster[] = [];

  for (const size of sorted) {
    const open = clusters[clusters.length - 1];
    if (open && open.anchor - size <= tolerance + EPSILON) {
      open.members.push(size);
      open.min = size;
      continue;
    }
    clusters.push({ anchor: size, min: size, max: size, members: [size] });
  }

  return clusters;
}

export function buildFontLevelMap(
  lines: TextLine[],
  titleFontSize: number | null,
  bodySize: number,
  tuning: Pick<OutlineTuning, 'fontClusterTolerance' | 'fontMatchTolerance'>
): FontLevelMap {
  const clusters = clusterSizes(
    lines.map((l) => roundSize(l.fontSize)),
    tuning.fontClusterTolerance
  );

  const contains = (cluster: SizeCluster, size: number): boolean =>
    size >= cluster.min - EPSILON && size <= cluster.max + EPSILON;

  let remaining = titleFontSize === null
    ? clusters
    : clusters.filter((c) => !contains(c, roundSize(titleFontSize)));

  // Body text and anything smaller only compete for levels when nothing larger is left.
  const bodyCluster = clusters.find((c) => contains(c, bodySize));
  if (bodyCluster) {
    const above = remaining.filter((c) => c.min > bodyCluster.max + EPSILON);
    if (above.length > 0) remaining = above;
  }

  const entries: FontLevelEntry[] = remaining.slice(0, LEVELS.length).map((cluster, index) => ({
    level: LEVELS[index],
    size: cluster.anchor,
    minSize: cluster.min,
    maxSize: cluster.max
  }));

  return new FontLevelMap(entries, titleFontSize, bodySize, tuning.fontMatchTolerance);
}
