import { describe, it, expect } from 'vitest';
import { FontLevelMap, buildFontLevelMap, clusterSizes } from '../../src/core/outline-pipeline/font-hierarchy.js';
import { DEFAULT_TUNING } from '../../src/core/outline-pipeline/tuning.js';
import { line } from '../helpers/fragments.js';

const sized = (...sizes: number[]) => sizes.map((size, i) => line(`Line ${i}`, { size, y: 60 + i * 30 }));

describe('clusterSizes', () => {
  it('merges sizes within tolerance of the cluster anchor', () => {
    expect(clusterSizes([17, 18, 17.5, 12], 1)).toEqual([
      { anchor: 18, min: 17, max: 18, members: [18, 17.5, 17] },
      { anchor: 12, min: 12, max: 12, members: [12] }
    ]);
  });

  it('does not depend on input order', () => {
    expect(clusterSizes([12, 18, 17.2, 12], 1)).toEqual(clusterSizes([17.2, 12, 18], 1));
  });
});

describe('buildFontLevelMap', () => {
  it('never maps the title size to a level', () => {
    const map = buildFontLevelMap(sized(24, 20, 16, 14, 12, 12, 12), 24, 12, DEFAULT_TUNING);
    expect(map.sizes).toEqual([20, 16, 14]);
    expect(map.sizes).not.toContain(24);
    expect(map.levelFor(24)).toBeNull();
    expect(map.entries.map((e) => e.level)).toEqual(['H1', 'H2', 'H3']);
  });

  it('ignores body-size tiers while larger tiers remain', () => {
    const map = buildFontLevelMap(sized(24, 18, 12, 10), 24, 12, DEFAULT_TUNING);
    expect(map.sizes).toEqual([18]);
  });

  it('maps a lone non-title tier to H1', () => {
    const map = buildFontLevelMap(sized(24, 12, 12), 24, 12, DEFAULT_TUNING);
    expect(map.entries).toEqual([{ level: 'H1', size: 12, minSize: 12, maxSize: 12 }]);
  });

  it('keeps every tier when no title was found', () => {
    const map = buildFontLevelMap(sized(20, 16, 11), null, 11, DEFAULT_TUNING);
    expect(map.sizes).toEqual([20, 16]);
    expect(map.excludedSize).toBeNull();
  });

  it('is frozen once built', () => {
    const map = buildFontLevelMap(sized(24, 18, 12), 24, 12, DEFAULT_TUNING);
    expect(Object.isFrozen(map)).toBe(true);
    expect(Object.isFrozen(map.entries)).toBe(true);
    expect(Object.isFrozen(map.entries[0])).toBe(true);
  });
});

describe('FontLevelMap.levelFor', () => {
  const map = new FontLevelMap(
    [
      { level: 'H1', size: 18, minSize: 17, maxSize: 18 },
      { level: 'H2', size: 14, minSize: 14, maxSize: 14 }
    ],
    24,
    11,
    1
  );

  it('resolves members of a cluster', () => {
    expect(map.levelFor(17.5)).toBe('H1');
    expect(map.levelFor(14)).toBe('H2');
  });

  it('matches the nearest anchor within tolerance', () => {
    expect(map.levelFor(15)).toBe('H2');
    expect(map.levelFor(19)).toBe('H1');
  });

  it('returns null outside every tolerance', () => {
    expect(map.levelFor(16)).toBeNull();
    expect(map.levelFor(11)).toBeNull();
  });
});
