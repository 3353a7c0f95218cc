import { describe, it, expect } from 'vitest';
import { reconstructLines } from '../../src/core/outline-pipeline/line-reconstructor.js';
import { DEFAULT_TUNING } from '../../src/core/outline-pipeline/tuning.js';
import { frag, page } from '../helpers/fragments.js';

describe('reconstructLines', () => {
  it('inserts a space between fragments separated by a visible gap', () => {
    const lines = reconstructLines(
      page(1, [frag('world', { x: 43 }), frag('Hello', { x: 10 })]),
      DEFAULT_TUNING
    );
    expect(lines).toHaveLength(1);
    expect(lines[0].text).toBe('Hello world');
    expect(lines[0].x0).toBe(10);
  });

  it('joins touching fragments without a space', () => {
    const lines = reconstructLines(
      page(1, [frag('Hel', { x: 10, width: 18 }), frag('lo', { x: 28 })]),
      DEFAULT_TUNING
    );
    expect(lines.map((l) => l.text)).toEqual(['Hello']);
  });

  it('orders lines top to bottom', () => {
    const lines = reconstructLines(
      page(1, [frag('Second', { y: 300 }), frag('First', { y: 100 })]),
      DEFAULT_TUNING
    );
    expect(lines.map((l) => l.text)).toEqual(['First', 'Second']);
  });

  it('groups fragments within the proximity of the line anchor', () => {
    const lines = reconstructLines(
      page(1, [frag('A', { y: 100 }), frag('B', { x: 200, y: 102 }), frag('C', { y: 104 })]),
      DEFAULT_TUNING
    );
    expect(lines.map((l) => l.text)).toEqual(['A B', 'C']);
  });

  it('drops whitespace-only and zero-width fragments', () => {
    const lines = reconstructLines(
      page(1, [frag('  ', { y: 50 }), frag('\u200B', { y: 70 }), frag('Kept', { y: 100 })]),
      DEFAULT_TUNING
    );
    expect(lines.map((l) => l.text)).toEqual(['Kept']);
  });

  it('takes the character-weighted dominant font size', () => {
    const [result] = reconstructLines(
      page(1, [frag('Big', { size: 18 }), frag('smaller text', { size: 10, x: 110 })]),
      DEFAULT_TUNING
    );
    expect(result.text).toBe('Big smaller text');
    expect(result.fontSize).toBe(10);
  });

  it('tracks partial and full boldness', () => {
    const [mixed] = reconstructLines(
      page(1, [frag('Bold', { bold: true }), frag('plain', { x: 200 })]),
      DEFAULT_TUNING
    );
    expect(mixed.isBold).toBe(true);
    expect(mixed.allBold).toBe(false);

    const [bold] = reconstructLines(page(1, [frag('Bold', { bold: true })]), DEFAULT_TUNING);
    expect(bold.allBold).toBe(true);
  });

  it('returns no lines for an empty page', () => {
    expect(reconstructLines(page(3, []), DEFAULT_TUNING)).toEqual([]);
  });

  it('is idempotent over the same fragment set', () => {
    const input = page(2, [
      frag('Results', { size: 16, y: 120 }),
      frag('and', { x: 150, y: 121 }),
      frag('discussion', { x: 190, y: 120 }),
      frag('Body copy follows here.', { y: 160 })
    ]);

    const first = reconstructLines(input, DEFAULT_TUNING);
    const second = reconstructLines(input, DEFAULT_TUNING);
    expect(second).toEqual(first);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    expect(first.every((l) => l.pageNumber === 2)).toBe(true);
  });
});
