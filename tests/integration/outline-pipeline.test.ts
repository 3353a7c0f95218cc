import { describe, it, expect, vi, afterEach } from 'vitest';
import { OutlinePipeline } from '../../src/core/outline-pipeline/pipeline.js';
import type { FragmentPage } from '../../src/types/fragment.js';
import type { OutlineProgress } from '../../src/types/config.js';
import { frag, page } from '../helpers/fragments.js';

function reportPages(): FragmentPage[] {
  return [
    page(1, [
      frag('Quarterly Review', { size: 10, y: 30 }),
      frag('Annual Report', { size: 24, y: 80 }),
      frag('1. Overview', { size: 18, y: 140 }),
      frag('The first page describes the plan in detail.', { size: 11, y: 180 }),
      frag('1', { size: 10, y: 770 })
    ]),
    page(2, [
      frag('Quarterly Review', { size: 10, y: 30 }),
      frag('1.1 Scope', { size: 14, y: 100 }),
      frag('Scope covers every regional office we visited.', { size: 11, y: 140 }),
      frag('2', { size: 10, y: 770 })
    ]),
    page(3, [
      frag('Quarterly Review', { size: 10, y: 30 }),
      frag('2. Results', { size: 18, y: 100 }),
      frag('Results improved across all measured services.', { size: 11, y: 140 }),
      frag('3', { size: 10, y: 770 })
    ])
  ];
}

describe('OutlinePipeline', () => {
  afterEach(() => {
    Reflect.deleteProperty(globalThis, '__PDF_OUTLINE_DEBUG__');
    vi.restoreAllMocks();
  });

  it('extracts the title and a single numbered heading', async () => {
    const pipeline = new OutlinePipeline();
    const analysis = await pipeline.analyze([
      page(1, [
        frag('Project Report', { size: 24, y: 100 }),
        frag('1. Introduction', { size: 18, y: 200 }),
        frag('Background text.', { size: 14, y: 300 })
      ])
    ]);

    expect(analysis.outline).toEqual({
      title: 'Project Report',
      outline: [{ level: 'H1', text: '1. Introduction', page: 1 }]
    });
    const background = analysis.classified.find((c) => c.line.text === 'Background text.');
    expect(background?.level).toBe('body');
    expect(analysis.fontMap.sizes).not.toContain(24);
  });

  it('skips furniture across pages', async () => {
    const analysis = await new OutlinePipeline().analyze(reportPages());

    expect(analysis.outline).toEqual({
      title: 'Annual Report',
      outline: [
        { level: 'H1', text: '1. Overview', page: 1 },
        { level: 'H2', text: '1.1 Scope', page: 2 },
        { level: 'H1', text: '2. Results', page: 3 }
      ]
    });
    expect(analysis.statistics).toEqual({ fonts: { bodyFontSize: 11 } });
    expect(analysis.furniture.discarded.map((d) => [d.line.pageNumber, d.line.text, d.reason])).toEqual([
      [1, 'Quarterly Review', 'running-text'],
      [1, '1', 'page-number'],
      [2, 'Quarterly Review', 'running-text'],
      [2, '2', 'page-number'],
      [3, 'Quarterly Review', 'running-text'],
      [3, '3', 'page-number']
    ]);
  });

  it('promotes a bullet directly under an H1', async () => {
    const outline = await new OutlinePipeline().run([
      page(1, [
        frag('Field Guide', { size: 24, y: 80 }),
        frag('1. Scope', { size: 18, y: 140 }),
        frag('• Overview', { size: 11, y: 180 }),
        frag('This guide explains how the survey teams should work.', { size: 11, y: 220 })
      ])
    ]);

    expect(outline).toEqual({
      title: 'Field Guide',
      outline: [
        { level: 'H1', text: '1. Scope', page: 1 },
        { level: 'H2', text: '• Overview', page: 1 }
      ]
    });
  });

  it('keeps chapter headings that open every page at the same height', async () => {
    const topics = ['Soil', 'Water', 'Air', 'Forests', 'Rivers', 'Coasts'];
    const pages = topics.map((topic, i) =>
      page(i + 1, [
        ...(i === 0 ? [frag('Field Manual', { size: 24, y: 40 })] : []),
        frag(`Chapter ${i + 1}`, { size: 18, y: 90 }),
        frag(`${topic} samples were collected at every station.`, { size: 11, y: 140 })
      ])
    );

    const analysis = await new OutlinePipeline().analyze(pages);
    expect(analysis.furniture.discarded).toEqual([]);
    expect(analysis.outline).toEqual({
      title: 'Field Manual',
      outline: topics.map((_, i) => ({ level: 'H1', text: `Chapter ${i + 1}`, page: i + 1 }))
    });
  });

  it('uses the bold lead of a run-in heading as the outline text', async () => {
    const outline = await new OutlinePipeline().run([
      page(1, [
        frag('Lab Notes', { size: 24, y: 60 }),
        frag('1. Sampling', { size: 18, y: 100 }),
        frag('Methods:', { size: 11, y: 140, bold: true }),
        frag('we sampled every site twice.', { size: 11, y: 140, x: 130 }),
        frag('The second visit confirmed the first readings.', { size: 11, y: 180 })
      ])
    ]);

    expect(outline).toEqual({
      title: 'Lab Notes',
      outline: [
        { level: 'H1', text: '1. Sampling', page: 1 },
        { level: 'H2', text: 'Methods:', page: 1 }
      ]
    });
  });

  it('accepts an async page source', async () => {
    async function* pages(): AsyncGenerator<FragmentPage> {
      yield* reportPages();
    }
    const outline = await new OutlinePipeline().run(pages());
    expect(outline.outline.map((e) => e.text)).toEqual(['1. Overview', '1.1 Scope', '2. Results']);
  });

  it('returns an empty outline for a document without pages', async () => {
    expect(await new OutlinePipeline().run([])).toEqual({ title: '', outline: [] });
    expect(await new OutlinePipeline().run([page(1, []), page(2, [])])).toEqual({ title: '', outline: [] });
  });

  it('reports every stage in order', async () => {
    const stages: OutlineProgress['stage'][] = [];
    await new OutlinePipeline().run(reportPages(), (p) => {
      if (stages[stages.length - 1] !== p.stage) stages.push(p.stage);
    });
    expect(stages).toEqual(['lines', 'title', 'fonts', 'furniture', 'classification', 'refinement', 'complete']);
  });

  it('applies tuning overrides', async () => {
    const pages = [
      page(1, [
        frag('Handbook', { size: 24, y: 80 }),
        frag('Getting started', { size: 11, y: 120, bold: true }),
        frag('1. Basics', { size: 18, y: 160 }),
        frag('Read every section before you begin the work.', { size: 11, y: 200 })
      ])
    ];
    const lenient = await new OutlinePipeline().run(pages);
    const strict = await new OutlinePipeline({ boldLinesAsHeadings: false }).run(pages);

    expect(lenient.outline).toEqual([
      { level: 'H3', text: 'Getting started', page: 1 },
      { level: 'H1', text: '1. Basics', page: 1 }
    ]);
    expect(strict.outline).toEqual([{ level: 'H1', text: '1. Basics', page: 1 }]);
  });

  it('rejects invalid tuning at construction', () => {
    expect(() => new OutlinePipeline({ maxHeadingChars: -1 })).toThrow('Invalid tuning value for maxHeadingChars: -1');
  });

  it('prints stage details when debugging is enabled', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await new OutlinePipeline().run(reportPages());
    expect(log).not.toHaveBeenCalled();

    Reflect.set(globalThis, '__PDF_OUTLINE_DEBUG__', true);
    await new OutlinePipeline().run(reportPages());
    expect(log).toHaveBeenCalledWith('[outline]', 'title', { text: 'Annual Report', fontSize: 24 });
  });
});
