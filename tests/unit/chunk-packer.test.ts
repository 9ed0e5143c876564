import { describe, it, expect } from 'vitest';
import { ChunkPacker, renderSections } from '../../src/services/chunking/chunk-packer.js';
import { createChunkingService } from '../../src/services/chunking/chunking.service.js';
import type { Section } from '../../src/services/chunking/types.js';
import type { Tokenizer } from '../../src/services/tokenizer/index.js';
import { WordTokenizer, words } from '../fixtures/word-tokenizer.js';

class CharTokenizer implements Tokenizer {
  readonly name = 'chars';

  count(text: string): number {
    return text.length;
  }
}

function section(title: string, wordCount: number, level = 1): Section {
  return { title, content: words(wordCount), level, tokenCount: wordCount };
}

describe('renderSections', () => {
  it('should render header, blank line and content per section', () => {
    const rendered = renderSections([
      { title: 'A', content: 'one', level: 1, tokenCount: 1 },
      { title: 'B', content: 'two', level: 3, tokenCount: 1 },
    ]);

    expect(rendered).toBe('# A\n\none\n\n### B\n\ntwo');
  });
});

describe('ChunkPacker', () => {
  const tokenizer = new WordTokenizer();
  const packer = new ChunkPacker(tokenizer, { maxTokens: 5000, formatOverhead: 50, splitReserve: 100 });

  it('should pack sections greedily in order', () => {
    const sections = Array.from({ length: 10 }, (_, i) => section(`S${i + 1}`, 2000));

    const chunks = packer.pack(sections, 'guide');

    expect(chunks).toHaveLength(5);
    expect(chunks.map((c) => c.sectionTitles)).toEqual([
      ['S1', 'S2'],
      ['S3', 'S4'],
      ['S5', 'S6'],
      ['S7', 'S8'],
      ['S9', 'S10'],
    ]);
    expect(chunks.map((c) => c.tokenCount)).toEqual([4004, 4004, 4004, 4004, 4004]);
    expect(chunks.map((c) => c.index)).toEqual([0, 1, 2, 3, 4]);
    expect(chunks.every((c) => c.source === 'guide' && !c.continuation)).toBe(true);
  });

  it('should admit a section whose cost lands exactly on the bound', () => {
    const chunks = packer.pack([section('A', 2450), section('B', 2450)], 'guide');

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.sectionTitles).toEqual(['A', 'B']);
  });

  it('should split an oversized section into continuation fragments', () => {
    const chunks = packer.pack([section('Big', 20000)], 'guide');

    expect(chunks).toHaveLength(5);
    expect(chunks.map((c) => c.tokenCount)).toEqual([4903, 4903, 4903, 4903, 403]);
    expect(chunks.every((c) => c.continuation)).toBe(true);
    expect(chunks[0]?.text.startsWith('# Big (continued)\n\nword word')).toBe(true);
    expect(chunks[4]?.sectionTitles).toEqual(['Big']);
  });

  it('should flush the open chunk before fragments and resume packing after', () => {
    const chunks = packer.pack([section('A', 100), section('B', 6000), section('C', 100)], 'guide');

    expect(chunks.map((c) => c.sectionTitles)).toEqual([['A'], ['B'], ['B'], ['C']]);
    expect(chunks.map((c) => c.continuation)).toEqual([false, true, true, false]);
    expect(chunks.map((c) => c.index)).toEqual([0, 1, 2, 3]);
  });

  it('should emit a single oversized word as its own fragment', () => {
    const charPacker = new ChunkPacker(new CharTokenizer(), {
      maxTokens: 200,
      formatOverhead: 50,
      splitReserve: 100,
    });
    const long = 'x'.repeat(300);

    const chunks = charPacker.pack([{ title: 'A', content: long, level: 1, tokenCount: 300 }], 'doc');

    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.text).toBe(`# A (continued)\n\n${long}`);
    expect(chunks[0]?.tokenCount).toBe(317);
  });

  it('should normalize packed chunk text', () => {
    const chunks = packer.pack(
      [{ title: 'Notes', content: 'Done..  It is important to note that   it works!!', level: 2, tokenCount: 10 }],
      'guide'
    );

    expect(chunks[0]?.text).toBe('## Notes Done. it works!');
    expect(chunks[0]?.tokenCount).toBe(5);
  });

  it('should return no chunks for no sections', () => {
    expect(packer.pack([], 'guide')).toEqual([]);
  });

  it('should assign distinct chunk ids', () => {
    const chunks = packer.pack([section('A', 3000), section('B', 3000)], 'guide');

    expect(new Set(chunks.map((c) => c.id)).size).toBe(2);
  });
});

describe('ChunkingService', () => {
  const service = createChunkingService(new WordTokenizer(), { maxTokens: 5000 });

  it('should chunk a document and report stats', () => {
    const result = service.chunk({
      id: 'guide',
      fileName: 'guide.txt',
      url: 'https://example.com/guide',
      text: '# One\nalpha beta.\n\n# Two\ngamma delta epsilon.',
    });

    expect(result.sourceId).toBe('guide');
    expect(result.url).toBe('https://example.com/guide');
    expect(result.sections.map((s) => s.title)).toEqual(['One', 'Two']);
    expect(result.chunks).toHaveLength(1);
    expect(result.chunks[0]?.text).toBe('# One alpha beta. # Two gamma delta epsilon.');
    expect(result.stats).toMatchObject({
      totalSections: 2,
      totalChunks: 1,
      continuationChunks: 0,
      avgChunkTokens: 9,
      minChunkTokens: 9,
      maxChunkTokens: 9,
    });
  });

  it('should return empty results for a blank document', () => {
    const result = service.chunk({ id: 'blank', fileName: 'blank.txt', text: '  ' });

    expect(result.url).toBeUndefined();
    expect(result.chunks).toEqual([]);
    expect(result.stats).toMatchObject({ totalChunks: 0, avgChunkTokens: 0, minChunkTokens: 0 });
  });

  it('should apply per-call config overrides', () => {
    const result = service.chunk(
      { id: 'guide', fileName: 'guide.txt', text: `# One\n${words(100)}\n# Two\n${words(100)}` },
      { maxTokens: 200 }
    );

    expect(result.chunks.map((c) => c.sectionTitles)).toEqual([['One'], ['Two']]);
    expect(service.getConfig().maxTokens).toBe(5000);
  });
});
