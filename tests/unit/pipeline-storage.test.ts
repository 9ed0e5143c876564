import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  PipelineStorage,
  chunkFileName,
  naturalCompare,
  summaryKeyForChunkFile,
} from '../../src/services/storage/index.js';
import type { Chunk } from '../../src/services/chunking/types.js';
import { StorageError } from '../../src/core/errors.js';

function chunk(index: number): Chunk {
  return {
    id: `id-${index}`,
    text: `chunk ${index}`,
    source: 'guide',
    tokenCount: 2,
    index,
    sectionTitles: ['Intro'],
    continuation: false,
  };
}

describe('storage helpers', () => {
  it('should name chunk files one-based', () => {
    expect(chunkFileName('guide', 0)).toBe('guide_part_1.json');
    expect(summaryKeyForChunkFile('guide_part_12.json')).toBe('guide_part_12');
  });

  it('should sort numbers naturally', () => {
    expect(['p_10', 'p_2', 'p_1'].sort(naturalCompare)).toEqual(['p_1', 'p_2', 'p_10']);
  });
});

describe('PipelineStorage', () => {
  let root: string;
  let storage: PipelineStorage;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'docsqueeze-storage-'));
    storage = new PipelineStorage({
      input: join(root, 'input'),
      chunks: join(root, 'chunks'),
      summaries: join(root, 'summaries'),
    });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should list only text inputs, naturally sorted', async () => {
    mkdirSync(join(root, 'input'));
    writeFileSync(join(root, 'input', 'page10.txt'), 'x');
    writeFileSync(join(root, 'input', 'page2.txt'), 'x');
    writeFileSync(join(root, 'input', 'notes.md'), 'x');

    expect(await storage.listInputFiles()).toEqual(['page2.txt', 'page10.txt']);
  });

  it('should treat a missing directory as empty', async () => {
    expect(await storage.listInputFiles()).toEqual([]);
    expect(await storage.listSummaries()).toEqual([]);
  });

  it('should write and read back chunks with the source url', async () => {
    const written = await storage.writeChunks([chunk(0), chunk(1)], 'https://example.com/guide');

    expect(written).toEqual(['guide_part_1.json', 'guide_part_2.json']);
    expect(await storage.listChunkFiles()).toEqual(written);
    expect(await storage.readChunk('guide_part_2.json')).toEqual({
      ...chunk(1),
      url: 'https://example.com/guide',
    });
  });

  it('should reject malformed chunk files', async () => {
    mkdirSync(join(root, 'chunks'));
    writeFileSync(join(root, 'chunks', 'bad.json'), '{not json');
    writeFileSync(join(root, 'chunks', 'wrong.json'), JSON.stringify({ id: 'x' }));

    await expect(storage.readChunk('bad.json')).rejects.toBeInstanceOf(StorageError);
    await expect(storage.readChunk('wrong.json')).rejects.toBeInstanceOf(StorageError);
  });

  it('should write summaries and list them without the combined file', async () => {
    await storage.writeSummary('guide_part_2', 'two');
    await storage.writeSummary('guide_part_1', 'one');
    await storage.writeCombined('all', false);

    expect(await storage.hasSummary('guide_part_1')).toBe(true);
    expect(await storage.hasSummary('guide_part_3')).toBe(false);
    expect(await storage.listSummaries()).toEqual([
      { key: 'guide_part_1', fileName: 'guide_part_1_summary.txt', content: 'one' },
      { key: 'guide_part_2', fileName: 'guide_part_2_summary.txt', content: 'two' },
    ]);
    expect(readFileSync(join(root, 'summaries', 'combined_summary.txt'), 'utf-8')).toBe('all');
  });

  it('should trim summaries and skip blank ones', async () => {
    mkdirSync(join(root, 'summaries'));
    writeFileSync(join(root, 'summaries', 'guide_part_1_summary.txt'), '\n  one  \n');
    writeFileSync(join(root, 'summaries', 'guide_part_2_summary.txt'), '  \n\t');
    writeFileSync(join(root, 'summaries', 'guide_part_3_summary.txt'), '');

    expect(await storage.listSummaries()).toEqual([
      { key: 'guide_part_1', fileName: 'guide_part_1_summary.txt', content: 'one' },
    ]);
  });

  it('should replace the optimized set as a whole', async () => {
    const base = { title: 't', order: 0, tokenCount: 1 };
    await storage.replaceOptimized([
      { ...base, id: 'a', content: 'first', outputKey: 'optimized_batch_1' },
      { ...base, id: 'b', content: 'second', outputKey: 'optimized_batch_2' },
    ]);
    await storage.writeCombined('combined', true);

    await storage.replaceOptimized([
      { ...base, id: 'f', content: 'final', outputKey: 'final_optimized_summary' },
    ]);

    expect(await storage.listOptimizedSummaries()).toEqual([
      { key: 'final_optimized_summary', fileName: 'final_optimized_summary_summary.txt', content: 'final' },
    ]);
    expect(existsSync(storage.combinedPath(true))).toBe(false);
  });

  it('should clean generated directories and keep the input', async () => {
    mkdirSync(join(root, 'input'));
    writeFileSync(join(root, 'input', 'guide.txt'), 'x');
    await storage.writeChunks([chunk(0)]);

    const removed = await storage.clean();

    expect(removed).toEqual([join(root, 'chunks')]);
    expect(existsSync(join(root, 'chunks'))).toBe(false);
    expect(existsSync(join(root, 'input', 'guide.txt'))).toBe(true);
  });
});
