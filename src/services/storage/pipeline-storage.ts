/**
 * Pipeline Storage
 *
 * File-per-key persistence between pipeline stages:
 *
 *   <input>/                      raw documents (.txt), read only
 *   <chunks>/<id>_part_<n>.json   packed chunks
 *   <summaries>/<key>_summary.txt first-stage summaries
 *   <summaries>/combined_summary.txt
 *   <summaries>/optimized/        reduced units and their combined_summary.txt
 *
 * Listings use natural order, which defines discovery order downstream.
 */

import { mkdir, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { StorageError } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';
import type { Chunk } from '../chunking/types.js';
import type { SummaryUnit } from '../summarization/types.js';

const logger = createComponentLogger('storage');

export const COMBINED_FILE_NAME = 'combined_summary.txt';
export const OPTIMIZED_DIR_NAME = 'optimized';
const SUMMARY_SUFFIX = '_summary.txt';

export interface StoragePaths {
  input: string;
  chunks: string;
  summaries: string;
}

const StoredChunkSchema = z.object({
  id: z.string(),
  text: z.string(),
  source: z.string(),
  url: z.string().optional(),
  tokenCount: z.number().int().nonnegative(),
  index: z.number().int().nonnegative(),
  sectionTitles: z.array(z.string()),
  continuation: z.boolean(),
});

export type StoredChunk = z.infer<typeof StoredChunkSchema>;

export interface StoredSummary {
  /** Key the summary was written under (file name without `_summary.txt`) */
  key: string;
  fileName: string;
  content: string;
}

export function naturalCompare(a: string, b: string): number {
  return a.localeCompare(b, 'en', { numeric: true });
}

export function chunkFileName(sourceId: string, index: number): string {
  return `${sourceId}_part_${index + 1}.json`;
}

/**
 * Summary key for a chunk file: `guide_part_2.json` -> `guide_part_2`
 */
export function summaryKeyForChunkFile(fileName: string): string {
  return fileName.replace(/\.json$/, '');
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class PipelineStorage {
  readonly optimizedDir: string;

  constructor(readonly paths: StoragePaths) {
    this.optimizedDir = join(paths.summaries, OPTIMIZED_DIR_NAME);
  }

  // ===========================================================================
  // INPUT
  // ===========================================================================

  async listInputFiles(): Promise<string[]> {
    return this.listFiles(this.paths.input, (name) => name.endsWith('.txt'));
  }

  async readInput(fileName: string): Promise<string> {
    return this.read(join(this.paths.input, fileName));
  }

  // ===========================================================================
  // CHUNKS
  // ===========================================================================

  /**
   * Persist one document's chunks; returns the written file names
   */
  async writeChunks(chunks: readonly Chunk[], url?: string): Promise<string[]> {
    await this.ensureDir(this.paths.chunks);
    const written: string[] = [];

    for (const chunk of chunks) {
      const fileName = chunkFileName(chunk.source, chunk.index);
      const stored: StoredChunk = { ...chunk, ...(url ? { url } : {}) };
      await this.write(join(this.paths.chunks, fileName), JSON.stringify(stored, null, 2));
      written.push(fileName);
    }

    return written;
  }

  async listChunkFiles(): Promise<string[]> {
    return this.listFiles(this.paths.chunks, (name) => name.endsWith('.json'));
  }

  async readChunk(fileName: string): Promise<StoredChunk> {
    const path = join(this.paths.chunks, fileName);
    const raw = await this.read(path);

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new StorageError('read', path, error);
    }

    const parsed = StoredChunkSchema.safeParse(json);
    if (!parsed.success) {
      throw new StorageError('read', path, parsed.error.issues[0]?.message ?? 'invalid chunk file');
    }
    return parsed.data;
  }

  // ===========================================================================
  // FIRST-STAGE SUMMARIES
  // ===========================================================================

  summaryPath(key: string): string {
    return join(this.paths.summaries, `${key}${SUMMARY_SUFFIX}`);
  }

  async hasSummary(key: string): Promise<boolean> {
    try {
      const info = await stat(this.summaryPath(key));
      return info.isFile();
    } catch (error) {
      if (isNotFound(error)) return false;
      throw new StorageError('read', this.summaryPath(key), error);
    }
  }

  async writeSummary(key: string, content: string): Promise<string> {
    await this.ensureDir(this.paths.summaries);
    const path = this.summaryPath(key);
    await this.write(path, content);
    return path;
  }

  async listSummaries(): Promise<StoredSummary[]> {
    return this.readSummaries(this.paths.summaries);
  }

  // ===========================================================================
  // OPTIMIZED SUMMARIES
  // ===========================================================================

  /**
   * Replace the optimized set with the given units
   */
  async replaceOptimized(units: readonly SummaryUnit[]): Promise<string[]> {
    await this.clearOptimized();
    await this.ensureDir(this.optimizedDir);

    const written: string[] = [];
    for (const unit of units) {
      const path = join(this.optimizedDir, `${unit.outputKey}${SUMMARY_SUFFIX}`);
      await this.write(path, unit.content);
      written.push(path);
    }

    logger.debug({ count: written.length }, 'Optimized summaries written');
    return written;
  }

  async listOptimizedSummaries(): Promise<StoredSummary[]> {
    return this.readSummaries(this.optimizedDir);
  }

  async clearOptimized(): Promise<void> {
    await this.remove(this.optimizedDir);
  }

  // ===========================================================================
  // COMBINED OUTPUT
  // ===========================================================================

  combinedPath(optimized: boolean): string {
    return join(optimized ? this.optimizedDir : this.paths.summaries, COMBINED_FILE_NAME);
  }

  async writeCombined(text: string, optimized: boolean): Promise<string> {
    const path = this.combinedPath(optimized);
    await this.ensureDir(optimized ? this.optimizedDir : this.paths.summaries);
    await this.write(path, text);
    return path;
  }

  // ===========================================================================
  // MAINTENANCE
  // ===========================================================================

  /**
   * Remove generated chunks and summaries. Input documents are never touched.
   */
  async clean(): Promise<string[]> {
    const removed: string[] = [];
    for (const dir of [this.paths.chunks, this.paths.summaries]) {
      if (await this.exists(dir)) {
        await this.remove(dir);
        removed.push(dir);
      }
    }
    logger.info({ removed }, 'Cleaned generated files');
    return removed;
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private async readSummaries(dir: string): Promise<StoredSummary[]> {
    const files = await this.listFiles(
      dir,
      (name) => name.endsWith(SUMMARY_SUFFIX) && name !== COMBINED_FILE_NAME
    );

    const summaries: StoredSummary[] = [];
    for (const fileName of files) {
      const content = (await this.read(join(dir, fileName))).trim();
      if (!content) {
        logger.warn({ file: fileName }, 'Empty summary skipped');
        continue;
      }
      summaries.push({ key: fileName.slice(0, -SUMMARY_SUFFIX.length), fileName, content });
    }
    return summaries;
  }

  /**
   * File names in a directory, naturally sorted. A missing directory is empty.
   */
  private async listFiles(dir: string, include: (name: string) => boolean): Promise<string[]> {
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && include(entry.name))
        .map((entry) => entry.name)
        .sort(naturalCompare);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new StorageError('list', dir, error);
    }
  }

  private async exists(path: string): Promise<boolean> {
    try {
      await stat(path);
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw new StorageError('read', path, error);
    }
  }

  private async read(path: string): Promise<string> {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      throw new StorageError('read', path, error);
    }
  }

  private async write(path: string, content: string): Promise<void> {
    try {
      await writeFile(path, content, 'utf-8');
    } catch (error) {
      throw new StorageError('write', path, error);
    }
  }

  private async remove(path: string): Promise<void> {
    try {
      await rm(path, { recursive: true, force: true });
    } catch (error) {
      throw new StorageError('remove', path, error);
    }
  }

  private async ensureDir(dir: string): Promise<void> {
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw new StorageError('write', dir, error);
    }
  }
}
