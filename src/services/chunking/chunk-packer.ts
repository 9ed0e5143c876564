/**
 * Chunk Packer
 *
 * Greedy, order-preserving bin-packing of sections into token-bounded chunks.
 * A section whose cost alone exceeds the bound is split on whitespace into
 * standalone continuation fragments.
 */

import { v4 as uuid } from 'uuid';
import type { Tokenizer } from '../tokenizer/index.js';
import { normalizeChunkText } from './text-normalizer.js';
import { DEFAULT_CHUNKING_CONFIG, type Chunk, type ChunkingConfig, type Section } from './types.js';

/**
 * Render sections as markdown: header line, blank line, content.
 */
export function renderSections(sections: readonly Section[]): string {
  return sections
    .map((section) => `${'#'.repeat(section.level)} ${section.title}\n\n${section.content}`)
    .join('\n\n');
}

export class ChunkPacker {
  private readonly config: ChunkingConfig;

  constructor(
    private readonly tokenizer: Tokenizer,
    config: Partial<ChunkingConfig> = {}
  ) {
    this.config = { ...DEFAULT_CHUNKING_CONFIG, ...config };
  }

  pack(sections: readonly Section[], source: string): Chunk[] {
    const { maxTokens, formatOverhead } = this.config;
    const chunks: Chunk[] = [];
    let open: Section[] = [];
    let openTokens = 0;

    const flush = (): void => {
      if (open.length === 0) return;
      chunks.push(this.buildChunk(open, source, chunks.length));
      open = [];
      openTokens = 0;
    };

    for (const section of sections) {
      const sectionCost = section.tokenCount + formatOverhead;

      if (sectionCost > maxTokens) {
        flush();
        for (const words of this.splitWords(section.content)) {
          chunks.push(this.buildFragment(section.title, words, source, chunks.length));
        }
      } else if (openTokens + sectionCost <= maxTokens) {
        open.push(section);
        openTokens += sectionCost;
      } else {
        flush();
        open = [section];
        openTokens = sectionCost;
      }
    }
    flush();

    return chunks;
  }

  /**
   * Split content into maximal word runs within maxTokens - splitReserve.
   * A run always holds at least one word, so a single oversized word still
   * yields a fragment.
   */
  private splitWords(content: string): string[][] {
    const limit = this.config.maxTokens - this.config.splitReserve;
    const runs: string[][] = [];
    let run: string[] = [];
    let runTokens = 0;

    for (const word of content.split(/\s+/)) {
      if (!word) continue;
      const wordTokens = this.tokenizer.count(word + ' ');
      if (run.length > 0 && runTokens + wordTokens > limit) {
        runs.push(run);
        run = [];
        runTokens = 0;
      }
      run.push(word);
      runTokens += wordTokens;
    }
    if (run.length > 0) {
      runs.push(run);
    }

    return runs;
  }

  private buildChunk(sections: Section[], source: string, index: number): Chunk {
    const text = normalizeChunkText(renderSections(sections));
    return {
      id: uuid(),
      text,
      source,
      tokenCount: this.tokenizer.count(text),
      index,
      sectionTitles: sections.map((s) => s.title),
      continuation: false,
    };
  }

  private buildFragment(title: string, words: string[], source: string, index: number): Chunk {
    const text = `# ${title} (continued)\n\n${words.join(' ')}`;
    return {
      id: uuid(),
      text,
      source,
      tokenCount: this.tokenizer.count(text),
      index,
      sectionTitles: [title],
      continuation: true,
    };
  }
}
