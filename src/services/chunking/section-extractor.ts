/**
 * Section Extractor
 *
 * Splits a flat document into titled sections. A line opens a section when it
 * is a markdown header (`#` to `######`) or a short plain-text heading: a
 * capitalised line of letters, digits and spaces with no punctuation.
 */

import type { Tokenizer } from '../tokenizer/index.js';
import type { Section } from './types.js';

const MARKDOWN_HEADER = /^(#{1,6})\s+(.+)$/;
const PLAIN_HEADING = /^([A-Z][A-Za-z0-9\s]{2,50})$/;

interface HeaderLine {
  level: number;
  title: string;
}

/**
 * Classify a single line as a header
 */
export function matchHeader(line: string): HeaderLine | null {
  const markdown = MARKDOWN_HEADER.exec(line);
  if (markdown?.[1] && markdown[2]) {
    return { level: markdown[1].length, title: markdown[2].trim() };
  }

  const plain = PLAIN_HEADING.exec(line);
  if (plain?.[1]) {
    return { level: 1, title: plain[1].trim() };
  }

  return null;
}

export class SectionExtractor {
  constructor(private readonly tokenizer: Tokenizer) {}

  /**
   * Extract sections from a document body.
   *
   * Never fails: a non-blank document without usable headers becomes a single
   * section titled with the document identifier.
   */
  extract(text: string, documentId: string): Section[] {
    const sections: Section[] = [];
    let current: HeaderLine | null = null;
    let body: string[] = [];

    const flush = (): void => {
      if (!current) return;
      const content = body.join('\n').trim();
      if (content) {
        sections.push(this.createSection(current.title, content, current.level));
      }
    };

    for (const line of text.split(/\r?\n/)) {
      const header = matchHeader(line);
      if (header) {
        flush();
        current = header;
        body = [];
      } else if (current) {
        body.push(line);
      }
    }
    flush();

    if (sections.length === 0) {
      const content = text.trim();
      if (content) {
        sections.push(this.createSection(documentId, content, 1));
      }
    }

    return sections;
  }

  private createSection(title: string, content: string, level: number): Section {
    return Object.freeze({
      title,
      content,
      level,
      tokenCount: this.tokenizer.count(content),
    });
  }
}
