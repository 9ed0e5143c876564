/**
 * Source document parsing
 *
 * Files written by the fetch stage start with an optional metadata header:
 *
 *   URL: https://example.com/docs/page
 *   Token Count: 1234
 *
 *   <body>
 */

import { basename, extname } from 'node:path';
import type { SourceDocument } from './types.js';

const URL_LINE = /^URL: (.*?)\r?\n/;
const TOKEN_COUNT_LINE = /^Token Count: (\d+)\r?\n\r?\n/;

/**
 * Document identifier for a file name: the base name without extension
 */
export function documentIdFromFileName(fileName: string): string {
  const base = basename(fileName);
  return base.slice(0, base.length - extname(base).length);
}

/**
 * Split the metadata header from the document body
 */
export function parseSourceDocument(raw: string, fileName: string): SourceDocument {
  let text = raw;
  let url: string | undefined;
  let declaredTokenCount: number | undefined;

  const urlMatch = URL_LINE.exec(text);
  if (urlMatch) {
    url = urlMatch[1]?.trim();
    text = text.slice(urlMatch[0].length).trim();
  }

  const tokenMatch = TOKEN_COUNT_LINE.exec(text);
  if (tokenMatch) {
    declaredTokenCount = Number(tokenMatch[1]);
    text = text.slice(tokenMatch[0].length).trim();
  }

  return {
    id: documentIdFromFileName(fileName),
    fileName: basename(fileName),
    ...(url ? { url } : {}),
    ...(declaredTokenCount !== undefined ? { declaredTokenCount } : {}),
    text,
  };
}
