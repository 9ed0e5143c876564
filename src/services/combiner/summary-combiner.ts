/**
 * Summary Combiner
 *
 * Deterministic concatenation of titled units into one markdown document.
 */

import type { SummaryUnit } from '../summarization/types.js';

export const COMBINED_HEADING = 'Combined Documentation Summary';
export const OPTIMIZED_COMBINED_HEADING = 'Combined Optimized Documentation Summary';

export const SUMMARY_FILE_SUFFIX = '_summary.txt';

export type CombineResult =
  | { status: 'combined'; text: string; unitCount: number }
  | { status: 'empty'; reason: 'nothing to combine' };

/**
 * Readable title from a summary file name:
 * `getting-started_part_1_summary.txt` -> `Getting Started Part 1`
 */
export function titleFromFileName(fileName: string): string {
  return fileName
    .replace(SUMMARY_FILE_SUFFIX, '')
    .replace(/[_-]/g, ' ')
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Render units in discovery order under a top-level heading
 */
export function combine(units: readonly SummaryUnit[], heading: string): CombineResult {
  if (units.length === 0) {
    return { status: 'empty', reason: 'nothing to combine' };
  }

  const ordered = [...units].sort((a, b) => a.order - b.order);
  let text = `# ${heading}\n\n`;
  for (const unit of ordered) {
    text += `## ${unit.title}\n\n${unit.content}\n\n`;
  }

  return { status: 'combined', text: text.trimEnd(), unitCount: ordered.length };
}
