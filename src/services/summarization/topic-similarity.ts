import type { SummaryUnit, TopicBoundary } from './types.js';

/**
 * Topic key of a title: its first whitespace-delimited word, lower-cased
 */
export function titleTopic(title: string): string {
  return title.trim().split(/\s+/)[0]?.toLowerCase() ?? '';
}

/**
 * Default topic boundary: the first words of the two titles differ
 */
export const firstWordTopicBoundary: TopicBoundary = (previous: SummaryUnit, next: SummaryUnit) =>
  titleTopic(previous.title) !== titleTopic(next.title);
