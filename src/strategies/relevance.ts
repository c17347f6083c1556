/**
 * Relevance Filter
 *
 * Keeps items whose title, description or tags mention a vocabulary term.
 * Applied to the sources that are not already keyword-targeted (the
 * popular chart and the watched channels).
 *
 * @module strategies/relevance
 */

import type { VideoItem } from '../schemas/item.js';

/**
 * True when any vocabulary term is a case-insensitive substring of the
 * item's title, description and tags.
 */
export function isRelevant(item: VideoItem, vocabulary: readonly string[]): boolean {
  const haystack = [item.snippet.title, item.snippet.description, ...item.snippet.tags]
    .join(' ')
    .toLowerCase();

  return vocabulary.some((term) => term.length > 0 && haystack.includes(term.toLowerCase()));
}

export function filterRelevant<T extends VideoItem>(items: T[], vocabulary: readonly string[]): T[] {
  return items.filter((item) => isRelevant(item, vocabulary));
}
