/**
 * Duration and Text Normalizers
 *
 * Pure, total functions used by the record processor: none of them throw,
 * and empty input yields empty (or zero) output.
 *
 * @module normalize/text
 */

/**
 * ISO8601 duration as used by the YouTube API (hours/minutes/seconds only).
 * Matched as a prefix: components after the first one that doesn't fit are ignored.
 */
const DURATION_PATTERN = /^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?/;

/** Anything that is not a letter (any script), digit, underscore or whitespace */
const UNSAFE_CHARS = /[^\p{L}\p{N}_\s]/gu;

const WHITESPACE_RUN = /\s+/g;

/**
 * Parse ISO8601 duration to seconds.
 *
 * @example
 * parseDuration('PT4M13S') // 253
 * parseDuration('PT1H30M') // 5400
 * parseDuration('')        // 0
 * parseDuration('4:13')    // 0
 * parseDuration('PT1H2M3.5S') // 3720
 *
 * @param token - ISO8601 duration string
 * @returns Duration in seconds; 0 for empty or unparseable input
 */
export function parseDuration(token: string | undefined): number {
  if (!token) {
    return 0;
  }

  const match = DURATION_PATTERN.exec(token.trim());
  if (!match) {
    return 0;
  }

  const hours = parseInt(match[1] ?? '0', 10);
  const minutes = parseInt(match[2] ?? '0', 10);
  const seconds = parseInt(match[3] ?? '0', 10);

  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Clean text for a single CSV cell: symbols, emoji and punctuation become
 * spaces, whitespace runs (including newlines) collapse, ends are trimmed.
 *
 * @example
 * sanitizeText('Glass Skin ✨ routine!!\n2024') // 'Glass Skin routine 2024'
 */
export function sanitizeText(text: string | undefined): string {
  if (!text) {
    return '';
  }
  return text.replace(UNSAFE_CHARS, ' ').replace(WHITESPACE_RUN, ' ').trim();
}

/**
 * Vocabulary terms occurring in `text` (case-insensitive substring match),
 * deduplicated and sorted.
 *
 * @example
 * matchKeywords('COSRX snail serum review', ['serum', 'COSRX', 'toner'])
 * // ['COSRX', 'serum']
 */
export function matchKeywords(text: string | undefined, vocabulary: Iterable<string>): string[] {
  if (!text) {
    return [];
  }

  const haystack = text.toLowerCase();
  const found = new Set<string>();

  for (const term of vocabulary) {
    if (term && haystack.includes(term.toLowerCase())) {
      found.add(term);
    }
  }

  return [...found].sort();
}

/**
 * Matched keywords joined for the dataset's keyword column.
 */
export function extractKeywords(text: string | undefined, vocabulary: Iterable<string>): string {
  return matchKeywords(text, vocabulary).join(', ');
}
