import { replaceNumberWords } from './number-words';

const TOP_PATTERN = /\btop\s+(\d+)\b/;
const COUNTED_NOUN_PATTERN = /\b(\d+)\s+(?:assessments?|tests?|results?|recommendations?|options?)\b/;

/**
 * Explicit result count in the query (`top 5`, `3 assessments`, `up to 8 tests`), if any.
 */
export function parseResultCount(query: string): number | undefined {
  const text = replaceNumberWords(query.toLowerCase());
  const match = text.match(TOP_PATTERN) ?? text.match(COUNTED_NOUN_PATTERN);
  if (!match) {
    return undefined;
  }

  const count = Number(match[1]);
  return Number.isInteger(count) && count > 0 ? count : undefined;
}
