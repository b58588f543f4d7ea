import { replaceNumberWords } from './number-words';

const NUMBER = '(\\d+(?:\\.\\d+)?)';
const UNIT_WORDS = 'minutes?|mins?|m|hours?|hrs?|h';
const UNIT = `(${UNIT_WORDS})(?![a-z])`;
const OPTIONAL_UNIT = `(?:(?:${UNIT_WORDS})(?![a-z]))?`;

const FIXED_PHRASES: Array<[RegExp, number]> = [
  [/\b(?:an?|one) hour and a half\b/g, 90],
  [/\bone and a half hours?\b/g, 90],
  [/\bhalf (?:an )?hour\b/g, 30],
  [/\b(?:a )?quarter (?:of an )?hour\b/g, 15]
];

const ARTICLE_BEFORE_UNIT = /\b(?:a|an)\s+(?=(?:hours?|hrs?|minutes?|mins?)\b)/g;

const RANGE_PATTERNS = [
  new RegExp(`\\bbetween\\s+${NUMBER}\\s*${OPTIONAL_UNIT}\\s+and\\s+${NUMBER}\\s*${UNIT}`, 'g'),
  new RegExp(`(?<![\\d.])${NUMBER}\\s*${OPTIONAL_UNIT}\\s*(?:-|–|to)\\s*${NUMBER}\\s*${UNIT}`, 'g')
];

// "1 hour 30 minutes", "1h30m": one duration, not two bounds.
const COMPOUND_PATTERN = new RegExp(
  `(?<!between\\s)(?<![\\d.])(\\d+)\\s*(?:hours?|hrs?|h)(?![a-z])\\s*(?:and\\s+)?(\\d+)\\s*(?:minutes?|mins?|m)(?![a-z])`,
  'g'
);

const SINGLE_PATTERN = new RegExp(`(?<![\\d.])${NUMBER}\\s*-?\\s*${UNIT}`, 'g');

function toMinutes(value: string, unit: string): number {
  const amount = Number(value);
  return Math.round(unit.startsWith('h') ? amount * 60 : amount);
}

function normalize(query: string): string {
  let text = query.toLowerCase().replace(/\s+/g, ' ');
  for (const [pattern, minutes] of FIXED_PHRASES) {
    text = text.replace(pattern, ` ${minutes} minutes `);
  }
  return replaceNumberWords(text)
    .replace(ARTICLE_BEFORE_UNIT, '1 ')
    .replace(
      COMPOUND_PATTERN,
      (_match, hours: string, minutes: string) => ` ${Number(hours) * 60 + Number(minutes)} minutes `
    );
}

/**
 * Reads every duration phrase in `query` as an upper bound in minutes and returns the
 * tightest one. Ranges contribute their upper end. Returns `undefined` when the query
 * mentions no duration.
 *
 * @example parseDurationBound('around half an hour, 45 minutes at most') // 30
 */
export function parseDurationBound(query: string): number | undefined {
  let text = normalize(query);
  const bounds: number[] = [];

  for (const pattern of RANGE_PATTERNS) {
    text = text.replace(pattern, (_match, _low: string, high: string, unit: string) => {
      bounds.push(toMinutes(high, unit));
      return ' ';
    });
  }

  for (const match of text.matchAll(SINGLE_PATTERN)) {
    bounds.push(toMinutes(match[1], match[2]));
  }

  const positive = bounds.filter((minutes) => minutes > 0);
  return positive.length > 0 ? Math.min(...positive) : undefined;
}
