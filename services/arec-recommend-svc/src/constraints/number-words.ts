const UNITS: Record<string, number> = {
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  sixteen: 16,
  seventeen: 17,
  eighteen: 18,
  nineteen: 19,
  twenty: 20,
  thirty: 30,
  forty: 40,
  fifty: 50,
  sixty: 60,
  seventy: 70,
  eighty: 80,
  ninety: 90
};

const COMPOUND_PATTERN = /\b(twenty|thirty|forty|fifty|sixty|seventy|eighty|ninety)[- ](one|two|three|four|five|six|seven|eight|nine)\b/g;
const WORD_PATTERN = new RegExp(`\\b(${Object.keys(UNITS).join('|')})\\b`, 'g');

/**
 * Rewrites spelled-out numbers in lowercase text as digits (`forty-five` becomes `45`).
 */
export function replaceNumberWords(text: string): string {
  return text
    .replace(COMPOUND_PATTERN, (_match, tens: string, unit: string) => String(UNITS[tens] + UNITS[unit]))
    .replace(WORD_PATTERN, (word: string) => String(UNITS[word]));
}
