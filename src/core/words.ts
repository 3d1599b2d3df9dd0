const UNITS = new Map<string, number>([
  ["zero", 0], ["one", 1], ["two", 2], ["three", 3], ["four", 4], ["five", 5], ["six", 6],
  ["seven", 7], ["eight", 8], ["nine", 9], ["ten", 10], ["eleven", 11], ["twelve", 12],
  ["thirteen", 13], ["fourteen", 14], ["fifteen", 15], ["sixteen", 16], ["seventeen", 17],
  ["eighteen", 18], ["nineteen", 19],
]);

const TENS = new Map<string, number>([
  ["twenty", 20], ["thirty", 30], ["forty", 40], ["fifty", 50],
  ["sixty", 60], ["seventy", 70], ["eighty", 80], ["ninety", 90],
]);

const DIGIT_WORDS = [...UNITS].filter(([, n]) => n > 0 && n < 10).map(([w]) => w);

/** Regex alternation matching any single number word, longest first. */
export const NUMBER_WORD = [...UNITS.keys(), ...TENS.keys()]
  .sort((a, b) => b.length - a.length)
  .join("|");

/** Matches "7", "seven", "twenty one", "twenty-one". */
export const NUMBER_PHRASE =
  `(?:\\d{1,3}|(?:${[...TENS.keys()].join("|")})(?:[\\s-](?:${DIGIT_WORDS.join("|")}))?|${NUMBER_WORD})`;

/**
 * "four" -> 4, "twenty-one" -> 21, "12" -> 12, "-1" -> -1.
 * Returns null for anything that is not a plain integer or a number phrase below 100.
 */
export function parseNumberPhrase(input: string): number | null {
  const s = input.trim().toLowerCase().replace(/\s+/g, " ");
  if (!s) return null;
  if (/^[+-]?\d+$/.test(s)) return Number(s);

  const parts = s.split(/[\s-]+/);
  if (parts.length === 1) {
    return UNITS.get(parts[0]) ?? TENS.get(parts[0]) ?? null;
  }
  if (parts.length === 2) {
    const tens = TENS.get(parts[0]);
    const unit = UNITS.get(parts[1]);
    if (tens === undefined || unit === undefined || unit === 0 || unit > 9) return null;
    return tens + unit;
  }
  return null;
}
