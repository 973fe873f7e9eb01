// src/logic/korean-numerals.ts
// Spoken Korean numerals -> decimal digits, so "삼십오" in a transcript
// lines up with "35" in the script.

export const DIGIT_WORDS: Readonly<Record<string, number>> = {
  영: 0,
  공: 0,
  빵: 0,
  일: 1,
  하나: 1,
  한: 1,
  이: 2,
  둘: 2,
  두: 2,
  삼: 3,
  셋: 3,
  세: 3,
  사: 4,
  넷: 4,
  네: 4,
  오: 5,
  다섯: 5,
  육: 6,
  여섯: 6,
  칠: 7,
  일곱: 7,
  팔: 8,
  여덟: 8,
  구: 9,
  아홉: 9,
};

export const SMALL_UNITS: Readonly<Record<string, number>> = {
  십: 10,
  백: 100,
  천: 1000,
};

export const LARGE_UNITS: Readonly<Record<string, number>> = {
  만: 1e4,
  억: 1e8,
  조: 1e12,
};

// Values are bigint: 조 readings pass 2^53.
type NumeralWord =
  | { kind: 'digit'; value: bigint }
  | { kind: 'small'; value: bigint }
  | { kind: 'large'; value: bigint };

function lookup(word: string): NumeralWord | null {
  if (Object.hasOwn(DIGIT_WORDS, word)) return { kind: 'digit', value: BigInt(DIGIT_WORDS[word]) };
  if (Object.hasOwn(SMALL_UNITS, word)) return { kind: 'small', value: BigInt(SMALL_UNITS[word]) };
  if (Object.hasOwn(LARGE_UNITS, word)) return { kind: 'large', value: BigInt(LARGE_UNITS[word]) };
  return null;
}

const NUMERAL_CHARS = Array.from(
  new Set(
    [...Object.keys(DIGIT_WORDS), ...Object.keys(SMALL_UNITS), ...Object.keys(LARGE_UNITS)].join(''),
  ),
).join('');

/** Maximal runs of characters that occur in any numeral word. */
export const NUMERAL_RUN_RE = new RegExp(`[${NUMERAL_CHARS}]+`, 'g');

/**
 * Convert one run of numeral words to its decimal string.
 * Fail-soft: any unrecognised character, or a zero total, returns the run unchanged.
 * Assumes descending-magnitude reading order; other orders are not validated.
 */
export function koreanToNumber(run: string): string {
  let total = 0n;
  let segment = 0n;
  let digit: bigint | null = null;
  let i = 0;

  while (i < run.length) {
    let word = run.slice(i, i + 2);
    let hit = word.length === 2 ? lookup(word) : null;
    if (!hit) {
      word = run.slice(i, i + 1);
      hit = lookup(word);
    }
    if (!hit) return run;

    if (hit.kind === 'digit') {
      digit = hit.value;
    } else if (hit.kind === 'small') {
      segment += (digit ?? 1n) * hit.value;
      digit = null;
    } else {
      // Adds to the total instead of scaling it, so 일억이천만 reads 120000000.
      const head = segment + (digit ?? 0n);
      total += (head === 0n ? 1n : head) * hit.value;
      segment = 0n;
      digit = null;
    }
    i += word.length;
  }

  const value = total + segment + (digit ?? 0n);
  if (value === 0n) return run;
  return String(value);
}

export function convertKoreanNumerals(text: string): string {
  return String(text || '').replace(NUMERAL_RUN_RE, (run) => koreanToNumber(run));
}

export default convertKoreanNumerals;
