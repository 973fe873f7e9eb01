// src/logic/normalize.ts
// Text canonicalization shared by the script and the transcript before alignment.

import { convertKoreanNumerals } from './korean-numerals';

const PUNCTUATION_RE = /[.,?!;:"'\-…·()[\]「」『』《》<>]/g;

export function stripPunctuation(text: string): string {
  return text.replace(PUNCTUATION_RE, '');
}

function canonical(text: string): string {
  return stripPunctuation(convertKoreanNumerals(String(text || '')));
}

/** Numerals -> digits, punctuation removed, whitespace collapsed to single spaces. */
export function normalize(text: string): string {
  return canonical(text).replace(/\s+/g, ' ').trim();
}

/** Same as {@link normalize} with every whitespace character removed. */
export function normalizeNoSpace(text: string): string {
  return canonical(text).replace(/\s+/g, '');
}

export function splitTokens(text: string): string[] {
  return String(text || '').split(/\s+/).filter(Boolean);
}

export default normalize;
