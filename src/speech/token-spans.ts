// src/speech/token-spans.ts
// Maps whitespace-delimited script tokens onto offsets in the normalized,
// space-stripped script. The script is static across ticks, so spans are memoised.

import { normalizeNoSpace, splitTokens } from '../logic/normalize';
import type { TokenSpan } from './types';

const CACHE_LIMIT = 8;
const spanCache = new Map<string, readonly TokenSpan[]>();

/**
 * Numeral runs never cross whitespace and punctuation is stripped per character,
 * so normalizing token by token yields the same string as normalizing the whole
 * script; the spans therefore tile `normalizeNoSpace(reference)` exactly.
 */
export function buildTokenSpans(reference: string): TokenSpan[] {
  const spans: TokenSpan[] = [];
  let cursor = 0;
  for (const text of splitTokens(reference)) {
    const len = normalizeNoSpace(text).length;
    spans.push({ start: cursor, end: cursor + len, text });
    cursor += len;
  }
  return spans;
}

export function getTokenSpans(reference: string): readonly TokenSpan[] {
  const cached = spanCache.get(reference);
  if (cached) return cached;
  const spans = buildTokenSpans(reference);
  if (spanCache.size >= CACHE_LIMIT) {
    const oldest = spanCache.keys().next();
    if (!oldest.done) spanCache.delete(oldest.value);
  }
  spanCache.set(reference, spans);
  return spans;
}
