// src/speech/classifier.ts
// Folds per-character states inside each token span into one token verdict.
// A token whose processed characters mostly match is accepted as a hit even if
// a character or two differs; `threshold` sets how much is "mostly".

import type { AlignType, AlignedToken, CharState, TokenSpan } from './types';

export const DEFAULT_SIMILARITY_THRESHOLD = 0.6;

type StateCounts = { hits: number; subs: number; dels: number; pendings: number };

function countStates(states: readonly CharState[], start: number, end: number): StateCounts {
  const counts: StateCounts = { hits: 0, subs: 0, dels: 0, pendings: 0 };
  for (let i = start; i < end; i++) {
    switch (states[i]) {
      case 'hit':
        counts.hits++;
        break;
      case 'sub':
        counts.subs++;
        break;
      case 'del':
        counts.dels++;
        break;
      default:
        counts.pendings++;
    }
  }
  return counts;
}

export function classifySpan(
  span: TokenSpan,
  states: readonly CharState[],
  lastProcessedIndex: number,
  threshold: number,
): AlignType {
  const length = span.end - span.start;
  if (length === 0) return 'hit';
  if (span.start > lastProcessedIndex) return 'pending';

  const { hits, subs, dels, pendings } = countStates(states, span.start, span.end);
  const processed = hits + subs + dels;

  if (pendings === length) return 'pending';

  if (pendings > 0) {
    // Straddles the boundary: judge only what has been spoken so far.
    if (processed === 0) return 'pending';
    return hits / processed >= threshold ? 'hit' : 'sub';
  }

  const hitRatio = processed > 0 ? hits / processed : 0;
  if (hitRatio >= threshold) return 'hit';
  if (hits + subs > dels) return 'sub';
  return 'del';
}

export function classifyTokens(
  spans: readonly TokenSpan[],
  states: readonly CharState[],
  lastProcessedIndex: number,
  threshold = DEFAULT_SIMILARITY_THRESHOLD,
): AlignedToken[] {
  return spans.map((span) => ({
    text: span.text,
    type: classifySpan(span, states, lastProcessedIndex, threshold),
  }));
}
