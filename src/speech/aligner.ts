// src/speech/aligner.ts
// Bounded-lookahead sequential character aligner.
//
// A global minimum-edit alignment may pair a growing transcript with a later
// repeat of the same phrase in the script, which moves the "how far has the
// speaker got" boundary. This aligner walks both strings once, left to right,
// and only resynchronises within a small window.

import type { CharState } from './types';

export const DEFAULT_MAX_LOOKAHEAD = 3;

/** Strategy seam: every aligner yields one state per reference character. */
export interface CharAligner {
  readonly name: string;
  align(ref: string, hyp: string): CharState[];
}

export type SequentialAlignment = {
  states: CharState[];
  lastProcessedIndex: number;
};

/** Highest index whose state is not pending, or -1. */
export function lastProcessedIndex(states: readonly CharState[]): number {
  for (let i = states.length - 1; i >= 0; i--) {
    if (states[i] !== 'pending') return i;
  }
  return -1;
}

/** Distance (1..window) to the next `target` after `from` in `s`, or 0. */
function resyncDistance(s: string, from: number, target: string, window: number): number {
  for (let look = 1; look <= window; look++) {
    if (from + look < s.length && s[from + look] === target) return look;
  }
  return 0;
}

export function alignSequential(
  ref: string,
  hyp: string,
  maxLookahead = DEFAULT_MAX_LOOKAHEAD,
): SequentialAlignment {
  const states: CharState[] = new Array<CharState>(ref.length).fill('pending');
  const window = Math.max(0, Math.floor(maxLookahead));
  let refIdx = 0;
  let hypIdx = 0;

  while (refIdx < ref.length && hypIdx < hyp.length) {
    if (ref[refIdx] === hyp[hypIdx]) {
      states[refIdx] = 'hit';
      refIdx++;
      hypIdx++;
      continue;
    }

    // Speaker dropped script characters; the matching char is re-checked next pass.
    const skipped = resyncDistance(ref, refIdx, hyp[hypIdx], window);
    if (skipped > 0) {
      states.fill('del', refIdx, refIdx + skipped);
      refIdx += skipped;
      continue;
    }

    // Extra transcript characters are discarded, not recorded.
    const noise = resyncDistance(hyp, hypIdx, ref[refIdx], window);
    if (noise > 0) {
      hypIdx += noise;
      continue;
    }

    states[refIdx] = 'sub';
    refIdx++;
    hypIdx++;
  }

  return { states, lastProcessedIndex: lastProcessedIndex(states) };
}

export class SequentialAligner implements CharAligner {
  readonly name = 'sequential';

  constructor(private readonly maxLookahead = DEFAULT_MAX_LOOKAHEAD) {}

  align(ref: string, hyp: string): CharState[] {
    return alignSequential(ref, hyp, this.maxLookahead).states;
  }
}
