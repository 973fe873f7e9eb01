// src/logic/levenshtein.ts
import { distance } from 'fastest-levenshtein';

/** Unit-cost Levenshtein distance; an empty operand yields the other's length. */
export function editDistance(a: string, b: string): number {
  if (!a) return b.length;
  if (!b) return a.length;
  return distance(a, b);
}

/** Character error rate of `hyp` against `ref`; 0 when the reference is empty. */
export function charErrorRate(ref: string, hyp: string): number {
  if (!ref.length) return 0;
  return editDistance(ref, hyp) / ref.length;
}
