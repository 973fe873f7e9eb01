// src/speech/metrics.ts
// Partial WER/CER over the part of the script the transcript has reached.

import { charErrorRate } from '../logic/levenshtein';
import type { AlignedToken, PartialMetrics } from './types';

export function computePartialMetrics(
  tokens: readonly AlignedToken[],
  refNoSpace: string,
  hypNoSpace: string,
  lastProcessedIndex: number,
): PartialMetrics {
  let hits = 0;
  let substitutions = 0;
  let deletions = 0;
  for (const token of tokens) {
    if (token.type === 'hit') hits++;
    else if (token.type === 'sub') substitutions++;
    else if (token.type === 'del') deletions++;
  }

  // Extra transcript characters are discarded by the aligner, so insertions
  // are never counted at the token level.
  const insertions = 0;
  const refProcessed = hits + substitutions + deletions;
  const wer = refProcessed > 0 ? (substitutions + deletions + insertions) / refProcessed : 0;

  const partialRef = lastProcessedIndex >= 0 ? refNoSpace.slice(0, lastProcessedIndex + 1) : '';
  const cer = charErrorRate(partialRef, hypNoSpace);

  return { wer, cer, hits, substitutions, deletions, insertions, refProcessed };
}
