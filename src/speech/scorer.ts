// src/speech/scorer.ts
// Entry point: align a growing transcript against the script and score it.
// Stateless; callers re-run it with the full accumulated transcript each tick.

import { normalizeNoSpace, splitTokens } from '../logic/normalize';
import { DEFAULT_MAX_LOOKAHEAD, lastProcessedIndex, SequentialAligner, type CharAligner } from './aligner';
import { classifyTokens, DEFAULT_SIMILARITY_THRESHOLD } from './classifier';
import { computePartialMetrics } from './metrics';
import { OptimalAligner } from './optimal-aligner';
import { getTokenSpans } from './token-spans';
import { zeroMetrics, type AlignedToken, type ScoreResult } from './types';

export type ScoreOptions = {
  /** Minimum hit ratio for a token to count as a hit. */
  threshold?: number;
  aligner?: CharAligner;
};

export type AlignerKind = 'sequential' | 'optimal';

const defaultAligner = new SequentialAligner();

export function createAligner(kind: AlignerKind = 'sequential', maxLookahead = DEFAULT_MAX_LOOKAHEAD): CharAligner {
  return kind === 'optimal' ? new OptimalAligner() : new SequentialAligner(maxLookahead);
}

export function alignAndScore(
  reference: string,
  hypothesis: string,
  options: ScoreOptions = {},
): ScoreResult {
  const threshold = options.threshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const aligner = options.aligner ?? defaultAligner;

  if (!String(reference || '').trim()) {
    return { tokens: [], metrics: zeroMetrics() };
  }
  if (!String(hypothesis || '').trim()) {
    return {
      tokens: splitTokens(reference).map((text): AlignedToken => ({ text, type: 'pending' })),
      metrics: zeroMetrics(),
    };
  }

  const refNoSpace = normalizeNoSpace(reference);
  const hypNoSpace = normalizeNoSpace(hypothesis);
  const states = aligner.align(refNoSpace, hypNoSpace);
  const boundary = lastProcessedIndex(states);

  const tokens = classifyTokens(getTokenSpans(reference), states, boundary, threshold);
  const metrics = computePartialMetrics(tokens, refNoSpace, hypNoSpace, boundary);
  return { tokens, metrics };
}

/** True once no script token is left pending. */
export function isComplete(result: ScoreResult): boolean {
  return result.tokens.every((token) => token.type !== 'pending');
}
