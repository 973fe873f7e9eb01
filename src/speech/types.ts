// src/speech/types.ts
// Shared shapes for the alignment & partial-scoring engine.

/** Per-character verdict on the normalized, whitespace-stripped reference. */
export type CharState = 'hit' | 'sub' | 'del' | 'pending';

/**
 * Token-level verdict. `ins` is reserved for hypothesis-only tokens; the
 * character aligners never produce it.
 */
export type AlignType = 'hit' | 'sub' | 'del' | 'ins' | 'pending';

export type TokenSpan = {
  /** Inclusive offset into the normalized no-space reference. */
  start: number;
  /** Exclusive offset; equals `start` for punctuation-only tokens. */
  end: number;
  /** Original, unnormalized token text (for display). */
  text: string;
};

export type AlignedToken = {
  text: string;
  type: AlignType;
};

export type PartialMetrics = {
  wer: number;
  cer: number;
  hits: number;
  substitutions: number;
  deletions: number;
  insertions: number;
  refProcessed: number;
};

export type ScoreResult = {
  tokens: AlignedToken[];
  metrics: PartialMetrics;
};

export function zeroMetrics(): PartialMetrics {
  return {
    wer: 0,
    cer: 0,
    hits: 0,
    substitutions: 0,
    deletions: 0,
    insertions: 0,
    refProcessed: 0,
  };
}
