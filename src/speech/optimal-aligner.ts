// src/speech/optimal-aligner.ts
// Minimum-edit alignment grouped into operation chunks. Deletion chunks after
// the last non-deletion chunk are script the speaker has not reached yet and
// are reported as pending. Quadratic in time and memory; can latch onto a later
// repeat of a phrase, which is why the sequential aligner is the default.

import type { CharAligner } from './aligner';
import type { CharState } from './types';

export type EditOp = 'equal' | 'substitute' | 'delete' | 'insert';

export type AlignmentChunk = {
  type: EditOp;
  refStart: number;
  refEnd: number;
  hypStart: number;
  hypEnd: number;
};

function editOps(ref: string, hyp: string): EditOp[] {
  const n = ref.length;
  const m = hyp.length;
  const cols = m + 1;
  const dp = new Uint32Array((n + 1) * cols);
  for (let i = 0; i <= n; i++) dp[i * cols] = i;
  for (let j = 0; j <= m; j++) dp[j] = j;
  for (let i = 1; i <= n; i++) {
    for (let j = 1; j <= m; j++) {
      const cost = ref[i - 1] === hyp[j - 1] ? 0 : 1;
      dp[i * cols + j] = Math.min(
        dp[(i - 1) * cols + j] + 1,
        dp[i * cols + j - 1] + 1,
        dp[(i - 1) * cols + j - 1] + cost,
      );
    }
  }

  // Backtrace from the end. Deletions win ties over substitutions so that an
  // unfinished transcript leaves its unmatched script at the tail.
  const ops: EditOp[] = [];
  let i = n;
  let j = m;
  while (i > 0 || j > 0) {
    const here = dp[i * cols + j];
    if (i > 0 && j > 0 && ref[i - 1] === hyp[j - 1] && here === dp[(i - 1) * cols + j - 1]) {
      ops.push('equal');
      i--;
      j--;
    } else if (i > 0 && here === dp[(i - 1) * cols + j] + 1) {
      ops.push('delete');
      i--;
    } else if (i > 0 && j > 0 && here === dp[(i - 1) * cols + j - 1] + 1) {
      ops.push('substitute');
      i--;
      j--;
    } else {
      ops.push('insert');
      j--;
    }
  }
  return ops.reverse();
}

export function alignmentChunks(ref: string, hyp: string): AlignmentChunk[] {
  const chunks: AlignmentChunk[] = [];
  let refIdx = 0;
  let hypIdx = 0;
  for (const op of editOps(ref, hyp)) {
    const refStep = op === 'insert' ? 0 : 1;
    const hypStep = op === 'delete' ? 0 : 1;
    const last = chunks[chunks.length - 1];
    if (last && last.type === op) {
      last.refEnd += refStep;
      last.hypEnd += hypStep;
    } else {
      chunks.push({
        type: op,
        refStart: refIdx,
        refEnd: refIdx + refStep,
        hypStart: hypIdx,
        hypEnd: hypIdx + hypStep,
      });
    }
    refIdx += refStep;
    hypIdx += hypStep;
  }
  return chunks;
}

const CHUNK_STATE: Record<Exclude<EditOp, 'insert'>, CharState> = {
  equal: 'hit',
  substitute: 'sub',
  delete: 'del',
};

export class OptimalAligner implements CharAligner {
  readonly name = 'optimal';

  align(ref: string, hyp: string): CharState[] {
    const states: CharState[] = new Array<CharState>(ref.length).fill('pending');
    const chunks = alignmentChunks(ref, hyp);
    let lastAnchor = -1;
    chunks.forEach((chunk, idx) => {
      if (chunk.type !== 'delete') lastAnchor = idx;
    });
    chunks.forEach((chunk, idx) => {
      if (chunk.type === 'insert') return;
      if (chunk.type === 'delete' && idx > lastAnchor) return;
      states.fill(CHUNK_STATE[chunk.type], chunk.refStart, chunk.refEnd);
    });
    return states;
  }
}
