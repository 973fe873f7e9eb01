// src/speech/hypothesis-log.ts
// Append-only log of transcript fragments. The listener and the tick loop share
// one event loop, so appends and snapshots never interleave.

export class HypothesisLog {
  private fragments: string[] = [];

  /** Returns false for empty fragments, which are not recorded. */
  append(fragment: string): boolean {
    const text = String(fragment ?? '').trim();
    if (!text) return false;
    this.fragments.push(text);
    return true;
  }

  /** Fragments joined with single spaces. */
  snapshot(): string {
    return this.fragments.join(' ');
  }

  get size(): number {
    return this.fragments.length;
  }

  clear(): void {
    this.fragments = [];
  }
}
