// src/renderer/tokens.ts
// Renders scored tokens for a terminal (ANSI) or a browser viewer (HTML).
// Pending tokens are not shown; insertions are bracketed.

import type { AlignType, AlignedToken, PartialMetrics } from '../speech/types';

type VisibleType = Exclude<AlignType, 'pending'>;

const ANSI_RESET = '\x1b[0m';
const VISIBLE_TYPES: readonly VisibleType[] = ['hit', 'sub', 'del', 'ins'];

export const ANSI_COLORS: Record<VisibleType, string> = {
  hit: '\x1b[32m', // green
  sub: '\x1b[31m', // red
  del: '\x1b[33m', // yellow
  ins: '\x1b[38;5;208m', // orange
};

export const TOKEN_LABELS: Record<AlignType, string> = {
  pending: 'not read yet',
  hit: 'correct',
  sub: 'misrecognized',
  del: 'missing',
  ins: 'added',
};

const escapeHtml = (s: string) =>
  String(s).replace(/[&<>"']/g, (c) => {
    switch (c) {
      case '&':
        return '&amp;';
      case '<':
        return '&lt;';
      case '>':
        return '&gt;';
      case '"':
        return '&quot;';
      default:
        return '&#39;';
    }
  });

function visible(tokens: readonly AlignedToken[]): Array<AlignedToken & { type: VisibleType }> {
  return tokens.filter((t): t is AlignedToken & { type: VisibleType } => t.type !== 'pending');
}

function displayText(token: AlignedToken): string {
  return token.type === 'ins' ? `[${token.text}]` : token.text;
}

export function renderTokensPlain(tokens: readonly AlignedToken[]): string {
  return visible(tokens).map(displayText).join(' ');
}

export function renderTokensAnsi(tokens: readonly AlignedToken[]): string {
  return visible(tokens)
    .map((t) => `${ANSI_COLORS[t.type]}${displayText(t)}${ANSI_RESET}`)
    .join(' ');
}

export function renderTokensHtml(tokens: readonly AlignedToken[]): string {
  return visible(tokens)
    .map((t) => `<span class="tok tok-${t.type}">${escapeHtml(displayText(t))}</span>`)
    .join(' ');
}

export function formatPercent(ratio: number): string {
  return `${(ratio * 100).toFixed(2)}%`;
}

export function formatMetrics(m: PartialMetrics): string {
  return [
    `Current WER: ${formatPercent(m.wer)}`,
    `Global CER: ${formatPercent(m.cer)}`,
    `H:${m.hits} S:${m.substitutions} D:${m.deletions} I:${m.insertions}`,
  ].join(' | ');
}

export function renderLegend(): string {
  return VISIBLE_TYPES
    .map((type) => `${ANSI_COLORS[type]}● ${TOKEN_LABELS[type]}${ANSI_RESET}`)
    .join('  ');
}
