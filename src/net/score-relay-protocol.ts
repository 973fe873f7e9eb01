import type { AlignedToken, PartialMetrics } from '../speech/types';

export type ScoreMode = 'scored' | 'plain';

export type ScoreSnapshot = {
  mode: ScoreMode;
  tokens: AlignedToken[];
  metrics: PartialMetrics;
  completed: boolean;
  /** Number of transcript fragments the snapshot was computed from. */
  fragments: number;
  ts: number;
};

export type ScoreRelayHello = {
  type: 'hello';
  token?: string;
};

export type ScoreRelayMessage =
  | { type: 'score:connected'; ts: number }
  | { type: 'score:snapshot'; snapshot: ScoreSnapshot; html: string; summary: string }
  | { type: 'score:reset'; ts: number };

export interface ScoreRelayOptions {
  /** When set, viewers must present it in their hello. */
  accessToken?: string;
  path?: string;
}
