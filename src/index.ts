// Library surface: the scoring engine plus the collaborators that feed it.

export { convertKoreanNumerals, koreanToNumber } from './logic/korean-numerals';
export { normalize, normalizeNoSpace, splitTokens, stripPunctuation } from './logic/normalize';
export { charErrorRate, editDistance } from './logic/levenshtein';

export type { AlignType, AlignedToken, CharState, PartialMetrics, ScoreResult, TokenSpan } from './speech/types';
export { zeroMetrics } from './speech/types';
export { buildTokenSpans, getTokenSpans } from './speech/token-spans';
export {
  alignSequential,
  DEFAULT_MAX_LOOKAHEAD,
  lastProcessedIndex,
  SequentialAligner,
  type CharAligner,
  type SequentialAlignment,
} from './speech/aligner';
export { alignmentChunks, OptimalAligner, type AlignmentChunk, type EditOp } from './speech/optimal-aligner';
export { classifySpan, classifyTokens, DEFAULT_SIMILARITY_THRESHOLD } from './speech/classifier';
export { computePartialMetrics } from './speech/metrics';
export { alignAndScore, createAligner, isComplete, type AlignerKind, type ScoreOptions } from './speech/scorer';
export { HypothesisLog } from './speech/hypothesis-log';

export * from './net/frame-protocol';
export { createMonitorServer, type MonitorServer, type MonitorServerOptions } from './net/monitor-server';
export { SubtitleClient, type SubtitleClientOptions } from './net/subtitle-client';
export { formatRawText, SubtitleSink, type SubtitleSinkOptions } from './net/subtitle-sink';
export { createScoreRelay, type ScoreRelay } from './net/score-relay';
export type { ScoreRelayMessage, ScoreRelayOptions, ScoreSnapshot } from './net/score-relay-protocol';

export { formatMetrics, renderTokensAnsi, renderTokensHtml, renderTokensPlain } from './renderer/tokens';
export { createTerminalView, type TerminalView } from './renderer/terminal-view';

export { ConfigError, loadConfig, loadEnvFile, type MonitorConfig } from './config/monitor-config';
export { MonitorApp, type MonitorEvent, type MonitorStatus } from './app/monitor-app';
