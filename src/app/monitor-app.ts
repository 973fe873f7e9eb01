// src/app/monitor-app.ts
// Controller for a live monitoring session: owns the script, the transcript log,
// the STT listener and the optional subtitle forwarder, and re-scores the full
// transcript on every tick.

import type net from 'node:net';
import { readFile } from 'node:fs/promises';
import type { MonitorConfig } from '../config/monitor-config';
import { createLogger, describeError } from '../env/logging';
import { splitTokens } from '../logic/normalize';
import { createMonitorServer, type MonitorServer } from '../net/monitor-server';
import type { ScoreSnapshot } from '../net/score-relay-protocol';
import { SubtitleClient } from '../net/subtitle-client';
import type { CharAligner } from '../speech/aligner';
import { HypothesisLog } from '../speech/hypothesis-log';
import { alignAndScore, createAligner, isComplete } from '../speech/scorer';
import { zeroMetrics, type AlignedToken } from '../speech/types';

const log = createLogger('app');

export type StatusChannel = 'monitor' | 'subtitle';
export type StatusLevel = 'info' | 'ok' | 'warn' | 'error' | 'muted';

export type MonitorStatus = {
  channel: StatusChannel;
  level: StatusLevel;
  message: string;
};

export type MonitorEvent =
  | { kind: 'score'; snapshot: ScoreSnapshot }
  | { kind: 'status'; status: MonitorStatus }
  | { kind: 'reset' };

type Subscriber = (event: MonitorEvent) => void;

export type MonitorAppDeps = {
  /** Overrides the client built from `config.subtitle`; null disables forwarding. */
  subtitleClient?: SubtitleClient | null;
  now?: () => number;
};

export function collapseWhitespace(text: string): string {
  return splitTokens(text).join(' ');
}

export class MonitorApp {
  readonly transcript = new HypothesisLog();
  private reference = '';
  private completed = false;
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly server: MonitorServer;
  private readonly aligner: CharAligner;
  private readonly subtitle: SubtitleClient | null;
  private subtitleConnected = false;
  private forwarding: Promise<void> = Promise.resolve();
  private readonly subs = new Set<Subscriber>();
  private readonly now: () => number;

  constructor(private readonly config: MonitorConfig, deps: MonitorAppDeps = {}) {
    this.now = deps.now ?? Date.now;
    this.aligner = createAligner(config.scoring.strategy, config.scoring.maxLookahead);
    this.subtitle =
      deps.subtitleClient !== undefined
        ? deps.subtitleClient
        : config.subtitle.enabled
          ? new SubtitleClient({
              host: config.subtitle.host,
              port: config.subtitle.port,
              checkcode: config.subtitle.checkcode,
              respCheckcode: config.subtitle.respCheckcode,
            })
          : null;
    this.server = createMonitorServer({
      log: this.transcript,
      respCheckcode: config.respCheckcode,
      onFragment: (raw) => this.forward(raw),
    });
  }

  subscribe(fn: Subscriber): () => void {
    this.subs.add(fn);
    return () => {
      this.subs.delete(fn);
    };
  }

  get referenceText(): string {
    return this.reference;
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  get isSubtitleConnected(): boolean {
    return this.subtitleConnected;
  }

  /** Starts the listener, connects the forwarder and the tick loop. Resolves with the bound address. */
  async start(): Promise<net.AddressInfo> {
    const address = await this.server.listen(this.config.port, this.config.host);
    const where = `${address.address}:${address.port}`;
    this.status('monitor', 'ok', this.reference ? `Monitoring... (${where})` : `Monitoring (no script) - ${where}`);

    if (this.subtitle) {
      await this.connectSubtitle();
    } else {
      this.status('subtitle', 'muted', 'Subtitle output disabled');
    }

    if (!this.timer) {
      this.timer = setInterval(() => this.safeTick(), this.config.scoring.updateIntervalMs);
    }
    return address;
  }

  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.server.close();
    await this.forwarding;
    this.subtitle?.disconnect();
    this.subtitleConnected = false;
  }

  async loadReference(filePath: string): Promise<void> {
    const raw = await readFile(filePath, 'utf8');
    this.setReference(raw);
  }

  setReference(text: string): void {
    this.reference = collapseWhitespace(text);
    this.clearSession();
    this.status('monitor', 'info', `Script loaded (${this.reference.length} chars) - waiting`);
  }

  reset(): void {
    this.clearSession();
    this.status(
      'monitor',
      'info',
      this.reference ? `Script loaded (${this.reference.length} chars) - reset` : 'Monitoring... - reset',
    );
  }

  async reconnectSubtitle(): Promise<boolean> {
    if (!this.subtitle) return false;
    this.subtitle.disconnect();
    this.subtitleConnected = false;
    return this.connectSubtitle();
  }

  /**
   * Re-scores the full transcript. Returns null when nothing was scored: no
   * transcript yet, or the script was already fully covered.
   */
  tick(): ScoreSnapshot | null {
    if (this.completed) return null;
    const hypothesis = this.transcript.snapshot();
    if (!hypothesis) return null;

    let snapshot: ScoreSnapshot;
    if (!this.reference) {
      snapshot = {
        mode: 'plain',
        tokens: splitTokens(hypothesis).map((text): AlignedToken => ({ text, type: 'hit' })),
        metrics: zeroMetrics(),
        completed: false,
        fragments: this.transcript.size,
        ts: this.now(),
      };
    } else {
      const result = alignAndScore(this.reference, hypothesis, {
        threshold: this.config.scoring.threshold,
        aligner: this.aligner,
      });
      const completed = isComplete(result);
      snapshot = { mode: 'scored', ...result, completed, fragments: this.transcript.size, ts: this.now() };
      if (completed) {
        this.completed = true;
        this.status('monitor', 'ok', 'Script comparison complete');
      }
    }

    log.probe('tick', 'snapshot', {
      mode: snapshot.mode,
      fragments: snapshot.fragments,
      wer: snapshot.metrics.wer,
      cer: snapshot.metrics.cer,
    });
    this.emit({ kind: 'score', snapshot });
    return snapshot;
  }

  /** Resolves once every forward issued so far has settled. */
  whenForwarded(): Promise<void> {
    return this.forwarding;
  }

  private safeTick(): void {
    try {
      this.tick();
    } catch (err) {
      log.error('tick failed', describeError(err));
    }
  }

  private clearSession(): void {
    this.transcript.clear();
    this.completed = false;
    this.emit({ kind: 'reset' });
  }

  private async connectSubtitle(): Promise<boolean> {
    const client = this.subtitle;
    if (!client) return false;
    const ok = await client.connect();
    this.subtitleConnected = ok;
    this.status(
      'subtitle',
      ok ? 'ok' : 'error',
      ok ? `Subtitle server connected (${client.endpoint})` : `Subtitle server connection failed (${client.endpoint})`,
    );
    return ok;
  }

  private forward(raw: string): void {
    const client = this.subtitle;
    if (!client) return;
    this.forwarding = this.forwarding.then(async () => {
      const ok = await client.send(raw);
      if (ok && !this.subtitleConnected) {
        this.status('subtitle', 'ok', `Subtitle server reconnected (${client.endpoint})`);
      } else if (!ok && this.subtitleConnected) {
        this.status('subtitle', 'error', 'Subtitle server connection lost');
      }
      this.subtitleConnected = ok;
    });
  }

  private status(channel: StatusChannel, level: StatusLevel, message: string): void {
    log.debug(`${channel}: ${message}`);
    this.emit({ kind: 'status', status: { channel, level, message } });
  }

  private emit(event: MonitorEvent): void {
    for (const fn of this.subs) {
      try {
        fn(event);
      } catch (err) {
        log.warn('subscriber failed', describeError(err));
      }
    }
  }
}
