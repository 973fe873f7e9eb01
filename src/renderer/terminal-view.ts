// src/renderer/terminal-view.ts
// Terminal presentation of monitor events. Redraws only when the rendered
// transcript or the metrics line changed since the previous snapshot.

import type { MonitorEvent, StatusLevel } from '../app/monitor-app';
import { formatMetrics, renderTokensAnsi, renderTokensPlain } from './tokens';

export type TextSink = { write(chunk: string): unknown };

export type TerminalViewOptions = {
  color?: boolean;
};

const STATUS_MARK: Record<StatusLevel, string> = {
  info: '·',
  ok: '✓',
  warn: '!',
  error: '✗',
  muted: '-',
};

export interface TerminalView {
  handle(event: MonitorEvent): void;
}

export function createTerminalView(out: TextSink, options: TerminalViewOptions = {}): TerminalView {
  const color = options.color ?? true;
  let lastFrame = '';

  return {
    handle(event) {
      if (event.kind === 'status') {
        const { channel, level, message } = event.status;
        out.write(`${STATUS_MARK[level]} [${channel}] ${message}\n`);
        return;
      }
      if (event.kind === 'reset') {
        lastFrame = '';
        out.write('--- reset ---\n');
        return;
      }
      const { snapshot } = event;
      const body = color ? renderTokensAnsi(snapshot.tokens) : renderTokensPlain(snapshot.tokens);
      const frame = snapshot.mode === 'plain' ? body : `${formatMetrics(snapshot.metrics)}\n${body}`;
      if (frame === lastFrame) return;
      lastFrame = frame;
      out.write(`${frame}\n`);
    },
  };
}
