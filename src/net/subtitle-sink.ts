// src/net/subtitle-sink.ts
// Stand-in for the downstream captioning sink: acknowledges subtitle frames and
// appends their text to a raw transcript file, one sentence per line.

import { appendFile } from 'node:fs/promises';
import net from 'node:net';
import type { Server, Socket } from 'node:net';
import { createLogger, describeError } from '../env/logging';
import {
  decodePayloadText,
  encodeResponse,
  FrameDecoder,
  parseTextField,
  STATUS_OK,
  type RequestFrame,
} from './frame-protocol';

const log = createLogger('sink');

export type SubtitleSinkOptions = {
  outPath: string;
  respCheckcode: number;
};

/**
 * Splits on sentence terminators: each terminated sentence is followed by a line
 * break, any unterminated tail by a space.
 */
export function formatRawText(token: string): string {
  const text = String(token || '').trim();
  if (!text) return '';
  const parts = text.split(/([?!.])/);
  let out = '';
  for (let i = 0; i < parts.length; i += 2) {
    const chunk = parts[i] ?? '';
    const punct = parts[i + 1] ?? '';
    if (!chunk && !punct) continue;
    out += chunk + punct + (punct ? '\n' : ' ');
  }
  return out;
}

export class SubtitleSink {
  private server: Server | null = null;
  private readonly sockets = new Set<Socket>();
  private writes: Promise<void> = Promise.resolve();

  constructor(private readonly options: SubtitleSinkOptions) {}

  listen(port: number, host = '0.0.0.0'): Promise<net.AddressInfo> {
    return new Promise<net.AddressInfo>((resolve, reject) => {
      const srv = net.createServer((socket) => this.handleClient(socket));
      srv.once('error', reject);
      srv.listen(port, host, () => {
        srv.off('error', reject);
        srv.on('error', (err) => log.error(`server error: ${err.message}`));
        const address = srv.address();
        if (address == null || typeof address === 'string') {
          reject(new Error(`unexpected listen address ${String(address)}`));
          return;
        }
        this.server = srv;
        log.info(`running on ${address.address}:${address.port}`);
        resolve(address);
      });
    });
  }

  /** Resolves once pending file writes have landed. */
  flush(): Promise<void> {
    return this.writes;
  }

  async close(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    this.sockets.clear();
    const srv = this.server;
    this.server = null;
    if (srv) {
      await new Promise<void>((resolve, reject) => srv.close((err) => (err ? reject(err) : resolve())));
    }
    await this.flush();
    log.info('closed');
  }

  private append(token: string): void {
    const out = formatRawText(token);
    if (!out) return;
    this.writes = this.writes.then(() =>
      appendFile(this.options.outPath, out, 'utf8').catch((err: unknown) => {
        log.error(`failed to write ${this.options.outPath}: ${describeError(err)}`);
      }),
    );
  }

  private handleFrame(socket: Socket, frame: RequestFrame): void {
    const text = decodePayloadText(frame.payload);
    log.debug('[TEXT]', text);
    const token = parseTextField(text);
    if (token == null) {
      log.warn('failed to parse JSON payload');
    } else {
      this.append(token);
    }
    socket.write(encodeResponse(this.options.respCheckcode, frame.requestCode, STATUS_OK));
  }

  private handleClient(socket: Socket): void {
    const peer = `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}`;
    const decoder = new FrameDecoder();
    this.sockets.add(socket);
    log.info(`client connected from ${peer}`);
    socket.on('data', (chunk: Buffer) => {
      let frames: RequestFrame[];
      try {
        frames = decoder.push(chunk);
      } catch (err) {
        log.warn(`client error ${peer}: ${describeError(err)}`);
        socket.destroy();
        return;
      }
      for (const frame of frames) this.handleFrame(socket, frame);
    });
    socket.on('error', (err) => log.warn(`client error ${peer}: ${err.message}`));
    socket.on('close', () => {
      this.sockets.delete(socket);
      log.info(`client disconnected: ${peer}`);
    });
  }
}
