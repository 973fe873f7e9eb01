// src/net/subtitle-client.ts
// Persistent TCP client that pushes each transcript fragment to the downstream
// captioning sink and waits for its acknowledgement. A socket failure drops the
// connection; the next send reconnects.

import net from 'node:net';
import type { Socket } from 'node:net';
import { createLogger, describeError } from '../env/logging';
import {
  decodeResponse,
  DEFAULT_SUBTITLE_RESP_CHECKCODE,
  encodeRequest,
  REQUEST_HEADER_BYTES,
  REQUEST_SUBTITLE,
  RESPONSE_BYTES,
  STATUS_OK,
} from './frame-protocol';

const log = createLogger('subtitle');

const DEFAULT_TIMEOUT_MS = 5000;

export type SubtitleClientOptions = {
  host: string;
  port: number;
  checkcode: number;
  /** Checkcode the sink is expected to answer with. */
  respCheckcode?: number;
  timeoutMs?: number;
};

type PendingRead = {
  size: number;
  resolve: (buf: Buffer) => void;
  reject: (err: Error) => void;
};

export class SubtitleClient {
  private socket: Socket | null = null;
  private inbox: Buffer = Buffer.alloc(0);
  private reader: PendingRead | null = null;
  private queue: Promise<boolean> = Promise.resolve(true);
  private readonly respCheckcode: number;
  private readonly timeoutMs: number;

  constructor(private readonly options: SubtitleClientOptions) {
    this.respCheckcode = options.respCheckcode ?? DEFAULT_SUBTITLE_RESP_CHECKCODE;
    this.timeoutMs = Math.max(1, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  }

  get endpoint(): string {
    return `${this.options.host}:${this.options.port}`;
  }

  get isConnected(): boolean {
    return this.socket !== null;
  }

  /** Idempotent: resolves true at once when already connected. */
  async connect(): Promise<boolean> {
    if (this.socket) return true;
    try {
      this.socket = await this.open();
      log.info(`connected to ${this.endpoint}`);
      return true;
    } catch (err) {
      log.warn(`connect fail: ${describeError(err)}`);
      this.socket = null;
      return false;
    }
  }

  disconnect(): void {
    const socket = this.socket;
    if (!socket) return;
    this.socket = null;
    this.failRead(new Error('disconnected'));
    socket.destroy();
    log.info('disconnected');
  }

  /**
   * Sends `text` as one frame. Resolves true only when the sink acknowledged with
   * the expected checkcode, request code and an OK status. Never rejects.
   */
  send(text: string): Promise<boolean> {
    const run = this.queue.then(() => this.sendNow(text));
    this.queue = run;
    return run;
  }

  sendJson(payload: Record<string, unknown>): Promise<boolean> {
    let text: string;
    try {
      text = JSON.stringify(payload);
    } catch (err) {
      log.warn(`json encoding error: ${describeError(err)}`);
      return Promise.resolve(false);
    }
    return this.send(text);
  }

  private async sendNow(text: string): Promise<boolean> {
    const body = String(text ?? '').trim();
    if (!body) return false;
    if (!(await this.connect())) return false;
    const socket = this.socket;
    if (!socket) return false;

    try {
      const frame = encodeRequest(this.options.checkcode, REQUEST_SUBTITLE, body);
      await this.write(socket, frame);
      const resp = decodeResponse(await this.readExact(RESPONSE_BYTES));

      if (resp.checkcode !== this.respCheckcode) {
        log.warn(
          `invalid resp_checkcode: 0x${resp.checkcode.toString(16)} (expected 0x${this.respCheckcode.toString(16)})`,
        );
        return false;
      }
      if (resp.requestCode !== REQUEST_SUBTITLE) {
        log.warn(`mismatched resp_code: ${resp.requestCode} (expected ${REQUEST_SUBTITLE})`);
        return false;
      }
      if (resp.status !== STATUS_OK) {
        log.warn(`server returned error status=${resp.status}`);
        return false;
      }
      log.debug(`subtitle sent OK (len=${frame.length - REQUEST_HEADER_BYTES})`);
      return true;
    } catch (err) {
      log.warn(`send error: ${describeError(err)}; will reconnect next time`);
      this.disconnect();
      return false;
    }
  }

  private open(): Promise<Socket> {
    return new Promise<Socket>((resolve, reject) => {
      const socket = net.createConnection({ host: this.options.host, port: this.options.port });
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new Error(`connect timeout after ${this.timeoutMs}ms`));
      }, this.timeoutMs);
      const onError = (err: Error) => {
        clearTimeout(timer);
        reject(err);
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', onError);
        this.attach(socket);
        resolve(socket);
      });
    });
  }

  private attach(socket: Socket): void {
    this.inbox = Buffer.alloc(0);
    socket.on('data', (chunk: Buffer) => {
      this.inbox = Buffer.concat([this.inbox, chunk]);
      this.drain();
    });
    socket.on('error', (err) => {
      log.debug(`socket error: ${err.message}`);
      this.failRead(err);
    });
    socket.on('close', () => {
      if (this.socket === socket) this.socket = null;
      this.failRead(new Error('socket closed while receiving'));
    });
  }

  private write(socket: Socket, frame: Buffer): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      socket.write(frame, (err) => (err ? reject(err) : resolve()));
    });
  }

  private readExact(size: number): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.reader = null;
        reject(new Error(`no response within ${this.timeoutMs}ms`));
      }, this.timeoutMs);
      this.reader = {
        size,
        resolve: (buf) => {
          clearTimeout(timer);
          resolve(buf);
        },
        reject: (err) => {
          clearTimeout(timer);
          reject(err);
        },
      };
      this.drain();
    });
  }

  private drain(): void {
    const reader = this.reader;
    if (!reader || this.inbox.length < reader.size) return;
    const out = Buffer.from(this.inbox.subarray(0, reader.size));
    this.inbox = this.inbox.subarray(reader.size);
    this.reader = null;
    reader.resolve(out);
  }

  private failRead(err: Error): void {
    const reader = this.reader;
    this.reader = null;
    reader?.reject(err);
  }
}
