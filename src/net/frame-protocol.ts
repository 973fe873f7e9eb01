// src/net/frame-protocol.ts
// Little-endian framing shared by the STT listener and the subtitle sink.
//
// request : checkcode:int32 | requestCode:int32 | size:int32 | payload[size] (UTF-8)
// response: checkcode:int32 | requestCode:int32 | status:uint8 (0 = OK)

import { z } from 'zod';

export const REQUEST_HEADER_BYTES = 12;
export const RESPONSE_BYTES = 9;
export const REQUEST_SUBTITLE = 0x01;
export const STATUS_OK = 0;
export const DEFAULT_SUBTITLE_RESP_CHECKCODE = 0x01350126;
export const DEFAULT_MAX_FRAME_BYTES = 1024 * 1024;

export type RequestFrame = {
  checkcode: number;
  requestCode: number;
  payload: Buffer;
};

export type ResponseFrame = {
  checkcode: number;
  requestCode: number;
  status: number;
};

export class FrameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameError';
  }
}

export function encodeRequest(checkcode: number, requestCode: number, payload: Buffer | string): Buffer {
  const body = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
  const header = Buffer.alloc(REQUEST_HEADER_BYTES);
  header.writeInt32LE(checkcode, 0);
  header.writeInt32LE(requestCode, 4);
  header.writeInt32LE(body.length, 8);
  return Buffer.concat([header, body]);
}

export function encodeResponse(checkcode: number, requestCode: number, status = STATUS_OK): Buffer {
  const out = Buffer.alloc(RESPONSE_BYTES);
  out.writeInt32LE(checkcode, 0);
  out.writeInt32LE(requestCode, 4);
  out.writeUInt8(status, 8);
  return out;
}

export function decodeResponse(buf: Buffer): ResponseFrame {
  if (buf.length < RESPONSE_BYTES) {
    throw new FrameError(`response too short: ${buf.length} bytes`);
  }
  return {
    checkcode: buf.readInt32LE(0),
    requestCode: buf.readInt32LE(4),
    status: buf.readUInt8(8),
  };
}

/** Invalid UTF-8 becomes U+FFFD rather than failing the frame. */
export function decodePayloadText(payload: Buffer): string {
  return payload.toString('utf8');
}

/** Accumulates TCP chunks and yields complete request frames. */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(private readonly maxFrameBytes = DEFAULT_MAX_FRAME_BYTES) {}

  push(chunk: Buffer): RequestFrame[] {
    this.buffer = this.buffer.length ? Buffer.concat([this.buffer, chunk]) : chunk;
    const frames: RequestFrame[] = [];
    while (this.buffer.length >= REQUEST_HEADER_BYTES) {
      const size = this.buffer.readInt32LE(8);
      if (size < 0) throw new FrameError(`negative payload size ${size}`);
      if (size > this.maxFrameBytes) {
        throw new FrameError(`payload size ${size} exceeds limit ${this.maxFrameBytes}`);
      }
      const total = REQUEST_HEADER_BYTES + size;
      if (this.buffer.length < total) break;
      frames.push({
        checkcode: this.buffer.readInt32LE(0),
        requestCode: this.buffer.readInt32LE(4),
        payload: Buffer.from(this.buffer.subarray(REQUEST_HEADER_BYTES, total)),
      });
      this.buffer = this.buffer.subarray(total);
    }
    return frames;
  }

  /** Bytes received but not yet part of a complete frame. */
  get pendingBytes(): number {
    return this.buffer.length;
  }
}

const FragmentPayloadSchema = z.object({
  text: z.string().catch(''),
}).passthrough();

/**
 * Reads the `text` field of a JSON payload. Returns null when the payload is not
 * a JSON object; a missing or non-string `text` reads as ''.
 */
export function parseTextField(raw: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = FragmentPayloadSchema.safeParse(parsed);
  return result.success ? result.data.text : null;
}
