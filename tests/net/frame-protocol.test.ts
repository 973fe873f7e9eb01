import {
  decodeResponse,
  encodeRequest,
  encodeResponse,
  FrameDecoder,
  FrameError,
  parseTextField,
  RESPONSE_BYTES,
} from '../../src/net/frame-protocol';

describe('encodeRequest', () => {
  test('writes a little-endian header before the UTF-8 payload', () => {
    const frame = encodeRequest(20250918, 1, '가');
    expect(frame.length).toBe(15);
    expect(frame.readInt32LE(0)).toBe(20250918);
    expect(frame.readInt32LE(4)).toBe(1);
    expect(frame.readInt32LE(8)).toBe(3);
    expect(frame.subarray(12).toString('utf8')).toBe('가');
  });
});

describe('responses', () => {
  test('encode to nine bytes and decode back', () => {
    const buf = encodeResponse(0x01350126, 1);
    expect(buf.length).toBe(RESPONSE_BYTES);
    expect(buf.readUInt8(8)).toBe(0);
    expect(decodeResponse(buf)).toEqual({ checkcode: 0x01350126, requestCode: 1, status: 0 });
  });

  test('short buffers are rejected', () => {
    expect(() => decodeResponse(Buffer.alloc(4))).toThrow(FrameError);
  });
});

describe('FrameDecoder', () => {
  test('reassembles frames split across chunks', () => {
    const decoder = new FrameDecoder();
    const frame = encodeRequest(7, 1, '{"text":"안녕"}');
    expect(decoder.push(frame.subarray(0, 5))).toEqual([]);
    expect(decoder.push(frame.subarray(5, 14))).toEqual([]);
    expect(decoder.pendingBytes).toBe(14);
    const frames = decoder.push(frame.subarray(14));
    expect(frames).toHaveLength(1);
    expect(frames[0].checkcode).toBe(7);
    expect(frames[0].payload.toString('utf8')).toBe('{"text":"안녕"}');
    expect(decoder.pendingBytes).toBe(0);
  });

  test('yields every frame in one chunk', () => {
    const decoder = new FrameDecoder();
    const chunk = Buffer.concat([encodeRequest(1, 1, 'a'), encodeRequest(1, 1, ''), encodeRequest(1, 1, 'bc')]);
    expect(decoder.push(chunk).map((f) => f.payload.toString('utf8'))).toEqual(['a', '', 'bc']);
  });

  test('refuses oversized and negative sizes', () => {
    expect(() => new FrameDecoder(4).push(encodeRequest(1, 1, 'hello'))).toThrow('exceeds limit 4');
    const header = Buffer.alloc(12);
    header.writeInt32LE(-1, 8);
    expect(() => new FrameDecoder().push(header)).toThrow(FrameError);
  });
});

describe('parseTextField', () => {
  test('reads the text field', () => {
    expect(parseTextField('{"text":"오늘","final":true}')).toBe('오늘');
  });

  test('missing or non-string text reads as empty', () => {
    expect(parseTextField('{}')).toBe('');
    expect(parseTextField('{"text":42}')).toBe('');
  });

  test('non-objects are not payloads', () => {
    expect(parseTextField('not json')).toBeNull();
    expect(parseTextField('"text"')).toBeNull();
    expect(parseTextField('null')).toBeNull();
  });
});
