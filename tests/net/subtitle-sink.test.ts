import { mkdtemp, readFile, rm } from 'node:fs/promises';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import { decodeResponse, encodeRequest, RESPONSE_BYTES } from '../../src/net/frame-protocol';
import { formatRawText, SubtitleSink } from '../../src/net/subtitle-sink';
import { connectTo, readBytes } from '../helpers/tcp';

describe('formatRawText', () => {
  test('breaks lines after sentence terminators', () => {
    expect(formatRawText('첫 문장. 둘째')).toBe('첫 문장.\n 둘째 ');
    expect(formatRawText('끝.')).toBe('끝.\n');
    expect(formatRawText('정말? 네!')).toBe('정말?\n 네!\n');
  });

  test('unterminated text ends with a space', () => {
    expect(formatRawText('  오늘 ')).toBe('오늘 ');
    expect(formatRawText('')).toBe('');
  });
});

describe('SubtitleSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'sink-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  test('server errors after listening are logged', async () => {
    const saved = process.env.MONITOR_LOG_LEVEL;
    process.env.MONITOR_LOG_LEVEL = '1';
    const createServer = jest.spyOn(net, 'createServer');
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const sink = new SubtitleSink({ outPath: path.join(dir, 'raw.txt'), respCheckcode: 1 });
    try {
      await sink.listen(0, '127.0.0.1');
      const created = createServer.mock.results[0];
      if (created.type !== 'return') throw new Error('server was not created');
      const server = created.value;
      expect(() => server.emit('error', new Error('EMFILE'))).not.toThrow();
      expect(error).toHaveBeenCalledWith('[sink]', 'server error: EMFILE');
    } finally {
      await sink.close();
      if (saved === undefined) delete process.env.MONITOR_LOG_LEVEL;
      else process.env.MONITOR_LOG_LEVEL = saved;
    }
  });

  test('acknowledges frames and appends their text', async () => {
    const outPath = path.join(dir, 'raw.txt');
    const sink = new SubtitleSink({ outPath, respCheckcode: 0x01350126 });
    const { port } = await sink.listen(0, '127.0.0.1');
    const socket = await connectTo(port);
    try {
      const ack = readBytes(socket, RESPONSE_BYTES * 2);
      socket.write(encodeRequest(1, 1, '{"text":"오늘 날씨가."}'));
      socket.write(encodeRequest(1, 1, '{"text":"좋습니다"}'));
      const buf = await ack;
      expect(decodeResponse(buf)).toEqual({ checkcode: 0x01350126, requestCode: 1, status: 0 });
      await sink.flush();
      expect(await readFile(outPath, 'utf8')).toBe('오늘 날씨가.\n좋습니다 ');
    } finally {
      socket.destroy();
      await sink.close();
    }
  });
});
