import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { ConfigError, loadConfig, loadEnvFile } from '../../src/config/monitor-config';

describe('loadConfig', () => {
  test('defaults', () => {
    const config = loadConfig({});
    expect(config).toEqual({
      host: '127.0.0.1',
      port: 26072,
      respCheckcode: 20250918,
      subtitle: {
        enabled: false,
        host: '127.0.0.1',
        port: 26071,
        checkcode: 20250918,
        respCheckcode: 0x01350126,
      },
      scoring: { threshold: 0.6, maxLookahead: 3, strategy: 'sequential', updateIntervalMs: 500 },
      relay: { port: 0, accessToken: undefined },
      sink: { host: '0.0.0.0', port: 26071, rawOutPath: './raw_subtitle.txt' },
      logLevel: 1,
    });
  });

  test('coerces numbers, hex checkcodes and flags', () => {
    const config = loadConfig({
      PORT: '9000',
      RESP_CHECKCODE: '7',
      SUBTITLE_CHECKCODE: '11',
      SUBTITLE_RESP_CHECKCODE: '0x10',
      OUTPUT_SUBTITLE_INSERTER_ENABLE: 'True',
      MAX_LOOKAHEAD: '5',
      ALIGN_STRATEGY: 'optimal',
    });
    expect(config.port).toBe(9000);
    expect(config.respCheckcode).toBe(7);
    expect(config.subtitle).toMatchObject({ enabled: true, checkcode: 11, respCheckcode: 16 });
    expect(config.scoring.maxLookahead).toBe(5);
    expect(config.scoring.strategy).toBe('optimal');
  });

  test('subtitle checkcode falls back to the listener checkcode', () => {
    expect(loadConfig({ RESP_CHECKCODE: '99' }).subtitle.checkcode).toBe(99);
  });

  test('blank values use defaults', () => {
    expect(loadConfig({ PORT: '  ', HOST: '' }).port).toBe(26072);
  });

  test('invalid values are reported together', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'abc', MAX_LOOKAHEAD: '0' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0].startsWith('PORT:')).toBe(true);
      expect(caught.issues[1].startsWith('MAX_LOOKAHEAD:')).toBe(true);
    }
  });
});

describe('loadEnvFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'cfg-'));
  });

  afterEach(async () => {
    delete process.env.MONITOR_TEST_ONLY_KEY;
    await rm(dir, { recursive: true, force: true });
  });

  test('reads .env from the given directory', async () => {
    await writeFile(path.join(dir, '.env'), 'MONITOR_TEST_ONLY_KEY=from-file\n');
    expect(loadEnvFile(dir)).toEqual({ loaded: true, path: path.join(dir, '.env') });
    expect(process.env.MONITOR_TEST_ONLY_KEY).toBe('from-file');
  });

  test('a missing file is not an error', () => {
    expect(loadEnvFile(dir).loaded).toBe(false);
  });
});
