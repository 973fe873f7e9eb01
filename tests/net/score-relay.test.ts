import http from 'node:http';
import WebSocket from 'ws';
import { createScoreRelay, type ScoreRelay } from '../../src/net/score-relay';
import type { ScoreRelayHello, ScoreSnapshot } from '../../src/net/score-relay-protocol';
import { zeroMetrics } from '../../src/speech/types';
import { getJson } from '../helpers/http';
import { waitFor } from '../helpers/tcp';

type Viewer = { ws: WebSocket; messages: Array<Record<string, unknown>>; closeCode: number | null };

function openViewer(port: number, hello: ScoreRelayHello | string): Promise<Viewer> {
  return new Promise<Viewer>((resolve, reject) => {
    const ws = new WebSocket(`ws://127.0.0.1:${port}/ws/score`);
    const viewer: Viewer = { ws, messages: [], closeCode: null };
    ws.on('message', (data) => {
      const parsed: unknown = JSON.parse(data.toString());
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        viewer.messages.push(Object.fromEntries(Object.entries(parsed)));
      }
    });
    ws.on('close', (code) => {
      viewer.closeCode = code;
    });
    ws.once('error', reject);
    ws.once('open', () => {
      ws.send(typeof hello === 'string' ? hello : JSON.stringify(hello));
      resolve(viewer);
    });
  });
}

const snapshot: ScoreSnapshot = {
  mode: 'scored',
  tokens: [
    { text: '오늘', type: 'hit' },
    { text: '<날씨>', type: 'sub' },
    { text: '매우', type: 'pending' },
  ],
  metrics: { ...zeroMetrics(), wer: 0.5, hits: 1, substitutions: 1, refProcessed: 2 },
  completed: false,
  fragments: 2,
  ts: 1000,
};

describe('score relay', () => {
  let server: http.Server;
  let relay: ScoreRelay;
  let port: number;
  const viewers: Viewer[] = [];

  const start = async (accessToken?: string) => {
    relay = createScoreRelay({ accessToken });
    server = http.createServer((req, res) => {
      if (relay.tryHandleApi(req, res)) return;
      res.statusCode = 404;
      res.end('{}');
    });
    relay.attach(server);
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    port = address != null && typeof address !== 'string' ? address.port : 0;
  };

  const join = async (hello: ScoreRelayHello | string) => {
    const viewer = await openViewer(port, hello);
    viewers.push(viewer);
    return viewer;
  };

  afterEach(async () => {
    for (const v of viewers.splice(0)) v.ws.terminate();
    relay.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  test('viewers receive published snapshots with rendered html', async () => {
    await start();
    const viewer = await join({ type: 'hello' });
    await waitFor(() => viewer.messages.length === 1);
    expect(relay.getConnectedViewers()).toBe(1);
    expect(viewer.messages[0].type).toBe('score:connected');

    relay.publish(snapshot);
    await waitFor(() => viewer.messages.length === 2);
    const msg = viewer.messages[1];
    expect(msg.type).toBe('score:snapshot');
    expect(msg.html).toBe('<span class="tok tok-hit">오늘</span> <span class="tok tok-sub">&lt;날씨&gt;</span>');
    expect(msg.summary).toBe('Current WER: 50.00% | Global CER: 0.00% | H:1 S:1 D:0 I:0');
  });

  test('late joiners get the latest snapshot; reset clears it', async () => {
    await start();
    relay.publish(snapshot);
    const viewer = await join({ type: 'hello' });
    await waitFor(() => viewer.messages.length === 2);
    expect(viewer.messages.map((m) => m.type)).toEqual(['score:connected', 'score:snapshot']);

    relay.publishReset();
    await waitFor(() => viewer.messages.length === 3);
    expect(viewer.messages[2].type).toBe('score:reset');
    expect((await getJson(port, '/score/latest')).status).toBe(404);
  });

  test('rejects a wrong token and a malformed hello', async () => {
    await start('test-secret');
    const wrong = await join({ type: 'hello', token: 'nope' });
    const garbled = await join('not json');
    await waitFor(() => wrong.closeCode !== null && garbled.closeCode !== null);
    expect(wrong.closeCode).toBe(4003);
    expect(garbled.closeCode).toBe(1002);

    const ok = await join({ type: 'hello', token: 'test-secret' });
    await waitFor(() => ok.messages.length === 1);
    expect(relay.getConnectedViewers()).toBe(1);
  });

  test('status and latest endpoints', async () => {
    await start();
    expect(await getJson(port, '/score/status')).toEqual({
      status: 200,
      body: { connectedViewers: 0, hasSnapshot: false },
    });
    relay.publish(snapshot);
    const latest = await getJson(port, '/score/latest');
    expect(latest.status).toBe(200);
    expect(latest.body).toEqual(snapshot);
    expect((await getJson(port, '/nothing')).status).toBe(404);
  });
});
