import http from 'node:http';
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { createLogger } from '../env/logging';
import { formatMetrics, renderTokensHtml } from '../renderer/tokens';
import type { ScoreRelayMessage, ScoreRelayOptions, ScoreSnapshot } from './score-relay-protocol';

const DEFAULT_WS_PATH = '/ws/score';

const log = createLogger('score-relay');

function rawToText(data: RawData): string {
	if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
	if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
	return data.toString('utf8');
}

function snapshotMessage(snapshot: ScoreSnapshot): ScoreRelayMessage {
	return {
		type: 'score:snapshot',
		snapshot,
		html: renderTokensHtml(snapshot.tokens),
		summary: formatMetrics(snapshot.metrics),
	};
}

export interface ScoreRelay {
	attach(server: http.Server): void;
	tryHandleApi(req: IncomingMessage, res: ServerResponse): boolean;
	publish(snapshot: ScoreSnapshot): void;
	publishReset(): void;
	getConnectedViewers(): number;
	close(): void;
}

export function createScoreRelay(options?: ScoreRelayOptions): ScoreRelay {
	let attachedServer: http.Server | null = null;
	const wsPath = options?.path ?? DEFAULT_WS_PATH;
	const accessToken = options?.accessToken?.trim() || '';

	const viewers = new Set<WebSocket>();
	const wss = new WebSocketServer({ noServer: true });
	let latest: ScoreSnapshot | null = null;

	const send = (ws: WebSocket, message: ScoreRelayMessage) => {
		try {
			ws.send(JSON.stringify(message));
		} catch (err) {
			// close events will clean the viewer up
			log.debug('send failed', err instanceof Error ? err.message : String(err));
		}
	};

	const broadcast = (message: ScoreRelayMessage) => {
		for (const ws of viewers) send(ws, message);
	};

	const sendJson = (res: ServerResponse, status: number, body: unknown) => {
		try {
			const payload = JSON.stringify(body);
			res.statusCode = status;
			res.setHeader('Content-Type', 'application/json; charset=utf-8');
			res.setHeader('Cache-Control', 'no-store');
			res.end(payload);
		} catch (err) {
			res.statusCode = 500;
			res.end('score relay error');
			log.warn('sendJson failed', err);
		}
	};

	const handleApi = (req: IncomingMessage, res: ServerResponse): boolean => {
		let pathname: string;
		try {
			pathname = new URL(req.url || '/', 'http://localhost').pathname;
		} catch {
			return false;
		}
		if (pathname === '/score/status') {
			sendJson(res, 200, { connectedViewers: viewers.size, hasSnapshot: latest !== null });
			return true;
		}
		if (pathname === '/score/latest') {
			if (!latest) {
				sendJson(res, 404, { error: 'No snapshot yet' });
				return true;
			}
			sendJson(res, 200, latest);
			return true;
		}
		return false;
	};

	const handleHandshake = (ws: WebSocket, raw: string): boolean => {
		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch {
			ws.close(1002, 'invalid handshake');
			return false;
		}
		if (typeof parsed !== 'object' || parsed === null || Reflect.get(parsed, 'type') !== 'hello') {
			ws.close(1002, 'expected hello');
			return false;
		}
		const token: unknown = Reflect.get(parsed, 'token');
		if (accessToken && token !== accessToken) {
			ws.close(4003, 'invalid token');
			return false;
		}
		viewers.add(ws);
		send(ws, { type: 'score:connected', ts: Date.now() });
		if (latest) send(ws, snapshotMessage(latest));
		log.debug('viewer joined', viewers.size);
		return true;
	};

	const handleWsConnection = (ws: WebSocket) => {
		let handshakeDone = false;
		const cleanup = () => {
			viewers.delete(ws);
		};
		ws.on('message', (data: RawData) => {
			if (handshakeDone) return;
			handshakeDone = handleHandshake(ws, rawToText(data));
		});
		ws.on('close', cleanup);
		ws.on('error', cleanup);
	};

	const handleUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer) => {
		const path = (req.url || '').split('?')[0] || '/';
		if (path !== wsPath) {
			socket.destroy();
			return;
		}
		wss.handleUpgrade(req, socket, head, (ws) => {
			handleWsConnection(ws);
		});
	};

	return {
		attach(server: http.Server) {
			if (attachedServer === server) return;
			attachedServer = server;
			server.on('upgrade', handleUpgrade);
			log.info(`relay attached on ${wsPath}`);
		},
		tryHandleApi(req: IncomingMessage, res: ServerResponse) {
			return handleApi(req, res);
		},
		publish(snapshot: ScoreSnapshot) {
			latest = snapshot;
			broadcast(snapshotMessage(snapshot));
		},
		publishReset() {
			latest = null;
			broadcast({ type: 'score:reset', ts: Date.now() });
		},
		getConnectedViewers() {
			return viewers.size;
		},
		close() {
			for (const ws of viewers) ws.close(1001, 'shutting down');
			viewers.clear();
			attachedServer?.off('upgrade', handleUpgrade);
			attachedServer = null;
			wss.close();
		},
	};
}
