import net from 'node:net';
import type { Server, Socket } from 'node:net';
import { createLogger, describeError } from '../env/logging';
import type { HypothesisLog } from '../speech/hypothesis-log';
import {
	decodePayloadText,
	DEFAULT_MAX_FRAME_BYTES,
	encodeResponse,
	FrameDecoder,
	FrameError,
	parseTextField,
	STATUS_OK,
	type RequestFrame,
} from './frame-protocol';

const log = createLogger('monitor');

export interface MonitorServerOptions {
	log: HypothesisLog;
	/** Checkcode written into every acknowledgement. */
	respCheckcode: number;
	/** Called with the raw JSON payload of every accepted fragment. Failures are logged, never propagated. */
	onFragment?: (raw: string, text: string) => void;
	maxFrameBytes?: number;
}

export interface MonitorServer {
	listen(port: number, host?: string): Promise<net.AddressInfo>;
	close(): Promise<void>;
	getConnectedClients(): number;
}

export function createMonitorServer(options: MonitorServerOptions): MonitorServer {
	const clients = new Set<Socket>();
	const maxFrameBytes = options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES;
	let server: Server | null = null;

	const handleFrame = (socket: Socket, frame: RequestFrame) => {
		const raw = decodePayloadText(frame.payload);
		const text = parseTextField(raw);
		if (text == null) {
			log.warn('failed to parse JSON payload', raw.slice(0, 80));
		} else {
			const fragment = text.trim();
			if (fragment) {
				options.log.append(fragment);
				log.debug('received', fragment);
				if (options.onFragment) {
					try {
						options.onFragment(raw, fragment);
					} catch (err) {
						log.warn('fragment hook failed', describeError(err));
					}
				}
			}
		}
		socket.write(encodeResponse(options.respCheckcode, frame.requestCode, STATUS_OK));
	};

	const handleConnection = (socket: Socket) => {
		const peer = `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}`;
		const decoder = new FrameDecoder(maxFrameBytes);
		clients.add(socket);
		log.info('client connected', peer);

		socket.on('data', (chunk: Buffer) => {
			let frames: RequestFrame[];
			try {
				frames = decoder.push(chunk);
			} catch (err) {
				const reason = err instanceof FrameError ? err.message : describeError(err);
				log.warn('protocol error, dropping client', peer, reason);
				socket.destroy();
				return;
			}
			for (const frame of frames) handleFrame(socket, frame);
		});
		socket.on('error', (err) => {
			log.warn('client error', peer, err.message);
		});
		socket.on('close', () => {
			clients.delete(socket);
			log.info('client disconnected', peer);
		});
	};

	return {
		listen(port: number, host = '127.0.0.1') {
			return new Promise<net.AddressInfo>((resolve, reject) => {
				const srv = net.createServer(handleConnection);
				srv.once('error', reject);
				srv.listen(port, host, () => {
					srv.off('error', reject);
					srv.on('error', (err) => log.error('server error', err.message));
					server = srv;
					const address = srv.address();
					if (address == null || typeof address === 'string') {
						reject(new Error(`unexpected listen address ${String(address)}`));
						return;
					}
					log.info(`listening on ${address.address}:${address.port}`);
					resolve(address);
				});
			});
		},
		close() {
			return new Promise<void>((resolve, reject) => {
				for (const socket of clients) socket.destroy();
				clients.clear();
				const srv = server;
				server = null;
				if (!srv) {
					resolve();
					return;
				}
				srv.close((err) => (err ? reject(err) : resolve()));
			});
		},
		getConnectedClients() {
			return clients.size;
		},
	};
}
