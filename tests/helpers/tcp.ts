import net from 'node:net';
import type { Socket } from 'node:net';

export function connectTo(port: number, host = '127.0.0.1'): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    socket.once('error', reject);
    socket.once('connect', () => {
      socket.off('error', reject);
      resolve(socket);
    });
  });
}

/** Collects exactly `size` bytes from the socket. */
export function readBytes(socket: Socket, size: number): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    let acc = Buffer.alloc(0);
    const onData = (chunk: Buffer) => {
      acc = Buffer.concat([acc, chunk]);
      if (acc.length >= size) {
        socket.off('data', onData);
        socket.off('error', reject);
        resolve(acc.subarray(0, size));
      }
    };
    socket.on('data', onData);
    socket.once('error', reject);
  });
}

export function waitForClose(socket: Socket): Promise<void> {
  return new Promise<void>((resolve) => {
    if (socket.destroyed) {
      resolve();
      return;
    }
    socket.once('close', () => resolve());
  });
}

export async function waitFor(check: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error('condition not met in time');
    await new Promise<void>((resolve) => setTimeout(resolve, 10));
  }
}

/** A port that was free a moment ago. */
export function freePort(): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    const srv = net.createServer();
    srv.once('error', reject);
    srv.listen(0, '127.0.0.1', () => {
      const address = srv.address();
      const port = address != null && typeof address !== 'string' ? address.port : 0;
      srv.close(() => resolve(port));
    });
  });
}
