import http from 'node:http';
import net from 'node:net';
import WebSocket from 'ws';
import type { ViewerRelayLauncher } from '../types.js';
import { parseServerMessage, type ServerMessage } from '../ws/schemas.js';
import { rawToString } from '../ws/utils.js';

export async function startHttpServer(): Promise<{ server: http.Server; port: number }> {
  const server = http.createServer((_req, res) => {
    res.statusCode = 404;
    res.end();
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return { server, port: address.port };
}

export async function closeHttpServer(server: http.Server): Promise<void> {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
}

/** A port nothing listens on, at least right after this resolves. */
export async function closedPort(): Promise<number> {
  const server = net.createServer();
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  await new Promise<void>((resolve) => server.close(() => resolve()));
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return address.port;
}

type Pending = {
  predicate: (message: ServerMessage) => boolean;
  resolve: (message: ServerMessage) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
};

/**
 * A raw ws connection that buffers every server message, so a test can wait
 * for a given message without losing the ones around it.
 */
export class TestSocket {
  readonly received: ServerMessage[] = [];
  invalidFrames = 0;
  private readonly buffer: ServerMessage[] = [];
  private readonly waiters: Pending[] = [];
  readonly closed: Promise<{ code: number; reason: string }>;

  private constructor(readonly socket: WebSocket) {
    socket.on('message', (raw) => {
      const parsed = parseServerMessage(rawToString(raw));
      if (!parsed.ok) {
        this.invalidFrames += 1;
        return;
      }
      this.received.push(parsed.message);
      this.deliver(parsed.message);
    });
    // failed handshakes are reported through open()
    socket.on('error', () => undefined);
    this.closed = new Promise((resolve) => {
      socket.on('close', (code, reason) => resolve({ code, reason: reason.toString() }));
    });
  }

  static open(port: number, path = '/ws'): Promise<TestSocket> {
    const socket = new WebSocket(`ws://127.0.0.1:${port}${path}`);
    const client = new TestSocket(socket);
    return new Promise((resolve, reject) => {
      socket.once('open', () => resolve(client));
      socket.once('error', reject);
    });
  }

  send(message: unknown): void {
    this.socket.send(typeof message === 'string' ? message : JSON.stringify(message));
  }

  next<T extends ServerMessage['type']>(type: T, timeoutMs = 2000): Promise<Extract<ServerMessage, { type: T }>> {
    return this.nextMatching(type, () => true, timeoutMs);
  }

  nextMatching<T extends ServerMessage['type']>(
    type: T,
    predicate: (message: Extract<ServerMessage, { type: T }>) => boolean,
    timeoutMs = 2000,
  ): Promise<Extract<ServerMessage, { type: T }>> {
    const matches = (message: ServerMessage): message is Extract<ServerMessage, { type: T }> =>
      message.type === type;
    const accept = (message: ServerMessage) => matches(message) && predicate(message);

    return new Promise((resolve, reject) => {
      const deliver = (message: ServerMessage) => {
        if (matches(message)) resolve(message);
      };
      const index = this.buffer.findIndex(accept);
      if (index >= 0) {
        const [message] = this.buffer.splice(index, 1);
        if (message) deliver(message);
        return;
      }
      const timer = setTimeout(() => {
        const position = this.waiters.indexOf(pending);
        if (position >= 0) this.waiters.splice(position, 1);
        reject(new Error(`timed out waiting for "${type}"`));
      }, timeoutMs);
      const pending: Pending = { predicate: accept, resolve: deliver, reject, timer };
      this.waiters.push(pending);
    });
  }

  /** Authenticates and resolves with the auth_success payload. */
  async join(nickname: string, code = '114514'): Promise<Extract<ServerMessage, { type: 'auth_success' }>> {
    this.send({ type: 'auth', code, nickname });
    return this.next('auth_success');
  }

  count(type: ServerMessage['type']): number {
    return this.received.filter((message) => message.type === type).length;
  }

  async close(): Promise<void> {
    if (this.socket.readyState === WebSocket.CLOSED) return;
    this.socket.close();
    await this.closed;
  }

  private deliver(message: ServerMessage): void {
    const index = this.waiters.findIndex((waiter) => waiter.predicate(message));
    const waiter = index >= 0 ? this.waiters.splice(index, 1)[0] : undefined;
    if (waiter) {
      clearTimeout(waiter.timer);
      waiter.resolve(message);
      return;
    }
    this.buffer.push(message);
  }
}

/** Relay launcher that records calls instead of spawning a transcoder. */
export class FakeRelays implements ViewerRelayLauncher {
  readonly running = new Set<number>();
  readonly started: number[] = [];
  readonly stopped: number[] = [];
  failStarts = false;
  /** While set, startViewerRelay waits on it before returning. */
  gate?: Promise<void>;

  async startViewerRelay(srtPort: number): Promise<void> {
    this.started.push(srtPort);
    if (this.gate) await this.gate;
    if (this.failStarts) throw new Error('transcoder missing');
    this.running.add(srtPort);
  }

  async stopViewerRelay(srtPort: number): Promise<void> {
    this.stopped.push(srtPort);
    this.running.delete(srtPort);
  }

  async stopAllViewerRelays(): Promise<void> {
    for (const port of [...this.running]) {
      await this.stopViewerRelay(port);
    }
  }
}

/** Hands out `start`, `start + 1`, ... skipping excluded ports, with no OS probe. */
export async function sequentialPorts(
  start: number,
  maxAttempts = 100,
  isExcluded: (port: number) => boolean = () => false,
): Promise<number | null> {
  for (let port = start; port < start + maxAttempts; port += 1) {
    if (!isExcluded(port)) return port;
  }
  return null;
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}
