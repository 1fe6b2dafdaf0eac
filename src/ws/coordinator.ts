import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { v4 as uuid } from 'uuid';
import { WebSocketServer, type WebSocket } from 'ws';
import { SessionError, userMessage } from '../errors.js';
import { logger } from '../lib/logger.js';
import { resolveNickname } from '../lib/nicknames.js';
import { findAvailablePort, type PortFinder, type PortProbeOptions } from '../lib/ports.js';
import type { ClientRecord, CoordinatorObserver, Member, ViewerRelayLauncher } from '../types.js';
import { parseClientMessage, type ClientMessage, type ServerMessage } from './schemas.js';
import {
  CLOSE_ADMISSION_FAILED,
  CLOSE_AUTH_FAILED,
  CLOSE_GOING_AWAY,
  rawToString,
  send,
  sendAsync,
} from './utils.js';

export interface CoordinatorOptions {
  verificationCode: string;
  hostNickname: string;
  relays: ViewerRelayLauncher;
  /** Address viewer relays listen on. */
  bindAddress?: string;
  /** Address sent to viewers as `server_ip`; defaults to bindAddress. */
  advertisedAddress?: string;
  srtBasePort?: number;
  portProbeAttempts?: number;
  /** Passed to every port probe. */
  portProbe?: PortProbeOptions;
  pingIntervalMs?: number;
  path?: string;
  findPort?: PortFinder;
  observer?: CoordinatorObserver;
}

type AuthRequest = Extract<ClientMessage, { type: 'auth' }>;

/**
 * Host side of the signaling protocol. Owns the viewer table, the nickname
 * set and the port cursor; all three are only touched from socket callbacks
 * on this event loop, and admissions run one at a time.
 */
export class SessionCoordinator {
  private readonly clients = new Map<string, ClientRecord>();
  private readonly nicknames = new Set<string>();
  private readonly claimedPorts = new Set<number>();
  private readonly verificationCode: string;
  private readonly hostNickname: string;
  private readonly relays: ViewerRelayLauncher;
  private readonly bindAddress: string;
  private readonly advertisedAddress: string;
  private readonly basePort: number;
  private readonly portProbeAttempts: number;
  private readonly portProbe: PortProbeOptions;
  private readonly pingIntervalMs: number;
  private readonly path: string;
  private readonly findPort: PortFinder;
  private readonly observer: CoordinatorObserver;

  private nextPort: number;
  private admissions: Promise<void> = Promise.resolve();
  private wss?: WebSocketServer;
  private httpServer?: Server;
  private pingTimer?: NodeJS.Timeout;
  private running = false;
  private stopping?: Promise<void>;

  constructor(options: CoordinatorOptions) {
    this.verificationCode = options.verificationCode;
    this.hostNickname = options.hostNickname;
    this.relays = options.relays;
    this.bindAddress = options.bindAddress ?? '0.0.0.0';
    this.advertisedAddress = options.advertisedAddress ?? this.bindAddress;
    this.basePort = options.srtBasePort ?? 10000;
    this.portProbeAttempts = options.portProbeAttempts ?? 100;
    this.portProbe = options.portProbe ?? {};
    this.pingIntervalMs = options.pingIntervalMs ?? 20_000;
    this.path = options.path ?? '/ws';
    this.findPort = options.findPort ?? findAvailablePort;
    this.observer = options.observer ?? {};
    this.nextPort = this.basePort;
    this.nicknames.add(this.hostNickname);
  }

  /** Starts accepting WebSocket upgrades on `httpServer` at the configured path. */
  attach(httpServer: Server): void {
    if (this.running || this.stopping) {
      throw new Error('Coordinator is already attached or stopped');
    }
    const wss = new WebSocketServer({ noServer: true });
    this.wss = wss;
    this.httpServer = httpServer;
    this.running = true;

    httpServer.on('upgrade', this.handleUpgrade);

    wss.on('connection', (socket: WebSocket, request: IncomingMessage) => {
      this.handleConnection(socket, request);
    });

    this.pingTimer = setInterval(() => this.pingClients(), this.pingIntervalMs);
    this.pingTimer.unref();

    logger.info({ path: this.path, host: this.hostNickname }, 'coordinator_started');
    this.notifyMembers(this.members());
  }

  members(): Member[] {
    const members: Member[] = [{ nickname: this.hostNickname, role: 'sender' }];
    for (const record of this.clients.values()) {
      if (record.authenticated && record.nickname) {
        members.push({ nickname: record.nickname, role: 'receiver' });
      }
    }
    return members;
  }

  stats(): { connections: number; viewers: number; nextPort: number } {
    let viewers = 0;
    for (const record of this.clients.values()) {
      if (record.authenticated) viewers += 1;
    }
    return { connections: this.clients.size, viewers, nextPort: this.nextPort };
  }

  /** Chat from the host itself, broadcast under the host nickname. */
  async sendChat(message: string): Promise<void> {
    if (!this.running) return;
    await this.broadcast(this.chatMessage(this.hostNickname, message));
    this.notifyMessage(this.hostNickname, message);
  }

  /** Idempotent; safe to call from inside an observer callback. */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  private readonly handleUpgrade = (request: IncomingMessage, socket: Duplex, head: Buffer): void => {
    const wss = this.wss;
    const pathname = (request.url ?? '/').split('?')[0];
    if (!wss || !this.running || pathname !== this.path) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (client) => {
      wss.emit('connection', client, request);
    });
  };

  private handleConnection(socket: WebSocket, request: IncomingMessage): void {
    const record: ClientRecord = {
      id: uuid(),
      socket,
      state: 'connected',
      authenticated: false,
      connectedAt: Date.now(),
      remoteAddress: request.socket.remoteAddress,
      isAlive: true,
    };
    this.clients.set(record.id, record);

    logger.info({ id: record.id, ip: record.remoteAddress }, 'ws_connected');

    socket.on('pong', () => {
      record.isAlive = true;
    });

    socket.on('message', (raw) => {
      this.handleMessage(record, rawToString(raw)).catch((error: unknown) => {
        logger.error({ err: error, id: record.id }, 'ws_message_failed');
      });
    });

    socket.on('close', () => {
      this.handleClose(record).catch((error: unknown) => {
        logger.error({ err: error, id: record.id }, 'ws_cleanup_failed');
      });
    });

    socket.on('error', (err) => {
      logger.error({ err, id: record.id }, 'ws_error');
      socket.close();
    });
  }

  private async handleMessage(record: ClientRecord, raw: string): Promise<void> {
    const parsed = parseClientMessage(raw);
    if (!parsed.ok) {
      logger.warn({ id: record.id, reason: parsed.reason, type: parsed.type }, 'ws_invalid_message');
      this.sendError(record, userMessage('PROTOCOL_VIOLATION'));
      return;
    }

    const message = parsed.message;
    if (record.state !== 'authenticated') {
      if (message.type === 'auth' && record.state === 'connected') {
        await this.handleAuth(record, message);
      } else if (message.type === 'auth') {
        this.sendError(record, 'Authentication already in progress');
      } else {
        this.sendError(record, 'Please authenticate first');
      }
      return;
    }

    switch (message.type) {
      case 'chat':
        await this.handleChat(record, message.message);
        break;
      case 'heartbeat':
        send(record.socket, { type: 'heartbeat' });
        break;
      case 'auth':
        this.sendError(record, 'Already authenticated');
        break;
    }
  }

  private async handleAuth(record: ClientRecord, request: AuthRequest): Promise<void> {
    record.state = 'authenticating';

    if (request.code !== this.verificationCode) {
      logger.warn({ id: record.id, ip: record.remoteAddress }, 'auth_rejected');
      record.state = 'disconnected';
      await sendAsync(record.socket, {
        type: 'auth_failed',
        message: userMessage('AUTHENTICATION_FAILED'),
      }).catch((error: unknown) => logger.warn({ err: error, id: record.id }, 'ws_send_failed'));
      record.socket.close(CLOSE_AUTH_FAILED, 'auth_failed');
      return;
    }

    const nickname = resolveNickname(request.nickname, this.nicknames);
    if (nickname !== request.nickname) {
      logger.info({ requested: request.nickname, assigned: nickname }, 'nickname_suffixed');
    }
    // Reserved now so a concurrent join cannot take it; released on failure.
    this.nicknames.add(nickname);

    let srtPort: number;
    try {
      srtPort = await this.enqueueAdmission(() => this.admit());
    } catch (error) {
      this.nicknames.delete(nickname);
      record.state = 'disconnected';
      const kind = error instanceof SessionError ? error.kind : 'PROCESS_LAUNCH_FAILED';
      logger.error({ err: error, id: record.id, nickname, kind }, 'admission_failed');
      await sendAsync(record.socket, { type: 'error', message: userMessage(kind) }).catch(
        (sendError: unknown) => logger.warn({ err: sendError, id: record.id }, 'ws_send_failed'),
      );
      record.socket.close(CLOSE_ADMISSION_FAILED, 'admission_failed');
      return;
    }

    if (!this.running || !this.clients.has(record.id)) {
      // The viewer left, or the host stopped, while its relay was starting.
      logger.info({ id: record.id, nickname, srtPort }, 'admission_abandoned');
      this.nicknames.delete(nickname);
      await this.releasePort(srtPort);
      return;
    }

    record.state = 'authenticated';
    record.authenticated = true;
    record.nickname = nickname;
    record.srtPort = srtPort;

    send(record.socket, {
      type: 'auth_success',
      nickname,
      srt_port: srtPort,
      server_ip: this.advertisedAddress,
    });

    await this.broadcast(
      { type: 'join', nickname, message: `${nickname} joined the room` },
      record.id,
    );
    await this.publishMembers();

    logger.info({ id: record.id, nickname, srtPort }, 'viewer_joined');
  }

  private async admit(): Promise<number> {
    const port = await this.allocatePort();
    if (port === null) {
      throw new SessionError('PORT_EXHAUSTED');
    }
    this.claimedPorts.add(port);
    try {
      await this.relays.startViewerRelay(port, this.bindAddress);
    } catch (error) {
      this.claimedPorts.delete(port);
      throw new SessionError('PROCESS_LAUNCH_FAILED', `relay for port ${port} did not start`, {
        cause: error,
      });
    }
    return port;
  }

  private async allocatePort(): Promise<number | null> {
    const isClaimed = (port: number) => this.claimedPorts.has(port);
    let port = await this.findPort(this.nextPort, this.portProbeAttempts, isClaimed, this.portProbe);
    if (port === null && this.nextPort !== this.basePort) {
      logger.info({ from: this.nextPort, to: this.basePort }, 'port_cursor_wrapped');
      port = await this.findPort(this.basePort, this.portProbeAttempts, isClaimed, this.portProbe);
    }
    if (port !== null) {
      this.nextPort = port + 1;
    }
    return port;
  }

  private enqueueAdmission<T>(task: () => Promise<T>): Promise<T> {
    const result = this.admissions.then(task);
    this.admissions = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async releasePort(port: number): Promise<void> {
    try {
      await this.relays.stopViewerRelay(port);
    } catch (error) {
      logger.warn({ err: error, srtPort: port }, 'viewer_relay_stop_failed');
    } finally {
      this.claimedPorts.delete(port);
    }
  }

  private async handleChat(record: ClientRecord, message: string): Promise<void> {
    const nickname = record.nickname;
    if (!nickname) return;
    await this.broadcast(this.chatMessage(nickname, message));
    this.notifyMessage(nickname, message);
  }

  private chatMessage(nickname: string, message: string): ServerMessage {
    return { type: 'chat', nickname, message, timestamp: new Date().toISOString() };
  }

  private async handleClose(record: ClientRecord): Promise<void> {
    const wasAuthenticated = record.authenticated;
    const { nickname, srtPort } = record;
    record.state = 'disconnected';
    record.authenticated = false;

    logger.info({ id: record.id, nickname }, 'ws_disconnected');

    if (!wasAuthenticated) {
      this.clients.delete(record.id);
      return;
    }

    if (srtPort !== undefined) {
      if (this.running) {
        await this.releasePort(srtPort);
      } else {
        this.claimedPorts.delete(srtPort);
      }
    }
    if (nickname) this.nicknames.delete(nickname);
    this.clients.delete(record.id);

    if (!this.running || !nickname) return;

    await this.broadcast({ type: 'leave', nickname, message: `${nickname} left the room` });
    await this.publishMembers();
  }

  /** Sends to every authenticated viewer at once; one failed recipient is only logged. */
  private async broadcast(message: ServerMessage, exceptId?: string): Promise<void> {
    const frame = JSON.stringify(message);
    const targets = Array.from(this.clients.values()).filter(
      (record) => record.authenticated && record.id !== exceptId,
    );
    const results = await Promise.allSettled(targets.map((record) => sendAsync(record.socket, frame)));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.warn({ err: result.reason, id: targets[index]?.id, type: message.type }, 'ws_send_failed');
      }
    });
  }

  private async publishMembers(): Promise<void> {
    const members = this.members();
    await this.broadcast({ type: 'members', members });
    this.notifyMembers(members);
  }

  private sendError(record: ClientRecord, message: string): void {
    send(record.socket, { type: 'error', message });
  }

  private notifyMessage(nickname: string, message: string): void {
    try {
      this.observer.onMessage?.(nickname, message);
    } catch (error) {
      logger.error({ err: error }, 'observer_message_failed');
    }
  }

  private notifyMembers(members: Member[]): void {
    try {
      this.observer.onMembersChanged?.(members);
    } catch (error) {
      logger.error({ err: error }, 'observer_members_failed');
    }
  }

  private pingClients(): void {
    for (const record of this.clients.values()) {
      if (!record.isAlive) {
        logger.info({ id: record.id, nickname: record.nickname }, 'ws_ping_timeout');
        record.socket.terminate();
        continue;
      }
      record.isAlive = false;
      record.socket.ping();
    }
  }

  private async shutdown(): Promise<void> {
    this.running = false;
    if (this.pingTimer) clearInterval(this.pingTimer);
    this.httpServer?.off('upgrade', this.handleUpgrade);

    for (const record of this.clients.values()) {
      record.socket.close(CLOSE_GOING_AWAY, 'Host shutting down');
    }

    try {
      await this.admissions;
      await this.relays.stopAllViewerRelays();
    } catch (error) {
      logger.error({ err: error }, 'viewer_relays_stop_failed');
    }

    const wss = this.wss;
    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }
    this.clients.clear();
    this.claimedPorts.clear();
    this.nicknames.clear();
    this.nicknames.add(this.hostNickname);
    logger.info('coordinator_stopped');
  }
}
