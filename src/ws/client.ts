import WebSocket from 'ws';
import { userMessage } from '../errors.js';
import { logger } from '../lib/logger.js';
import { formatHostForUrl, isWildcardAddress } from '../lib/network.js';
import { sleepWhile } from '../lib/timing.js';
import type { AuthenticatedInfo, ClientObserver, ClientState, Member, StreamEndpoint } from '../types.js';
import { parseServerMessage, type ServerMessage } from './schemas.js';
import { TERMINAL_CLOSE_CODES, isOpen, rawToString, send } from './utils.js';

export const SYSTEM_NICKNAME = 'System';

export interface SessionClientOptions {
  observer?: ClientObserver;
  path?: string;
  connectionTimeoutMs?: number;
  reconnectIntervalMs?: number;
  maxReconnectAttempts?: number;
  heartbeatIntervalMs?: number;
}

interface Target {
  host: string;
  port: number;
  nickname: string;
  code: string;
}

/**
 * Viewer side of the signaling protocol. Transport failures are retried up to
 * `maxReconnectAttempts` times; the attempt count only resets once the server
 * has admitted the viewer. A rejected code, a refused admission (close codes
 * 4001 and 4002) and an explicit disconnect() are not retried.
 */
export class SessionClient {
  private readonly observer: ClientObserver;
  private readonly path: string;
  private readonly connectionTimeoutMs: number;
  private readonly reconnectIntervalMs: number;
  private readonly maxReconnectAttempts: number;
  private readonly heartbeatIntervalMs: number;

  private socket?: WebSocket;
  private target?: Target;
  private heartbeatTimer?: NodeJS.Timeout;
  private clientState: ClientState = 'idle';
  private running = false;
  private autoReconnect = true;
  private reconnectAttempts = 0;
  private assigned?: AuthenticatedInfo;

  constructor(options: SessionClientOptions = {}) {
    this.observer = options.observer ?? {};
    this.path = options.path ?? '/ws';
    this.connectionTimeoutMs = options.connectionTimeoutMs ?? 10_000;
    this.reconnectIntervalMs = options.reconnectIntervalMs ?? 3_000;
    this.maxReconnectAttempts = options.maxReconnectAttempts ?? 5;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30_000;
  }

  get state(): ClientState {
    return this.clientState;
  }

  get isAuthenticated(): boolean {
    return this.clientState === 'authenticated';
  }

  /** Nickname, port and server address from the last auth_success. */
  get assignment(): AuthenticatedInfo | undefined {
    return this.assigned;
  }

  /**
   * Where the player should dial: the advertised server address, or the
   * signaling host when the server advertised a wildcard bind address.
   */
  streamEndpoint(): StreamEndpoint | undefined {
    if (!this.assigned || !this.target) return undefined;
    const advertised = this.assigned.serverIp;
    const host = advertised && !isWildcardAddress(advertised) ? advertised : this.target.host;
    return { host, port: this.assigned.srtPort };
  }

  connect(host: string, port: number, nickname: string, code: string): void {
    if (this.running) {
      logger.warn({ state: this.clientState }, 'client_already_running');
      return;
    }
    this.target = { host, port, nickname, code };
    this.running = true;
    this.autoReconnect = true;
    this.reconnectAttempts = 0;
    this.open();
  }

  /** Closes the connection and turns auto-reconnect off for good. Idempotent. */
  disconnect(): void {
    const wasRunning = this.running;
    this.running = false;
    this.autoReconnect = false;
    this.stopHeartbeat();
    const socket = this.socket;
    this.socket = undefined;
    if (socket && socket.readyState !== WebSocket.CLOSED) {
      socket.close(1000, 'client_disconnect');
    }
    this.clientState = 'disconnected';
    if (wasRunning) logger.debug('client_disconnected');
  }

  /** Queues a chat message; false (and a log line) when not authenticated. */
  sendChat(message: string): boolean {
    const socket = this.socket;
    if (!this.isAuthenticated || !socket || !isOpen(socket)) {
      logger.debug({ state: this.clientState }, 'chat_dropped_not_authenticated');
      return false;
    }
    socket.send(JSON.stringify({ type: 'chat', message }), (error) => {
      if (error) logger.warn({ err: error }, 'chat_send_failed');
    });
    return true;
  }

  private open(): void {
    const target = this.target;
    if (!target || !this.running) return;

    const url = `ws://${formatHostForUrl(target.host)}:${target.port}${this.path}`;
    this.clientState = 'connecting';
    logger.info({ url }, 'client_connecting');

    const socket = new WebSocket(url, { handshakeTimeout: this.connectionTimeoutMs });
    this.socket = socket;
    let opened = false;

    socket.on('open', () => {
      if (this.socket !== socket) return;
      opened = true;
      this.clientState = 'connected';
      logger.info({ url }, 'client_connected');
      this.notify('onConnected', (observer) => observer.onConnected?.());

      this.clientState = 'authenticating';
      send(socket, { type: 'auth', code: target.code, nickname: target.nickname });
    });

    socket.on('message', (raw) => {
      if (this.socket !== socket) return;
      this.handleMessage(rawToString(raw));
    });

    socket.on('error', (err) => {
      if (this.running) logger.warn({ err, url }, 'client_socket_error');
    });

    socket.on('close', (code, reason) => {
      if (this.socket !== socket) return;
      this.socket = undefined;
      this.stopHeartbeat();
      logger.info({ code, reason: reason.toString() }, 'client_socket_closed');
      this.handleTransportClosed(opened, code).catch((error: unknown) => {
        logger.error({ err: error }, 'client_reconnect_failed');
      });
    });
  }

  private async handleTransportClosed(wasOpen: boolean, code: number): Promise<void> {
    if (!this.running || !this.autoReconnect) {
      this.clientState = 'disconnected';
      return;
    }

    // the server already explained the refusal in an error frame
    if (TERMINAL_CLOSE_CODES.has(code)) {
      logger.warn({ code }, 'client_admission_refused');
      this.running = false;
      this.autoReconnect = false;
      this.clientState = 'disconnected';
      return;
    }

    if (wasOpen) {
      logger.warn('client_connection_lost');
      this.notify('onDisconnected', (observer) => observer.onDisconnected?.());
    } else {
      this.notifyError(userMessage('TRANSPORT_DISCONNECTED'));
    }

    this.reconnectAttempts += 1;
    if (this.reconnectAttempts > this.maxReconnectAttempts) {
      logger.error({ attempts: this.maxReconnectAttempts }, 'client_reconnect_exhausted');
      this.running = false;
      this.clientState = 'disconnected';
      this.notifyError('Unable to connect to the server');
      return;
    }

    this.clientState = 'reconnecting';
    logger.info(
      { attempt: this.reconnectAttempts, delayMs: this.reconnectIntervalMs },
      'client_reconnect_scheduled',
    );
    const proceed = await sleepWhile(this.reconnectIntervalMs, () => this.running && this.autoReconnect);
    if (!proceed) {
      logger.debug('client_reconnect_cancelled');
      return;
    }
    this.open();
  }

  private handleMessage(raw: string): void {
    if (!this.running) return;
    const parsed = parseServerMessage(raw);
    if (!parsed.ok) {
      logger.warn({ reason: parsed.reason, type: parsed.type }, 'client_invalid_message');
      return;
    }
    this.dispatch(parsed.message);
  }

  private dispatch(message: ServerMessage): void {
    switch (message.type) {
      case 'auth_success': {
        this.assigned = {
          nickname: message.nickname,
          srtPort: message.srt_port,
          serverIp: message.server_ip,
        };
        this.clientState = 'authenticated';
        this.reconnectAttempts = 0;
        logger.info({ nickname: message.nickname, srtPort: message.srt_port }, 'client_authenticated');
        this.startHeartbeat();
        const info = this.assigned;
        this.notify('onAuthenticated', (observer) => observer.onAuthenticated?.(info));
        break;
      }
      case 'auth_failed':
        logger.error({ message: message.message }, 'client_auth_failed');
        this.notifyError(message.message);
        this.disconnect();
        break;
      case 'chat':
        this.notify('onMessage', (observer) => observer.onMessage?.(message.nickname, message.message));
        break;
      case 'join':
      case 'leave':
        this.notify('onMessage', (observer) => observer.onMessage?.(SYSTEM_NICKNAME, message.message));
        break;
      case 'members': {
        const members: Member[] = message.members;
        this.notify('onMembersChanged', (observer) => observer.onMembersChanged?.(members));
        break;
      }
      case 'srt_port':
        if (this.assigned) {
          this.assigned = { ...this.assigned, srtPort: message.srt_port };
        }
        logger.info({ srtPort: message.srt_port }, 'client_port_reassigned');
        break;
      case 'error':
        logger.error({ message: message.message }, 'client_server_error');
        this.notifyError(message.message);
        break;
      case 'heartbeat':
        logger.debug('client_heartbeat_ack');
        break;
    }
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      const socket = this.socket;
      if (socket && this.isAuthenticated) {
        send(socket, { type: 'heartbeat' });
      }
    }, this.heartbeatIntervalMs);
    this.heartbeatTimer.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
  }

  private notifyError(message: string): void {
    this.notify('onError', (observer) => observer.onError?.(message));
  }

  private notify(event: keyof ClientObserver, callback: (observer: ClientObserver) => void): void {
    try {
      callback(this.observer);
    } catch (error) {
      logger.error({ err: error, event }, 'observer_callback_failed');
    }
  }
}
