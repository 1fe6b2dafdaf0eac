import type { AppConfig } from './config.js';
import { logger } from './lib/logger.js';
import { isValidIp, parseAddress, resolveHostname } from './lib/network.js';
import { ProcessSupervisor } from './lib/processSupervisor.js';
import { sleepWhile } from './lib/timing.js';
import { MediaPlayer } from './streaming/player.js';
import type { AuthenticatedInfo, ClientObserver } from './types.js';
import { SYSTEM_NICKNAME, SessionClient } from './ws/client.js';

export type ViewerConfig = Pick<
  AppConfig,
  | 'serverHost'
  | 'serverPort'
  | 'nickname'
  | 'verificationCode'
  | 'connectionTimeoutMs'
  | 'reconnectIntervalMs'
  | 'maxReconnectAttempts'
  | 'heartbeatIntervalMs'
  | 'playerStartDelayMs'
  | 'stopTimeoutMs'
  | 'programs'
>;

/**
 * Joins a host's session and plays the stream endpoint it hands out. The
 * player starts `playerStartDelayMs` after each successful authentication so
 * the host's relay is listening by the time it dials.
 */
export class ViewerSession {
  readonly supervisor = new ProcessSupervisor();
  readonly client: SessionClient;
  private readonly player: MediaPlayer;
  private running = false;
  private playback: Promise<void> = Promise.resolve();
  private stopping?: Promise<void>;

  constructor(
    private readonly config: ViewerConfig,
    private readonly observer: ClientObserver = {},
  ) {
    this.player = new MediaPlayer(this.supervisor, {
      mpvPath: config.programs.mpv,
      role: 'receiver',
      stopTimeoutMs: config.stopTimeoutMs,
      onClosed: () => this.observer.onMessage?.(SYSTEM_NICKNAME, 'The player was closed, you can keep chatting'),
    });
    this.client = new SessionClient({
      connectionTimeoutMs: config.connectionTimeoutMs,
      reconnectIntervalMs: config.reconnectIntervalMs,
      maxReconnectAttempts: config.maxReconnectAttempts,
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      observer: {
        ...observer,
        onAuthenticated: (info) => {
          observer.onAuthenticated?.(info);
          this.schedulePlayback(info);
        },
      },
    });
  }

  async start(): Promise<void> {
    this.running = true;
    const { host, port } = await this.resolveServer();
    this.client.connect(host, port, this.config.nickname, this.config.verificationCode);
  }

  sendChat(message: string): boolean {
    return this.client.sendChat(message);
  }

  stop(): Promise<void> {
    this.stopping ??= this.teardown();
    return this.stopping;
  }

  private async resolveServer(): Promise<{ host: string; port: number }> {
    const parsed = parseAddress(this.config.serverHost);
    const port = parsed.port ?? this.config.serverPort;
    if (isValidIp(parsed.host)) return { host: parsed.host, port };

    const resolved = await resolveHostname(parsed.host);
    if (!resolved) {
      logger.warn({ host: parsed.host }, 'server_host_unresolved');
      return { host: parsed.host, port };
    }
    logger.info({ host: parsed.host, address: resolved }, 'server_host_resolved');
    return { host: resolved, port };
  }

  private schedulePlayback(info: AuthenticatedInfo): void {
    this.playback = this.playback
      .then(() => this.startPlayer(info))
      .catch((error: unknown) => logger.error({ err: error }, 'player_start_failed'));
  }

  private async startPlayer(info: AuthenticatedInfo): Promise<void> {
    if (this.player.isRunning()) {
      await this.player.stop();
    }
    if (!(await sleepWhile(this.config.playerStartDelayMs, () => this.running))) return;

    const endpoint = this.client.streamEndpoint();
    if (!endpoint) return;
    logger.info({ ...endpoint, nickname: info.nickname }, 'viewer_playback_starting');
    await this.player.playStream(endpoint.host, endpoint.port);
  }

  private async teardown(): Promise<void> {
    this.running = false;
    await this.playback;
    try {
      await this.player.stop();
    } catch (error) {
      logger.error({ err: error }, 'player_stop_failed');
    }
    this.client.disconnect();
    await this.supervisor.stopAll(this.config.stopTimeoutMs);
    logger.info('viewer_session_stopped');
  }
}
