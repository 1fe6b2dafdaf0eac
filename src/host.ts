import type { Server } from 'node:http';
import type { AppConfig } from './config.js';
import { logger } from './lib/logger.js';
import { formatHostForUrl, getLocalIp, isWildcardAddress } from './lib/network.js';
import { ProcessSupervisor } from './lib/processSupervisor.js';
import { MediaPlayer } from './streaming/player.js';
import { RelayManager } from './streaming/relays.js';
import { StreamServer } from './streaming/streamServer.js';
import type { CoordinatorObserver } from './types.js';
import { SessionCoordinator } from './ws/coordinator.js';

export type HostConfig = Pick<
  AppConfig,
  | 'bindAddress'
  | 'wsPort'
  | 'srtInputPort'
  | 'rtmpPort'
  | 'srtBasePort'
  | 'portProbeAttempts'
  | 'portProbe'
  | 'verificationCode'
  | 'nickname'
  | 'pingIntervalMs'
  | 'restartDelayMs'
  | 'stopTimeoutMs'
  | 'enableLocalPlay'
  | 'programs'
>;

/**
 * Everything the host runs: stream server, ingest relay, signaling
 * coordinator (which starts one relay per viewer) and the optional local
 * player. stop() tears them down in reverse order.
 */
export class HostSession {
  readonly supervisor: ProcessSupervisor;
  readonly coordinator: SessionCoordinator;
  private readonly relays: RelayManager;
  private readonly streamServer: StreamServer;
  private readonly player?: MediaPlayer;
  private stopping?: Promise<void>;

  constructor(
    private readonly config: HostConfig,
    observer: CoordinatorObserver = {},
  ) {
    this.supervisor = new ProcessSupervisor({ restartDelayMs: config.restartDelayMs });
    this.streamServer = new StreamServer(this.supervisor, {
      nginxPath: config.programs.nginx,
      rtmpPort: config.rtmpPort,
      stopTimeoutMs: config.stopTimeoutMs,
      portProbe: config.portProbe,
    });
    this.relays = new RelayManager(this.supervisor, {
      ffmpegPath: config.programs.ffmpeg,
      rtmpPort: config.rtmpPort,
      stopTimeoutMs: config.stopTimeoutMs,
    });
    this.coordinator = new SessionCoordinator({
      verificationCode: config.verificationCode,
      hostNickname: config.nickname,
      relays: this.relays,
      bindAddress: config.bindAddress,
      srtBasePort: config.srtBasePort,
      portProbeAttempts: config.portProbeAttempts,
      portProbe: config.portProbe,
      pingIntervalMs: config.pingIntervalMs,
      observer,
    });
    if (config.enableLocalPlay) {
      this.player = new MediaPlayer(this.supervisor, {
        mpvPath: config.programs.mpv,
        role: 'sender',
        stopTimeoutMs: config.stopTimeoutMs,
        onClosed: () => logger.info('local_player_closed'),
      });
    }
  }

  async start(httpServer: Server): Promise<void> {
    try {
      await this.streamServer.start();
      await this.relays.startIngest(this.config.srtInputPort, this.config.bindAddress);
      this.coordinator.attach(httpServer);
    } catch (error) {
      await this.stop();
      throw error;
    }

    if (this.player) {
      await this.player.play(this.streamServer.url, true);
    }

    const shareHost = isWildcardAddress(this.config.bindAddress) ? getLocalIp() : this.config.bindAddress;
    logger.info(
      {
        host: this.config.nickname,
        signaling: `ws://${formatHostForUrl(shareHost)}:${this.config.wsPort}/ws`,
        ingest: `srt://${formatHostForUrl(shareHost)}:${this.config.srtInputPort}`,
      },
      'host_session_started',
    );
  }

  /** Idempotent. Resolves once every spawned program has exited. */
  stop(): Promise<void> {
    this.stopping ??= this.teardown();
    return this.stopping;
  }

  private async teardown(): Promise<void> {
    const steps: Array<[string, () => Promise<void>]> = [
      ['player', async () => this.player?.stop()],
      ['coordinator', () => this.coordinator.stop()],
      ['ingest', () => this.relays.stopIngest(this.config.srtInputPort)],
      ['stream_server', () => this.streamServer.stop()],
    ];
    for (const [step, run] of steps) {
      try {
        await run();
      } catch (error) {
        logger.error({ err: error, step }, 'host_teardown_step_failed');
      }
    }
    await this.supervisor.stopAll(this.config.stopTimeoutMs);
    logger.info('host_session_stopped');
  }
}
