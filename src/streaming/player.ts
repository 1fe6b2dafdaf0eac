import { isSupervisorError } from '../errors.js';
import { logger, processLogger } from '../lib/logger.js';
import type { ProcessSupervisor } from '../lib/processSupervisor.js';
import { sleepWhile } from '../lib/timing.js';
import { playerCommand, srtCallerUrl, type PlayerRole } from './commands.js';

export interface MediaPlayerOptions {
  mpvPath: string;
  role: PlayerRole;
  retryIntervalMs?: number;
  stopTimeoutMs?: number;
  /** Fires when the player window exits on its own, not after stop(). */
  onClosed?: () => void;
}

export class MediaPlayer {
  readonly processName: string;
  private readonly retryIntervalMs: number;
  private readonly stopTimeoutMs: number;
  private retrying?: Promise<void>;
  private wanted = false;

  constructor(
    private readonly supervisor: ProcessSupervisor,
    private readonly options: MediaPlayerOptions,
  ) {
    this.processName = `player-${options.role}`;
    this.retryIntervalMs = options.retryIntervalMs ?? 3000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5000;
  }

  isRunning(): boolean {
    return this.supervisor.isRunning(this.processName);
  }

  /**
   * Plays a stream URL. With `retry`, launch failures are retried every
   * `retryIntervalMs` in the background until one succeeds or stop() is called.
   */
  async play(url: string, retry = false): Promise<boolean> {
    if (this.supervisor.info(this.processName)) {
      logger.warn({ process: this.processName }, 'player_already_playing');
      return true;
    }
    this.wanted = true;
    if (!retry) return this.launch(url);

    this.retrying ??= this.retryLaunch(url).finally(() => {
      this.retrying = undefined;
    });
    return true;
  }

  playStream(host: string, port: number): Promise<boolean> {
    return this.play(srtCallerUrl(host, port));
  }

  async stop(): Promise<void> {
    this.wanted = false;
    await this.retrying;
    try {
      await this.supervisor.stop(this.processName, this.stopTimeoutMs);
    } catch (error) {
      if (!isSupervisorError(error, 'NOT_FOUND')) throw error;
    }
  }

  private async retryLaunch(url: string): Promise<void> {
    let attempt = 0;
    logger.info({ url }, 'player_waiting_for_stream');
    while (this.wanted) {
      if (await this.launch(url)) return;
      attempt += 1;
      logger.info({ attempt, delayMs: this.retryIntervalMs }, 'player_retry_scheduled');
      if (!(await sleepWhile(this.retryIntervalMs, () => this.wanted))) {
        logger.info('player_retry_cancelled');
        return;
      }
    }
  }

  private async launch(url: string): Promise<boolean> {
    const output = processLogger(this.processName);
    try {
      await this.supervisor.start(this.processName, playerCommand(this.options.mpvPath, this.options.role, url), {
        onStdout: (line) => output.info(line),
        onStderr: (line) => output.warn(line),
        onExit: (code) => this.handleExit(code),
      });
    } catch (error) {
      logger.error({ err: error, process: this.processName }, 'player_launch_failed');
      return false;
    }
    logger.info({ process: this.processName, url }, 'player_started');
    return true;
  }

  private handleExit(code: number | null): void {
    if (!this.wanted) return;
    this.wanted = false;
    logger.info({ process: this.processName, code }, 'player_closed');
    this.options.onClosed?.();
  }
}
