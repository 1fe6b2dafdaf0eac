import type { Logger } from 'pino';
import { isSupervisorError } from '../errors.js';
import { logger, processLogger } from '../lib/logger.js';
import type { ProcessStats, ProcessSupervisor } from '../lib/processSupervisor.js';
import type { ViewerRelayLauncher } from '../types.js';
import { ingestCommand, rtmpStreamUrl, viewerRelayCommand } from './commands.js';

export interface RelayManagerOptions {
  ffmpegPath: string;
  rtmpPort: number;
  stopTimeoutMs?: number;
  /** Substitute for the per-process output logger. */
  outputLogger?: (processName: string) => Logger;
}

export const ingestProcessName = (srtPort: number): string => `ingest-${srtPort}`;
export const viewerRelayProcessName = (srtPort: number): string => `viewer-relay-${srtPort}`;

/**
 * Extracts fps, bitrate and time from an ffmpeg `-stats` progress line, e.g.
 * `frame=  240 fps= 30 q=-1.0 size=  1024kB time=00:00:08.00 bitrate=1048.6kbits/s`.
 * Returns undefined for any other line.
 */
export function parseProgressLine(line: string): ProcessStats | undefined {
  if (!line.includes('fps=')) return undefined;

  const stats: ProcessStats = {};
  const fps = valueAfter(line, 'fps=');
  if (fps !== undefined) {
    const parsed = Number.parseFloat(fps);
    if (Number.isFinite(parsed)) stats.fps = parsed;
  }
  const bitrate = valueAfter(line, 'bitrate=');
  if (bitrate !== undefined) stats.bitrate = bitrate;
  const time = valueAfter(line, 'time=');
  if (time !== undefined) stats.time = time;

  return Object.keys(stats).length > 0 ? stats : undefined;
}

function valueAfter(line: string, key: string): string | undefined {
  const index = line.indexOf(key);
  if (index < 0) return undefined;
  const value = line.slice(index + key.length).trimStart().split(/\s+/)[0];
  return value ? value : undefined;
}

type ErrorClass = 'connection' | 'invalid_data' | 'error' | 'ignored';

export function classifyErrorLine(line: string): ErrorClass {
  const lower = line.toLowerCase();
  if (!lower.includes('error') && !lower.includes('failed')) return 'ignored';
  if (line.includes('Connection refused') || line.includes('Connection reset')) return 'connection';
  if (line.includes('Invalid data')) return 'invalid_data';
  if (lower.includes('dimensions not set')) return 'ignored';
  return 'error';
}

/**
 * Runs the transcoder processes of a host session: one ingest relay that
 * restarts whenever the broadcaster's encoder drops, and one relay per viewer.
 */
export class RelayManager implements ViewerRelayLauncher {
  private readonly rtmpUrl: string;
  private readonly stopTimeoutMs: number;
  private readonly outputLogger: (processName: string) => Logger;
  private readonly viewerPorts = new Set<number>();

  constructor(
    private readonly supervisor: ProcessSupervisor,
    private readonly options: RelayManagerOptions,
  ) {
    this.rtmpUrl = rtmpStreamUrl(options.rtmpPort);
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5000;
    this.outputLogger = options.outputLogger ?? processLogger;
  }

  async startIngest(srtPort: number, bindAddress: string): Promise<string> {
    const name = ingestProcessName(srtPort);
    await this.launch(name, ingestCommand(this.options.ffmpegPath, srtPort, bindAddress, this.rtmpUrl), true);
    logger.info({ srtPort, rtmpUrl: this.rtmpUrl }, 'ingest_relay_started');
    return name;
  }

  async stopIngest(srtPort: number): Promise<void> {
    await this.stopQuietly(ingestProcessName(srtPort));
  }

  async startViewerRelay(srtPort: number, bindAddress: string): Promise<void> {
    const name = viewerRelayProcessName(srtPort);
    await this.launch(name, viewerRelayCommand(this.options.ffmpegPath, this.rtmpUrl, srtPort, bindAddress), false);
    this.viewerPorts.add(srtPort);
    logger.info({ srtPort }, 'viewer_relay_started');
  }

  async stopViewerRelay(srtPort: number): Promise<void> {
    this.viewerPorts.delete(srtPort);
    await this.stopQuietly(viewerRelayProcessName(srtPort));
  }

  async stopAllViewerRelays(): Promise<void> {
    const ports = [...this.viewerPorts];
    await Promise.all(ports.map((port) => this.stopViewerRelay(port)));
  }

  viewerRelayPorts(): number[] {
    return [...this.viewerPorts].sort((a, b) => a - b);
  }

  private async launch(name: string, command: string[], restartOnExit: boolean): Promise<void> {
    const output = this.outputLogger(name);
    await this.supervisor.start(name, command, {
      restartOnExit,
      onStdout: (line) => this.handleOutput(name, line, output),
      onStderr: (line) => this.handleError(name, line, output),
    });
  }

  private handleOutput(name: string, line: string, output: Logger): void {
    output.info(line);
    if (line.includes('Stream #')) {
      logger.debug({ process: name }, 'relay_stream_detected');
    }
    const stats = parseProgressLine(line);
    if (stats) this.supervisor.setStats(name, stats);
  }

  // ffmpeg writes progress and diagnostics to stderr alike
  private handleError(name: string, line: string, output: Logger): void {
    const stats = parseProgressLine(line);
    if (stats) {
      this.supervisor.setStats(name, stats);
      output.debug(line);
      return;
    }
    output.error(line);
    switch (classifyErrorLine(line)) {
      case 'connection':
        logger.error({ process: name, line }, 'relay_connection_failed');
        break;
      case 'invalid_data':
        logger.warn({ process: name, line }, 'relay_invalid_data');
        break;
      case 'error':
        logger.error({ process: name, line }, 'relay_error');
        break;
      case 'ignored':
        break;
    }
  }

  private async stopQuietly(name: string): Promise<void> {
    try {
      await this.supervisor.stop(name, this.stopTimeoutMs);
    } catch (error) {
      if (isSupervisorError(error, 'NOT_FOUND')) {
        logger.debug({ process: name }, 'relay_already_stopped');
        return;
      }
      throw error;
    }
  }
}
