import path from 'node:path';
import { SessionError, isSupervisorError } from '../errors.js';
import { logger, processLogger } from '../lib/logger.js';
import { isPortAvailable, type PortProbeOptions } from '../lib/ports.js';
import type { ProcessSupervisor } from '../lib/processSupervisor.js';
import { sleepWhile } from '../lib/timing.js';
import { rtmpStreamUrl, streamServerCommand } from './commands.js';

export const STREAM_SERVER_PROCESS = 'stream-server';

export interface StreamServerOptions {
  nginxPath: string;
  rtmpPort: number;
  /** How long the server must stay up after launch to count as started. */
  settleMs?: number;
  stopTimeoutMs?: number;
  /** How long restart() waits for the RTMP port to be released. */
  portReleaseTimeoutMs?: number;
  portProbe?: PortProbeOptions;
}

const PORT_POLL_MS = 100;

/** The local nginx-rtmp server carrying the intermediate distribution stream. */
export class StreamServer {
  private readonly settleMs: number;
  private readonly stopTimeoutMs: number;
  private readonly portReleaseTimeoutMs: number;

  constructor(
    private readonly supervisor: ProcessSupervisor,
    private readonly options: StreamServerOptions,
  ) {
    this.settleMs = options.settleMs ?? 1000;
    this.stopTimeoutMs = options.stopTimeoutMs ?? 5000;
    this.portReleaseTimeoutMs = options.portReleaseTimeoutMs ?? 2000;
  }

  get url(): string {
    return rtmpStreamUrl(this.options.rtmpPort);
  }

  isRunning(): boolean {
    return this.supervisor.isRunning(STREAM_SERVER_PROCESS);
  }

  async start(): Promise<void> {
    if (this.isRunning()) {
      logger.warn('stream_server_already_running');
      return;
    }
    const output = processLogger(STREAM_SERVER_PROCESS);
    try {
      await this.supervisor.start(STREAM_SERVER_PROCESS, streamServerCommand(this.options.nginxPath), {
        // nginx resolves conf/ and logs/ relative to its own directory
        cwd: path.dirname(path.resolve(this.options.nginxPath)),
        processTree: true,
        onStdout: (line) => output.info(line),
        onStderr: (line) => output.warn(line),
      });
    } catch (error) {
      throw new SessionError('PROCESS_LAUNCH_FAILED', 'stream server failed to launch', { cause: error });
    }

    await sleepWhile(this.settleMs, () => true);
    if (!this.isRunning()) {
      logger.error('stream_server_exited_early');
      throw new SessionError('PROCESS_LAUNCH_FAILED', 'stream server exited right after launch');
    }
    logger.info({ rtmpPort: this.options.rtmpPort }, 'stream_server_started');
  }

  async stop(): Promise<void> {
    try {
      await this.supervisor.stopTree(STREAM_SERVER_PROCESS, this.stopTimeoutMs);
      logger.info('stream_server_stopped');
    } catch (error) {
      if (!isSupervisorError(error, 'NOT_FOUND')) throw error;
    }
  }

  /** Stops the server if it runs, waits for its port to be freed, then starts it again. */
  async restart(): Promise<void> {
    logger.info('stream_server_restarting');
    if (this.supervisor.list().includes(STREAM_SERVER_PROCESS)) {
      await this.stop();
      if (!(await this.waitForPortRelease())) {
        logger.warn({ rtmpPort: this.options.rtmpPort }, 'stream_server_port_still_busy');
      }
    }
    await this.start();
  }

  private async waitForPortRelease(): Promise<boolean> {
    const deadline = Date.now() + this.portReleaseTimeoutMs;
    for (;;) {
      if (await isPortAvailable(this.options.rtmpPort, this.options.portProbe)) return true;
      if (Date.now() >= deadline) return false;
      await sleepWhile(PORT_POLL_MS, () => true);
    }
  }
}
