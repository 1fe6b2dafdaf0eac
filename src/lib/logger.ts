import path from 'node:path';
import pino, { type DestinationStream, type LevelWithSilent, type Logger } from 'pino';
import { config } from '../config.js';

type FileDestination = ReturnType<typeof pino.destination>;

const rootDestination = pino.destination(1);

export const logger = pino(
  {
    level: config.logLevel,
    base: { role: config.role },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  rootDestination,
);

export interface ProcessLogsOptions {
  root: Logger;
  rootStream: DestinationStream;
  level: LevelWithSilent;
  dir?: string;
  sync?: boolean;
}

/**
 * Loggers for supervised programs' raw output, one per process name. Lines
 * always reach the root logger's stream (at its level); with a directory set
 * they are also written to `<dir>/<name>.log`, whatever the root level.
 */
export class ProcessLogs {
  private readonly loggers = new Map<string, Logger>();
  private readonly files = new Map<string, FileDestination>();

  constructor(private readonly options: ProcessLogsOptions) {}

  get(name: string): Logger {
    const cached = this.loggers.get(name);
    if (cached) return cached;

    const created = this.create(name);
    this.loggers.set(name, created);
    return created;
  }

  get openFiles(): number {
    return this.files.size;
  }

  /** Flushes and closes every log file; later get() calls reopen them. */
  async close(): Promise<void> {
    const files = [...this.files.values()];
    this.files.clear();
    this.loggers.clear();
    await Promise.all(files.map((file) => closeDestination(file)));
  }

  private create(name: string): Logger {
    const { root, rootStream, level, dir } = this.options;
    if (!dir) {
      return root.child({ process: name });
    }

    const file = pino.destination({
      dest: path.join(dir, `${name}.log`),
      mkdir: true,
      sync: this.options.sync ?? false,
    });
    this.files.set(name, file);

    const streams: pino.StreamEntry[] = [{ level: 'debug', stream: file }];
    if (level !== 'silent') {
      streams.push({ level, stream: rootStream });
    }
    return pino(
      {
        level: level === 'trace' ? 'trace' : 'debug',
        base: { role: config.role, process: name },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.multistream(streams),
    );
  }
}

function closeDestination(file: FileDestination): Promise<void> {
  return new Promise((resolve) => {
    file.once('close', () => resolve());
    file.once('error', (error: Error) => {
      logger.warn({ err: error }, 'process_log_close_failed');
      resolve();
    });
    file.end();
  });
}

export const processLogs = new ProcessLogs({
  root: logger,
  rootStream: rootDestination,
  level: config.logLevel,
  dir: config.processLogDir,
});

export function processLogger(name: string): Logger {
  return processLogs.get(name);
}
