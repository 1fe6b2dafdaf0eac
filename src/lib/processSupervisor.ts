import { execFile, spawn, type ChildProcess } from 'node:child_process';
import { readFileSync } from 'node:fs';
import readline from 'node:readline';
import type { Readable } from 'node:stream';
import { promisify } from 'node:util';
import pidusage from 'pidusage';
import { SupervisorError } from '../errors.js';
import { logger } from './logger.js';
import { settlesWithin, sleepWhile } from './timing.js';

const execFileAsync = promisify(execFile);

const DEFAULT_RESTART_DELAY_MS = 3000;
const DEFAULT_STOP_TIMEOUT_MS = 5000;
const KILL_GRACE_MS = 2000;
const READER_DRAIN_MS = 1000;
const TREE_POLL_MS = 100;

export type LineCallback = (line: string) => void;

export interface StartOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  onStdout?: LineCallback;
  onStderr?: LineCallback;
  /** Called after every exit, including ones followed by a restart. */
  onExit?: (code: number | null, signal: NodeJS.Signals | null) => void;
  restartOnExit?: boolean;
  /** The program forks helpers; stopAll terminates it with stopTree. */
  processTree?: boolean;
}

export type ProcessStats = Record<string, string | number>;

export interface ProcessInfo {
  name: string;
  pid?: number;
  command: string[];
  running: boolean;
  startedAt?: number;
  uptimeMs?: number;
  restarts: number;
  lastExitCode: number | null;
  stats?: ProcessStats;
}

/** Resource use of a live child, sampled on demand. */
export interface ProcessUsage {
  pid: number;
  cpuPercent: number;
  memoryBytes: number;
  elapsedMs: number;
  /** Linux only, from /proc/<pid>/status. */
  status?: string;
  threads?: number;
}

export interface SupervisorOptions {
  restartDelayMs?: number;
}

interface ExitResult {
  code: number | null;
  signal: NodeJS.Signals | null;
}

interface ProcessRun {
  child: ChildProcess;
  startedAt: number;
  exited: Promise<ExitResult>;
  monitor: Promise<void>;
}

interface ManagedProcess {
  name: string;
  command: string[];
  options: StartOptions;
  run?: ProcessRun;
  restarts: number;
  lastExitCode: number | null;
  stats?: ProcessStats;
  stopping: boolean;
  /** Set while a restart is spawning the next run. */
  relaunch?: Promise<void>;
}

function isChildAlive(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

/** Zombies count as dead: they hold no resources but a process-table slot. */
export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch (error) {
    return error instanceof Error && 'code' in error && error.code === 'EPERM';
  }
  if (process.platform !== 'linux') return true;
  try {
    const stat = readFileSync(`/proc/${pid}/stat`, 'utf8');
    const state = stat.slice(stat.lastIndexOf(')') + 2, stat.lastIndexOf(')') + 3);
    return state !== 'Z' && state !== 'X';
  } catch {
    return false;
  }
}

function procStatus(pid: number): Pick<ProcessUsage, 'status' | 'threads'> {
  if (process.platform !== 'linux') return {};
  try {
    const text = readFileSync(`/proc/${pid}/status`, 'utf8');
    const field = (key: string) => text.match(new RegExp(`^${key}:\\s*(.+)$`, 'm'))?.[1]?.trim();
    const threads = Number(field('Threads'));
    return {
      status: field('State'),
      threads: Number.isInteger(threads) ? threads : undefined,
    };
  } catch {
    return {};
  }
}

function signalPid(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(pid, signal);
  } catch (error) {
    logger.debug({ err: error, pid, signal }, 'process_signal_failed');
  }
}

function procChildren(pid: number): number[] | undefined {
  try {
    const text = readFileSync(`/proc/${pid}/task/${pid}/children`, 'utf8').trim();
    return text ? text.split(/\s+/).map(Number).filter(Number.isInteger) : [];
  } catch {
    return undefined;
  }
}

async function psChildrenTable(): Promise<Map<number, number[]>> {
  const childrenOf = new Map<number, number[]>();
  const { stdout } = await execFileAsync('ps', ['-A', '-o', 'pid=,ppid=']);
  for (const line of stdout.split('\n')) {
    const [pidText, ppidText] = line.trim().split(/\s+/);
    const pid = Number(pidText);
    const ppid = Number(ppidText);
    if (!Number.isInteger(pid) || !Number.isInteger(ppid)) continue;
    const siblings = childrenOf.get(ppid) ?? [];
    siblings.push(pid);
    childrenOf.set(ppid, siblings);
  }
  return childrenOf;
}

/**
 * All descendants of `rootPid`, children before grandchildren. Walks /proc
 * on Linux and falls back to `ps` where /proc has no children lists.
 */
export async function listDescendants(rootPid: number): Promise<number[]> {
  let childrenOf: (pid: number) => number[];
  if (process.platform === 'linux' && procChildren(rootPid) !== undefined) {
    childrenOf = (pid) => procChildren(pid) ?? [];
  } else {
    try {
      const table = await psChildrenTable();
      childrenOf = (pid) => table.get(pid) ?? [];
    } catch (error) {
      logger.warn({ err: error, pid: rootPid }, 'process_tree_listing_failed');
      return [];
    }
  }

  const result: number[] = [];
  const queue = [rootPid];
  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const child of childrenOf(current)) {
      if (child !== rootPid && !result.includes(child)) {
        result.push(child);
        queue.push(child);
      }
    }
  }
  return result;
}

async function pumpLines(stream: Readable | null, callback: LineCallback | undefined, name: string): Promise<void> {
  if (!stream || !callback) return;
  const lines = readline.createInterface({ input: stream, crlfDelay: Infinity });
  try {
    for await (const raw of lines) {
      const line = raw.trimEnd();
      if (!line) continue;
      try {
        callback(line);
      } catch (error) {
        logger.warn({ err: error, process: name }, 'process_output_callback_failed');
      }
    }
  } catch (error) {
    logger.debug({ err: error, process: name }, 'process_output_read_failed');
  } finally {
    lines.close();
  }
}

/**
 * Owns the external programs of one session. Each tracked name has at most
 * one live child; each child gets one monitor task that drains its output,
 * observes its exit and applies the restart policy.
 */
export class ProcessSupervisor {
  private readonly processes = new Map<string, ManagedProcess>();
  private readonly monitors = new Set<Promise<void>>();
  private readonly restartDelayMs: number;
  private shuttingDown = false;

  constructor(options: SupervisorOptions = {}) {
    this.restartDelayMs = options.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;
  }

  async start(name: string, command: string[], options: StartOptions = {}): Promise<void> {
    if (this.shuttingDown) {
      throw new SupervisorError('LAUNCH_FAILED', name, { cause: new Error('supervisor is shut down') });
    }
    if (this.processes.has(name)) {
      logger.warn({ process: name }, 'process_already_running');
      throw new SupervisorError('ALREADY_RUNNING', name);
    }
    if (command.length === 0) {
      throw new SupervisorError('LAUNCH_FAILED', name, { cause: new Error('empty command') });
    }

    const record: ManagedProcess = {
      name,
      command: [...command],
      options,
      restarts: 0,
      lastExitCode: null,
      stopping: false,
    };
    this.processes.set(name, record);

    try {
      await this.launch(record);
    } catch (error) {
      if (this.processes.get(name) === record) {
        this.processes.delete(name);
      }
      logger.error({ err: error, process: name, command }, 'process_launch_failed');
      throw new SupervisorError('LAUNCH_FAILED', name, { cause: error });
    }
  }

  async stop(name: string, timeoutMs = DEFAULT_STOP_TIMEOUT_MS): Promise<void> {
    const record = this.requireRecord(name);
    record.stopping = true;
    await this.settleRelaunch(record);
    try {
      const run = record.run;
      if (run && isChildAlive(run.child)) {
        run.child.kill('SIGTERM');
        if (!(await settlesWithin(run.exited, timeoutMs))) {
          logger.warn({ process: name, pid: run.child.pid }, 'process_kill_forced');
          run.child.kill('SIGKILL');
          await settlesWithin(run.exited, KILL_GRACE_MS);
        }
      }
      if (run) await run.monitor;
      logger.debug({ process: name }, 'process_stopped');
    } finally {
      this.forget(record);
    }
  }

  async stopTree(name: string, timeoutMs = DEFAULT_STOP_TIMEOUT_MS): Promise<void> {
    const record = this.requireRecord(name);
    record.stopping = true;
    await this.settleRelaunch(record);
    try {
      const run = record.run;
      const rootPid = run?.child.pid;
      if (run && rootPid !== undefined && isChildAlive(run.child)) {
        if (process.platform === 'win32') {
          await this.stopWindowsTree(rootPid, run, timeoutMs);
        } else {
          await this.stopPosixTree(rootPid, timeoutMs);
        }
        await settlesWithin(run.exited, KILL_GRACE_MS);
      }
      if (run) await run.monitor;
      logger.debug({ process: name }, 'process_tree_stopped');
    } finally {
      this.forget(record);
    }
  }

  isRunning(name: string): boolean {
    const run = this.processes.get(name)?.run;
    return run !== undefined && isChildAlive(run.child);
  }

  list(): string[] {
    return Array.from(this.processes.keys());
  }

  info(name: string): ProcessInfo | undefined {
    const record = this.processes.get(name);
    if (!record) return undefined;
    const run = record.run;
    return {
      name,
      pid: run?.child.pid,
      command: [...record.command],
      running: run !== undefined && isChildAlive(run.child),
      startedAt: run?.startedAt,
      uptimeMs: run ? Date.now() - run.startedAt : undefined,
      restarts: record.restarts,
      lastExitCode: record.lastExitCode,
      stats: record.stats,
    };
  }

  /** CPU and memory of a running program; undefined once it has exited. */
  async usage(name: string): Promise<ProcessUsage | undefined> {
    const run = this.processes.get(name)?.run;
    const pid = run?.child.pid;
    if (!run || pid === undefined || !isChildAlive(run.child)) return undefined;
    try {
      const sample = await pidusage(pid);
      return {
        pid,
        cpuPercent: sample.cpu,
        memoryBytes: sample.memory,
        elapsedMs: sample.elapsed,
        ...procStatus(pid),
      };
    } catch (error) {
      logger.debug({ err: error, process: name, pid }, 'process_usage_unavailable');
      return undefined;
    }
  }

  setStats(name: string, stats: ProcessStats): void {
    const record = this.processes.get(name);
    if (record) record.stats = stats;
  }

  /**
   * Stops every tracked program and resolves once every monitor task has
   * finished. No restart happens after this is called.
   */
  async stopAll(timeoutMs = DEFAULT_STOP_TIMEOUT_MS): Promise<void> {
    this.shuttingDown = true;
    const names = this.list();
    const results = await Promise.allSettled(
      names.map((name) => {
        const record = this.processes.get(name);
        return record?.options.processTree ? this.stopTree(name, timeoutMs) : this.stop(name, timeoutMs);
      }),
    );
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.error({ err: result.reason, process: names[index] }, 'process_stop_failed');
      }
    });

    while (this.monitors.size > 0) {
      await Promise.allSettled(Array.from(this.monitors));
    }
    pidusage.clear();
    logger.debug({ count: names.length }, 'supervisor_stopped');
  }

  private requireRecord(name: string): ManagedProcess {
    const record = this.processes.get(name);
    if (!record) {
      logger.warn({ process: name }, 'process_not_found');
      throw new SupervisorError('NOT_FOUND', name);
    }
    return record;
  }

  private async settleRelaunch(record: ManagedProcess): Promise<void> {
    if (!record.relaunch) return;
    try {
      await record.relaunch;
    } catch (error) {
      logger.debug({ err: error, process: record.name }, 'process_relaunch_interrupted');
    }
  }

  private forget(record: ManagedProcess): void {
    if (this.processes.get(record.name) === record) {
      this.processes.delete(record.name);
    }
  }

  private launch(record: ManagedProcess): Promise<void> {
    const { onStdout, onStderr, cwd, env } = record.options;
    const [file, ...args] = record.command;
    if (file === undefined) {
      return Promise.reject(new Error('empty command'));
    }

    return new Promise<void>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(file, args, {
          cwd,
          env: env ?? process.env,
          stdio: ['ignore', onStdout ? 'pipe' : 'ignore', onStderr ? 'pipe' : 'ignore'],
          windowsHide: true,
        });
      } catch (error) {
        reject(error);
        return;
      }

      const exited = new Promise<ExitResult>((resolveExit) => {
        child.once('exit', (code, signal) => resolveExit({ code, signal }));
      });

      const onError = (error: Error) => {
        child.removeListener('spawn', onSpawn);
        reject(error);
      };
      const onSpawn = () => {
        child.removeListener('error', onError);
        child.on('error', (error) => {
          logger.error({ err: error, process: record.name }, 'process_error');
        });
        const run: ProcessRun = {
          child,
          startedAt: Date.now(),
          exited,
          monitor: Promise.resolve(),
        };
        record.run = run;
        run.monitor = this.track(this.monitor(record, run));
        logger.debug({ process: record.name, pid: child.pid }, 'process_started');
        resolve();
      };

      child.once('error', onError);
      child.once('spawn', onSpawn);
    });
  }

  private track(task: Promise<void>): Promise<void> {
    const tracked = task.finally(() => {
      this.monitors.delete(tracked);
    });
    this.monitors.add(tracked);
    return tracked;
  }

  private async monitor(record: ManagedProcess, run: ProcessRun): Promise<void> {
    const { child } = run;
    const readers = Promise.all([
      pumpLines(child.stdout, record.options.onStdout, record.name),
      pumpLines(child.stderr, record.options.onStderr, record.name),
    ]);

    const { code, signal } = await run.exited;
    if (!(await settlesWithin(readers, READER_DRAIN_MS))) {
      // A forked helper still holds the pipes open.
      child.stdout?.destroy();
      child.stderr?.destroy();
      await readers;
    }

    record.lastExitCode = code;
    if (record.run === run) record.run = undefined;

    if (record.stopping) {
      logger.debug({ process: record.name, code, signal }, 'process_exited_on_stop');
    } else if (code !== 0) {
      logger.warn({ process: record.name, code, signal }, 'process_exited_abnormally');
    } else {
      logger.debug({ process: record.name }, 'process_exited');
    }

    try {
      record.options.onExit?.(code, signal);
    } catch (error) {
      logger.warn({ err: error, process: record.name }, 'process_exit_callback_failed');
    }

    if (record.stopping) return;

    if (!record.options.restartOnExit || this.shuttingDown) {
      this.forget(record);
      return;
    }

    await this.restart(record);
  }

  private async restart(record: ManagedProcess): Promise<void> {
    const stillWanted = () =>
      !this.shuttingDown && !record.stopping && this.processes.get(record.name) === record;

    logger.info({ process: record.name, delayMs: this.restartDelayMs }, 'process_restart_scheduled');
    if (!(await sleepWhile(this.restartDelayMs, stillWanted))) {
      logger.debug({ process: record.name }, 'process_restart_cancelled');
      return;
    }

    try {
      record.restarts += 1;
      record.relaunch = this.launch(record);
      await record.relaunch;
      if (!stillWanted()) {
        // stop() or stopAll() ran while the relaunch was in flight
        record.stopping = true;
        record.run?.child.kill('SIGKILL');
        this.forget(record);
        return;
      }
      logger.info({ process: record.name, restarts: record.restarts }, 'process_restarted');
    } catch (error) {
      logger.error({ err: error, process: record.name }, 'process_restart_failed');
      this.forget(record);
    } finally {
      record.relaunch = undefined;
    }
  }

  private async stopPosixTree(rootPid: number, timeoutMs: number): Promise<void> {
    const descendants = await listDescendants(rootPid);
    for (const pid of descendants) signalPid(pid, 'SIGTERM');
    signalPid(rootPid, 'SIGTERM');

    const pids = [rootPid, ...descendants];
    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline && pids.some(isPidAlive)) {
      await sleepWhile(TREE_POLL_MS, () => true);
    }

    const survivors = pids.filter(isPidAlive);
    if (survivors.length > 0) {
      logger.warn({ pids: survivors }, 'process_tree_kill_forced');
      for (const pid of survivors) signalPid(pid, 'SIGKILL');
    }
  }

  private async stopWindowsTree(rootPid: number, run: ProcessRun, timeoutMs: number): Promise<void> {
    const taskkill = async (force: boolean) => {
      const args = ['/pid', String(rootPid), '/T', ...(force ? ['/F'] : [])];
      try {
        await execFileAsync('taskkill', args, { windowsHide: true });
      } catch (error) {
        logger.debug({ err: error, pid: rootPid, force }, 'taskkill_failed');
      }
    };

    await taskkill(false);
    if (!(await settlesWithin(run.exited, timeoutMs))) {
      await taskkill(true);
    }
  }
}
