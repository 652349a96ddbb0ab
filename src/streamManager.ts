import path from 'path';
import PQueue from 'p-queue';
import { INFINITE_LOOP, isValidLoopCount, StreamRecord, StreamResult, StreamSnapshot } from './models/streamState';
import type { ProcessExit, StreamProcess, StreamRunner } from './services/processRunner';
import {
  formatError,
  InvalidRequestError,
  NamingCollisionError,
  NotFoundError,
  ProcessCrashError,
  ProcessSpawnError,
  SupervisorError,
} from './utils/errors';
import { LOG } from './utils/logger';
import { sanitizeStreamName } from './utils/streamName';

export interface StreamManagerOptions {
  runner: StreamRunner;
  stopGraceMs?: number;
  /** Relaunch a stream whose encoder crashed. Off by default: crashes are reported and the stream stays stopped */
  restartOnCrash?: boolean;
  restartDelayMs?: number;
}

const describeExit = (exit: ProcessExit): string => {
  const cause = exit.signal ? `killed by ${exit.signal}` : `exit code ${exit.code}`;
  return exit.lastOutput ? `${cause} (${exit.lastOutput})` : cause;
};

const toResultError = (error: unknown): NonNullable<StreamResult['error']> => ({
  kind: error instanceof SupervisorError ? error.kind : 'Unknown',
  message: formatError(error),
});

/**
 * Single source of truth for stream state. Every operation on an id runs through that id's
 * FIFO queue, so operations on one stream apply in the order they were accepted while
 * different streams proceed independently.
 */
export class StreamManager {
  private readonly records: Map<string, StreamRecord> = new Map();
  private readonly queues: Map<string, PQueue> = new Map();
  private readonly restartTimers: Map<string, NodeJS.Timeout> = new Map();
  private readonly runner: StreamRunner;
  private readonly stopGraceMs: number | undefined;
  private readonly restartOnCrash: boolean;
  private readonly restartDelayMs: number;

  constructor(options: StreamManagerOptions) {
    this.runner = options.runner;
    this.stopGraceMs = options.stopGraceMs;
    this.restartOnCrash = options.restartOnCrash ?? false;
    this.restartDelayMs = options.restartDelayMs ?? 2000;
  }

  /**
   * Registers the file as a stopped stream. Re-registering the same file is a no-op;
   * a different file with the same id is rejected and the first mapping kept.
   */
  upsert(sourcePath: string): Promise<StreamSnapshot> {
    const absolutePath = path.resolve(sourcePath);
    const id = sanitizeStreamName(absolutePath);

    return this.serialize(id, async () => {
      const existing = this.records.get(id);
      if (existing) {
        if (existing.sourcePath === absolutePath) {
          return this.snapshot(existing);
        }
        throw new NamingCollisionError(id, existing.sourcePath, absolutePath);
      }

      const record: StreamRecord = { id, sourcePath: absolutePath, status: 'stopped', loopCount: INFINITE_LOOP };
      this.records.set(id, record);
      LOG.info(`Stream registered: ${id} (${path.basename(absolutePath)})`);
      return this.snapshot(record);
    });
  }

  /**
   * Stops the stream backed by this file, if any, and forgets it. Resolves once the encoder has exited.
   * Returns false when the path does not own a registered stream.
   */
  remove(sourcePath: string): Promise<boolean> {
    const absolutePath = path.resolve(sourcePath);
    const id = sanitizeStreamName(absolutePath);

    return this.serialize(id, async () => {
      const record = this.records.get(id);
      if (!record || record.sourcePath !== absolutePath) {
        return false;
      }

      await this.halt(record);
      this.records.delete(id);
      LOG.info(`Stream removed: ${id}`);
      return true;
    });
  }

  /**
   * Launches the stream's encoder. Already running streams are left untouched.
   * Without a loop count the last one requested for the stream is reused.
   */
  async start(id: string, loopCount?: number): Promise<StreamSnapshot> {
    if (loopCount !== undefined && !isValidLoopCount(loopCount)) {
      throw new InvalidRequestError(`Invalid loop count: ${loopCount}`, id);
    }

    return this.serialize(id, async () => {
      const record = this.require(id);
      if (record.status === 'running' && record.process?.isAlive()) {
        return this.snapshot(record);
      }

      this.markStopped(record);
      await this.launch(record, loopCount ?? record.loopCount);
      return this.snapshot(record);
    });
  }

  stop(id: string): Promise<StreamSnapshot> {
    return this.serialize(id, async () => {
      const record = this.require(id);
      await this.halt(record);
      return this.snapshot(record);
    });
  }

  startAll(loopCount?: number): Promise<StreamResult[]> {
    return this.applyToAll(id => this.start(id, loopCount));
  }

  stopAll(): Promise<StreamResult[]> {
    return this.applyToAll(id => this.stop(id));
  }

  /**
   * Marks every running stream whose encoder is gone as stopped. Returns the ids corrected.
   */
  async reconcile(): Promise<string[]> {
    const candidates = [...this.records.values()]
      .filter(record => record.status === 'running' && !record.process?.isAlive())
      .map(record => record.id);

    const corrected = await Promise.all(candidates.map(id => this.serialize(id, async () => {
      const record = this.records.get(id);
      if (!record || record.status !== 'running' || record.process?.isAlive()) {
        return undefined;
      }
      LOG.forStream(id).warn('Encoder no longer running, marking stream stopped');
      this.markStopped(record);
      return id;
    })));

    return corrected.filter((id): id is string => id !== undefined);
  }

  get(id: string): StreamSnapshot {
    return this.snapshot(this.require(id));
  }

  list(): StreamSnapshot[] {
    return [...this.records.values()]
      .sort((a, b) => a.id.localeCompare(b.id))
      .map(record => this.snapshot(record));
  }

  /**
   * Stops every stream and cancels pending restarts.
   */
  async shutdown(): Promise<StreamResult[]> {
    for (const timer of this.restartTimers.values()) {
      clearTimeout(timer);
    }
    this.restartTimers.clear();
    return this.stopAll();
  }

  private serialize<T>(id: string, task: () => Promise<T>): Promise<T> {
    let queue = this.queues.get(id);
    if (!queue) {
      const created = new PQueue({ concurrency: 1 });
      created.on('idle', () => {
        if (!this.records.has(id) && this.queues.get(id) === created) {
          this.queues.delete(id);
        }
      });
      this.queues.set(id, created);
      queue = created;
    }
    return queue.add(task, { throwOnTimeout: true });
  }

  private require(id: string): StreamRecord {
    const record = this.records.get(id);
    if (!record) {
      throw new NotFoundError(id);
    }
    return record;
  }

  private async launch(record: StreamRecord, loopCount: number): Promise<void> {
    const log = LOG.forStream(record.id);
    record.loopCount = loopCount;

    let handle: StreamProcess;
    try {
      handle = this.runner.start({ id: record.id, sourcePath: record.sourcePath, loopCount });
      await handle.spawned;
    } catch (error) {
      const failure = error instanceof SupervisorError ? error : new ProcessSpawnError(record.id, formatError(error));
      this.markStopped(record);
      record.lastError = failure.message;
      log.error(failure.message);
      throw failure;
    }

    record.status = 'running';
    record.process = handle;
    record.startedAt = new Date();
    record.lastError = undefined;
    handle.onExit(exit => {
      this.handleExit(record.id, handle, exit).catch(error => {
        log.error(`Failed to handle encoder exit: ${formatError(error)}`);
      });
    });
    log.info(`Now playing (loop: ${loopCount}, pid: ${handle.pid})`);
  }

  private async halt(record: StreamRecord): Promise<void> {
    this.cancelRestart(record.id);
    const handle = record.process;
    if (handle) {
      await this.runner.stop(handle, this.stopGraceMs);
      LOG.forStream(record.id).info('Stopped stream');
    }
    this.markStopped(record);
  }

  private markStopped(record: StreamRecord): void {
    record.status = 'stopped';
    record.process = undefined;
    record.startedAt = undefined;
  }

  private handleExit(id: string, handle: StreamProcess, exit: ProcessExit): Promise<void> {
    return this.serialize(id, async () => {
      const record = this.records.get(id);
      // A stop or restart already took ownership of this exit
      if (!record || record.process !== handle) return;

      this.markStopped(record);
      if (exit.requested) return;

      const log = LOG.forStream(id);
      const crashed = exit.code !== 0 || record.loopCount === INFINITE_LOOP;
      if (!crashed) {
        log.info(`Playback finished after ${record.loopCount + 1} playthrough(s)`);
        return;
      }

      const crash = new ProcessCrashError(id, describeExit(exit));
      record.lastError = crash.message;
      log.error(crash.message);

      if (this.restartOnCrash) {
        this.scheduleRestart(id);
      }
    });
  }

  private scheduleRestart(id: string): void {
    this.cancelRestart(id);
    LOG.forStream(id).warn(`Restarting in ${this.restartDelayMs}ms`);
    const timer = setTimeout(() => {
      this.restartTimers.delete(id);
      this.start(id).catch(error => {
        LOG.forStream(id).error(`Restart failed: ${formatError(error)}`);
      });
    }, this.restartDelayMs);
    this.restartTimers.set(id, timer);
  }

  private cancelRestart(id: string): void {
    const timer = this.restartTimers.get(id);
    if (timer) {
      clearTimeout(timer);
      this.restartTimers.delete(id);
    }
  }

  private async applyToAll(operation: (id: string) => Promise<StreamSnapshot>): Promise<StreamResult[]> {
    const ids = [...this.records.keys()].sort((a, b) => a.localeCompare(b));
    return Promise.all(ids.map(async (id): Promise<StreamResult> => {
      try {
        const snapshot = await operation(id);
        return { id, success: true, status: snapshot.status };
      } catch (error) {
        return { id, success: false, error: toResultError(error) };
      }
    }));
  }

  private snapshot(record: StreamRecord): StreamSnapshot {
    return {
      id: record.id,
      sourcePath: record.sourcePath,
      status: record.status,
      loopCount: record.loopCount,
      pid: record.process?.pid,
      startedAt: record.startedAt?.toISOString(),
      lastError: record.lastError,
    };
  }
}
