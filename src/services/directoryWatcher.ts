import { FSWatcher, watch } from 'chokidar';
import fs from 'fs/promises';
import path from 'path';
import PQueue from 'p-queue';

import { formatError, WatcherError } from '../utils/errors';
import { LOG } from '../utils/logger';

export type WatchEvent =
  | { kind: 'created'; path: string }
  | { kind: 'removed'; path: string };

/** A write to a file. It only pushes back an event still waiting out its debounce window */
export type FileEvent = WatchEvent | { kind: 'changed'; path: string };

export interface WatchStartOptions {
  /** Keep dispatched events queued until `resume` is called */
  holdEvents?: boolean;
}

export interface DirectoryWatcherOptions {
  directory: string;
  extensions: string[];
  /** Window during which events for one path are merged, last one wins */
  debounceMs: number;
  usePolling?: boolean;
  pollIntervalMs?: number;
}

export interface DirectoryWatcherHandlers {
  onCreated: (filePath: string) => Promise<void>;
  onRemoved: (filePath: string) => Promise<void>;
  onError: (error: WatcherError) => void;
}

export class DirectoryWatcher {
  private watcher: FSWatcher | null = null;
  private queue = new PQueue({ concurrency: 1 });
  private pending: Map<string, { event: WatchEvent; timer: NodeJS.Timeout }> = new Map();
  private readonly directory: string;
  private readonly extensions: Set<string>;

  constructor(
    private readonly options: DirectoryWatcherOptions,
    private readonly handlers: DirectoryWatcherHandlers,
  ) {
    this.directory = path.resolve(options.directory);
    this.extensions = new Set(options.extensions.map(ext => ext.toLowerCase()));
  }

  isVideoFile(filePath: string): boolean {
    const name = path.basename(filePath);
    if (name.startsWith('.')) return false;
    return this.extensions.has(path.extname(name).toLowerCase());
  }

  /**
   * Lists the video files currently in the directory (non-recursive), sorted by name
   */
  async scan(): Promise<string[]> {
    const entries = await fs.readdir(this.directory, { withFileTypes: true }).catch((error: unknown) => {
      throw new WatcherError(this.directory, formatError(error));
    });

    return entries
      .filter(entry => entry.isFile() && this.isVideoFile(entry.name))
      .map(entry => path.join(this.directory, entry.name))
      .sort((a, b) => a.localeCompare(b));
  }

  /**
   * Subscribes to file creation, writes and removal. Resolves once the watch is established.
   */
  async start(options: WatchStartOptions = {}): Promise<void> {
    try {
      const stats = await fs.stat(this.directory);
      if (!stats.isDirectory()) {
        throw new Error('not a directory');
      }
    } catch (error) {
      throw new WatcherError(this.directory, formatError(error));
    }

    if (options.holdEvents) {
      this.queue.pause();
    }

    const watcher = watch(this.directory, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
      usePolling: this.options.usePolling ?? false,
      interval: this.options.pollIntervalMs,
    });
    this.watcher = watcher;

    await new Promise<void>((resolve, reject) => {
      const onStartupError = (error: unknown) => {
        reject(new WatcherError(this.directory, formatError(error)));
      };
      watcher.once('error', onStartupError);
      watcher.once('ready', () => {
        watcher.off('error', onStartupError);
        resolve();
      });
    });

    watcher
      .on('add', filePath => this.notify({ kind: 'created', path: filePath }))
      .on('change', filePath => this.notify({ kind: 'changed', path: filePath }))
      .on('unlink', filePath => this.notify({ kind: 'removed', path: filePath }))
      .on('error', error => this.handlers.onError(new WatcherError(this.directory, formatError(error))));

    LOG.info(`Watching ${this.directory} for changes${this.options.usePolling ? ' (polling mode)' : ''}...`);
  }

  /**
   * Feeds a raw filesystem event in. Events for the same path are coalesced over the debounce
   * window before reaching the handlers, which run one at a time in arrival order. A write to a
   * file with a pending event restarts its window, so a file still being copied is not reported
   * until the writes settle.
   */
  notify(event: FileEvent): void {
    const filePath = path.resolve(event.path);
    if (path.dirname(filePath) !== this.directory || !this.isVideoFile(filePath)) {
      return;
    }

    const previous = this.pending.get(filePath);
    let coalesced: WatchEvent;
    if (event.kind === 'changed') {
      if (!previous) return;
      coalesced = previous.event;
    } else {
      coalesced = { kind: event.kind, path: filePath };
    }
    if (previous) {
      clearTimeout(previous.timer);
    }

    const timer = setTimeout(() => {
      this.pending.delete(filePath);
      this.queue.add(() => this.dispatch(coalesced)).catch(error => {
        LOG.error(`Watcher queue failure for ${filePath}: ${formatError(error)}`);
      });
    }, this.options.debounceMs);
    this.pending.set(filePath, { event: coalesced, timer });
  }

  /**
   * Releases events held since `start({ holdEvents: true })`, in arrival order
   */
  resume(): void {
    this.queue.start();
  }

  /**
   * Resolves once every dispatched event has been handled. Never resolves while events are held.
   */
  drain(): Promise<void> {
    return this.queue.onIdle();
  }

  async close(): Promise<void> {
    for (const { timer } of this.pending.values()) {
      clearTimeout(timer);
    }
    this.pending.clear();
    this.queue.clear();

    if (this.watcher) {
      const watcher = this.watcher;
      this.watcher = null;
      await watcher.close();
      LOG.info(`Stopped watching: ${this.directory}`);
    }
    await this.queue.onIdle();
  }

  private async dispatch(event: WatchEvent): Promise<void> {
    const name = path.basename(event.path);
    try {
      if (event.kind === 'created') {
        LOG.info(`Video added: ${name}`);
        await this.handlers.onCreated(event.path);
      } else {
        LOG.info(`Video removed: ${name}`);
        await this.handlers.onRemoved(event.path);
      }
    } catch (error) {
      LOG.error(`Failed to handle ${event.kind} event for ${name}: ${formatError(error)}`);
    }
  }
}
