import http from 'http';
import type { AddressInfo } from 'net';
import { createApp } from './app';
import type { configInterface } from './config/config';
import { createEncoderCommandBuilder } from './config/stream';
import { INFINITE_LOOP, StreamSnapshot } from './models/streamState';
import { DirectoryWatcher } from './services/directoryWatcher';
import { ProcessRunner, StreamRunner } from './services/processRunner';
import { StreamManager } from './streamManager';
import { formatError, NamingCollisionError, SupervisorError } from './utils/errors';
import { LOG } from './utils/logger';
import { waitForPort } from './utils/waitForPort';

export interface SupervisorOptions {
  config: configInterface;
  /** Defaults to the encoder configured in `config` */
  runner?: StreamRunner;
  requestLogging?: boolean;
  /** Called when hot-reload can no longer be guaranteed; the process should shut down */
  onFatal?: (error: SupervisorError) => void;
}

/**
 * Wires the registry, the directory watcher and the control API together and owns startup and shutdown.
 */
export class Supervisor {
  readonly manager: StreamManager;
  private readonly config: configInterface;
  private readonly watcher: DirectoryWatcher;
  private readonly server: http.Server;
  private readonly onFatal: (error: SupervisorError) => void;
  private reconcileTimer: NodeJS.Timeout | null = null;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: SupervisorOptions) {
    const { config } = options;
    this.config = config;
    this.onFatal = options.onFatal ?? (() => undefined);

    this.manager = new StreamManager({
      runner: options.runner ?? new ProcessRunner(createEncoderCommandBuilder(config), config.stopGraceMs),
      stopGraceMs: config.stopGraceMs,
      restartOnCrash: config.restartOnCrash,
    });

    this.watcher = new DirectoryWatcher(
      {
        directory: config.videoDir,
        extensions: config.videoExtensions,
        debounceMs: config.watchDebounceMs,
        usePolling: config.watchPolling,
        pollIntervalMs: config.watchPollIntervalMs,
      },
      {
        onCreated: filePath => this.handleCreated(filePath),
        onRemoved: async filePath => {
          await this.manager.remove(filePath);
        },
        onError: error => {
          LOG.error(error.message);
          this.onFatal(error);
        },
      },
    );

    const app = createApp(this.manager, { urls: config, requestLogging: options.requestLogging });
    this.server = http.createServer(app);
  }

  async start(): Promise<void> {
    LOG.info('Stream supervisor starting...');

    if (this.config.waitForMediaServer) {
      await this.waitForMediaServer();
    }

    // Watch before scanning so files that come or go during the initial sync are not missed
    await this.watcher.start({ holdEvents: true });
    await this.syncVideos();
    this.watcher.resume();
    await this.listen();

    this.reconcileTimer = setInterval(() => {
      this.manager.reconcile().catch(error => {
        LOG.error(`Reconcile sweep failed: ${formatError(error)}`);
      });
    }, this.config.reconcileIntervalMs);
  }

  address(): AddressInfo | null {
    const address = this.server.address();
    return address && typeof address === 'object' ? address : null;
  }

  /**
   * Stops watching, closes the API and terminates every encoder. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.teardown();
    }
    return this.shutdownPromise;
  }

  private async teardown(): Promise<void> {
    LOG.info('Shutting down stream supervisor...');

    if (this.reconcileTimer) {
      clearInterval(this.reconcileTimer);
      this.reconcileTimer = null;
    }

    await this.watcher.close();
    await this.closeServer();

    const results = await this.manager.shutdown();
    const failed = results.filter(result => !result.success);
    for (const result of failed) {
      LOG.error(`Failed to stop ${result.id}: ${result.error?.message}`);
    }
    LOG.info(`Shutdown complete: ${results.length - failed.length} stream(s) stopped`);
  }

  private async waitForMediaServer(): Promise<void> {
    const { rtspHost, rtspPort, mediaServerTimeoutMs } = this.config;
    LOG.info(`Waiting for media server to be available on ${rtspHost}:${rtspPort}...`);

    const ready = await waitForPort(rtspHost, rtspPort, { timeoutMs: mediaServerTimeoutMs });
    if (!ready) {
      throw new Error(`Media server not reachable on ${rtspHost}:${rtspPort} after ${mediaServerTimeoutMs}ms`);
    }
    LOG.info('Media server is ready');
  }

  /**
   * Initial scan: registers every video file and, unless auto-start is off, starts them looping forever.
   * Watch events that arrive meanwhile are held and applied afterwards.
   */
  private async syncVideos(): Promise<void> {
    LOG.info(`Scanning ${this.config.videoDir} for video files...`);
    const files = await this.watcher.scan();
    for (const file of files) {
      await this.register(file);
    }

    if (!this.config.autoStart) {
      LOG.info(`Initial sync complete: ${this.manager.list().length} streams registered, auto-start disabled`);
      return;
    }

    const results = await this.manager.startAll(INFINITE_LOOP);
    const started = results.filter(result => result.success).length;
    LOG.info(`Initial sync complete: ${started} streams started`);
  }

  private async register(filePath: string): Promise<StreamSnapshot | undefined> {
    try {
      return await this.manager.upsert(filePath);
    } catch (error) {
      if (error instanceof NamingCollisionError) {
        LOG.error(`Naming collision, skipping file: ${error.message}`);
        return undefined;
      }
      throw error;
    }
  }

  private async handleCreated(filePath: string): Promise<void> {
    const snapshot = await this.register(filePath);
    if (snapshot && this.config.autoStart) {
      await this.manager.start(snapshot.id, INFINITE_LOOP);
    }
  }

  private listen(): Promise<void> {
    return new Promise((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      this.server.once('error', onError);
      this.server.listen(this.config.expressPort, () => {
        this.server.off('error', onError);
        const address = this.address();
        LOG.info(`Stream Control UI: http://localhost:${address?.port ?? this.config.expressPort}`);
        resolve();
      });
    });
  }

  private closeServer(): Promise<void> {
    if (!this.server.listening) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      this.server.close(error => (error ? reject(error) : resolve()));
      this.server.closeAllConnections();
    });
  }
}
