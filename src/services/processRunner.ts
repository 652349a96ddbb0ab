import { spawn, ChildProcess } from 'child_process';
import config from '../config/config';
import { createEncoderCommandBuilder, type EncoderCommandBuilder, type EncoderInvocation } from '../config/stream';
import { formatError, ProcessSpawnError } from '../utils/errors';
import { LOG, type Logger } from '../utils/logger';

export interface ProcessExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  /** True when the exit followed a stop request from the supervisor */
  requested: boolean;
  /** Last line the encoder wrote to stderr, if any */
  lastOutput?: string;
}

/**
 * Handle on one running encoder. `spawned` settles once the OS has accepted (or refused) the launch
 * and `exited` resolves exactly once, whichever way the process ends.
 */
export interface StreamProcess {
  readonly id: string;
  readonly pid: number | undefined;
  readonly spawned: Promise<void>;
  readonly exited: Promise<ProcessExit>;
  isAlive(): boolean;
  terminate(graceMs: number): Promise<void>;
  onExit(listener: (exit: ProcessExit) => void): void;
}

export interface StreamRunner {
  start(invocation: EncoderInvocation): StreamProcess;
  stop(handle: StreamProcess, graceMs?: number): Promise<void>;
  isAlive(handle: StreamProcess): boolean;
}

class EncoderProcess implements StreamProcess {
  readonly spawned: Promise<void>;
  readonly exited: Promise<ProcessExit>;
  private exitInfo: ProcessExit | undefined;
  private stopRequested = false;
  private lastOutput: string | undefined;
  private resolveExit: (exit: ProcessExit) => void = () => undefined;

  constructor(readonly id: string, private readonly child: ChildProcess, private readonly log: Logger) {
    this.exited = new Promise(resolve => {
      this.resolveExit = resolve;
    });

    this.spawned = new Promise((resolve, reject) => {
      child.once('spawn', () => {
        log.debug(`Encoder spawned (pid ${child.pid})`);
        resolve();
      });
      child.once('error', (error) => {
        // An 'error' before 'spawn' means the launch itself failed and 'exit' may never come
        if (child.pid === undefined) {
          this.settle(null, null);
        }
        reject(new ProcessSpawnError(id, formatError(error)));
      });
    });

    child.on('error', (error) => {
      log.error(`Encoder process error: ${formatError(error)}`);
    });

    child.stdout?.on('data', (data: Buffer) => this.forwardOutput(data));
    child.stderr?.on('data', (data: Buffer) => this.forwardOutput(data));

    child.on('exit', (code, signal) => {
      this.settle(code, signal);
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isAlive(): boolean {
    return this.exitInfo === undefined && this.child.pid !== undefined;
  }

  onExit(listener: (exit: ProcessExit) => void): void {
    void this.exited.then(listener);
  }

  async terminate(graceMs: number): Promise<void> {
    if (!this.isAlive()) return;

    this.stopRequested = true;
    this.child.kill('SIGTERM');
    if (await this.waitForExit(graceMs)) return;

    this.log.warn(`Encoder did not exit within ${graceMs}ms, sending SIGKILL`);
    this.child.kill('SIGKILL');
    if (!(await this.waitForExit(graceMs))) {
      this.log.error(`Encoder (pid ${this.child.pid}) still alive after SIGKILL`);
    }
  }

  private waitForExit(timeoutMs: number): Promise<boolean> {
    return new Promise(resolve => {
      const timer = setTimeout(() => resolve(false), timeoutMs);
      void this.exited.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  private settle(code: number | null, signal: NodeJS.Signals | null): void {
    if (this.exitInfo) return;
    this.exitInfo = { code, signal, requested: this.stopRequested, lastOutput: this.lastOutput };
    this.log.debug(`Encoder exited (code: ${code}, signal: ${signal})`);
    this.resolveExit(this.exitInfo);
  }

  private forwardOutput(data: Buffer): void {
    const lines = data.toString().split(/\r?\n/).map(line => line.trim()).filter(line => line.length > 0);
    for (const line of lines) {
      this.log.debug(`encoder: ${line}`);
    }
    if (lines.length > 0) {
      this.lastOutput = lines[lines.length - 1];
    }
  }
}

/**
 * Launches and terminates the external encoder, one child per stream.
 * There is no global cap on the number of children.
 */
export class ProcessRunner implements StreamRunner {
  constructor(
    private readonly buildCommand: EncoderCommandBuilder = createEncoderCommandBuilder(),
    private readonly defaultGraceMs: number = config.stopGraceMs,
  ) {}

  start(invocation: EncoderInvocation): StreamProcess {
    const { command, args } = this.buildCommand(invocation);
    const log = LOG.forStream(invocation.id);
    log.debug(`Launching ${command} ${args.join(' ')}`);

    let child: ChildProcess;
    try {
      child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (error) {
      throw new ProcessSpawnError(invocation.id, formatError(error));
    }

    return new EncoderProcess(invocation.id, child, log);
  }

  stop(handle: StreamProcess, graceMs: number = this.defaultGraceMs): Promise<void> {
    return handle.terminate(graceMs);
  }

  isAlive(handle: StreamProcess): boolean {
    return handle.isAlive();
  }
}
