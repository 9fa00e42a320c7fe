import { logger } from '../logger.js';
import { AlreadyStartedError, NotStartedError, type ExitStatus, type StreamError } from '../errors.js';
import type { LaunchOptions, LaunchedProcess, ProcessLauncher } from './ProcessLauncher.js';

export const DEFAULT_TERMINATE_GRACE_MS = 5000;

// Sent to the whole process group by a terminal or service manager
const TERMINATION_SIGNALS: ReadonlySet<NodeJS.Signals> = new Set(['SIGINT', 'SIGTERM']);

/**
 * Lifecycle shared by the capture and mux wrappers: one OS process per
 * instance, started once, waited on, and stopped with SIGTERM followed by
 * SIGKILL when the process ignores it.
 */
export abstract class ManagedProcess {
  private proc: LaunchedProcess | null = null;
  private started = false;
  private exitStatus: ExitStatus | null = null;
  private stopRequested = false;
  private stopping: Promise<void> | null = null;

  constructor(
    protected readonly name: string,
    private readonly launcher: ProcessLauncher,
    private readonly terminateGraceMs = DEFAULT_TERMINATE_GRACE_MS,
  ) {}

  /** Error to report for an exit that was neither clean nor expected. */
  protected abstract exitError(exit: ExitStatus): StreamError;

  /** Whether a non-zero exit is a consequence of shutdown rather than a failure. */
  protected isExpectedExit(exit: ExitStatus): boolean {
    return this.stopRequested || (exit.signal !== null && TERMINATION_SIGNALS.has(exit.signal));
  }

  protected async launch(command: string, args: readonly string[], options: LaunchOptions): Promise<LaunchedProcess> {
    if (this.proc) {
      throw new AlreadyStartedError(this.name);
    }

    const proc = this.launcher.launch(command, args, options);
    this.proc = proc;

    void proc.exited.then((exit) => {
      this.exitStatus = exit;
      logger.debug(`[${this.name}] exited`, { ...exit });
    });

    proc.stderr?.on('data', (data: Buffer) => {
      const msg = data.toString().trim();
      if (msg) logger.debug(`[${this.name}] ${msg}`);
    });

    await proc.spawned;
    this.started = true;
    return proc;
  }

  get isRunning(): boolean {
    return this.started && this.exitStatus === null;
  }

  /** Resolves when the process exits cleanly; rejects on an abnormal exit. */
  async wait(): Promise<void> {
    if (!this.proc || !this.started) {
      throw new NotStartedError(this.name);
    }

    const exit = await this.proc.exited;
    if (exit.code === 0 || this.isExpectedExit(exit)) return;
    throw this.exitError(exit);
  }

  /** Terminate the process. Safe to call at any time and any number of times. */
  stop(): Promise<void> {
    if (!this.proc) return Promise.resolve();
    this.stopRequested = true;
    this.stopping ??= this.terminate();
    return this.stopping;
  }

  /** SIGKILL the process now, without waiting out a SIGTERM. */
  kill(): void {
    if (!this.proc || this.exitStatus !== null) return;
    this.stopRequested = true;
    this.proc.kill('SIGKILL');
  }

  toString(): string {
    return this.proc ? [this.proc.command, ...this.proc.args].join(' ') : `${this.name} (not started)`;
  }

  private terminate(): Promise<void> {
    const proc = this.proc;
    if (!proc || this.exitStatus !== null) return Promise.resolve();

    return new Promise((resolve) => {
      const timeout = setTimeout(() => {
        logger.warn(`Force killing ${this.name}`);
        proc.kill('SIGKILL');
        resolve();
      }, this.terminateGraceMs);

      void proc.exited.then(() => {
        clearTimeout(timeout);
        resolve();
      });

      proc.kill('SIGTERM');
    });
  }
}
