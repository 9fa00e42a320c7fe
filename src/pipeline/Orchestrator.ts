import { EventEmitter } from 'node:events';
import { logger } from '../logger.js';
import { AlreadyStartedError, formatError, toError } from '../errors.js';
import type { VideoSource } from '../capture/CaptureProcess.js';
import type { Muxer } from '../mux/MuxProcess.js';
import type { FileServer } from '../server/StaticServer.js';
import { ProcessInterruptSource, type InterruptSource } from './InterruptSource.js';
import { ShutdownSignal, type ShutdownSource } from './ShutdownSignal.js';

export type PipelineState = 'idle' | 'starting' | 'running' | 'shuttingDown' | 'stopped';

/** How long in-flight downloads may continue once shutdown begins. */
export const SERVER_SHUTDOWN_DEADLINE_MS = 10_000;

/** How long capture and mux get to exit after their stream is closed before they are terminated. */
export const PROCESS_EXIT_DEADLINE_MS = 5_000;

export interface OrchestratorOptions {
  capture: VideoSource;
  muxer: Muxer;
  server: FileServer;
  interrupts?: InterruptSource;
  serverShutdownDeadlineMs?: number;
  processExitDeadlineMs?: number;
}

function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise((resolve) => {
    const timeout = setTimeout(() => resolve(false), ms);
    const done = () => {
      clearTimeout(timeout);
      resolve(true);
    };
    void promise.then(done, done);
  });
}

/**
 * Runs one streaming session: arms the muxer, starts capture, serves the
 * output directory, and tears everything down when any of them finishes,
 * fails, or the process is interrupted.
 *
 * Emits 'stateChange' with the new {@link PipelineState}.
 */
export class Orchestrator extends EventEmitter {
  private state: PipelineState = 'idle';
  private readonly shutdownSignal = new ShutdownSignal();
  private readonly errors: Error[] = [];
  private interrupted = false;
  private readonly interrupts: InterruptSource;
  private readonly serverShutdownDeadlineMs: number;
  private readonly processExitDeadlineMs: number;

  constructor(private options: OrchestratorOptions) {
    super();
    this.interrupts = options.interrupts ?? new ProcessInterruptSource();
    this.serverShutdownDeadlineMs = options.serverShutdownDeadlineMs ?? SERVER_SHUTDOWN_DEADLINE_MS;
    this.processExitDeadlineMs = options.processExitDeadlineMs ?? PROCESS_EXIT_DEADLINE_MS;
  }

  getState(): PipelineState {
    return this.state;
  }

  /**
   * Resolves once the session has shut down cleanly. Rejects with the startup
   * error, or with the first error observed while running or shutting down.
   */
  async run(): Promise<void> {
    if (this.state !== 'idle') {
      throw new AlreadyStartedError('pipeline');
    }

    const unsubscribe = this.interrupts.subscribe((signal) => this.onInterrupt(signal));

    try {
      this.updateState('starting');
      await this.startProcesses();
      this.updateState('running');
      await this.runUntilShutdown();
    } finally {
      unsubscribe();
      this.updateState('stopped');
    }

    const [error] = this.errors;
    if (error) throw error;
  }

  private async startProcesses(): Promise<void> {
    const { capture, muxer } = this.options;

    // The reader must be in place before capture produces its first bytes
    await muxer.mux(capture.video);

    try {
      await capture.start();
    } catch (err) {
      logger.error(`Capture failed to start: ${formatError(err)}`);
      capture.video.close();
      const muxerDone = muxer.wait().catch((muxErr: unknown) => {
        logger.warn(`Muxer failed after capture did not start: ${formatError(muxErr)}`);
      });
      if (!(await settlesWithin(muxerDone, this.processExitDeadlineMs))) {
        await muxer.stop();
      }
      throw err;
    }
    logger.info('Streaming started');
  }

  private async runUntilShutdown(): Promise<void> {
    const { capture, muxer, server } = this.options;

    const serverDone = this.watch('server', server.listenAndServe());
    const processesDone = Promise.all([
      this.watch('mux', muxer.wait()),
      this.watch('capture', capture.wait()),
    ]);

    const reason = await this.shutdownSignal.wait();
    this.updateState('shuttingDown');
    logger.info('Shutting down', { trigger: reason.source });

    // Ends the muxer's input; the capture process then dies of a broken pipe
    capture.video.close();

    const { drained } = await server.shutdown(this.serverShutdownDeadlineMs);
    if (!drained) {
      logger.warn('Server connections were force-closed at the shutdown deadline');
    }

    if (!(await settlesWithin(processesDone, this.processExitDeadlineMs))) {
      logger.warn(`Processes still running ${this.processExitDeadlineMs}ms after shutdown, terminating`);
      await Promise.all([muxer.stop(), capture.stop()]);
      await settlesWithin(processesDone, this.processExitDeadlineMs);
    }

    await serverDone;
  }

  private onInterrupt(signal: NodeJS.Signals): void {
    if (!this.interrupted) {
      this.interrupted = true;
      logger.info(`Received ${signal}`);
      this.shutdownSignal.trigger({ source: 'interrupt', signal });
      return;
    }

    // Asked twice: skip the remaining deadlines
    logger.warn(`Received ${signal} again, killing processes and dropping connections`);
    const { capture, muxer, server } = this.options;
    capture.kill();
    muxer.kill();
    server.forceClose();
  }

  /** Report a component's outcome to the shutdown signal. Never rejects. */
  private watch(source: ShutdownSource, done: Promise<void>): Promise<void> {
    return done.then(
      () => {
        logger.debug(`${source} finished`);
        this.shutdownSignal.trigger({ source });
      },
      (err: unknown) => {
        const error = toError(err);
        this.errors.push(error);
        logger.error(`${source} failed: ${formatError(error)}`);
        this.shutdownSignal.trigger({ source, error });
      },
    );
  }

  private updateState(state: PipelineState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit('stateChange', state);
  }
}
