import { logger } from '../logger.js';
import { AlreadyStartedError, CaptureExitError, CaptureStartError, type ExitStatus, type StreamError } from '../errors.js';
import { ManagedProcess } from '../process/ManagedProcess.js';
import type { ProcessLauncher } from '../process/ProcessLauncher.js';
import { buildCaptureArgs, type CaptureOptions } from './captureArgs.js';
import { VideoStream } from './VideoStream.js';

/** What the orchestrator needs from a video source. */
export interface VideoSource {
  readonly video: VideoStream;
  start(): Promise<VideoStream>;
  wait(): Promise<void>;
  stop(): Promise<void>;
  kill(): void;
}

export class CaptureProcess extends ManagedProcess implements VideoSource {
  /** Created up front so the muxer can be armed before capture starts. */
  readonly video = new VideoStream();

  constructor(
    private options: CaptureOptions,
    launcher: ProcessLauncher,
    private capturePath = 'raspivid',
    terminateGraceMs?: number,
  ) {
    super('capture', launcher, terminateGraceMs);
  }

  async start(): Promise<VideoStream> {
    const proc = await this.launch(this.capturePath, buildCaptureArgs(this.options), { stdout: true })
      .catch((err: unknown) => {
        throw err instanceof AlreadyStartedError ? err : new CaptureStartError(this.capturePath, err);
      });

    if (!proc.stdout) {
      throw new CaptureStartError(this.capturePath, new Error('capture process has no stdout'));
    }
    this.video.attachSource(proc.stdout);
    logger.debug('Started capture', { cmd: this.toString() });
    return this.video;
  }

  override stop(): Promise<void> {
    this.video.close();
    return super.stop();
  }

  override kill(): void {
    this.video.close();
    super.kill();
  }

  // Once the stream is closed the capture process dies of a broken pipe
  protected override isExpectedExit(exit: ExitStatus): boolean {
    return this.video.isClosed || super.isExpectedExit(exit);
  }

  protected exitError(exit: ExitStatus): StreamError {
    return new CaptureExitError(exit);
  }
}
