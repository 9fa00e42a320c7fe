import { logger } from '../logger.js';
import { AlreadyStartedError, MuxExitError, MuxStartError, type ExitStatus, type StreamError } from '../errors.js';
import { ManagedProcess } from '../process/ManagedProcess.js';
import type { ProcessLauncher } from '../process/ProcessLauncher.js';
import type { VideoStream } from '../capture/VideoStream.js';
import { buildDashArgs, buildHlsArgs, type MuxOptions, type StreamFormat } from './muxArgs.js';

/** A video transformation device that turns the raw stream into segment files. */
export interface Muxer {
  mux(input: VideoStream): Promise<void>;
  wait(): Promise<void>;
  stop(): Promise<void>;
  kill(): void;
}

// ffmpeg's exit status after it caught SIGINT or SIGTERM and finalized its output
const FFMPEG_INTERRUPTED_CODE = 255;

export interface MuxProcessOptions {
  directory: string;
  options: MuxOptions;
  ffmpegPath?: string;
  terminateGraceMs?: number;
}

export abstract class MuxProcess extends ManagedProcess implements Muxer {
  readonly directory: string;
  readonly options: Readonly<MuxOptions>;
  private readonly ffmpegPath: string;

  constructor(
    readonly format: StreamFormat,
    config: MuxProcessOptions,
    launcher: ProcessLauncher,
  ) {
    super(`mux:${format}`, launcher, config.terminateGraceMs);
    this.directory = config.directory;
    this.options = Object.freeze({ ...config.options });
    this.ffmpegPath = config.ffmpegPath ?? 'ffmpeg';
  }

  protected abstract buildArgs(): string[];

  /**
   * Start muxing `input`. Only the stream value is needed: bytes flow once the
   * capture process attaches to it.
   */
  async mux(input: VideoStream): Promise<void> {
    const proc = await this.launch(this.ffmpegPath, this.buildArgs(), { stdin: true })
      .catch((err: unknown) => {
        throw err instanceof AlreadyStartedError ? err : new MuxStartError(this.ffmpegPath, err);
      });

    if (!proc.stdin) {
      throw new MuxStartError(this.ffmpegPath, new Error('muxer has no stdin'));
    }
    input.attachReader(proc.stdin);
    logger.debug('Started ffmpeg muxer', { cmd: this.toString() });
  }

  protected override isExpectedExit(exit: ExitStatus): boolean {
    return exit.code === FFMPEG_INTERRUPTED_CODE || super.isExpectedExit(exit);
  }

  protected exitError(exit: ExitStatus): StreamError {
    return new MuxExitError(exit);
  }
}

export class HlsMuxer extends MuxProcess {
  constructor(config: MuxProcessOptions, launcher: ProcessLauncher) {
    super('hls', config, launcher);
  }

  protected buildArgs(): string[] {
    return buildHlsArgs(this.directory, this.options);
  }
}

export class DashMuxer extends MuxProcess {
  constructor(config: MuxProcessOptions, launcher: ProcessLauncher) {
    super('dash', config, launcher);
  }

  protected buildArgs(): string[] {
    return buildDashArgs(this.directory, this.options);
  }
}

export function createMuxer(format: StreamFormat, config: MuxProcessOptions, launcher: ProcessLauncher): MuxProcess {
  return format === 'hls' ? new HlsMuxer(config, launcher) : new DashMuxer(config, launcher);
}
