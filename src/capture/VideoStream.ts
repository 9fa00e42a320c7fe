import { PassThrough, type Readable, type Writable } from 'node:stream';
import { logger } from '../logger.js';

/**
 * The byte stream between the capture process and the muxer.
 *
 * The stream exists before either process does: the muxer attaches as the
 * single reader first, the capture output attaches as the source once it is
 * running. Closing it is how downstream learns that capture has ended: the
 * reader gets EOF and the source is destroyed, which the capture process sees
 * as a broken pipe.
 */
export class VideoStream {
  private readonly channel = new PassThrough();
  private source: Readable | null = null;
  private reader: Writable | null = null;
  private closed = false;

  constructor() {
    this.channel.on('error', (err) => {
      logger.warn(`[video] stream error: ${err.message}`);
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get hasReader(): boolean {
    return this.reader !== null;
  }

  /** Attach the single consumer of the video bytes. */
  attachReader(sink: Writable): void {
    if (this.reader) {
      throw new Error('Video stream already has a reader');
    }
    this.reader = sink;

    sink.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'EPIPE') {
        logger.warn('[video] reader closed its input (EPIPE)');
      } else {
        logger.error(`[video] reader error: ${err.message}`);
      }
    });

    if (this.closed) {
      sink.end();
      return;
    }
    this.channel.pipe(sink);
  }

  /** Attach the producer of the video bytes. */
  attachSource(source: Readable): void {
    if (this.source) {
      throw new Error('Video stream already has a source');
    }
    this.source = source;

    source.on('error', (err) => {
      logger.debug(`[video] source error: ${err.message}`);
    });

    if (this.closed) {
      source.destroy();
      return;
    }
    source.pipe(this.channel, { end: false });
  }

  /** Close the stream. Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.source) {
      this.source.unpipe(this.channel);
      this.source.destroy();
    }
    this.channel.end();
  }
}
