import { describe, it, expect, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { VideoStream } from '../src/capture/VideoStream.js';

function collect(stream: PassThrough): { chunks: string[]; ended: () => boolean } {
  const chunks: string[] = [];
  let ended = false;
  stream.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
  stream.on('end', () => { ended = true; });
  return { chunks, ended: () => ended };
}

describe('VideoStream', () => {
  it('carries bytes from the source to the reader attached before it', async () => {
    const video = new VideoStream();
    const sink = new PassThrough();
    const out = collect(sink);
    video.attachReader(sink);

    const source = new PassThrough();
    video.attachSource(source);
    source.write('frame-1');
    source.write('frame-2');

    await vi.waitFor(() => expect(out.chunks.join('')).toBe('frame-1frame-2'));
  });

  it('rejects a second reader', () => {
    const video = new VideoStream();
    video.attachReader(new PassThrough());
    expect(() => video.attachReader(new PassThrough())).toThrow('Video stream already has a reader');
  });

  it('ends the reader and destroys the source on close', async () => {
    const video = new VideoStream();
    const sink = new PassThrough();
    const out = collect(sink);
    const source = new PassThrough();
    video.attachReader(sink);
    video.attachSource(source);

    video.close();

    expect(video.isClosed).toBe(true);
    expect(source.destroyed).toBe(true);
    await vi.waitFor(() => expect(out.ended()).toBe(true));
  });

  it('can be closed more than once', () => {
    const video = new VideoStream();
    video.attachReader(new PassThrough());
    video.close();
    expect(() => video.close()).not.toThrow();
    expect(video.isClosed).toBe(true);
  });

  it('ends a reader and destroys a source that attach after close', async () => {
    const video = new VideoStream();
    video.close();

    const sink = new PassThrough();
    const out = collect(sink);
    video.attachReader(sink);
    const source = new PassThrough();
    video.attachSource(source);

    expect(source.destroyed).toBe(true);
    await vi.waitFor(() => expect(out.ended()).toBe(true));
  });
});
