import { describe, it, expect, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { CaptureProcess } from '../src/capture/CaptureProcess.js';
import { buildCaptureArgs, type CaptureOptions } from '../src/capture/captureArgs.js';
import {
  AlreadyStartedError,
  CaptureExitError,
  CaptureStartError,
  NotStartedError,
} from '../src/errors.js';
import { FakeLauncher } from './helpers/fakes.js';

const options: CaptureOptions = {
  width: 1280,
  height: 720,
  fps: 25,
  horizontalFlip: false,
  verticalFlip: true,
};

describe('buildCaptureArgs', () => {
  it('streams to stdout forever with the requested geometry', () => {
    expect(buildCaptureArgs(options)).toEqual([
      '-o', '-', '-t', '0', '-n',
      '-w', '1280',
      '-h', '720',
      '-fps', '25',
      '-vf',
    ]);
  });

  it('omits zero values and unset flips', () => {
    expect(buildCaptureArgs({ width: 0, height: 0, fps: 0, horizontalFlip: true, verticalFlip: false }))
      .toEqual(['-o', '-', '-t', '0', '-n', '-hf']);
  });
});

describe('CaptureProcess', () => {
  it('launches the capture tool with stdout piped into its video stream', async () => {
    const launcher = new FakeLauncher();
    const capture = new CaptureProcess(options, launcher, '/usr/bin/raspivid');

    const sink = new PassThrough();
    const chunks: string[] = [];
    sink.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
    capture.video.attachReader(sink);

    const video = await capture.start();
    expect(video).toBe(capture.video);

    const proc = launcher.get('/usr/bin/raspivid');
    expect(proc.args).toEqual(buildCaptureArgs(options));
    proc.stdout?.write('h264');
    await vi.waitFor(() => expect(chunks.join('')).toBe('h264'));
  });

  it('reports a missing executable as a start failure', async () => {
    const enoent = Object.assign(new Error('spawn raspivid ENOENT'), { code: 'ENOENT' });
    const capture = new CaptureProcess(options, new FakeLauncher({ raspivid: { spawnError: enoent } }));

    const err = await capture.start().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CaptureStartError);
    expect(err).toHaveProperty('code', 'CAPTURE_START_FAILED');
    expect(err).toHaveProperty('kind', 'startup');
    expect(err).toHaveProperty('cause', enoent);
  });

  it('refuses to wait before it was started', async () => {
    const capture = new CaptureProcess(options, new FakeLauncher());
    await expect(capture.wait()).rejects.toBeInstanceOf(NotStartedError);
  });

  it('refuses to start twice', async () => {
    const capture = new CaptureProcess(options, new FakeLauncher());
    await capture.start();
    await expect(capture.start()).rejects.toBeInstanceOf(AlreadyStartedError);
  });

  it('fails wait when the process dies while the stream is open', async () => {
    const launcher = new FakeLauncher();
    const capture = new CaptureProcess(options, launcher);
    await capture.start();

    launcher.get('raspivid').exit({ code: 70, signal: null });

    const err = await capture.wait().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CaptureExitError);
    expect(err).toHaveProperty('exit', { code: 70, signal: null });
    expect(err).toHaveProperty('message', 'Capture process exited abnormally with code 70');
  });

  it('treats the broken pipe after the stream is closed as a clean exit', async () => {
    const launcher = new FakeLauncher({ raspivid: { exitOnBrokenPipe: true } });
    const capture = new CaptureProcess(options, launcher);
    await capture.start();

    capture.video.close();

    await expect(capture.wait()).resolves.toBeUndefined();
    expect(launcher.get('raspivid').hasExited).toBe(true);
  });

  it('stops once, however often it is asked', async () => {
    const launcher = new FakeLauncher();
    const capture = new CaptureProcess(options, launcher);
    await capture.start();

    await Promise.all([capture.stop(), capture.stop()]);
    await capture.stop();

    expect(launcher.get('raspivid').signals).toEqual(['SIGTERM']);
    expect(capture.video.isClosed).toBe(true);
    await expect(capture.wait()).resolves.toBeUndefined();
  });

  it('stops without a process', async () => {
    const capture = new CaptureProcess(options, new FakeLauncher());
    await expect(capture.stop()).resolves.toBeUndefined();
    expect(capture.video.isClosed).toBe(true);
  });

  it('treats termination by SIGINT or SIGTERM as clean', async () => {
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      const launcher = new FakeLauncher();
      const capture = new CaptureProcess(options, launcher);
      await capture.start();

      launcher.get('raspivid').exit({ code: null, signal });

      await expect(capture.wait()).resolves.toBeUndefined();
    }
  });

  it('fails on a crash signal', async () => {
    const launcher = new FakeLauncher();
    const capture = new CaptureProcess(options, launcher);
    await capture.start();

    launcher.get('raspivid').exit({ code: null, signal: 'SIGSEGV' });

    const err = await capture.wait().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CaptureExitError);
    expect(err).toHaveProperty('message', 'Capture process exited abnormally with signal SIGSEGV');
  });

  it('SIGKILLs on kill without waiting for SIGTERM', async () => {
    const launcher = new FakeLauncher({ raspivid: { ignoreSigterm: true } });
    const capture = new CaptureProcess(options, launcher);
    await capture.start();

    capture.kill();

    expect(launcher.get('raspivid').signals).toEqual(['SIGKILL']);
    expect(capture.video.isClosed).toBe(true);
    await expect(capture.wait()).resolves.toBeUndefined();
  });

  it('kills a process that ignores SIGTERM', async () => {
    const launcher = new FakeLauncher({ raspivid: { ignoreSigterm: true } });
    const capture = new CaptureProcess(options, launcher, 'raspivid', 10);
    await capture.start();

    await capture.stop();

    expect(launcher.get('raspivid').signals).toEqual(['SIGTERM', 'SIGKILL']);
  });

  it('describes its command line', async () => {
    const capture = new CaptureProcess({ ...options, verticalFlip: false }, new FakeLauncher());
    expect(capture.toString()).toBe('capture (not started)');
    await capture.start();
    expect(capture.toString()).toBe('raspivid -o - -t 0 -n -w 1280 -h 720 -fps 25');
  });
});
