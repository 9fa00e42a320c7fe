import { logger } from '../logger.js';
import type { StreamConfig } from '../config.js';
import { CaptureProcess } from '../capture/CaptureProcess.js';
import { createMuxer } from '../mux/MuxProcess.js';
import { StaticServer } from '../server/StaticServer.js';
import { ChildProcessLauncher, type ProcessLauncher } from '../process/ProcessLauncher.js';
import type { InterruptSource } from './InterruptSource.js';
import { Orchestrator, type PipelineState } from './Orchestrator.js';

export interface SessionDeps {
  launcher?: ProcessLauncher;
  interrupts?: InterruptSource;
}

/** Wire capture, muxer and file server for one streaming session. */
export function createSession(config: Readonly<StreamConfig>, deps: SessionDeps = {}): Orchestrator {
  const launcher = deps.launcher ?? new ChildProcessLauncher();

  const capture = new CaptureProcess(config.video, launcher, config.tools.capturePath);

  const muxer = createMuxer(config.format, {
    directory: config.server.directory,
    ffmpegPath: config.tools.ffmpegPath,
    options: {
      fps: config.video.fps,
      segmentTime: config.mux.segmentTime,
      playlistSize: config.mux.playlistSize,
      storageSize: config.mux.storageSize,
    },
  }, launcher);

  const server = new StaticServer({
    port: config.server.port,
    directory: config.server.directory,
    cert: config.server.tlsCert,
    key: config.server.tlsKey,
  });

  const orchestrator = new Orchestrator({ capture, muxer, server, interrupts: deps.interrupts });
  orchestrator.on('stateChange', (state: PipelineState) => {
    logger.debug(`Pipeline ${state}`, { format: config.format });
  });
  return orchestrator;
}

/** Run a streaming session to completion. Rejects with the session's terminal error. */
export async function streamSession(config: Readonly<StreamConfig>, deps?: SessionDeps): Promise<void> {
  logger.info(`Streaming ${config.format.toUpperCase()} into ${config.server.directory}`, {
    width: config.video.width,
    height: config.video.height,
    fps: config.video.fps,
  });
  await createSession(config, deps).run();
  logger.info('Stream ended');
}
