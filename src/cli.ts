import { Command } from 'commander';
import { DEFAULTS, parseStreamConfig, type EnvConfig, type StreamConfig } from './config.js';
import type { StreamFormat } from './mux/muxArgs.js';

export type SessionRunner = (config: Readonly<StreamConfig>) => Promise<void>;

const FORMAT_LABELS: Record<StreamFormat, string> = {
  hls: 'HLS',
  dash: 'DASH',
};

function formatCommand(format: StreamFormat, env: EnvConfig, runSession: SessionRunner): Command {
  const label = FORMAT_LABELS[format];

  return new Command(format)
    .description(`Stream video using ${label}`)
    .option('--port <port>', 'static file server port', String(DEFAULTS.port))
    .option('--directory <directory>', 'static file server directory', DEFAULTS.directory)
    .option('--tls-cert <path>', 'static file server TLS certificate')
    .option('--tls-key <path>', 'static file server TLS key')
    .option('--segment-time <seconds>', 'target segment duration in seconds', '0')
    .option('--playlist-size <count>', 'maximum number of playlist entries', '0')
    .option('--storage-size <count>', 'maximum number of unreferenced segments to keep on disk before removal', '0')
    .action(async (_options: unknown, command: Command) => {
      const opts = command.optsWithGlobals();
      const config = parseStreamConfig({
        format,
        video: {
          width: opts.width,
          height: opts.height,
          fps: opts.fps,
          horizontalFlip: opts.horizontalFlip,
          verticalFlip: opts.verticalFlip,
        },
        server: {
          port: opts.port,
          directory: opts.directory,
          tlsCert: opts.tlsCert,
          tlsKey: opts.tlsKey,
        },
        mux: {
          segmentTime: opts.segmentTime,
          playlistSize: opts.playlistSize,
          storageSize: opts.storageSize,
        },
        tools: {
          capturePath: env.CAMCAST_CAPTURE_PATH,
          ffmpegPath: env.CAMCAST_FFMPEG_PATH,
        },
      });
      await runSession(config);
    });
}

export function createProgram(env: EnvConfig, runSession: SessionRunner, version = '0.0.0'): Command {
  const program = new Command();

  program
    .name('camcast')
    .description('Stream live camera video as HLS or MPEG-DASH over HTTP(S)')
    .version(version, '-v, --version')
    .option('--width <pixels>', 'video width', String(DEFAULTS.width))
    .option('--height <pixels>', 'video height', String(DEFAULTS.height))
    .option('--fps <fps>', 'video framerate', String(DEFAULTS.fps))
    .option('--horizontal-flip', 'horizontally flip video', false)
    .option('--vertical-flip', 'vertically flip video', false);

  program.addCommand(formatCommand('hls', env, runSession));
  program.addCommand(formatCommand('dash', env, runSession));

  return program;
}
