import { join } from 'node:path';

/**
 * Muxer settings. ffmpeg steps in with its own default for any value left at
 * zero, so zeros are never forwarded.
 */
export interface MuxOptions {
  fps: number; // Framerate of the incoming video
  segmentTime: number; // Segment length target duration in seconds
  playlistSize: number; // Maximum number of playlist entries
  storageSize: number; // Maximum number of unreferenced segments to keep on disk before removal
}

export type StreamFormat = 'hls' | 'dash';

export const PLAYLIST_NAMES: Record<StreamFormat, string> = {
  hls: 'livestream.m3u8',
  dash: 'livestream.mpd',
};

function inputArgs(options: MuxOptions, realtime: boolean): string[] {
  const args = ['-hide_banner', '-loglevel', 'warning'];
  if (realtime) args.push('-re');
  if (options.fps !== 0) args.push('-framerate', String(options.fps));
  args.push('-i', 'pipe:0', '-codec', 'copy', '-an');
  return args;
}

export function buildHlsArgs(directory: string, options: MuxOptions): string[] {
  const args = [
    ...inputArgs(options, false),
    '-f', 'hls',
    '-hls_flags', 'delete_segments',
    '-hls_segment_filename', join(directory, 'segment-%d.ts'),
  ];

  if (options.segmentTime !== 0) args.push('-hls_time', String(options.segmentTime));
  if (options.playlistSize !== 0) args.push('-hls_list_size', String(options.playlistSize));
  if (options.storageSize !== 0) args.push('-hls_delete_threshold', String(options.storageSize));

  args.push(join(directory, PLAYLIST_NAMES.hls));
  return args;
}

export function buildDashArgs(directory: string, options: MuxOptions): string[] {
  const args = [
    ...inputArgs(options, true),
    '-f', 'dash',
    '-init_seg_name', 'init.m4s',
    '-media_seg_name', '$Time$-$Number$.m4s',
  ];

  if (options.segmentTime !== 0) args.push('-seg_duration', String(options.segmentTime));
  if (options.playlistSize !== 0) args.push('-window_size', String(options.playlistSize));
  if (options.storageSize !== 0) args.push('-extra_window_size', String(options.storageSize));

  args.push(join(directory, PLAYLIST_NAMES.dash));
  return args;
}
