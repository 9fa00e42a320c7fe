export interface CaptureOptions {
  width: number;
  height: number;
  fps: number;
  horizontalFlip: boolean;
  verticalFlip: boolean;
}

/**
 * raspivid arguments for an endless H.264 stream on stdout with no preview
 * window. Zero dimensions or framerate fall back to raspivid's defaults.
 */
export function buildCaptureArgs(options: CaptureOptions): string[] {
  const args = ['-o', '-', '-t', '0', '-n'];

  if (options.width !== 0) args.push('-w', String(options.width));
  if (options.height !== 0) args.push('-h', String(options.height));
  if (options.fps !== 0) args.push('-fps', String(options.fps));
  if (options.horizontalFlip) args.push('-hf');
  if (options.verticalFlip) args.push('-vf');

  return args;
}
