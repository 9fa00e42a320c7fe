import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';
import { ConfigError } from './errors.js';

const envSchema = z.object({
  CAMCAST_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  CAMCAST_CAPTURE_PATH: z.string().min(1).default('raspivid'),
  CAMCAST_FFMPEG_PATH: z.string().min(1).default('ffmpeg'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(`Invalid environment: ${describeIssues(result.error)}`, result.error);
  }
  return result.data;
}

export const DEFAULTS = {
  width: 1920,
  height: 1080,
  fps: 30,
  port: 8080,
  directory: join(homedir(), 'camera'),
} as const;

// CLI values arrive as strings; zero means "let the tool decide"
const count = z.coerce.number().int().nonnegative();

const optionalPath = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

export const streamConfigSchema = z.object({
  format: z.enum(['hls', 'dash']),
  video: z.object({
    width: count,
    height: count,
    fps: count,
    horizontalFlip: z.boolean().default(false),
    verticalFlip: z.boolean().default(false),
  }),
  server: z
    .object({
      port: z.coerce.number().int().min(0).max(65535),
      directory: z.string().min(1),
      tlsCert: optionalPath,
      tlsKey: optionalPath,
    })
    .refine((server) => Boolean(server.tlsCert) === Boolean(server.tlsKey), {
      message: 'TLS certificate and key must be set together',
      path: ['tlsCert'],
    }),
  mux: z.object({
    segmentTime: count, // Segment length target duration in seconds
    playlistSize: count, // Maximum number of playlist entries
    storageSize: count, // Maximum number of unreferenced segments to keep on disk before removal
  }),
  tools: z.object({
    capturePath: z.string().min(1),
    ffmpegPath: z.string().min(1),
  }),
});

export type StreamConfig = z.infer<typeof streamConfigSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`).join('; ');
}

/** Validate raw session settings into the immutable config handed to the orchestrator. */
export function parseStreamConfig(input: unknown): Readonly<StreamConfig> {
  const result = streamConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${describeIssues(result.error)}`, result.error);
  }
  return Object.freeze(result.data);
}
