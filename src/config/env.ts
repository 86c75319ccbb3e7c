import dotenv from 'dotenv';
import { z } from 'zod';
import path from 'path';

// Load environment variables
dotenv.config();

const booleanFlag = (fallback: 'true' | 'false') =>
  z
    .string()
    .default(fallback)
    .transform((val) => val === 'true');

// Environment validation schema
const envSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().min(1).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),

  // Security
  AUTH_TOKEN: z.string().min(8).default('change-this-token'),
  REQUIRE_AUTH: booleanFlag('true'),
  RATE_LIMIT_MAX: z.coerce.number().positive().default(600),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().positive().default(60000),

  // Layout
  STREAM_CTL_DIR: z.string().default('/var/streamctl'),

  // FFmpeg
  FFMPEG_BIN: z.string().default('/usr/bin/ffmpeg'),
  VIDEO_CODEC: z.string().default('libx264'),
  VIDEO_PRESET: z
    .enum(['ultrafast', 'superfast', 'veryfast', 'faster', 'fast', 'medium', 'slow', 'slower', 'veryslow'])
    .default('veryfast'),
  VIDEO_TUNE: z.string().default('zerolatency'),
  VIDEO_BITRATE: z.string().default('2000k'),
  AUDIO_CODEC: z.string().default('aac'),
  AUDIO_SAMPLE_RATE: z.string().regex(/^\d+$/).default('44100'),
  AUDIO_BITRATE: z.string().default('128k'),
  OUTPUT_FORMAT: z.string().default('flv'),

  // Supervisor
  STOP_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  KILL_TIMEOUT_MS: z.coerce.number().int().positive().default(2000),
  LIVENESS_POLL_MS: z.coerce.number().int().positive().default(100),
  REAPER_INTERVAL_MS: z.coerce.number().int().min(0).default(10000), // 0 disables the periodic sweep
  STOP_STREAMS_ON_SHUTDOWN: booleanFlag('false'),
  LOG_TAIL_DEFAULT_LINES: z.coerce.number().int().positive().default(200),
  LOG_TAIL_MAX_LINES: z.coerce.number().int().positive().default(10000),

  // Logging
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  LOG_FORMAT: z.enum(['pretty', 'json']).default('pretty'),
  LOG_FILE: z.string().optional(),
});

// Validate and export
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('Invalid environment variables:');
  console.error(JSON.stringify(parsed.error.format(), null, 2));
  process.exit(1);
}

export const env = parsed.data;

const baseDir = path.resolve(env.STREAM_CTL_DIR);

// Derived configuration
export const config = {
  server: {
    port: env.PORT,
    host: env.HOST,
    isDevelopment: env.NODE_ENV === 'development',
    isProduction: env.NODE_ENV === 'production',
    isTest: env.NODE_ENV === 'test',
  },

  security: {
    authToken: env.AUTH_TOKEN,
    requireAuth: env.REQUIRE_AUTH,
    rateLimit: {
      max: env.RATE_LIMIT_MAX,
      windowMs: env.RATE_LIMIT_WINDOW_MS,
    },
  },

  paths: {
    base: baseDir,
    pids: path.join(baseDir, 'pids'),
    logs: path.join(baseDir, 'logs'),
    meta: path.join(baseDir, 'meta'),
  },

  ffmpeg: {
    path: env.FFMPEG_BIN,
    outputFormat: env.OUTPUT_FORMAT,
    video: {
      codec: env.VIDEO_CODEC,
      preset: env.VIDEO_PRESET,
      tune: env.VIDEO_TUNE,
      bitrate: env.VIDEO_BITRATE,
    },
    audio: {
      codec: env.AUDIO_CODEC,
      sampleRate: env.AUDIO_SAMPLE_RATE,
      bitrate: env.AUDIO_BITRATE,
    },
  },

  supervisor: {
    stopTimeoutMs: env.STOP_TIMEOUT_MS,
    killTimeoutMs: env.KILL_TIMEOUT_MS,
    pollIntervalMs: env.LIVENESS_POLL_MS,
    reaperIntervalMs: env.REAPER_INTERVAL_MS,
    stopStreamsOnShutdown: env.STOP_STREAMS_ON_SHUTDOWN,
  },

  logs: {
    defaultTailLines: env.LOG_TAIL_DEFAULT_LINES,
    maxTailLines: env.LOG_TAIL_MAX_LINES,
  },

  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE,
  },
} as const;

export type Config = typeof config;
