/**
 * CLI Configuration
 *
 * Read from the environment (and a `.env` in the working directory,
 * loaded by the entry point before anything else).
 */

import { z } from 'zod';
import { getBinaryPath, ValidationError } from '@splicekit/core';
import type { LevelWithSilent } from '@splicekit/utils';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
  FFMPEG_PATH: z.string().optional(),
  FFPROBE_PATH: z.string().optional(),
  SPLICEKIT_AUDIO_EXT: z.string()
    .regex(/^\.?[A-Za-z0-9]+$/, 'must be a file extension such as flac')
    .transform(ext => ext.replace(/^\./, '').toLowerCase())
    .default('flac'),
  SPLICEKIT_TIMEOUT_MS: z.string()
    .regex(/^\d+$/, 'must be a whole number of milliseconds')
    .transform(Number)
    .default('3600000'),
});

export interface CliConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LevelWithSilent;
  ffmpegPath: string;
  ffprobePath: string;
  /** Extension (and so codec) of the audio files the tools write and pick up */
  audioExtension: string;
  timeoutMs: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')} ${issue.message}`)
      .join('; ');
    throw new ValidationError('environment', issues);
  }

  const vars = parsed.data;
  return {
    nodeEnv: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL,
    ffmpegPath: getBinaryPath('ffmpeg', env),
    ffprobePath: getBinaryPath('ffprobe', env),
    audioExtension: vars.SPLICEKIT_AUDIO_EXT,
    timeoutMs: vars.SPLICEKIT_TIMEOUT_MS,
  };
}

let cached: CliConfig | null = null;

export function getConfig(): CliConfig {
  cached ??= loadConfig();
  return cached;
}
