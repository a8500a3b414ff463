/**
 * FFProbe Wrapper
 *
 * Safe wrapper for ffprobe command execution. Output is JSON, checked
 * against a schema before anything reads it.
 */

import { z } from 'zod';
import {
  executeCommand,
  isFile,
  createLogger,
  type CommandExecutor,
  type CommandResult,
} from '@splicekit/utils';
import {
  getBinaryPath,
  NotFoundError,
  UnreadableMediaError,
  CommandExecutionError,
} from '@splicekit/core';
import type { DurationProvider } from '../types.js';

const streamSchema = z.object({
  index: z.number(),
  codec_name: z.string().default('unknown'),
  codec_long_name: z.string().optional(),
  profile: z.string().optional(),
  codec_type: z.string(),
  time_base: z.string().optional(),
  start_time: z.string().optional(),
  duration: z.string().optional(),
  bit_rate: z.string().optional(),
  // Video specific
  width: z.number().optional(),
  height: z.number().optional(),
  pix_fmt: z.string().optional(),
  r_frame_rate: z.string().optional(),
  avg_frame_rate: z.string().optional(),
  // Audio specific
  sample_rate: z.string().optional(),
  channels: z.number().optional(),
  channel_layout: z.string().optional(),
  bits_per_raw_sample: z.string().optional(),
  // Common
  disposition: z.record(z.number()).optional(),
  tags: z.record(z.string()).optional(),
});

const formatSchema = z.object({
  filename: z.string(),
  nb_streams: z.number(),
  format_name: z.string(),
  format_long_name: z.string().optional(),
  start_time: z.string().optional(),
  duration: z.string().optional(),
  size: z.string().optional(),
  bit_rate: z.string().optional(),
  tags: z.record(z.string()).optional(),
});

const probeSchema = z.object({
  format: formatSchema,
  streams: z.array(streamSchema).default([]),
});

const durationSchema = z.object({
  format: z.object({
    duration: z.string().optional(),
  }),
});

export type FFProbeStream = z.infer<typeof streamSchema>;
export type FFProbeResult = z.infer<typeof probeSchema>;

/**
 * Parse a JSON payload from ffprobe against a schema
 *
 * Returns null when the text is not JSON or does not match.
 */
function parseProbeJson<T extends z.ZodTypeAny>(schema: T, stdout: string): z.infer<T> | null {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Read the container duration (seconds) from
 * `ffprobe -show_entries format=duration -of json` output
 */
export function parseDurationOutput(stdout: string): number | null {
  const parsed = parseProbeJson(durationSchema, stdout);
  const value = parsed?.format.duration;
  if (value === undefined) return null;

  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}

export function parseProbeOutput(stdout: string): FFProbeResult | null {
  return parseProbeJson(probeSchema, stdout);
}

export class FFProbe implements DurationProvider {
  private ffprobePath: string;
  private exec: CommandExecutor;
  private log = createLogger({ component: 'ffprobe' });

  constructor(ffprobePath: string = getBinaryPath('ffprobe'), exec: CommandExecutor = executeCommand) {
    this.ffprobePath = ffprobePath;
    this.exec = exec;
  }

  /**
   * Probe a media file and return its format and streams
   */
  async probe(filePath: string): Promise<FFProbeResult> {
    const stdout = await this.run(filePath, [
      '-v', 'error',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      filePath,
    ]);

    const result = parseProbeOutput(stdout);
    if (!result) {
      throw new UnreadableMediaError(filePath, 'unexpected ffprobe output');
    }
    return result;
  }

  /**
   * Duration of a media file in seconds
   */
  async getDuration(filePath: string): Promise<number> {
    const stdout = await this.run(filePath, [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'json',
      filePath,
    ]);

    const seconds = parseDurationOutput(stdout);
    if (seconds === null) {
      throw new UnreadableMediaError(filePath, 'no duration reported');
    }

    this.log.debug({ filePath, seconds }, 'Duration probed');
    return seconds;
  }

  private async run(filePath: string, args: string[]): Promise<string> {
    if (!(await isFile(filePath))) {
      throw new NotFoundError('Media file', filePath);
    }

    let result: CommandResult;
    try {
      result = await this.exec(this.ffprobePath, args, { timeout: 60000 });
    } catch (error) {
      throw new CommandExecutionError(
        this.ffprobePath,
        127,
        error instanceof Error ? error.message : String(error)
      );
    }

    if (result.exitCode !== 0) {
      throw new UnreadableMediaError(
        filePath,
        result.stderr.trim() || `ffprobe exited with code ${result.exitCode}`
      );
    }

    return result.stdout;
  }
}
