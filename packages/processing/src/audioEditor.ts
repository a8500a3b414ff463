/**
 * Audio Editor
 *
 * Single-file operations: pull audio out of a video, put it back, add
 * silence around a file, cut time off its ends.
 */

import { dirname } from 'node:path';
import {
  ensureDir,
  isFile,
  msToSeconds,
  formatSeconds,
  replaceExtension,
  withSuffix,
  createLogger,
  type Logger,
} from '@splicekit/utils';
import { NotFoundError, ValidationError } from '@splicekit/core';
import type { DurationProvider } from '@splicekit/media';
import {
  FFmpegCommandBuilder,
  audioCodecForFile,
  createAudioExtractCommand,
  createAudioReplaceCommand,
} from './commandBuilder.js';
import { delay, pad } from './filterGraph.js';
import { assertMilliseconds } from './splitter.js';
import type { CommandRunner, EdgeAmounts, EditResult } from './types.js';

/**
 * Both edges are whole non-negative milliseconds and at least one is set
 */
function resolveEdges(edges: EdgeAmounts): { beginMs: number; endMs: number } {
  const { beginMs = 0, endMs = 0 } = edges;
  assertMilliseconds('begin', beginMs);
  assertMilliseconds('end', endMs);

  if (beginMs === 0 && endMs === 0) {
    throw new ValidationError('edges', 'specify a beginning and/or end amount in milliseconds');
  }
  return { beginMs, endMs };
}

export interface AudioEditorOptions {
  /** Extension of extracted audio */
  extension?: string;
}

export class AudioEditor {
  private runner: CommandRunner;
  private durations: DurationProvider;
  private extension: string;
  private log: Logger;

  constructor(runner: CommandRunner, durations: DurationProvider, options: AudioEditorOptions = {}) {
    this.runner = runner;
    this.durations = durations;
    this.extension = options.extension ?? 'flac';
    this.log = createLogger({ component: 'audio-editor' });
  }

  /**
   * Extract the audio of a video to `<video>.flac` (or the given file)
   */
  async extract(videoFile: string, outputFile?: string): Promise<EditResult> {
    await this.requireFile('Input file', videoFile);

    const target = outputFile ?? replaceExtension(videoFile, this.extension);
    return this.execute(createAudioExtractCommand(videoFile, target), target);
  }

  /**
   * Swap the audio of a video for `<video>.flac` (or the given file);
   * both streams are copied, never re-encoded
   */
  async replace(videoFile: string, audioFile?: string, outputFile?: string): Promise<EditResult> {
    await this.requireFile('Input file', videoFile);

    const audio = audioFile ?? replaceExtension(videoFile, this.extension);
    await this.requireFile('Audio file', audio);

    const target = outputFile ?? withSuffix(videoFile, '_replaced', 'mkv');
    return this.execute(createAudioReplaceCommand(videoFile, audio, target), target);
  }

  /**
   * Add silence before and/or after the audio
   */
  async pad(audioFile: string, edges: EdgeAmounts, outputFile?: string): Promise<EditResult> {
    await this.requireFile('Input file', audioFile);
    const { beginMs, endMs } = resolveEdges(edges);

    const target = outputFile ?? withSuffix(audioFile, '_padded');
    const builder = new FFmpegCommandBuilder()
      .addInput(audioFile)
      .setAudioCodec(audioCodecForFile(target))
      .setOutput(target);

    if (beginMs > 0) builder.addAudioFilter(delay(beginMs));
    if (endMs > 0) builder.addAudioFilter(pad(msToSeconds(endMs)));

    return this.execute(builder, target);
  }

  /**
   * Cut time off the beginning and/or end of the audio
   */
  async trim(audioFile: string, edges: EdgeAmounts, outputFile?: string): Promise<EditResult> {
    await this.requireFile('Input file', audioFile);
    const { beginMs, endMs } = resolveEdges(edges);

    const durationSeconds = await this.durations.getDuration(audioFile);
    const remainingSeconds = durationSeconds - msToSeconds(beginMs) - msToSeconds(endMs);

    if (remainingSeconds <= 0) {
      throw new ValidationError(
        'edges',
        `trimming ${beginMs}ms + ${endMs}ms leaves nothing of ${formatSeconds(durationSeconds)}s`
      );
    }

    const target = outputFile ?? withSuffix(audioFile, '_trimmed');
    const builder = new FFmpegCommandBuilder()
      .addInputWithSeek(audioFile, msToSeconds(beginMs), remainingSeconds)
      .setAudioCodec(audioCodecForFile(target))
      .setOutput(target);

    return this.execute(builder, target);
  }

  private async requireFile(resource: string, filePath: string): Promise<void> {
    if (!(await isFile(filePath))) {
      throw new NotFoundError(resource, filePath);
    }
  }

  private async execute(builder: FFmpegCommandBuilder, outputFile: string): Promise<EditResult> {
    const args = builder.build();
    await ensureDir(dirname(outputFile));
    await this.runner.run(args);

    this.log.info({ outputFile }, 'Edit complete');
    return { outputFile, args };
  }
}
