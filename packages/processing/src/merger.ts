/**
 * Merger
 *
 * Places N audio files on one timeline and crossfades each seam.
 * File i starts `overlap` seconds before file i-1 ends; across that
 * window file i-1 fades out and file i fades in on quarter-sine curves,
 * whose squared gains sum to 1, and the engine sums the streams.
 */

import { basename, dirname, resolve } from 'node:path';
import {
  copyFile,
  ensureDir,
  formatSeconds,
  isDirectory,
  listFilesByExtension,
  msToSeconds,
  trimTrailingSeparators,
  createLogger,
  type Logger,
} from '@splicekit/utils';
import { NotFoundError, ValidationError } from '@splicekit/core';
import type { DurationProvider } from '@splicekit/media';
import { createGraphCommand } from './commandBuilder.js';
import { delay, fadeIn, fadeOut, mix, type AudioFilter, type FilterGraph } from './filterGraph.js';
import { assertMilliseconds } from './splitter.js';
import type {
  CommandRunner,
  MergeEntry,
  MergeInput,
  MergeOptions,
  MergePlan,
  MergeResult,
} from './types.js';

/**
 * Timeline length after appending one more file
 */
export function nextTotal(
  previousTotal: number,
  durationSeconds: number,
  overlapSeconds: number,
  isFirst: boolean
): number {
  return isFirst ? durationSeconds : previousTotal + durationSeconds - overlapSeconds;
}

/**
 * Gains of the incoming and outgoing file at `progress` (0..1) through a
 * crossfade, matching afade's `qsin` curve
 */
export function equalPowerGains(progress: number): { fadeIn: number; fadeOut: number } {
  const clamped = Math.min(1, Math.max(0, progress));
  return {
    fadeIn: Math.sin(clamped * Math.PI * 0.5),
    fadeOut: Math.cos(clamped * Math.PI * 0.5),
  };
}

/**
 * Merge order: by file name, code unit by code unit, so that
 * track_01 … track_99 written by the Splitter come back in order
 */
export function sortTrackFiles(files: readonly string[]): string[] {
  const compare = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);
  return [...files].sort((a, b) => compare(basename(a), basename(b)) || compare(a, b));
}

export function defaultMergeOutputFile(inputDir: string, extension: string): string {
  return `${trimTrailingSeparators(inputDir)}_merged.${extension}`;
}

/**
 * Plan placement and fades for an ordered list of files
 */
export function planMerge(inputs: readonly MergeInput[], overlapMs: number = 0): MergePlan {
  assertMilliseconds('overlap', overlapMs);

  if (inputs.length === 0) {
    throw new NotFoundError('Audio files', 'nothing to merge');
  }

  const overlapSeconds = msToSeconds(overlapMs);
  const lastIndex = inputs.length - 1;
  const crossfade = inputs.length > 1 && overlapSeconds > 0;

  const { entries, total } = inputs.reduce<{ entries: MergeEntry[]; total: number }>(
    (acc, input, i) => {
      const isFirst = i === 0;
      const { durationSeconds } = input;

      if (!Number.isFinite(durationSeconds) || durationSeconds < 0) {
        throw new ValidationError('duration', `${input.file} reported ${durationSeconds}s`);
      }

      const hasFadeIn = crossfade && !isFirst;
      const hasFadeOut = crossfade && i !== lastIndex;

      if ((hasFadeIn || hasFadeOut) && overlapSeconds > durationSeconds) {
        throw new ValidationError(
          'overlap',
          `${overlapMs}ms is longer than ${basename(input.file)} (${formatSeconds(durationSeconds)}s)`
        );
      }

      // Fade-in and fade-out of a middle file must not overlap each other
      if (hasFadeIn && hasFadeOut && 2 * overlapSeconds > durationSeconds) {
        throw new ValidationError(
          'overlap',
          `${basename(input.file)} (${formatSeconds(durationSeconds)}s) is shorter than ` +
          `two crossfades of ${overlapMs}ms`
        );
      }

      const entry: MergeEntry = {
        ...input,
        startOffsetSeconds: isFirst ? 0 : acc.total - overlapSeconds,
        fadeIn: hasFadeIn ? fadeIn(overlapSeconds) : null,
        fadeOut: hasFadeOut ? fadeOut(durationSeconds - overlapSeconds, overlapSeconds) : null,
      };

      return {
        entries: [...acc.entries, entry],
        total: nextTotal(acc.total, durationSeconds, overlapSeconds, isFirst),
      };
    },
    { entries: [], total: 0 }
  );

  return { entries, overlapSeconds, totalDurationSeconds: total };
}

/**
 * Fade, then delay, each input; sum everything into [out]
 */
export function buildMergeGraph(plan: MergePlan): FilterGraph {
  const chains = plan.entries.map((entry, i) => {
    const filters: AudioFilter[] = [];
    if (entry.fadeIn) filters.push(entry.fadeIn);
    if (entry.fadeOut) filters.push(entry.fadeOut);
    if (entry.startOffsetSeconds > 0) filters.push(delay(entry.startOffsetSeconds * 1000));

    return { inputs: [`${i}:a`], filters, output: `a${i}` };
  });

  return {
    chains: [
      ...chains,
      {
        inputs: chains.map(chain => chain.output),
        filters: [mix(plan.entries.length)],
        output: 'out',
      },
    ],
    output: 'out',
  };
}

export interface MergerOptions {
  /** Extension of the files to pick up, and of the default output */
  extension?: string;
}

export class Merger {
  private runner: CommandRunner;
  private durations: DurationProvider;
  private extension: string;
  private log: Logger;

  constructor(runner: CommandRunner, durations: DurationProvider, options: MergerOptions = {}) {
    this.runner = runner;
    this.durations = durations;
    this.extension = options.extension ?? 'flac';
    this.log = createLogger({ component: 'merger' });
  }

  async merge(options: MergeOptions): Promise<MergeResult> {
    const { inputDir, overlapMs = 0 } = options;
    assertMilliseconds('overlap', overlapMs);

    if (!(await isDirectory(inputDir))) {
      throw new NotFoundError('Input directory', inputDir);
    }

    const outputFile = options.outputFile ?? defaultMergeOutputFile(inputDir, this.extension);
    const found = await listFilesByExtension(inputDir, this.extension);
    // A previous merge written into the directory is not one of the tracks
    const files = sortTrackFiles(found.filter(file => resolve(file) !== resolve(outputFile)));

    if (files.length === 0) {
      throw new NotFoundError(`*.${this.extension} files`, inputDir);
    }

    await ensureDir(dirname(outputFile));

    if (files.length === 1 && files[0] !== undefined) {
      await copyFile(files[0], outputFile);
      this.log.info({ source: files[0], outputFile }, 'Single file copied');
      return { mode: 'copy', outputFile, files };
    }

    const inputs: MergeInput[] = [];
    for (const file of files) {
      inputs.push({ file, durationSeconds: await this.durations.getDuration(file) });
    }

    const plan = planMerge(inputs, overlapMs);
    for (const entry of plan.entries) {
      this.log.debug({
        file: entry.file,
        duration: entry.durationSeconds,
        offset: entry.startOffsetSeconds,
        fadeIn: entry.fadeIn !== null,
        fadeOut: entry.fadeOut !== null,
      }, 'Placing track');
    }

    const args = createGraphCommand(files, buildMergeGraph(plan), outputFile).build();
    await this.runner.run(args);

    this.log.info({ outputFile, count: files.length, total: plan.totalDurationSeconds }, 'Merge complete');
    return { mode: 'mix', outputFile, files, plan };
  }
}
