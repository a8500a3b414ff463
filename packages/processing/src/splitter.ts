/**
 * Splitter
 *
 * Cuts one audio file into K+1 tracks at K timestamps. Each track after
 * the first starts `overlapMs` before its split point, so neighbouring
 * tracks share that much audio and can be crossfaded back together by
 * the Merger.
 *
 * All boundary arithmetic is in integer milliseconds:
 * start + duration of track i is exactly timestamp i.
 */

import { join } from 'node:path';
import {
  ensureDir,
  isFile,
  parseTimecode,
  formatTimecode,
  stripExtension,
  msToSeconds,
  createLogger,
  type Logger,
} from '@splicekit/utils';
import { ValidationError, NotFoundError } from '@splicekit/core';
import { createSegmentCommand } from './commandBuilder.js';
import type { CommandRunner, Segment, SplitOptions, SplitResult, SplitTrack } from './types.js';

/**
 * Overlaps and paddings are whole, non-negative milliseconds
 */
export function assertMilliseconds(field: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ValidationError(field, `expected a non-negative whole number of milliseconds, got ${value}`);
  }
}

/**
 * Parse HH:MM:SS.mmm split points to milliseconds
 */
export function parseTimestamps(timestamps: readonly string[]): number[] {
  return timestamps.map(timestamp => {
    try {
      return parseTimecode(timestamp);
    } catch (error) {
      throw new ValidationError('timestamp', error instanceof Error ? error.message : String(error));
    }
  });
}

/**
 * Plan the segment windows for a split
 *
 * - track 1:        [0, T1)
 * - track i (≤ K):  [T(i-1) - overlap, T(i))
 * - track K+1:      [T(K) - overlap, end of file)
 */
export function planSplit(timestampsMs: readonly number[], overlapMs: number = 0): Segment[] {
  assertMilliseconds('overlap', overlapMs);

  if (timestampsMs.length === 0) {
    throw new ValidationError('timestamps', 'at least one timestamp must be provided');
  }

  timestampsMs.forEach((current, i) => {
    if (!Number.isInteger(current) || current <= 0) {
      throw new ValidationError('timestamp', `${formatTimecode(current)} must be after 00:00:00.000`);
    }
    const previous = timestampsMs[i - 1];
    if (previous !== undefined && current <= previous) {
      throw new ValidationError(
        'timestamp',
        `${formatTimecode(current)} must come after ${formatTimecode(previous)}; timestamps must be strictly increasing`
      );
    }
    // Track i+1 spans (previous - overlap, current); merging fades it in
    // and out over `overlap` each, so the two fades must not meet
    if (previous !== undefined && current - previous < overlapMs) {
      throw new ValidationError(
        'overlap',
        `${overlapMs}ms is longer than the ${current - previous}ms between ` +
        `${formatTimecode(previous)} and ${formatTimecode(current)}`
      );
    }
  });

  const segments: Segment[] = [];
  let previousMs = 0;

  for (const [i, boundaryMs] of [...timestampsMs, null].entries()) {
    const index = i + 1;
    const startMs = index === 1 ? 0 : previousMs - overlapMs;

    if (startMs < 0) {
      throw new ValidationError(
        'overlap',
        `${overlapMs}ms reaches before the start of the file at split point ${formatTimecode(previousMs)}`
      );
    }

    segments.push({
      index,
      startMs,
      durationMs: boundaryMs === null ? null : boundaryMs - startMs,
    });

    if (boundaryMs !== null) {
      previousMs = boundaryMs;
    }
  }

  return segments;
}

/**
 * track_01.flac, track_02.flac, ... (wider than two digits past 99)
 */
export function trackFileName(index: number, extension: string): string {
  return `track_${index.toString().padStart(2, '0')}.${extension}`;
}

export function defaultSplitOutputDir(inputFile: string): string {
  return `${stripExtension(inputFile)}_tracks`;
}

export interface SplitterOptions {
  /** Extension, and so codec, of the written tracks */
  extension?: string;
}

export class Splitter {
  private runner: CommandRunner;
  private extension: string;
  private log: Logger;

  constructor(runner: CommandRunner, options: SplitterOptions = {}) {
    this.runner = runner;
    this.extension = options.extension ?? 'flac';
    this.log = createLogger({ component: 'splitter' });
  }

  /**
   * Write every track, one engine call at a time. A failing call stops
   * the split; tracks already written stay on disk.
   */
  async split(options: SplitOptions): Promise<SplitResult> {
    const { inputFile, overlapMs = 0 } = options;

    if (!(await isFile(inputFile))) {
      throw new NotFoundError('Input file', inputFile);
    }

    const segments = planSplit(parseTimestamps(options.timestamps), overlapMs);
    const outputDir = options.outputDir ?? defaultSplitOutputDir(inputFile);

    await ensureDir(outputDir);

    const tracks: SplitTrack[] = [];
    for (const segment of segments) {
      const track: SplitTrack = {
        index: segment.index,
        file: join(outputDir, trackFileName(segment.index, this.extension)),
        startSeconds: msToSeconds(segment.startMs),
        durationSeconds: segment.durationMs === null ? null : msToSeconds(segment.durationMs),
      };

      this.log.debug({ ...track, overlapMs }, 'Extracting track');

      const args = createSegmentCommand(
        inputFile,
        track.file,
        track.startSeconds,
        track.durationSeconds
      ).build();
      await this.runner.run(args);

      tracks.push(track);
      options.onTrack?.(track);
    }

    this.log.info({ inputFile, outputDir, count: tracks.length }, 'Split complete');
    return { outputDir, tracks };
  }
}
