import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CommandResult } from '@splicekit/utils';
import { CommandExecutionError, NotFoundError, ValidationError } from '@splicekit/core';
import {
  Splitter,
  planSplit,
  parseTimestamps,
  trackFileName,
  defaultSplitOutputDir,
} from './splitter.js';
import type { CommandRunner, SplitTrack } from './types.js';

class RecordingRunner implements CommandRunner {
  calls: string[][] = [];

  constructor(private failOnCall?: number) {}

  async run(args: string[]): Promise<CommandResult> {
    this.calls.push(args);
    if (this.calls.length === this.failOnCall) {
      throw new CommandExecutionError('ffmpeg', 1, 'Conversion failed!\n');
    }
    return { exitCode: 0, stdout: '', stderr: '', duration: 1, timedOut: false };
  }
}

describe('planSplit', () => {
  it('cuts hard at each timestamp without overlap', () => {
    expect(planSplit([3000, 7000], 0)).toEqual([
      { index: 1, startMs: 0, durationMs: 3000 },
      { index: 2, startMs: 3000, durationMs: 4000 },
      { index: 3, startMs: 7000, durationMs: null },
    ]);
  });

  it('starts each later track overlapMs before its split point', () => {
    expect(planSplit([3000, 7000], 200)).toEqual([
      { index: 1, startMs: 0, durationMs: 3000 },
      { index: 2, startMs: 2800, durationMs: 4200 },
      { index: 3, startMs: 6800, durationMs: null },
    ]);
  });

  it('produces a single split as two tracks', () => {
    expect(planSplit([225123])).toEqual([
      { index: 1, startMs: 0, durationMs: 225123 },
      { index: 2, startMs: 225123, durationMs: null },
    ]);
  });

  it('keeps tracks contiguous when there is no overlap', () => {
    const sequences = [[1], [1000, 2000, 3000], [999, 60001, 3600000, 3600001]];

    for (const timestamps of sequences) {
      const segments = planSplit(timestamps, 0);
      for (let i = 1; i < segments.length; i++) {
        const previous = segments[i - 1];
        const current = segments[i];
        expect(previous?.durationMs).not.toBeNull();
        expect(current?.startMs).toBe((previous?.startMs ?? NaN) + (previous?.durationMs ?? NaN));
      }
    }
  });

  it('ends every bounded track exactly on its timestamp', () => {
    const timestamps = [225123, 510456, 777001];
    const segments = planSplit(timestamps, 350);

    timestamps.forEach((timestamp, i) => {
      const segment = segments[i];
      expect((segment?.startMs ?? NaN) + (segment?.durationMs ?? NaN)).toBe(timestamp);
    });
    expect(segments.slice(1).map(s => s.startMs)).toEqual([225123 - 350, 510456 - 350, 777001 - 350]);
  });

  it('rejects an overlap wider than the gap between two timestamps', () => {
    expect(() => planSplit([3000, 4000, 9000], 2000)).toThrow(
      'Invalid overlap: 2000ms is longer than the 1000ms between 00:00:03.000 and 00:00:04.000'
    );
  });

  it('allows a middle track of exactly two overlaps', () => {
    expect(planSplit([3000, 5000, 9000], 2000)).toEqual([
      { index: 1, startMs: 0, durationMs: 3000 },
      { index: 2, startMs: 1000, durationMs: 4000 },
      { index: 3, startMs: 3000, durationMs: 6000 },
      { index: 4, startMs: 7000, durationMs: null },
    ]);
  });

  it('rejects an overlap that reaches before the start of the file', () => {
    expect(() => planSplit([3000, 7000], 3500)).toThrow(
      'Invalid overlap: 3500ms reaches before the start of the file at split point 00:00:03.000'
    );
  });

  it('rejects missing timestamps', () => {
    expect(() => planSplit([], 0)).toThrow(ValidationError);
  });

  it('rejects negative or fractional overlaps', () => {
    expect(() => planSplit([3000], -1)).toThrow('Invalid overlap');
    expect(() => planSplit([3000], 1.5)).toThrow('Invalid overlap');
  });

  it('rejects timestamps that are not strictly increasing', () => {
    expect(() => planSplit([7000, 3000])).toThrow(
      'Invalid timestamp: 00:00:03.000 must come after 00:00:07.000; timestamps must be strictly increasing'
    );
    expect(() => planSplit([3000, 3000])).toThrow(ValidationError);
  });

  it('rejects a split at zero', () => {
    expect(() => planSplit([0, 3000])).toThrow('Invalid timestamp: 00:00:00.000 must be after 00:00:00.000');
  });
});

describe('parseTimestamps', () => {
  it('parses every timestamp', () => {
    expect(parseTimestamps(['00:03:45.123', '00:08:30.456'])).toEqual([225123, 510456]);
  });

  it('reports malformed timestamps as invalid input', () => {
    expect(() => parseTimestamps(['3:45'])).toThrow(
      'Invalid timestamp: Invalid timecode format: 3:45 (expected HH:MM:SS.mmm)'
    );
  });
});

describe('naming', () => {
  it('zero-pads track numbers to two digits', () => {
    expect(trackFileName(1, 'flac')).toBe('track_01.flac');
    expect(trackFileName(12, 'wav')).toBe('track_12.wav');
    expect(trackFileName(100, 'flac')).toBe('track_100.flac');
  });

  it('derives the output directory from the input name', () => {
    expect(defaultSplitOutputDir('music/album.flac')).toBe('music/album_tracks');
  });
});

describe('Splitter', () => {
  let workDir: string;
  let inputFile: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'splicekit-split-'));
    inputFile = join(workDir, 'album.flac');
    await writeFile(inputFile, 'audio');
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  it('extracts every track in order into the default directory', async () => {
    const runner = new RecordingRunner();
    const outputDir = join(workDir, 'album_tracks');

    const result = await new Splitter(runner).split({
      inputFile,
      timestamps: ['00:00:03.000', '00:00:07.000'],
      overlapMs: 200,
    });

    expect(existsSync(outputDir)).toBe(true);
    expect(runner.calls).toEqual([
      ['-ss', '0.000', '-t', '3.000', '-i', inputFile, '-c:a', 'flac', join(outputDir, 'track_01.flac')],
      ['-ss', '2.800', '-t', '4.200', '-i', inputFile, '-c:a', 'flac', join(outputDir, 'track_02.flac')],
      ['-ss', '6.800', '-i', inputFile, '-c:a', 'flac', join(outputDir, 'track_03.flac')],
    ]);
    expect(result).toEqual({
      outputDir,
      tracks: [
        { index: 1, file: join(outputDir, 'track_01.flac'), startSeconds: 0, durationSeconds: 3 },
        { index: 2, file: join(outputDir, 'track_02.flac'), startSeconds: 2.8, durationSeconds: 4.2 },
        { index: 3, file: join(outputDir, 'track_03.flac'), startSeconds: 6.8, durationSeconds: null },
      ],
    });
  });

  it('writes into an existing custom directory with the configured extension', async () => {
    const runner = new RecordingRunner();
    const outputDir = join(workDir, 'custom');

    await new Splitter(runner, { extension: 'wav' }).split({
      inputFile,
      outputDir,
      timestamps: ['00:00:05.000'],
    });
    await new Splitter(runner, { extension: 'wav' }).split({
      inputFile,
      outputDir,
      timestamps: ['00:00:05.000'],
    });

    expect(runner.calls[1]).toEqual([
      '-ss', '5.000', '-i', inputFile, '-c:a', 'pcm_s16le', join(outputDir, 'track_02.wav'),
    ]);
  });

  it('stops at the first engine failure and keeps earlier tracks', async () => {
    const runner = new RecordingRunner(2);
    const written: SplitTrack[] = [];

    const split = new Splitter(runner).split({
      inputFile,
      timestamps: ['00:00:03.000', '00:00:07.000'],
      onTrack: track => written.push(track),
    });

    await expect(split).rejects.toBeInstanceOf(CommandExecutionError);
    expect(runner.calls).toHaveLength(2);
    expect(written.map(track => track.index)).toEqual([1]);
  });

  it('fails before doing anything when the input is missing', async () => {
    const runner = new RecordingRunner();

    await expect(new Splitter(runner).split({
      inputFile: join(workDir, 'missing.flac'),
      timestamps: ['00:00:03.000'],
    })).rejects.toBeInstanceOf(NotFoundError);

    expect(runner.calls).toHaveLength(0);
    expect(existsSync(join(workDir, 'missing_tracks'))).toBe(false);
  });

  it('validates timestamps before creating the output directory', async () => {
    const runner = new RecordingRunner();

    await expect(new Splitter(runner).split({
      inputFile,
      timestamps: ['00:00:07.000', '00:00:03.000'],
    })).rejects.toBeInstanceOf(ValidationError);

    expect(runner.calls).toHaveLength(0);
    expect(existsSync(join(workDir, 'album_tracks'))).toBe(false);
  });
});
