import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CommandResult } from '@splicekit/utils';
import { NotFoundError, ValidationError } from '@splicekit/core';
import type { DurationProvider } from '@splicekit/media';
import { AudioEditor } from './audioEditor.js';
import type { CommandRunner } from './types.js';

class RecordingRunner implements CommandRunner {
  calls: string[][] = [];

  async run(args: string[]): Promise<CommandResult> {
    this.calls.push(args);
    return { exitCode: 0, stdout: '', stderr: '', duration: 1, timedOut: false };
  }
}

describe('AudioEditor', () => {
  let dir: string;
  let runner: RecordingRunner;
  let durations: { getDuration: Mock<DurationProvider['getDuration']> };
  let editor: AudioEditor;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'splicekit-edit-'));
    runner = new RecordingRunner();
    durations = { getDuration: vi.fn<DurationProvider['getDuration']>(async () => 10) };
    editor = new AudioEditor(runner, durations);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('extract', () => {
    it('writes the audio beside the video', async () => {
      const video = join(dir, 'show.mkv');
      await writeFile(video, 'video');

      const result = await editor.extract(video);

      expect(result.outputFile).toBe(join(dir, 'show.flac'));
      expect(runner.calls).toEqual([['-i', video, '-vn', '-c:a', 'flac', join(dir, 'show.flac')]]);
    });

    it('encodes for the requested output', async () => {
      const video = join(dir, 'show.mkv');
      await writeFile(video, 'video');

      await editor.extract(video, join(dir, 'out', 'show.wav'));

      expect(runner.calls[0]).toEqual(['-i', video, '-vn', '-c:a', 'pcm_s16le', join(dir, 'out', 'show.wav')]);
    });

    it('reports a missing video', async () => {
      await expect(editor.extract(join(dir, 'missing.mkv'))).rejects.toBeInstanceOf(NotFoundError);
      expect(runner.calls).toHaveLength(0);
    });
  });

  describe('replace', () => {
    it('pairs the video with its sibling audio file', async () => {
      const video = join(dir, 'show.mkv');
      const audio = join(dir, 'show.flac');
      await writeFile(video, 'video');
      await writeFile(audio, 'audio');

      const result = await editor.replace(video);

      expect(result.outputFile).toBe(join(dir, 'show_replaced.mkv'));
      expect(runner.calls).toEqual([[
        '-i', video,
        '-i', audio,
        '-map', '0:v:0',
        '-map', '1:a:0',
        '-c:v', 'copy',
        '-c:a', 'copy',
        join(dir, 'show_replaced.mkv'),
      ]]);
    });

    it('takes an explicit audio file and output', async () => {
      const video = join(dir, 'show.mp4');
      const audio = join(dir, 'dub.m4a');
      await writeFile(video, 'video');
      await writeFile(audio, 'audio');

      const result = await editor.replace(video, audio, join(dir, 'dubbed.mp4'));

      expect(result.args.slice(0, 4)).toEqual(['-i', video, '-i', audio]);
      expect(result.outputFile).toBe(join(dir, 'dubbed.mp4'));
    });

    it('reports a missing audio file', async () => {
      const video = join(dir, 'show.mkv');
      await writeFile(video, 'video');

      await expect(editor.replace(video)).rejects.toThrow(`Audio file not found: ${join(dir, 'show.flac')}`);
    });
  });

  describe('pad', () => {
    it('delays the start and pads the end', async () => {
      const audio = join(dir, 'take.flac');
      await writeFile(audio, 'audio');

      const result = await editor.pad(audio, { beginMs: 500, endMs: 1000 });

      expect(result.outputFile).toBe(join(dir, 'take_padded.flac'));
      expect(runner.calls).toEqual([[
        '-i', audio,
        '-c:a', 'flac',
        '-af', 'adelay=delays=500:all=1,apad=pad_dur=1.000',
        join(dir, 'take_padded.flac'),
      ]]);
    });

    it('pads only the end', async () => {
      const audio = join(dir, 'take.flac');
      await writeFile(audio, 'audio');

      const result = await editor.pad(audio, { endMs: 250 });

      expect(result.args).toContain('apad=pad_dur=0.250');
      expect(result.args).not.toContain('adelay=delays=0:all=1');
    });

    it('requires at least one edge', async () => {
      const audio = join(dir, 'take.flac');
      await writeFile(audio, 'audio');

      await expect(editor.pad(audio, {})).rejects.toBeInstanceOf(ValidationError);
      await expect(editor.pad(audio, { beginMs: 0, endMs: 0 })).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects negative amounts', async () => {
      const audio = join(dir, 'take.flac');
      await writeFile(audio, 'audio');

      await expect(editor.pad(audio, { beginMs: -5 })).rejects.toThrow(
        'Invalid begin: expected a non-negative whole number of milliseconds, got -5'
      );
    });
  });

  describe('trim', () => {
    it('seeks past the beginning and stops before the end', async () => {
      const audio = join(dir, 'take.flac');
      await writeFile(audio, 'audio');

      const result = await editor.trim(audio, { beginMs: 500, endMs: 1000 });

      expect(durations.getDuration).toHaveBeenCalledWith(audio);
      expect(result.outputFile).toBe(join(dir, 'take_trimmed.flac'));
      expect(runner.calls).toEqual([[
        '-ss', '0.500',
        '-t', '8.500',
        '-i', audio,
        '-c:a', 'flac',
        join(dir, 'take_trimmed.flac'),
      ]]);
    });

    it('trims only the end', async () => {
      const audio = join(dir, 'take.flac');
      await writeFile(audio, 'audio');

      const result = await editor.trim(audio, { endMs: 2000 });

      expect(result.args.slice(0, 4)).toEqual(['-ss', '0.000', '-t', '8.000']);
    });

    it('refuses to trim away the whole file', async () => {
      const audio = join(dir, 'take.flac');
      await writeFile(audio, 'audio');

      await expect(editor.trim(audio, { beginMs: 6000, endMs: 4000 })).rejects.toThrow(
        'Invalid edges: trimming 6000ms + 4000ms leaves nothing of 10.000s'
      );
      expect(runner.calls).toHaveLength(0);
    });
  });
});
