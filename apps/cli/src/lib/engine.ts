/**
 * Engine wiring
 *
 * Builds the processing services over the real ffmpeg and ffprobe.
 * Call after the log level is set: services take child loggers when
 * they are constructed.
 */

import { FFProbe, MediaAnalyzer } from '@splicekit/media';
import { FFmpeg, Splitter, Merger, AudioEditor } from '@splicekit/processing';
import type { CliConfig } from '../config/index.js';

export interface Services {
  splitter: Splitter;
  merger: Merger;
  editor: AudioEditor;
  analyzer: MediaAnalyzer;
}

export function createServices(config: CliConfig): Services {
  const ffmpeg = new FFmpeg(config.ffmpegPath, { timeout: config.timeoutMs });
  const ffprobe = new FFProbe(config.ffprobePath);
  const options = { extension: config.audioExtension };

  return {
    splitter: new Splitter(ffmpeg, options),
    merger: new Merger(ffmpeg, ffprobe, options),
    editor: new AudioEditor(ffmpeg, ffprobe, options),
    analyzer: new MediaAnalyzer(ffprobe),
  };
}
