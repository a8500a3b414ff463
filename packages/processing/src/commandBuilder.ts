/**
 * FFmpeg Command Builder
 *
 * Fluent API for assembling ffmpeg argument lists. Produces arguments
 * only; running them is FFmpeg's job.
 */

import { formatSeconds, getExtension, createLogger } from '@splicekit/utils';
import { renderFilterChain, renderFilterGraph, type AudioFilter, type FilterGraph } from './filterGraph.js';

export interface InputOptions {
  seekTo?: number;        // -ss before input, seconds
  duration?: number;      // -t, seconds
}

export type AudioCodec = 'copy' | 'flac' | 'pcm_s16le' | 'pcm_s24le' | 'aac' | 'libopus' | 'libmp3lame' | 'libvorbis';

const CODEC_BY_EXTENSION: Record<string, AudioCodec> = {
  flac: 'flac',
  wav: 'pcm_s16le',
  m4a: 'aac',
  aac: 'aac',
  opus: 'libopus',
  mp3: 'libmp3lame',
  ogg: 'libvorbis',
};

/**
 * Encoder for an output file, picked from its extension (FLAC otherwise)
 */
export function audioCodecForFile(file: string): AudioCodec {
  return CODEC_BY_EXTENSION[getExtension(file)] ?? 'flac';
}

export class FFmpegCommandBuilder {
  private inputs: { file: string; options: InputOptions }[] = [];
  private mappings: string[] = [];
  private videoCodec: 'copy' | null = null;
  private disableVideo = false;
  private audioCodec: AudioCodec | null = null;
  private audioFilters: AudioFilter[] = [];
  private complexFilter: FilterGraph | null = null;
  private outputFile: string = '';
  private log = createLogger({ component: 'command-builder' });

  /**
   * Add input file
   */
  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Add input with seeking; omit duration to read to the end
   */
  addInputWithSeek(file: string, seekSeconds: number, duration?: number): this {
    return this.addInput(file, { seekTo: seekSeconds, duration });
  }

  /**
   * Map a stream from an input
   */
  map(inputIndex: number, streamSpec: string): this {
    this.mappings.push(`${inputIndex}:${streamSpec}`);
    return this;
  }

  /**
   * Map the output label of the complex filter graph
   */
  mapFilterOutput(label: string): this {
    this.mappings.push(`[${label}]`);
    return this;
  }

  /**
   * Copy video without re-encoding
   */
  copyVideo(): this {
    this.videoCodec = 'copy';
    return this;
  }

  /**
   * Drop video from the output (-vn)
   */
  noVideo(): this {
    this.disableVideo = true;
    return this;
  }

  /**
   * Set audio codec (copy = no re-encode)
   */
  setAudioCodec(codec: AudioCodec): this {
    this.audioCodec = codec;
    return this;
  }

  /**
   * Add audio filter
   */
  addAudioFilter(filter: AudioFilter): this {
    this.audioFilters.push(filter);
    return this;
  }

  /**
   * Set complex filter graph
   */
  setComplexFilter(graph: FilterGraph): this {
    this.complexFilter = graph;
    return this;
  }

  /**
   * Set output file
   */
  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [];

    // Inputs
    for (const input of this.inputs) {
      if (input.options.seekTo !== undefined) {
        args.push('-ss', formatSeconds(input.options.seekTo));
      }
      if (input.options.duration !== undefined) {
        args.push('-t', formatSeconds(input.options.duration));
      }
      args.push('-i', input.file);
    }

    // Complex filter (before mappings)
    if (this.complexFilter) {
      args.push('-filter_complex', renderFilterGraph(this.complexFilter));
    }

    // Mappings
    for (const mapping of this.mappings) {
      args.push('-map', mapping);
    }

    // Video
    if (this.disableVideo) {
      args.push('-vn');
    } else if (this.videoCodec) {
      args.push('-c:v', this.videoCodec);
    }

    // Audio codec
    if (this.audioCodec) {
      args.push('-c:a', this.audioCodec);
    }

    // Audio filters (only if not copying)
    if (this.audioFilters.length > 0) {
      if (this.audioCodec === 'copy') {
        this.log.warn('Audio filters specified but codec is copy - filters will be ignored');
      } else {
        args.push('-af', renderFilterChain(this.audioFilters));
      }
    }

    // Output file
    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}

// ============================================
// COMMAND FACTORIES
// ============================================

/**
 * Extract one window of an audio file. Null duration reads to the end.
 */
export function createSegmentCommand(
  inputFile: string,
  outputFile: string,
  startSeconds: number,
  durationSeconds: number | null
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addInputWithSeek(inputFile, startSeconds, durationSeconds ?? undefined)
    .setAudioCodec(audioCodecForFile(outputFile))
    .setOutput(outputFile);
}

/**
 * Create a command for audio extraction (video dropped, audio re-encoded)
 */
export function createAudioExtractCommand(
  videoFile: string,
  outputFile: string
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addInput(videoFile)
    .noVideo()
    .setAudioCodec(audioCodecForFile(outputFile))
    .setOutput(outputFile);
}

/**
 * Create a command that keeps the first video stream and swaps in the
 * first audio stream of another file, both stream-copied
 */
export function createAudioReplaceCommand(
  videoFile: string,
  audioFile: string,
  outputFile: string
): FFmpegCommandBuilder {
  return new FFmpegCommandBuilder()
    .addInput(videoFile)
    .addInput(audioFile)
    .copyVideo()
    .setAudioCodec('copy')
    .map(0, 'v:0')
    .map(1, 'a:0')
    .setOutput(outputFile);
}

/**
 * Run several inputs through a complex graph into one file
 */
export function createGraphCommand(
  inputFiles: readonly string[],
  graph: FilterGraph,
  outputFile: string
): FFmpegCommandBuilder {
  const builder = new FFmpegCommandBuilder();
  for (const file of inputFiles) {
    builder.addInput(file);
  }
  return builder
    .setComplexFilter(graph)
    .mapFilterOutput(graph.output)
    .setAudioCodec(audioCodecForFile(outputFile))
    .setOutput(outputFile);
}
