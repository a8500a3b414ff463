/**
 * Media Analyzer
 *
 * Turns raw ffprobe output into the metadata the `info` command prints.
 */

import { basename } from 'node:path';
import { FFProbe, type FFProbeResult, type FFProbeStream } from './probes/ffprobe.js';
import type { MediaMetadata, VideoStream, AudioStream, SubtitleStream } from './types.js';

export class MediaAnalyzer {
  private ffprobe: FFProbe;

  constructor(ffprobe: FFProbe = new FFProbe()) {
    this.ffprobe = ffprobe;
  }

  async analyze(filePath: string): Promise<MediaMetadata> {
    const result = await this.ffprobe.probe(filePath);
    return toMediaMetadata(filePath, result);
  }
}

export function toMediaMetadata(filePath: string, probe: FFProbeResult): MediaMetadata {
  const { format, streams } = probe;

  return {
    filePath,
    fileName: basename(filePath),
    fileSize: parseOptionalInt(format.size) ?? 0,

    format: format.format_name,
    formatLongName: format.format_long_name,
    duration: parseOptionalFloat(format.duration) ?? 0,
    bitRate: parseOptionalInt(format.bit_rate),
    tags: format.tags ?? {},

    videoStreams: streams.filter(s => s.codec_type === 'video').map(toVideoStream),
    audioStreams: streams.filter(s => s.codec_type === 'audio').map(toAudioStream),
    subtitleStreams: streams.filter(s => s.codec_type === 'subtitle').map(toSubtitleStream),
  };
}

function toVideoStream(s: FFProbeStream): VideoStream {
  return {
    index: s.index,
    codec: s.codec_name,
    codecLongName: s.codec_long_name,
    profile: s.profile,
    width: s.width ?? 0,
    height: s.height ?? 0,
    pixelFormat: s.pix_fmt,
    fps: parseFrameRate(s.avg_frame_rate ?? s.r_frame_rate ?? '0/1'),
    bitRate: parseOptionalInt(s.bit_rate),
    language: s.tags?.['language'],
    title: s.tags?.['title'],
    isDefault: s.disposition?.['default'] === 1,
  };
}

function toAudioStream(s: FFProbeStream): AudioStream {
  return {
    index: s.index,
    codec: s.codec_name,
    codecLongName: s.codec_long_name,
    profile: s.profile,
    sampleRate: parseOptionalInt(s.sample_rate) ?? 0,
    channels: s.channels ?? 0,
    channelLayout: s.channel_layout ?? 'unknown',
    bitDepth: parseOptionalInt(s.bits_per_raw_sample),
    bitRate: parseOptionalInt(s.bit_rate),
    duration: parseOptionalFloat(s.duration),
    language: s.tags?.['language'],
    title: s.tags?.['title'],
    isDefault: s.disposition?.['default'] === 1,
  };
}

function toSubtitleStream(s: FFProbeStream): SubtitleStream {
  return {
    index: s.index,
    codec: s.codec_name,
    language: s.tags?.['language'],
    title: s.tags?.['title'],
    isDefault: s.disposition?.['default'] === 1,
    isForced: s.disposition?.['forced'] === 1,
  };
}

/**
 * Parse an ffprobe rational frame rate ("24000/1001")
 */
export function parseFrameRate(rate: string): number {
  const [num, den] = rate.split('/');
  const numerator = Number(num);
  const denominator = den === undefined ? 1 : Number(den);
  if (!Number.isFinite(numerator) || !Number.isFinite(denominator) || denominator === 0) {
    return 0;
  }
  return numerator / denominator;
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function parseOptionalFloat(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}
