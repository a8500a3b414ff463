/**
 * Media Types
 */

/**
 * Anything that can tell how long a media file is, in seconds.
 * ffprobe in production, a lookup table in tests.
 */
export interface DurationProvider {
  getDuration(filePath: string): Promise<number>;
}

export interface VideoStream {
  index: number;
  codec: string;
  codecLongName?: string;
  profile?: string;
  width: number;
  height: number;
  pixelFormat?: string;
  fps: number;
  bitRate?: number;
  language?: string;
  title?: string;
  isDefault: boolean;
}

export interface AudioStream {
  index: number;
  codec: string;
  codecLongName?: string;
  profile?: string;
  sampleRate: number;
  channels: number;
  channelLayout: string;
  bitDepth?: number;
  bitRate?: number;
  duration?: number;
  language?: string;
  title?: string;
  isDefault: boolean;
}

export interface SubtitleStream {
  index: number;
  codec: string;
  language?: string;
  title?: string;
  isDefault: boolean;
  isForced: boolean;
}

export interface MediaMetadata {
  // File info
  filePath: string;
  fileName: string;
  fileSize: number;

  // Container
  format: string;
  formatLongName?: string;
  duration: number;
  bitRate?: number;
  tags: Record<string, string>;

  // Streams
  videoStreams: VideoStream[];
  audioStreams: AudioStream[];
  subtitleStreams: SubtitleStream[];
}
