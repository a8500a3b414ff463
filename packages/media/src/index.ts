/**
 * @splicekit/media
 *
 * Media inspection through ffprobe: durations for the planners,
 * stream metadata for `info`.
 */

export {
  FFProbe,
  parseDurationOutput,
  parseProbeOutput,
  type FFProbeResult,
  type FFProbeStream,
} from './probes/ffprobe.js';

export { MediaAnalyzer, toMediaMetadata, parseFrameRate } from './analyzer.js';

export type {
  DurationProvider,
  MediaMetadata,
  VideoStream,
  AudioStream,
  SubtitleStream,
} from './types.js';
