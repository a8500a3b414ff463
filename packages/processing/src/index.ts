/**
 * @splicekit/processing
 *
 * Everything that turns a request into ffmpeg invocations:
 * - Splitter / Merger (timestamp and crossfade planning)
 * - AudioEditor (extract, replace, pad, trim)
 * - Command builder and filter graph rendering
 */

// FFmpeg runner
export { FFmpeg, type FFmpegOptions } from './ffmpeg.js';

// Command Builder
export {
  FFmpegCommandBuilder,
  audioCodecForFile,
  createSegmentCommand,
  createAudioExtractCommand,
  createAudioReplaceCommand,
  createGraphCommand,
  type InputOptions,
  type AudioCodec,
} from './commandBuilder.js';

// Filter graph
export {
  renderFilter,
  renderFilterChain,
  renderFilterGraph,
  fadeIn,
  fadeOut,
  delay,
  pad,
  mix,
  type AudioFilter,
  type FadeCurve,
  type FadeFilter,
  type DelayFilter,
  type PadFilter,
  type MixFilter,
  type PassthroughFilter,
  type FilterChain,
  type FilterGraph,
} from './filterGraph.js';

// Split
export {
  Splitter,
  planSplit,
  parseTimestamps,
  trackFileName,
  defaultSplitOutputDir,
  assertMilliseconds,
  type SplitterOptions,
} from './splitter.js';

// Merge
export {
  Merger,
  planMerge,
  buildMergeGraph,
  nextTotal,
  equalPowerGains,
  sortTrackFiles,
  defaultMergeOutputFile,
  type MergerOptions,
} from './merger.js';

// Single-file edits
export { AudioEditor, type AudioEditorOptions } from './audioEditor.js';

// Types
export type {
  CommandRunner,
  Segment,
  SplitOptions,
  SplitTrack,
  SplitResult,
  MergeInput,
  MergeEntry,
  MergePlan,
  MergeOptions,
  MergeResult,
  EdgeAmounts,
  EditResult,
} from './types.js';
