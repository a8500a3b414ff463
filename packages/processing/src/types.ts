/**
 * Processing Types
 */

import type { CommandResult } from '@splicekit/utils';
import type { FadeFilter } from './filterGraph.js';

/**
 * Runs one ffmpeg invocation; args exclude the binary itself.
 * Rejects with CommandExecutionError on a non-zero exit.
 */
export interface CommandRunner {
  run(args: string[]): Promise<CommandResult>;
}

// ============================================
// SPLIT
// ============================================

/**
 * One planned window of the input. `durationMs` null means "to the end".
 */
export interface Segment {
  readonly index: number;
  readonly startMs: number;
  readonly durationMs: number | null;
}

export interface SplitOptions {
  inputFile: string;
  /** HH:MM:SS.mmm split points */
  timestamps: string[];
  outputDir?: string;
  overlapMs?: number;
  /** Called after each track is written */
  onTrack?: (track: SplitTrack) => void;
}

export interface SplitTrack {
  index: number;
  file: string;
  startSeconds: number;
  durationSeconds: number | null;
}

export interface SplitResult {
  outputDir: string;
  tracks: SplitTrack[];
}

// ============================================
// MERGE
// ============================================

export interface MergeInput {
  file: string;
  durationSeconds: number;
}

export interface MergeEntry extends MergeInput {
  /** Position of the file's first sample on the merged timeline */
  startOffsetSeconds: number;
  fadeIn: FadeFilter | null;
  fadeOut: FadeFilter | null;
}

export interface MergePlan {
  entries: MergeEntry[];
  overlapSeconds: number;
  totalDurationSeconds: number;
}

export interface MergeOptions {
  inputDir: string;
  outputFile?: string;
  overlapMs?: number;
}

export type MergeResult =
  | { mode: 'copy'; outputFile: string; files: string[] }
  | { mode: 'mix'; outputFile: string; files: string[]; plan: MergePlan };

// ============================================
// SINGLE-FILE EDITS
// ============================================

export interface EdgeAmounts {
  beginMs?: number;
  endMs?: number;
}

export interface EditResult {
  outputFile: string;
  args: string[];
}
