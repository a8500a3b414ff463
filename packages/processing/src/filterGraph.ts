/**
 * Audio Filter Graph
 *
 * Planners describe what the engine should do as typed filter nodes;
 * this module is the only place that knows ffmpeg's textual syntax.
 *
 *   [0:a]afade=t=out:st=4.000:d=1.000:curve=qsin[a0];
 *   [1:a]afade=t=in:st=0.000:d=1.000:curve=qsin,adelay=delays=4000:all=1[a1];
 *   [a0][a1]amix=inputs=2:duration=longest:dropout_transition=0:normalize=0[out]
 */

import { formatSeconds } from '@splicekit/utils';

/**
 * Fade curves understood by `afade`.
 * `qsin` (quarter sine) paired in/out is the equal-power crossfade:
 * sin²(x·π/2) + cos²(x·π/2) = 1.
 */
export type FadeCurve = 'qsin' | 'tri' | 'hsin' | 'log' | 'exp';

export interface FadeFilter {
  type: 'afade';
  direction: 'in' | 'out';
  startSeconds: number;
  durationSeconds: number;
  curve: FadeCurve;
}

export interface DelayFilter {
  type: 'adelay';
  delayMs: number;
}

export interface PadFilter {
  type: 'apad';
  padSeconds: number;
}

export interface MixFilter {
  type: 'amix';
  inputs: number;
  duration: 'longest' | 'shortest' | 'first';
  dropoutTransition: number;
  normalize: boolean;
}

export interface PassthroughFilter {
  type: 'anull';
}

export type AudioFilter =
  | FadeFilter
  | DelayFilter
  | PadFilter
  | MixFilter
  | PassthroughFilter;

/**
 * One `[in]...filters...[out]` chain of a complex graph
 */
export interface FilterChain {
  inputs: string[];
  filters: AudioFilter[];
  output: string;
}

export interface FilterGraph {
  chains: FilterChain[];
  /** Label the caller maps to the output file */
  output: string;
}

export function renderFilter(filter: AudioFilter): string {
  switch (filter.type) {
    case 'afade':
      return `afade=t=${filter.direction}:st=${formatSeconds(filter.startSeconds)}` +
        `:d=${formatSeconds(filter.durationSeconds)}:curve=${filter.curve}`;
    case 'adelay':
      return `adelay=delays=${Math.round(filter.delayMs)}:all=1`;
    case 'apad':
      return `apad=pad_dur=${formatSeconds(filter.padSeconds)}`;
    case 'amix':
      return `amix=inputs=${filter.inputs}:duration=${filter.duration}` +
        `:dropout_transition=${filter.dropoutTransition}:normalize=${filter.normalize ? 1 : 0}`;
    case 'anull':
      return 'anull';
  }
}

/**
 * Render a simple filter chain, as taken by `-af`
 */
export function renderFilterChain(filters: readonly AudioFilter[]): string {
  return filters.length > 0 ? filters.map(renderFilter).join(',') : 'anull';
}

/**
 * Render a complex graph, as taken by `-filter_complex`
 */
export function renderFilterGraph(graph: FilterGraph): string {
  if (graph.chains.length === 0) {
    throw new Error('Filter graph has no chains');
  }

  return graph.chains
    .map(chain => {
      const inputs = chain.inputs.map(label => `[${label}]`).join('');
      return `${inputs}${renderFilterChain(chain.filters)}[${chain.output}]`;
    })
    .join(';');
}

// ============================================
// FILTER FACTORIES
// ============================================

export function fadeIn(durationSeconds: number, curve: FadeCurve = 'qsin'): FadeFilter {
  return { type: 'afade', direction: 'in', startSeconds: 0, durationSeconds, curve };
}

export function fadeOut(
  startSeconds: number,
  durationSeconds: number,
  curve: FadeCurve = 'qsin'
): FadeFilter {
  return { type: 'afade', direction: 'out', startSeconds, durationSeconds, curve };
}

export function delay(delayMs: number): DelayFilter {
  return { type: 'adelay', delayMs };
}

export function pad(padSeconds: number): PadFilter {
  return { type: 'apad', padSeconds };
}

/**
 * Sum inputs without gain normalization: with equal-power fades the
 * curves alone keep the level constant across a seam.
 */
export function mix(inputs: number): MixFilter {
  return {
    type: 'amix',
    inputs,
    duration: 'longest',
    dropoutTransition: 0,
    normalize: false,
  };
}
