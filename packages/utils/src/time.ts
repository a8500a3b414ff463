/**
 * Time Utilities
 *
 * Timecodes are handled as integer milliseconds so that boundary
 * arithmetic stays exact; seconds are only produced for display and
 * for the engine's command line.
 */

const TIMECODE_PATTERN = /^(\d+):(\d{1,2}):(\d{1,2})(?:\.(\d{1,3}))?$/;

/**
 * Parse a timecode string (HH:MM:SS.mmm) to milliseconds
 *
 * Fractional seconds may carry one to three digits (`.5` is 500ms).
 */
export function parseTimecode(timecode: string): number {
  const match = TIMECODE_PATTERN.exec(timecode.trim());
  if (!match) {
    throw new Error(`Invalid timecode format: ${timecode} (expected HH:MM:SS.mmm)`);
  }

  const hours = parseInt(match[1] ?? '0', 10);
  const minutes = parseInt(match[2] ?? '0', 10);
  const seconds = parseInt(match[3] ?? '0', 10);
  const milliseconds = parseInt((match[4] ?? '0').padEnd(3, '0'), 10);

  if (minutes >= 60 || seconds >= 60) {
    throw new Error(`Invalid timecode: ${timecode} (minutes and seconds must be below 60)`);
  }

  return (hours * 3600 + minutes * 60 + seconds) * 1000 + milliseconds;
}

/**
 * Format milliseconds to timecode string (HH:MM:SS.mmm)
 */
export function formatTimecode(ms: number): string {
  const whole = Math.round(ms);
  const hours = Math.floor(whole / 3600000);
  const minutes = Math.floor((whole % 3600000) / 60000);
  const seconds = Math.floor((whole % 60000) / 1000);
  const milliseconds = whole % 1000;

  return `${hours.toString().padStart(2, '0')}:${minutes.toString().padStart(2, '0')}:${seconds.toString().padStart(2, '0')}.${milliseconds.toString().padStart(3, '0')}`;
}

/**
 * Render seconds with millisecond precision, as the engine takes them
 */
export function formatSeconds(seconds: number): string {
  return seconds.toFixed(3);
}

export function msToSeconds(ms: number): number {
  return ms / 1000;
}

/**
 * Format a duration in seconds for humans (1:02:03, 4:05)
 */
export function formatDuration(seconds: number): string {
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = Math.floor(seconds % 60);

  if (h > 0) {
    return `${h}:${m.toString().padStart(2, '0')}:${s.toString().padStart(2, '0')}`;
  }
  return `${m}:${s.toString().padStart(2, '0')}`;
}
