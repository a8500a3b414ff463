/**
 * @splicekit/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Timecode helpers
 * - Logger
 */

// Command execution
export {
  executeCommand,
  formatCommandLine,
  OutputBuffer,
  type CommandResult,
  type CommandOptions,
  type CommandExecutor,
} from './command.js';

// File operations
export {
  ensureDir,
  copyFile,
  isFile,
  isDirectory,
  listFilesByExtension,
} from './file.js';

// Path utilities
export {
  getExtension,
  getBasename,
  stripExtension,
  replaceExtension,
  withSuffix,
  trimTrailingSeparators,
} from './path.js';

// Time utilities
export {
  parseTimecode,
  formatTimecode,
  formatSeconds,
  formatDuration,
  msToSeconds,
} from './time.js';

// Logger
export {
  logger,
  createLogger,
  setLogLevel,
  resolveLogLevel,
  type Logger,
  type LevelWithSilent,
} from './logger.js';
