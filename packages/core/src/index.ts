/**
 * @splicekit/core
 *
 * Error taxonomy and engine binary configuration.
 */

// Errors
export {
  SpliceKitError,
  ValidationError,
  NotFoundError,
  UnreadableMediaError,
  CommandExecutionError,
  isSpliceKitError,
  type ErrorCode,
} from './errors/index.js';

// Binaries
export {
  resolveBinary,
  getBinaryPath,
  type BinaryName,
  type BinaryConfig,
} from './config/binaries.js';
