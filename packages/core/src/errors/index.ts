/**
 * Custom Error Classes
 *
 * Every failure a command can report maps onto one of these codes.
 */

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'UNREADABLE_MEDIA'
  | 'ENGINE_FAILURE';

/**
 * Base error class for all splicekit errors
 */
export class SpliceKitError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'SpliceKitError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid inputs (arguments, timestamps, overlaps)
 */
export class ValidationError extends SpliceKitError {
  public readonly field: string;

  constructor(field: string, message: string) {
    super(
      `Invalid ${field}: ${message}`,
      'INVALID_INPUT',
      { field, message }
    );
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Not found error for missing files, directories or matches
 */
export class NotFoundError extends SpliceKitError {
  constructor(resource: string, identifier: string) {
    super(
      `${resource} not found: ${identifier}`,
      'NOT_FOUND',
      { resource, identifier }
    );
    this.name = 'NotFoundError';
  }
}

/**
 * The engine could not read a file as media
 */
export class UnreadableMediaError extends SpliceKitError {
  constructor(filePath: string, reason: string) {
    super(
      `Cannot read media ${filePath}: ${reason}`,
      'UNREADABLE_MEDIA',
      { filePath, reason }
    );
    this.name = 'UnreadableMediaError';
  }
}

/**
 * External command error
 *
 * `stderr` is the engine's diagnostic output, kept verbatim.
 */
export class CommandExecutionError extends SpliceKitError {
  public readonly command: string;
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `${command} failed with exit code ${exitCode}`,
      'ENGINE_FAILURE',
      { command, exitCode }
    );
    this.name = 'CommandExecutionError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function isSpliceKitError(error: unknown): error is SpliceKitError {
  return error instanceof SpliceKitError;
}
