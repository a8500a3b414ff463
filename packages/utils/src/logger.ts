/**
 * Logger
 *
 * Pino-based structured logger shared by all packages.
 * Writes to stderr: stdout belongs to command output.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some(level => level === value);
}

/**
 * Level to start with. An unknown value falls back to `warn`; the CLI
 * reports it once its configuration is validated.
 */
export function resolveLogLevel(value: string | undefined): LevelWithSilent {
  return value !== undefined && isLevel(value) ? value : 'warn';
}

const NODE_ENV = process.env['NODE_ENV'] ?? 'production';

const destination = NODE_ENV === 'development'
  ? pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname',
        destination: 2,
      },
    })
  : pino.destination(2);

export const logger: Logger = pino({
  level: resolveLogLevel(process.env['LOG_LEVEL']),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'splicekit',
    env: NODE_ENV,
  },
}, destination);

export type { Logger, LevelWithSilent };

/**
 * Create a child logger with additional context
 *
 * Children copy the level at creation time, so create them after
 * {@link setLogLevel} has run.
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}

export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
}
