/**
 * Output Formatter
 *
 * Consistent CLI output formatting. Results go to stdout, failures to
 * stderr.
 */

import chalk from 'chalk';
import { CommandExecutionError } from '@splicekit/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * Text printed for a failed command: the message, then the engine's own
 * diagnostics when there are any
 */
export function describeError(error: unknown): { message: string; diagnostics: string | null } {
  if (error instanceof CommandExecutionError) {
    const stderr = error.stderr.trimEnd();
    return { message: error.message, diagnostics: stderr === '' ? null : stderr };
  }
  if (error instanceof Error) {
    return { message: error.message, diagnostics: null };
  }
  return { message: String(error), diagnostics: null };
}

/**
 * Report a failure and exit with status 1
 */
export function exitWithError(error: unknown): never {
  const { message, diagnostics } = describeError(error);
  printError(message);
  if (diagnostics !== null) {
    console.error(chalk.gray(diagnostics));
  }
  process.exit(1);
}
