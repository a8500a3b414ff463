/**
 * Option Parsers
 *
 * Commander argument parsers; a thrown InvalidArgumentError is reported
 * by commander as a usage error.
 */

import { InvalidArgumentError } from 'commander';

/**
 * `-l 200`, `-b 1500`: whole, non-negative milliseconds
 */
export function parseMilliseconds(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Expected a whole number of milliseconds.');
  }

  const ms = Number(value.trim());
  if (!Number.isSafeInteger(ms)) {
    throw new InvalidArgumentError('Milliseconds value is too large.');
  }
  return ms;
}
