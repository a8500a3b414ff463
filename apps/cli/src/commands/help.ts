/**
 * Help Command
 *
 * Overview of every command, or commander's full help for one.
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { printError, printHeader } from '../lib/output.js';

const EXAMPLES = [
  'splicekit split audio.flac -o custom_tracks -l 200 00:03:45.123 00:08:30.456',
  'splicekit merge custom_tracks -l 200',
  'splicekit pad voice.flac -b 500 -e 1000',
];

export function helpCommand(program: Command, name?: string): void {
  if (name) {
    const command = program.commands.find(c => c.name() === name);
    if (!command) {
      printError(`Unknown command: ${name}`);
      console.log('Run', chalk.cyan(`${program.name()} help`), 'for available commands');
      process.exit(1);
    }
    command.outputHelp();
    return;
  }

  printHeader(`${program.name()} - ${program.description()}`);

  console.log(chalk.bold('COMMANDS:'));
  console.log();
  for (const command of program.commands) {
    console.log(chalk.cyan(`  ${command.name()} ${command.usage()}`));
    console.log(`    ${command.description()}`);
    console.log();
  }

  console.log('Timestamps are HH:MM:SS.mmm (millisecond precision).');
  console.log('With an overlap, each split track starts that many milliseconds before its');
  console.log('split point, and a merge crossfades the same span with equal-power curves.');
  console.log();

  console.log(chalk.bold('EXAMPLES:'));
  for (const example of EXAMPLES) {
    console.log(`  ${example}`);
  }
  console.log();
}
