#!/usr/bin/env tsx
/**
 * CLI Entry Point
 *
 * Command-line interface for splicekit.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { setLogLevel } from '@splicekit/utils';
import { getConfig } from './config/index.js';
import { parseMilliseconds } from './lib/options.js';
import { exitWithError } from './lib/output.js';

// Commands
import { splitCommand } from './commands/split.js';
import { mergeCommand } from './commands/merge.js';
import { extractCommand } from './commands/extract.js';
import { replaceCommand } from './commands/replace.js';
import { infoCommand } from './commands/info.js';
import { padCommand, trimCommand } from './commands/edit.js';
import { helpCommand } from './commands/help.js';

const program = new Command();

program
  .name('splicekit')
  .description('Split, merge and edit audio tracks with ffmpeg')
  .version('1.0.0')
  .option('--debug', 'Enable debug logging')
  .helpCommand(false);

// Inherited by every command defined below
program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error('Run', chalk.cyan('splicekit help'), 'for available commands');
  }
  process.exit(err.exitCode === 0 ? 0 : 1);
});

program.hook('preAction', () => {
  try {
    const config = getConfig();
    setLogLevel(program.opts<{ debug?: boolean }>().debug ? 'debug' : config.logLevel);
  } catch (error) {
    exitWithError(error);
  }
});

// ============================================
// TRACK COMMANDS
// ============================================

program
  .command('split <audio_file> <timestamps...>')
  .description('Split an audio file into tracks at HH:MM:SS.mmm timestamps')
  .option('-o, --output <dir>', 'Output directory (default: <audio_name>_tracks)')
  .option('-l, --overlap <ms>', 'Each track starts this many milliseconds before its split point', parseMilliseconds)
  .action(splitCommand);

program
  .command('merge <input_directory>')
  .description('Merge the audio files of a directory into one, in file name order')
  .option('-o, --output <file>', 'Output file (default: <directory_name>_merged.<ext>)')
  .option('-l, --overlap <ms>', 'Crossfade each seam over this many milliseconds (equal power)', parseMilliseconds)
  .action(mergeCommand);

// ============================================
// SINGLE-FILE COMMANDS
// ============================================

program
  .command('extract <video_file>')
  .description('Extract the audio of a video file')
  .option('-o, --output <file>', 'Output file (default: <video_name>.<ext>)')
  .action(extractCommand);

program
  .command('replace <video_file>')
  .description('Replace the audio of a video file, copying both streams')
  .option('-a, --audio <file>', 'Audio file to use (default: <video_name>.<ext>)')
  .option('-o, --output <file>', 'Output file (default: <video_name>_replaced.mkv)')
  .action(replaceCommand);

program
  .command('info <media_file>')
  .description('Display container and stream information')
  .option('--json', 'Output in JSON format')
  .action(infoCommand);

program
  .command('pad <audio_file>')
  .description('Add silence to the beginning and/or end of an audio file')
  .option('-b, --begin <ms>', 'Milliseconds of silence before', parseMilliseconds)
  .option('-e, --end <ms>', 'Milliseconds of silence after', parseMilliseconds)
  .option('-o, --output <file>', 'Output file (default: <audio_name>_padded.<ext>)')
  .action(padCommand);

program
  .command('trim <audio_file>')
  .description('Cut time from the beginning and/or end of an audio file')
  .option('-b, --begin <ms>', 'Milliseconds to cut from the beginning', parseMilliseconds)
  .option('-e, --end <ms>', 'Milliseconds to cut from the end', parseMilliseconds)
  .option('-o, --output <file>', 'Output file (default: <audio_name>_trimmed.<ext>)')
  .action(trimCommand);

program
  .command('help [command]')
  .description('Show help for all commands, or one')
  .action((name?: string) => helpCommand(program, name));

await program.parseAsync();
