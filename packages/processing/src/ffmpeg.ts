/**
 * FFmpeg Wrapper
 *
 * Executes ffmpeg commands, logging each command line before it runs.
 * A non-zero exit becomes a CommandExecutionError carrying the engine's
 * stderr untouched.
 */

import {
  executeCommand,
  formatCommandLine,
  createLogger,
  type CommandExecutor,
  type CommandResult,
} from '@splicekit/utils';
import { getBinaryPath, CommandExecutionError } from '@splicekit/core';
import type { CommandRunner } from './types.js';

export interface FFmpegOptions {
  timeout?: number;
  exec?: CommandExecutor;
}

export class FFmpeg implements CommandRunner {
  private ffmpegPath: string;
  private timeout: number;
  private exec: CommandExecutor;
  private log = createLogger({ component: 'ffmpeg' });

  constructor(ffmpegPath: string = getBinaryPath('ffmpeg'), options: FFmpegOptions = {}) {
    this.ffmpegPath = ffmpegPath;
    this.timeout = options.timeout ?? 3600000; // 1 hour default
    this.exec = options.exec ?? executeCommand;
  }

  async run(args: string[]): Promise<CommandResult> {
    const fullArgs = [
      '-hide_banner',
      '-y', // Overwrite output
      ...args,
    ];
    const commandLine = formatCommandLine(this.ffmpegPath, fullArgs);
    this.log.debug({ command: commandLine }, 'Running ffmpeg');

    let result: CommandResult;
    try {
      result = await this.exec(this.ffmpegPath, fullArgs, { timeout: this.timeout });
    } catch (error) {
      // Spawn failure: treat like a shell's "command not found"
      throw new CommandExecutionError(
        this.ffmpegPath,
        127,
        error instanceof Error ? error.message : String(error)
      );
    }

    if (result.timedOut) {
      this.log.error({ command: commandLine, timeout: this.timeout }, 'ffmpeg timed out');
    }

    if (result.exitCode !== 0) {
      throw new CommandExecutionError(this.ffmpegPath, result.exitCode, result.stderr);
    }

    this.log.debug({ duration: result.duration }, 'ffmpeg finished');
    return result;
  }
}
