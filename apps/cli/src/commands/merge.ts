/**
 * Merge Command
 *
 * Join the audio files of a directory, crossfading each seam.
 */

import ora from 'ora';
import chalk from 'chalk';
import { formatDuration } from '@splicekit/utils';
import { getConfig } from '../config/index.js';
import { createServices } from '../lib/engine.js';
import { exitWithError, printSuccess } from '../lib/output.js';

interface MergeCommandOptions {
  output?: string;
  overlap?: number;
}

export async function mergeCommand(
  inputDir: string,
  options: MergeCommandOptions
): Promise<void> {
  const { merger } = createServices(getConfig());
  const spinner = ora('Merging tracks...').start();

  try {
    const result = await merger.merge({
      inputDir,
      outputFile: options.output,
      overlapMs: options.overlap,
    });

    spinner.stop();
    const detail = result.mode === 'mix'
      ? `${result.files.length} files, ${formatDuration(result.plan.totalDurationSeconds)}`
      : 'single file copied';
    printSuccess(`Merged audio files into: ${result.outputFile} ${chalk.gray(`(${detail})`)}`);
  } catch (error) {
    spinner.fail('Merge failed');
    exitWithError(error);
  }
}
