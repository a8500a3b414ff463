/**
 * Split Command
 *
 * Cut an audio file into tracks at the given timestamps.
 */

import ora from 'ora';
import chalk from 'chalk';
import { getConfig } from '../config/index.js';
import { createServices } from '../lib/engine.js';
import { exitWithError, printSuccess } from '../lib/output.js';

interface SplitCommandOptions {
  output?: string;
  overlap?: number;
}

export async function splitCommand(
  audioFile: string,
  timestamps: string[],
  options: SplitCommandOptions
): Promise<void> {
  const { splitter } = createServices(getConfig());
  const total = timestamps.length + 1;
  const spinner = ora(`Extracting track 1 of ${total}...`).start();

  try {
    const result = await splitter.split({
      inputFile: audioFile,
      timestamps,
      outputDir: options.output,
      overlapMs: options.overlap,
      onTrack: track => {
        spinner.stop();
        printSuccess(`Created track ${track.index}: ${track.file}`);
        if (track.index < total) {
          spinner.start(`Extracting track ${track.index + 1} of ${total}...`);
        }
      },
    });

    spinner.stop();
    console.log(`All tracks have been created in: ${chalk.cyan(result.outputDir)}`);
  } catch (error) {
    spinner.fail('Split failed');
    exitWithError(error);
  }
}
