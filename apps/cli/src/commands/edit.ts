/**
 * Pad / Trim Commands
 *
 * Add silence to, or cut time from, the ends of an audio file.
 */

import ora from 'ora';
import { getConfig } from '../config/index.js';
import { createServices } from '../lib/engine.js';
import { exitWithError, printSuccess } from '../lib/output.js';

interface EdgeCommandOptions {
  begin?: number;
  end?: number;
  output?: string;
}

export async function padCommand(
  audioFile: string,
  options: EdgeCommandOptions
): Promise<void> {
  const { editor } = createServices(getConfig());
  const spinner = ora('Padding audio...').start();

  try {
    const result = await editor.pad(audioFile, { beginMs: options.begin, endMs: options.end }, options.output);
    spinner.stop();
    printSuccess(`Padded audio written to: ${result.outputFile}`);
  } catch (error) {
    spinner.fail('Pad failed');
    exitWithError(error);
  }
}

export async function trimCommand(
  audioFile: string,
  options: EdgeCommandOptions
): Promise<void> {
  const { editor } = createServices(getConfig());
  const spinner = ora('Trimming audio...').start();

  try {
    const result = await editor.trim(audioFile, { beginMs: options.begin, endMs: options.end }, options.output);
    spinner.stop();
    printSuccess(`Trimmed audio written to: ${result.outputFile}`);
  } catch (error) {
    spinner.fail('Trim failed');
    exitWithError(error);
  }
}
