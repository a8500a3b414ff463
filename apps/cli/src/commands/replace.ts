/**
 * Replace Command
 */

import ora from 'ora';
import { getConfig } from '../config/index.js';
import { createServices } from '../lib/engine.js';
import { exitWithError, printSuccess } from '../lib/output.js';

interface ReplaceCommandOptions {
  audio?: string;
  output?: string;
}

export async function replaceCommand(
  videoFile: string,
  options: ReplaceCommandOptions
): Promise<void> {
  const { editor } = createServices(getConfig());
  const spinner = ora('Replacing audio...').start();

  try {
    const result = await editor.replace(videoFile, options.audio, options.output);
    spinner.stop();
    printSuccess(`Created new video with replaced audio: ${result.outputFile}`);
  } catch (error) {
    spinner.fail('Replace failed');
    exitWithError(error);
  }
}
