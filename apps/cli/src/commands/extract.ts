/**
 * Extract Command
 */

import ora from 'ora';
import { getConfig } from '../config/index.js';
import { createServices } from '../lib/engine.js';
import { exitWithError, printSuccess } from '../lib/output.js';

interface ExtractCommandOptions {
  output?: string;
}

export async function extractCommand(
  videoFile: string,
  options: ExtractCommandOptions
): Promise<void> {
  const { editor } = createServices(getConfig());
  const spinner = ora('Extracting audio...').start();

  try {
    const result = await editor.extract(videoFile, options.output);
    spinner.stop();
    printSuccess(`Extracted audio to: ${result.outputFile}`);
  } catch (error) {
    spinner.fail('Extraction failed');
    exitWithError(error);
  }
}
