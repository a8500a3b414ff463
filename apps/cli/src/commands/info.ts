/**
 * Info Command
 *
 * Show container and stream details of a media file.
 */

import ora from 'ora';
import chalk from 'chalk';
import { formatDuration } from '@splicekit/utils';
import type { MediaMetadata } from '@splicekit/media';
import { getConfig } from '../config/index.js';
import { createServices } from '../lib/engine.js';
import { exitWithError, printHeader, printJson, printKeyValue } from '../lib/output.js';

interface InfoCommandOptions {
  json?: boolean;
}

export async function infoCommand(
  mediaFile: string,
  options: InfoCommandOptions
): Promise<void> {
  const { analyzer } = createServices(getConfig());
  const spinner = ora('Reading media information...').start();

  try {
    const metadata = await analyzer.analyze(mediaFile);
    spinner.stop();

    if (options.json) {
      printJson(metadata);
    } else {
      printMetadata(metadata);
    }
  } catch (error) {
    spinner.fail('Could not read media information');
    exitWithError(error);
  }
}

function printMetadata(metadata: MediaMetadata): void {
  printHeader(`Media Information for: ${metadata.filePath}`);

  console.log(chalk.bold('Container:'));
  printKeyValue('Format', metadata.formatLongName ?? metadata.format);
  printKeyValue('Duration', formatDuration(metadata.duration));
  if (metadata.bitRate !== undefined) {
    printKeyValue('Bitrate', `${Math.round(metadata.bitRate / 1000)} kbps`);
  }
  printKeyValue('Size', formatBytes(metadata.fileSize));
  console.log();

  if (metadata.videoStreams.length > 0) {
    console.log(chalk.bold(`Video Tracks (${metadata.videoStreams.length}):`));
    for (const v of metadata.videoStreams) {
      console.log(
        `  ${chalk.cyan(`#${v.index}`)} ${v.codec} ` +
        `${v.width}x${v.height} @ ${v.fps.toFixed(2)} fps` +
        (v.bitRate ? ` (${Math.round(v.bitRate / 1000)} kbps)` : '')
      );
    }
    console.log();
  }

  if (metadata.audioStreams.length > 0) {
    console.log(chalk.bold(`Audio Tracks (${metadata.audioStreams.length}):`));
    for (const a of metadata.audioStreams) {
      console.log(
        `  ${chalk.cyan(`#${a.index}`)} ${a.codec} ` +
        `${a.channels}ch (${a.channelLayout}) @ ${a.sampleRate} Hz` +
        (a.language ? ` [${a.language}]` : '') +
        (a.isDefault ? chalk.gray(' default') : '')
      );
    }
    console.log();
  }

  if (metadata.subtitleStreams.length > 0) {
    console.log(chalk.bold(`Subtitle Tracks (${metadata.subtitleStreams.length}):`));
    for (const s of metadata.subtitleStreams) {
      console.log(
        `  ${chalk.cyan(`#${s.index}`)} ${s.codec}` +
        (s.language ? ` [${s.language}]` : '') +
        (s.title ? ` "${s.title}"` : '') +
        (s.isForced ? chalk.gray(' forced') : '')
      );
    }
    console.log();
  }
}

function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i] ?? 'B'}`;
}
