/**
 * File Operations
 */

import {
  mkdir,
  readdir,
  stat,
  copyFile as fsCopyFile,
} from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { getExtension } from './path.js';

/**
 * Ensure a directory exists, creating it if necessary
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await mkdir(dirPath, { recursive: true });
}

/**
 * Copy a file byte for byte, creating the destination directory
 */
export async function copyFile(
  source: string,
  destination: string
): Promise<void> {
  await ensureDir(dirname(destination));
  await fsCopyFile(source, destination);
}

export async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

export async function isDirectory(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

/**
 * List regular files directly inside a directory whose extension matches
 * (case-insensitive). Not recursive; order is whatever the OS returns.
 */
export async function listFilesByExtension(
  dirPath: string,
  extension: string
): Promise<string[]> {
  const wanted = extension.toLowerCase().replace(/^\./, '');
  const entries = await readdir(dirPath, { withFileTypes: true });

  return entries
    .filter(entry => entry.isFile() && getExtension(entry.name) === wanted)
    .map(entry => join(dirPath, entry.name));
}
