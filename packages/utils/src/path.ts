/**
 * Path Utilities
 */

import { extname, basename } from 'node:path';

/**
 * Get file extension (lowercase, without dot)
 */
export function getExtension(filename: string): string {
  const ext = extname(filename);
  return ext.toLowerCase().replace(/^\./, '');
}

/**
 * Get base filename without extension
 */
export function getBasename(filename: string): string {
  const ext = extname(filename);
  return basename(filename, ext);
}

/**
 * Drop the last extension, keeping the directory part
 *
 * `media/show.mkv` -> `media/show`, `notes` -> `notes`
 */
export function stripExtension(filePath: string): string {
  const ext = extname(filePath);
  return ext ? filePath.slice(0, -ext.length) : filePath;
}

/**
 * Swap a path's extension: `a/b.mkv` + `flac` -> `a/b.flac`
 */
export function replaceExtension(filePath: string, extension: string): string {
  return `${stripExtension(filePath)}.${extension.replace(/^\./, '')}`;
}

/**
 * Add a suffix before the extension: `a/b.flac` + `_padded` -> `a/b_padded.flac`
 */
export function withSuffix(filePath: string, suffix: string, extension?: string): string {
  const ext = extension ?? getExtension(filePath);
  const stem = `${stripExtension(filePath)}${suffix}`;
  return ext ? `${stem}.${ext}` : stem;
}

/**
 * Remove trailing path separators (`tracks/` -> `tracks`), keeping a bare root
 */
export function trimTrailingSeparators(dirPath: string): string {
  const trimmed = dirPath.replace(/[/\\]+$/, '');
  return trimmed === '' ? dirPath : trimmed;
}
