/**
 * Binary Configuration
 *
 * Where to find the engine executables.
 *
 * Priority order:
 * 1. Environment variable (FFMPEG_PATH / FFPROBE_PATH), if the file exists
 * 2. System PATH
 */

import { existsSync } from 'node:fs';

export type BinaryName = 'ffmpeg' | 'ffprobe';

export interface BinaryConfig {
  name: BinaryName;
  envVar: string;
  resolvedPath: string;
  source: 'env' | 'path';
}

const ENV_VARS: Record<BinaryName, string> = {
  ffmpeg: 'FFMPEG_PATH',
  ffprobe: 'FFPROBE_PATH',
};

/**
 * Get executable extension for current OS
 */
function getExeExt(): string {
  return process.platform === 'win32' ? '.exe' : '';
}

export function resolveBinary(
  name: BinaryName,
  env: NodeJS.ProcessEnv = process.env
): BinaryConfig {
  const envVar = ENV_VARS[name];
  const envPath = env[envVar];

  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, source: 'env' };
  }

  // Let the system PATH resolve it; a missing binary fails at spawn time
  return { name, envVar, resolvedPath: name + getExeExt(), source: 'path' };
}

/**
 * Get a specific binary path
 */
export function getBinaryPath(name: BinaryName, env?: NodeJS.ProcessEnv): string {
  return resolveBinary(name, env).resolvedPath;
}
