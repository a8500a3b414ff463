/**
 * Command Execution Wrapper
 *
 * Runs an external program without a shell and captures its output.
 * Used for every ffmpeg / ffprobe invocation.
 */

import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  timeout?: number; // milliseconds
}

/**
 * Signature of {@link executeCommand}, so callers can take a stand-in.
 */
export type CommandExecutor = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

const MAX_OUTPUT_SIZE = 10 * 1024 * 1024; // 10MB per stream

/**
 * Collects a stream's raw chunks and decodes them once, so a UTF-8
 * character split across chunks survives intact
 */
export class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private limit: number = MAX_OUTPUT_SIZE) {}

  push(chunk: Buffer): void {
    if (this.size >= this.limit) return;
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Execute an external command safely
 *
 * Resolves with the exit code even when it is non-zero; only a failure to
 * spawn the program at all rejects.
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const { timeout = 3600000 } = options; // 1 hour for media processing

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

    const stdout = new OutputBuffer();
    const stderr = new OutputBuffer();

    const timeoutId = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, timeout);

    child.stdout?.on('data', (data: Buffer) => stdout.push(data));
    child.stderr?.on('data', (data: Buffer) => stderr.push(data));

    child.on('close', (code, signal) => {
      clearTimeout(timeoutId);

      resolve({
        exitCode: code ?? (signal ? 128 : 1),
        stdout: stdout.text(),
        stderr: stderr.text(),
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    // ENOENT when the binary is not installed
    child.on('error', (error) => {
      clearTimeout(timeoutId);
      reject(error);
    });
  });
}

/**
 * Render an argument list as a copy-pasteable command line for logs
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map(arg => (/[\s"'[\];|]/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg))
    .join(' ');
}
