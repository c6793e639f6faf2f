import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
  /**
   * Signal that terminated the process, when it did not exit by itself
   */
  signal?: NodeJS.Signals;
}

/**
 * Exit code reported for a process terminated by a signal
 */
export const SIGNAL_EXIT_CODE = 1;

/**
 * Extended spawn options with output capture control
 */
export interface SpawnAsyncOptions extends SpawnOptions {
  /**
   * Whether to capture stdout (default: true)
   */
  captureStdout?: boolean;

  /**
   * Whether to capture stderr (default: true)
   */
  captureStderr?: boolean;
}

/**
 * Execute a command asynchronously and return its decoded output.
 *
 * Output chunks are buffered and decoded as UTF-8 once the process closes,
 * so multi-byte characters split across chunks (accented Latin text from
 * pdftotext or tesseract) come through intact.
 *
 * Rejects only when the process cannot be started (e.g. ENOENT); a non-zero
 * exit code is reported through `code`. A process killed by a signal has no
 * exit code of its own and reports `SIGNAL_EXIT_CODE` along with `signal`.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('pdfinfo', ['/data/contract.pdf']);
 * if (result.code !== 0) {
 *   throw new Error(result.stderr);
 * }
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  const {
    captureStdout = true,
    captureStderr = true,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: Buffer | string) => {
        stdoutChunks.push(toBuffer(data));
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: Buffer | string) => {
        stderrChunks.push(toBuffer(data));
      });
    }

    proc.on('close', (code, signal) => {
      const result: SpawnResult = {
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        code: code ?? SIGNAL_EXIT_CODE,
      };
      if (signal) {
        result.signal = signal;
      }
      resolve(result);
    });

    proc.on('error', reject);
  });
}

function toBuffer(data: Buffer | string): Buffer {
  return typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
}
