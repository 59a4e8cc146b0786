import type { SpawnOptions } from 'node:child_process';

import { spawn } from 'node:child_process';

/**
 * Result of a spawn operation
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  code: number;
}

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

  /**
   * Reject with SpawnExitError when the process exits with a non-zero code
   * (default: false)
   */
  rejectOnNonZero?: boolean;
}

/**
 * Raised by spawnAsync when `rejectOnNonZero` is set and the process fails.
 */
export class SpawnExitError extends Error {
  readonly result: SpawnResult;

  constructor(command: string, result: SpawnResult) {
    const detail = result.stderr.trim() || result.stdout.trim();
    super(
      `${command} exited with code ${result.code}${detail ? `: ${detail}` : ''}`,
    );
    this.name = 'SpawnExitError';
    this.result = result;
  }
}

/**
 * Run an external command and collect its output.
 *
 * Used by local collaborators such as the tesseract OCR backend. Pass
 * `signal` (from SpawnOptions) to kill the process on cancellation.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('tesseract', ['page-1.png', '-', 'tsv'], {
 *   rejectOnNonZero: true,
 * });
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
    rejectOnNonZero = false,
    ...spawnOptions
  } = options;

  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';

    if (captureStdout && proc.stdout) {
      proc.stdout.on('data', (data: Buffer) => {
        stdout += data.toString();
      });
    }

    if (captureStderr && proc.stderr) {
      proc.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });
    }

    proc.on('close', (code: number | null) => {
      const result = { stdout, stderr, code: code ?? 0 };
      if (rejectOnNonZero && result.code !== 0) {
        reject(new SpawnExitError(command, result));
        return;
      }
      resolve(result);
    });

    proc.on('error', reject);
  });
}
