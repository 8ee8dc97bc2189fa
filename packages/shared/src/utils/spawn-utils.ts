import { spawn } from 'node:child_process';

/**
 * Output of an external tool run by {@link spawnAsync}
 */
export interface SpawnResult {
  stdout: string;
  stderr: string;
  /**
   * Exit code, or `null` when the process was terminated by a signal
   */
  code: number | null;
}

export interface SpawnAsyncOptions {
  /**
   * Kills the process and rejects the promise when aborted
   */
  signal?: AbortSignal;
}

/**
 * Run one of the PDF tools (poppler, ImageMagick, tesseract) and collect its
 * output.
 *
 * Output is decoded as UTF-8 once the process closes, so multi-byte
 * characters split across stream chunks stay intact. Stdin is not used.
 * A non-zero or `null` exit code resolves normally and callers decide what
 * it means; the promise rejects only when the process cannot be started or
 * is killed through `options.signal`.
 *
 * @example
 * ```typescript
 * const result = await spawnAsync('tesseract', [image, 'stdout'], {
 *   signal: request.abortSignal,
 * });
 * if (result.code !== 0) {
 *   logger.warn(result.stderr);
 * }
 * ```
 */
export function spawnAsync(
  command: string,
  args: string[],
  options: SpawnAsyncOptions = {},
): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, {
      signal: options.signal,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    proc.stdout?.on('data', (data: Buffer) => stdout.push(data));
    proc.stderr?.on('data', (data: Buffer) => stderr.push(data));

    proc.on('close', (code) => {
      resolve({
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        code,
      });
    });

    proc.on('error', reject);
  });
}
