import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/**
 * Run `fn` with a freshly created temporary directory and remove the
 * directory (recursively) once `fn` settles, whether it resolved or threw.
 *
 * @param prefix - Directory name prefix, e.g. `'pdf-lingo-page-'`
 * @param fn - Work that may write files into the directory
 * @returns Whatever `fn` resolves to
 */
export async function withTempDir<T>(
  prefix: string,
  fn: (dir: string) => Promise<T>,
): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
