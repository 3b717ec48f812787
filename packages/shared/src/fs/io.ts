import { promises as fs } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import { ensureDir } from 'fs-extra';

export async function ensureParentDir(path: string): Promise<void> {
  await ensureDir(dirname(path));
}

export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureParentDir(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, path);
}

/**
 * Copies a file so that readers of `dest` never observe a partial write.
 */
export async function atomicCopy(src: string, dest: string): Promise<void> {
  await ensureParentDir(dest);
  const tempPath = await tmpName({ dir: dirname(dest) });
  await fs.copyFile(src, tempPath);
  await fs.rename(tempPath, dest);
}
