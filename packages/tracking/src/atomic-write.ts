import { randomUUID } from 'node:crypto';
import { mkdir, open, rename, rm } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

/**
 * Write `content` to a sibling temp file, fsync it, then rename it over `path`.
 * Readers see either the previous file or the complete new one.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });
  const tmpPath = join(dir, `.${basename(path)}.${randomUUID()}.tmp`);

  try {
    const handle = await open(tmpPath, 'wx');
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    await rename(tmpPath, path);
  } catch (error) {
    await Promise.allSettled([rm(tmpPath, { force: true })]);
    throw error;
  }
}
