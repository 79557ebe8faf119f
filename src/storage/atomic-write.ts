import { mkdir, writeFile, rename } from 'fs/promises';
import { basename, dirname, join } from 'path';

/**
 * Write a JSON document atomically.
 *
 * Creates parent directories, writes to a temp file in the same directory,
 * then renames over the target so readers never observe a partial file.
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });

  const tempPath = join(
    dir,
    `.${basename(filePath)}-${Date.now()}-${Math.random().toString(36).slice(2)}.tmp`,
  );

  await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
  await rename(tempPath, filePath);
}
