import { mkdir, rename, unlink, writeFile } from 'fs/promises';
import { dirname, join } from 'path';

/**
 * Write a file by writing a sibling temp file and renaming it into place,
 * so readers never observe a partially written file.
 */
export async function writeFileAtomic(filePath: string, content: string | Uint8Array): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });

  // Same directory, required for an atomic rename
  const tempPath = join(dir, `.tmp-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`);

  try {
    await writeFile(tempPath, content);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}

/**
 * Serialize as indented JSON and write atomically
 */
export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2) + '\n');
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
