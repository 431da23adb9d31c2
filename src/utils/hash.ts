import { createHash } from 'crypto';
import { readFile } from 'fs/promises';

/**
 * Generate SHA-256 hash of a string (UTF-8)
 */
export function hashString(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * Generate SHA-256 hash of raw bytes
 */
export function hashBytes(content: Uint8Array): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Generate SHA-256 hash of a file
 */
export async function hashFile(filepath: string): Promise<string> {
  const content = await readFile(filepath);
  return hashBytes(content);
}

/**
 * Generate a short hash suitable for display
 */
export function shortHash(content: string, length: number = 8): string {
  return hashString(content).substring(0, length);
}
