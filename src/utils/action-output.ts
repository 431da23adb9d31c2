import { appendFile } from 'fs/promises';
import { createChildLogger } from './logger.js';

const logger = createChildLogger('action-output');

/**
 * Make a value safe for a single `key=value` line of a GitHub Actions output
 * file: one line, ASCII only.
 */
export function toActionOutputValue(value: string | undefined | null): string {
  if (!value) {
    return '';
  }

  const singleLine = value.replace(/[\r\n]/g, ' ');
  const substituted = singleLine.replace(/•/g, '-').replace(/…/g, '...');
  return Array.from(substituted)
    .map((char) => ((char.codePointAt(0) ?? 0) < 128 ? char : '?'))
    .join('');
}

/**
 * Append outputs to the file named by GITHUB_OUTPUT. Without an output file
 * the values are only logged.
 */
export async function writeActionOutputs(
  outputFile: string | undefined,
  outputs: Record<string, string>
): Promise<void> {
  const lines = Object.entries(outputs).map(([key, value]) => `${key}=${toActionOutputValue(value)}\n`);

  if (!outputFile) {
    logger.debug({ outputs }, 'No output file configured, skipping action outputs');
    return;
  }

  await appendFile(outputFile, lines.join(''), 'utf-8');
}
