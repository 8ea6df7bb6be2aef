import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { safeJsonParse } from '@/shared/bestEffort';

const log = createLogger('Core', 'File');

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Resolves an absolute path under the `data` directory of the working directory.
 */
export function resolveDataDir(...segments: string[]): string {
  return path.resolve(process.cwd(), 'data', ...segments);
}

/**
 * Reads a JSON file and returns its parsed value (or undefined if missing or malformed).
 */
export async function readJson<T>(filePath: string): Promise<T | undefined> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code !== 'ENOENT') {
      log.warn('failed to read json', {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return undefined;
  }
  const parsed = safeJsonParse<T | undefined>(content, undefined, {
    onError: 'debug',
    log,
    label: 'json parse failed',
    context: { filePath },
  });
  if (parsed === undefined) {
    log.warn('failed to read json', { filePath, error: 'invalid json' });
  }
  return parsed;
}

/**
 * Serializes a value to pretty-printed JSON on disk.
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}
