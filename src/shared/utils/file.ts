import { promises as fs } from 'node:fs';
import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { safeJsonParse } from '@/shared/bestEffort';

const log = createLogger('Core', 'File');

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

/**
 * Removes a file, treating a missing file as success.
 */
export async function removeIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if (isErrno(error, 'ENOENT')) {
      return false;
    }
    throw error;
  }
}

export function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Reads a JSON file and returns its parsed value (or undefined if missing or invalid).
 */
export async function readJson(filePath: string): Promise<unknown> {
  try {
    const content = await fs.readFile(filePath, 'utf-8');
    const parsed = safeJsonParse(content, undefined, {
      onError: 'debug',
      log,
      label: 'json parse failed',
      context: { filePath },
    });
    if (parsed === undefined) {
      log.warn('failed to read json', { filePath, error: 'invalid json' });
    }
    return parsed;
  } catch (error) {
    if (!isErrno(error, 'ENOENT')) {
      log.warn('failed to read json', {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return undefined;
  }
}

/**
 * Writes pretty-printed JSON through a sibling temp file so readers never see a torn file.
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8');
  await fs.rename(tempPath, filePath);
}
