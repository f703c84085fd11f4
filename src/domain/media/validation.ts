import path from 'node:path';
import { PlayerError, validationError } from '@/domain/playback/errors';
import { OUTPUT_ROUTES, type OutputRoute } from '@/domain/playback/types';

export const VOLUME_MIN = 0;
export const VOLUME_MAX = 150;
export const SEEK_MIN = 0;
export const SEEK_MAX = 86_400;
export const SKIP_MIN = -3_600;
export const SKIP_MAX = 3_600;

export const ALLOWED_EXTENSIONS: ReadonlySet<string> = new Set([
  '.mp4',
  '.avi',
  '.mkv',
  '.mov',
  '.wmv',
  '.flv',
  '.webm',
  '.m4v',
  '.mpg',
  '.mpeg',
  '.3gp',
  '.ogv',
]);

const MAX_FILENAME_LENGTH = 255;

/**
 * Accepts numbers and numeric strings; everything else is NaN.
 */
function toNumber(value: unknown): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value.trim());
  }
  return Number.NaN;
}

export function validateVolume(value: unknown): number {
  const level = toNumber(value);
  if (!Number.isInteger(level)) {
    throw validationError(`Invalid volume value: ${String(value)}`, value);
  }
  if (level < VOLUME_MIN || level > VOLUME_MAX) {
    throw validationError(
      `Volume must be between ${VOLUME_MIN} and ${VOLUME_MAX}, got ${level}`,
      value,
    );
  }
  return level;
}

export function validateSeekPosition(value: unknown): number {
  const position = toNumber(value);
  if (!Number.isFinite(position)) {
    throw validationError(`Invalid seek position: ${String(value)}`, value);
  }
  if (position < SEEK_MIN || position > SEEK_MAX) {
    throw validationError(
      `Seek position must be between ${SEEK_MIN} and ${SEEK_MAX}, got ${position}`,
      value,
    );
  }
  return position;
}

export function validateSkipDelta(value: unknown): number {
  const delta = toNumber(value);
  if (!Number.isFinite(delta)) {
    throw validationError(`Invalid skip duration: ${String(value)}`, value);
  }
  if (delta < SKIP_MIN || delta > SKIP_MAX) {
    throw validationError(
      `Skip duration must be between ${SKIP_MIN} and ${SKIP_MAX}, got ${delta}`,
      value,
    );
  }
  return delta;
}

export function validateOutputRoute(value: unknown): OutputRoute {
  const route = OUTPUT_ROUTES.find((candidate) => candidate === value);
  if (!route) {
    throw validationError(
      `Invalid HDMI output: ${String(value)}. Must be one of ${OUTPUT_ROUTES.join(', ')}`,
      value,
    );
  }
  return route;
}

export function hasAllowedExtension(name: string): boolean {
  return ALLOWED_EXTENSIONS.has(path.extname(name).toLowerCase());
}

export interface ResolvedMediaName {
  name: string;
  absolutePath: string;
}

/**
 * Resolves a caller-supplied media name to a path strictly inside `mediaDir`.
 * Only plain file names are accepted: no separators, no traversal, no
 * absolute paths, no hidden files, and only the allowed video extensions.
 */
export function resolveMediaName(value: unknown, mediaDir: string): ResolvedMediaName {
  if (typeof value !== 'string' || value.trim() === '') {
    throw invalidFilename('Filename cannot be empty', value);
  }
  const name = value.trim();
  if (name.length > MAX_FILENAME_LENGTH) {
    throw invalidFilename('Filename is too long', value);
  }
  if (/[\u0000-\u001f]/.test(name)) {
    throw invalidFilename(`Invalid filename: ${JSON.stringify(name)}`, value);
  }
  if (path.isAbsolute(name) || path.win32.isAbsolute(name)) {
    throw invalidFilename('Absolute paths are not allowed', value);
  }
  if (name.includes('..') || name.includes('/') || name.includes('\\')) {
    throw invalidFilename('Path traversal attempt detected', value);
  }
  if (name.startsWith('.')) {
    throw invalidFilename(`Invalid filename: ${name}`, value);
  }
  const extension = path.extname(name).toLowerCase();
  if (!ALLOWED_EXTENSIONS.has(extension)) {
    throw invalidFilename(
      `File type ${extension || '(none)'} not allowed. Allowed types: ${[...ALLOWED_EXTENSIONS].join(', ')}`,
      value,
    );
  }

  const root = path.resolve(mediaDir);
  const absolutePath = path.resolve(root, name);
  const relative = path.relative(root, absolutePath);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative) || relative.includes(path.sep)) {
    throw invalidFilename('Path traversal attempt detected', value);
  }
  return { name, absolutePath };
}

function invalidFilename(message: string, value: unknown): PlayerError {
  return new PlayerError('invalid-filename', message, { value });
}
