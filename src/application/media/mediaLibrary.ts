import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { DiskUsage, MediaFile } from '@/domain/media/types';
import { hasAllowedExtension, resolveMediaName, type ResolvedMediaName } from '@/domain/media/validation';
import { PlayerError } from '@/domain/playback/errors';
import { bestEffort } from '@/shared/bestEffort';
import { createLogger } from '@/shared/logging/logger';
import { ensureDir, isErrno } from '@/shared/utils/file';

const log = createLogger('Media', 'Library');

/**
 * Read and delete access to the managed media directory. Listings always
 * come from the filesystem.
 */
export class MediaLibrary {
  constructor(private readonly mediaDir: () => string) {}

  public get dir(): string {
    return path.resolve(this.mediaDir());
  }

  public async init(): Promise<void> {
    await ensureDir(this.dir);
  }

  public async list(): Promise<MediaFile[]> {
    let entries: Array<{ name: string; isFile(): boolean }>;
    try {
      entries = await fs.readdir(this.dir, { withFileTypes: true });
    } catch (error) {
      if (isErrno(error, 'ENOENT')) {
        return [];
      }
      throw error;
    }
    const files: MediaFile[] = [];
    for (const entry of entries) {
      if (!entry.isFile() || entry.name.startsWith('.') || !hasAllowedExtension(entry.name)) {
        continue;
      }
      const file = await this.stat(entry.name, path.join(this.dir, entry.name));
      if (file) {
        files.push(file);
      }
    }
    files.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    log.debug('media listed', { count: files.length });
    return files;
  }

  /** Validates `name` and requires the file to exist, else `media-not-found`. */
  public async resolveExisting(name: unknown): Promise<ResolvedMediaName> {
    const resolved = resolveMediaName(name, this.dir);
    const file = await this.stat(resolved.name, resolved.absolutePath);
    if (!file) {
      throw new PlayerError('media-not-found', `File not found: ${resolved.name}`, { value: name });
    }
    return resolved;
  }

  public async describe(resolved: ResolvedMediaName): Promise<MediaFile> {
    const file = await this.stat(resolved.name, resolved.absolutePath);
    if (!file) {
      throw new PlayerError('media-not-found', `File not found: ${resolved.name}`, { value: resolved.name });
    }
    return file;
  }

  public async remove(resolved: ResolvedMediaName): Promise<void> {
    try {
      await fs.unlink(resolved.absolutePath);
    } catch (error) {
      if (isErrno(error, 'ENOENT')) {
        throw new PlayerError('media-not-found', `File not found: ${resolved.name}`, { value: resolved.name });
      }
      throw error;
    }
    log.info('media deleted', { name: resolved.name });
  }

  public async diskUsage(): Promise<DiskUsage | null> {
    return bestEffort(
      async () => {
        const stats = await fs.statfs(this.dir);
        const total = stats.blocks * stats.bsize;
        const free = stats.bavail * stats.bsize;
        const used = total - free;
        return {
          total,
          used,
          free,
          percentUsed: total > 0 ? Math.round((used / total) * 10000) / 100 : 0,
        };
      },
      { fallback: null, onError: 'warn', log, label: 'disk usage unavailable', context: { dir: this.dir } },
    );
  }

  private async stat(name: string, filePath: string): Promise<MediaFile | null> {
    try {
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        return null;
      }
      return { name, size: stats.size, modified: stats.mtime.toISOString() };
    } catch (error) {
      if (isErrno(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }
}
