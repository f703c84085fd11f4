import type { StoragePort, StorageReadOptions } from '@/ports/StoragePort';
import { readJson, removeIfExists, writeJson } from '@/shared/utils/file';

export class StorageAdapter implements StoragePort {
  public async readJson(filePath: string, fallback: unknown, options?: StorageReadOptions): Promise<unknown> {
    const data = await readJson(filePath);
    if (data !== undefined) {
      return data;
    }
    if (options?.writeIfMissing) {
      await writeJson(filePath, fallback);
    }
    return fallback;
  }

  public async writeJson(filePath: string, data: unknown): Promise<void> {
    await writeJson(filePath, data);
  }

  public async remove(filePath: string): Promise<void> {
    await removeIfExists(filePath);
  }
}
