import type { StoragePort, StorageReadOptions } from '@/ports/StoragePort';
import { readJson, writeJson } from '@/shared/utils/file';

/**
 * JSON file storage used by the config repository and the cache store.
 */
export class StorageAdapter implements StoragePort {
  public async readJson<T>(filePath: string, fallback: T, options?: StorageReadOptions): Promise<T> {
    const data = await readJson<T>(filePath);
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
}
