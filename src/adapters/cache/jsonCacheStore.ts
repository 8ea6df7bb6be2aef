import type { CachePort } from '@/ports/CachePort';
import type { StoragePort } from '@/ports/StoragePort';
import { resolveDataDir } from '@/shared/utils/file';
import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/errors';

type CacheFile = Record<string, unknown>;

/**
 * Key/value cache kept in memory and mirrored to a JSON file.
 * Writes are serialized so concurrent `set` calls never interleave on disk.
 */
export class JsonCacheStore implements CachePort {
  private readonly log = createLogger('Cache', 'Json');
  private entries: Map<string, unknown> | null = null;
  private loading: Promise<Map<string, unknown>> | null = null;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(
    private readonly storage: StoragePort,
    private readonly filePath: string = resolveDataDir('cache.json'),
  ) {}

  public async get<T>(key: string): Promise<T | undefined> {
    const entries = await this.ensureLoaded();
    if (!entries.has(key)) return undefined;
    return entries.get(key) as T;
  }

  public async set(key: string, value: unknown): Promise<void> {
    const entries = await this.ensureLoaded();
    entries.set(key, value);
    const snapshot: CacheFile = Object.fromEntries(entries);
    const write = this.writeChain.then(() => this.storage.writeJson(this.filePath, snapshot));
    this.writeChain = write.catch((error: unknown) => {
      this.log.warn('cache write failed', {
        filePath: this.filePath,
        message: errorMessage(error),
      });
    });
    await write;
  }

  private async ensureLoaded(): Promise<Map<string, unknown>> {
    if (this.entries) return this.entries;
    if (!this.loading) {
      this.loading = this.storage.readJson<CacheFile>(this.filePath, {}).then((raw) => {
        const entries = new Map<string, unknown>(
          raw && typeof raw === 'object' && !Array.isArray(raw) ? Object.entries(raw) : [],
        );
        this.entries = entries;
        return entries;
      });
    }
    return this.loading;
  }
}
