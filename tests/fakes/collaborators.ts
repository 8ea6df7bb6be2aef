import type { PlayerConfig, SlimsyncConfig } from '../../src/domain/config/types';
import type { PlayerQueue, QueueItem, StreamJob } from '../../src/domain/players/types';
import type { CachePort } from '../../src/ports/CachePort';
import type { ConfigPort } from '../../src/ports/ConfigPort';
import type { QueuePort } from '../../src/ports/QueuePort';
import type { StorageReadOptions, StoragePort } from '../../src/ports/StoragePort';
import type { AudioCodec } from '../../src/ports/PlayerTransportPort';
import type { ItemUrlRequest, MultiClientJobRequest, StreamJobPort } from '../../src/ports/StreamJobPort';

export class FakeQueues implements QueuePort {
  private readonly queues = new Map<string, PlayerQueue>();
  public readonly resumeCalls: Array<{ queueId: string; fadeIn: boolean }> = [];
  public failResume: Error | null = null;

  public setQueue(playerId: string, queue: PlayerQueue): void {
    this.queues.set(playerId, queue);
  }

  public getActiveQueue(playerId: string): PlayerQueue {
    return this.queues.get(playerId) ?? { queueId: playerId, state: 'idle' };
  }

  public async resume(queueId: string, fadeIn: boolean): Promise<void> {
    this.resumeCalls.push({ queueId, fadeIn });
    if (this.failResume) throw this.failResume;
  }
}

export class FakeStreams implements StreamJobPort {
  private readonly jobs = new Map<string, StreamJob>();
  private counter = 0;
  public readonly created: MultiClientJobRequest[] = [];

  public async createMultiClientJob(request: MultiClientJobRequest): Promise<StreamJob> {
    this.created.push(request);
    this.counter += 1;
    const job: StreamJob = { jobId: `job-${this.counter}`, queueId: request.queueId };
    this.jobs.set(request.queueId, job);
    return job;
  }

  public setJob(job: StreamJob): void {
    this.jobs.set(job.queueId, job);
  }

  public getMultiClientJob(queueId: string): StreamJob | undefined {
    return this.jobs.get(queueId);
  }

  public resolveJobUrl(job: StreamJob, playerId: string, codec: AudioCodec): string {
    return `http://stream.test/${job.jobId}/${playerId}.${codec}`;
  }

  public async resolveItemUrl(request: ItemUrlRequest): Promise<string> {
    return `http://stream.test/item/${request.item.queueItemId}.${request.codec}`;
  }
}

export class MemoryConfig implements ConfigPort {
  private config: SlimsyncConfig = {
    system: { logging: { consoleLevel: 'none', json: false } },
    players: {},
  };

  constructor(players: Record<string, Partial<PlayerConfig>> = {}) {
    for (const [playerId, patch] of Object.entries(players)) {
      this.config.players[playerId] = { syncAdjustMs: 0, crossfade: false, crossfadeDuration: 8, ...patch };
    }
  }

  public async load(): Promise<SlimsyncConfig> {
    return this.config;
  }

  public getConfig(): SlimsyncConfig {
    return this.config;
  }

  public getPlayerConfigValue<K extends keyof PlayerConfig>(
    playerId: string,
    key: K,
    fallback: PlayerConfig[K],
  ): PlayerConfig[K] {
    const stored = this.config.players[playerId];
    return stored ? stored[key] : fallback;
  }

  public async updatePlayerConfig(playerId: string, patch: Partial<PlayerConfig>): Promise<SlimsyncConfig> {
    const existing: Partial<PlayerConfig> = this.config.players[playerId];
    this.config.players[playerId] = {
      syncAdjustMs: 0,
      crossfade: false,
      crossfadeDuration: 8,
      ...existing,
      ...patch,
    };
    return this.config;
  }
}

/**
 * In-memory storage keeping each file as its serialized JSON text.
 */
export class MemoryStorage implements StoragePort {
  public readonly files = new Map<string, string>();
  public writes = 0;

  public async readJson<T>(filePath: string, fallback: T, options?: StorageReadOptions): Promise<T> {
    const raw = this.files.get(filePath);
    if (raw === undefined) {
      if (options?.writeIfMissing) {
        await this.writeJson(filePath, fallback);
      }
      return fallback;
    }
    return JSON.parse(raw) as T;
  }

  public async writeJson(filePath: string, data: unknown): Promise<void> {
    this.writes += 1;
    this.files.set(filePath, JSON.stringify(data));
  }
}

export class MemoryCache implements CachePort {
  public readonly entries = new Map<string, unknown>();

  public async get<T>(key: string): Promise<T | undefined> {
    return this.entries.get(key) as T | undefined;
  }

  public async set(key: string, value: unknown): Promise<void> {
    this.entries.set(key, value);
  }
}

export function queueItem(queueItemId: string, queueId: string, overrides: Partial<QueueItem> = {}): QueueItem {
  return { queueItemId, queueId, name: `Track ${queueItemId}`, ...overrides };
}
