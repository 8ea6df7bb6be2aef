import type { StoragePort } from '@/ports/StoragePort';
import { resolveDataDir } from '@/shared/utils/file';
import type { PlayerConfig, SlimsyncConfig } from '@/domain/config/types';
import type { LogLevel } from '@/types/logLevel';

const LOG_LEVELS: readonly LogLevel[] = ['spam', 'debug', 'info', 'warn', 'error', 'none'];

export const DEFAULT_PLAYER_CONFIG: PlayerConfig = {
  syncAdjustMs: 0,
  crossfade: false,
  crossfadeDuration: 8,
};

/**
 * Configuration store backed by a JSON file on disk.
 */
export class ConfigRepository {
  private config: SlimsyncConfig | null = null;

  constructor(
    private readonly storage: StoragePort,
    private readonly configPath: string = resolveDataDir('config.json'),
  ) {}

  public async load(): Promise<SlimsyncConfig> {
    const fallback = defaultConfig();
    const loaded = await this.storage.readJson<unknown>(this.configPath, fallback, {
      writeIfMissing: true,
    });
    const normalized = normalizeConfig(loaded);
    this.config = normalized.config;
    if (normalized.migrated) {
      await this.storage.writeJson(this.configPath, this.config);
    }
    return this.config;
  }

  public get(): SlimsyncConfig {
    if (!this.config) {
      throw new Error('configuration not loaded');
    }
    return this.config;
  }

  public getPlayer(playerId: string): PlayerConfig {
    const stored = this.get().players[playerId];
    return stored ? { ...DEFAULT_PLAYER_CONFIG, ...stored } : { ...DEFAULT_PLAYER_CONFIG };
  }

  public async save(): Promise<void> {
    await this.storage.writeJson(this.configPath, this.get());
  }

  public async update(
    mutator: (config: SlimsyncConfig) => void | Promise<void>,
  ): Promise<SlimsyncConfig> {
    const cfg = this.config ?? (await this.load());
    const before = serializeConfig(cfg);
    await mutator(cfg);
    const normalized = normalizeConfig(cfg).config;
    if (serializeConfig(normalized) !== before) {
      normalized.updatedAt = new Date().toISOString();
    }
    this.config = normalized;
    await this.save();
    return normalized;
  }
}

export function createConfigRepository(storage: StoragePort, configPath?: string): ConfigRepository {
  return new ConfigRepository(storage, configPath);
}

function serializeConfig(config: SlimsyncConfig): string {
  return JSON.stringify(config, (key, value) => (key === 'updatedAt' ? undefined : value));
}

function defaultConfig(): SlimsyncConfig {
  return {
    system: {
      logging: {
        consoleLevel: 'info',
        json: false,
      },
    },
    players: {},
    updatedAt: new Date().toISOString(),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeConfig(raw: unknown): { config: SlimsyncConfig; migrated: boolean } {
  const fallback = defaultConfig();
  if (!isRecord(raw)) {
    return { config: fallback, migrated: true };
  }
  let migrated = false;

  const system = isRecord(raw.system) ? raw.system : {};
  const logging = isRecord(system.logging) ? system.logging : {};
  const level = LOG_LEVELS.find((candidate) => candidate === logging.consoleLevel);
  if (!level || typeof logging.json !== 'boolean') {
    migrated = true;
  }

  const players: Record<string, PlayerConfig> = {};
  const rawPlayers = isRecord(raw.players) ? raw.players : {};
  if (!isRecord(raw.players)) migrated = true;
  for (const [playerId, value] of Object.entries(rawPlayers)) {
    const entry = normalizePlayer(value);
    if (entry.migrated) migrated = true;
    players[playerId] = entry.config;
  }

  return {
    config: {
      system: {
        logging: {
          consoleLevel: level ?? fallback.system.logging.consoleLevel,
          json: typeof logging.json === 'boolean' ? logging.json : false,
        },
      },
      players,
      updatedAt: typeof raw.updatedAt === 'string' ? raw.updatedAt : fallback.updatedAt,
    },
    migrated,
  };
}

function normalizePlayer(raw: unknown): { config: PlayerConfig; migrated: boolean } {
  if (!isRecord(raw)) {
    return { config: { ...DEFAULT_PLAYER_CONFIG }, migrated: true };
  }
  const syncAdjust = Number(raw.syncAdjustMs);
  const duration = Number(raw.crossfadeDuration);
  const config: PlayerConfig = {
    syncAdjustMs: Number.isFinite(syncAdjust) ? Math.round(syncAdjust) : DEFAULT_PLAYER_CONFIG.syncAdjustMs,
    crossfade: raw.crossfade === true,
    crossfadeDuration: Number.isFinite(duration)
      ? Math.min(10, Math.max(1, Math.round(duration)))
      : DEFAULT_PLAYER_CONFIG.crossfadeDuration,
  };
  const migrated =
    config.syncAdjustMs !== raw.syncAdjustMs ||
    config.crossfade !== raw.crossfade ||
    config.crossfadeDuration !== raw.crossfadeDuration;
  return { config, migrated };
}
