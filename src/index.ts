/**
 * Package entry. The compiled output under `dist/` keeps the `@/` imports, so
 * loading it needs the alias registered first:
 * `TS_NODE_BASE_URL=dist node -r tsconfig-paths/register`.
 */
import path from 'node:path';
import { loadConfig } from '@/config';
import type { EngineSettings } from '@/config/engine';
import { logManager } from '@/shared/logging/logger';
import { StorageAdapter } from '@/adapters/storage/StorageAdapter';
import { ConfigAdapter } from '@/adapters/config/ConfigAdapter';
import { JsonCacheStore } from '@/adapters/cache/jsonCacheStore';
import { createConfigRepository } from '@/application/config/configRepository';
import { createPlayerRegistry } from '@/application/players/playerRegistry';
import { SyncEngine } from '@/application/sync/syncEngine';
import { systemClock } from '@/infrastructure/time/systemClock';
import type { CachePort } from '@/ports/CachePort';
import type { ClockPort } from '@/ports/ClockPort';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { PlayerRegistryPort } from '@/ports/PlayerRegistryPort';
import type { PlayerTransportPort } from '@/ports/PlayerTransportPort';
import type { QueuePort } from '@/ports/QueuePort';
import type { StreamJobPort } from '@/ports/StreamJobPort';

export type CreateSyncEngineOptions = {
  transport: PlayerTransportPort;
  queues: QueuePort;
  streams: StreamJobPort;
  registry?: PlayerRegistryPort;
  config?: ConfigPort;
  cache?: CachePort;
  clock?: ClockPort;
  settings?: Partial<EngineSettings>;
  /** Working directory holding the `data` folder; defaults to the process cwd. */
  cwd?: string;
};

/**
 * Wires the engine with file-backed config and cache unless replacements are given,
 * loads the config and applies its logging settings.
 */
export async function createSyncEngine(options: CreateSyncEngineOptions): Promise<SyncEngine> {
  const appConfig = loadConfig(options.settings, options.cwd);
  const storage = new StorageAdapter();
  const config =
    options.config ??
    new ConfigAdapter(createConfigRepository(storage, path.join(appConfig.env.dataDir, 'config.json')));
  const loaded = await config.load();
  logManager.configure({
    level: loaded.system.logging.consoleLevel,
    json: loaded.system.logging.json,
  });

  return new SyncEngine({
    transport: options.transport,
    registry: options.registry ?? createPlayerRegistry(),
    queues: options.queues,
    streams: options.streams,
    config,
    cache: options.cache ?? new JsonCacheStore(storage, path.join(appConfig.env.dataDir, 'cache.json')),
    clock: options.clock ?? systemClock,
    settings: appConfig.engine,
  });
}

export { SyncEngine } from '@/application/sync/syncEngine';
export type { CorrectionOutcome } from '@/application/sync/driftCorrector';
export type { BarrierResult } from '@/application/sync/startBarrier';
export type { FanOutResult } from '@/application/sync/groupCommandDispatcher';
export { PlaypointTracker } from '@/application/sync/playpointTracker';
export { PlayerRegistry, createPlayerRegistry } from '@/application/players/playerRegistry';
export { DEFAULT_ENGINE_SETTINGS, type EngineSettings, type RestartPolicy } from '@/config/engine';
export { SyncPreconditionError, TransportError } from '@/shared/errors';
export { createLogger, logManager } from '@/shared/logging/logger';
export { checkMembership, syncRoleOf } from '@/domain/players/membership';
export type * from '@/domain/players/types';
export type * from '@/ports/PlayerTransportPort';
export type { QueuePort } from '@/ports/QueuePort';
export type { StreamJobPort, MultiClientJobRequest, ItemUrlRequest } from '@/ports/StreamJobPort';
export type { ConfigPort, PlayerConfig, SlimsyncConfig } from '@/ports/ConfigPort';
export type { CachePort } from '@/ports/CachePort';
export type { ClockPort, TimerHandle } from '@/ports/ClockPort';
export type { PlayerRegistryPort } from '@/ports/PlayerRegistryPort';
