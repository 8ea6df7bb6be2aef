import { createLogger } from '@/shared/logging/logger';
import { bestEffortSync } from '@/shared/bestEffort';
import { errorMessage } from '@/shared/errors';
import type { EngineSettings } from '@/config/engine';
import { createPlayer, type Player } from '@/domain/players/types';
import type { CachePort } from '@/ports/CachePort';
import type { ClockPort } from '@/ports/ClockPort';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { PlayerRegistryPort } from '@/ports/PlayerRegistryPort';
import type { PlayerEvent, PlayerHandle, PlayerTransportPort } from '@/ports/PlayerTransportPort';
import type { QueuePort } from '@/ports/QueuePort';
import type { StreamJobPort } from '@/ports/StreamJobPort';
import { DriftCorrector, type CorrectionOutcome } from '@/application/sync/driftCorrector';
import {
  GroupCommandDispatcher,
  prevStateKey,
  type PreviousPlayerState,
} from '@/application/sync/groupCommandDispatcher';
import { GroupView } from '@/application/sync/groupView';
import { PlaypointTracker } from '@/application/sync/playpointTracker';
import { RestartScheduler } from '@/application/sync/restartScheduler';
import { ResyncBackoff } from '@/application/sync/resyncBackoff';
import { StartBarrier } from '@/application/sync/startBarrier';
import { SyncGroupManager } from '@/application/sync/syncGroupManager';
import { sendCommand } from '@/application/sync/transportCommands';

export type SyncEngineDeps = {
  transport: PlayerTransportPort;
  registry: PlayerRegistryPort;
  queues: QueuePort;
  streams: StreamJobPort;
  config: ConfigPort;
  cache: CachePort;
  clock: ClockPort;
  settings: EngineSettings;
};

/**
 * Entry point of the synchronization engine: consumes transport events and
 * exposes group commands and membership operations.
 */
export class SyncEngine {
  private readonly log = createLogger('Sync', 'Engine');
  private readonly tracker: PlaypointTracker;
  private readonly backoff: ResyncBackoff;
  private readonly restarts: RestartScheduler;
  private readonly corrector: DriftCorrector;
  private readonly barrier: StartBarrier;
  private readonly tasks = new Set<Promise<void>>();
  private unsubscribe: (() => void) | null = null;

  public readonly commands: GroupCommandDispatcher;
  public readonly groups: SyncGroupManager;

  constructor(private readonly deps: SyncEngineDeps) {
    const { registry, transport, queues, streams, config, cache, clock, settings } = deps;
    const view = new GroupView(registry, transport, config);
    this.tracker = new PlaypointTracker({
      capacity: settings.requiredPlaypoints,
      staleAfterMs: settings.playpointStaleMs,
    });
    this.backoff = new ResyncBackoff(clock);
    this.restarts = new RestartScheduler(clock, settings.resyncDebounceMs, settings.restartPolicy);
    this.corrector = new DriftCorrector({
      registry,
      transport,
      queues,
      streams,
      clock,
      view,
      tracker: this.tracker,
      backoff: this.backoff,
      settings,
    });
    this.barrier = new StartBarrier({ registry, transport, clock, view, backoff: this.backoff, settings });
    this.commands = new GroupCommandDispatcher({
      registry,
      transport,
      streams,
      config,
      cache,
      view,
      restarts: this.restarts,
    });
    this.groups = new SyncGroupManager({
      registry,
      queues,
      commands: this.commands,
      restarts: this.restarts,
      tracker: this.tracker,
    });
  }

  public start(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.deps.transport.subscribe((event) => this.dispatch(event));
    for (const handle of this.deps.transport.listHandles()) {
      this.dispatch({ type: 'connected', playerId: handle.id });
    }
    this.log.info('sync engine started', { players: this.deps.transport.listHandles().length });
  }

  public async shutdown(): Promise<void> {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.restarts.cancelAll();
    await this.settle();
    this.log.info('sync engine stopped');
  }

  /** Resolves once every event task started so far has finished. */
  public async settle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(Array.from(this.tasks));
    }
  }

  public dispatch(event: PlayerEvent): void {
    switch (event.type) {
      case 'connected':
        this.track(event, () => this.handleConnected(event.playerId));
        return;
      case 'disconnected':
        this.handleDisconnected(event.playerId);
        return;
      case 'buffer_ready':
        this.track(event, async () => {
          await this.barrier.handleBufferReady(event.playerId);
        });
        return;
      case 'heartbeat':
        this.guard(event, () => {
          this.handleHeartbeat(event.playerId);
        });
        return;
      case 'updated':
        this.guard(event, () => {
          const handle = this.deps.transport.getHandle(event.playerId);
          if (handle) this.applyHandleState(handle);
        });
        return;
      default: {
        const unknown: never = event;
        this.log.warn('unknown player event', { event: unknown });
      }
    }
  }

  public handleHeartbeat(playerId: string): CorrectionOutcome | null {
    const handle = this.deps.transport.getHandle(playerId);
    const player = this.deps.registry.get(playerId);
    if (!handle || !player || handle.state === 'idle') {
      return null;
    }
    player.elapsedTimeMs = handle.elapsedMs;
    player.elapsedTimeLastUpdated = this.deps.clock.now();
    if (!player.syncedTo) {
      return null;
    }
    return this.corrector.handleHeartbeat(playerId);
  }

  // errors of synchronous handlers never reach the transport that emitted the event
  private guard(event: PlayerEvent, run: () => void): void {
    bestEffortSync(run, {
      fallback: undefined,
      onError: 'warn',
      log: this.log,
      label: 'player event handler failed',
      context: { event: event.type, playerId: event.playerId },
    });
  }

  private track(event: PlayerEvent, run: () => Promise<void>): void {
    const task = run()
      .catch((error: unknown) => {
        this.log.warn('player event handler failed', {
          event: event.type,
          playerId: event.playerId,
          message: errorMessage(error),
        });
      })
      .finally(() => {
        this.tasks.delete(task);
      });
    this.tasks.add(task);
  }

  private async handleConnected(playerId: string): Promise<void> {
    const handle = this.deps.transport.getHandle(playerId);
    if (!handle) return;
    this.log.info('player connected', { playerId, name: handle.name });
    this.applyHandleState(handle);
    this.refreshSyncCandidates();

    const previous = parsePreviousState(await this.deps.cache.get<unknown>(prevStateKey(playerId)));
    const powered = previous?.[0] ?? false;
    const volume = previous?.[1] ?? this.deps.settings.defaultVolume;
    await sendCommand(handle, 'power', (target) => target.power(powered), this.log);
    await sendCommand(handle, 'volume_set', (target) => target.volumeSet(volume), this.log);
    const player = this.deps.registry.get(playerId);
    if (player) {
      player.powered = powered;
      player.volumeLevel = volume;
      this.deps.registry.update(playerId);
    }
  }

  private handleDisconnected(playerId: string): void {
    this.tracker.forget(playerId);
    this.backoff.release(playerId);
    const player = this.deps.registry.get(playerId);
    if (!player) return;
    this.log.info('player disconnected', { playerId, name: player.name });
    // the record keeps its group membership until an explicit unsync
    player.available = false;
    this.deps.registry.update(playerId);
  }

  private applyHandleState(handle: PlayerHandle): void {
    const existing = this.deps.registry.get(handle.id);
    const player: Player = existing ?? createPlayer(handle.id);
    player.available = true;
    player.name = handle.name;
    player.state = handle.state;
    player.volumeLevel = handle.volumeLevel;
    player.volumeMuted = handle.muted;
    player.currentItemId = handle.currentItemId;
    if (existing) {
      this.deps.registry.update(handle.id);
    } else {
      player.canSyncWith = this.syncCandidatesFor(handle.id);
      this.deps.registry.registerOrUpdate(player);
    }
  }

  private refreshSyncCandidates(): void {
    for (const player of this.deps.registry.getAll()) {
      player.canSyncWith = this.syncCandidatesFor(player.id);
      this.deps.registry.update(player.id);
    }
  }

  private syncCandidatesFor(playerId: string): string[] {
    return this.deps.transport
      .listHandles()
      .map((handle) => handle.id)
      .filter((id) => id !== playerId);
  }
}

function parsePreviousState(value: unknown): PreviousPlayerState | null {
  if (!Array.isArray(value) || value.length !== 2) return null;
  const [powered, volume] = value;
  if (typeof powered !== 'boolean' || typeof volume !== 'number' || !Number.isFinite(volume)) {
    return null;
  }
  return [powered, volume];
}
