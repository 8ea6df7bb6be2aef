import { createLogger } from '@/shared/logging/logger';
import { SyncPreconditionError } from '@/shared/errors';
import { syncRoleOf } from '@/domain/players/membership';
import type { Player, SyncRole } from '@/domain/players/types';
import type { PlayerRegistryPort } from '@/ports/PlayerRegistryPort';
import type { QueuePort } from '@/ports/QueuePort';
import type { GroupCommandDispatcher } from '@/application/sync/groupCommandDispatcher';
import type { PlaypointTracker } from '@/application/sync/playpointTracker';
import type { RestartScheduler } from '@/application/sync/restartScheduler';

export type SyncGroupManagerDeps = {
  registry: PlayerRegistryPort;
  queues: QueuePort;
  commands: GroupCommandDispatcher;
  restarts: RestartScheduler;
  tracker: PlaypointTracker;
};

/**
 * Owns every mutation of `syncedTo` / `groupChilds`.
 * Mutations never span an await, so other handlers always see a consistent group.
 */
export class SyncGroupManager {
  private readonly log = createLogger('Sync', 'Groups');

  constructor(private readonly deps: SyncGroupManagerDeps) {}

  public roleOf(playerId: string): SyncRole {
    const player = this.deps.registry.get(playerId);
    return player ? syncRoleOf(player) : 'unsynced';
  }

  public sync(childId: string, masterId: string): void {
    const { registry, queues, restarts } = this.deps;
    if (childId === masterId) {
      throw new SyncPreconditionError('A player cannot be synced to itself', childId);
    }
    const child = this.require(childId);
    const master = this.require(masterId);
    if (master.syncedTo) {
      throw new SyncPreconditionError('Player is already synced', masterId, { syncedTo: master.syncedTo });
    }
    if (child.syncedTo && child.syncedTo !== masterId) {
      throw new SyncPreconditionError('Player is already synced to another player', childId, {
        syncedTo: child.syncedTo,
      });
    }
    if (child.syncedTo === masterId) {
      return;
    }
    if (child.groupChilds.size > 0) {
      throw new SyncPreconditionError('A group master cannot join another group', childId, {
        groupChilds: child.groupChilds,
      });
    }

    const created = master.groupChilds.size === 0;
    master.groupChilds.add(masterId);
    master.groupChilds.add(childId);
    child.syncedTo = masterId;
    this.log.info(created ? 'group created' : 'group updated', {
      masterId,
      childId,
      members: master.groupChilds,
    });

    const queue = queues.getActiveQueue(masterId);
    if (queue.state === 'playing') {
      // a new shared stream is needed; several syncs in a row restart only once
      restarts.schedule(masterId, () => queues.resume(queue.queueId, false));
      return;
    }
    registry.update(childId);
    registry.update(masterId);
  }

  public async unsync(childId: string): Promise<void> {
    const { registry, commands, tracker } = this.deps;
    const child = this.require(childId);
    const masterId = child.syncedTo;
    if (!masterId) {
      throw new SyncPreconditionError('Player is not synced', childId);
    }

    await commands.stop(childId);
    if (child.syncedTo !== masterId) {
      // another unsync completed while the stop was in flight
      return;
    }

    child.syncedTo = null;
    tracker.forget(childId);
    const master = registry.get(masterId);
    if (master) {
      master.groupChilds.delete(childId);
      if (master.groupChilds.size === 1 && master.groupChilds.has(masterId)) {
        master.groupChilds.clear();
        this.log.info('group dissolved', { masterId });
      }
    }
    registry.update(childId);
    if (master) {
      registry.update(masterId);
    }
  }

  private require(playerId: string): Player {
    const player = this.deps.registry.get(playerId);
    if (!player) {
      throw new SyncPreconditionError('Unknown player', playerId);
    }
    return player;
  }
}
