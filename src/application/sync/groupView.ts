import { groupMemberIds } from '@/domain/players/membership';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { PlayerRegistryPort } from '@/ports/PlayerRegistryPort';
import type { PlayerHandle, PlayerTransportPort } from '@/ports/PlayerTransportPort';

/**
 * Read-only view joining player records, live handles and per-player config.
 */
export class GroupView {
  constructor(
    private readonly registry: PlayerRegistryPort,
    private readonly transport: PlayerTransportPort,
    private readonly config: ConfigPort,
  ) {}

  public syncAdjustMs(playerId: string): number {
    return this.config.getPlayerConfigValue(playerId, 'syncAdjustMs', 0);
  }

  public correctedElapsedMs(handle: PlayerHandle): number {
    return handle.elapsedMs - this.syncAdjustMs(handle.id);
  }

  /**
   * Live handles of the player and every member of its group (when it is a master).
   */
  public syncHandles(playerId: string): PlayerHandle[] {
    const player = this.registry.get(playerId);
    const ids = player ? groupMemberIds(player) : [playerId];
    const handles: PlayerHandle[] = [];
    for (const id of ids) {
      const handle = this.transport.getHandle(id);
      if (handle) handles.push(handle);
    }
    return handles;
  }
}
