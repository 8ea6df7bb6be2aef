import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/errors';
import type { Player } from '@/domain/players/types';
import type { PlayerRegistryPort, PlayerUpdatedListener } from '@/ports/PlayerRegistryPort';

/**
 * In-memory player records plus change observers.
 */
export class PlayerRegistry implements PlayerRegistryPort {
  private readonly log = createLogger('Players', 'Registry');
  private readonly players = new Map<string, Player>();
  private readonly listeners = new Set<PlayerUpdatedListener>();

  public get(playerId: string): Player | undefined {
    return this.players.get(playerId);
  }

  public getAll(): Player[] {
    return Array.from(this.players.values());
  }

  public registerOrUpdate(player: Player): void {
    const isNew = !this.players.has(player.id);
    this.players.set(player.id, player);
    if (isNew) {
      this.log.debug('player registered', { playerId: player.id, name: player.name });
    }
    this.emit(player);
  }

  public update(playerId: string): void {
    const player = this.players.get(playerId);
    if (!player) return;
    this.emit(player);
  }

  public remove(playerId: string): void {
    this.players.delete(playerId);
  }

  public onPlayerUpdated(listener: PlayerUpdatedListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private emit(player: Player): void {
    for (const listener of this.listeners) {
      try {
        listener(player);
      } catch (error) {
        this.log.warn('player update listener failed', { playerId: player.id, message: errorMessage(error) });
      }
    }
  }
}

export function createPlayerRegistry(): PlayerRegistry {
  return new PlayerRegistry();
}
