import type { Player } from '@/domain/players/types';

export type PlayerUpdatedListener = (player: Player) => void;

export interface PlayerRegistryPort {
  get(playerId: string): Player | undefined;
  getAll(): Player[];
  registerOrUpdate(player: Player): void;
  /** Notifies observers that the record of `playerId` changed. */
  update(playerId: string): void;
  remove(playerId: string): void;
  onPlayerUpdated(listener: PlayerUpdatedListener): () => void;
}
