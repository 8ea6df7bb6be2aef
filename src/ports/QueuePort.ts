import type { PlayerQueue } from '@/domain/players/types';

export interface QueuePort {
  getActiveQueue(playerId: string): PlayerQueue;
  resume(queueId: string, fadeIn: boolean): Promise<void>;
}
