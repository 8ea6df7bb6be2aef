import type { PlayerConfig, SlimsyncConfig } from '@/domain/config/types';

export interface ConfigPort {
  load(): Promise<SlimsyncConfig>;
  getConfig(): SlimsyncConfig;
  getPlayerConfigValue<K extends keyof PlayerConfig>(
    playerId: string,
    key: K,
    fallback: PlayerConfig[K],
  ): PlayerConfig[K];
  updatePlayerConfig(playerId: string, patch: Partial<PlayerConfig>): Promise<SlimsyncConfig>;
}

export type { PlayerConfig, SlimsyncConfig };
