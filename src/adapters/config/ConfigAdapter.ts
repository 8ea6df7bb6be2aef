import type { ConfigPort, PlayerConfig } from '@/ports/ConfigPort';
import type { ConfigRepository } from '@/application/config/configRepository';

export class ConfigAdapter implements ConfigPort {
  constructor(private readonly repository: ConfigRepository) {}

  public load(): ReturnType<ConfigPort['load']> {
    return this.repository.load();
  }

  public getConfig(): ReturnType<ConfigPort['getConfig']> {
    return this.repository.get();
  }

  public getPlayerConfigValue<K extends keyof PlayerConfig>(
    playerId: string,
    key: K,
    fallback: PlayerConfig[K],
  ): PlayerConfig[K] {
    const stored = this.repository.get().players[playerId];
    if (!stored) return fallback;
    return stored[key] ?? fallback;
  }

  public updatePlayerConfig(
    playerId: string,
    patch: Partial<PlayerConfig>,
  ): ReturnType<ConfigPort['updatePlayerConfig']> {
    return this.repository.update((cfg) => {
      cfg.players[playerId] = { ...this.repository.getPlayer(playerId), ...patch };
    });
  }
}
