import type { LogLevel } from '@/types/logLevel';

export interface SlimsyncConfig {
  system: SystemConfig;
  players: Record<string, PlayerConfig>;
  updatedAt?: string;
}

export interface SystemConfig {
  logging: LoggingConfig;
}

export interface LoggingConfig {
  consoleLevel: LogLevel;
  json: boolean;
}

export interface PlayerConfig {
  /**
   * Static delay correction for this player in milliseconds. Subtracted from the
   * reported elapsed time when comparing group members.
   */
  syncAdjustMs: number;
  crossfade: boolean;
  /** Crossfade length in seconds (1-10). */
  crossfadeDuration: number;
}
