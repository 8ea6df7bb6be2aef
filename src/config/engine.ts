export type RestartPolicy = 'per-group' | 'shared';

/**
 * Tunables of the synchronization engine. All durations are milliseconds.
 */
export interface EngineSettings {
  /** Average drift below this is left alone. */
  minDeviationMs: number;
  /** Playpoints needed before a drift average is trusted. */
  requiredPlaypoints: number;
  /** Lag beyond which the master is paused instead of moving the child. */
  maxSkipAheadMs: number;
  /** A gap this long since the previous playpoint invalidates the history. */
  playpointStaleMs: number;
  /** Backoff after a skip-ahead, or added on top of a pause-for. */
  correctionBackoffMs: number;
  barrierPollIntervalMs: number;
  barrierMaxPolls: number;
  /** Backoff applied to every member right after a coordinated start. */
  startBackoffMs: number;
  /** Lead added to each member's clock reference for a coordinated start. */
  startLeadMs: number;
  resyncDebounceMs: number;
  restartPolicy: RestartPolicy;
  defaultVolume: number;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  minDeviationMs: 6,
  requiredPlaypoints: 8,
  maxSkipAheadMs: 1500,
  playpointStaleMs: 10_000,
  correctionBackoffMs: 2000,
  barrierPollIntervalMs: 100,
  barrierMaxPolls: 40,
  startBackoffMs: 1000,
  startLeadMs: 20,
  resyncDebounceMs: 500,
  restartPolicy: 'per-group',
  defaultVolume: 20,
};

export function resolveEngineSettings(overrides: Partial<EngineSettings> = {}): EngineSettings {
  return { ...DEFAULT_ENGINE_SETTINGS, ...overrides };
}
