/**
 * Playback state reported by an audio endpoint.
 * `buffer_ready` means a new track is pre-buffered and waits for an explicit start.
 */
export type PlayerState = 'idle' | 'playing' | 'paused' | 'buffering' | 'buffer_ready';

export type SyncRole = 'unsynced' | 'master' | 'child';

/**
 * Logical record of one audio endpoint as seen by the rest of the server.
 */
export interface Player {
  id: string;
  name: string;
  available: boolean;
  powered: boolean;
  volumeLevel: number;
  volumeMuted: boolean;
  state: PlayerState;
  /** Best estimate of the playback position, monotonic while playing. */
  elapsedTimeMs: number;
  /** Wall clock (ms) of the last elapsed time estimate. */
  elapsedTimeLastUpdated: number;
  /** Id of the group master this player follows; null for masters and unsynced players. */
  syncedTo: string | null;
  /** Group members (self included) while this player is a master; empty otherwise. */
  groupChilds: Set<string>;
  canSyncWith: string[];
  currentItemId: string | null;
}

/** One drift observation of a synced child against its master. */
export interface SyncPlaypoint {
  timestamp: number;
  streamJobId: string;
  /** Positive when the child is behind the master. */
  diffMs: number;
}

/** Correlation token for one shared multi-client stream session. */
export interface StreamJob {
  jobId: string;
  queueId: string;
}

export interface QueueItem {
  queueItemId: string;
  queueId: string;
  name: string;
  durationSec?: number;
  imageUrl?: string;
  artist?: string;
  album?: string;
}

export type QueueState = 'idle' | 'playing' | 'paused';

export interface PlayerQueue {
  queueId: string;
  state: QueueState;
}

export function createPlayer(id: string, overrides: Partial<Player> = {}): Player {
  return {
    id,
    name: id,
    available: true,
    powered: false,
    volumeLevel: 0,
    volumeMuted: false,
    state: 'idle',
    elapsedTimeMs: 0,
    elapsedTimeLastUpdated: 0,
    syncedTo: null,
    groupChilds: new Set<string>(),
    canSyncWith: [],
    currentItemId: null,
    ...overrides,
  };
}
