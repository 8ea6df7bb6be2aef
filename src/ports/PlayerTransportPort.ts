import type { PlayerState } from '@/domain/players/types';

export type AudioCodec = 'flac' | 'pcm' | 'mp3';

export type PlayUrlOptions = {
  mimeType?: string;
  metadata?: Record<string, string | number>;
  enqueue?: boolean;
  /** Flush the current buffer before loading the new url. */
  flush?: boolean;
  /** When false the player reports buffer-ready and waits for an explicit start. */
  autostart?: boolean;
  crossfade?: boolean;
  transitionDurationSec?: number;
};

/**
 * One physical or software audio output driven by the transport layer.
 */
export interface PlayerHandle {
  readonly id: string;
  readonly name: string;
  readonly state: PlayerState;
  readonly elapsedMs: number;
  /** Player-local clock reference used to schedule coordinated starts. */
  readonly jiffies: number;
  readonly volumeLevel: number;
  readonly muted: boolean;
  readonly supportedCodecs: readonly string[];
  readonly currentItemId: string | null;

  play(): Promise<void>;
  pause(): Promise<void>;
  stop(): Promise<void>;
  volumeSet(level: number): Promise<void>;
  mute(muted: boolean): Promise<void>;
  power(powered: boolean): Promise<void>;
  skipAhead(ms: number): Promise<void>;
  pauseFor(ms: number): Promise<void>;
  unpauseAt(timestamp: number): Promise<void>;
  playUrl(url: string, options?: PlayUrlOptions): Promise<void>;
}

export type PlayerEventType = 'connected' | 'disconnected' | 'buffer_ready' | 'heartbeat' | 'updated';

export type PlayerEvent =
  | { type: 'connected'; playerId: string }
  | { type: 'disconnected'; playerId: string }
  | { type: 'buffer_ready'; playerId: string }
  | { type: 'heartbeat'; playerId: string }
  | { type: 'updated'; playerId: string };

export type PlayerEventListener = (event: PlayerEvent) => void;

export interface PlayerTransportPort {
  getHandle(playerId: string): PlayerHandle | undefined;
  listHandles(): PlayerHandle[];
  subscribe(listener: PlayerEventListener): () => void;
}
