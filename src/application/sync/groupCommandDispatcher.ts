import { createLogger } from '@/shared/logging/logger';
import { SyncPreconditionError, errorMessage } from '@/shared/errors';
import type { PlayerState, QueueItem, StreamJob } from '@/domain/players/types';
import type { CachePort } from '@/ports/CachePort';
import type { ConfigPort } from '@/ports/ConfigPort';
import type { PlayerRegistryPort } from '@/ports/PlayerRegistryPort';
import type { AudioCodec, PlayerHandle, PlayerTransportPort, PlayUrlOptions } from '@/ports/PlayerTransportPort';
import type { StreamJobPort } from '@/ports/StreamJobPort';
import type { GroupView } from '@/application/sync/groupView';
import type { RestartScheduler } from '@/application/sync/restartScheduler';
import { sendCommand } from '@/application/sync/transportCommands';

export const PREV_STATE_CACHE_KEY = 'slimsync_prev_state';

/** Cached `[powered, volumeLevel]` of a player. */
export type PreviousPlayerState = [boolean, number];

const PLAYABLE_STATES: ReadonlySet<PlayerState> = new Set(['paused', 'buffering', 'buffer_ready']);
const PAUSABLE_STATES: ReadonlySet<PlayerState> = new Set(['playing', 'buffering', 'buffer_ready']);

const MIME_TYPES: Record<AudioCodec, string> = {
  flac: 'audio/flac',
  pcm: 'audio/pcm',
  mp3: 'audio/mpeg',
};

export type FanOutResult = {
  sent: string[];
  skipped: string[];
  failed: string[];
};

export type GroupCommandDispatcherDeps = {
  registry: PlayerRegistryPort;
  transport: PlayerTransportPort;
  streams: StreamJobPort;
  config: ConfigPort;
  cache: CachePort;
  view: GroupView;
  restarts: RestartScheduler;
};

export function prevStateKey(playerId: string): string {
  return `${PREV_STATE_CACHE_KEY}.${playerId}`;
}

export function preferredCodec(handle: PlayerHandle, fallback: AudioCodec = 'pcm'): AudioCodec {
  return handle.supportedCodecs.includes('flc') ? 'flac' : fallback;
}

/**
 * Transport commands addressed to a player, fanned out to its whole sync group.
 */
export class GroupCommandDispatcher {
  private readonly log = createLogger('Sync', 'Commands');

  constructor(private readonly deps: GroupCommandDispatcherDeps) {}

  public stop(playerId: string): Promise<FanOutResult> {
    return this.fanOut(playerId, 'stop', (handle) => handle.state !== 'idle', (handle) => handle.stop());
  }

  public play(playerId: string): Promise<FanOutResult> {
    return this.fanOut(
      playerId,
      'play',
      (handle) => PLAYABLE_STATES.has(handle.state),
      (handle) => handle.play(),
    );
  }

  public pause(playerId: string): Promise<FanOutResult> {
    return this.fanOut(
      playerId,
      'pause',
      (handle) => PAUSABLE_STATES.has(handle.state),
      (handle) => handle.pause(),
    );
  }

  public async volumeSet(playerId: string, level: number): Promise<boolean> {
    const handle = this.deps.transport.getHandle(playerId);
    if (!handle) return false;
    const clamped = Math.min(100, Math.max(0, Math.round(level)));
    const ok = await sendCommand(handle, 'volume_set', (target) => target.volumeSet(clamped), this.log);
    if (ok) {
      await this.rememberState(playerId, this.deps.registry.get(playerId)?.powered ?? false, clamped);
    }
    return ok;
  }

  /** Mutes or unmutes one player; the record follows once the player accepted it. */
  public async volumeMute(playerId: string, muted: boolean): Promise<boolean> {
    const handle = this.deps.transport.getHandle(playerId);
    if (!handle) return false;
    const ok = await sendCommand(handle, 'mute', (target) => target.mute(muted), this.log);
    const player = this.deps.registry.get(playerId);
    if (ok && player) {
      player.volumeMuted = muted;
      this.deps.registry.update(playerId);
    }
    return ok;
  }

  public async power(playerId: string, powered: boolean): Promise<boolean> {
    const handle = this.deps.transport.getHandle(playerId);
    if (!handle) return false;
    const ok = await sendCommand(handle, 'power', (target) => target.power(powered), this.log);
    if (ok) {
      const player = this.deps.registry.get(playerId);
      if (player) {
        player.powered = powered;
        this.deps.registry.update(playerId);
      }
      await this.rememberState(playerId, powered, handle.volumeLevel);
    }
    return ok;
  }

  /**
   * Starts a queue item on a player. A master gets a shared stream job for its
   * whole group; members load without autostart and the start barrier releases them.
   */
  public async playMedia(playerId: string, item: QueueItem, seekMs = 0, fadeIn = false): Promise<void> {
    // a restart still pending would race this explicit play
    this.deps.restarts.cancel(playerId);
    const player = this.deps.registry.get(playerId);
    if (!player) {
      throw new SyncPreconditionError('Unknown player', playerId);
    }
    if (player.syncedTo) {
      throw new SyncPreconditionError('A synced player cannot receive play commands directly', playerId, {
        syncedTo: player.syncedTo,
      });
    }

    if (player.groupChilds.size > 0) {
      const job = await this.deps.streams.createMultiClientJob({
        queueId: item.queueId,
        item,
        seekMs: Math.trunc(seekMs),
        fadeIn,
      });
      await this.playJobOnGroup(playerId, job, 'pcm');
      return;
    }

    const handle = this.deps.transport.getHandle(playerId);
    if (!handle) return;
    const codec = preferredCodec(handle);
    const url = await this.deps.streams.resolveItemUrl({ item, codec, seekMs, fadeIn });
    await sendCommand(
      handle,
      'play_url',
      (target) =>
        target.playUrl(url, {
          ...this.urlOptions(playerId, codec),
          metadata: itemMetadata(item),
          flush: true,
          autostart: true,
        }),
      this.log,
    );
  }

  /** Plays an existing shared stream job on the player and its group. */
  public async playStream(playerId: string, job: StreamJob): Promise<void> {
    this.deps.restarts.cancel(playerId);
    await this.playJobOnGroup(playerId, job, 'mp3');
  }

  public async enqueueNext(playerId: string, item: QueueItem): Promise<void> {
    const handle = this.deps.transport.getHandle(playerId);
    if (!handle) return;
    const codec = preferredCodec(handle);
    const url = await this.deps.streams.resolveItemUrl({ item, codec });
    await sendCommand(
      handle,
      'play_url',
      (target) =>
        target.playUrl(url, {
          ...this.urlOptions(playerId, codec),
          metadata: itemMetadata(item),
          enqueue: true,
          flush: false,
          autostart: true,
        }),
      this.log,
    );
  }

  private async playJobOnGroup(playerId: string, job: StreamJob, fallbackCodec: AudioCodec): Promise<void> {
    const members = this.deps.view.syncHandles(playerId);
    await Promise.all(
      members.map((member) => {
        const codec = preferredCodec(member, fallbackCodec);
        const url = this.deps.streams.resolveJobUrl(job, member.id, codec);
        return sendCommand(
          member,
          'play_url',
          (target) =>
            target.playUrl(url, {
              ...this.urlOptions(member.id, codec),
              metadata: { item_id: 'flow', title: 'slimsync' },
              flush: true,
              autostart: false,
            }),
          this.log,
        );
      }),
    );
    this.log.debug('stream job sent to group', {
      playerId,
      jobId: job.jobId,
      members: members.map((member) => member.id),
    });
  }

  private urlOptions(playerId: string, codec: AudioCodec): PlayUrlOptions {
    const crossfade = this.deps.config.getPlayerConfigValue(playerId, 'crossfade', false);
    return {
      mimeType: MIME_TYPES[codec],
      crossfade,
      transitionDurationSec: crossfade
        ? this.deps.config.getPlayerConfigValue(playerId, 'crossfadeDuration', 8)
        : 0,
    };
  }

  private async fanOut(
    playerId: string,
    command: 'stop' | 'play' | 'pause',
    accepts: (handle: PlayerHandle) => boolean,
    run: (handle: PlayerHandle) => Promise<void>,
  ): Promise<FanOutResult> {
    const result: FanOutResult = { sent: [], skipped: [], failed: [] };
    const targets: PlayerHandle[] = [];
    for (const handle of this.deps.view.syncHandles(playerId)) {
      if (accepts(handle)) {
        targets.push(handle);
      } else {
        result.skipped.push(handle.id);
      }
    }
    const outcomes = await Promise.all(
      targets.map(async (handle) => ({
        id: handle.id,
        ok: await sendCommand(handle, command, run, this.log),
      })),
    );
    for (const outcome of outcomes) {
      (outcome.ok ? result.sent : result.failed).push(outcome.id);
    }
    return result;
  }

  private async rememberState(playerId: string, powered: boolean, volume: number): Promise<void> {
    const state: PreviousPlayerState = [powered, volume];
    try {
      await this.deps.cache.set(prevStateKey(playerId), state);
    } catch (error) {
      this.log.warn('failed to store player state', { playerId, message: errorMessage(error) });
    }
  }
}

function itemMetadata(item: QueueItem): Record<string, string | number> {
  return {
    item_id: item.queueItemId,
    title: item.name,
    artist: item.artist ?? '',
    album: item.album ?? '',
    image_url: item.imageUrl ?? '',
    duration: item.durationSec ?? 0,
  };
}
