import type { SyncPlaypoint } from '@/domain/players/types';

export type PlaypointTrackerOptions = {
  capacity: number;
  staleAfterMs: number;
};

/**
 * Bounded per-player history of drift observations.
 *
 * A sample only joins the history when it is compatible with the previous one:
 * same stream job and no longer than `staleAfterMs` after it. Otherwise the
 * history restarts from the new sample, so `ready()` always reflects
 * `capacity` consecutive samples of one stream session.
 */
export class PlaypointTracker {
  private readonly history = new Map<string, SyncPlaypoint[]>();

  constructor(private readonly options: PlaypointTrackerOptions) {
    if (options.capacity < 1) {
      throw new Error('playpoint capacity must be at least 1');
    }
  }

  public record(playerId: string, timestamp: number, streamJobId: string, diffMs: number): void {
    let points = this.history.get(playerId);
    if (!points) {
      points = [];
      this.history.set(playerId, points);
    }
    const last = points[points.length - 1];
    if (last && (timestamp - last.timestamp > this.options.staleAfterMs || last.streamJobId !== streamJobId)) {
      points.length = 0;
    }
    points.push({ timestamp, streamJobId, diffMs });
    if (points.length > this.options.capacity) {
      points.splice(0, points.length - this.options.capacity);
    }
  }

  public ready(playerId: string): boolean {
    return this.size(playerId) >= this.options.capacity;
  }

  public size(playerId: string): number {
    return this.history.get(playerId)?.length ?? 0;
  }

  public averageDrift(playerId: string): number {
    const points = this.history.get(playerId);
    if (!points || points.length < this.options.capacity) {
      throw new Error(`not enough playpoints for ${playerId}`);
    }
    const total = points.reduce((sum, point) => sum + point.diffMs, 0);
    return total / points.length;
  }

  public samples(playerId: string): readonly SyncPlaypoint[] {
    return this.history.get(playerId) ?? [];
  }

  public clear(playerId: string): void {
    this.history.get(playerId)?.splice(0);
  }

  public forget(playerId: string): void {
    this.history.delete(playerId);
  }
}
