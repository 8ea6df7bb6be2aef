import { createLogger } from '@/shared/logging/logger';
import type { EngineSettings } from '@/config/engine';
import type { ClockPort } from '@/ports/ClockPort';
import type { PlayerRegistryPort } from '@/ports/PlayerRegistryPort';
import type { PlayerTransportPort } from '@/ports/PlayerTransportPort';
import type { QueuePort } from '@/ports/QueuePort';
import type { StreamJobPort } from '@/ports/StreamJobPort';
import type { GroupView } from '@/application/sync/groupView';
import type { PlaypointTracker } from '@/application/sync/playpointTracker';
import type { ResyncBackoff } from '@/application/sync/resyncBackoff';
import { sendCommand } from '@/application/sync/transportCommands';

export type SkipReason = 'not_synced' | 'master_missing' | 'not_playing' | 'backoff' | 'no_stream_job';

export type CorrectionOutcome =
  | { kind: 'skipped'; reason: SkipReason }
  | { kind: 'sampling'; samples: number }
  | { kind: 'within_tolerance'; averageMs: number }
  | { kind: 'skip_ahead'; targetId: string; ms: number; averageMs: number }
  | { kind: 'pause_for'; targetId: string; ms: number; averageMs: number }
  | { kind: 'pause_master'; targetId: string; ms: number; averageMs: number };

export type DriftCorrectorDeps = {
  registry: PlayerRegistryPort;
  transport: PlayerTransportPort;
  queues: QueuePort;
  streams: StreamJobPort;
  clock: ClockPort;
  view: GroupView;
  tracker: PlaypointTracker;
  backoff: ResyncBackoff;
  settings: EngineSettings;
};

/**
 * Keeps synced children aligned with their master.
 *
 * Every heartbeat of a playing child adds one drift sample. Once the tracker
 * holds a full window the average decides the correction, the window is reset
 * and the child is held off until the correction has landed.
 */
export class DriftCorrector {
  private readonly log = createLogger('Sync', 'Drift');

  constructor(private readonly deps: DriftCorrectorDeps) {}

  public handleHeartbeat(childId: string): CorrectionOutcome {
    const { registry, transport, tracker, backoff, settings, clock, view } = this.deps;
    const child = registry.get(childId);
    const masterId = child?.syncedTo;
    if (!masterId) {
      return { kind: 'skipped', reason: 'not_synced' };
    }
    const childHandle = transport.getHandle(childId);
    const masterHandle = transport.getHandle(masterId);
    if (!childHandle || !masterHandle) {
      return { kind: 'skipped', reason: 'master_missing' };
    }
    if (masterHandle.state !== 'playing' || childHandle.state !== 'playing') {
      return { kind: 'skipped', reason: 'not_playing' };
    }
    if (backoff.isHeld(childId)) {
      return { kind: 'skipped', reason: 'backoff' };
    }

    const queue = this.deps.queues.getActiveQueue(masterId);
    const job = this.deps.streams.getMultiClientJob(queue.queueId);
    if (!job) {
      return { kind: 'skipped', reason: 'no_stream_job' };
    }

    const diffMs = Math.trunc(view.correctedElapsedMs(masterHandle) - view.correctedElapsedMs(childHandle));
    tracker.record(childId, clock.now(), job.jobId, diffMs);
    if (!tracker.ready(childId)) {
      return { kind: 'sampling', samples: tracker.size(childId) };
    }

    const averageMs = tracker.averageDrift(childId);
    const delta = Math.abs(averageMs);
    tracker.clear(childId);

    if (delta < settings.minDeviationMs) {
      this.log.spam('drift within tolerance', { playerId: childId, averageMs });
      return { kind: 'within_tolerance', averageMs };
    }

    const ms = Math.round(delta);
    if (averageMs > settings.maxSkipAheadMs) {
      this.log.warn('player is lagging behind too far, pausing master', {
        playerId: childId,
        masterId,
        averageMs,
        limitMs: settings.maxSkipAheadMs,
      });
      backoff.hold(childId, settings.correctionBackoffMs);
      void sendCommand(masterHandle, 'pause_for', (handle) => handle.pauseFor(ms), this.log);
      return { kind: 'pause_master', targetId: masterId, ms, averageMs };
    }

    if (averageMs > 0) {
      this.log.debug('resync: skip ahead', { playerId: childId, ms });
      backoff.hold(childId, settings.correctionBackoffMs);
      void sendCommand(childHandle, 'skip_ahead', (handle) => handle.skipAhead(ms), this.log);
      return { kind: 'skip_ahead', targetId: childId, ms, averageMs };
    }

    // the child is silent for the whole pause, so the hold grows with it
    this.log.debug('resync: pause for', { playerId: childId, ms });
    backoff.hold(childId, delta + settings.correctionBackoffMs);
    void sendCommand(childHandle, 'pause_for', (handle) => handle.pauseFor(ms), this.log);
    return { kind: 'pause_for', targetId: childId, ms, averageMs };
  }
}
