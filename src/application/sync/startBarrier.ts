import { createLogger } from '@/shared/logging/logger';
import type { EngineSettings } from '@/config/engine';
import type { ClockPort } from '@/ports/ClockPort';
import type { PlayerRegistryPort } from '@/ports/PlayerRegistryPort';
import type { PlayerHandle, PlayerTransportPort } from '@/ports/PlayerTransportPort';
import type { GroupView } from '@/application/sync/groupView';
import type { ResyncBackoff } from '@/application/sync/resyncBackoff';
import { sendCommand } from '@/application/sync/transportCommands';

export type BarrierResult = {
  masterId: string;
  started: string[];
  polls: number;
  timedOut: boolean;
};

export type StartBarrierDeps = {
  registry: PlayerRegistryPort;
  transport: PlayerTransportPort;
  clock: ClockPort;
  view: GroupView;
  backoff: ResyncBackoff;
  settings: EngineSettings;
};

/**
 * Coordinated start of a sync group once every member has buffered the new track.
 */
export class StartBarrier {
  private readonly log = createLogger('Sync', 'StartBarrier');
  private readonly pendingMasters = new Set<string>();

  constructor(private readonly deps: StartBarrierDeps) {}

  public isPending(masterId: string): boolean {
    return this.pendingMasters.has(masterId);
  }

  /**
   * Returns null when no coordinated start was needed (synced child, single
   * player, unknown player, or a barrier already waiting for this master).
   */
  public async handleBufferReady(playerId: string): Promise<BarrierResult | null> {
    const { registry, transport } = this.deps;
    const player = registry.get(playerId);
    const handle = transport.getHandle(playerId);
    if (!player || !handle) {
      return null;
    }
    if (player.syncedTo) {
      // the master starts its children
      return null;
    }
    if (player.groupChilds.size === 0) {
      await sendCommand(handle, 'play', (target) => target.play(), this.log);
      return null;
    }
    if (this.pendingMasters.has(playerId)) {
      this.log.debug('start barrier already waiting', { masterId: playerId });
      return null;
    }

    this.pendingMasters.add(playerId);
    try {
      return await this.waitAndStart(playerId);
    } finally {
      this.pendingMasters.delete(playerId);
    }
  }

  private async waitAndStart(masterId: string): Promise<BarrierResult> {
    const { clock, view, backoff, settings } = this.deps;
    let polls = 0;
    let ready = this.allBuffered(view.syncHandles(masterId));
    while (!ready && polls < settings.barrierMaxPolls) {
      await clock.sleep(settings.barrierPollIntervalMs);
      polls += 1;
      ready = this.allBuffered(view.syncHandles(masterId));
    }
    const timedOut = !ready;
    if (timedOut) {
      this.log.info('start barrier timed out; starting group best-effort', {
        masterId,
        waitedMs: polls * settings.barrierPollIntervalMs,
        notReady: view
          .syncHandles(masterId)
          .filter((member) => member.state !== 'buffer_ready')
          .map((member) => member.id),
      });
    }

    const members = view.syncHandles(masterId);
    const starts = members.map((member) => {
      const timestamp = member.jiffies + settings.startLeadMs - view.syncAdjustMs(member.id);
      backoff.hold(member.id, settings.startBackoffMs);
      return { member, timestamp };
    });
    await Promise.all(
      starts.map(({ member, timestamp }) =>
        sendCommand(member, 'unpause_at', (target) => target.unpauseAt(timestamp), this.log),
      ),
    );
    this.log.debug('sync group start', {
      masterId,
      polls,
      members: starts.map(({ member, timestamp }) => `${member.id}@${timestamp}`),
    });
    return { masterId, started: members.map((member) => member.id), polls, timedOut };
  }

  private allBuffered(members: PlayerHandle[]): boolean {
    return members.every((member) => member.state === 'buffer_ready');
  }
}
