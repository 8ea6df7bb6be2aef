import { createLogger } from '@/shared/logging/logger';
import { errorMessage } from '@/shared/errors';
import type { RestartPolicy } from '@/config/engine';
import type { ClockPort, TimerHandle } from '@/ports/ClockPort';

const SHARED_SLOT = '*';

type PendingRestart = {
  groupId: string;
  timer: TimerHandle;
};

/**
 * Debounced group restarts. A new request for the same slot replaces the
 * pending one; with the `shared` policy every group uses one slot.
 */
export class RestartScheduler {
  private readonly log = createLogger('Sync', 'Restart');
  private readonly pending = new Map<string, PendingRestart>();

  constructor(
    private readonly clock: ClockPort,
    private readonly debounceMs: number,
    private readonly policy: RestartPolicy = 'per-group',
  ) {}

  public schedule(groupId: string, action: () => Promise<void>): void {
    const slot = this.slotOf(groupId);
    const previous = this.pending.get(slot);
    if (previous) {
      previous.timer.cancel();
      this.log.debug('restart rescheduled', { groupId, replaced: previous.groupId });
    }
    const timer = this.clock.setTimer(this.debounceMs, () => {
      if (this.pending.get(slot)?.timer !== timer) return;
      this.pending.delete(slot);
      action().catch((error: unknown) => {
        this.log.warn('group restart failed', { groupId, message: errorMessage(error) });
      });
    });
    this.pending.set(slot, { groupId, timer });
  }

  /** Drops the pending restart for the group (or the shared one). */
  public cancel(groupId: string): boolean {
    const slot = this.slotOf(groupId);
    const entry = this.pending.get(slot);
    if (!entry) return false;
    entry.timer.cancel();
    this.pending.delete(slot);
    return true;
  }

  public cancelAll(): void {
    for (const entry of this.pending.values()) {
      entry.timer.cancel();
    }
    this.pending.clear();
  }

  public isPending(groupId: string): boolean {
    return this.pending.has(this.slotOf(groupId));
  }

  private slotOf(groupId: string): string {
    return this.policy === 'shared' ? SHARED_SLOT : groupId;
  }
}
