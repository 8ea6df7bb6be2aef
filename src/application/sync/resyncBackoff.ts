import type { ClockPort } from '@/ports/ClockPort';

/**
 * "Do not resync before" deadlines keyed by player id.
 * Expired deadlines are dropped when read.
 */
export class ResyncBackoff {
  private readonly deadlines = new Map<string, number>();

  constructor(private readonly clock: ClockPort) {}

  public hold(playerId: string, durationMs: number): void {
    this.deadlines.set(playerId, this.clock.now() + durationMs);
  }

  public isHeld(playerId: string): boolean {
    const deadline = this.deadlines.get(playerId);
    if (deadline === undefined) return false;
    if (this.clock.now() < deadline) return true;
    this.deadlines.delete(playerId);
    return false;
  }

  public deadlineOf(playerId: string): number | null {
    return this.isHeld(playerId) ? (this.deadlines.get(playerId) ?? null) : null;
  }

  public release(playerId: string): void {
    this.deadlines.delete(playerId);
  }
}
