/**
 * Error raised to the caller of a group command whose preconditions do not hold.
 */
export class SyncPreconditionError extends Error {
  public readonly code = 'SYNC_PRECONDITION';

  constructor(
    message: string,
    public readonly playerId: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'SyncPreconditionError';
    Object.setPrototypeOf(this, SyncPreconditionError.prototype);
  }
}

export type TransportCommand =
  | 'play'
  | 'pause'
  | 'stop'
  | 'volume_set'
  | 'mute'
  | 'power'
  | 'skip_ahead'
  | 'pause_for'
  | 'unpause_at'
  | 'play_url';

/**
 * Failure of a single command sent to a player handle.
 */
export class TransportError extends Error {
  public readonly code = 'TRANSPORT';

  constructor(
    public readonly command: TransportCommand,
    public readonly playerId: string,
    public readonly originalError: unknown,
  ) {
    const reason = originalError instanceof Error ? originalError.message : String(originalError);
    super(`${command} failed on ${playerId}: ${reason}`);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
