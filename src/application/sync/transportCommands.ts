import { bestEffort } from '@/shared/bestEffort';
import { TransportError, type TransportCommand } from '@/shared/errors';
import type { ComponentLogger } from '@/shared/logging/logger';
import type { PlayerHandle } from '@/ports/PlayerTransportPort';

/**
 * Sends one command to a handle. Failures are logged as transport errors and
 * reported through the return value, never thrown.
 */
export function sendCommand(
  handle: PlayerHandle,
  command: TransportCommand,
  run: (handle: PlayerHandle) => Promise<void>,
  log: ComponentLogger,
): Promise<boolean> {
  return bestEffort(
    async () => {
      try {
        await run(handle);
      } catch (error) {
        throw new TransportError(command, handle.id, error);
      }
      return true;
    },
    {
      fallback: false,
      onError: 'warn',
      log,
      label: 'transport command failed',
      context: { playerId: handle.id, command },
    },
  );
}
