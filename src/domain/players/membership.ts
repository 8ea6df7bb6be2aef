import type { Player, SyncRole } from '@/domain/players/types';

export function syncRoleOf(player: Player): SyncRole {
  if (player.syncedTo) return 'child';
  if (player.groupChilds.size > 0) return 'master';
  return 'unsynced';
}

/**
 * Ids a command addressed to `player` must reach: the player itself plus its group.
 */
export function groupMemberIds(player: Player): string[] {
  const ids = new Set<string>([player.id]);
  for (const childId of player.groupChilds) {
    ids.add(childId);
  }
  return Array.from(ids);
}

export type MembershipViolation = {
  playerId: string;
  reason: string;
};

/**
 * Lists every broken group invariant across the given players.
 */
export function checkMembership(players: Iterable<Player>): MembershipViolation[] {
  const byId = new Map<string, Player>();
  for (const player of players) {
    byId.set(player.id, player);
  }
  const violations: MembershipViolation[] = [];

  for (const player of byId.values()) {
    if (player.groupChilds.size > 0 && !player.groupChilds.has(player.id)) {
      violations.push({ playerId: player.id, reason: 'master group does not include itself' });
    }
    if (player.groupChilds.size > 0 && player.syncedTo) {
      violations.push({ playerId: player.id, reason: 'player is both master and child' });
    }
    if (!player.syncedTo) continue;

    const owners = Array.from(byId.values()).filter(
      (candidate) => candidate.id !== player.id && candidate.groupChilds.has(player.id),
    );
    if (owners.length !== 1) {
      violations.push({
        playerId: player.id,
        reason: `child listed in ${owners.length} groups`,
      });
    } else if (owners[0].id !== player.syncedTo) {
      violations.push({ playerId: player.id, reason: 'child listed under a different master' });
    }
  }
  return violations;
}
