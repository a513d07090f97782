import type { OperationType } from '../types';

export interface VersionedWrite {
  operation: OperationType;
  updated_at: string;
}

export type ConflictWinner = 'local' | 'remote';

// On a timestamp tie the more conservative outcome wins
const PRECEDENCE: Record<OperationType, number> = {
  create: 1,
  update: 2,
  delete: 3,
};

function toMillis(timestamp: string): number {
  const millis = Date.parse(timestamp);
  return Number.isNaN(millis) ? 0 : millis;
}

/**
 * Last-write-wins. The later `updated_at` is kept; equal timestamps fall
 * back to delete > update > create. When kind and timestamp are both equal
 * the remote state is kept, so replaying an operation changes nothing.
 */
export function resolveConflict(local: VersionedWrite, remote: VersionedWrite): ConflictWinner {
  const localTime = toMillis(local.updated_at);
  const remoteTime = toMillis(remote.updated_at);

  if (localTime !== remoteTime) {
    return localTime > remoteTime ? 'local' : 'remote';
  }

  return PRECEDENCE[local.operation] > PRECEDENCE[remote.operation] ? 'local' : 'remote';
}
