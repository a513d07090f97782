import type { OperationType, RemoteTaskState, Task } from '../types';

export type DeliveryResult =
  | { ok: true; serverId: string; current?: RemoteTaskState }
  | { ok: false; error: string };

/**
 * The system of record the sync engine reconciles against. Implementations
 * must apply replays of the same operation idempotently (apply-if-newer),
 * since delivery is at-least-once. A thrown error counts as a failed
 * delivery.
 */
export interface RemoteAuthority {
  deliver(operation: OperationType, snapshot: Task): Promise<DeliveryResult>;
  checkConnectivity(): Promise<boolean>;
}
