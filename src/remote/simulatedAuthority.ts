import { resolveConflict } from '../services/conflictResolver';
import type { OperationType, RemoteTaskState, Task } from '../types';
import type { DeliveryResult, RemoteAuthority } from './types';

export interface SimulatedAuthorityOptions {
  /** Probability in [0, 1] that a delivery fails. */
  failureRate?: number;
  delayMs?: number;
  random?: () => number;
}

function toRemoteState(operation: OperationType, snapshot: Task): RemoteTaskState {
  return {
    id: snapshot.id,
    title: snapshot.title,
    description: snapshot.description,
    completed: snapshot.completed,
    is_deleted: operation === 'delete' || snapshot.is_deleted,
    updated_at: snapshot.updated_at,
    operation,
  };
}

/**
 * In-process stand-in for a real server. Keeps the last accepted state per
 * task and applies incoming operations last-write-wins.
 */
export class SimulatedRemoteAuthority implements RemoteAuthority {
  private readonly state = new Map<string, RemoteTaskState>();
  private readonly failureRate: number;
  private readonly delayMs: number;
  private readonly random: () => number;
  private received = 0;
  online = true;

  constructor(options: SimulatedAuthorityOptions = {}) {
    this.failureRate = options.failureRate ?? 0;
    this.delayMs = options.delayMs ?? 0;
    this.random = options.random ?? Math.random;
  }

  async deliver(operation: OperationType, snapshot: Task): Promise<DeliveryResult> {
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }

    if (!this.online) {
      return { ok: false, error: 'Remote authority unreachable' };
    }
    if (this.failureRate > 0 && this.random() < this.failureRate) {
      return { ok: false, error: 'Simulated network error' };
    }

    this.received++;
    const incoming = toRemoteState(operation, snapshot);
    const existing = this.state.get(snapshot.id);

    if (!existing || resolveConflict(incoming, existing) === 'local') {
      this.state.set(snapshot.id, incoming);
    }

    const current = this.state.get(snapshot.id) ?? incoming;
    console.log(`[remote] Accepted ${operation} for task ${snapshot.id}`);
    return { ok: true, serverId: snapshot.id, current: { ...current } };
  }

  async checkConnectivity(): Promise<boolean> {
    return this.online;
  }

  /** Seeds or overwrites the server-side state of a task. */
  put(state: RemoteTaskState): void {
    this.state.set(state.id, { ...state });
  }

  getState(taskId: string): RemoteTaskState | undefined {
    const state = this.state.get(taskId);
    return state ? { ...state } : undefined;
  }

  get deliveries(): number {
    return this.received;
  }
}
