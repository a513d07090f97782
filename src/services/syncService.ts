import { errorMessage } from '../errors';
import type { RemoteAuthority } from '../remote/types';
import type {
  RemoteTaskState,
  RetryResult,
  SyncItemResult,
  SyncQueueItem,
  SyncQueueOptions,
  SyncReport,
  SyncSettings,
  SyncStatus,
  Task,
} from '../types';
import { countRows } from '../db/database';
import type { Database } from '../db/database';
import { resolveConflict } from './conflictResolver';
import { parseSnapshot } from './syncQueue';
import type { SyncQueue } from './syncQueue';

interface LastSyncResult {
  last_synced_at: string | null;
}

/**
 * Drains the sync queue into the remote authority.
 *
 * Each pass is one bounded sweep over the oldest eligible entries. Only one
 * pass runs at a time; callers that trigger a sync while one is running get
 * that pass's report instead of starting a second one, so no entry is
 * delivered twice concurrently.
 */
export class SyncService {
  private running: Promise<SyncReport> | null = null;

  constructor(
    private db: Database,
    private queue: SyncQueue,
    private authority: RemoteAuthority,
    private settings: SyncSettings,
  ) {}

  get inProgress(): boolean {
    return this.running !== null;
  }

  triggerSync(): Promise<SyncReport> {
    return this.processQueue();
  }

  processQueue(): Promise<SyncReport> {
    if (this.running) {
      return this.running;
    }

    const pass = this.runPass().finally(() => {
      this.running = null;
    });
    this.running = pass;
    return pass;
  }

  private async runPass(): Promise<SyncReport> {
    const { maxRetries, batchSize, retryBackoffMs } = this.settings;

    // A failure here means the queue is unreadable: the pass aborts
    const items = await this.queue.dequeueBatch(maxRetries, batchSize, retryBackoffMs);

    const details: SyncItemResult[] = [];
    if (items.length === 0) {
      return this.buildReport(details);
    }

    console.log(`[sync] Processing ${items.length} queued operation(s)`);
    // Once an entry for a task does not go through, its later entries wait
    // for the next pass so the remote sees them in order
    const held = new Set<string>();
    for (const item of items) {
      if (held.has(item.task_id)) {
        details.push({
          operationId: item.id,
          taskId: item.task_id,
          operation: item.operation_type,
          status: 'skipped',
          error: 'Waiting for an earlier operation on this task',
        });
        continue;
      }

      const result = await this.processItem(item);
      if (result.status !== 'success') {
        held.add(item.task_id);
      }
      details.push(result);
    }

    const report = this.buildReport(details);
    console.log(
      `[sync] Pass finished: ${report.synced} synced, ${report.failed} failed, ${report.skipped} skipped, ${report.exhausted} exhausted`,
    );
    return report;
  }

  private async processItem(item: SyncQueueItem): Promise<SyncItemResult> {
    const base = { operationId: item.id, taskId: item.task_id, operation: item.operation_type };

    let snapshot: Task;
    try {
      snapshot = parseSnapshot(item.task_data);
    } catch (error) {
      console.warn(`[sync] Skipping operation ${item.id}: ${errorMessage(error)}`);
      return { ...base, status: 'skipped', error: errorMessage(error) };
    }

    let failure: string;
    try {
      const result = await this.authority.deliver(item.operation_type, snapshot);
      if (result.ok) {
        return await this.handleSyncSuccess(item, snapshot, result.serverId, result.current);
      }
      failure = result.error;
    } catch (error) {
      failure = errorMessage(error);
    }

    return this.handleSyncError(item, failure);
  }

  // Delivery is at-least-once: if this write fails the entry stays queued
  // and is delivered again on a later pass
  private async handleSyncSuccess(
    item: SyncQueueItem,
    snapshot: Task,
    serverId: string,
    current: RemoteTaskState | undefined,
  ): Promise<SyncItemResult> {
    const base = { operationId: item.id, taskId: item.task_id, operation: item.operation_type };
    const remoteWins =
      current !== undefined &&
      resolveConflict({ operation: item.operation_type, updated_at: snapshot.updated_at }, current) === 'remote';

    try {
      await this.queue.recordSuccess(item.id, { serverId, adopt: remoteWins ? current : undefined });
    } catch (error) {
      console.error(`[sync] Delivered operation ${item.id} but could not mark it synced:`, errorMessage(error));
      return { ...base, status: 'error', error: errorMessage(error) };
    }

    console.log(`[sync] Synced ${item.operation_type} for task ${item.task_id}`);
    return { ...base, status: 'success' };
  }

  private async handleSyncError(item: SyncQueueItem, message: string): Promise<SyncItemResult> {
    const base = { operationId: item.id, taskId: item.task_id, operation: item.operation_type };
    console.error(`[sync] Failed to sync task ${item.task_id} (operation ${item.id}): ${message}`);

    try {
      const retryCount = await this.queue.recordFailure(item.id, message, this.settings.maxRetries);
      if (retryCount !== null && retryCount >= this.settings.maxRetries) {
        console.error(`[sync] Operation ${item.id} exhausted its retries; task ${item.task_id} marked as error`);
        return { ...base, status: 'exhausted', error: message };
      }
    } catch (error) {
      console.error(`[sync] Failed to record failure for operation ${item.id}:`, errorMessage(error));
    }

    return { ...base, status: 'error', error: message };
  }

  private buildReport(details: SyncItemResult[]): SyncReport {
    const count = (status: SyncItemResult['status']) => details.filter((d) => d.status === status).length;
    const synced = count('success');
    const exhausted = count('exhausted');
    const failed = count('error') + exhausted;
    const skipped = count('skipped');

    return {
      success: failed === 0 && skipped === 0,
      processed: details.length,
      synced,
      failed,
      skipped,
      exhausted,
      details,
    };
  }

  async getStatus(): Promise<SyncStatus> {
    const [pendingCount, errorCount, lastSyncTime] = await Promise.all([
      this.queue.countEligible(this.settings.maxRetries),
      this.getErrorTaskCount(),
      this.getLastSyncTime(),
    ]);

    return {
      pendingCount,
      errorCount,
      lastSyncTime,
      inProgress: this.inProgress,
    };
  }

  async getPendingSyncCount(): Promise<number> {
    return this.queue.countEligible(this.settings.maxRetries);
  }

  async getFailedSyncCount(): Promise<number> {
    return this.queue.countExhausted(this.settings.maxRetries);
  }

  async getLastSyncTime(): Promise<string | null> {
    const sql = 'SELECT MAX(last_synced_at) AS last_synced_at FROM tasks WHERE last_synced_at IS NOT NULL';
    const result = await this.db.get<LastSyncResult>(sql);
    return result?.last_synced_at ?? null;
  }

  private async getErrorTaskCount(): Promise<number> {
    return countRows(this.db, "SELECT COUNT(*) AS count FROM tasks WHERE sync_status = 'error'");
  }

  async listQueue(options?: SyncQueueOptions): Promise<SyncQueueItem[]> {
    if (!options) {
      return this.queue.contents();
    }
    return this.queue.list(options, this.settings.maxRetries);
  }

  async retryAllFailed(): Promise<RetryResult> {
    const retried = await this.queue.resetExhausted(this.settings.maxRetries);
    return { retried, failed: 0 };
  }

  async retryFailed(ids: number[]): Promise<RetryResult> {
    if (ids.length === 0) {
      return { retried: 0, failed: 0 };
    }
    const retried = await this.queue.resetExhausted(this.settings.maxRetries, ids);
    return { retried, failed: ids.length - retried };
  }

  async checkConnectivity(): Promise<boolean> {
    try {
      return await this.authority.checkConnectivity();
    } catch (error) {
      console.error('[sync] Connectivity check failed:', errorMessage(error));
      return false;
    }
  }
}
