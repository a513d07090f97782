import { countRows } from '../db/database';
import type { Database, QueryRunner, SqlParams } from '../db/database';
import { SerializationError, errorMessage } from '../errors';
import { isRecord } from '../utils/guards';
import { OPERATION_TYPES } from '../types';
import type { OperationType, SyncAck, SyncQueueItem, SyncQueueOptions, Task } from '../types';

export type Clock = () => Date;

export function isOperationType(value: unknown): value is OperationType {
  return typeof value === 'string' && OPERATION_TYPES.some((op) => op === value);
}

export function serializeSnapshot(task: Task): string {
  return JSON.stringify(task);
}

/** Decodes the task snapshot carried by a queue entry. */
export function parseSnapshot(raw: string): Task {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new SerializationError(`Malformed task snapshot: ${errorMessage(error)}`, error);
  }

  if (!isRecord(value)) {
    throw new SerializationError('Task snapshot is not an object');
  }

  const { id, title, description, completed, created_at, updated_at, is_deleted, sync_status, server_id, last_synced_at } =
    value;

  if (typeof id !== 'string' || id === '') throw new SerializationError('Task snapshot has no id');
  if (typeof title !== 'string') throw new SerializationError(`Task snapshot ${id} has no title`);
  if (typeof updated_at !== 'string' || Number.isNaN(Date.parse(updated_at))) {
    throw new SerializationError(`Task snapshot ${id} has an invalid updated_at`);
  }
  if (typeof created_at !== 'string') throw new SerializationError(`Task snapshot ${id} has no created_at`);

  return {
    id,
    title,
    description: typeof description === 'string' ? description : null,
    completed: completed === true,
    created_at,
    updated_at,
    is_deleted: is_deleted === true,
    sync_status: sync_status === 'synced' || sync_status === 'error' ? sync_status : 'pending',
    server_id: typeof server_id === 'string' ? server_id : null,
    last_synced_at: typeof last_synced_at === 'string' ? last_synced_at : null,
  };
}

/**
 * Durable, append-only log of task operations awaiting delivery.
 * Entries are ordered by their autoincrement id and only their retry
 * bookkeeping columns ever change.
 */
export class SyncQueue {
  constructor(
    private readonly db: Database,
    private readonly now: Clock = () => new Date(),
  ) {}

  /** Must run on the transaction that performs the task mutation. */
  async enqueue(tx: QueryRunner, taskId: string, operation: OperationType, snapshot: Task): Promise<number> {
    const sql = `
      INSERT INTO sync_queue (task_id, operation_type, task_data, retry_count, created_at)
      VALUES (?, ?, ?, 0, ?)
    `;
    const result = await tx.run(sql, [taskId, operation, serializeSnapshot(snapshot), this.now().toISOString()]);
    return result.lastID;
  }

  /**
   * Entries still within their retry budget, oldest first. With a backoff
   * configured, entries that failed too recently are held back.
   */
  async dequeueBatch(maxRetries: number, batchSize: number, backoffMs = 0): Promise<SyncQueueItem[]> {
    if (backoffMs <= 0) {
      const sql = `
        SELECT * FROM sync_queue
        WHERE retry_count < ?
        ORDER BY id ASC
        LIMIT ?
      `;
      return this.db.all<SyncQueueItem>(sql, [maxRetries, batchSize]);
    }

    const sql = `
      SELECT * FROM sync_queue
      WHERE retry_count < ?
      ORDER BY id ASC
    `;
    const items = await this.db.all<SyncQueueItem>(sql, [maxRetries]);
    const now = this.now().getTime();

    // An entry still backing off holds back every later entry for its task
    const waiting = new Set<string>();
    const due: SyncQueueItem[] = [];
    for (const item of items) {
      if (due.length === batchSize) break;
      if (waiting.has(item.task_id)) continue;
      if (this.isDue(item, now, backoffMs)) {
        due.push(item);
      } else {
        waiting.add(item.task_id);
      }
    }
    return due;
  }

  /**
   * Removes a delivered entry and stamps its task. The task only becomes
   * `synced` once no later entry for it is queued; earlier entries left
   * behind are exhausted and carry older state. Returns false if the entry
   * was already gone.
   */
  async recordSuccess(operationId: number, ack: SyncAck): Promise<boolean> {
    return this.db.transaction(async (tx) => {
      const item = await tx.get<SyncQueueItem>('SELECT * FROM sync_queue WHERE id = ?', [operationId]);
      if (!item) {
        return false;
      }

      await tx.run('DELETE FROM sync_queue WHERE id = ?', [operationId]);

      const later = await countRows(tx, 'SELECT COUNT(*) AS count FROM sync_queue WHERE task_id = ? AND id > ?', [
        item.task_id,
        operationId,
      ]);
      const settled = later === 0;

      const updateSql = `
        UPDATE tasks
        SET server_id = ?, last_synced_at = ?,
            sync_status = CASE WHEN ? = 1 THEN 'synced' ELSE sync_status END
        WHERE id = ?
      `;
      await tx.run(updateSql, [ack.serverId, this.now().toISOString(), settled ? 1 : 0, item.task_id]);

      if (settled && ack.adopt) {
        const adopt = ack.adopt;
        const adoptSql = `
          UPDATE tasks
          SET title = ?, description = ?, completed = ?, is_deleted = ?, updated_at = ?
          WHERE id = ? AND updated_at < ?
        `;
        await tx.run(adoptSql, [
          adopt.title,
          adopt.description,
          adopt.completed ? 1 : 0,
          adopt.is_deleted ? 1 : 0,
          adopt.updated_at,
          item.task_id,
          adopt.updated_at,
        ]);
      }

      return true;
    });
  }

  /**
   * Spends one retry credit. Reaching `maxRetries` moves the task to
   * `error`; the entry itself stays for inspection. Returns the new retry
   * count, or null if the entry was already gone.
   */
  async recordFailure(operationId: number, message: string, maxRetries: number): Promise<number | null> {
    return this.db.transaction(async (tx) => {
      const item = await tx.get<SyncQueueItem>('SELECT * FROM sync_queue WHERE id = ?', [operationId]);
      if (!item) {
        return null;
      }

      const retryCount = item.retry_count + 1;
      const updateSql = `
        UPDATE sync_queue
        SET retry_count = ?, last_attempt = ?, error_message = ?
        WHERE id = ?
      `;
      await tx.run(updateSql, [retryCount, this.now().toISOString(), message, operationId]);

      if (retryCount >= maxRetries) {
        await tx.run(`UPDATE tasks SET sync_status = 'error' WHERE id = ?`, [item.task_id]);
      }

      return retryCount;
    });
  }

  async contents(): Promise<SyncQueueItem[]> {
    return this.db.all<SyncQueueItem>('SELECT * FROM sync_queue ORDER BY id ASC');
  }

  async list(options: SyncQueueOptions, maxRetries: number): Promise<SyncQueueItem[]> {
    const { limit, offset, status } = options;
    let sql = 'SELECT * FROM sync_queue';
    const params: Array<string | number> = [];

    if (status === 'pending') {
      sql += ' WHERE retry_count < ?';
      params.push(maxRetries);
    } else if (status === 'failed') {
      sql += ' WHERE retry_count >= ?';
      params.push(maxRetries);
    }

    sql += ' ORDER BY id ASC LIMIT ? OFFSET ?';
    params.push(limit, offset);

    return this.db.all<SyncQueueItem>(sql, params);
  }

  async countForTask(taskId: string): Promise<number> {
    return countRows(this.db, 'SELECT COUNT(*) AS count FROM sync_queue WHERE task_id = ?', [taskId]);
  }

  async countEligible(maxRetries: number): Promise<number> {
    return countRows(this.db, 'SELECT COUNT(*) AS count FROM sync_queue WHERE retry_count < ?', [maxRetries]);
  }

  async countExhausted(maxRetries: number): Promise<number> {
    return countRows(this.db, 'SELECT COUNT(*) AS count FROM sync_queue WHERE retry_count >= ?', [maxRetries]);
  }

  /**
   * Gives exhausted entries a fresh retry budget and moves their tasks back
   * to `pending`. Without ids every exhausted entry is reset.
   */
  async resetExhausted(maxRetries: number, ids?: number[]): Promise<number> {
    if (ids !== undefined && ids.length === 0) {
      return 0;
    }

    return this.db.transaction(async (tx) => {
      let filter = 'retry_count >= ?';
      const params: SqlParams = ids ? [maxRetries, ...ids] : [maxRetries];
      if (ids) {
        filter += ` AND id IN (${ids.map(() => '?').join(', ')})`;
      }

      const taskSql = `
        UPDATE tasks SET sync_status = 'pending'
        WHERE sync_status = 'error'
          AND id IN (SELECT task_id FROM sync_queue WHERE ${filter})
      `;
      await tx.run(taskSql, params);

      const queueSql = `
        UPDATE sync_queue
        SET retry_count = 0, error_message = NULL, last_attempt = NULL
        WHERE ${filter}
      `;
      const result = await tx.run(queueSql, params);
      return result.changes;
    });
  }

  private isDue(item: SyncQueueItem, now: number, backoffMs: number): boolean {
    if (item.retry_count === 0 || item.last_attempt === null) {
      return true;
    }
    const wait = backoffMs * 2 ** (item.retry_count - 1);
    return now - Date.parse(item.last_attempt) >= wait;
  }
}
