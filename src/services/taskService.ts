import { v4 as uuidv4 } from 'uuid';
import type { Database } from '../db/database';
import { NotFoundError, ValidationError } from '../errors';
import type { CreateTaskInput, Task, TaskRow, UpdateTaskInput } from '../types';
import type { Clock, SyncQueue } from './syncQueue';

function rowToTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    completed: Boolean(row.completed),
    created_at: row.created_at,
    updated_at: row.updated_at,
    is_deleted: Boolean(row.is_deleted),
    sync_status: row.sync_status,
    server_id: row.server_id,
    last_synced_at: row.last_synced_at,
  };
}

function validateFields(input: UpdateTaskInput): void {
  if (input.title !== undefined && (typeof input.title !== 'string' || input.title.trim() === '')) {
    throw new ValidationError('Title must be a non-empty string');
  }
  if (input.description !== undefined && input.description !== null && typeof input.description !== 'string') {
    throw new ValidationError('Description must be a string');
  }
  if (input.completed !== undefined && typeof input.completed !== 'boolean') {
    throw new ValidationError('Completed must be a boolean');
  }
}

export class TaskService {
  constructor(
    private db: Database,
    private syncQueue: SyncQueue,
    private now: Clock = () => new Date(),
  ) {}

  // Never older than the task's previous timestamp, even if the clock steps back
  private nextTimestamp(previous?: string): string {
    const now = this.now().toISOString();
    return previous !== undefined && previous > now ? previous : now;
  }

  async createTask(taskData: CreateTaskInput): Promise<Task> {
    if (taskData.title === undefined) {
      throw new ValidationError('Title is required');
    }
    validateFields(taskData);

    const now = this.nextTimestamp();
    const task: Task = {
      id: uuidv4(),
      title: taskData.title,
      description: taskData.description ?? null,
      completed: taskData.completed ?? false,
      created_at: now,
      updated_at: now,
      is_deleted: false,
      sync_status: 'pending',
      server_id: null,
      last_synced_at: null,
    };

    const sql = `INSERT INTO tasks (id, title, description, completed, created_at, updated_at, is_deleted, sync_status, server_id, last_synced_at)
                 VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`;

    await this.db.transaction(async (tx) => {
      await tx.run(sql, [
        task.id,
        task.title,
        task.description,
        task.completed ? 1 : 0,
        task.created_at,
        task.updated_at,
        0,
        task.sync_status,
        task.server_id,
        task.last_synced_at,
      ]);
      await this.syncQueue.enqueue(tx, task.id, 'create', task);
    });

    return task;
  }

  async updateTask(id: string, updates: UpdateTaskInput): Promise<Task> {
    validateFields(updates);

    return this.db.transaction(async (tx) => {
      const row = await tx.get<TaskRow>('SELECT * FROM tasks WHERE id = ? AND is_deleted = 0', [id]);
      if (!row) {
        throw new NotFoundError();
      }
      const existing = rowToTask(row);

      const task: Task = {
        ...existing,
        title: updates.title !== undefined ? updates.title : existing.title,
        description: updates.description !== undefined ? updates.description : existing.description,
        completed: updates.completed !== undefined ? updates.completed : existing.completed,
        updated_at: this.nextTimestamp(existing.updated_at),
        sync_status: 'pending',
      };

      const sql = `UPDATE tasks SET
                   title = ?, description = ?, completed = ?,
                   updated_at = ?, sync_status = ?
                   WHERE id = ? AND is_deleted = 0`;

      await tx.run(sql, [task.title, task.description, task.completed ? 1 : 0, task.updated_at, task.sync_status, id]);
      await this.syncQueue.enqueue(tx, id, 'update', task);

      return task;
    });
  }

  async deleteTask(id: string): Promise<void> {
    await this.db.transaction(async (tx) => {
      const row = await tx.get<TaskRow>('SELECT * FROM tasks WHERE id = ? AND is_deleted = 0', [id]);
      if (!row) {
        throw new NotFoundError();
      }
      const existing = rowToTask(row);

      const task: Task = {
        ...existing,
        is_deleted: true,
        updated_at: this.nextTimestamp(existing.updated_at),
        sync_status: 'pending',
      };

      const sql = `UPDATE tasks SET
                   is_deleted = 1, updated_at = ?, sync_status = ?
                   WHERE id = ?`;

      await tx.run(sql, [task.updated_at, task.sync_status, id]);
      await this.syncQueue.enqueue(tx, id, 'delete', task);
    });
  }

  async getTask(id: string): Promise<Task | null> {
    const row = await this.db.get<TaskRow>('SELECT * FROM tasks WHERE id = ? AND is_deleted = 0', [id]);
    return row ? rowToTask(row) : null;
  }

  /** Includes soft-deleted rows; used for sync bookkeeping. */
  async getTaskIncludingDeleted(id: string): Promise<Task | null> {
    const row = await this.db.get<TaskRow>('SELECT * FROM tasks WHERE id = ?', [id]);
    return row ? rowToTask(row) : null;
  }

  async getAllTasks(): Promise<Task[]> {
    const sql = 'SELECT * FROM tasks WHERE is_deleted = 0 ORDER BY updated_at DESC, created_at DESC';
    const rows = await this.db.all<TaskRow>(sql);
    return rows.map(rowToTask);
  }

  async getTasksNeedingSync(): Promise<Task[]> {
    const sql = 'SELECT * FROM tasks WHERE sync_status IN (?, ?) AND is_deleted = 0 ORDER BY updated_at ASC';
    const rows = await this.db.all<TaskRow>(sql, ['pending', 'error']);
    return rows.map(rowToTask);
  }
}
