import fs from 'node:fs';
import path from 'node:path';
import * as sqlite3 from 'sqlite3';
import { PersistenceError, errorMessage } from '../errors';

export interface RunResult {
  changes: number;
  lastID: number;
}

export type SqlParams = ReadonlyArray<string | number | null>;

/** Statement surface shared by the database and an open transaction. */
export interface QueryRunner {
  run(sql: string, params?: SqlParams): Promise<RunResult>;
  get<T>(sql: string, params?: SqlParams): Promise<T | undefined>;
  all<T>(sql: string, params?: SqlParams): Promise<T[]>;
}

interface CountRow {
  count: number;
}

/** Runs a `SELECT COUNT(*) AS count` query. */
export async function countRows(runner: QueryRunner, sql: string, params: SqlParams = []): Promise<number> {
  const row = await runner.get<CountRow>(sql, params);
  return row?.count ?? 0;
}

const MIGRATIONS = [
  `CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    description TEXT,
    completed INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    is_deleted INTEGER NOT NULL DEFAULT 0,
    sync_status TEXT NOT NULL DEFAULT 'pending',
    server_id TEXT,
    last_synced_at TEXT,
    CONSTRAINT chk_sync_status CHECK (sync_status IN ('pending', 'synced', 'error'))
  )`,
  `CREATE INDEX IF NOT EXISTS idx_tasks_sync_status ON tasks(sync_status)`,
  `CREATE INDEX IF NOT EXISTS idx_tasks_is_deleted ON tasks(is_deleted)`,
  `CREATE INDEX IF NOT EXISTS idx_tasks_updated_at ON tasks(updated_at)`,
  `CREATE TABLE IF NOT EXISTS sync_queue (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    task_id TEXT NOT NULL,
    operation_type TEXT NOT NULL,
    task_data TEXT NOT NULL,
    retry_count INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    last_attempt TEXT,
    error_message TEXT,
    CONSTRAINT chk_operation_type CHECK (operation_type IN ('create', 'update', 'delete')),
    FOREIGN KEY (task_id) REFERENCES tasks(id) ON DELETE CASCADE
  )`,
  `CREATE INDEX IF NOT EXISTS idx_sync_queue_retry_count ON sync_queue(retry_count)`,
  `CREATE INDEX IF NOT EXISTS idx_sync_queue_created_at ON sync_queue(created_at)`,
];

/**
 * Promise wrapper around a single sqlite3 connection.
 *
 * Every top-level statement and every transaction is chained onto one
 * queue, so another caller's statements can never land inside an open
 * transaction. Work inside `transaction()` must use the handle it is given,
 * not the database itself, or it will wait on its own transaction.
 */
export class Database implements QueryRunner {
  private connection: sqlite3.Database | null = null;
  private tail: Promise<void> = Promise.resolve();
  private readonly executor: QueryRunner;

  constructor(private readonly filename: string) {
    this.executor = {
      run: (sql, params) => this.rawRun(sql, params),
      get: <T>(sql: string, params?: SqlParams) => this.rawGet<T>(sql, params),
      all: <T>(sql: string, params?: SqlParams) => this.rawAll<T>(sql, params),
    };
  }

  async initialize(): Promise<void> {
    const isMemory = this.filename === ':memory:';
    if (!isMemory) {
      fs.mkdirSync(path.dirname(this.filename), { recursive: true });
    }

    this.connection = await new Promise<sqlite3.Database>((resolve, reject) => {
      const conn = new sqlite3.Database(this.filename, (err) => {
        if (err) reject(new PersistenceError(`Failed to open database: ${err.message}`, err));
        else resolve(conn);
      });
    });

    const pragmas = ['PRAGMA foreign_keys = ON', 'PRAGMA synchronous = NORMAL', 'PRAGMA temp_store = memory'];
    if (!isMemory) pragmas.push('PRAGMA journal_mode = WAL');

    for (const pragma of pragmas) {
      await this.rawRun(pragma);
    }

    for (const [index, migration] of MIGRATIONS.entries()) {
      try {
        await this.rawRun(migration);
      } catch (error) {
        throw new PersistenceError(`Migration ${index + 1} failed: ${errorMessage(error)}`, error);
      }
    }
  }

  run(sql: string, params: SqlParams = []): Promise<RunResult> {
    return this.exclusive(() => this.rawRun(sql, params));
  }

  get<T>(sql: string, params: SqlParams = []): Promise<T | undefined> {
    return this.exclusive(() => this.rawGet<T>(sql, params));
  }

  all<T>(sql: string, params: SqlParams = []): Promise<T[]> {
    return this.exclusive(() => this.rawAll<T>(sql, params));
  }

  /** Runs `work` atomically; any thrown error rolls the whole unit back. */
  transaction<T>(work: (tx: QueryRunner) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      await this.rawRun('BEGIN IMMEDIATE');
      try {
        const result = await work(this.executor);
        await this.rawRun('COMMIT');
        return result;
      } catch (error) {
        try {
          await this.rawRun('ROLLBACK');
        } catch (rollbackError) {
          console.error('[db] Rollback failed:', rollbackError);
        }
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    const conn = this.connection;
    if (!conn) return;

    await this.exclusive(
      () =>
        new Promise<void>((resolve, reject) => {
          conn.close((err) => {
            if (err) reject(new PersistenceError(`Failed to close database: ${err.message}`, err));
            else resolve();
          });
        }),
    );
    this.connection = null;
  }

  private exclusive<T>(work: () => Promise<T>): Promise<T> {
    const result = this.tail.then(work);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private open(): sqlite3.Database {
    if (!this.connection) {
      throw new PersistenceError('Database is not initialized');
    }
    return this.connection;
  }

  private rawRun(sql: string, params: SqlParams = []): Promise<RunResult> {
    return new Promise((resolve, reject) => {
      this.open().run(sql, params, function (err) {
        if (err) reject(new PersistenceError(err.message, err));
        else resolve({ changes: this.changes, lastID: this.lastID });
      });
    });
  }

  private rawGet<T>(sql: string, params: SqlParams = []): Promise<T | undefined> {
    return new Promise((resolve, reject) => {
      this.open().get<T | undefined>(sql, params, (err, row) => {
        if (err) reject(new PersistenceError(err.message, err));
        else resolve(row);
      });
    });
  }

  private rawAll<T>(sql: string, params: SqlParams = []): Promise<T[]> {
    return new Promise((resolve, reject) => {
      this.open().all<T>(sql, params, (err, rows) => {
        if (err) reject(new PersistenceError(err.message, err));
        else resolve(rows);
      });
    });
  }
}
