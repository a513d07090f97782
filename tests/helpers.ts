import { Database } from '../src/db/database';
import { SimulatedRemoteAuthority, type SimulatedAuthorityOptions } from '../src/remote/simulatedAuthority';
import type { RemoteAuthority } from '../src/remote/types';
import { SyncQueue, type Clock } from '../src/services/syncQueue';
import { SyncService } from '../src/services/syncService';
import { TaskService } from '../src/services/taskService';
import type { SyncSettings } from '../src/types';

export interface TestContext {
  db: Database;
  queue: SyncQueue;
  taskService: TaskService;
  syncService: SyncService;
  authority: SimulatedRemoteAuthority;
}

export interface TestContextOptions {
  settings?: Partial<SyncSettings>;
  authority?: SimulatedAuthorityOptions;
  remote?: RemoteAuthority;
  clock?: Clock;
}

export async function createTestContext(options: TestContextOptions = {}): Promise<TestContext> {
  const db = new Database(':memory:');
  await db.initialize();

  const clock = options.clock ?? (() => new Date());
  const queue = new SyncQueue(db, clock);
  const authority = new SimulatedRemoteAuthority(options.authority);
  const settings: SyncSettings = {
    maxRetries: 3,
    batchSize: 10,
    retryBackoffMs: 0,
    ...options.settings,
  };

  return {
    db,
    queue,
    authority,
    taskService: new TaskService(db, queue, clock),
    syncService: new SyncService(db, queue, options.remote ?? authority, settings),
  };
}

/** A clock that only moves when told to. */
export function manualClock(start: string): { now: Clock; advance: (ms: number) => void; set: (iso: string) => void } {
  let current = new Date(start);
  return {
    now: () => new Date(current.getTime()),
    advance: (ms) => {
      current = new Date(current.getTime() + ms);
    },
    set: (iso) => {
      current = new Date(iso);
    },
  };
}
