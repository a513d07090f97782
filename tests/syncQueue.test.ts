import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SerializationError } from '../src/errors';
import { parseSnapshot, serializeSnapshot } from '../src/services/syncQueue';
import type { Task } from '../src/types';
import { createTestContext, manualClock, type TestContext } from './helpers';

describe('SyncQueue', () => {
  let ctx: TestContext;
  const clock = manualClock('2026-03-01T10:00:00.000Z');

  beforeEach(async () => {
    clock.set('2026-03-01T10:00:00.000Z');
    ctx = await createTestContext({ clock: clock.now });
  });

  afterEach(async () => {
    await ctx.db.close();
  });

  it('records one entry per mutation in insertion order', async () => {
    const task = await ctx.taskService.createTask({ title: 'Write report' });
    await ctx.taskService.updateTask(task.id, { title: 'Write final report' });
    await ctx.taskService.updateTask(task.id, { completed: true });
    await ctx.taskService.deleteTask(task.id);

    const entries = await ctx.queue.contents();
    expect(entries.map((e) => e.operation_type)).toEqual(['create', 'update', 'update', 'delete']);
    expect(entries.every((e) => e.task_id === task.id)).toBe(true);
    expect(entries.every((e) => e.retry_count === 0)).toBe(true);
    expect(await ctx.queue.countForTask(task.id)).toBe(4);

    const ids = entries.map((e) => e.id);
    expect([...ids].sort((a, b) => a - b)).toEqual(ids);
    expect(new Set(ids).size).toBe(4);
  });

  it('stores a snapshot of the task at enqueue time', async () => {
    const task = await ctx.taskService.createTask({ title: 'A', description: 'first' });
    await ctx.taskService.updateTask(task.id, { title: 'B' });

    const [create, update] = await ctx.queue.contents();
    expect(parseSnapshot(create.task_data).title).toBe('A');
    expect(parseSnapshot(update.task_data).title).toBe('B');
    expect(parseSnapshot(update.task_data).description).toBe('first');
    expect(create.created_at).toBe('2026-03-01T10:00:00.000Z');
  });

  it('dequeues only entries within the retry budget, limited to the batch size', async () => {
    const first = await ctx.taskService.createTask({ title: 'one' });
    await ctx.taskService.createTask({ title: 'two' });
    await ctx.taskService.createTask({ title: 'three' });

    const [entry] = await ctx.queue.contents();
    await ctx.queue.recordFailure(entry.id, 'offline', 1);

    const batch = await ctx.queue.dequeueBatch(1, 10);
    expect(batch).toHaveLength(2);
    expect(batch.some((e) => e.task_id === first.id)).toBe(false);

    const limited = await ctx.queue.dequeueBatch(3, 2);
    expect(limited.map((e) => e.id)).toEqual([entry.id, batch[0].id]);
  });

  it('returns a fixed snapshot that later enqueues do not join', async () => {
    await ctx.taskService.createTask({ title: 'before' });
    const batch = await ctx.queue.dequeueBatch(3, 10);
    await ctx.taskService.createTask({ title: 'after' });

    expect(batch).toHaveLength(1);
    expect(await ctx.queue.contents()).toHaveLength(2);
  });

  it('holds back recently failed entries when a backoff is configured', async () => {
    await ctx.taskService.createTask({ title: 'flaky' });
    const [entry] = await ctx.queue.contents();

    await ctx.queue.recordFailure(entry.id, 'timeout', 5);
    expect(await ctx.queue.dequeueBatch(5, 10, 1000)).toHaveLength(0);

    clock.advance(1000);
    expect(await ctx.queue.dequeueBatch(5, 10, 1000)).toHaveLength(1);

    await ctx.queue.recordFailure(entry.id, 'timeout', 5);
    clock.advance(1999);
    expect(await ctx.queue.dequeueBatch(5, 10, 1000)).toHaveLength(0);
    clock.advance(1);
    expect(await ctx.queue.dequeueBatch(5, 10, 1000)).toHaveLength(1);
  });

  it('holds back later entries of a task whose earlier entry is backing off', async () => {
    const task = await ctx.taskService.createTask({ title: 'flaky' });
    await ctx.taskService.updateTask(task.id, { title: 'flaky v2' });
    const other = await ctx.taskService.createTask({ title: 'steady' });
    const [create] = await ctx.queue.contents();

    await ctx.queue.recordFailure(create.id, 'timeout', 5);
    const held = await ctx.queue.dequeueBatch(5, 10, 1000);
    expect(held.map((e) => e.task_id)).toEqual([other.id]);

    clock.advance(1000);
    const due = await ctx.queue.dequeueBatch(5, 10, 1000);
    expect(due.map((e) => e.operation_type)).toEqual(['create', 'update', 'create']);
  });

  it('marks the task synced when only exhausted entries precede the delivered one', async () => {
    const task = await ctx.taskService.createTask({ title: 'A' });
    await ctx.taskService.updateTask(task.id, { title: 'B' });
    const [create, update] = await ctx.queue.contents();

    await ctx.queue.recordFailure(create.id, 'offline', 1);
    expect((await ctx.taskService.getTask(task.id))?.sync_status).toBe('error');

    expect(await ctx.queue.recordSuccess(update.id, { serverId: task.id })).toBe(true);
    expect((await ctx.taskService.getTask(task.id))?.sync_status).toBe('synced');
    expect((await ctx.queue.contents()).map((e) => e.id)).toEqual([create.id]);
  });

  it('marks the task synced once its last entry is delivered', async () => {
    const task = await ctx.taskService.createTask({ title: 'A' });
    await ctx.taskService.updateTask(task.id, { title: 'B' });
    const [create, update] = await ctx.queue.contents();

    clock.advance(5000);
    expect(await ctx.queue.recordSuccess(create.id, { serverId: 'srv-1' })).toBe(true);

    let stored = await ctx.taskService.getTask(task.id);
    expect(stored?.sync_status).toBe('pending');
    expect(stored?.server_id).toBe('srv-1');

    expect(await ctx.queue.recordSuccess(update.id, { serverId: 'srv-1' })).toBe(true);
    stored = await ctx.taskService.getTask(task.id);
    expect(stored?.sync_status).toBe('synced');
    expect(stored?.last_synced_at).toBe('2026-03-01T10:00:05.000Z');
    expect(await ctx.queue.contents()).toHaveLength(0);
  });

  it('ignores a success for an entry that is already gone', async () => {
    const task = await ctx.taskService.createTask({ title: 'A' });
    const [entry] = await ctx.queue.contents();

    expect(await ctx.queue.recordSuccess(entry.id, { serverId: task.id })).toBe(true);
    expect(await ctx.queue.recordSuccess(entry.id, { serverId: task.id })).toBe(false);
    expect(await ctx.queue.recordFailure(entry.id, 'late failure', 3)).toBeNull();
  });

  it('adopts a newer remote state only when nothing else is queued', async () => {
    const task = await ctx.taskService.createTask({ title: 'local' });
    const [entry] = await ctx.queue.contents();

    await ctx.queue.recordSuccess(entry.id, {
      serverId: task.id,
      adopt: {
        id: task.id,
        title: 'remote',
        description: 'edited elsewhere',
        completed: true,
        is_deleted: false,
        updated_at: '2026-03-02T00:00:00.000Z',
        operation: 'update',
      },
    });

    const stored = await ctx.taskService.getTask(task.id);
    expect(stored).toMatchObject({
      title: 'remote',
      description: 'edited elsewhere',
      completed: true,
      updated_at: '2026-03-02T00:00:00.000Z',
      sync_status: 'synced',
    });
  });

  it('moves the task to error only when the retry budget is spent', async () => {
    const task = await ctx.taskService.createTask({ title: 'doomed' });
    const [entry] = await ctx.queue.contents();

    expect(await ctx.queue.recordFailure(entry.id, 'offline', 3)).toBe(1);
    expect(await ctx.queue.recordFailure(entry.id, 'offline', 3)).toBe(2);
    expect((await ctx.taskService.getTask(task.id))?.sync_status).toBe('pending');

    clock.advance(60_000);
    expect(await ctx.queue.recordFailure(entry.id, 'still offline', 3)).toBe(3);
    expect((await ctx.taskService.getTask(task.id))?.sync_status).toBe('error');

    const [kept] = await ctx.queue.contents();
    expect(kept).toMatchObject({
      id: entry.id,
      retry_count: 3,
      error_message: 'still offline',
      last_attempt: '2026-03-01T10:01:00.000Z',
      task_data: entry.task_data,
    });
  });

  it('pages and filters the queue by retry state', async () => {
    for (const title of ['a', 'b', 'c']) {
      await ctx.taskService.createTask({ title });
    }
    const [first] = await ctx.queue.contents();
    await ctx.queue.recordFailure(first.id, 'offline', 1);

    expect(await ctx.queue.list({ limit: 10, offset: 0, status: 'failed' }, 1)).toHaveLength(1);
    expect(await ctx.queue.list({ limit: 10, offset: 0, status: 'pending' }, 1)).toHaveLength(2);

    const page = await ctx.queue.list({ limit: 1, offset: 1 }, 1);
    expect(page).toHaveLength(1);
    expect(parseSnapshot(page[0].task_data).title).toBe('b');

    expect(await ctx.queue.countEligible(1)).toBe(2);
    expect(await ctx.queue.countExhausted(1)).toBe(1);
  });

  it('resets exhausted entries and returns their tasks to pending', async () => {
    const task = await ctx.taskService.createTask({ title: 'retry me' });
    const [entry] = await ctx.queue.contents();
    await ctx.queue.recordFailure(entry.id, 'offline', 1);
    expect((await ctx.taskService.getTask(task.id))?.sync_status).toBe('error');

    expect(await ctx.queue.resetExhausted(1, [entry.id + 100])).toBe(0);
    expect(await ctx.queue.resetExhausted(1, [])).toBe(0);
    expect(await ctx.queue.resetExhausted(1, [entry.id])).toBe(1);

    const [reset] = await ctx.queue.contents();
    expect(reset).toMatchObject({ retry_count: 0, error_message: null, last_attempt: null });
    expect((await ctx.taskService.getTask(task.id))?.sync_status).toBe('pending');
  });
});

describe('parseSnapshot', () => {
  const task: Task = {
    id: 'task-1',
    title: 'Snapshot',
    description: null,
    completed: false,
    created_at: '2026-01-01T00:00:00.000Z',
    updated_at: '2026-01-02T00:00:00.000Z',
    is_deleted: false,
    sync_status: 'pending',
    server_id: null,
    last_synced_at: null,
  };

  it('decodes what serializeSnapshot wrote', () => {
    expect(parseSnapshot(serializeSnapshot(task))).toEqual(task);
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseSnapshot('{oops')).toThrow(SerializationError);
  });

  it('rejects snapshots without a usable updated_at', () => {
    const raw = JSON.stringify({ ...task, updated_at: 'yesterday' });
    expect(() => parseSnapshot(raw)).toThrow('Task snapshot task-1 has an invalid updated_at');
  });

  it('rejects non-object payloads', () => {
    expect(() => parseSnapshot('[1, 2]')).toThrow('Task snapshot is not an object');
  });
});
