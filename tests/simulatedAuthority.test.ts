import { describe, expect, it } from 'vitest';
import { SimulatedRemoteAuthority } from '../src/remote/simulatedAuthority';
import type { Task } from '../src/types';

function snapshot(overrides: Partial<Task> = {}): Task {
  return {
    id: 'task-1',
    title: 'Groceries',
    description: null,
    completed: false,
    created_at: '2026-02-01T12:00:00.000Z',
    updated_at: '2026-02-01T12:00:00.000Z',
    is_deleted: false,
    sync_status: 'pending',
    server_id: null,
    last_synced_at: null,
    ...overrides,
  };
}

describe('SimulatedRemoteAuthority', () => {
  it('accepts an operation and reports the resulting state', async () => {
    const authority = new SimulatedRemoteAuthority();

    const result = await authority.deliver('create', snapshot());

    expect(result).toEqual({
      ok: true,
      serverId: 'task-1',
      current: {
        id: 'task-1',
        title: 'Groceries',
        description: null,
        completed: false,
        is_deleted: false,
        updated_at: '2026-02-01T12:00:00.000Z',
        operation: 'create',
      },
    });
  });

  it('applies a replayed operation only once', async () => {
    const authority = new SimulatedRemoteAuthority();
    const update = snapshot({ title: 'Groceries and flowers', updated_at: '2026-02-01T13:00:00.000Z' });

    await authority.deliver('create', snapshot());
    await authority.deliver('update', update);
    const afterFirst = authority.getState('task-1');
    await authority.deliver('update', update);

    expect(authority.getState('task-1')).toEqual(afterFirst);
    expect(afterFirst?.title).toBe('Groceries and flowers');
  });

  it('ignores writes older than the state it holds', async () => {
    const authority = new SimulatedRemoteAuthority();
    await authority.deliver('update', snapshot({ title: 'newer', updated_at: '2026-02-02T00:00:00.000Z' }));

    const result = await authority.deliver('update', snapshot({ title: 'stale' }));

    expect(result.ok && result.current?.title).toBe('newer');
  });

  it('marks the task deleted when a delete wins a tie', async () => {
    const authority = new SimulatedRemoteAuthority();
    await authority.deliver('update', snapshot());
    await authority.deliver('delete', snapshot());

    expect(authority.getState('task-1')).toMatchObject({ is_deleted: true, operation: 'delete' });
  });

  it('fails when the random draw falls under the failure rate', async () => {
    const draws = [0.05, 0.5];
    const authority = new SimulatedRemoteAuthority({ failureRate: 0.1, random: () => draws.shift() ?? 1 });

    expect(await authority.deliver('create', snapshot())).toEqual({ ok: false, error: 'Simulated network error' });
    expect((await authority.deliver('create', snapshot())).ok).toBe(true);
    expect(authority.deliveries).toBe(1);
  });

  it('reports failures and no connectivity while offline', async () => {
    const authority = new SimulatedRemoteAuthority();
    authority.online = false;

    expect(await authority.deliver('create', snapshot())).toEqual({ ok: false, error: 'Remote authority unreachable' });
    expect(await authority.checkConnectivity()).toBe(false);
    expect(authority.getState('task-1')).toBeUndefined();
  });
});
