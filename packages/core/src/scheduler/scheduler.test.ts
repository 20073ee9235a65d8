import { describe, it, expect, vi } from 'vitest';
import type { Budget, DependencyEdge, Subtask } from '@tessera/shared';
import { Scheduler } from './scheduler.js';
import { PlanStore } from '../ledger/plan.store.js';
import { LockRegistry } from '../locks/lock.registry.js';
import { buildTaskGraph } from '../graph/task.graph.builder.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

interface Launch {
  subtask: Subtask;
  sessionId: string;
  signal: AbortSignal;
  shutdown: AbortSignal;
}

function makeBudget(overrides: Partial<Budget> = {}): Budget {
  return {
    maxResourcesPerSubtask: 1,
    softThreshold: 100,
    hardThreshold: 150,
    postCompactionBaseline: 10,
    concurrencyLimit: 3,
    sessionTimeoutMs: 1_000,
    maxRetries: 2,
    ...overrides,
  };
}

function setup(budget: Budget = makeBudget()) {
  const store = new PlanStore(() => 0);
  const locks = new LockRegistry(() => 0);
  const launched: Launch[] = [];
  const scheduler = new Scheduler({
    store,
    commit: (input) => {
      store.record(input);
    },
    locks,
    budget,
    launch: (subtask, sessionId, { cancel, shutdown }) =>
      launched.push({ subtask, sessionId, signal: cancel, shutdown }),
  });

  const submit = (taskId: string, resources: string[], edges: DependencyEdge[] = []) =>
    scheduler.submit(buildTaskGraph('rename', resources, edges, budget, { taskId, now: () => 0 }));

  /** Complete the subtask run by `sessionId` and free its slot. */
  const finish = (sessionId: string) => {
    const launch = launched.find((l) => l.sessionId === sessionId);
    if (!launch) throw new Error(`no session ${sessionId}`);
    scheduler.completeSubtask(launch.subtask.id);
    scheduler.release(sessionId);
  };

  const complete = (subtaskId: string, resourceId: string) =>
    store.record({
      taskId: 'task-1',
      subtaskId,
      event: { type: 'resource_completed', output: { resourceId, subtaskId, content: resourceId.toUpperCase() } },
    });

  return { store, locks, scheduler, launched, submit, finish, complete };
}

function files(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `src/f${String(i + 1).padStart(2, '0')}.ts`);
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Scheduler', () => {
  it('never runs more sessions than the concurrency limit', () => {
    const { scheduler, launched, submit, finish } = setup();
    submit('task-1', files(10));

    expect(launched).toHaveLength(3);
    expect(scheduler.activeCount).toBe(3);
    expect(scheduler.queuedSubtaskIds).toHaveLength(7);

    for (let i = 1; i <= 10; i++) {
      finish(`worker-${i}`);
      expect(scheduler.activeCount).toBeLessThanOrEqual(3);
    }
    expect(launched).toHaveLength(10);
    expect(scheduler.activeCount).toBe(0);
  });

  it('dispatches in FIFO order and marks the task in progress', () => {
    const { store, launched, submit } = setup();
    const receipt = submit('task-1', files(4));

    expect(receipt.subtaskIds).toHaveLength(4);
    expect(launched.map((l) => l.subtask.id)).toEqual(receipt.subtaskIds.slice(0, 3));
    expect(launched[0]?.subtask.status).toBe('dispatched');
    expect(store.getTask('task-1')?.status).toBe('in_progress');
  });

  it('dispatches a subtask only after its prerequisites completed', () => {
    const { store, launched, submit, finish } = setup();
    submit('task-1', ['x/a.ts', 'x/b.ts'], [['x/b.ts', 'x/a.ts']]);

    expect(launched.map((l) => l.subtask.resources)).toEqual([['x/b.ts']]);
    expect(store.getSubtask('task-1/st-002')?.status).toBe('pending');

    finish('worker-1');
    expect(launched.map((l) => l.subtask.resources)).toEqual([['x/b.ts'], ['x/a.ts']]);
  });

  it('cancels everything downstream of a failed subtask', () => {
    const { store, scheduler, submit } = setup();
    const settled = vi.fn();
    scheduler.on('task:settled', settled);
    submit('task-1', ['x/a.ts', 'x/b.ts', 'x/c.ts'], [
      ['x/c.ts', 'x/b.ts'],
      ['x/b.ts', 'x/a.ts'],
    ]);

    scheduler.failSubtask('task-1/st-001', { kind: 'session_crash', message: 'worker died', resourceId: 'x/c.ts' });

    const subtasks = store.subtasksOf('task-1');
    expect(subtasks.map((s) => s.status)).toEqual(['failed', 'cancelled', 'cancelled']);
    expect(subtasks[2]?.diagnostic).toMatchObject({ kind: 'prerequisite_failed', subtaskId: 'task-1/st-001' });
    expect(settled).toHaveBeenCalledTimes(1);
    expect(settled).toHaveBeenCalledWith('task-1');
  });

  it('keeps independent work running when a sibling fails', () => {
    const { store, scheduler, submit } = setup();
    submit('task-1', ['x/a.ts', 'y/b.ts']);

    scheduler.failSubtask('task-1/st-001', { kind: 'budget_exceeded', message: 'too big' });
    expect(store.getSubtask('task-1/st-002')?.status).toBe('dispatched');
  });

  it('cancels a task: aborts running sessions and empties its queue', () => {
    const { store, scheduler, launched, submit } = setup(makeBudget({ concurrencyLimit: 2 }));
    const cancelled = vi.fn();
    scheduler.on('task:cancelled', cancelled);
    submit('task-1', files(4));

    expect(scheduler.cancel('task-1')).toBe(true);

    expect(store.getTask('task-1')?.status).toBe('cancelled');
    expect(store.subtasksOf('task-1').every((s) => s.status === 'cancelled')).toBe(true);
    expect(launched.map((l) => l.signal.aborted)).toEqual([true, true]);
    expect(launched.map((l) => l.shutdown.aborted)).toEqual([false, false]);
    expect(scheduler.queuedSubtaskIds).toEqual([]);
    expect(cancelled).toHaveBeenCalledWith('task-1');

    expect(scheduler.cancel('task-1')).toBe(false);
    expect(scheduler.cancel('unknown')).toBe(false);
  });

  it('holds back a subtask whose resources are leased by another session', () => {
    const { scheduler, launched, submit } = setup();
    submit('task-1', ['src/shared.ts']);
    submit('task-2', ['src/shared.ts']);

    expect(launched.map((l) => l.subtask.taskId)).toEqual(['task-1']);
    expect(scheduler.queuedSubtaskIds).toEqual(['task-2/st-001']);

    scheduler.completeSubtask('task-1/st-001');
    scheduler.release('worker-1');
    expect(launched.map((l) => l.subtask.taskId)).toEqual(['task-1', 'task-2']);
  });

  it('aborts in-flight work only on shutdown', () => {
    const { scheduler, launched, submit } = setup();
    submit('task-1', files(2));

    scheduler.abortAll();

    expect(launched.map((l) => [l.signal.aborted, l.shutdown.aborted])).toEqual([
      [true, true],
      [true, true],
    ]);
  });

  it('stops dispatching once halted', () => {
    const { scheduler, launched, submit } = setup();
    scheduler.halt();
    submit('task-1', files(2));
    expect(launched).toEqual([]);
  });
});

describe('Scheduler.requeueRemainder', () => {
  const budget = makeBudget({ maxResourcesPerSubtask: 4 });
  const resources = ['src/a.ts', 'src/b.ts', 'src/c.ts', 'src/d.ts', 'src/e.ts'];
  const edges: DependencyEdge[] = [['src/d.ts', 'src/e.ts']];

  it('splits off the unprocessed remainder after partial progress', () => {
    const { store, scheduler, launched, submit, complete } = setup(budget);
    submit('task-1', resources, edges);
    complete('task-1/st-001', 'src/a.ts');
    complete('task-1/st-001', 'src/b.ts');

    const remainderId = scheduler.requeueRemainder('task-1/st-001', { attempts: 0, isolate: true });

    expect(remainderId).toBe('task-1/st-003');
    expect(store.getSubtask('task-1/st-001')).toMatchObject({
      resources: ['src/a.ts', 'src/b.ts'],
      status: 'completed',
    });
    expect(store.getSubtask('task-1/st-003')).toMatchObject({
      resources: ['src/c.ts', 'src/d.ts'],
      dependsOn: ['task-1/st-001'],
      origin: 'task-1/st-001',
      status: 'ready',
    });
    expect(store.getSubtask('task-1/st-002')?.dependsOn).toEqual(['task-1/st-001', 'task-1/st-003']);
    expect(store.getSubtask('task-1/st-002')?.status).toBe('pending');

    // Still leased by worker-1 until its session ends
    expect(launched).toHaveLength(1);
    scheduler.release('worker-1');
    expect(launched.map((l) => l.subtask.id)).toEqual(['task-1/st-001', 'task-1/st-003']);
  });

  it('isolates the first resource when nothing was completed', () => {
    const { store, scheduler, submit } = setup(budget);
    submit('task-1', resources, edges);

    const remainderId = scheduler.requeueRemainder('task-1/st-001', { attempts: 0, isolate: true });

    expect(remainderId).toBe('task-1/st-003');
    expect(store.getSubtask('task-1/st-001')).toMatchObject({
      resources: ['src/a.ts'],
      oversized: true,
      status: 'ready',
    });
    // No edge from src/a.ts into the rest: the remainder does not wait for it
    expect(store.getSubtask('task-1/st-003')).toMatchObject({
      resources: ['src/b.ts', 'src/c.ts', 'src/d.ts'],
      dependsOn: [],
      status: 'ready',
    });
    expect(store.getSubtask('task-1/st-002')?.dependsOn).toEqual(['task-1/st-001', 'task-1/st-003']);
  });

  it('lets unrelated work continue when the isolated resource fails', () => {
    const { store, scheduler, launched, submit } = setup(budget);
    submit('task-1', resources, edges);
    scheduler.requeueRemainder('task-1/st-001', { attempts: 0, isolate: true });
    scheduler.release('worker-1');

    scheduler.failSubtask('task-1/st-001', { kind: 'budget_exceeded', message: 'too big' });

    expect(store.getSubtask('task-1/st-003')?.status).toBe('dispatched');
    expect(store.getSubtask('task-1/st-002')?.status).toBe('cancelled');
    expect(launched.map((l) => l.subtask.id)).toEqual(['task-1/st-001', 'task-1/st-003', 'task-1/st-001']);
  });

  it('keeps the remainder behind the isolated resource when an edge links them', () => {
    const { store, scheduler, submit } = setup(budget);
    submit('task-1', resources, [['src/a.ts', 'src/c.ts'], ...edges]);
    expect(store.getSubtask('task-1/st-001')?.resources).toEqual(['src/a.ts', 'src/c.ts', 'src/b.ts', 'src/d.ts']);

    scheduler.requeueRemainder('task-1/st-001', { attempts: 0, isolate: true });

    expect(store.getSubtask('task-1/st-003')).toMatchObject({
      resources: ['src/c.ts', 'src/b.ts', 'src/d.ts'],
      dependsOn: ['task-1/st-001'],
      status: 'pending',
    });
  });

  it('retries the whole subtask after a crash without progress', () => {
    const { store, scheduler, submit } = setup(budget);
    submit('task-1', resources, edges);

    expect(scheduler.requeueRemainder('task-1/st-001', { attempts: 1, isolate: false })).toBe('task-1/st-001');
    expect(store.getSubtask('task-1/st-001')).toMatchObject({
      resources: ['src/a.ts', 'src/b.ts', 'src/c.ts', 'src/d.ts'],
      attempts: 1,
      status: 'ready',
    });
  });

  it('completes the subtask when nothing remains', () => {
    const { store, scheduler, submit, complete } = setup(budget);
    submit('task-1', resources, edges);
    for (const r of ['src/a.ts', 'src/b.ts', 'src/c.ts', 'src/d.ts']) complete('task-1/st-001', r);

    expect(scheduler.requeueRemainder('task-1/st-001', { attempts: 0, isolate: true })).toBeNull();
    expect(store.getSubtask('task-1/st-001')?.status).toBe('completed');
  });
});
