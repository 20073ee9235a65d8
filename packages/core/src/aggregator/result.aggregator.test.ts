import { describe, it, expect, vi } from 'vitest';
import type {
  ResourceOutput,
  ResourceProvider,
  Subtask,
  Task,
  VerificationHook,
} from '@tessera/shared';
import { ResultAggregator, mergeOutputs } from './result.aggregator.js';
import { ConflictError } from '../errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const TASK: Task = {
  id: 'task-1',
  description: 'rename helper',
  resources: ['a.ts', 'b.ts'],
  edges: [],
  status: 'in_progress',
  subtaskIds: ['task-1/st-001', 'task-1/st-002'],
  createdAt: 0,
  completedAt: null,
  diagnostic: null,
};

function makeSubtask(id: string, overrides: Partial<Subtask> = {}): Subtask {
  return {
    id,
    taskId: 'task-1',
    resources: [],
    dependsOn: [],
    sessionId: null,
    status: 'completed',
    oversized: false,
    attempts: 0,
    completedResources: [],
    origin: null,
    diagnostic: null,
    ...overrides,
  };
}

function out(resourceId: string, subtaskId: string, content: string): ResourceOutput {
  return { resourceId, subtaskId, content };
}

function makeProvider(): ResourceProvider & { writes: Array<[string, string]> } {
  const writes: Array<[string, string]> = [];
  return {
    writes,
    read: async () => '',
    write: async (id, content) => {
      writes.push([id, content]);
    },
  };
}

function makeHook(name: string, pass: boolean, calls: string[]): VerificationHook {
  return {
    name,
    run: async () => {
      calls.push(name);
      return { pass, diagnostics: pass ? '' : `${name} broke` };
    },
  };
}

// ---------------------------------------------------------------------------
// mergeOutputs
// ---------------------------------------------------------------------------

describe('mergeOutputs', () => {
  it('is independent of arrival order', () => {
    const outputs = [out('b.ts', 'st-2', 'B'), out('a.ts', 'st-1', 'A')];
    expect(mergeOutputs(outputs)).toEqual(mergeOutputs([...outputs].reverse()));
    expect(mergeOutputs(outputs).map((o) => o.resourceId)).toEqual(['a.ts', 'b.ts']);
  });

  it('collapses identical duplicates', () => {
    const merged = mergeOutputs([out('a.ts', 'st-1', 'A'), out('a.ts', 'st-2', 'A')]);
    expect(merged).toEqual([out('a.ts', 'st-1', 'A')]);
  });

  it('throws ConflictError for differing content on one resource', () => {
    try {
      mergeOutputs([out('a.ts', 'st-2', 'A'), out('a.ts', 'st-1', 'X')]);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConflictError);
      if (err instanceof ConflictError) {
        expect(err.resourceId).toBe('a.ts');
        expect(err.subtaskIds).toEqual(['st-1', 'st-2']);
      }
    }
  });
});

// ---------------------------------------------------------------------------
// ResultAggregator
// ---------------------------------------------------------------------------

describe('ResultAggregator', () => {
  it('writes merged outputs and completes when every hook passes', async () => {
    const provider = makeProvider();
    const calls: string[] = [];
    const aggregator = new ResultAggregator(provider, [
      makeHook('lint', true, calls),
      makeHook('test', true, calls),
    ]);

    const outcome = await aggregator.aggregate(
      TASK,
      [makeSubtask('task-1/st-001'), makeSubtask('task-1/st-002')],
      [out('b.ts', 'task-1/st-002', 'B'), out('a.ts', 'task-1/st-001', 'A')],
    );

    expect(outcome.status).toBe('completed');
    expect(outcome.diagnostic).toBeNull();
    expect(provider.writes).toEqual([
      ['a.ts', 'A'],
      ['b.ts', 'B'],
    ]);
    expect(calls).toEqual(['lint', 'test']);
  });

  it('fails on conflicting outputs without writing anything', async () => {
    const provider = makeProvider();
    const aggregator = new ResultAggregator(provider);

    const outcome = await aggregator.aggregate(
      TASK,
      [makeSubtask('task-1/st-001'), makeSubtask('task-1/st-002')],
      [out('a.ts', 'task-1/st-001', 'A'), out('a.ts', 'task-1/st-002', 'Z')],
    );

    expect(outcome.status).toBe('failed');
    expect(outcome.diagnostic?.kind).toBe('conflict');
    expect(outcome.diagnostic?.resourceId).toBe('a.ts');
    expect(provider.writes).toEqual([]);
  });

  it('reports the failed subtask rather than the ones cancelled after it', async () => {
    const provider = makeProvider();
    const aggregator = new ResultAggregator(provider);

    const outcome = await aggregator.aggregate(
      TASK,
      [
        makeSubtask('task-1/st-001', {
          status: 'failed',
          attempts: 3,
          diagnostic: { kind: 'session_crash', message: 'worker died', resourceId: 'a.ts' },
        }),
        makeSubtask('task-1/st-002', {
          status: 'cancelled',
          diagnostic: { kind: 'prerequisite_failed', message: 'Prerequisite subtask task-1/st-001 failed' },
        }),
      ],
      [],
    );

    expect(outcome.status).toBe('failed');
    expect(outcome.diagnostic).toEqual({
      kind: 'subtask_failed',
      message: 'worker died',
      subtaskId: 'task-1/st-001',
      resourceId: 'a.ts',
      attempts: 3,
    });
    expect(provider.writes).toEqual([]);
  });

  it('stops at the first failing hook', async () => {
    const provider = makeProvider();
    const calls: string[] = [];
    const aggregator = new ResultAggregator(provider, [
      makeHook('lint', false, calls),
      makeHook('test', true, calls),
    ]);

    const outcome = await aggregator.aggregate(TASK, [makeSubtask('task-1/st-001')], [
      out('a.ts', 'task-1/st-001', 'A'),
    ]);

    expect(outcome.status).toBe('failed');
    expect(outcome.diagnostic).toEqual({
      kind: 'verification',
      message: 'Verification hook "lint" failed: lint broke',
      hook: 'lint',
    });
    expect(calls).toEqual(['lint']);
  });

  it('stops writing once the task is cancelled mid-way', async () => {
    const provider = makeProvider();
    const calls: string[] = [];
    const aggregator = new ResultAggregator(provider, [makeHook('lint', true, calls)]);

    const outcome = await aggregator.aggregate(
      TASK,
      [makeSubtask('task-1/st-001'), makeSubtask('task-1/st-002')],
      [out('a.ts', 'task-1/st-001', 'A'), out('b.ts', 'task-1/st-002', 'B')],
      () => provider.writes.length > 0,
    );

    expect(outcome.status).toBe('cancelled');
    expect(outcome.diagnostic).toEqual({ kind: 'cancelled', message: 'Task cancelled' });
    expect(provider.writes).toEqual([['a.ts', 'A']]);
    expect(calls).toEqual([]);
  });

  it('treats a throwing hook as a failed verification', async () => {
    const hook: VerificationHook = { name: 'typecheck', run: vi.fn().mockRejectedValue(new Error('spawn ENOENT')) };
    const aggregator = new ResultAggregator(makeProvider(), [hook]);

    const outcome = await aggregator.aggregate(TASK, [makeSubtask('task-1/st-001')], [
      out('a.ts', 'task-1/st-001', 'A'),
    ]);

    expect(outcome.diagnostic?.kind).toBe('verification');
    expect(outcome.diagnostic?.message).toBe('Verification hook "typecheck" failed: spawn ENOENT');
  });
});
