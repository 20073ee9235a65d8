import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LockRegistry } from './lock.registry.js';

let registry: LockRegistry;

beforeEach(() => {
  registry = new LockRegistry(() => 1_000);
});

afterEach(() => {
  registry.destroy();
});

// ─── tryAcquire ────────────────────────────────────────────────

describe('tryAcquire', () => {
  it('leases every requested resource to the holder', () => {
    expect(registry.tryAcquire(['src/a.ts', 'src/b.ts'], 'worker-1')).toBe(true);

    expect(registry.getLocks()).toEqual([
      { resourceId: 'src/a.ts', heldBy: 'worker-1', leasedAt: 1_000 },
      { resourceId: 'src/b.ts', heldBy: 'worker-1', leasedAt: 1_000 },
    ]);
  });

  it('emits lock_acquired with the new leases', () => {
    const handler = vi.fn();
    registry.on('lock_acquired', handler);

    registry.tryAcquire(['src/a.ts'], 'worker-1');

    expect(handler).toHaveBeenCalledOnce();
    expect(handler).toHaveBeenCalledWith([
      { resourceId: 'src/a.ts', heldBy: 'worker-1', leasedAt: 1_000 },
    ]);
  });

  it('lets the same holder re-acquire its own leases', () => {
    registry.tryAcquire(['src/a.ts'], 'worker-1');
    expect(registry.tryAcquire(['src/a.ts', 'src/b.ts'], 'worker-1')).toBe(true);
    expect(registry.getLocks()).toHaveLength(2);
  });

  it('acquires nothing when any resource is held by another session', () => {
    registry.tryAcquire(['src/b.ts'], 'worker-1');

    expect(registry.tryAcquire(['src/a.ts', 'src/b.ts'], 'worker-2')).toBe(false);
    expect(registry.holderOf('src/a.ts')).toBeNull();
    expect(registry.holderOf('src/b.ts')).toBe('worker-1');
  });
});

// ─── releaseAllFor ─────────────────────────────────────────────

describe('releaseAllFor', () => {
  it('releases only the leases of the given holder', () => {
    registry.tryAcquire(['a.ts', 'c.ts'], 'worker-1');
    registry.tryAcquire(['b.ts'], 'worker-2');

    registry.releaseAllFor('worker-1');

    expect(registry.getLocks().map((l) => l.resourceId)).toEqual(['b.ts']);
  });

  it('emits lock_released once with every released lease', () => {
    const handler = vi.fn();
    registry.on('lock_released', handler);
    registry.tryAcquire(['a.ts', 'b.ts'], 'worker-1');

    registry.releaseAllFor('worker-1');

    expect(handler).toHaveBeenCalledOnce();
    expect(handler.mock.calls[0]?.[0]).toHaveLength(2);
  });

  it('does not emit when the holder has no leases', () => {
    const handler = vi.fn();
    registry.on('lock_released', handler);

    registry.releaseAllFor('worker-9');

    expect(handler).not.toHaveBeenCalled();
  });

  it('makes released resources available to other sessions', () => {
    registry.tryAcquire(['a.ts'], 'worker-1');
    registry.releaseAllFor('worker-1');
    expect(registry.tryAcquire(['a.ts'], 'worker-2')).toBe(true);
  });
});

// ─── getLocks ──────────────────────────────────────────────────

describe('getLocks', () => {
  it('returns an empty array when nothing is leased', () => {
    expect(registry.getLocks()).toEqual([]);
  });

  it('returns copies that do not affect the registry', () => {
    registry.tryAcquire(['a.ts'], 'worker-1');
    const [lease] = registry.getLocks();
    if (lease) lease.heldBy = 'someone-else';
    expect(registry.holderOf('a.ts')).toBe('worker-1');
  });
});
