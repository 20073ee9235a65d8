import { EventEmitter } from 'node:events';
import type { ResourceId, ResourceLease } from '@tessera/shared';

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface LockRegistry {
  on(event: 'lock_acquired', listener: (leases: ResourceLease[]) => void): this;
  on(event: 'lock_released', listener: (leases: ResourceLease[]) => void): this;
  emit(event: 'lock_acquired', leases: ResourceLease[]): boolean;
  emit(event: 'lock_released', leases: ResourceLease[]): boolean;
}

/**
 * Exclusive leases on resources, held by worker sessions.
 *
 * A session leases its whole resource subset at dispatch or nothing at all,
 * so two sessions can never work on the same resource at once.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class LockRegistry extends EventEmitter {
  private readonly leases = new Map<ResourceId, ResourceLease>();

  constructor(private readonly now: () => number = Date.now) {
    super();
  }

  /**
   * Lease every resource for `holder`, or none of them.
   * Resources already leased by the same holder count as available.
   */
  tryAcquire(resources: ResourceId[], holder: string): boolean {
    for (const resourceId of resources) {
      const existing = this.leases.get(resourceId);
      if (existing && existing.heldBy !== holder) return false;
    }

    const leasedAt = this.now();
    const acquired = resources.map((resourceId): ResourceLease => {
      const lease = { resourceId, heldBy: holder, leasedAt };
      this.leases.set(resourceId, lease);
      return lease;
    });
    if (acquired.length > 0) this.emit('lock_acquired', acquired);
    return true;
  }

  /** Current holder of a resource, if any. */
  holderOf(resourceId: ResourceId): string | null {
    return this.leases.get(resourceId)?.heldBy ?? null;
  }

  /** Returns a snapshot of all currently held leases. */
  getLocks(): ResourceLease[] {
    return Array.from(this.leases.values(), (lease) => ({ ...lease }));
  }

  /** Release all leases held by `holder` (session end, reset, cancellation). */
  releaseAllFor(holder: string): void {
    const released: ResourceLease[] = [];
    for (const [resourceId, lease] of this.leases) {
      if (lease.heldBy === holder) {
        this.leases.delete(resourceId);
        released.push(lease);
      }
    }
    if (released.length > 0) this.emit('lock_released', released);
  }

  destroy(): void {
    this.leases.clear();
    this.removeAllListeners();
  }
}
