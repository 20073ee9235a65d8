import type { ResourceId } from './task.types.js';

export interface ResourceLease {
  resourceId: ResourceId;
  heldBy: string; // session id
  leasedAt: number;
}
