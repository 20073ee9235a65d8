import type { ResourceLease } from './lock.types.js';
import type { ProgressEvent } from './ledger.types.js';
import type { SessionState } from './session.types.js';
import type { DependencyEdge, PlanReceipt, ResourceId, Task, TaskOutcome } from './task.types.js';

// ---- Client → Server messages ----

export type ClientMessage =
  | {
      type: 'SUBMIT_TASK';
      payload: { description: string; resources: ResourceId[]; edges: DependencyEdge[] };
    }
  | { type: 'CANCEL_TASK'; payload: { taskId: string } }
  | { type: 'GET_TASK'; payload: { taskId: string } };

// ---- Server → Client messages ----

export type ServerMessage =
  | { type: 'PLAN_RECEIPT'; payload: PlanReceipt }
  | { type: 'PROGRESS'; payload: ProgressEvent }
  | { type: 'TASK_STATE'; payload: Task }
  | { type: 'SESSION_UPDATE'; payload: SessionState }
  | { type: 'LOCK_UPDATE'; payload: ResourceLease[] }
  | { type: 'TASK_COMPLETE'; payload: TaskOutcome }
  | { type: 'ERROR'; payload: { message: string } };
