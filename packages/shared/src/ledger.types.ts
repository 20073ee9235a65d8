import type {
  DependencyEdge,
  ResourceId,
  ResourceOutput,
  SubtaskStatus,
  TaskDiagnostic,
  TaskStatus,
} from './task.types.js';

/** Payload of a ledger entry; enough to rebuild task state by replay. */
export type PlanEvent =
  | {
      type: 'task_submitted';
      description: string;
      resources: ResourceId[];
      edges: DependencyEdge[];
    }
  | {
      type: 'subtask_created';
      resources: ResourceId[];
      dependsOn: string[];
      oversized: boolean;
      origin: string | null;
      attempts: number;
    }
  | { type: 'subtask_transition'; diagnostic?: TaskDiagnostic; attempts?: number }
  | { type: 'subtask_rewired'; dependsOn: string[] }
  | { type: 'subtask_shrunk'; resources: ResourceId[]; oversized: boolean }
  | { type: 'resource_completed'; output: ResourceOutput }
  | { type: 'task_transition'; diagnostic?: TaskDiagnostic };

export type PlanEventType = PlanEvent['type'];

/** Immutable ledger entry. */
export interface PlanRecord {
  /** Position in the task's record sequence, starting at 1. */
  seq: number;
  taskId: string;
  subtaskId: string | null;
  fromState: TaskStatus | SubtaskStatus | null;
  toState: TaskStatus | SubtaskStatus | null;
  workerId: string | null;
  timestamp: number;
  event: PlanEvent;
}

/** State transition as published on the progress stream. */
export interface ProgressEvent {
  taskId: string;
  subtaskId: string | null;
  fromState: TaskStatus | SubtaskStatus | null;
  toState: TaskStatus | SubtaskStatus;
  workerId: string | null;
  timestamp: number;
}

/** Durable append-only store. Implementations serialize their own physical writes. */
export interface LedgerBackend {
  append(record: PlanRecord): Promise<void>;
  readAll(taskId: string): Promise<PlanRecord[]>;
  listTaskIds(): Promise<string[]>;
}
