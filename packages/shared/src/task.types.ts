/** Unique identifier of an addressable unit of work, e.g. a file path. */
export type ResourceId = string;

/** `[prerequisite, dependent]`: the dependent is processed after the prerequisite. */
export type DependencyEdge = readonly [prerequisite: ResourceId, dependent: ResourceId];

export type TaskStatus = 'planned' | 'in_progress' | 'completed' | 'failed' | 'cancelled';

export type SubtaskStatus =
  | 'pending' // waiting on prerequisite subtasks
  | 'ready'
  | 'dispatched'
  | 'compacting'
  | 'completed'
  | 'failed'
  | 'cancelled';

export type DiagnosticKind =
  | 'subtask_failed'
  | 'budget_exceeded'
  | 'session_crash'
  | 'prerequisite_failed'
  | 'conflict'
  | 'verification'
  | 'output_write'
  | 'cancelled';

/** Structured reason attached to a failed or cancelled task or subtask. */
export interface TaskDiagnostic {
  kind: DiagnosticKind;
  message: string;
  subtaskId?: string;
  resourceId?: ResourceId;
  hook?: string;
  attempts?: number;
}

export interface Task {
  id: string;
  description: string;
  resources: ResourceId[];
  edges: DependencyEdge[];
  status: TaskStatus;
  subtaskIds: string[];
  createdAt: number;
  completedAt: number | null;
  diagnostic: TaskDiagnostic | null;
}

export interface Subtask {
  id: string;
  taskId: string;
  /** Processing order; internal dependency order is preserved. */
  resources: ResourceId[];
  dependsOn: string[];
  /** Weak reference to the session currently (or last) running this subtask. */
  sessionId: string | null;
  status: SubtaskStatus;
  oversized: boolean;
  /** Crash retries consumed so far. */
  attempts: number;
  completedResources: ResourceId[];
  /** Subtask this one was split from, if any. */
  origin: string | null;
  diagnostic: TaskDiagnostic | null;
}

export interface ResourceOutput {
  resourceId: ResourceId;
  subtaskId: string;
  content: string;
}

export interface PlanReceipt {
  taskId: string;
  subtaskIds: string[];
}

export interface TaskOutcome {
  taskId: string;
  status: Extract<TaskStatus, 'completed' | 'failed' | 'cancelled'>;
  outputs: ResourceOutput[];
  diagnostic: TaskDiagnostic | null;
}
