import type {
  PlanEvent,
  PlanRecord,
  ResourceOutput,
  Subtask,
  SubtaskStatus,
  Task,
  TaskStatus,
} from '@tessera/shared';
import { InvalidTransitionError } from '../errors.js';

const TASK_RANK: Record<TaskStatus, number> = {
  planned: 0,
  in_progress: 1,
  completed: 2,
  failed: 2,
  cancelled: 2,
};

export function isTerminalTask(status: TaskStatus): boolean {
  return TASK_RANK[status] === 2;
}

export function isTerminalSubtask(status: SubtaskStatus): boolean {
  return status === 'completed' || status === 'failed' || status === 'cancelled';
}

/** Everything needed to append one record; seq and timestamp are assigned by the store. */
export interface RecordInput {
  taskId: string;
  subtaskId?: string | null;
  fromState?: PlanRecord['fromState'];
  toState?: PlanRecord['toState'];
  workerId?: string | null;
  event: PlanEvent;
}

/**
 * In-memory task/subtask state, derived exclusively from PlanRecords.
 *
 * The live orchestrator and crash recovery both go through `apply`, so
 * replaying a task's ledger from an empty store reconstructs exactly the state
 * the live run produced.
 */
export class PlanStore {
  private readonly tasks = new Map<string, Task>();
  private readonly subtasks = new Map<string, Subtask>();
  private readonly outputs = new Map<string, ResourceOutput[]>();
  private readonly seqs = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  /** Rebuild state from a record sequence. */
  static replay(records: PlanRecord[], now?: () => number): PlanStore {
    const store = new PlanStore(now);
    const ordered = [...records].sort((a, b) =>
      a.taskId === b.taskId ? a.seq - b.seq : a.taskId < b.taskId ? -1 : 1,
    );
    for (const record of ordered) store.apply(record);
    return store;
  }

  /** Build the next record for a task, apply it, and return it for persisting. */
  record(input: RecordInput): PlanRecord {
    const record: PlanRecord = {
      seq: (this.seqs.get(input.taskId) ?? 0) + 1,
      taskId: input.taskId,
      subtaskId: input.subtaskId ?? null,
      fromState: input.fromState ?? null,
      toState: input.toState ?? null,
      workerId: input.workerId ?? null,
      timestamp: this.now(),
      event: input.event,
    };
    this.apply(record);
    return record;
  }

  apply(record: PlanRecord): void {
    const { event } = record;
    switch (event.type) {
      case 'task_submitted': {
        this.tasks.set(record.taskId, {
          id: record.taskId,
          description: event.description,
          resources: [...event.resources],
          edges: event.edges.map(([p, d]) => [p, d] as const),
          status: 'planned',
          subtaskIds: [],
          createdAt: record.timestamp,
          completedAt: null,
          diagnostic: null,
        });
        this.outputs.set(record.taskId, []);
        break;
      }

      case 'subtask_created': {
        const task = this.requireTask(record.taskId);
        const id = this.requireSubtaskId(record);
        this.subtasks.set(id, {
          id,
          taskId: task.id,
          resources: [...event.resources],
          dependsOn: [...event.dependsOn],
          sessionId: null,
          status: this.subtaskState(record.toState) ?? 'pending',
          oversized: event.oversized,
          attempts: event.attempts,
          completedResources: [],
          origin: event.origin,
          diagnostic: null,
        });
        task.subtaskIds.push(id);
        break;
      }

      case 'subtask_transition': {
        const subtask = this.requireSubtask(record);
        const to = this.subtaskState(record.toState);
        if (!to) throw new InvalidTransitionError(`subtask ${subtask.id}`, subtask.status, 'none');
        if (isTerminalSubtask(subtask.status)) {
          throw new InvalidTransitionError(`subtask ${subtask.id}`, subtask.status, to);
        }
        subtask.status = to;
        if (to === 'dispatched' && record.workerId) subtask.sessionId = record.workerId;
        if (event.diagnostic) subtask.diagnostic = { ...event.diagnostic };
        if (event.attempts !== undefined) subtask.attempts = event.attempts;
        break;
      }

      case 'subtask_rewired': {
        this.requireSubtask(record).dependsOn = [...event.dependsOn];
        break;
      }

      case 'subtask_shrunk': {
        const subtask = this.requireSubtask(record);
        const kept = new Set(event.resources);
        subtask.resources = [...event.resources];
        subtask.oversized = event.oversized;
        subtask.completedResources = subtask.completedResources.filter((r) => kept.has(r));
        break;
      }

      case 'resource_completed': {
        const subtask = this.requireSubtask(record);
        if (!subtask.completedResources.includes(event.output.resourceId)) {
          subtask.completedResources.push(event.output.resourceId);
        }
        this.outputs.get(record.taskId)?.push({ ...event.output });
        break;
      }

      case 'task_transition': {
        const task = this.requireTask(record.taskId);
        const to = this.taskState(record.toState);
        if (!to || TASK_RANK[to] <= TASK_RANK[task.status]) {
          throw new InvalidTransitionError(`task ${task.id}`, task.status, to ?? 'none');
        }
        task.status = to;
        if (event.diagnostic) task.diagnostic = { ...event.diagnostic };
        if (isTerminalTask(to)) task.completedAt = record.timestamp;
        break;
      }
    }
    this.seqs.set(record.taskId, Math.max(this.seqs.get(record.taskId) ?? 0, record.seq));
  }

  // ---------------------------------------------------------------------------
  // Queries; all return copies
  // ---------------------------------------------------------------------------

  getTask(taskId: string): Task | undefined {
    const task = this.tasks.get(taskId);
    return task ? structuredClone(task) : undefined;
  }

  getSubtask(subtaskId: string): Subtask | undefined {
    const subtask = this.subtasks.get(subtaskId);
    return subtask ? structuredClone(subtask) : undefined;
  }

  subtasksOf(taskId: string): Subtask[] {
    const task = this.tasks.get(taskId);
    if (!task) return [];
    return task.subtaskIds.flatMap((id) => {
      const subtask = this.subtasks.get(id);
      return subtask ? [structuredClone(subtask)] : [];
    });
  }

  outputsOf(taskId: string): ResourceOutput[] {
    return (this.outputs.get(taskId) ?? []).map((o) => ({ ...o }));
  }

  taskIds(): string[] {
    return [...this.tasks.keys()];
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private requireTask(taskId: string): Task {
    const task = this.tasks.get(taskId);
    if (!task) throw new Error(`Unknown task: ${taskId}`);
    return task;
  }

  private requireSubtaskId(record: PlanRecord): string {
    if (!record.subtaskId) {
      throw new Error(`Record ${record.taskId}#${record.seq} (${record.event.type}) has no subtask id`);
    }
    return record.subtaskId;
  }

  private requireSubtask(record: PlanRecord): Subtask {
    const id = this.requireSubtaskId(record);
    const subtask = this.subtasks.get(id);
    if (!subtask) throw new Error(`Unknown subtask: ${id}`);
    return subtask;
  }

  private subtaskState(state: PlanRecord['toState']): SubtaskStatus | null {
    switch (state) {
      case 'pending':
      case 'ready':
      case 'dispatched':
      case 'compacting':
      case 'completed':
      case 'failed':
      case 'cancelled':
        return state;
      default:
        return null;
    }
  }

  private taskState(state: PlanRecord['toState']): TaskStatus | null {
    switch (state) {
      case 'planned':
      case 'in_progress':
      case 'completed':
      case 'failed':
      case 'cancelled':
        return state;
      default:
        return null;
    }
  }
}
