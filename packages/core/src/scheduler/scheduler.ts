import { EventEmitter } from 'node:events';
import type {
  Budget,
  PlanReceipt,
  ResourceId,
  Subtask,
  SubtaskStatus,
  TaskDiagnostic,
} from '@tessera/shared';
import type { TaskGraph } from '../graph/task.graph.builder.js';
import { subtaskId } from '../graph/task.graph.builder.js';
import type { LockRegistry } from '../locks/lock.registry.js';
import type { PlanStore, RecordInput } from '../ledger/plan.store.js';
import { isTerminalSubtask, isTerminalTask } from '../ledger/plan.store.js';

export interface SessionSignals {
  /** Task cancelled: stop at the next resource boundary. */
  cancel: AbortSignal;
  /** Orchestrator shutting down: stop in-flight work now. */
  shutdown: AbortSignal;
}

/** Starts a worker session for a freshly dispatched subtask. */
export type SessionLauncher = (subtask: Subtask, sessionId: string, signals: SessionSignals) => void;

export interface SchedulerOptions {
  store: PlanStore;
  /** Record a transition: applied to the store immediately, persisted in order. */
  commit: (input: RecordInput) => void;
  locks: LockRegistry;
  budget: Budget;
  launch: SessionLauncher;
}

export interface RequeueOptions {
  /** Attempts to carry onto the requeued work. */
  attempts: number;
  /**
   * When nothing was completed, split the first remaining resource off as an
   * oversized singleton so the next session is guaranteed to make progress.
   */
  isolate: boolean;
}

interface ActiveSession {
  taskId: string;
  subtaskId: string;
  controller: AbortController;
}

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface Scheduler {
  /** Every subtask of the task is terminal and the task itself is not. */
  on(event: 'task:settled', listener: (taskId: string) => void): this;
  on(event: 'task:cancelled', listener: (taskId: string) => void): this;
  emit(event: 'task:settled', taskId: string): boolean;
  emit(event: 'task:cancelled', taskId: string): boolean;
}

/**
 * Ready queue and dispatch loop shared by every task of the orchestrator.
 *
 * All decisions run synchronously on the event loop, so "check queue, check
 * concurrency limit, create session" is one indivisible step; the number of
 * active sessions can never exceed `budget.concurrencyLimit`.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class Scheduler extends EventEmitter {
  private readonly store: PlanStore;
  private readonly commit: (input: RecordInput) => void;
  private readonly locks: LockRegistry;
  private readonly budget: Budget;
  private readonly launch: SessionLauncher;

  /** FIFO of ready subtask ids. */
  private readonly queue: string[] = [];
  private readonly active = new Map<string, ActiveSession>();
  private readonly shutdown = new AbortController();
  private sessionCounter = 0;
  private halted = false;

  constructor(options: SchedulerOptions) {
    super();
    this.store = options.store;
    this.commit = options.commit;
    this.locks = options.locks;
    this.budget = options.budget;
    this.launch = options.launch;
  }

  get activeCount(): number {
    return this.active.size;
  }

  get queuedSubtaskIds(): string[] {
    return [...this.queue];
  }

  isActive(sessionId: string): boolean {
    return this.active.has(sessionId);
  }

  // ---------------------------------------------------------------------------
  // Submission & cancellation
  // ---------------------------------------------------------------------------

  /** Record a built task graph and queue its dependency-free subtasks. */
  submit(graph: TaskGraph): PlanReceipt {
    const { task, subtasks } = graph;
    this.commit({
      taskId: task.id,
      toState: 'planned',
      event: {
        type: 'task_submitted',
        description: task.description,
        resources: task.resources,
        edges: task.edges,
      },
    });

    for (const subtask of subtasks) {
      this.commit({
        taskId: task.id,
        subtaskId: subtask.id,
        toState: 'pending',
        event: {
          type: 'subtask_created',
          resources: subtask.resources,
          dependsOn: subtask.dependsOn,
          oversized: subtask.oversized,
          origin: null,
          attempts: 0,
        },
      });
    }

    for (const subtask of subtasks) {
      if (subtask.dependsOn.length === 0) this.markReady(subtask.id, 'pending');
    }

    this.pump();
    return { taskId: task.id, subtaskIds: subtasks.map((s) => s.id) };
  }

  /**
   * Cancel a task. Idempotent: unknown or already-terminal tasks are ignored.
   * Active sessions are asked to stop at their next resource boundary.
   */
  cancel(taskId: string): boolean {
    const task = this.store.getTask(taskId);
    if (!task || isTerminalTask(task.status)) return false;

    this.commit({
      taskId,
      fromState: task.status,
      toState: 'cancelled',
      event: {
        type: 'task_transition',
        diagnostic: { kind: 'cancelled', message: 'Task cancelled' },
      },
    });

    for (const subtask of this.store.subtasksOf(taskId)) {
      if (isTerminalSubtask(subtask.status)) continue;
      this.transition(subtask, 'cancelled', {
        diagnostic: { kind: 'cancelled', message: 'Task cancelled', subtaskId: subtask.id },
      });
    }

    this.dropQueued(taskId);
    for (const session of this.active.values()) {
      if (session.taskId === taskId) session.controller.abort();
    }

    this.emit('task:cancelled', taskId);
    this.pump();
    return true;
  }

  /** Stop dispatching for good, e.g. when the ledger is unavailable. */
  halt(): void {
    this.halted = true;
  }

  /** Stop every active session, including work in flight (process shutdown). */
  abortAll(): void {
    for (const session of this.active.values()) session.controller.abort();
    this.shutdown.abort();
  }

  // ---------------------------------------------------------------------------
  // Dispatch loop
  // ---------------------------------------------------------------------------

  /**
   * Dispatch ready subtasks until the concurrency limit is reached. The
   * earliest-enqueued subtask whose resources can be leased goes first.
   */
  pump(): void {
    let index = 0;
    while (!this.halted && this.active.size < this.budget.concurrencyLimit && index < this.queue.length) {
      const id = this.queue[index] ?? '';
      const subtask = this.store.getSubtask(id);
      const task = subtask ? this.store.getTask(subtask.taskId) : undefined;

      if (!subtask || !task || subtask.status !== 'ready' || isTerminalTask(task.status)) {
        this.queue.splice(index, 1);
        continue;
      }

      const sessionId = `worker-${this.sessionCounter + 1}`;
      if (!this.locks.tryAcquire(subtask.resources, sessionId)) {
        index++;
        continue;
      }
      this.sessionCounter++;
      this.queue.splice(index, 1);

      if (task.status === 'planned') {
        this.commit({
          taskId: task.id,
          fromState: 'planned',
          toState: 'in_progress',
          event: { type: 'task_transition' },
        });
      }

      this.transition(subtask, 'dispatched', { workerId: sessionId });

      const controller = new AbortController();
      this.active.set(sessionId, { taskId: task.id, subtaskId: subtask.id, controller });
      const dispatched = this.store.getSubtask(subtask.id) ?? subtask;
      this.launch(dispatched, sessionId, { cancel: controller.signal, shutdown: this.shutdown.signal });
    }
  }

  /** A session ended: free its slot and leases, then dispatch more work. */
  release(sessionId: string): void {
    this.locks.releaseAllFor(sessionId);
    this.active.delete(sessionId);
    this.pump();
  }

  // ---------------------------------------------------------------------------
  // Subtask lifecycle
  // ---------------------------------------------------------------------------

  completeSubtask(id: string): void {
    const subtask = this.store.getSubtask(id);
    if (!subtask || isTerminalSubtask(subtask.status)) return;
    this.transition(subtask, 'completed', { workerId: subtask.sessionId });
    this.onSubtaskTerminal(id, 'completed');
  }

  failSubtask(id: string, diagnostic: TaskDiagnostic, attempts?: number): void {
    const subtask = this.store.getSubtask(id);
    if (!subtask || isTerminalSubtask(subtask.status)) return;
    this.transition(subtask, 'failed', { workerId: subtask.sessionId, diagnostic, attempts });
    this.onSubtaskTerminal(id, 'failed');
  }

  /**
   * Re-evaluate the graph after a subtask reached a terminal state. Readiness
   * depends only on the set of completed prerequisites, never on the order in
   * which they completed.
   */
  onSubtaskTerminal(id: string, status: Extract<SubtaskStatus, 'completed' | 'failed'>): void {
    const subtask = this.store.getSubtask(id);
    if (!subtask) return;
    const siblings = this.store.subtasksOf(subtask.taskId);

    if (status === 'completed') {
      const completed = new Set(siblings.filter((s) => s.status === 'completed').map((s) => s.id));
      for (const sibling of siblings) {
        if (sibling.status !== 'pending') continue;
        if (sibling.dependsOn.every((dep) => completed.has(dep))) {
          this.markReady(sibling.id, 'pending');
        }
      }
    } else {
      for (const downstreamId of this.downstreamOf(id, siblings)) {
        const downstream = this.store.getSubtask(downstreamId);
        if (!downstream || isTerminalSubtask(downstream.status)) continue;
        this.transition(downstream, 'cancelled', {
          diagnostic: {
            kind: 'prerequisite_failed',
            message: `Prerequisite subtask ${id} failed`,
            subtaskId: id,
            resourceId: subtask.diagnostic?.resourceId,
            attempts: subtask.attempts,
          },
        });
      }
    }

    this.checkSettled(subtask.taskId);
    this.pump();
  }

  /**
   * Put the unprocessed part of a subtask back in the queue.
   *
   * With progress, the subtask shrinks to its completed resources and
   * completes; the rest becomes a new subtask that runs after it, and every
   * dependent of the original also waits for the new one. Without progress the
   * subtask itself is queued again (or split, see RequeueOptions.isolate). An
   * isolated resource only holds back the rest when a task edge leads from it
   * into the rest.
   */
  requeueRemainder(id: string, options: RequeueOptions): string | null {
    const subtask = this.store.getSubtask(id);
    if (!subtask || isTerminalSubtask(subtask.status)) return null;

    const done = new Set(subtask.completedResources);
    const completed = subtask.resources.filter((r) => done.has(r));
    const rest = subtask.resources.filter((r) => !done.has(r));

    if (rest.length === 0) {
      this.completeSubtask(id);
      return null;
    }

    if (completed.length > 0) {
      const remainderId = this.mintRemainder(
        subtask,
        rest,
        subtask.oversized && rest.length === 1,
        options.attempts,
        [subtask.id],
      );
      this.shrink(subtask, completed, subtask.oversized && completed.length === 1);
      this.completeSubtask(id);
      return remainderId;
    }

    if (options.isolate && rest.length > 1) {
      const [first, ...others] = rest;
      const isolated = first === undefined ? [] : [first];
      const dependsOn = this.feeds(subtask.taskId, isolated, others)
        ? [...subtask.dependsOn, subtask.id]
        : [...subtask.dependsOn];
      const remainderId = this.mintRemainder(subtask, others, false, options.attempts, dependsOn);
      this.shrink(subtask, isolated, true);
      this.retry(subtask, options.attempts);
      return remainderId;
    }

    this.retry(subtask, options.attempts);
    return id;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private retry(subtask: Subtask, attempts: number): void {
    this.transition(subtask, 'ready', { attempts });
    this.queue.push(subtask.id);
    this.pump();
  }

  private mintRemainder(
    subtask: Subtask,
    resources: ResourceId[],
    oversized: boolean,
    attempts: number,
    dependsOn: string[],
  ): string {
    const task = this.store.getTask(subtask.taskId);
    const remainderId = subtaskId(subtask.taskId, (task?.subtaskIds.length ?? 0) + 1);

    this.commit({
      taskId: subtask.taskId,
      subtaskId: remainderId,
      toState: 'pending',
      event: {
        type: 'subtask_created',
        resources,
        dependsOn,
        oversized,
        origin: subtask.id,
        attempts,
      },
    });

    for (const sibling of this.store.subtasksOf(subtask.taskId)) {
      if (sibling.id === remainderId || isTerminalSubtask(sibling.status)) continue;
      if (!sibling.dependsOn.includes(subtask.id)) continue;
      this.commit({
        taskId: subtask.taskId,
        subtaskId: sibling.id,
        event: { type: 'subtask_rewired', dependsOn: [...sibling.dependsOn, remainderId] },
      });
    }

    const completed = new Set(
      this.store.subtasksOf(subtask.taskId).filter((s) => s.status === 'completed').map((s) => s.id),
    );
    if (dependsOn.every((dep) => completed.has(dep))) this.markReady(remainderId, 'pending');
    return remainderId;
  }

  /** Whether a path of task edges leads from any resource in `from` to one in `to`. */
  private feeds(taskId: string, from: ResourceId[], to: ResourceId[]): boolean {
    const task = this.store.getTask(taskId);
    if (!task) return true;
    const targets = new Set(to);
    const reached = new Set(from);
    const frontier = [...from];
    for (let i = 0; i < frontier.length; i++) {
      for (const [prerequisite, dependent] of task.edges) {
        if (prerequisite !== frontier[i] || reached.has(dependent)) continue;
        if (targets.has(dependent)) return true;
        reached.add(dependent);
        frontier.push(dependent);
      }
    }
    return false;
  }

  private shrink(subtask: Subtask, resources: ResourceId[], oversized: boolean): void {
    this.commit({
      taskId: subtask.taskId,
      subtaskId: subtask.id,
      event: { type: 'subtask_shrunk', resources, oversized },
    });
  }

  private markReady(id: string, from: SubtaskStatus): void {
    const subtask = this.store.getSubtask(id);
    if (!subtask || subtask.status !== from) return;
    this.transition(subtask, 'ready');
    this.queue.push(id);
  }

  private transition(
    subtask: Subtask,
    to: SubtaskStatus,
    extra: { workerId?: string | null; diagnostic?: TaskDiagnostic; attempts?: number } = {},
  ): void {
    this.commit({
      taskId: subtask.taskId,
      subtaskId: subtask.id,
      fromState: subtask.status,
      toState: to,
      workerId: extra.workerId ?? null,
      event: {
        type: 'subtask_transition',
        ...(extra.diagnostic ? { diagnostic: extra.diagnostic } : {}),
        ...(extra.attempts !== undefined ? { attempts: extra.attempts } : {}),
      },
    });
  }

  /** Transitive dependents of `id`, in breadth-first order. */
  private downstreamOf(id: string, siblings: Subtask[]): string[] {
    const visited = new Set<string>();
    const queue = [id];
    for (let i = 0; i < queue.length; i++) {
      const current = queue[i];
      for (const sibling of siblings) {
        if (current !== undefined && sibling.dependsOn.includes(current) && !visited.has(sibling.id)) {
          visited.add(sibling.id);
          queue.push(sibling.id);
        }
      }
    }
    return [...visited];
  }

  private dropQueued(taskId: string): void {
    for (let i = this.queue.length - 1; i >= 0; i--) {
      const subtask = this.store.getSubtask(this.queue[i] ?? '');
      if (!subtask || subtask.taskId === taskId) this.queue.splice(i, 1);
    }
  }

  private checkSettled(taskId: string): void {
    const task = this.store.getTask(taskId);
    if (!task || isTerminalTask(task.status)) return;
    const subtasks = this.store.subtasksOf(taskId);
    if (subtasks.every((s) => isTerminalSubtask(s.status))) {
      this.emit('task:settled', taskId);
    }
  }

  /**
   * Pick up a task restored from the ledger: queue its ready subtasks, promote
   * pending ones whose prerequisites all completed, and cancel those whose
   * prerequisites can no longer complete.
   */
  resume(taskId: string): void {
    const task = this.store.getTask(taskId);
    if (!task || isTerminalTask(task.status)) return;

    for (const subtask of this.store.subtasksOf(taskId)) {
      if (subtask.status === 'ready' && !this.queue.includes(subtask.id)) {
        this.queue.push(subtask.id);
      }
    }

    const siblings = this.store.subtasksOf(taskId);
    const completed = new Set(siblings.filter((s) => s.status === 'completed').map((s) => s.id));
    for (const sibling of siblings) {
      if (sibling.status === 'pending' && sibling.dependsOn.every((dep) => completed.has(dep))) {
        this.markReady(sibling.id, 'pending');
      }
    }
    for (const sibling of siblings) {
      if (sibling.status === 'failed') this.onSubtaskTerminal(sibling.id, 'failed');
    }

    this.checkSettled(taskId);
    this.pump();
  }
}
