import { EventEmitter } from 'node:events';
import type {
  Budget,
  Compactor,
  DependencyEdge,
  LedgerBackend,
  PlanReceipt,
  PlanRecord,
  ProgressEvent,
  ResourceId,
  ResourceLease,
  ResourceOutput,
  ResourceProcessor,
  ResourceProvider,
  SessionState,
  Subtask,
  Task,
  TaskDiagnostic,
  TaskOutcome,
  VerificationHook,
} from '@tessera/shared';
import { ResultAggregator } from '../aggregator/result.aggregator.js';
import { LedgerUnavailableError, SessionCrashError, errorMessage } from '../errors.js';
import type { BuildOptions } from '../graph/task.graph.builder.js';
import { buildTaskGraph } from '../graph/task.graph.builder.js';
import { PlanLedger } from '../ledger/plan.ledger.js';
import type { RecordInput } from '../ledger/plan.store.js';
import { PlanStore, isTerminalSubtask, isTerminalTask } from '../ledger/plan.store.js';
import { LockRegistry } from '../locks/lock.registry.js';
import type { SessionSignals } from '../scheduler/scheduler.js';
import { Scheduler } from '../scheduler/scheduler.js';
import { DeterministicCompactor } from '../sessions/context.compactor.js';
import type { SessionOutcome } from '../sessions/worker.session.js';
import { WorkerSession } from '../sessions/worker.session.js';
import { TaskLogger } from './task.logger.js';

// ---------------------------------------------------------------------------
// Public types
// ---------------------------------------------------------------------------

export interface OrchestratorOptions {
  budget: Budget;
  provider: ResourceProvider;
  processor: ResourceProcessor;
  ledger: LedgerBackend;
  compactor?: Compactor;
  hooks?: VerificationHook[];
  /** Affinity and cost estimation used when partitioning new tasks. */
  graph?: Pick<BuildOptions, 'affinity' | 'estimateCost'>;
  /** Task outcome logs go to <projectRoot>/.tessera/logs. Omit to disable. */
  projectRoot?: string;
  /** Number of outcome logs to keep. Defaults to 50. */
  logRetention?: number;
  now?: () => number;
}

// ---------------------------------------------------------------------------
// Event type augmentation
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface TaskOrchestrator {
  /** Every recorded state transition, in ledger order. */
  on(event: 'progress', listener: (event: ProgressEvent) => void): this;
  /** Emitted on any Task status transition. */
  on(event: 'task:status', listener: (task: Task) => void): this;
  on(event: 'task:outcome', listener: (outcome: TaskOutcome) => void): this;
  /** Emitted whenever a worker session changes state. */
  on(event: 'session:state', listener: (state: SessionState) => void): this;
  /** Emitted whenever the lease set changes. */
  on(event: 'lock:update', listener: (leases: ResourceLease[]) => void): this;
  /** The ledger failed; no further work is dispatched. */
  on(event: 'halted', listener: (error: LedgerUnavailableError) => void): this;

  emit(event: 'progress', progress: ProgressEvent): boolean;
  emit(event: 'task:status', task: Task): boolean;
  emit(event: 'task:outcome', outcome: TaskOutcome): boolean;
  emit(event: 'session:state', state: SessionState): boolean;
  emit(event: 'lock:update', leases: ResourceLease[]): boolean;
  emit(event: 'halted', error: LedgerUnavailableError): boolean;
}

// ---------------------------------------------------------------------------
// TaskOrchestrator
// ---------------------------------------------------------------------------

/**
 * Coordinates the task lifecycle:
 *
 *   submit  → partition into subtasks → ledger → ready queue
 *   pump    → worker sessions (bounded concurrency, leased resources)
 *   session outcome → complete / split and requeue / retry / fail
 *   all subtasks terminal → aggregate outputs → verification hooks → outcome
 *
 * Every state change goes through the PlanStore and is appended to the
 * PlanLedger in the same order, so `recover()` can rebuild it after a restart.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class TaskOrchestrator extends EventEmitter {
  private readonly options: OrchestratorOptions;
  private readonly store: PlanStore;
  private readonly ledger: PlanLedger;
  private readonly lockRegistry: LockRegistry;
  private readonly scheduler: Scheduler;
  private readonly aggregator: ResultAggregator;
  private readonly compactor: Compactor;
  private readonly taskLogger: TaskLogger | null;
  private readonly now: () => number;

  private readonly finishing = new Set<string>();
  private readonly inflight = new Set<Promise<void>>();
  private halted = false;
  private closing = false;

  constructor(options: OrchestratorOptions) {
    super();
    this.options = options;
    this.now = options.now ?? Date.now;
    this.store = new PlanStore(this.now);
    this.ledger = new PlanLedger(options.ledger);
    this.lockRegistry = new LockRegistry(this.now);
    this.aggregator = new ResultAggregator(options.provider, options.hooks ?? []);
    this.compactor = options.compactor ?? new DeterministicCompactor();
    this.taskLogger = options.projectRoot ? new TaskLogger(options.projectRoot) : null;

    this.scheduler = new Scheduler({
      store: this.store,
      commit: (input) => this.commit(input),
      locks: this.lockRegistry,
      budget: options.budget,
      launch: (subtask, sessionId, signals) => this.launch(subtask, sessionId, signals),
    });
    this.scheduler.on('task:settled', (taskId) => this.track(this.aggregate(taskId)));
    this.scheduler.on('task:cancelled', (taskId) => this.track(this.finishCancelled(taskId)));

    const emitLocks = () => this.emit('lock:update', this.lockRegistry.getLocks());
    this.lockRegistry.on('lock_acquired', emitLocks);
    this.lockRegistry.on('lock_released', emitLocks);
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /**
   * Partition a task and queue it. Resolves once the plan is durable in the
   * ledger; rejects with GraphError for an invalid dependency graph and with
   * LedgerUnavailableError once the ledger has failed.
   */
  async submit(
    description: string,
    resources: ResourceId[],
    edges: DependencyEdge[] = [],
  ): Promise<PlanReceipt> {
    const failure = this.ledger.error;
    if (failure) throw failure;

    const graph = buildTaskGraph(description, resources, edges, this.options.budget, {
      ...this.options.graph,
      now: this.now,
    });
    const receipt = this.scheduler.submit(graph);
    await this.ledger.barrier();
    return receipt;
  }

  /**
   * Cancel a task. Fire-and-forget: returns false for unknown or already
   * finished tasks. Running sessions stop at their next resource boundary and
   * their late results are discarded.
   */
  cancel(taskId: string): boolean {
    return this.scheduler.cancel(taskId);
  }

  /**
   * Rebuild unfinished tasks from the ledger and resume them. Subtasks that
   * were running when the previous process stopped are treated as crashed.
   * Returns the ids of the resumed tasks.
   */
  async recover(): Promise<string[]> {
    const resumed: string[] = [];
    for (const taskId of await this.ledger.listTaskIds()) {
      if (this.store.getTask(taskId)) continue;
      const records = await this.ledger.readAll(taskId);
      if (records.length === 0) continue;

      for (const record of records) this.store.apply(record);
      const task = this.store.getTask(taskId);
      if (!task || isTerminalTask(task.status)) continue;
      resumed.push(taskId);
    }

    for (const taskId of resumed) {
      for (const subtask of this.store.subtasksOf(taskId)) {
        if (subtask.status === 'dispatched' || subtask.status === 'compacting') {
          this.handleCrash(subtask, new Error('Interrupted by orchestrator restart'));
        }
      }
      this.scheduler.resume(taskId);
    }

    if (resumed.length > 0) {
      process.stderr.write(`[tessera] Recovered ${resumed.length} unfinished task(s) from the ledger\n`);
    }
    return resumed;
  }

  getTask(taskId: string): Task | undefined {
    return this.store.getTask(taskId);
  }

  getSubtasks(taskId: string): Subtask[] {
    return this.store.subtasksOf(taskId);
  }

  getOutputs(taskId: string): ResourceOutput[] {
    return this.store.outputsOf(taskId);
  }

  listTasks(): Task[] {
    return this.store.taskIds().flatMap((id) => {
      const task = this.store.getTask(id);
      return task ? [task] : [];
    });
  }

  getLocks(): ResourceLease[] {
    return this.lockRegistry.getLocks();
  }

  get activeSessionCount(): number {
    return this.scheduler.activeCount;
  }

  get isHalted(): boolean {
    return this.halted;
  }

  /** Resolves once no session, aggregation or ledger write is outstanding. */
  async idle(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all([...this.inflight]);
    }
    await this.ledger.flush();
  }

  /**
   * Stop dispatching and abort running sessions. Interrupted subtasks stay
   * dispatched in the ledger and are retried by the next `recover()`.
   */
  async close(): Promise<void> {
    this.closing = true;
    this.scheduler.halt();
    this.scheduler.abortAll();
    await this.idle();
    this.lockRegistry.destroy();
  }

  // ---------------------------------------------------------------------------
  // Recording
  // ---------------------------------------------------------------------------

  private commit(input: RecordInput): void {
    const record = this.store.record(input);
    this.ledger.append(record).catch((err: unknown) => this.halt(err));
    this.publish(record);
  }

  private publish(record: PlanRecord): void {
    if (record.toState) {
      this.emit('progress', {
        taskId: record.taskId,
        subtaskId: record.subtaskId,
        fromState: record.fromState,
        toState: record.toState,
        workerId: record.workerId,
        timestamp: record.timestamp,
      });
    }
    if (record.event.type === 'task_submitted' || record.event.type === 'task_transition') {
      const task = this.store.getTask(record.taskId);
      if (task) this.emit('task:status', task);
    }
  }

  private halt(err: unknown): void {
    if (this.halted) return;
    this.halted = true;
    this.scheduler.halt();

    const error = err instanceof LedgerUnavailableError ? err : new LedgerUnavailableError(err);
    process.stderr.write(`[tessera] ${error.message}; dispatch halted\n`);
    this.emit('halted', error);
  }

  // ---------------------------------------------------------------------------
  // Sessions
  // ---------------------------------------------------------------------------

  private launch(subtask: Subtask, sessionId: string, signals: SessionSignals): void {
    const session = new WorkerSession({
      id: sessionId,
      subtask,
      budget: this.options.budget,
      provider: this.options.provider,
      processor: this.options.processor,
      compactor: this.compactor,
      signal: signals.cancel,
      shutdown: signals.shutdown,
      now: this.now,
      onResourceCompleted: (output) => this.recordOutput(subtask.id, output),
    });

    session.on('state', (state) => {
      this.mirrorCompaction(state);
      this.emit('session:state', state);
    });

    const run = this.ledger
      .barrier()
      .then(() => session.run())
      .then((outcome) => this.settleSession(subtask.id, outcome))
      .catch((err: unknown) => {
        // Ledger failures are already reported by halt()
        if (!(err instanceof LedgerUnavailableError)) {
          process.stderr.write(`[tessera] Session ${sessionId} failed: ${errorMessage(err)}\n`);
        }
      })
      .finally(() => {
        this.scheduler.release(sessionId);
      });
    this.track(run);
  }

  private recordOutput(subtaskId: string, output: ResourceOutput): Promise<void> {
    const subtask = this.store.getSubtask(subtaskId);
    if (!subtask || isTerminalSubtask(subtask.status)) return Promise.resolve();
    this.commit({
      taskId: subtask.taskId,
      subtaskId,
      workerId: subtask.sessionId,
      event: { type: 'resource_completed', output },
    });
    return this.ledger.barrier();
  }

  /** Reflect a session's compaction phase on its subtask. */
  private mirrorCompaction(state: SessionState): void {
    const subtask = this.store.getSubtask(state.subtaskId);
    if (!subtask || subtask.sessionId !== state.id) return;

    const to =
      state.status === 'compacting' && subtask.status === 'dispatched'
        ? 'compacting'
        : state.status === 'active' && subtask.status === 'compacting'
          ? 'dispatched'
          : null;
    if (!to) return;

    this.commit({
      taskId: subtask.taskId,
      subtaskId: subtask.id,
      fromState: subtask.status,
      toState: to,
      workerId: state.id,
      event: { type: 'subtask_transition' },
    });
  }

  private settleSession(subtaskId: string, outcome: SessionOutcome): void {
    // After a ledger failure or during shutdown the subtask stays dispatched
    if (this.halted || this.closing) return;
    const subtask = this.store.getSubtask(subtaskId);
    // Cancelled while running: the late result is discarded
    if (!subtask || isTerminalSubtask(subtask.status)) return;

    switch (outcome.kind) {
      case 'completed':
        this.scheduler.completeSubtask(subtaskId);
        break;

      case 'reset': {
        const [stuck] = outcome.remaining;
        // A lone resource that outlives the deadline would be retried forever
        if (outcome.reason === 'timeout' && outcome.completed.length === 0 && outcome.remaining.length === 1) {
          this.handleCrash(
            subtask,
            new Error(`Exceeded the ${this.options.budget.sessionTimeoutMs}ms session deadline on ${stuck ?? subtaskId}`),
          );
          break;
        }
        this.scheduler.requeueRemainder(subtaskId, { attempts: subtask.attempts, isolate: true });
        break;
      }

      case 'crashed':
        this.handleCrash(subtask, outcome.error);
        break;

      case 'budget_exceeded':
        this.scheduler.failSubtask(subtaskId, {
          kind: 'budget_exceeded',
          message: outcome.error.message,
          subtaskId,
          resourceId: outcome.error.resourceId,
          attempts: subtask.attempts,
        });
        break;

      case 'cancelled':
        break;
    }
  }

  private handleCrash(subtask: Subtask, cause: unknown): void {
    const attempts = subtask.attempts + 1;
    if (attempts > this.options.budget.maxRetries) {
      const done = new Set(subtask.completedResources);
      const error = new SessionCrashError(subtask.id, attempts, cause);
      const diagnostic: TaskDiagnostic = {
        kind: 'session_crash',
        message: error.message,
        subtaskId: subtask.id,
        resourceId: subtask.resources.find((r) => !done.has(r)),
        attempts,
      };
      this.scheduler.failSubtask(subtask.id, diagnostic, attempts);
      return;
    }
    this.scheduler.requeueRemainder(subtask.id, { attempts, isolate: false });
  }

  // ---------------------------------------------------------------------------
  // Task completion
  // ---------------------------------------------------------------------------

  private async aggregate(taskId: string): Promise<void> {
    if (this.finishing.has(taskId)) return;
    const task = this.store.getTask(taskId);
    if (!task || isTerminalTask(task.status)) return;
    this.finishing.add(taskId);

    let outcome: TaskOutcome;
    try {
      outcome = await this.aggregator.aggregate(
        task,
        this.store.subtasksOf(taskId),
        this.store.outputsOf(taskId),
        () => isTerminalTask(this.store.getTask(taskId)?.status ?? 'cancelled'),
      );
    } catch (err) {
      outcome = {
        taskId,
        status: 'failed',
        outputs: this.store.outputsOf(taskId),
        diagnostic: { kind: 'output_write', message: errorMessage(err) },
      };
    }

    // Cancelled while outputs were being written or verified
    const current = this.store.getTask(taskId);
    if (!current || isTerminalTask(current.status)) return;

    this.commit({
      taskId,
      fromState: current.status,
      toState: outcome.status,
      event: outcome.diagnostic
        ? { type: 'task_transition', diagnostic: outcome.diagnostic }
        : { type: 'task_transition' },
    });
    await this.finish(outcome);
  }

  private async finishCancelled(taskId: string): Promise<void> {
    const task = this.store.getTask(taskId);
    if (!task) return;
    this.finishing.add(taskId);
    await this.finish({
      taskId,
      status: 'cancelled',
      outputs: this.store.outputsOf(taskId),
      diagnostic: task.diagnostic,
    });
  }

  private async finish(outcome: TaskOutcome): Promise<void> {
    this.emit('task:outcome', outcome);
    if (!this.taskLogger) return;

    const task = this.store.getTask(outcome.taskId);
    if (!task) return;
    await this.taskLogger.saveLog({ task, subtasks: this.store.subtasksOf(task.id), outcome });
    await this.taskLogger.pruneOldLogs(this.options.logRetention ?? 50);
  }

  private track(work: Promise<void>): void {
    const tracked = work
      .catch((err: unknown) => {
        process.stderr.write(`[tessera] ${errorMessage(err)}\n`);
      })
      .finally(() => this.inflight.delete(tracked));
    this.inflight.add(tracked);
  }
}
