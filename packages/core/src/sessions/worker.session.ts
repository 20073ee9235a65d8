import { EventEmitter } from 'node:events';
import type {
  Budget,
  Compactor,
  ResourceId,
  ResourceOutput,
  ResourceProcessor,
  ResourceProvider,
  SessionState,
  SessionStatus,
  Subtask,
  WorkingContext,
} from '@tessera/shared';
import { BudgetExceededError } from '../errors.js';
import { BudgetMonitor } from './budget.monitor.js';
import { emptyContext } from './context.compactor.js';

export interface WorkerSessionOptions {
  /** Unique session identifier, e.g. "worker-3". */
  id: string;
  subtask: Subtask;
  budget: Budget;
  provider: ResourceProvider;
  processor: ResourceProcessor;
  compactor: Compactor;
  /** Cooperative cancellation, checked at resource boundaries. */
  signal: AbortSignal;
  /** Aborts the resource in flight; the session then ends as cancelled. */
  shutdown?: AbortSignal;
  /**
   * Durably record a finished resource. Awaited before the next resource
   * starts; a rejection ends the session as a crash.
   */
  onResourceCompleted: (output: ResourceOutput) => Promise<void>;
  now?: () => number;
}

export type ResetReason = 'hard_threshold' | 'compaction_failed' | 'timeout';

export type SessionOutcome =
  | { kind: 'completed'; completed: ResourceOutput[] }
  | {
      kind: 'reset';
      reason: ResetReason;
      completed: ResourceOutput[];
      /** Unprocessed resources, in processing order. */
      remaining: ResourceId[];
    }
  | { kind: 'cancelled'; completed: ResourceOutput[]; remaining: ResourceId[] }
  | { kind: 'crashed'; error: unknown; completed: ResourceOutput[]; remaining: ResourceId[] }
  | { kind: 'budget_exceeded'; error: BudgetExceededError; remaining: ResourceId[] };

const DEADLINE = Symbol('deadline');

// ---------------------------------------------------------------------------
// Event declarations
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface WorkerSession {
  on(event: 'state', listener: (state: SessionState) => void): this;
  emit(event: 'state', state: SessionState): boolean;
}

// ---------------------------------------------------------------------------
// WorkerSession
// ---------------------------------------------------------------------------

/**
 * Runs one subtask: read each resource, hand it to the processor, and let the
 * BudgetMonitor judge the accumulated context after every resource.
 *
 *   soft threshold → compact and continue in this session
 *   hard threshold, failed compaction or deadline → reset (the caller requeues
 *     the unprocessed remainder in a fresh session)
 *
 * The deadline also bounds a single read or process call: when it passes, the
 * call's signal is aborted and its result, if any, is ignored.
 *
 * A resource whose processing pushed the session over the hard threshold is
 * discarded and stays in the remainder.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class WorkerSession extends EventEmitter {
  private readonly options: WorkerSessionOptions;
  private readonly monitor: BudgetMonitor;
  private readonly now: () => number;
  private context: WorkingContext = emptyContext();
  private _state: SessionState;

  constructor(options: WorkerSessionOptions) {
    super();
    this.options = options;
    this.monitor = new BudgetMonitor(options.budget);
    this.now = options.now ?? Date.now;

    const startedAt = this.now();
    this._state = {
      id: options.id,
      taskId: options.subtask.taskId,
      subtaskId: options.subtask.id,
      status: 'active',
      consumed: 0,
      compactions: 0,
      processed: [],
      startedAt,
      deadline: startedAt + options.budget.sessionTimeoutMs,
    };
  }

  get id(): string {
    return this._state.id;
  }

  get state(): SessionState {
    return { ...this._state, processed: [...this._state.processed] };
  }

  async run(): Promise<SessionOutcome> {
    const { subtask, provider, processor, signal } = this.options;
    const done = new Set(subtask.completedResources);
    const resources = subtask.resources.filter((r) => !done.has(r));
    const completed: ResourceOutput[] = [];

    this.setStatus('active');

    for (let i = 0; i < resources.length; i++) {
      const resourceId = resources[i] ?? '';
      const remaining = resources.slice(i);

      // --- Resource boundary checks ---
      if (signal.aborted) {
        return this.finish({ kind: 'cancelled', completed, remaining });
      }
      if (this.now() >= this._state.deadline) {
        return this.finish({ kind: 'reset', reason: 'timeout', completed, remaining });
      }

      // --- Process one resource ---
      let output: ResourceOutput;
      let facts: Record<string, string> | undefined;
      let note: string | undefined;
      try {
        const result = await this.withinDeadline(async (stop) => {
          const content = await provider.read(resourceId);
          return processor.process({ resourceId, content, context: this.context, signal: stop });
        });
        if (result === DEADLINE) {
          return this.finish({ kind: 'reset', reason: 'timeout', completed, remaining });
        }
        output = { resourceId, subtaskId: subtask.id, content: result.output };
        facts = result.facts;
        note = result.note;

        // In-flight work finishes but is discarded once the task is cancelled
        if (signal.aborted) {
          return this.finish({ kind: 'cancelled', completed, remaining });
        }

        const verdict = this.monitor.record(result.units);
        this.update({ consumed: this.monitor.units });

        if (verdict === 'hard') {
          if (completed.length === 0 && resources.length === 1) {
            const error = new BudgetExceededError(
              resourceId,
              this.monitor.units,
              this.options.budget.hardThreshold,
            );
            return this.finish({ kind: 'budget_exceeded', error, remaining });
          }
          return this.finish({ kind: 'reset', reason: 'hard_threshold', completed, remaining });
        }

        await this.options.onResourceCompleted(output);
      } catch (error) {
        if (this.options.shutdown?.aborted) {
          return this.finish({ kind: 'cancelled', completed, remaining });
        }
        return this.finish({ kind: 'crashed', error, completed, remaining });
      }

      completed.push(output);
      this.absorb(resourceId, facts, note);

      // --- Soft threshold: compact, or reset when compaction cannot help ---
      if (this.monitor.verdict() === 'soft') {
        const compacted = await this.compact();
        const rest = resources.slice(i + 1);
        if (!compacted && rest.length > 0) {
          return this.finish({
            kind: 'reset',
            reason: 'compaction_failed',
            completed,
            remaining: rest,
          });
        }
      }
    }

    return this.finish({ kind: 'completed', completed });
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  /**
   * Run `work` with a signal that aborts at the session deadline or on
   * shutdown. Resolves to DEADLINE as soon as the deadline passes, without
   * waiting for `work` to notice.
   */
  private async withinDeadline<T>(work: (stop: AbortSignal) => Promise<T>): Promise<T | typeof DEADLINE> {
    const controller = new AbortController();
    const shutdown = this.options.shutdown;
    const onShutdown = () => controller.abort();
    if (shutdown?.aborted) controller.abort();
    shutdown?.addEventListener('abort', onShutdown);

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<typeof DEADLINE>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(DEADLINE);
      }, Math.max(0, this._state.deadline - this.now()));
    });

    const running = work(controller.signal);
    // Once the deadline wins, a late rejection of the abandoned call has no reader
    running.catch(() => undefined);
    try {
      return await Promise.race([running, expired]);
    } finally {
      clearTimeout(timer);
      shutdown?.removeEventListener('abort', onShutdown);
    }
  }

  /** Returns false when compaction threw, lost facts, or left usage at/above soft. */
  private async compact(): Promise<boolean> {
    this.setStatus('compacting');
    const before = this.context;
    try {
      const result = await this.options.compactor.compact(before);
      const keepsProcessed = before.processed.every((r) => result.context.processed.includes(r));
      const keepsFacts = Object.keys(before.facts).every((k) => k in result.context.facts);
      if (!keepsProcessed || !keepsFacts) return false;

      const verdict = this.monitor.afterCompaction(result.units);
      this.context = result.context;
      this.update({ consumed: this.monitor.units, compactions: this._state.compactions + 1 });
      return verdict === 'within';
    } catch {
      // A compactor failure is a failed compaction, handled as a reset
      return false;
    } finally {
      this.setStatus('active');
    }
  }

  private absorb(resourceId: ResourceId, facts?: Record<string, string>, note?: string): void {
    this.context = {
      processed: [...this.context.processed, resourceId],
      facts: { ...this.context.facts, ...facts },
      notes: note ? [...this.context.notes, note] : this.context.notes,
      summary: this.context.summary,
    };
    this.update({ processed: [...this._state.processed, resourceId] });
  }

  private finish(outcome: SessionOutcome): SessionOutcome {
    this.setStatus(outcome.kind === 'reset' ? 'reset' : 'terminated');
    return outcome;
  }

  private setStatus(status: SessionStatus): void {
    if (this._state.status === status && status === 'active') return;
    this.update({ status });
  }

  private update(patch: Partial<SessionState>): void {
    this._state = { ...this._state, ...patch };
    this.emit('state', this.state);
  }
}
