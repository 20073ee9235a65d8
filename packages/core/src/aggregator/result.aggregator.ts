import type {
  ResourceId,
  ResourceOutput,
  ResourceProvider,
  Subtask,
  Task,
  TaskDiagnostic,
  TaskOutcome,
  VerificationHook,
} from '@tessera/shared';
import { ConflictError, VerificationFailure, errorMessage } from '../errors.js';

/**
 * Merge outputs keyed by resource. Identical duplicates collapse; differing
 * content for one resource is a conflict. The result is independent of the
 * order in which outputs arrived.
 */
export function mergeOutputs(outputs: ResourceOutput[]): ResourceOutput[] {
  const merged = new Map<ResourceId, ResourceOutput>();
  const sources = new Map<ResourceId, Set<string>>();

  for (const output of outputs) {
    const existing = merged.get(output.resourceId);
    const seenBy = sources.get(output.resourceId) ?? new Set<string>();
    seenBy.add(output.subtaskId);
    sources.set(output.resourceId, seenBy);

    if (!existing) {
      merged.set(output.resourceId, { ...output });
    } else if (existing.content !== output.content) {
      throw new ConflictError(output.resourceId, [...seenBy].sort());
    }
  }

  return [...merged.values()].sort((a, b) =>
    a.resourceId < b.resourceId ? -1 : a.resourceId > b.resourceId ? 1 : 0,
  );
}

/** Pick the diagnostic that explains why a task cannot complete. */
function failureOf(subtasks: Subtask[]): TaskDiagnostic | null {
  const failed = subtasks.find((s) => s.status === 'failed');
  const culprit = failed ?? subtasks.find((s) => s.status !== 'completed');
  if (!culprit) return null;

  return {
    kind: 'subtask_failed',
    message: culprit.diagnostic?.message ?? `Subtask ${culprit.id} ended as ${culprit.status}`,
    subtaskId: culprit.id,
    resourceId: culprit.diagnostic?.resourceId,
    attempts: culprit.attempts,
  };
}

export class ResultAggregator {
  constructor(
    private readonly provider: ResourceProvider,
    private readonly hooks: VerificationHook[] = [],
  ) {}

  /**
   * Combine the outputs of a settled task. Outputs reach the provider only
   * when every subtask completed and no two of them disagree. `stopped` is
   * polled before each write and each hook; once it returns true nothing more
   * is written and the outcome is cancelled.
   */
  async aggregate(
    task: Task,
    subtasks: Subtask[],
    outputs: ResourceOutput[],
    stopped: () => boolean = () => false,
  ): Promise<TaskOutcome> {
    const failure = failureOf(subtasks);
    if (failure) {
      return { taskId: task.id, status: 'failed', outputs, diagnostic: failure };
    }

    let merged: ResourceOutput[];
    try {
      merged = mergeOutputs(outputs);
    } catch (err) {
      if (!(err instanceof ConflictError)) throw err;
      return {
        taskId: task.id,
        status: 'failed',
        outputs,
        diagnostic: {
          kind: 'conflict',
          message: err.message,
          resourceId: err.resourceId,
          subtaskId: err.subtaskIds[0],
        },
      };
    }

    const cancelled: TaskOutcome = {
      taskId: task.id,
      status: 'cancelled',
      outputs: merged,
      diagnostic: { kind: 'cancelled', message: 'Task cancelled' },
    };

    for (const output of merged) {
      if (stopped()) return cancelled;
      await this.provider.write(output.resourceId, output.content);
    }

    const resources = merged.map((o) => o.resourceId);
    for (const hook of this.hooks) {
      if (stopped()) return cancelled;
      const rejected = await this.verify(hook, resources);
      if (rejected) {
        return {
          taskId: task.id,
          status: 'failed',
          outputs: merged,
          diagnostic: {
            kind: 'verification',
            message: `${rejected.message}: ${rejected.diagnostics}`,
            hook: rejected.hook,
          },
        };
      }
    }

    return { taskId: task.id, status: 'completed', outputs: merged, diagnostic: null };
  }

  private async verify(hook: VerificationHook, resources: ResourceId[]): Promise<VerificationFailure | null> {
    try {
      const result = await hook.run(resources);
      return result.pass ? null : new VerificationFailure(hook.name, result.diagnostics);
    } catch (err) {
      return new VerificationFailure(hook.name, errorMessage(err));
    }
  }
}
