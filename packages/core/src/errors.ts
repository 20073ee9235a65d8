import type { ResourceId } from '@tessera/shared';

export type GraphErrorKind = 'empty' | 'duplicate' | 'unknown_resource' | 'cyclic';

/** Submission rejected before any subtask exists. */
export class GraphError extends Error {
  constructor(
    readonly kind: GraphErrorKind,
    readonly resources: ResourceId[],
    message: string,
  ) {
    super(message);
    this.name = 'GraphError';
  }
}

/** A single resource does not fit under the hard threshold even on its own. */
export class BudgetExceededError extends Error {
  constructor(
    readonly resourceId: ResourceId,
    readonly consumed: number,
    readonly hardThreshold: number,
  ) {
    super(
      `Resource "${resourceId}" exceeds the session budget on its own ` +
        `(${consumed} units, hard threshold ${hardThreshold})`,
    );
    this.name = 'BudgetExceededError';
  }
}

export class SessionCrashError extends Error {
  constructor(
    readonly subtaskId: string,
    readonly attempts: number,
    cause: unknown,
  ) {
    super(
      `Session for subtask ${subtaskId} crashed after ${attempts} attempt(s): ${errorMessage(cause)}`,
      { cause },
    );
    this.name = 'SessionCrashError';
  }
}

/** Two subtasks produced different content for the same resource. */
export class ConflictError extends Error {
  constructor(
    readonly resourceId: ResourceId,
    readonly subtaskIds: string[],
  ) {
    super(
      `Conflicting outputs for resource "${resourceId}" from subtasks ${subtaskIds.join(', ')}`,
    );
    this.name = 'ConflictError';
  }
}

export class VerificationFailure extends Error {
  constructor(
    readonly hook: string,
    readonly diagnostics: string,
  ) {
    super(`Verification hook "${hook}" failed`);
    this.name = 'VerificationFailure';
  }
}

/** The ledger cannot record transitions; dispatching must stop. */
export class LedgerUnavailableError extends Error {
  constructor(cause: unknown) {
    super(`Plan ledger unavailable: ${errorMessage(cause)}`, { cause });
    this.name = 'LedgerUnavailableError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(entity: string, from: string, to: string) {
    super(`Invalid transition for ${entity}: ${from} → ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class ConfigValidationError extends Error {
  constructor(detail: string) {
    super(`Config validation failed: ${detail}`);
    this.name = 'ConfigValidationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
