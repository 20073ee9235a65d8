import type { ResourceId } from './task.types.js';
import type { CompactedContext, WorkingContext } from './session.types.js';

/** Storage holding the resources (file system, version control, ...). */
export interface ResourceProvider {
  read(resourceId: ResourceId): Promise<string>;
  write(resourceId: ResourceId, content: string): Promise<void>;
}

export interface ProcessInput {
  resourceId: ResourceId;
  content: string;
  /** Read-only view of the session's working context. */
  context: Readonly<WorkingContext>;
  /** Aborts on shutdown or at the session deadline, never when the task is cancelled. */
  signal: AbortSignal;
}

export interface ProcessedResource {
  /** New content for the resource. */
  output: string;
  /** Context units consumed by processing this resource. */
  units: number;
  /** Cross-resource facts learned while processing. */
  facts?: Record<string, string>;
  note?: string;
}

/** The worker that actually edits a resource. */
export interface ResourceProcessor {
  process(input: ProcessInput): Promise<ProcessedResource>;
}

/** Summarizes a working context. Must be deterministic for a given input. */
export interface Compactor {
  compact(context: Readonly<WorkingContext>): CompactedContext | Promise<CompactedContext>;
}

export interface VerificationResult {
  pass: boolean;
  diagnostics: string;
}

export interface VerificationHook {
  readonly name: string;
  run(resources: ResourceId[]): Promise<VerificationResult>;
}
