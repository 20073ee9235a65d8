import type { ResourceId } from './task.types.js';

export type SessionStatus = 'active' | 'compacting' | 'reset' | 'terminated';

export interface SessionState {
  id: string; // e.g. "worker-3"
  taskId: string;
  subtaskId: string;
  status: SessionStatus;
  /** Context units consumed since the session started or last compacted. */
  consumed: number;
  compactions: number;
  processed: ResourceId[];
  startedAt: number;
  deadline: number;
}

/**
 * Working context a session accumulates while processing its resources.
 * Compaction must keep `processed` and `facts` intact.
 */
export interface WorkingContext {
  processed: ResourceId[];
  /** Cross-resource facts needed to process the remaining resources. */
  facts: Record<string, string>;
  /** Free-form per-resource notes; the first thing compaction drops. */
  notes: string[];
  /** Summary produced by the most recent compaction, if any. */
  summary: string | null;
}

export interface CompactedContext {
  context: WorkingContext;
  /** Context units the compacted context still occupies. */
  units: number;
}
