/** Immutable resource limits applied to every subtask and session. */
export interface Budget {
  readonly maxResourcesPerSubtask: number;
  /** Context units at which a session compacts its working context. */
  readonly softThreshold: number;
  /** Context units at which a session is reset. */
  readonly hardThreshold: number;
  /** Floor for the consumption counter after a successful compaction. */
  readonly postCompactionBaseline: number;
  /** Maximum simultaneously active worker sessions across the orchestrator. */
  readonly concurrencyLimit: number;
  readonly sessionTimeoutMs: number;
  /** Crash retries per subtask before it is marked failed. */
  readonly maxRetries: number;
}
