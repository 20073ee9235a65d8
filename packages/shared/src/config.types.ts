export interface CommandConfig {
  command: string;
  timeout_ms: number;
}

export interface VerificationHookConfig extends CommandConfig {
  name: string;
}

export interface TesseraConfig {
  budget: {
    max_resources_per_subtask: number;
    soft_threshold: number;
    hard_threshold: number;
    post_compaction_baseline: number;
    concurrency_limit: number;
    session_timeout_ms: number;
  };
  retry: {
    max_retries: number;
  };
  ledger: {
    /** Relative to the project root unless absolute. */
    dir: string;
  };
  logs: {
    retention: number;
  };
  server: {
    port: number;
  };
  /** Shell command that processes one resource (content on stdin, output on stdout). */
  worker: CommandConfig | null;
  verification: VerificationHookConfig[];
}
