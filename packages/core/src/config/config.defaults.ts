import type { TesseraConfig } from '@tessera/shared'

export const DEFAULT_CONFIG: TesseraConfig = {
  budget: {
    max_resources_per_subtask: 8,
    soft_threshold: 60_000,
    hard_threshold: 90_000,
    post_compaction_baseline: 8_000,
    concurrency_limit: 3,
    session_timeout_ms: 900_000,
  },
  retry: {
    max_retries: 2,
  },
  ledger: {
    dir: '.tessera/ledger',
  },
  logs: {
    retention: 50,
  },
  server: {
    port: 7433,
  },
  worker: null,
  verification: [],
}
