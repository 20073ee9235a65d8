import * as path from 'node:path';
import type { LedgerBackend, ResourceProcessor, ResourceProvider, TesseraConfig } from '@tessera/shared';
import { CONFIG_PATH, budgetFromConfig } from '../config/config.loader.js';
import { FileLedgerBackend } from '../ledger/file.ledger.backend.js';
import { FsResourceProvider } from '../resources/fs.resource.provider.js';
import { CommandVerificationHook } from '../verification/command.hook.js';
import { CommandResourceProcessor } from '../workers/command.processor.js';
import { TaskOrchestrator } from './task.orchestrator.js';

export interface OrchestratorOverrides {
  provider?: ResourceProvider;
  processor?: ResourceProcessor;
  ledger?: LedgerBackend;
}

/** Absolute ledger directory; relative paths are taken from the project root. */
export function ledgerDir(config: TesseraConfig, projectRoot: string): string {
  return path.resolve(projectRoot, config.ledger.dir);
}

/**
 * Wire a TaskOrchestrator from the user config: files under `projectRoot`,
 * the configured worker and verification commands, and a file ledger.
 * Files too large for one session are planned as oversized singletons.
 */
export function createOrchestrator(
  config: TesseraConfig,
  projectRoot: string,
  overrides: OrchestratorOverrides = {},
): TaskOrchestrator {
  let processor = overrides.processor;
  if (!processor) {
    if (!config.worker) {
      throw new Error(`No worker command configured; set "worker.command" in ${CONFIG_PATH}`);
    }
    processor = new CommandResourceProcessor(config.worker, projectRoot);
  }

  const provider = overrides.provider ?? new FsResourceProvider(projectRoot);
  return new TaskOrchestrator({
    budget: budgetFromConfig(config),
    provider,
    processor,
    graph: provider instanceof FsResourceProvider ? { estimateCost: (id) => provider.estimateCost(id) } : {},
    ledger: overrides.ledger ?? new FileLedgerBackend(ledgerDir(config, projectRoot)),
    hooks: config.verification.map((hook) => new CommandVerificationHook(hook, projectRoot)),
    projectRoot,
    logRetention: config.logs.retention,
  });
}
