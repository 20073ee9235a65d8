// @tessera/core entry point
export * from './config/config.defaults.js';
export * from './config/config.loader.js';
export * from './errors.js';
// Planning
export { buildTaskGraph, subtaskId, compareIds } from './graph/task.graph.builder.js';
export type { TaskGraph, BuildOptions } from './graph/task.graph.builder.js';
// Ledger
export { PlanLedger } from './ledger/plan.ledger.js';
export { PlanStore, isTerminalTask, isTerminalSubtask } from './ledger/plan.store.js';
export type { RecordInput } from './ledger/plan.store.js';
export { FileLedgerBackend } from './ledger/file.ledger.backend.js';
export { MemoryLedgerBackend } from './ledger/memory.ledger.backend.js';
export { LockRegistry } from './locks/lock.registry.js';
// Dispatch
export { Scheduler } from './scheduler/scheduler.js';
export type { SchedulerOptions, SessionLauncher, RequeueOptions } from './scheduler/scheduler.js';
export { WorkerSession } from './sessions/worker.session.js';
export type { WorkerSessionOptions, SessionOutcome, ResetReason } from './sessions/worker.session.js';
export { BudgetMonitor, estimateUnits } from './sessions/budget.monitor.js';
export type { BudgetVerdict } from './sessions/budget.monitor.js';
export { DeterministicCompactor, emptyContext } from './sessions/context.compactor.js';
// Results
export { ResultAggregator, mergeOutputs } from './aggregator/result.aggregator.js';
export { CommandVerificationHook } from './verification/command.hook.js';
export { CommandResourceProcessor } from './workers/command.processor.js';
export { runCommand, truncateOutput } from './workers/command.runner.js';
export type { CommandRequest, CommandResult } from './workers/command.runner.js';
export { FsResourceProvider } from './resources/fs.resource.provider.js';
export { resolveAndValidatePath } from './resources/path.utils.js';
// Orchestrator
export { TaskOrchestrator } from './orchestrator/task.orchestrator.js';
export type { OrchestratorOptions } from './orchestrator/task.orchestrator.js';
export { createOrchestrator, ledgerDir } from './orchestrator/orchestrator.factory.js';
export type { OrchestratorOverrides } from './orchestrator/orchestrator.factory.js';
export { TaskLogger } from './orchestrator/task.logger.js';
export type { TaskLog } from './orchestrator/task.logger.js';
// Server
export { TesseraServer, parseClientMessage } from './server/websocket.server.js';
export type { TesseraServerOptions } from './server/websocket.server.js';
export { WsBroadcaster } from './server/ws.broadcaster.js';
export type { MessageRecipient, RecipientPool } from './server/ws.broadcaster.js';
