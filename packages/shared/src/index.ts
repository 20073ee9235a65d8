// @tessera/shared: barrel export
export type {
  ResourceId,
  DependencyEdge,
  TaskStatus,
  SubtaskStatus,
  DiagnosticKind,
  TaskDiagnostic,
  Task,
  Subtask,
  ResourceOutput,
  PlanReceipt,
  TaskOutcome,
} from './task.types.js';
export type { Budget } from './budget.types.js';
export type {
  SessionStatus,
  SessionState,
  WorkingContext,
  CompactedContext,
} from './session.types.js';
export type { ResourceLease } from './lock.types.js';
export type {
  PlanEvent,
  PlanEventType,
  PlanRecord,
  ProgressEvent,
  LedgerBackend,
} from './ledger.types.js';
export type {
  ResourceProvider,
  ProcessInput,
  ProcessedResource,
  ResourceProcessor,
  Compactor,
  VerificationResult,
  VerificationHook,
} from './provider.types.js';
export type { TesseraConfig, CommandConfig, VerificationHookConfig } from './config.types.js';
export type { ClientMessage, ServerMessage } from './websocket.types.js';
