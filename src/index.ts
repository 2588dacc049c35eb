// Main entry point
export { MutationEngine } from './MutationEngine.js';
export type { MutationEngineConfig } from './MutationEngine.js';

// Domain model
export type { TokenRecord, RecordId } from './domain/model/TokenRecord.js';
export { compareRecordIds } from './domain/model/TokenRecord.js';
export type { PageDescriptor } from './domain/model/Page.js';
export { PagingStrategy, pageRowCount } from './domain/model/Page.js';
export type { Checkpoint, CheckpointLookup } from './domain/model/Checkpoint.js';
export {
  CheckpointStatus,
  pendingCheckpoint,
  completedCheckpoint,
  parseCheckpoint,
  parseCheckpointJson,
} from './domain/model/Checkpoint.js';
export type { RunConfig, RunOutcome, RunProgress, RunSummary, StopCause } from './domain/model/Run.js';
export { RunStatus, canTransition, isTerminal } from './domain/model/RunStatus.js';

// Errors
export { StoreError, isTransientError } from './domain/errors/StoreError.js';
export { PageCommitError } from './domain/errors/PageCommitError.js';

// Use case result types
export type { RunStatusResult } from './application/usecases/GetRunStatus.js';
export type { WriteResult } from './application/BatchWriter.js';

// Domain services
export { PageCursor } from './domain/services/PageCursor.js';
export { ProgressEstimator, formatProgressLine } from './domain/services/ProgressEstimator.js';
export type { ProgressSample, ProgressReport } from './domain/services/ProgressEstimator.js';
export { createTokenMutator } from './domain/services/TokenMutator.js';
export type { Mutator, TokenGenerator } from './domain/services/TokenMutator.js';

// Application internals (for custom orchestration)
export { EventBus } from './application/EventBus.js';
export { BatchWriter } from './application/BatchWriter.js';

// Ports (for custom implementations)
export type { RecordStore } from './domain/ports/RecordStore.js';
export type { CheckpointStore } from './domain/ports/CheckpointStore.js';
export type { RunLogger } from './domain/ports/RunLogger.js';
export { silentLogger } from './domain/ports/RunLogger.js';

// Events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  CheckpointDiscardReason,
  RunStartedEvent,
  CheckpointDiscardedEvent,
  RunResumedEvent,
  PageStartedEvent,
  PageCommittedEvent,
  PageRetriedEvent,
  RunProgressEvent,
  RunCheckpointedEvent,
  RunCompletedEvent,
  RunInterruptedEvent,
} from './domain/events/DomainEvents.js';

// Built-in adapters
export { InMemoryRecordStore } from './infrastructure/stores/InMemoryRecordStore.js';
export { InMemoryCheckpointStore } from './infrastructure/state/InMemoryCheckpointStore.js';
export { FileCheckpointStore } from './infrastructure/state/FileCheckpointStore.js';
export type { FileCheckpointStoreOptions } from './infrastructure/state/FileCheckpointStore.js';
export { SequelizeRecordStore } from './infrastructure/sequelize/SequelizeRecordStore.js';
export type { SequelizeRecordStoreOptions, SeedOptions } from './infrastructure/sequelize/SequelizeRecordStore.js';
export { SequelizeCheckpointStore } from './infrastructure/sequelize/SequelizeCheckpointStore.js';
export type { SequelizeCheckpointStoreOptions } from './infrastructure/sequelize/SequelizeCheckpointStore.js';
export { createSequelize } from './infrastructure/sequelize/createSequelize.js';
