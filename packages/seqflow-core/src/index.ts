/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * seqflow core - task graphs over storage targets, run in containers
 *
 * This package provides the workflow substrate: targets on local or remote
 * storage, typed task definitions, graph construction and validation, the
 * container sandbox protocol, and the scheduler. It has no UI dependencies.
 */

// Errors
export {
  SeqflowError,
  ConfigurationError,
  ExecutionError,
  DatasetColumnMissingError,
  DuplicateDatasetValueError,
  EmptyDatasetValueError,
  DuplicateTaskError,
  TaskNotFoundError,
  UnboundInputError,
  SlotBindingError,
  UnresolvedPlaceholderError,
  DependencyCycleError,
  UnsupportedSchemeError,
  InvalidOptionError,
  CommandFailedError,
  OutputMissingError,
  OutputEmptyError,
  MaterializationError,
  ExternalInputMissingError,
  RetriesExhaustedError,
  TransientBackendError,
  ObjectNotFoundError,
  isNotFoundError,
  errorMessage,
} from './errors.js';

// Locations
export {
  parseUri,
  joinUri,
  normalizeFolder,
  uriBasename,
  sanitizeJobName,
  type Location,
} from './paths.js';

// Object stores
export type { ObjectInfo, ObjectStore } from './storage/interfaces.js';
export { LocalObjectStore } from './storage/local/LocalObjectStore.js';
export { InMemoryObjectStore, type TransferRecord } from './storage/in-memory/InMemoryObjectStore.js';

// Targets
export {
  LocalTarget,
  RemoteTarget,
  readTargetText,
  writeTargetText,
  type Target,
} from './targets/Target.js';
export { TargetResolver, type TargetResolverOptions } from './targets/TargetResolver.js';

// Task definitions
export {
  externalTask,
  localTask,
  aggregateTask,
  containerTask,
  type SlotArity,
  type InputSlots,
  type NoInputs,
  type TaskParams,
  type SlotTargets,
  type InputTargets,
  type TaskContext,
  type Mount,
  type ContainerEngineKind,
  type ContainerSettings,
  type ExternalTaskDefinition,
  type LocalTaskDefinition,
  type AggregateTaskDefinition,
  type ContainerTaskDefinition,
  type TaskDefinition,
  type ParamsOf,
  type InputsOf,
  type OutputsOf,
} from './tasks/types.js';
export {
  literal,
  inputPath,
  inputPaths,
  outputPath,
  outputDir,
  scratchPath,
  patternLiteral,
  elementPath,
  validateCommand,
  renderCommand,
  type PatternPart,
  type CommandPart,
  type CommandBindings,
} from './tasks/command.js';
export { canonicalJson, taskIdentity } from './tasks/identity.js';
export { TaskNode, type OutputRef } from './tasks/TaskNode.js';

// Graphs
export {
  GraphBuilder,
  EMPTY_DATASET_WARNING,
  type BindingSource,
} from './graph/GraphBuilder.js';
export { TaskGraph, type Edge, type ResolvedInputs } from './graph/TaskGraph.js';
export { topoSort, type DependencyEdge } from './graph/topo.js';

// Dataset tables
export {
  parseDelimited,
  parseDatasetTable,
  readDatasetTable,
  validateDatasetRows,
  type DatasetRow,
  type DatasetTable,
  type DatasetTableOptions,
} from './dataset/table.js';

// Container execution
export type {
  ContainerJob,
  ContainerTaskState,
  ContainerRun,
  ContainerRunOptions,
  ContainerRunResult,
  ContainerEngine,
  ContainerExecuteOptions,
  ContainerExecutionResult,
  BatchJobHandle,
  BatchJobStatus,
  BatchBackend,
} from './execution/interfaces.js';
export {
  ContainerExecutor,
  ContainerAttempt,
  allocateOutputs,
  type ContainerExecutorOptions,
} from './execution/ContainerExecutor.js';
export { DockerEngine, buildDockerArgs, MAX_CAPTURED_OUTPUT } from './execution/DockerEngine.js';
export {
  MockContainerEngine,
  type MockContainerCall,
  type MockContainerHandler,
} from './execution/MockContainerEngine.js';
export { LocalBatchBackend } from './execution/LocalBatchBackend.js';
export { MockBatchBackend } from './execution/MockBatchBackend.js';
export { buildContainerJob, containerSettingsOf } from './execution/jobs.js';

// Scheduling
export {
  Scheduler,
  DEFAULT_CONCURRENCY,
  DEFAULT_MAX_REMOTE_JOBS,
  DEFAULT_POLL_INTERVAL_MS,
  type SchedulerBackends,
  type SchedulerOptions,
  type TaskCompletion,
} from './scheduler/Scheduler.js';
export {
  withRetry,
  backoffDelay,
  DEFAULT_BACKOFF,
  type BackoffOptions,
  type RetryOptions,
} from './scheduler/retry.js';
export { Semaphore } from './scheduler/Semaphore.js';
export type {
  RunStatus,
  TaskStatus,
  TaskState,
  RunState,
  RunEvent,
  TaskReport,
  RunResult,
} from './scheduler/types.js';
