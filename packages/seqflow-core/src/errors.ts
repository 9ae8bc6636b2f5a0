/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Domain error types for seqflow-core.
 *
 * All seqflow errors extend SeqflowError, allowing callers to catch all domain
 * errors with `if (err instanceof SeqflowError)` or specific errors with their
 * class. The two main families decide how a run reacts:
 * - ConfigurationError: detected before any task executes, aborts the run
 * - ExecutionError: fails one task, dependents become unreachable
 */

// =============================================================================
// Base Errors
// =============================================================================

/** Base class for all seqflow errors */
export class SeqflowError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** A problem with the pipeline definition or its inputs, found before execution */
export class ConfigurationError extends SeqflowError {}

/** A problem running one task; the run carries on with unrelated tasks */
export class ExecutionError extends SeqflowError {}

// =============================================================================
// Dataset Errors
// =============================================================================

export class DatasetColumnMissingError extends ConfigurationError {
  constructor(
    public readonly column: string,
    public readonly source: string
  ) {
    super(`Column '${column}' not found in ${source}`);
  }
}

export class DuplicateDatasetValueError extends ConfigurationError {
  constructor(
    public readonly column: string,
    public readonly value: string
  ) {
    super(`Column '${column}' contains duplicate value '${value}'`);
  }
}

export class EmptyDatasetValueError extends ConfigurationError {
  constructor(
    public readonly column: string,
    public readonly row: number
  ) {
    super(`Column '${column}' is empty on row ${row}`);
  }
}

// =============================================================================
// Graph Errors
// =============================================================================

export class DuplicateTaskError extends ConfigurationError {
  constructor(
    public readonly task: string,
    public readonly existingId: string,
    public readonly newId: string
  ) {
    super(`Task '${task}' already exists with different parameters (${existingId} vs ${newId})`);
  }
}

export class TaskNotFoundError extends ConfigurationError {
  constructor(public readonly task: string) {
    super(`Task '${task}' not found`);
  }
}

export class UnboundInputError extends ConfigurationError {
  constructor(
    public readonly task: string,
    public readonly slot: string
  ) {
    super(`Input '${slot}' of task '${task}' is not bound to any output`);
  }
}

export class SlotBindingError extends ConfigurationError {
  constructor(
    public readonly task: string,
    public readonly slot: string,
    public readonly reason: string
  ) {
    super(`Cannot bind input '${slot}' of task '${task}': ${reason}`);
  }
}

export class UnresolvedPlaceholderError extends ConfigurationError {
  constructor(
    public readonly task: string,
    public readonly placeholder: string
  ) {
    super(`Command of task '${task}' references unresolved placeholder '${placeholder}'`);
  }
}

export class DependencyCycleError extends ConfigurationError {
  constructor(public readonly tasks: string[]) {
    super(`Dependency cycle between tasks: ${tasks.join(' -> ')}`);
  }
}

export class UnsupportedSchemeError extends ConfigurationError {
  constructor(
    public readonly scheme: string,
    public readonly uri: string
  ) {
    super(`No object store configured for scheme '${scheme}' (in '${uri}')`);
  }
}

export class InvalidOptionError extends ConfigurationError {
  constructor(
    public readonly option: string,
    public readonly reason: string
  ) {
    super(`Invalid value for ${option}: ${reason}`);
  }
}

// =============================================================================
// Execution Errors
// =============================================================================

export class CommandFailedError extends ExecutionError {
  constructor(
    public readonly task: string,
    public readonly exitCode: number | null,
    public readonly output: string
  ) {
    super(
      exitCode === null
        ? `Command of task '${task}' did not exit normally`
        : `Command of task '${task}' exited with code ${exitCode}`
    );
  }
}

export class OutputMissingError extends ExecutionError {
  constructor(
    public readonly task: string,
    public readonly slot: string,
    public readonly location: string
  ) {
    super(`Output '${slot}' of task '${task}' was not produced at '${location}'`);
  }
}

export class OutputEmptyError extends ExecutionError {
  constructor(
    public readonly task: string,
    public readonly slot: string,
    public readonly location: string
  ) {
    super(`Output '${slot}' of task '${task}' is empty at '${location}'`);
  }
}

export class MaterializationError extends ExecutionError {
  constructor(
    public readonly uri: string,
    public readonly cause: Error
  ) {
    super(`Failed to materialize '${uri}': ${cause.message}`);
  }
}

export class ExternalInputMissingError extends ExecutionError {
  constructor(
    public readonly task: string,
    public readonly uri: string
  ) {
    super(`External input '${uri}' required by task '${task}' does not exist`);
  }
}

export class RetriesExhaustedError extends ExecutionError {
  constructor(
    public readonly operation: string,
    public readonly attempts: number,
    public readonly cause: Error
  ) {
    super(`${operation} failed after ${attempts} attempts: ${cause.message}`);
  }
}

// =============================================================================
// Backend Errors
// =============================================================================

/**
 * A failure talking to the batch service or object store that is worth retrying
 * (connection reset, throttling, 5xx).
 */
export class TransientBackendError extends SeqflowError {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(cause ? `${message}: ${cause.message}` : message);
  }
}

export class ObjectNotFoundError extends SeqflowError {
  constructor(public readonly uri: string) {
    super(`Object '${uri}' not found`);
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/** Check if error is ENOENT (file not found) */
export function isNotFoundError(err: unknown): boolean {
  return (
    err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT'
  );
}

/** Message of an unknown thrown value */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
