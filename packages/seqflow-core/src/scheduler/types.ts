/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Scheduler state, events and results.
 */

import type { TaskGraph } from '../graph/TaskGraph.js';

// =============================================================================
// Run State
// =============================================================================

/** Status of a whole run */
export type RunStatus = 'running' | 'succeeded' | 'failed' | 'cancelled';

/**
 * Status of one task within a run.
 *
 * - `pending`: waiting on producers, or interrupted by cancellation
 * - `dispatched`: handed to a worker, checking memoization or executing
 * - `complete`: outputs exist (executed now, or already satisfied)
 * - `failed`: every attempt failed
 * - `unreachable`: a task it depends on failed
 */
export type TaskStatus = 'pending' | 'dispatched' | 'complete' | 'failed' | 'unreachable';

export interface TaskState {
  name: string;
  status: TaskStatus;
  /** Complete without executing: outputs already existed */
  skipped?: boolean;
  /** Attempts started */
  attempts: number;
  /** Error message if failed */
  error?: string;
  /** Container exit code if failed */
  exitCode?: number | null;
  /** Captured command output if failed */
  output?: string;
  /** Task whose failure made this one unreachable */
  cause?: string;
  /** ISO 8601 */
  startedAt?: string;
  /** ISO 8601 */
  completedAt?: string;
  /** Milliseconds */
  duration?: number;
}

/**
 * Mutable state of a run, advanced by the step functions.
 */
export interface RunState {
  /** ISO 8601 */
  startedAt: string;
  graph: TaskGraph;
  /** Names of the requested targets */
  targets: string[];
  /** Tasks in this run (targets and their ancestors), in topological order */
  tasks: Map<string, TaskState>;

  // Summary counters
  /** Tasks executed in this run */
  executed: number;
  /** Tasks whose outputs already existed */
  skipped: number;
  failed: number;
  unreachable: number;

  status: RunStatus;
  /** ISO 8601 */
  completedAt: string | null;
  /** Reason for cancellation */
  error: string | null;

  /** Sequence number of the last event */
  eventSeq: number;
  events: RunEvent[];
}

// =============================================================================
// Events
// =============================================================================

interface BaseEvent {
  /** Event sequence number within the run */
  seq: number;
  /** ISO 8601 */
  timestamp: string;
}

export interface RunStartedEvent extends BaseEvent {
  type: 'run_started';
  totalTasks: number;
  targets: string[];
}

export interface TaskStartedEvent extends BaseEvent {
  type: 'task_started';
  task: string;
  attempt: number;
}

export interface JobSubmittedEvent extends BaseEvent {
  type: 'job_submitted';
  task: string;
  jobId: string;
  jobName: string;
}

export interface TaskCompletedEvent extends BaseEvent {
  type: 'task_completed';
  task: string;
  /** Outputs already existed; nothing ran */
  skipped: boolean;
  duration: number;
}

export interface TaskAttemptFailedEvent extends BaseEvent {
  type: 'task_attempt_failed';
  task: string;
  attempt: number;
  error: string;
}

export interface TaskFailedEvent extends BaseEvent {
  type: 'task_failed';
  task: string;
  error: string;
  exitCode?: number | null;
  duration: number;
}

export interface TaskUnreachableEvent extends BaseEvent {
  type: 'task_unreachable';
  task: string;
  /** Failed task it depends on */
  cause: string;
}

export interface RunCompletedEvent extends BaseEvent {
  type: 'run_completed';
  success: boolean;
  summary: {
    executed: number;
    skipped: number;
    failed: number;
    unreachable: number;
  };
  duration: number;
}

export interface RunCancelledEvent extends BaseEvent {
  type: 'run_cancelled';
  reason: string;
}

export type RunEvent =
  | RunStartedEvent
  | TaskStartedEvent
  | JobSubmittedEvent
  | TaskCompletedEvent
  | TaskAttemptFailedEvent
  | TaskFailedEvent
  | TaskUnreachableEvent
  | RunCompletedEvent
  | RunCancelledEvent;

/** Distributes Omit over a union */
export type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** Event without its sequence number and timestamp */
export type RunEventInput = DistributiveOmit<RunEvent, 'seq' | 'timestamp'>;

// =============================================================================
// Results
// =============================================================================

/**
 * Final report for one task.
 */
export interface TaskReport {
  name: string;
  /** Task identity */
  id: string;
  /** `pending` only for tasks left unfinished by cancellation */
  status: 'complete' | 'failed' | 'unreachable' | 'pending';
  /** Complete without executing */
  skipped: boolean;
  attempts: number;
  error?: string;
  exitCode?: number | null;
  output?: string;
  cause?: string;
  duration: number;
}

/**
 * Result of a run.
 */
export interface RunResult {
  status: RunStatus;
  /** True iff every target is complete */
  success: boolean;
  /** Every task of the run, in topological order */
  tasks: TaskReport[];
  /** Names of complete tasks */
  complete: string[];
  /** Names of failed tasks */
  failed: string[];
  /** Names of unreachable tasks */
  unreachable: string[];
  /** Tasks executed in this run */
  executed: number;
  /** Tasks complete without executing */
  skipped: number;
  /** Milliseconds */
  duration: number;
  events: RunEvent[];
}
