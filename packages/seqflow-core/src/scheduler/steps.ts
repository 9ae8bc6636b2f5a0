/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Step functions for a scheduler run.
 *
 * Each step mutates the run state in one well-defined way and returns the
 * event it produced. The Scheduler drives them from its dispatch loop; they do
 * no I/O, so they can be tested without executing anything.
 */

import type { TaskGraph } from '../graph/TaskGraph.js';
import type {
  RunEvent,
  RunEventInput,
  RunResult,
  RunState,
  TaskReport,
  TaskState,
} from './types.js';

function emit(state: RunState, input: RunEventInput): RunEvent {
  state.eventSeq++;
  const event: RunEvent = { ...input, seq: state.eventSeq, timestamp: new Date().toISOString() };
  state.events.push(event);
  return event;
}

function taskState(state: RunState, name: string): TaskState {
  const task = state.tasks.get(name);
  if (!task) {
    throw new Error(`Task '${name}' is not part of this run`);
  }
  return task;
}

// =============================================================================
// Initialization
// =============================================================================

/**
 * Create the state of a run over `targets` and everything they depend on.
 *
 * @param targets - Task names (default: the graph's terminals)
 * @throws {TaskNotFoundError} If a target is not in the graph
 */
export function stepInitialize(
  graph: TaskGraph,
  targets?: readonly string[]
): { state: RunState; event: RunEvent } {
  const targetNames = targets ? [...targets] : graph.terminals.map((node) => node.name);
  const included = new Set(targetNames.map((name) => graph.task(name).name));
  for (const node of graph.ancestorsOf(...targetNames)) {
    included.add(node.name);
  }

  const tasks = new Map<string, TaskState>();
  for (const node of graph.order) {
    if (included.has(node.name)) {
      tasks.set(node.name, { name: node.name, status: 'pending', attempts: 0 });
    }
  }

  const state: RunState = {
    startedAt: new Date().toISOString(),
    graph,
    targets: targetNames,
    tasks,
    executed: 0,
    skipped: 0,
    failed: 0,
    unreachable: 0,
    status: 'running',
    completedAt: null,
    error: null,
    eventSeq: 0,
    events: [],
  };

  const event = emit(state, { type: 'run_started', totalTasks: tasks.size, targets: targetNames });
  return { state, event };
}

// =============================================================================
// Queries (pure)
// =============================================================================

/**
 * Pending tasks whose producers are all complete, in topological order.
 */
export function stepGetReady(state: RunState): string[] {
  const ready: string[] = [];
  for (const task of state.tasks.values()) {
    if (task.status !== 'pending') continue;
    const producers = state.graph.dependenciesOf(task.name);
    if (producers.every((p) => state.tasks.get(p.name)?.status === 'complete')) {
      ready.push(task.name);
    }
  }
  return ready;
}

/**
 * True once no task is pending or dispatched.
 */
export function stepIsComplete(state: RunState): boolean {
  for (const task of state.tasks.values()) {
    if (task.status === 'pending' || task.status === 'dispatched') return false;
  }
  return true;
}

// =============================================================================
// Task transitions
// =============================================================================

/** Hand a ready task to a worker. */
export function stepTaskDispatched(state: RunState, name: string): void {
  const task = taskState(state, name);
  task.status = 'dispatched';
  task.startedAt ??= new Date().toISOString();
}

/** An attempt begins executing (memoization check already failed). */
export function stepTaskStarted(state: RunState, name: string): RunEvent {
  const task = taskState(state, name);
  task.attempts++;
  return emit(state, { type: 'task_started', task: name, attempt: task.attempts });
}

export function stepJobSubmitted(
  state: RunState,
  name: string,
  job: { id: string; name: string }
): RunEvent {
  taskState(state, name);
  return emit(state, { type: 'job_submitted', task: name, jobId: job.id, jobName: job.name });
}

/** An attempt failed and another will follow. */
export function stepAttemptFailed(state: RunState, name: string, error: string): RunEvent {
  const task = taskState(state, name);
  return emit(state, { type: 'task_attempt_failed', task: name, attempt: task.attempts, error });
}

export function stepTaskCompleted(
  state: RunState,
  name: string,
  skipped: boolean,
  duration: number
): RunEvent {
  const task = taskState(state, name);
  task.status = 'complete';
  task.skipped = skipped;
  task.completedAt = new Date().toISOString();
  task.duration = duration;

  if (skipped) {
    state.skipped++;
  } else {
    state.executed++;
  }

  return emit(state, { type: 'task_completed', task: name, skipped, duration });
}

export interface TaskFailure {
  error: string;
  exitCode?: number | null;
  output?: string;
  duration: number;
}

/**
 * Mark a task failed.
 *
 * @returns The failure event and the pending tasks that can now never run
 */
export function stepTaskFailed(
  state: RunState,
  name: string,
  failure: TaskFailure
): { event: RunEvent; unreachable: string[] } {
  const task = taskState(state, name);
  task.status = 'failed';
  task.error = failure.error;
  task.exitCode = failure.exitCode;
  task.output = failure.output;
  task.completedAt = new Date().toISOString();
  task.duration = failure.duration;
  state.failed++;

  const unreachable = state.graph
    .transitiveDependents(name)
    .map((node) => node.name)
    .filter((dependent) => state.tasks.get(dependent)?.status === 'pending');

  const event = emit(state, {
    type: 'task_failed',
    task: name,
    error: failure.error,
    exitCode: failure.exitCode,
    duration: failure.duration,
  });
  return { event, unreachable };
}

/**
 * Mark tasks unreachable because `cause` failed.
 */
export function stepTasksUnreachable(
  state: RunState,
  names: readonly string[],
  cause: string
): RunEvent[] {
  const events: RunEvent[] = [];
  for (const name of names) {
    const task = taskState(state, name);
    if (task.status !== 'pending') continue;
    task.status = 'unreachable';
    task.cause = cause;
    state.unreachable++;
    events.push(emit(state, { type: 'task_unreachable', task: name, cause }));
  }
  return events;
}

/** A dispatched task stopped by cancellation goes back to pending. */
export function stepTaskInterrupted(state: RunState, name: string): void {
  const task = taskState(state, name);
  task.status = 'pending';
}

// =============================================================================
// Finalization
// =============================================================================

/**
 * Stop the run; tasks not yet finished stay pending.
 */
export function stepCancel(state: RunState, reason: string): RunEvent {
  state.status = 'cancelled';
  state.error = reason;
  state.completedAt = new Date().toISOString();
  return emit(state, { type: 'run_cancelled', reason });
}

/**
 * Close the run and build its result.
 */
export function stepFinalize(state: RunState): { result: RunResult; event: RunEvent | null } {
  const success = state.targets.every((name) => state.tasks.get(name)?.status === 'complete');
  const duration = Date.now() - new Date(state.startedAt).getTime();

  let event: RunEvent | null = null;
  if (state.status !== 'cancelled') {
    state.status = success ? 'succeeded' : 'failed';
    state.completedAt = new Date().toISOString();
    event = emit(state, {
      type: 'run_completed',
      success,
      summary: {
        executed: state.executed,
        skipped: state.skipped,
        failed: state.failed,
        unreachable: state.unreachable,
      },
      duration,
    });
  }

  const tasks: TaskReport[] = [...state.tasks.values()].map((task) => ({
    name: task.name,
    id: state.graph.task(task.name).id,
    status: task.status === 'dispatched' ? 'pending' : task.status,
    skipped: task.skipped ?? false,
    attempts: task.attempts,
    error: task.error,
    exitCode: task.exitCode,
    output: task.output,
    cause: task.cause,
    duration: task.duration ?? 0,
  }));
  const named = (status: TaskReport['status']) =>
    tasks.filter((t) => t.status === status).map((t) => t.name);

  return {
    result: {
      status: state.status,
      success,
      tasks,
      complete: named('complete'),
      failed: named('failed'),
      unreachable: named('unreachable'),
      executed: state.executed,
      skipped: state.skipped,
      duration,
      events: state.events,
    },
    event,
  };
}
