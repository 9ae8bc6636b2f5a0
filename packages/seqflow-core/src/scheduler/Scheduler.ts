/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Scheduler: runs a task graph to completion.
 *
 * Ready tasks (all producers complete) are dispatched in topological order to
 * a bounded pool of workers. In-process and docker tasks hold a worker while
 * they run; batch tasks hold one only while submitting and then wait on a
 * polling timer, bounded separately by `maxRemoteJobs`.
 */

import * as fs from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { setTimeout as sleep } from 'timers/promises';
import {
  ConfigurationError,
  ExternalInputMissingError,
  InvalidOptionError,
  OutputMissingError,
  errorMessage,
} from '../errors.js';
import type { ContainerExecutor } from '../execution/ContainerExecutor.js';
import type {
  BatchBackend,
  BatchJobHandle,
  BatchJobStatus,
  ContainerTaskState,
} from '../execution/interfaces.js';
import { buildContainerJob, containerSettingsOf } from '../execution/jobs.js';
import type { TaskGraph } from '../graph/TaskGraph.js';
import { sanitizeJobName } from '../paths.js';
import type { TaskNode } from '../tasks/TaskNode.js';
import { withRetry, type BackoffOptions, type RetryOptions } from './retry.js';
import { Semaphore } from './Semaphore.js';
import {
  stepAttemptFailed,
  stepCancel,
  stepFinalize,
  stepGetReady,
  stepInitialize,
  stepJobSubmitted,
  stepTaskCompleted,
  stepTaskDispatched,
  stepTaskFailed,
  stepTaskInterrupted,
  stepTaskStarted,
  stepTasksUnreachable,
} from './steps.js';
import type { RunEvent, RunResult, RunState } from './types.js';

export const DEFAULT_CONCURRENCY = 4;
export const DEFAULT_MAX_REMOTE_JOBS = 500;
export const DEFAULT_POLL_INTERVAL_MS = 5000;

/**
 * What runs container tasks, by engine.
 */
export interface SchedulerBackends {
  /** Runs tasks whose engine is `docker` */
  executor?: ContainerExecutor;
  /** Receives tasks whose engine is `batch` */
  batch?: BatchBackend;
}

/**
 * Reported once per task when it reaches a final status.
 */
export interface TaskCompletion {
  name: string;
  status: 'complete' | 'failed' | 'unreachable';
  /** Outputs already existed; nothing ran */
  skipped: boolean;
  error?: string;
  exitCode?: number | null;
  /** Failed task this one depended on */
  cause?: string;
  /** Milliseconds */
  duration: number;
}

export interface SchedulerOptions {
  /** Task names to bring up to date (default: the graph's terminals) */
  targets?: string[];
  /** Worker pool size (default: 4) */
  concurrency?: number;
  /** Batch jobs in flight at once (default: 500) */
  maxRemoteJobs?: number;
  /** Wait between polls of a batch job in ms (default: 5000) */
  pollIntervalMs?: number;
  /** Extra attempts for a failed task (default: 0) */
  retries?: number;
  /** Backoff for transient batch backend errors */
  backoff?: BackoffOptions;
  /** Kill a docker task after this many ms */
  timeout?: number;
  /** Parent directory of in-process task scratch directories (default: OS temp dir) */
  scratchRoot?: string;
  /** Cancels the run */
  signal?: AbortSignal;
  /** Called when a task starts executing */
  onTaskStart?: (name: string) => void;
  /** Called when a task completes, fails or becomes unreachable */
  onTaskComplete?: (completion: TaskCompletion) => void;
  /** Called on each container state transition of a docker task */
  onContainerState?: (name: string, state: ContainerTaskState, previous: ContainerTaskState) => void;
  /** Called with container output of a docker task */
  onOutput?: (name: string, data: string) => void;
  /** Called with every run event */
  onEvent?: (event: RunEvent) => void;
}

type Outcome =
  | { type: 'complete'; skipped: boolean }
  | { type: 'failed'; error: string; exitCode?: number | null; output?: string }
  | { type: 'interrupted' };

const INTERRUPTED: Outcome = { type: 'interrupted' };

/**
 * Internal state of an active run.
 */
interface ActiveRun {
  graph: TaskGraph;
  state: RunState;
  options: SchedulerOptions;
  signal: AbortSignal;
  workers: Semaphore;
  remote: Semaphore;
  retries: number;
  pollIntervalMs: number;
  scratchRoot: string;
}

/**
 * Executes task graphs.
 *
 * @example
 * ```ts
 * const scheduler = new Scheduler({
 *   executor: new ContainerExecutor({ resolver, engine: new DockerEngine() }),
 * });
 * const result = await scheduler.run(graph, {
 *   concurrency: 8,
 *   onTaskStart: (name) => console.log(`[START] ${name}`),
 * });
 * if (!result.success) process.exitCode = 1;
 * ```
 */
export class Scheduler {
  constructor(private readonly backends: SchedulerBackends = {}) {}

  /**
   * Bring the targets of `options` (default: every terminal) up to date.
   *
   * Execution failures are reported in the result. The returned promise
   * rejects for configuration problems, before any task runs, and when a
   * callback throws; then no further task is dispatched and the tasks
   * already running are awaited first.
   *
   * @throws {ConfigurationError} On invalid options, unknown targets or a
   *   container task with no backend for its engine
   */
  async run(graph: TaskGraph, options: SchedulerOptions = {}): Promise<RunResult> {
    const concurrency = positiveInteger('concurrency', options.concurrency ?? DEFAULT_CONCURRENCY);
    const maxRemoteJobs = positiveInteger(
      'maxRemoteJobs',
      options.maxRemoteJobs ?? DEFAULT_MAX_REMOTE_JOBS
    );
    const retries = options.retries ?? 0;
    if (!Number.isInteger(retries) || retries < 0) {
      throw new InvalidOptionError('retries', `expected a non-negative integer, got ${retries}`);
    }
    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    if (!(pollIntervalMs >= 0)) {
      throw new InvalidOptionError('pollIntervalMs', `expected a non-negative number, got ${pollIntervalMs}`);
    }

    const { state, event } = stepInitialize(graph, options.targets);
    this.checkBackends(state);
    options.onEvent?.(event);

    const run: ActiveRun = {
      graph,
      state,
      options,
      signal: options.signal ?? new AbortController().signal,
      workers: new Semaphore(concurrency),
      remote: new Semaphore(maxRemoteJobs),
      retries,
      pollIntervalMs,
      scratchRoot: options.scratchRoot ?? tmpdir(),
    };

    // Dispatch loop: start every ready task, then wait for any to settle
    const inFlight = new Map<string, Promise<void>>();
    const callbackErrors: unknown[] = [];
    for (;;) {
      if (!run.signal.aborted && callbackErrors.length === 0) {
        for (const name of stepGetReady(state)) {
          stepTaskDispatched(state, name);
          inFlight.set(
            name,
            this.runTask(run, name)
              .catch((error: unknown) => {
                callbackErrors.push(error);
              })
              .finally(() => inFlight.delete(name))
          );
        }
      }
      if (inFlight.size === 0) break;
      await Promise.race(inFlight.values());
    }
    if (callbackErrors.length > 0) throw callbackErrors[0];

    if (run.signal.aborted) {
      options.onEvent?.(stepCancel(state, abortReason(run.signal)));
    }

    const { result, event: finalEvent } = stepFinalize(state);
    if (finalEvent) options.onEvent?.(finalEvent);
    return result;
  }

  private checkBackends(state: RunState): void {
    for (const name of state.tasks.keys()) {
      const settings = containerSettingsOf(state.graph, name);
      if (settings === null) continue;
      if (settings.engine === 'docker' && !this.backends.executor) {
        throw new ConfigurationError(
          `Task '${name}' runs on engine 'docker' but no container executor is configured`
        );
      }
      if (settings.engine === 'batch' && !this.backends.batch) {
        throw new ConfigurationError(
          `Task '${name}' runs on engine 'batch' but no batch backend is configured`
        );
      }
    }
  }

  // ===========================================================================
  // Task lifecycle
  // ===========================================================================

  /**
   * Run a task through its attempts and record the final outcome.
   * Rejects only when a callback throws.
   */
  private async runTask(run: ActiveRun, name: string): Promise<void> {
    const node = run.graph.task(name);
    const startTime = Date.now();

    let outcome: Outcome;
    for (let attempt = 0; ; attempt++) {
      try {
        outcome = await this.attempt(run, node, attempt === 0);
      } catch (err) {
        outcome = { type: 'failed', error: errorMessage(err) };
      }
      if (outcome.type !== 'failed' || attempt >= run.retries || run.signal.aborted) break;
      this.emit(run, stepAttemptFailed(run.state, name, outcome.error));
    }

    const duration = Date.now() - startTime;
    if (outcome.type === 'interrupted' || (outcome.type === 'failed' && run.signal.aborted)) {
      stepTaskInterrupted(run.state, name);
      return;
    }

    if (outcome.type === 'complete') {
      this.emit(run, stepTaskCompleted(run.state, name, outcome.skipped, duration));
      run.options.onTaskComplete?.({ name, status: 'complete', skipped: outcome.skipped, duration });
      return;
    }

    const { event, unreachable } = stepTaskFailed(run.state, name, {
      error: outcome.error,
      exitCode: outcome.exitCode,
      output: outcome.output,
      duration,
    });
    this.emit(run, event);
    run.options.onTaskComplete?.({
      name,
      status: 'failed',
      skipped: false,
      error: outcome.error,
      exitCode: outcome.exitCode,
      duration,
    });

    for (const e of stepTasksUnreachable(run.state, unreachable, name)) {
      this.emit(run, e);
    }
    for (const dependent of unreachable) {
      run.options.onTaskComplete?.({
        name: dependent,
        status: 'unreachable',
        skipped: false,
        cause: name,
        duration: 0,
      });
    }
  }

  /**
   * One attempt. The memoization check happens on the first attempt only.
   */
  private async attempt(run: ActiveRun, node: TaskNode, first: boolean): Promise<Outcome> {
    const settings = containerSettingsOf(run.graph, node.name);
    if (settings?.engine === 'batch') {
      return this.attemptBatch(run, node, first);
    }

    return run.workers.runExclusive(async (): Promise<Outcome> => {
      if (run.signal.aborted) return INTERRUPTED;
      if (first && (await node.isComplete())) return { type: 'complete', skipped: true };

      const definition = node.definition;
      if (definition.kind === 'external') {
        const missing = await firstMissingOutput(node);
        return {
          type: 'failed',
          error: new ExternalInputMissingError(node.name, missing?.uri ?? '').message,
        };
      }

      this.started(run, node.name);
      if (definition.kind === 'container') {
        return this.attemptDocker(run, node);
      }
      return this.attemptInProcess(run, node);
    });
  }

  private async attemptInProcess(run: ActiveRun, node: TaskNode): Promise<Outcome> {
    const definition = node.definition;
    if (definition.kind !== 'local' && definition.kind !== 'aggregate') {
      throw new Error(`Task '${node.name}' is not an in-process task`);
    }

    await fs.mkdir(run.scratchRoot, { recursive: true });
    const scratchDir = await fs.mkdtemp(path.join(run.scratchRoot, `${sanitizeJobName(node.name)}-`));
    try {
      await definition.run({
        name: node.name,
        id: node.id,
        params: node.params,
        inputs: run.graph.inputsOf(node.name),
        outputs: Object.fromEntries(node.outputs),
        scratchDir,
        signal: run.signal,
      });
    } catch (err) {
      if (run.signal.aborted) return INTERRUPTED;
      return { type: 'failed', error: errorMessage(err) };
    } finally {
      await fs.rm(scratchDir, { recursive: true, force: true }).catch((err: unknown) => {
        console.warn(`Failed to remove scratch directory ${scratchDir}: ${errorMessage(err)}`);
      });
    }

    return verifyOutputs(node);
  }

  private async attemptDocker(run: ActiveRun, node: TaskNode): Promise<Outcome> {
    const executor = this.backends.executor;
    if (!executor) {
      throw new ConfigurationError(`Task '${node.name}' needs a container executor`);
    }

    const result = await executor.execute(buildContainerJob(run.graph, node.name), {
      signal: run.signal,
      timeout: run.options.timeout,
      onStateChange: (state, previous) => run.options.onContainerState?.(node.name, state, previous),
      onOutput: (data) => run.options.onOutput?.(node.name, data),
    });

    if (result.state === 'COMPLETE') return verifyOutputs(node);
    if (run.signal.aborted) return INTERRUPTED;
    return {
      type: 'failed',
      error: result.error?.message ?? `Task '${node.name}' failed`,
      exitCode: result.exitCode,
      output: result.output,
    };
  }

  /**
   * Submit under a worker, then poll without one.
   */
  private async attemptBatch(run: ActiveRun, node: TaskNode, first: boolean): Promise<Outcome> {
    const backend = this.backends.batch;
    if (!backend) {
      throw new ConfigurationError(`Task '${node.name}' needs a batch backend`);
    }
    const retry: RetryOptions = { ...run.options.backoff, signal: run.signal };

    return run.remote.runExclusive(async (): Promise<Outcome> => {
      const submitted = await run.workers.runExclusive(
        async (): Promise<Outcome | { type: 'submitted'; handle: BatchJobHandle }> => {
          if (run.signal.aborted) return INTERRUPTED;
          if (first && (await node.isComplete())) return { type: 'complete', skipped: true };

          this.started(run, node.name);
          const job = buildContainerJob(run.graph, node.name);
          try {
            const handle = await withRetry(
              `Submitting job '${job.name}'`,
              () => backend.submit(job),
              retry
            );
            this.emit(run, stepJobSubmitted(run.state, node.name, handle));
            return { type: 'submitted', handle };
          } catch (err) {
            if (run.signal.aborted) return INTERRUPTED;
            return { type: 'failed', error: errorMessage(err) };
          }
        }
      );
      if (submitted.type !== 'submitted') return submitted;

      const handle = submitted.handle;
      for (;;) {
        let status: BatchJobStatus;
        try {
          await sleep(run.pollIntervalMs, undefined, { signal: run.signal });
          status = await withRetry(`Polling job '${handle.name}'`, () => backend.poll(handle), retry);
        } catch (err) {
          if (!run.signal.aborted) return { type: 'failed', error: errorMessage(err) };
          await this.cancelJob(run, backend, handle);
          return INTERRUPTED;
        }

        if (status.state === 'succeeded') return verifyOutputs(node);
        if (status.state === 'failed') {
          return {
            type: 'failed',
            error: status.reason,
            exitCode: status.exitCode,
            output: status.output,
          };
        }
        if (run.signal.aborted) {
          await this.cancelJob(run, backend, handle);
          return INTERRUPTED;
        }
      }
    });
  }

  private async cancelJob(run: ActiveRun, backend: BatchBackend, handle: BatchJobHandle): Promise<void> {
    const reason = abortReason(run.signal);
    try {
      await withRetry(`Cancelling job '${handle.name}'`, () => backend.cancel(handle, reason), {
        ...run.options.backoff,
      });
    } catch (err) {
      console.warn(`Failed to cancel job ${handle.name} (${handle.id}): ${errorMessage(err)}`);
    }
  }

  private started(run: ActiveRun, name: string): void {
    this.emit(run, stepTaskStarted(run.state, name));
    run.options.onTaskStart?.(name);
  }

  private emit(run: ActiveRun, event: RunEvent): void {
    run.options.onEvent?.(event);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function positiveInteger(option: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new InvalidOptionError(option, `expected a positive integer, got ${value}`);
  }
  return value;
}

function abortReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason === undefined) return 'Run cancelled';
  return errorMessage(reason);
}

async function firstMissingOutput(node: TaskNode): Promise<{ slot: string; uri: string } | null> {
  for (const [slot, target] of node.outputs) {
    if (!(await target.exists())) return { slot, uri: target.uri };
  }
  return null;
}

/**
 * A task that reported success must have left every output in place.
 */
async function verifyOutputs(node: TaskNode): Promise<Outcome> {
  const missing = await firstMissingOutput(node);
  if (missing) {
    return {
      type: 'failed',
      error: new OutputMissingError(node.name, missing.slot, missing.uri).message,
    };
  }
  return { type: 'complete', skipped: false };
}
