/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import type {
  BatchBackend,
  BatchJobHandle,
  BatchJobStatus,
  ContainerJob,
} from './interfaces.js';

/**
 * BatchBackend mock for testing remote submission without a batch service.
 *
 * Each job walks through a scripted list of statuses, one per poll, and then
 * stays on the last one. Errors can be queued for submit and poll to simulate
 * transport failures.
 */
export class MockBatchBackend implements BatchBackend {
  private scripts = new Map<string, BatchJobStatus[]>();
  private defaultScript: BatchJobStatus[] = [{ state: 'running' }, { state: 'succeeded' }];
  private submitErrors: Error[] = [];
  private pollErrors: Error[] = [];
  private onSucceeded?: (job: ContainerJob) => Promise<void>;
  private jobs = new Map<string, { job: ContainerJob; polls: number; finished: boolean }>();
  private counter = 0;

  readonly submitted: ContainerJob[] = [];
  readonly cancelled: string[] = [];
  pollCount = 0;

  /** Statuses for jobs of a task, keyed by task name */
  setScript(task: string, statuses: BatchJobStatus[]): void {
    this.scripts.set(task, statuses);
  }

  setDefaultScript(statuses: BatchJobStatus[]): void {
    this.defaultScript = statuses;
  }

  /** Throw these errors from the next submits, in order */
  failSubmits(...errors: Error[]): void {
    this.submitErrors.push(...errors);
  }

  /** Throw these errors from the next polls, in order */
  failPolls(...errors: Error[]): void {
    this.pollErrors.push(...errors);
  }

  /**
   * Run `fn` when a job is first reported as succeeded; typically writes
   * the job's outputs.
   */
  setOnSucceeded(fn: (job: ContainerJob) => Promise<void>): void {
    this.onSucceeded = fn;
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async submit(job: ContainerJob): Promise<BatchJobHandle> {
    const error = this.submitErrors.shift();
    if (error) throw error;

    this.submitted.push(job);
    const id = `mock-job-${++this.counter}`;
    this.jobs.set(id, { job, polls: 0, finished: false });
    return { id, name: job.name };
  }

  async poll(handle: BatchJobHandle): Promise<BatchJobStatus> {
    this.pollCount++;
    const error = this.pollErrors.shift();
    if (error) throw error;

    const entry = this.jobs.get(handle.id);
    if (!entry) throw new Error(`Unknown batch job '${handle.id}'`);

    const script = this.scripts.get(entry.job.task) ?? this.defaultScript;
    const status = script[Math.min(entry.polls, script.length - 1)];
    entry.polls++;

    if (status.state === 'succeeded' && !entry.finished) {
      entry.finished = true;
      await this.onSucceeded?.(entry.job);
    }
    return status;
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async cancel(handle: BatchJobHandle, _reason: string): Promise<void> {
    this.cancelled.push(handle.id);
  }
}
