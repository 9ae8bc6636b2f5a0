/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { randomUUID } from 'crypto';
import { errorMessage } from '../errors.js';
import type { ContainerExecutor } from './ContainerExecutor.js';
import type {
  BatchBackend,
  BatchJobHandle,
  BatchJobStatus,
  ContainerExecuteOptions,
  ContainerJob,
} from './interfaces.js';

interface LocalJob {
  handle: BatchJobHandle;
  status: BatchJobStatus;
  controller: AbortController;
  done: Promise<void>;
}

/**
 * BatchBackend that runs jobs on this host.
 *
 * `submit` starts the job through a ContainerExecutor in the background and
 * returns at once; `poll` reports what the execution has reached. A job is
 * forgotten once `poll` has reported it finished or `cancel` has settled.
 * Queue and job role are accepted and ignored.
 */
export class LocalBatchBackend implements BatchBackend {
  private readonly jobs = new Map<string, LocalJob>();

  constructor(
    private readonly executor: ContainerExecutor,
    private readonly options: Pick<ContainerExecuteOptions, 'onStateChange' | 'onOutput' | 'timeout'> = {}
  ) {}

  // eslint-disable-next-line @typescript-eslint/require-await
  async submit(job: ContainerJob): Promise<BatchJobHandle> {
    const handle: BatchJobHandle = { id: randomUUID(), name: job.name };
    const controller = new AbortController();
    const entry: LocalJob = {
      handle,
      status: { state: 'queued' },
      controller,
      done: Promise.resolve(),
    };

    entry.done = this.executor
      .execute(job, {
        ...this.options,
        signal: controller.signal,
        onStateChange: (state, previous) => {
          if (state === 'RUNNING') entry.status = { state: 'running' };
          this.options.onStateChange?.(state, previous);
        },
      })
      .then(
        (result) => {
          entry.status =
            result.state === 'COMPLETE'
              ? { state: 'succeeded' }
              : {
                  state: 'failed',
                  reason: result.error?.message ?? 'Job failed',
                  exitCode: result.exitCode,
                  output: result.output,
                };
        },
        (err: unknown) => {
          entry.status = { state: 'failed', reason: errorMessage(err) };
        }
      );

    this.jobs.set(handle.id, entry);
    return handle;
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async poll(handle: BatchJobHandle): Promise<BatchJobStatus> {
    const status = this.job(handle).status;
    if (status.state === 'succeeded' || status.state === 'failed') {
      this.jobs.delete(handle.id);
    }
    return status;
  }

  async cancel(handle: BatchJobHandle, _reason: string): Promise<void> {
    const entry = this.job(handle);
    entry.controller.abort();
    await entry.done;
    this.jobs.delete(handle.id);
  }

  /** Jobs submitted and not yet forgotten */
  get size(): number {
    return this.jobs.size;
  }

  /**
   * Wait for every submitted job to finish.
   */
  async drain(): Promise<void> {
    await Promise.all([...this.jobs.values()].map((entry) => entry.done));
  }

  private job(handle: BatchJobHandle): LocalJob {
    const entry = this.jobs.get(handle.id);
    if (!entry) throw new Error(`Unknown batch job '${handle.name}' (${handle.id})`);
    return entry;
  }
}
