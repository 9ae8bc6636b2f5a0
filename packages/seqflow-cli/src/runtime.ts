/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import {
  ContainerExecutor,
  DockerEngine,
  LocalBatchBackend,
  LocalObjectStore,
  Scheduler,
  TargetResolver,
  type ContainerEngine,
} from '@seqflow/core';
import type { RuntimeConfig } from './config.js';

export interface Runtime {
  resolver: TargetResolver;
  scheduler: Scheduler;
}

/**
 * Storage and execution backends for a run.
 *
 * `s3://bucket/key` URIs are served from `<storeRoot>/bucket/key`. Batch jobs
 * run on this host through the same container engine as docker tasks.
 */
export function createRuntime(config: RuntimeConfig, engine: ContainerEngine = new DockerEngine()): Runtime {
  const resolver = new TargetResolver({
    stores: { s3: new LocalObjectStore(config.storeRoot) },
  });
  const executor = new ContainerExecutor({ resolver, engine, scratchRoot: config.scratchDir });
  const batch = new LocalBatchBackend(executor);
  return { resolver, scheduler: new Scheduler({ executor, batch }) };
}
