/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { ConfigurationError } from '../errors.js';
import type { TaskGraph } from '../graph/TaskGraph.js';
import { sanitizeJobName } from '../paths.js';
import type { ContainerSettings } from '../tasks/types.js';
import type { ContainerJob } from './interfaces.js';

/**
 * Container settings of a task, or null if it is not a container task.
 */
export function containerSettingsOf(graph: TaskGraph, name: string): ContainerSettings | null {
  const node = graph.task(name);
  const definition = node.definition;
  if (definition.kind !== 'container') return null;
  return definition.container(node.params);
}

/**
 * Describe a container task of the graph as a self-contained job.
 *
 * Inputs are given by URI, so the job can be shipped to a batch service.
 */
export function buildContainerJob(graph: TaskGraph, name: string): ContainerJob {
  const node = graph.task(name);
  const definition = node.definition;
  if (definition.kind !== 'container') {
    throw new ConfigurationError(`Task '${name}' is not a container task`);
  }

  const settings = definition.container(node.params);
  const inputs: Record<string, string | string[]> = {};
  for (const [slot, bound] of Object.entries(graph.inputsOf(name))) {
    inputs[slot] = 'uri' in bound ? bound.uri : bound.map((target) => target.uri);
  }

  return {
    name: sanitizeJobName(settings.jobNamePrefix ?? node.name),
    task: node.name,
    image: definition.image(node.params),
    command: definition.command(node.params),
    inputs,
    outputs: { ...node.outputUris },
    vcpus: settings.vcpus,
    memoryMb: settings.memoryMb,
    mounts: settings.mounts ?? [],
    scratchRoot: settings.scratchRoot,
    queue: settings.queue,
    jobRole: settings.jobRole,
  };
}
