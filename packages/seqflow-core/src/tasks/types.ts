/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Task definition types.
 *
 * A task definition is a tagged variant describing one kind of work:
 * - `external`: outputs produced outside the pipeline, which must already exist
 * - `local`: in-process work on single-target inputs
 * - `aggregate`: in-process work that may consume collections (fan-in)
 * - `container`: a command run inside a container image
 *
 * Every variant declares its input slots and a pure `outputs(params)` that
 * maps output slot names to URIs. A definition is instantiated into a
 * {@link TaskNode} by the graph builder.
 */

import type { Target } from '../targets/Target.js';
import type { CommandPart } from './command.js';

/** Whether an input slot takes one Target or an ordered collection */
export type SlotArity = 'one' | 'many';

/** Input slot declarations: slot name -> arity */
export type InputSlots = Record<string, SlotArity>;

/** Declaration for tasks that consume nothing */
export type NoInputs = Record<never, SlotArity>;

/**
 * Task parameters. Plain data only (strings, numbers, booleans, arrays and
 * nested objects), since they are hashed into the task's identity.
 */
export type TaskParams = object;

/** Target(s) bound to a slot of the given arity */
export type SlotTargets<A extends SlotArity> = A extends 'many' ? readonly Target[] : Target;

/** Resolved inputs of a task: slot name -> Target(s) */
export type InputTargets<I extends InputSlots> = { [S in keyof I]: SlotTargets<I[S]> };

/**
 * Context passed to in-process task implementations.
 */
export interface TaskContext<P extends TaskParams, I extends InputSlots, O extends string> {
  /** Task name */
  name: string;
  /** Task identity */
  id: string;
  params: P;
  inputs: InputTargets<I>;
  outputs: Record<O, Target>;
  /** Fresh directory for intermediate files; removed after the run */
  scratchDir: string;
  /** Aborted when the run is cancelled */
  signal: AbortSignal;
}

/**
 * A directory made visible inside the container.
 */
export interface Mount {
  hostPath: string;
  containerPath: string;
  mode: 'ro' | 'rw';
}

/** Where container tasks run */
export type ContainerEngineKind = 'docker' | 'batch';

/**
 * Resource hints and placement for a container task, passed opaquely to the
 * engine or batch service.
 */
export interface ContainerSettings {
  /** CPU count */
  vcpus: number;
  /** Memory ceiling in MB */
  memoryMb: number;
  engine: ContainerEngineKind;
  /** Batch queue identifier */
  queue?: string;
  /** Execution role / credential identifier for batch jobs */
  jobRole?: string;
  /** Extra mounts besides the sandbox */
  mounts?: Mount[];
  /** Prefix for job names; sanitized before use */
  jobNamePrefix?: string;
  /** Host directory under which sandboxes are created */
  scratchRoot?: string;
}

// =============================================================================
// Definitions
// =============================================================================

interface TaskDefinitionBase<P extends TaskParams, I extends InputSlots, O extends string> {
  /** Task family, e.g. "annotateProkka" */
  family: string;
  /** Input slot declarations */
  inputs: I;
  /**
   * Output URIs for the given parameters.
   *
   * Must be pure: no I/O, no clock, no randomness.
   */
  outputs(params: P): Record<O, string>;
}

export interface ExternalTaskDefinition<P extends TaskParams = TaskParams, O extends string = string>
  extends TaskDefinitionBase<P, NoInputs, O> {
  kind: 'external';
}

export interface LocalTaskDefinition<
  P extends TaskParams = TaskParams,
  I extends InputSlots = InputSlots,
  O extends string = string,
> extends TaskDefinitionBase<P, I, O> {
  kind: 'local';
  /** Must leave every output existing, or none of them */
  run(ctx: TaskContext<P, I, O>): Promise<void>;
}

export interface AggregateTaskDefinition<
  P extends TaskParams = TaskParams,
  I extends InputSlots = InputSlots,
  O extends string = string,
> extends TaskDefinitionBase<P, I, O> {
  kind: 'aggregate';
  /** Must leave every output existing, or none of them */
  run(ctx: TaskContext<P, I, O>): Promise<void>;
}

export interface ContainerTaskDefinition<
  P extends TaskParams = TaskParams,
  I extends InputSlots = InputSlots,
  O extends string = string,
> extends TaskDefinitionBase<P, I, O> {
  kind: 'container';
  /** Container image reference */
  image(params: P): string;
  /** Command template */
  command(params: P): CommandPart[];
  /** Resource hints and placement */
  container(params: P): ContainerSettings;
}

/**
 * Any task definition.
 */
export type TaskDefinition<
  P extends TaskParams = TaskParams,
  I extends InputSlots = InputSlots,
  O extends string = string,
> =
  | ExternalTaskDefinition<P, O>
  | LocalTaskDefinition<P, I, O>
  | AggregateTaskDefinition<P, I, O>
  | ContainerTaskDefinition<P, I, O>;

/** Parameters type of a definition */
export type ParamsOf<D> = D extends { outputs(params: infer P): unknown } ? P : never;

/** Input slots of a definition */
export type InputsOf<D> = D extends { inputs: infer I extends InputSlots } ? I : never;

/** Output slot names of a definition */
export type OutputsOf<D> = D extends { outputs(params: never): Record<infer O, string> }
  ? O & string
  : never;

// =============================================================================
// Definition helpers
// =============================================================================

export function externalTask<P extends TaskParams, O extends string>(
  definition: Omit<ExternalTaskDefinition<P, O>, 'kind' | 'inputs'>
): ExternalTaskDefinition<P, O> {
  return { kind: 'external', inputs: {}, ...definition };
}

export function localTask<P extends TaskParams, I extends InputSlots, O extends string>(
  definition: Omit<LocalTaskDefinition<P, I, O>, 'kind'>
): LocalTaskDefinition<P, I, O> {
  return { kind: 'local', ...definition };
}

export function aggregateTask<P extends TaskParams, I extends InputSlots, O extends string>(
  definition: Omit<AggregateTaskDefinition<P, I, O>, 'kind'>
): AggregateTaskDefinition<P, I, O> {
  return { kind: 'aggregate', ...definition };
}

export function containerTask<P extends TaskParams, I extends InputSlots, O extends string>(
  definition: Omit<ContainerTaskDefinition<P, I, O>, 'kind'>
): ContainerTaskDefinition<P, I, O> {
  return { kind: 'container', ...definition };
}
