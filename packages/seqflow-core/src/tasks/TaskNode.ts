/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import type { Target } from '../targets/Target.js';
import { taskIdentity } from './identity.js';
import type { InputSlots, TaskDefinition, TaskParams } from './types.js';

/**
 * Reference to one output slot of a task, used to bind consumer inputs.
 */
export interface OutputRef {
  readonly producer: TaskNode;
  readonly output: string;
}

/**
 * An instance of a task definition in a graph.
 *
 * Nodes are created by {@link GraphBuilder.add}; their output Targets are
 * fixed at construction from the parameters alone.
 */
export class TaskNode<
  P extends TaskParams = TaskParams,
  I extends InputSlots = InputSlots,
  O extends string = string,
> {
  /** `family:name@hash`; pure function of family, name and parameters */
  readonly id: string;
  readonly params: Readonly<P>;
  readonly outputUris: Readonly<Record<O, string>>;
  /** Output slot -> Target, in declaration order */
  readonly outputs: ReadonlyMap<string, Target>;

  constructor(
    readonly definition: TaskDefinition<P, I, O>,
    readonly name: string,
    params: P,
    resolve: (uri: string) => Target
  ) {
    this.params = Object.freeze(params);
    this.id = taskIdentity(definition.family, name, params);
    this.outputUris = definition.outputs(params);
    this.outputs = new Map(
      Object.entries<string>(this.outputUris).map(([slot, uri]) => [slot, resolve(uri)])
    );
  }

  get family(): string {
    return this.definition.family;
  }

  get kind(): TaskDefinition['kind'] {
    return this.definition.kind;
  }

  /** Declared input slots */
  get inputSlots(): InputSlots {
    return this.definition.inputs;
  }

  /**
   * Reference an output slot for binding to a consumer.
   */
  out(slot: O): OutputRef {
    if (!this.outputs.has(slot)) {
      throw new Error(`Task '${this.name}' has no output '${slot}'`);
    }
    return { producer: this, output: slot };
  }

  /**
   * Target of an output slot.
   */
  output(slot: O): Target {
    const target = this.outputs.get(slot);
    if (!target) {
      throw new Error(`Task '${this.name}' has no output '${slot}'`);
    }
    return target;
  }

  /** Output Targets in declaration order */
  outputTargets(): Target[] {
    return [...this.outputs.values()];
  }

  /**
   * True iff every declared output exists.
   *
   * Asks the backing stores on every call.
   */
  async isComplete(): Promise<boolean> {
    const exists = await Promise.all(this.outputTargets().map((target) => target.exists()));
    return exists.every(Boolean);
  }
}
