/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { TaskNotFoundError } from '../errors.js';
import type { Target } from '../targets/Target.js';
import type { TaskNode } from '../tasks/TaskNode.js';

/**
 * Binding of one consumer input to one producer output.
 *
 * `index` is the position within a collection slot, 0 for single slots.
 */
export interface Edge {
  consumer: string;
  slot: string;
  index: number;
  producer: string;
  output: string;
}

/** Resolved input Targets of a task */
export type ResolvedInputs = Record<string, Target | readonly Target[]>;

/**
 * A validated, acyclic task graph.
 *
 * Built by {@link GraphBuilder.build}; immutable afterwards.
 */
export class TaskGraph {
  /** Tasks in topological order */
  readonly order: readonly TaskNode[];
  /** Tasks with no consumer in this graph, in insertion order */
  readonly terminals: readonly TaskNode[];

  private readonly consumersOf = new Map<string, Edge[]>();
  private readonly producersOf = new Map<string, Edge[]>();

  constructor(
    private readonly nodes: ReadonlyMap<string, TaskNode>,
    readonly edges: readonly Edge[],
    topologicalOrder: readonly string[],
    readonly warnings: readonly string[] = []
  ) {
    for (const name of nodes.keys()) {
      this.consumersOf.set(name, []);
      this.producersOf.set(name, []);
    }
    for (const edge of edges) {
      this.consumersOf.get(edge.producer)?.push(edge);
      this.producersOf.get(edge.consumer)?.push(edge);
    }
    this.order = topologicalOrder.map((name) => this.task(name));
    this.terminals = [...nodes.values()].filter(
      (node) => (this.consumersOf.get(node.name) ?? []).length === 0
    );
  }

  /** Number of tasks */
  get size(): number {
    return this.nodes.size;
  }

  /** All tasks in insertion order */
  tasks(): TaskNode[] {
    return [...this.nodes.values()];
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  /**
   * @throws {TaskNotFoundError} If no task has this name
   */
  task(name: string): TaskNode {
    const node = this.nodes.get(name);
    if (!node) throw new TaskNotFoundError(name);
    return node;
  }

  /** Distinct producers feeding a task */
  dependenciesOf(name: string): TaskNode[] {
    this.task(name);
    return this.distinct((this.producersOf.get(name) ?? []).map((e) => e.producer));
  }

  /** Distinct consumers of a task's outputs */
  dependentsOf(name: string): TaskNode[] {
    this.task(name);
    return this.distinct((this.consumersOf.get(name) ?? []).map((e) => e.consumer));
  }

  /**
   * Every task that depends, directly or indirectly, on `name`.
   * Returned in topological order.
   */
  transitiveDependents(name: string): TaskNode[] {
    const reached = this.reach([name], (n) => this.dependentsOf(n));
    return this.order.filter((node) => reached.has(node.name));
  }

  /**
   * Every task that `names` depend on, directly or indirectly, excluding
   * `names` themselves unless one depends on another. Returned in topological order.
   */
  ancestorsOf(...names: string[]): TaskNode[] {
    const reached = this.reach(names, (n) => this.dependenciesOf(n));
    return this.order.filter((node) => reached.has(node.name));
  }

  /**
   * Input Targets of a task, slot by slot.
   *
   * Collection slots list their Targets in binding order.
   */
  inputsOf(name: string): ResolvedInputs {
    const node = this.task(name);
    const edges = this.producersOf.get(name) ?? [];
    const inputs: ResolvedInputs = {};

    for (const [slot, arity] of Object.entries(node.inputSlots)) {
      const bound = edges
        .filter((e) => e.slot === slot)
        .sort((a, b) => a.index - b.index)
        .map((e) => this.outputTarget(e));
      if (arity === 'many') {
        inputs[slot] = bound;
      } else if (bound.length > 0) {
        inputs[slot] = bound[0];
      }
    }
    return inputs;
  }

  private outputTarget(edge: Edge): Target {
    const producer = this.task(edge.producer);
    const target = producer.outputs.get(edge.output);
    if (target === undefined) {
      throw new Error(`Task '${edge.producer}' has no output '${edge.output}'`);
    }
    return target;
  }

  private distinct(names: string[]): TaskNode[] {
    return [...new Set(names)].map((n) => this.task(n));
  }

  private reach(start: string[], next: (name: string) => TaskNode[]): Set<string> {
    const reached = new Set<string>();
    const stack = [...start];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      for (const node of next(current)) {
        if (!reached.has(node.name)) {
          reached.add(node.name);
          stack.push(node.name);
        }
      }
    }
    return reached;
  }
}
