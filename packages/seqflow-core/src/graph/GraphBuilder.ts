/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Graph construction.
 *
 * Workflows add task instances, bind consumer input slots to producer
 * outputs, and call `build()`. Bindings are recorded as an explicit edge
 * list; nothing is re-resolved at run time.
 *
 * @example
 * ```ts
 * const builder = new GraphBuilder(resolver);
 * const samples = builder.fanOut(rows, (row) => {
 *   const reads = builder.add(loadFile, `load_${row.sample}`, { uri: row.source });
 *   const qc = builder.add(fastqp, `fastqp_${row.sample}`, { sample: row.sample, outputFolder });
 *   builder.bind(qc, 'reads', reads.out('file'));
 *   return qc;
 * });
 * const graph = builder.build();
 * ```
 */

import {
  DuplicateTaskError,
  SlotBindingError,
  UnboundInputError,
} from '../errors.js';
import { validateDatasetRows, type DatasetRow } from '../dataset/table.js';
import type { TargetResolver } from '../targets/TargetResolver.js';
import { validateCommand } from '../tasks/command.js';
import { TaskNode, type OutputRef } from '../tasks/TaskNode.js';
import type { InputSlots, TaskDefinition, TaskParams } from '../tasks/types.js';
import { TaskGraph, type Edge } from './TaskGraph.js';
import { topoSort } from './topo.js';

/** Warning recorded when a fan-out has nothing to fan out over */
export const EMPTY_DATASET_WARNING = 'Dataset has no rows; nothing to run';

/** Source accepted by `bind` for a slot of arity `A` */
export type BindingSource<A> = A extends 'many' ? readonly OutputRef[] : OutputRef;

export class GraphBuilder {
  private readonly nodes = new Map<string, TaskNode>();
  private readonly bindings = new Map<string, Map<string, Edge[]>>();
  private readonly warnings: string[] = [];

  constructor(private readonly resolver: TargetResolver) {}

  /** Number of tasks added so far */
  get size(): number {
    return this.nodes.size;
  }

  /**
   * Add a task instance.
   *
   * Adding a name again with identical family and parameters is a no-op that
   * returns an equivalent node.
   *
   * @throws {DuplicateTaskError} If the name is taken by a different identity
   * @throws {SlotBindingError} If a local task declares a collection slot
   * @throws {UnsupportedSchemeError} If an output URI has no store
   */
  add<P extends TaskParams, I extends InputSlots, O extends string>(
    definition: TaskDefinition<P, I, O>,
    name: string,
    params: P
  ): TaskNode<P, I, O> {
    const node = new TaskNode<P, I, O>(definition, name, params, (uri) =>
      this.resolver.resolve(uri)
    );

    const existing = this.nodes.get(name);
    if (existing) {
      if (existing.id !== node.id) {
        throw new DuplicateTaskError(name, existing.id, node.id);
      }
      return node;
    }

    if (definition.kind === 'local') {
      for (const [slot, arity] of Object.entries(definition.inputs)) {
        if (arity === 'many') {
          throw new SlotBindingError(name, slot, 'local tasks take single-target inputs');
        }
      }
    }

    this.nodes.set(name, node);
    this.bindings.set(name, new Map());
    return node;
  }

  /**
   * Bind an input slot to producer output(s).
   *
   * Single slots take one reference; collection slots take an ordered array.
   * A slot is bound once; binding it again to the same sources is a no-op.
   *
   * @throws {SlotBindingError} On an undeclared slot, wrong arity, a producer
   *   not in this graph, or a conflicting second binding
   */
  bind<P extends TaskParams, I extends InputSlots, O extends string, S extends keyof I & string>(
    consumer: TaskNode<P, I, O>,
    slot: S,
    source: BindingSource<I[S]>
  ): void {
    const slots = this.bindings.get(consumer.name);
    if (!slots || this.nodes.get(consumer.name)?.id !== consumer.id) {
      throw new SlotBindingError(consumer.name, slot, 'consumer was not added to this graph');
    }

    const declared = consumer.inputSlots;
    if (!(slot in declared)) {
      throw new SlotBindingError(consumer.name, slot, 'no such input');
    }
    const arity = declared[slot];

    const given: OutputRef | readonly OutputRef[] = source;
    const refs: readonly OutputRef[] = isRefArray(given) ? given : [given];
    if (arity === 'one' && isRefArray(given)) {
      throw new SlotBindingError(consumer.name, slot, 'expects a single output');
    }
    if (arity === 'many' && !isRefArray(given)) {
      throw new SlotBindingError(consumer.name, slot, 'expects a list of outputs');
    }

    const edges = refs.map((ref, index): Edge => {
      if (this.nodes.get(ref.producer.name)?.id !== ref.producer.id) {
        throw new SlotBindingError(
          consumer.name,
          slot,
          `producer '${ref.producer.name}' was not added to this graph`
        );
      }
      return {
        consumer: consumer.name,
        slot,
        index,
        producer: ref.producer.name,
        output: ref.output,
      };
    });

    const previous = slots.get(slot);
    if (previous) {
      if (!sameEdges(previous, edges)) {
        throw new SlotBindingError(consumer.name, slot, 'already bound to different outputs');
      }
      return;
    }
    slots.set(slot, edges);
  }

  /**
   * Build one branch per dataset row, in row order.
   *
   * Rows are checked before any branch runs, so a bad dataset adds no tasks.
   *
   * @returns Branch results keyed by sample identifier
   * @throws {EmptyDatasetValueError} If a row has an empty sample or source
   * @throws {DuplicateDatasetValueError} If a sample or source repeats
   */
  fanOut<T>(rows: readonly DatasetRow[], branch: (row: DatasetRow) => T): Map<string, T> {
    validateDatasetRows(rows);
    if (rows.length === 0) {
      this.warn(EMPTY_DATASET_WARNING);
    }
    const results = new Map<string, T>();
    for (const row of rows) {
      results.set(row.sample, branch(row));
    }
    return results;
  }

  /** Record a non-fatal problem, reported by `build()` */
  warn(message: string): void {
    if (!this.warnings.includes(message)) {
      this.warnings.push(message);
    }
  }

  /**
   * Validate and freeze the graph.
   *
   * @throws {UnboundInputError} If a declared input slot has no binding
   * @throws {UnresolvedPlaceholderError} If a container command references a
   *   slot the task doesn't declare
   * @throws {DependencyCycleError} If the bindings form a cycle
   */
  build(): TaskGraph {
    const edges: Edge[] = [];

    for (const node of this.nodes.values()) {
      const slots = this.bindings.get(node.name) ?? new Map<string, Edge[]>();
      for (const slot of Object.keys(node.inputSlots)) {
        const bound = slots.get(slot);
        if (!bound) throw new UnboundInputError(node.name, slot);
        edges.push(...bound);
      }

      const definition = node.definition;
      if (definition.kind === 'container') {
        validateCommand(
          node.name,
          definition.command(node.params),
          definition.inputs,
          [...node.outputs.keys()]
        );
      }
    }

    const order = topoSort(
      [...this.nodes.keys()],
      edges.map((e) => ({ from: e.producer, to: e.consumer }))
    );

    if (this.nodes.size === 0) {
      this.warn(EMPTY_DATASET_WARNING);
    }
    return new TaskGraph(new Map(this.nodes), edges, order, [...this.warnings]);
  }
}

function isRefArray(source: OutputRef | readonly OutputRef[]): source is readonly OutputRef[] {
  return Array.isArray(source);
}

function sameEdges(a: readonly Edge[], b: readonly Edge[]): boolean {
  return (
    a.length === b.length &&
    a.every((e, i) => e.producer === b[i].producer && e.output === b[i].output)
  );
}
