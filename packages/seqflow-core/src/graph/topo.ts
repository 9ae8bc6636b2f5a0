/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { DependencyCycleError } from '../errors.js';

/** Producer -> consumer dependency */
export interface DependencyEdge {
  from: string;
  to: string;
}

/**
 * Kahn's topological sort.
 *
 * Nodes with no remaining dependencies are emitted in the order they were
 * given, so the result is deterministic. Parallel edges are allowed.
 *
 * @throws {DependencyCycleError} Naming the nodes on one cycle, in dependency order
 */
export function topoSort(nodes: readonly string[], edges: readonly DependencyEdge[]): string[] {
  const indegree = new Map<string, number>();
  const adjacent = new Map<string, string[]>();
  for (const id of nodes) {
    indegree.set(id, 0);
    adjacent.set(id, []);
  }
  for (const edge of edges) {
    indegree.set(edge.to, (indegree.get(edge.to) ?? 0) + 1);
    adjacent.get(edge.from)?.push(edge.to);
  }

  const queue = nodes.filter((id) => indegree.get(id) === 0);
  const order: string[] = [];
  for (let head = 0; head < queue.length; head++) {
    const id = queue[head];
    order.push(id);
    for (const next of adjacent.get(id) ?? []) {
      const remaining = (indegree.get(next) ?? 0) - 1;
      indegree.set(next, remaining);
      if (remaining === 0) queue.push(next);
    }
  }

  if (order.length !== nodes.length) {
    throw new DependencyCycleError(findCycle(nodes, edges, new Set(order)));
  }
  return order;
}

/**
 * Find one cycle among the nodes Kahn's algorithm could not emit.
 *
 * Every such node has a predecessor that was not emitted either, so walking
 * predecessors must revisit a node.
 */
function findCycle(
  nodes: readonly string[],
  edges: readonly DependencyEdge[],
  emitted: ReadonlySet<string>
): string[] {
  const predecessor = new Map<string, string>();
  for (const edge of edges) {
    if (!emitted.has(edge.from) && !emitted.has(edge.to) && !predecessor.has(edge.to)) {
      predecessor.set(edge.to, edge.from);
    }
  }

  const start = nodes.find((id) => !emitted.has(id));
  if (start === undefined) return [];

  const seen = new Map<string, number>();
  const walk: string[] = [];
  let current: string | undefined = start;
  while (current !== undefined && !seen.has(current)) {
    seen.set(current, walk.length);
    walk.push(current);
    current = predecessor.get(current);
  }
  if (current === undefined) return walk.reverse();

  // walk runs against the edges; reverse the loop to dependency order
  const cycle = walk.slice(seen.get(current)).reverse();
  return [...cycle, cycle[0]];
}
