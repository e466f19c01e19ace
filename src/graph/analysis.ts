import { DEFAULT_TOP_LIMIT } from "../config/catalog.js";
import type { CatalogRecord } from "../records/types.js";
import type { DependencyGraphBuilder } from "./builder.js";
import type { DependencyGraphStats, DependencyGraphView, GraphNode, NodeRef } from "./dependencyGraph.js";

/** Per-record reference counters. */
export interface DependencyStats {
  readonly record: CatalogRecord;
  readonly referenceCount: number;
  readonly dependencyCount: number;
  readonly isOrphan: boolean;
}

/**
 * Breadth-first search along dependency edges. The frontier expands in edge
 * insertion order and the first path discovered is returned, so the result
 * has the fewest edges. `null` when either endpoint is missing or the target
 * is unreachable.
 */
export function findShortestPath(graph: DependencyGraphView, from: NodeRef, to: NodeRef): GraphNode[] | null {
  const start = graph.getNode(from);
  const goal = graph.getNode(to);
  if (!start || !goal) {
    return null;
  }
  if (start.index === goal.index) {
    return [start];
  }

  const parents = new Map<number, number>();
  const visited = new Set<number>([start.index]);
  const queue: number[] = [start.index];
  for (let head = 0; head < queue.length; head += 1) {
    const current = queue[head];
    for (const next of graph.dependencyIndices(current)) {
      if (visited.has(next)) {
        continue;
      }
      visited.add(next);
      parents.set(next, current);
      if (next === goal.index) {
        return reconstructPath(graph, parents, start.index, goal.index);
      }
      queue.push(next);
    }
  }
  return null;
}

function reconstructPath(
  graph: DependencyGraphView,
  parents: ReadonlyMap<number, number>,
  startIndex: number,
  goalIndex: number,
): GraphNode[] {
  const indices: number[] = [goalIndex];
  let cursor = goalIndex;
  while (cursor !== startIndex) {
    const parent = parents.get(cursor);
    if (parent === undefined) {
      break;
    }
    indices.push(parent);
    cursor = parent;
  }
  indices.reverse();
  const path: GraphNode[] = [];
  for (const index of indices) {
    const node = graph.nodeAt(index);
    if (node) {
      path.push(node);
    }
  }
  return path;
}

function describeNode(graph: DependencyGraphView, node: GraphNode): DependencyStats {
  const referenceCount = graph.referenceCount(node);
  return {
    record: node.record,
    referenceCount,
    dependencyCount: graph.dependencyCount(node),
    isOrphan: referenceCount === 0,
  };
}

/**
 * Record-level analytics over the builder's cached graph. Every call reads
 * {@link DependencyGraphBuilder.getCachedGraph}, so results reflect the last
 * build until the cache expires or is invalidated.
 */
export class DependencyAnalysis {
  private readonly topLimit: number;

  constructor(
    private readonly builder: DependencyGraphBuilder,
    options: { readonly topLimit?: number } = {},
  ) {
    this.topLimit = options.topLimit ?? DEFAULT_TOP_LIMIT;
  }

  /** The cached graph, read-only. */
  graph(): DependencyGraphView {
    return this.builder.getCachedGraph();
  }

  shortestPath(from: CatalogRecord | string, to: CatalogRecord | string): CatalogRecord[] | null {
    const path = findShortestPath(this.graph(), from, to);
    return path ? path.map((node) => node.record) : null;
  }

  /** Unreferenced records, minus those whose type name is excluded. */
  findOrphans(excludedTypes: Iterable<string> = []): CatalogRecord[] {
    const excluded = new Set(excludedTypes);
    return this.graph()
      .orphanNodes()
      .filter((node) => !excluded.has(node.record.type.name))
      .map((node) => node.record);
  }

  mostReferenced(topN: number = this.topLimit): DependencyStats[] {
    const graph = this.graph();
    return graph.mostReferenced(topN).map((node) => describeNode(graph, node));
  }

  mostDependencies(topN: number = this.topLimit): DependencyStats[] {
    const graph = this.graph();
    return graph.mostDependencies(topN).map((node) => describeNode(graph, node));
  }

  /** Records pointing at {@link record}. */
  referencersOf(record: CatalogRecord | string): CatalogRecord[] {
    return this.graph()
      .dependentsOf(record)
      .map((node) => node.record);
  }

  /** Records {@link record} points at. */
  dependenciesOf(record: CatalogRecord | string): CatalogRecord[] {
    return this.graph()
      .dependenciesOf(record)
      .map((node) => node.record);
  }

  /** Counters for one record; all zero (and orphan) when it has no node. */
  statsFor(record: CatalogRecord): DependencyStats {
    const graph = this.graph();
    const node = graph.getNode(record);
    if (!node) {
      return { record, referenceCount: 0, dependencyCount: 0, isOrphan: true };
    }
    return describeNode(graph, node);
  }

  graphStats(): DependencyGraphStats {
    return this.graph().stats();
  }
}
