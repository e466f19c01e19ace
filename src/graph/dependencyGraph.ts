import type { CatalogRecord } from "../records/types.js";

/**
 * Handle over one record in a {@link DependencyGraph}. Handles live in a dense
 * arena: the same identity always yields the same handle within a graph.
 */
export interface GraphNode {
  readonly index: number;
  readonly key: string;
  readonly record: CatalogRecord;
}

/** Aggregate counters reported by {@link DependencyGraph.stats}. */
export interface DependencyGraphStats {
  readonly nodeCount: number;
  readonly edgeCount: number;
  readonly orphanCount: number;
  /** Mean out-degree (edges / nodes). */
  readonly averageDependencies: number;
  readonly orphanPercentage: number;
}

/** Anything a node can be looked up by: the handle, its record or its key. */
export type NodeRef = GraphNode | CatalogRecord | string;

/** Identity key of a record, or `null` when it has none. */
export function identityOf(record: CatalogRecord): string | null {
  return typeof record.id === "string" && record.id.length > 0 ? record.id : null;
}

/** Read side of a {@link DependencyGraph}, as handed out by the builder. */
export interface DependencyGraphView {
  readonly nodeCount: number;
  readonly edgeCount: number;
  getNode(ref: NodeRef): GraphNode | null;
  hasNode(ref: NodeRef): boolean;
  nodeAt(index: number): GraphNode | null;
  dependencyIndices(index: number): ReadonlySet<number>;
  dependenciesOf(ref: NodeRef): GraphNode[];
  dependentsOf(ref: NodeRef): GraphNode[];
  referenceCount(ref: NodeRef): number;
  dependencyCount(ref: NodeRef): number;
  isOrphan(ref: NodeRef): boolean;
  nodes(): readonly GraphNode[];
  orphanNodes(): GraphNode[];
  mostReferenced(topN?: number): GraphNode[];
  mostDependencies(topN?: number): GraphNode[];
  stats(): DependencyGraphStats;
}

function byKey(left: GraphNode, right: GraphNode): number {
  return left.key < right.key ? -1 : left.key > right.key ? 1 : 0;
}

/**
 * Directed graph of record references. An edge `from -> to` means `from`
 * depends on (points to) `to`; it is stored once in `from`'s dependency set
 * and once in `to`'s dependent set, always together.
 *
 * Self-loops are accepted here but the builder never inserts them: a record
 * pointing at itself would count as its own dependent.
 */
export class DependencyGraph implements DependencyGraphView {
  private readonly arena: GraphNode[] = [];
  private readonly indexByKey = new Map<string, number>();
  private readonly outgoing: Array<Set<number>> = [];
  private readonly incoming: Array<Set<number>> = [];
  private edges = 0;

  get nodeCount(): number {
    return this.arena.length;
  }

  get edgeCount(): number {
    return this.edges;
  }

  /** Adds the record's node, or returns the existing one for its identity. */
  addNode(record: CatalogRecord): GraphNode | null {
    const key = identityOf(record);
    if (key === null) {
      return null;
    }
    const existing = this.indexByKey.get(key);
    if (existing !== undefined) {
      return this.arena[existing];
    }
    const node: GraphNode = Object.freeze({ index: this.arena.length, key, record });
    this.arena.push(node);
    this.outgoing.push(new Set());
    this.incoming.push(new Set());
    this.indexByKey.set(key, node.index);
    return node;
  }

  /**
   * Records that {@link from} depends on {@link to}, creating missing nodes.
   * Adding the same edge twice keeps a single edge pair. Returns `false` when
   * either record has no identity.
   */
  addDependency(from: CatalogRecord, to: CatalogRecord): boolean {
    const source = this.addNode(from);
    const target = this.addNode(to);
    if (!source || !target) {
      return false;
    }
    const dependencies = this.outgoing[source.index];
    if (!dependencies.has(target.index)) {
      dependencies.add(target.index);
      this.incoming[target.index].add(source.index);
      this.edges += 1;
    }
    return true;
  }

  getNode(ref: NodeRef): GraphNode | null {
    const index = this.indexOf(ref);
    return index === undefined ? null : this.arena[index];
  }

  hasNode(ref: NodeRef): boolean {
    return this.indexOf(ref) !== undefined;
  }

  /** Node at a given arena index. */
  nodeAt(index: number): GraphNode | null {
    return this.arena[index] ?? null;
  }

  /** Arena indices of the nodes {@link index} depends on, in insertion order. */
  dependencyIndices(index: number): ReadonlySet<number> {
    return this.outgoing[index] ?? new Set<number>();
  }

  /** Records this node points to. Empty when the node is absent. */
  dependenciesOf(ref: NodeRef): GraphNode[] {
    const index = this.indexOf(ref);
    return index === undefined ? [] : this.materialise(this.outgoing[index]);
  }

  /** Records pointing to this node. Empty when the node is absent. */
  dependentsOf(ref: NodeRef): GraphNode[] {
    const index = this.indexOf(ref);
    return index === undefined ? [] : this.materialise(this.incoming[index]);
  }

  referenceCount(ref: NodeRef): number {
    const index = this.indexOf(ref);
    return index === undefined ? 0 : this.incoming[index].size;
  }

  dependencyCount(ref: NodeRef): number {
    const index = this.indexOf(ref);
    return index === undefined ? 0 : this.outgoing[index].size;
  }

  /** A node nobody points to. Absent nodes are reported as orphans too. */
  isOrphan(ref: NodeRef): boolean {
    return this.referenceCount(ref) === 0;
  }

  nodes(): readonly GraphNode[] {
    return this.arena;
  }

  /** Every node without dependents, in insertion order. */
  orphanNodes(): GraphNode[] {
    return this.arena.filter((node) => this.incoming[node.index].size === 0);
  }

  /** Nodes ranked by dependent count, ties broken by identity key. */
  mostReferenced(topN = 10): GraphNode[] {
    return this.rank(topN, (node) => this.incoming[node.index].size);
  }

  /** Nodes ranked by dependency count, ties broken by identity key. */
  mostDependencies(topN = 10): GraphNode[] {
    return this.rank(topN, (node) => this.outgoing[node.index].size);
  }

  stats(): DependencyGraphStats {
    const nodeCount = this.arena.length;
    const orphanCount = this.orphanNodes().length;
    return {
      nodeCount,
      edgeCount: this.edges,
      orphanCount,
      averageDependencies: nodeCount > 0 ? this.edges / nodeCount : 0,
      orphanPercentage: nodeCount > 0 ? (orphanCount / nodeCount) * 100 : 0,
    };
  }

  private rank(topN: number, score: (node: GraphNode) => number): GraphNode[] {
    const limit = Math.floor(topN);
    if (!(limit > 0)) {
      return [];
    }
    return [...this.arena]
      .sort((left, right) => score(right) - score(left) || byKey(left, right))
      .slice(0, limit);
  }

  private materialise(indices: ReadonlySet<number>): GraphNode[] {
    return Array.from(indices, (index) => this.arena[index]);
  }

  private indexOf(ref: NodeRef): number | undefined {
    if (typeof ref === "string") {
      return this.indexByKey.get(ref);
    }
    if ("record" in ref) {
      return this.arena[ref.index] === ref ? ref.index : undefined;
    }
    const key = identityOf(ref);
    return key === null ? undefined : this.indexByKey.get(key);
  }
}
