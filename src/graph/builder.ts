import { DEFAULT_GRAPH_CACHE_TTL_MS } from "../config/catalog.js";
import { CatalogInputError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { CatalogRecord, RecordSource, ReferenceExtractor } from "../records/types.js";
import { DependencyGraph, identityOf, type DependencyGraphView } from "./dependencyGraph.js";

/** Record whose references could not be extracted during a build. */
export interface DependencyBuildFailure {
  readonly recordId: string;
  readonly message: string;
}

/** Summary of one build pass. */
export interface DependencyBuildReport {
  readonly nodeCount: number;
  readonly edgeCount: number;
  /** Records skipped because they carry no identity key. */
  readonly skippedRecords: number;
  /** References from a record to itself, dropped before insertion. */
  readonly selfReferences: number;
  readonly failures: readonly DependencyBuildFailure[];
  readonly builtAt: number;
  readonly durationMs: number;
}

export interface DependencyBuildResult {
  readonly graph: DependencyGraph;
  readonly report: DependencyBuildReport;
}

export interface BuildDependencyGraphOptions {
  readonly logger?: StructuredLogger;
  readonly clock?: () => number;
}

/**
 * Builds a fresh graph: one node per record, then one edge per reference the
 * extractor reports. An extractor failure only costs the failing record its
 * outgoing edges; the pass carries on and the failure lands in the report.
 */
export function buildDependencyGraph(
  records: Iterable<CatalogRecord> | null | undefined,
  extractor: ReferenceExtractor | null | undefined,
  options: BuildDependencyGraphOptions = {},
): DependencyBuildResult {
  if (!records) {
    throw new CatalogInputError("buildDependencyGraph requires a record set");
  }
  if (!extractor) {
    throw new CatalogInputError("buildDependencyGraph requires a reference extractor");
  }
  const clock = options.clock ?? Date.now;
  const logger = options.logger;
  const startedAt = clock();
  const graph = new DependencyGraph();
  const members: CatalogRecord[] = [];
  let skippedRecords = 0;

  for (const record of records) {
    if (!record) {
      continue;
    }
    if (graph.addNode(record)) {
      members.push(record);
    } else {
      skippedRecords += 1;
    }
  }

  const failures: DependencyBuildFailure[] = [];
  let selfReferences = 0;
  for (const record of members) {
    let references: CatalogRecord[];
    try {
      references = Array.from(extractor.referencesOf(record));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      failures.push({ recordId: record.id, message });
      logger?.warn("dependency_extraction_failed", { record_id: record.id, message });
      continue;
    }
    for (const reference of references) {
      if (!reference) {
        continue;
      }
      if (identityOf(reference) === record.id) {
        selfReferences += 1;
        continue;
      }
      graph.addDependency(record, reference);
    }
  }

  const builtAt = clock();
  const report: DependencyBuildReport = {
    nodeCount: graph.nodeCount,
    edgeCount: graph.edgeCount,
    skippedRecords,
    selfReferences,
    failures,
    builtAt,
    durationMs: Math.max(0, builtAt - startedAt),
  };
  if (failures.length > 0) {
    logger?.warn("dependency_graph_incomplete", {
      failed_records: failures.length,
      node_count: report.nodeCount,
    });
  }
  logger?.info("dependency_graph_built", {
    node_count: report.nodeCount,
    edge_count: report.edgeCount,
    skipped_records: skippedRecords,
    duration_ms: report.durationMs,
  });
  return { graph, report };
}

export interface DependencyGraphBuilderOptions {
  readonly source: RecordSource;
  readonly extractor: ReferenceExtractor;
  /** Validity window of the cached graph. Defaults to 30 seconds. */
  readonly ttlMs?: number;
  readonly clock?: () => number;
  readonly logger?: StructuredLogger;
}

/**
 * Owns the most recently built graph. Readers call {@link getCachedGraph},
 * which rebuilds synchronously once the graph is older than the TTL. The
 * builder cannot see changes to the source by itself: whoever changes the
 * record set must call {@link invalidateCache}.
 */
export class DependencyGraphBuilder {
  private readonly source: RecordSource;
  private readonly extractor: ReferenceExtractor;
  private readonly ttlMs: number;
  private readonly clock: () => number;
  private readonly logger?: StructuredLogger;
  private cached: DependencyBuildResult | null = null;
  private builds = 0;

  constructor(options: DependencyGraphBuilderOptions) {
    this.source = options.source;
    this.extractor = options.extractor;
    this.ttlMs = Math.max(0, options.ttlMs ?? DEFAULT_GRAPH_CACHE_TTL_MS);
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger;
  }

  /** Number of build passes performed so far. */
  get generation(): number {
    return this.builds;
  }

  /** Returns the cached graph when still valid, otherwise performs a full build. */
  buildGraph(options: { readonly useCache?: boolean } = {}): DependencyGraphView {
    const cached = this.cached;
    if ((options.useCache ?? true) && cached && this.isFresh(cached)) {
      return cached.graph;
    }
    const result = buildDependencyGraph(this.source.listAllRecords(), this.extractor, {
      clock: this.clock,
      ...(this.logger ? { logger: this.logger } : {}),
    });
    this.cached = result;
    this.builds += 1;
    return result.graph;
  }

  getCachedGraph(): DependencyGraphView {
    return this.buildGraph({ useCache: true });
  }

  invalidateCache(): void {
    if (this.cached) {
      this.logger?.debug("dependency_graph_cache_invalidated", { generation: this.builds });
    }
    this.cached = null;
  }

  isCacheValid(): boolean {
    return this.cached !== null && this.isFresh(this.cached);
  }

  /** Report of the cached build, `null` once invalidated. */
  lastReport(): DependencyBuildReport | null {
    return this.cached?.report ?? null;
  }

  private isFresh(entry: DependencyBuildResult): boolean {
    return this.clock() - entry.report.builtAt < this.ttlMs;
  }
}
