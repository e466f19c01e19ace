import { CatalogSnapshot, scanCatalog } from "./catalog/snapshot.js";
import { DEFAULT_GRAPH_CACHE_TTL_MS, DEFAULT_TOP_LIMIT } from "./config/catalog.js";
import { CatalogInputError } from "./errors.js";
import { DependencyAnalysis } from "./graph/analysis.js";
import { DependencyGraphBuilder } from "./graph/builder.js";
import { createFieldReferenceExtractor } from "./graph/references.js";
import type { StructuredLogger } from "./logger.js";
import type { QueryGroup, QueryOperator } from "./query/condition.js";
import { defaultFieldAccessor, type FieldAccessor, type QueryableField } from "./query/fieldAccessor.js";
import { queryByField, runQuery, searchByName } from "./query/service.js";
import type { CatalogRecord, RecordSource, RecordType, ReferenceExtractor } from "./records/types.js";
import type { QueryOperand } from "./records/values.js";

export interface CatalogWorkspaceOptions {
  readonly source: RecordSource;
  /** Defaults to the field-walking extractor over {@link source}. */
  readonly extractor?: ReferenceExtractor;
  readonly accessor?: FieldAccessor;
  /** Types known up front, so that types without records can still be inspected. */
  readonly types?: Iterable<RecordType>;
  readonly ttlMs?: number;
  readonly topLimit?: number;
  readonly clock?: () => number;
  readonly logger?: StructuredLogger;
}

/**
 * Entry point tying a record source to the query and dependency engines. The
 * snapshot and the dependency graph are both derived from the source; a
 * change notification from the source, or an explicit {@link rescan}, drops
 * both so the next read observes the new record set.
 */
export class CatalogWorkspace {
  readonly analysis: DependencyAnalysis;
  private readonly source: RecordSource;
  private readonly accessor: FieldAccessor;
  private readonly builder: DependencyGraphBuilder;
  private readonly registeredTypes: readonly RecordType[];
  private readonly clock: () => number;
  private readonly logger?: StructuredLogger;
  private readonly unsubscribe: (() => void) | null;
  private current: CatalogSnapshot | null = null;

  constructor(options: CatalogWorkspaceOptions) {
    if (!options?.source) {
      throw new CatalogInputError("CatalogWorkspace requires a record source");
    }
    this.source = options.source;
    this.accessor = options.accessor ?? defaultFieldAccessor;
    this.registeredTypes = Array.from(options.types ?? []);
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger;
    this.builder = new DependencyGraphBuilder({
      source: this.source,
      extractor: options.extractor ?? createFieldReferenceExtractor(this.source, this.accessor),
      ttlMs: options.ttlMs ?? DEFAULT_GRAPH_CACHE_TTL_MS,
      clock: this.clock,
      ...(this.logger ? { logger: this.logger } : {}),
    });
    this.analysis = new DependencyAnalysis(this.builder, { topLimit: options.topLimit ?? DEFAULT_TOP_LIMIT });
    this.unsubscribe = this.source.subscribe ? this.source.subscribe(() => this.handleSourceChange()) : null;
  }

  get graphBuilder(): DependencyGraphBuilder {
    return this.builder;
  }

  /** Rescans the source and invalidates the dependency graph cache. */
  rescan(): CatalogSnapshot {
    this.builder.invalidateCache();
    const snapshot = scanCatalog(this.source, this.clock);
    this.current = snapshot;
    this.logger?.info("catalog_scanned", {
      record_count: snapshot.totalRecordCount,
      type_count: snapshot.totalTypeCount,
    });
    return snapshot;
  }

  /** Latest snapshot, scanning on first use. */
  snapshot(): CatalogSnapshot {
    return this.current ?? this.rescan();
  }

  /** Runs {@link group} with the workspace's field accessor. */
  query(group: QueryGroup): CatalogRecord[] {
    const matches = runQuery(group, this.snapshot().allRecords(), this.accessor);
    this.logger?.debug("catalog_query_executed", {
      query: group.describe(),
      match_count: matches.length,
    });
    return matches;
  }

  queryByField(field: string, operator: QueryOperator, value: QueryOperand): CatalogRecord[] {
    return queryByField(field, operator, value, this.snapshot().allRecords(), this.accessor);
  }

  searchByName(term: string, caseSensitive = false): CatalogRecord[] {
    return searchByName(this.snapshot().allRecords(), term, caseSensitive);
  }

  /** Looks a type up among the registered types first, then among scanned ones. */
  findType(name: string): RecordType | null {
    return this.registeredTypes.find((type) => type.name === name) ?? this.snapshot().findType(name);
  }

  /** `null` when no type with that name is known. */
  queryableFields(typeName: string): readonly QueryableField[] | null {
    const type = this.findType(typeName);
    return type ? this.accessor.listQueryableFields(type) : null;
  }

  /** Stops listening to the source. */
  dispose(): void {
    this.unsubscribe?.();
  }

  private handleSourceChange(): void {
    this.current = null;
    this.builder.invalidateCache();
    this.logger?.debug("catalog_source_changed", { generation: this.builder.generation });
  }
}
