import { CatalogInputError } from "../errors.js";
import type { CatalogRecord, RecordSource, RecordType } from "../records/types.js";
import { buildCategoryTree, type CategoryFolder } from "./categoryTree.js";

/**
 * Immutable view of a catalog at scan time: records grouped by type in
 * first-seen order, plus the category tree built from those groups.
 */
export class CatalogSnapshot {
  readonly totalRecordCount: number;
  readonly totalTypeCount: number;
  readonly categories: readonly CategoryFolder[];

  constructor(
    private readonly recordsByType: ReadonlyMap<RecordType, readonly CatalogRecord[]>,
    /** Scan completion time, in epoch milliseconds. */
    readonly scannedAt: number,
  ) {
    let total = 0;
    for (const records of recordsByType.values()) {
      total += records.length;
    }
    this.totalRecordCount = total;
    this.totalTypeCount = recordsByType.size;
    this.categories = buildCategoryTree(recordsByType);
  }

  types(): RecordType[] {
    return Array.from(this.recordsByType.keys());
  }

  /** Looks a scanned type up by name; `null` when no record of that type was seen. */
  findType(name: string): RecordType | null {
    for (const type of this.recordsByType.keys()) {
      if (type.name === name) {
        return type;
      }
    }
    return null;
  }

  recordsOfType(type: RecordType | string): readonly CatalogRecord[] {
    const resolved = typeof type === "string" ? this.findType(type) : type;
    return (resolved && this.recordsByType.get(resolved)) ?? [];
  }

  allRecords(): CatalogRecord[] {
    return Array.from(this.recordsByType.values()).flat();
  }

  /** First record, in scan order, whose name matches exactly. */
  findByName(name: string): CatalogRecord | null {
    for (const records of this.recordsByType.values()) {
      const match = records.find((record) => record.name === name);
      if (match) {
        return match;
      }
    }
    return null;
  }
}

/** Lists every record of {@link source} once and freezes the result into a snapshot. */
export function scanCatalog(source: RecordSource, clock: () => number = Date.now): CatalogSnapshot {
  if (!source) {
    throw new CatalogInputError("scanCatalog requires a record source");
  }
  const grouped = new Map<RecordType, CatalogRecord[]>();
  for (const record of source.listAllRecords()) {
    if (!record) {
      continue;
    }
    let bucket = grouped.get(record.type);
    if (!bucket) {
      bucket = [];
      grouped.set(record.type, bucket);
    }
    bucket.push(record);
  }
  return new CatalogSnapshot(grouped, clock());
}
