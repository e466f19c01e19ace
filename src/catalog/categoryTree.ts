import type { CatalogRecord, RecordType } from "../records/types.js";

/** Category assigned to types that do not declare one. */
export const DEFAULT_CATEGORY = "Other";

/** Suffixes stripped from type names for display; only the first match is removed. */
const DISPLAY_SUFFIXES = ["Definition", "Config", "ConfigSO", "SO", "Data", "Base"] as const;

export interface TypeNode {
  readonly kind: "type";
  readonly displayName: string;
  readonly type: RecordType;
  readonly records: readonly CatalogRecord[];
  readonly recordCount: number;
}

export interface CategoryFolder {
  readonly kind: "folder";
  readonly displayName: string;
  readonly children: readonly TypeNode[];
  /** Sum of the record counts of {@link children}. */
  readonly recordCount: number;
}

export function displayNameOf(type: RecordType): string {
  const name = type.name;
  for (const suffix of DISPLAY_SUFFIXES) {
    if (name.endsWith(suffix)) {
      return name.slice(0, name.length - suffix.length);
    }
  }
  return name;
}

export function categoryOf(type: RecordType): string {
  return type.category && type.category.length > 0 ? type.category : DEFAULT_CATEGORY;
}

/**
 * Groups types into one folder per category. Types keep their grouping order
 * inside a folder; folders are sorted by display name.
 */
export function buildCategoryTree(
  recordsByType: ReadonlyMap<RecordType, readonly CatalogRecord[]>,
): CategoryFolder[] {
  const folders = new Map<string, TypeNode[]>();
  for (const [type, records] of recordsByType) {
    const category = categoryOf(type);
    let children = folders.get(category);
    if (!children) {
      children = [];
      folders.set(category, children);
    }
    children.push({
      kind: "type",
      displayName: displayNameOf(type),
      type,
      records,
      recordCount: records.length,
    });
  }

  return Array.from(folders, ([displayName, children]): CategoryFolder => ({
    kind: "folder",
    displayName,
    children,
    recordCount: children.reduce((total, child) => total + child.recordCount, 0),
  })).sort((left, right) => compareOrdinal(left.displayName, right.displayName));
}

function compareOrdinal(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}
