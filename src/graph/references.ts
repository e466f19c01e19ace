import { defaultFieldAccessor, type FieldAccessor } from "../query/fieldAccessor.js";
import type { CatalogRecord, FieldValue, RecordSource, ReferenceExtractor } from "../records/types.js";

/**
 * Extractor reading every queryable field of a record and following the
 * reference values it finds, including those nested in objects and lists.
 * Targets the source cannot load are skipped. Each target is reported once.
 */
export function createFieldReferenceExtractor(
  source: RecordSource,
  accessor: FieldAccessor = defaultFieldAccessor,
): ReferenceExtractor {
  return {
    referencesOf(record: CatalogRecord): CatalogRecord[] {
      const targets: string[] = [];
      for (const field of accessor.listQueryableFields(record.type)) {
        collectTargets(accessor.readField(record, field.name), targets);
      }
      const seen = new Set<string>();
      const found: CatalogRecord[] = [];
      for (const target of targets) {
        if (seen.has(target)) {
          continue;
        }
        seen.add(target);
        const loaded = source.loadByIdentity(target);
        if (loaded) {
          found.push(loaded);
        }
      }
      return found;
    },
  };
}

function collectTargets(value: FieldValue | null | undefined, into: string[]): void {
  if (!value) {
    return;
  }
  switch (value.kind) {
    case "reference":
      if (value.target) {
        into.push(value.target);
      }
      return;
    case "object":
      for (const nested of Object.values(value.fields)) {
        collectTargets(nested, into);
      }
      return;
    case "list":
      for (const item of value.items) {
        collectTargets(item, into);
      }
      return;
    default:
      return;
  }
}
