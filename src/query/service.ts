import { CatalogInputError } from "../errors.js";
import type { CatalogRecord } from "../records/types.js";
import type { QueryOperand } from "../records/values.js";
import { QueryCondition, QueryGroup, type QueryOperator } from "./condition.js";
import type { FieldAccessor } from "./fieldAccessor.js";

/**
 * Filters {@link records} through {@link group}, keeping the input order.
 * Runs in O(records × enabled conditions). A given {@link accessor} takes the
 * place of the conditions' own.
 */
export function runQuery(
  group: QueryGroup,
  records: Iterable<CatalogRecord> | null | undefined,
  accessor?: FieldAccessor,
): CatalogRecord[] {
  if (!records) {
    throw new CatalogInputError("runQuery requires a record set");
  }
  const matches: CatalogRecord[] = [];
  for (const record of records) {
    if (record && group.evaluate(record, accessor)) {
      matches.push(record);
    }
  }
  return matches;
}

/** Single-condition shortcut around {@link runQuery}. */
export function queryByField(
  field: string,
  operator: QueryOperator,
  value: QueryOperand,
  records: Iterable<CatalogRecord>,
  accessor?: FieldAccessor,
): CatalogRecord[] {
  const condition = new QueryCondition({ field, operator, value, ...(accessor ? { accessor } : {}) });
  return runQuery(new QueryGroup("and", [condition], accessor), records);
}

/** Substring search over record display names. */
export function searchByName(records: Iterable<CatalogRecord>, term: string, caseSensitive = false): CatalogRecord[] {
  const needle = caseSensitive ? term : term.toLowerCase();
  const matches: CatalogRecord[] = [];
  for (const record of records) {
    const name = caseSensitive ? record.name : record.name.toLowerCase();
    if (name.includes(needle)) {
      matches.push(record);
    }
  }
  return matches;
}
