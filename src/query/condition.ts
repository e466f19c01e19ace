import type { CatalogRecord, FieldValue } from "../records/types.js";
import { isFieldValue, toText, type QueryOperand } from "../records/values.js";
import { compareValues, matchesText } from "./comparator.js";
import { defaultFieldAccessor, type FieldAccessor } from "./fieldAccessor.js";

export const QUERY_OPERATORS = [
  "eq",
  "neq",
  "gt",
  "gte",
  "lt",
  "lte",
  "contains",
  "notContains",
  "startsWith",
  "endsWith",
  "regex",
  "isNull",
  "isNotNull",
] as const;

export type QueryOperator = (typeof QUERY_OPERATORS)[number];

export const LOGICAL_OPERATORS = ["and", "or"] as const;

export type LogicalOperator = (typeof LOGICAL_OPERATORS)[number];

const OPERATOR_SYMBOLS: Record<QueryOperator, string> = {
  eq: "==",
  neq: "!=",
  gt: ">",
  gte: ">=",
  lt: "<",
  lte: "<=",
  contains: "contains",
  notContains: "not contains",
  startsWith: "starts with",
  endsWith: "ends with",
  regex: "matches",
  isNull: "is null",
  isNotNull: "is not null",
};

export interface QueryConditionInit {
  readonly field: string;
  readonly operator?: QueryOperator;
  readonly value?: QueryOperand;
  readonly enabled?: boolean;
  readonly accessor?: FieldAccessor;
}

/** Single field/operator/value predicate. */
export class QueryCondition {
  field: string;
  operator: QueryOperator;
  value: QueryOperand;
  enabled: boolean;
  private readonly accessor: FieldAccessor;
  private compiledPattern: { readonly source: string; readonly regex: RegExp | null } | null = null;

  constructor(init: QueryConditionInit) {
    this.field = init.field;
    this.operator = init.operator ?? "eq";
    this.value = init.value ?? null;
    this.enabled = init.enabled ?? true;
    this.accessor = init.accessor ?? defaultFieldAccessor;
  }

  /**
   * Evaluates the predicate. Disabled conditions, unknown fields and values
   * that do not support the operator all yield `false`; nothing is thrown.
   * {@link accessor} overrides the one the condition was created with.
   */
  evaluate(record: CatalogRecord | null | undefined, accessor: FieldAccessor = this.accessor): boolean {
    if (!this.enabled || !record) {
      return false;
    }
    try {
      const descriptor = accessor.resolve(record.type, this.field);
      if (!descriptor) {
        return false;
      }
      return this.applyOperator(accessor.getValue(record, descriptor));
    } catch {
      return false;
    }
  }

  /** Human readable form, e.g. `hp > 50` or `name contains "go"`. */
  describe(): string {
    const symbol = OPERATOR_SYMBOLS[this.operator];
    if (this.operator === "isNull" || this.operator === "isNotNull") {
      return `${this.field} ${symbol}`;
    }
    return `${this.field} ${symbol} ${formatOperand(this.value)}`;
  }

  private applyOperator(fieldValue: FieldValue | null): boolean {
    const expected = this.value;
    switch (this.operator) {
      case "isNull":
        return fieldValue === null;
      case "isNotNull":
        return fieldValue !== null;
      case "eq":
        return compareValues(fieldValue, expected) === 0;
      case "neq":
        return compareValues(fieldValue, expected) !== 0;
      case "gt":
        return compareValues(fieldValue, expected) > 0;
      case "gte":
        return compareValues(fieldValue, expected) >= 0;
      case "lt":
        return compareValues(fieldValue, expected) < 0;
      case "lte":
        return compareValues(fieldValue, expected) <= 0;
      case "contains":
        return matchesText(fieldValue, expected, "contains");
      case "notContains":
        return fieldValue !== null && expected !== null && !matchesText(fieldValue, expected, "contains");
      case "startsWith":
        return matchesText(fieldValue, expected, "prefix");
      case "endsWith":
        return matchesText(fieldValue, expected, "suffix");
      case "regex":
        return this.matchesPattern(fieldValue);
    }
  }

  /** Regex matching only applies when both sides are strings. */
  private matchesPattern(fieldValue: FieldValue | null): boolean {
    if (fieldValue === null || fieldValue.kind !== "string") {
      return false;
    }
    const pattern = textualOperand(this.value);
    if (pattern === null) {
      return false;
    }
    const regex = this.compilePattern(pattern);
    return regex !== null && regex.test(fieldValue.value);
  }

  private compilePattern(source: string): RegExp | null {
    if (this.compiledPattern?.source !== source) {
      let regex: RegExp | null;
      try {
        regex = new RegExp(source);
      } catch {
        regex = null;
      }
      this.compiledPattern = { source, regex };
    }
    return this.compiledPattern.regex;
  }
}

function textualOperand(operand: QueryOperand): string | null {
  if (typeof operand === "string") {
    return operand;
  }
  if (operand !== null && isFieldValue(operand) && operand.kind === "string") {
    return operand.value;
  }
  return null;
}

function formatOperand(operand: QueryOperand): string {
  if (operand === null) {
    return "null";
  }
  if (typeof operand === "string") {
    return JSON.stringify(operand);
  }
  if (isFieldValue(operand)) {
    return operand.kind === "string" ? JSON.stringify(operand.value) : toText(operand);
  }
  return String(operand);
}

/**
 * Ordered conditions combined with AND or OR. A group without enabled
 * conditions lets every record through.
 */
export class QueryGroup {
  readonly conditions: QueryCondition[];
  logic: LogicalOperator;
  private readonly accessor: FieldAccessor | undefined;

  constructor(logic: LogicalOperator = "and", conditions: QueryCondition[] = [], accessor?: FieldAccessor) {
    this.logic = logic;
    this.conditions = conditions;
    this.accessor = accessor;
  }

  get count(): number {
    return this.conditions.length;
  }

  get enabledCount(): number {
    return this.conditions.filter((condition) => condition.enabled).length;
  }

  /** Appends a condition; the field defaults to `name`. */
  addCondition(field = "name", operator: QueryOperator = "eq", value: QueryOperand = null): QueryCondition {
    const condition = new QueryCondition({
      field,
      operator,
      value,
      ...(this.accessor ? { accessor: this.accessor } : {}),
    });
    this.conditions.push(condition);
    return condition;
  }

  removeCondition(condition: QueryCondition): boolean {
    const index = this.conditions.indexOf(condition);
    if (index < 0) {
      return false;
    }
    this.conditions.splice(index, 1);
    return true;
  }

  clear(): void {
    this.conditions.length = 0;
  }

  /**
   * Short-circuits in declaration order over the enabled conditions. When
   * {@link accessor} is given every condition resolves its field through it.
   */
  evaluate(record: CatalogRecord, accessor?: FieldAccessor): boolean {
    let evaluated = 0;
    for (const condition of this.conditions) {
      if (!condition.enabled) {
        continue;
      }
      evaluated += 1;
      const passed = accessor ? condition.evaluate(record, accessor) : condition.evaluate(record);
      if (this.logic === "and" && !passed) {
        return false;
      }
      if (this.logic === "or" && passed) {
        return true;
      }
    }
    return evaluated === 0 || this.logic === "and";
  }

  describe(): string {
    const enabled = this.conditions.filter((condition) => condition.enabled);
    if (enabled.length === 0) {
      return "(all records)";
    }
    return enabled.map((condition) => condition.describe()).join(` ${this.logic.toUpperCase()} `);
  }
}
