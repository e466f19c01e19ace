import type { FieldValue, ValueKind } from "../records/types.js";
import {
  boolValue,
  enumValue,
  floatValue,
  intValue,
  referenceValue,
  stringValue,
  toFieldValue,
  toText,
  type QueryOperand,
} from "../records/values.js";

export type Ordering = -1 | 0 | 1;

/** Matching modes of the text operators. */
export type TextMatchMode = "contains" | "prefix" | "suffix";

const NUMERIC_KINDS: ReadonlySet<ValueKind> = new Set(["int", "float"]);
const INTEGER_LITERAL = /^[-+]?\d+$/;

function order<T extends string | number>(left: T, right: T): Ordering {
  return left < right ? -1 : left > right ? 1 : 0;
}

/** Case folding applied by every case-insensitive comparison. */
function foldCase(text: string): string {
  return text.toUpperCase();
}

function compareText(left: string, right: string): Ordering {
  return order(foldCase(left), foldCase(right));
}

function sameFamily(left: FieldValue, right: FieldValue): boolean {
  if (NUMERIC_KINDS.has(left.kind)) {
    return NUMERIC_KINDS.has(right.kind);
  }
  return left.kind === right.kind;
}

/**
 * Converts {@link value} into {@link target}'s kind, or returns `null` when no
 * sensible conversion exists.
 */
function coerce(value: FieldValue, target: ValueKind): FieldValue | null {
  switch (target) {
    case "int":
    case "float":
      if (value.kind === "string") {
        const trimmed = value.value.trim();
        const parsed = Number(trimmed);
        return trimmed.length > 0 && Number.isFinite(parsed) ? floatValue(parsed) : null;
      }
      if (value.kind === "bool") {
        return intValue(value.value ? 1 : 0);
      }
      if (value.kind === "enum") {
        return intValue(value.ordinal);
      }
      return null;
    case "string":
      return stringValue(toText(value));
    case "bool":
      if (value.kind === "string") {
        const literal = value.value.trim().toLowerCase();
        return literal === "true" ? boolValue(true) : literal === "false" ? boolValue(false) : null;
      }
      if (value.kind === "int" || value.kind === "float") {
        return boolValue(value.value !== 0);
      }
      return null;
    case "enum":
      if ((value.kind === "int" || value.kind === "float") && Number.isInteger(value.value)) {
        return enumValue(String(value.value), value.value);
      }
      if (value.kind === "string" && INTEGER_LITERAL.test(value.value.trim())) {
        const ordinal = Number.parseInt(value.value.trim(), 10);
        return enumValue(String(ordinal), ordinal);
      }
      return null;
    case "reference":
      return value.kind === "string" ? referenceValue(value.value) : null;
    default:
      return null;
  }
}

/** Native ordering of two values of the same family. */
function compareSameFamily(left: FieldValue, right: FieldValue): Ordering {
  if ((left.kind === "int" || left.kind === "float") && (right.kind === "int" || right.kind === "float")) {
    return order(left.value, right.value);
  }
  if (left.kind === "string" && right.kind === "string") {
    return order(left.value, right.value);
  }
  if (left.kind === "bool" && right.kind === "bool") {
    return order(Number(left.value), Number(right.value));
  }
  if (left.kind === "enum" && right.kind === "enum") {
    return order(left.ordinal, right.ordinal);
  }
  if (left.kind === "reference" && right.kind === "reference") {
    return order(left.target, right.target);
  }
  // Vectors, colors, objects and lists have no natural order.
  return compareText(toText(left), toText(right));
}

/**
 * Orders two operands. `null` sorts before everything else. Values of the
 * same kind use their native order; otherwise the right operand is coerced to
 * the left operand's kind, and when that fails both sides are compared as
 * case-insensitive text. Strings compare by code unit, so a
 * string field holding "10" sorts before "9".
 */
export function compareValues(a: QueryOperand, b: QueryOperand): Ordering {
  const left = toFieldValue(a);
  const right = toFieldValue(b);
  if (left === null && right === null) {
    return 0;
  }
  if (left === null) {
    return -1;
  }
  if (right === null) {
    return 1;
  }
  if (sameFamily(left, right)) {
    return compareSameFamily(left, right);
  }
  const coerced = coerce(right, left.kind);
  if (coerced !== null) {
    return compareSameFamily(left, coerced);
  }
  return compareText(toText(left), toText(right));
}

export function valuesEqual(a: QueryOperand, b: QueryOperand): boolean {
  return compareValues(a, b) === 0;
}

/**
 * Case-insensitive substring, prefix or suffix test against the text of
 * {@link value}. A `null` value or needle never matches.
 */
export function matchesText(value: QueryOperand, needle: QueryOperand, mode: TextMatchMode): boolean {
  const haystack = toFieldValue(value);
  const expected = toFieldValue(needle);
  if (haystack === null || expected === null) {
    return false;
  }
  const text = foldCase(toText(haystack));
  const fragment = foldCase(toText(expected));
  switch (mode) {
    case "contains":
      return text.includes(fragment);
    case "prefix":
      return text.startsWith(fragment);
    case "suffix":
      return text.endsWith(fragment);
  }
}
