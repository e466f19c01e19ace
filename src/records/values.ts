import type {
  BoolValue,
  ColorValue,
  EnumValue,
  FieldDeclaration,
  FieldValue,
  FloatValue,
  IntValue,
  ListValue,
  ObjectValue,
  RecordType,
  ReferenceValue,
  StringValue,
  Vector2Value,
  Vector3Value,
} from "./types.js";

/** Raw literal accepted wherever a comparison value is typed in by a caller. */
export type Primitive = string | number | boolean | null;

/** Comparison operand: either an already tagged value or a raw literal. */
export type QueryOperand = FieldValue | Primitive;

export const intValue = (value: number): IntValue => ({ kind: "int", value: Math.trunc(value) });
export const floatValue = (value: number): FloatValue => ({ kind: "float", value });
export const boolValue = (value: boolean): BoolValue => ({ kind: "bool", value });
export const stringValue = (value: string): StringValue => ({ kind: "string", value });
export const vector2Value = (x: number, y: number): Vector2Value => ({ kind: "vector2", x, y });
export const vector3Value = (x: number, y: number, z: number): Vector3Value => ({ kind: "vector3", x, y, z });
export const colorValue = (r: number, g: number, b: number, a = 1): ColorValue => ({ kind: "color", r, g, b, a });
export const enumValue = (name: string, ordinal: number): EnumValue => ({ kind: "enum", name, ordinal });
export const referenceValue = (target: string): ReferenceValue => ({ kind: "reference", target });
export const listValue = (items: ReadonlyArray<FieldValue | null>): ListValue => ({ kind: "list", items });
export const objectValue = (fields: Readonly<Record<string, FieldValue | null>>): ObjectValue => ({
  kind: "object",
  fields,
});

/** Type guard distinguishing tagged values from raw literals. */
export function isFieldValue(operand: QueryOperand): operand is FieldValue {
  return operand !== null && typeof operand === "object";
}

/**
 * Lifts a raw literal into a tagged value. Integral numbers become `int`,
 * other numbers `float`.
 */
export function toFieldValue(operand: QueryOperand): FieldValue | null {
  if (operand === null) {
    return null;
  }
  if (isFieldValue(operand)) {
    return operand;
  }
  if (typeof operand === "string") {
    return stringValue(operand);
  }
  if (typeof operand === "boolean") {
    return boolValue(operand);
  }
  return Number.isInteger(operand) ? intValue(operand) : floatValue(operand);
}

/** Canonical textual form of a value, used by text operators and fallbacks. */
export function toText(value: FieldValue | null): string {
  if (value === null) {
    return "null";
  }
  switch (value.kind) {
    case "int":
    case "float":
      return String(value.value);
    case "bool":
      return value.value ? "true" : "false";
    case "string":
      return value.value;
    case "vector2":
      return `(${value.x}, ${value.y})`;
    case "vector3":
      return `(${value.x}, ${value.y}, ${value.z})`;
    case "color":
      return `RGBA(${value.r}, ${value.g}, ${value.b}, ${value.a})`;
    case "enum":
      return value.name;
    case "reference":
      return value.target;
    case "list":
      return `[${value.items.map((item) => toText(item)).join(", ")}]`;
    case "object": {
      const entries = Object.entries(value.fields).map(([key, entry]) => `${key}: ${toText(entry)}`);
      return `{${entries.join(", ")}}`;
    }
  }
}

/** Options accepted by {@link defineRecordType}. */
export interface RecordTypeOptions {
  readonly base?: RecordType | null;
  readonly category?: string;
  readonly priority?: number;
}

/** Convenience constructor registering a record type. */
export function defineRecordType(
  name: string,
  fields: readonly FieldDeclaration[],
  options: RecordTypeOptions = {},
): RecordType {
  return {
    name,
    base: options.base ?? null,
    fields,
    ...(options.category !== undefined ? { category: options.category } : {}),
    ...(options.priority !== undefined ? { priority: options.priority } : {}),
  };
}
