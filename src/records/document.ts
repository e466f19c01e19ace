import { readFile } from "node:fs/promises";

import { z } from "zod";

import { CatalogValidationError, ERROR_CODES, toValidationIssues, type ValidationIssue } from "../errors.js";
import type {
  CatalogRecord,
  DeclaredKind,
  FieldDeclaration,
  FieldValue,
  RecordType,
  ValueKind,
} from "./types.js";
import {
  boolValue,
  colorValue,
  enumValue,
  floatValue,
  intValue,
  listValue,
  objectValue,
  referenceValue,
  stringValue,
  toFieldValue,
  vector2Value,
  vector3Value,
} from "./values.js";

export const VALUE_KINDS = [
  "int",
  "float",
  "bool",
  "string",
  "vector2",
  "vector3",
  "color",
  "enum",
  "object",
  "reference",
  "list",
] as const satisfies readonly ValueKind[];

export const DECLARED_KINDS = [...VALUE_KINDS, "delegate"] as const satisfies readonly DeclaredKind[];

const FieldDeclarationSchema = z
  .object({
    name: z.string().trim().min(1, "field name must not be empty"),
    kind: z.enum(DECLARED_KINDS),
    schema: z.string().min(1).optional(),
    members: z.array(z.string().min(1)).optional(),
    itemKind: z.enum(VALUE_KINDS).optional(),
  })
  .strict();

const RecordTypeSchema = z
  .object({
    name: z.string().trim().min(1, "type name must not be empty"),
    base: z.string().min(1).optional(),
    category: z.string().min(1).optional(),
    priority: z.number().int().optional(),
    fields: z.array(FieldDeclarationSchema).default([]),
  })
  .strict();

const RecordEntrySchema = z
  .object({
    id: z.string().trim().min(1, "record id must not be empty"),
    name: z.string().optional(),
    type: z.string().min(1),
    fields: z.record(z.unknown()).default({}),
  })
  .strict();

/** On-disk layout of a catalog: registered types followed by their records. */
export const CatalogDocumentSchema = z
  .object({
    types: z.array(RecordTypeSchema),
    records: z.array(RecordEntrySchema).default([]),
  })
  .strict();

export type CatalogDocumentInput = z.input<typeof CatalogDocumentSchema>;

export interface CatalogDocument {
  readonly types: readonly RecordType[];
  readonly records: readonly CatalogRecord[];
}

/** Record type under construction; base and schema links are patched in a second pass. */
interface TypeShell {
  name: string;
  base: RecordType | null;
  fields: FieldDeclaration[];
  category?: string;
  priority?: number;
}

/** Shape shared by field declarations and the synthetic declarations of list items. */
interface ValueShape {
  readonly kind: DeclaredKind;
  readonly schema?: RecordType;
  readonly members?: readonly string[];
  readonly itemKind?: ValueKind;
}

/**
 * Validates and decodes a parsed catalog document. Every problem found is
 * collected and reported at once through a {@link CatalogValidationError}.
 */
export function decodeCatalogDocument(input: unknown): CatalogDocument {
  const parsed = CatalogDocumentSchema.safeParse(input);
  if (!parsed.success) {
    throw new CatalogValidationError(ERROR_CODES.INVALID_DOCUMENT, toValidationIssues(parsed.error));
  }
  const issues: ValidationIssue[] = [];
  const types = decodeTypes(parsed.data.types, issues);
  const records: CatalogRecord[] = [];
  const seenIds = new Set<string>();

  parsed.data.records.forEach((entry, index) => {
    const path = `records.${index}`;
    const type = types.get(entry.type);
    if (!type) {
      issues.push({ path: `${path}.type`, message: `unknown record type '${entry.type}'` });
      return;
    }
    if (seenIds.has(entry.id)) {
      issues.push({ path: `${path}.id`, message: `duplicate record id '${entry.id}'` });
      return;
    }
    seenIds.add(entry.id);
    records.push({
      id: entry.id,
      name: entry.name ?? defaultRecordName(entry.id),
      type,
      fields: decodeFields(entry.fields, type, `${path}.fields`, issues),
    });
  });

  if (issues.length > 0) {
    throw new CatalogValidationError(ERROR_CODES.INVALID_DOCUMENT, issues);
  }
  return { types: Array.from(types.values()), records };
}

/** Reads a JSON catalog from disk and decodes it. */
export async function loadCatalogDocument(path: string): Promise<CatalogDocument> {
  const text = await readFile(path, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CatalogValidationError(ERROR_CODES.INVALID_DOCUMENT, [{ path: "", message: `invalid JSON: ${message}` }]);
  }
  return decodeCatalogDocument(json);
}

/** `monsters/goblin.asset` becomes `goblin`. */
export function defaultRecordName(id: string): string {
  const segments = id.split(/[\\/]/);
  const last = segments[segments.length - 1] ?? id;
  const dot = last.lastIndexOf(".");
  return dot > 0 ? last.slice(0, dot) : last;
}

function decodeTypes(
  entries: ReadonlyArray<z.infer<typeof RecordTypeSchema>>,
  issues: ValidationIssue[],
): Map<string, TypeShell> {
  const shells = new Map<string, TypeShell>();
  const accepted: Array<{ readonly entry: z.infer<typeof RecordTypeSchema>; readonly index: number }> = [];
  entries.forEach((entry, index) => {
    if (shells.has(entry.name)) {
      issues.push({ path: `types.${index}.name`, message: `duplicate type '${entry.name}'` });
      return;
    }
    shells.set(entry.name, {
      name: entry.name,
      base: null,
      fields: [],
      ...(entry.category !== undefined ? { category: entry.category } : {}),
      ...(entry.priority !== undefined ? { priority: entry.priority } : {}),
    });
    accepted.push({ entry, index });
  });

  for (const { entry, index } of accepted) {
    const shell = shells.get(entry.name);
    if (!shell) {
      continue;
    }
    const path = `types.${index}`;
    if (entry.base !== undefined) {
      const base = shells.get(entry.base);
      if (base) {
        shell.base = base;
      } else {
        issues.push({ path: `${path}.base`, message: `unknown base type '${entry.base}'` });
      }
    }
    entry.fields.forEach((field, fieldIndex) => {
      const fieldPath = `${path}.fields.${fieldIndex}`;
      let schema: RecordType | undefined;
      if (field.schema !== undefined) {
        schema = shells.get(field.schema);
        if (!schema) {
          issues.push({ path: `${fieldPath}.schema`, message: `unknown schema type '${field.schema}'` });
        }
      }
      const isEnum = field.kind === "enum" || (field.kind === "list" && field.itemKind === "enum");
      if (isEnum && (!field.members || field.members.length === 0)) {
        issues.push({ path: `${fieldPath}.members`, message: "enum fields must list their members" });
      }
      shell.fields.push({
        name: field.name,
        kind: field.kind,
        ...(schema ? { schema } : {}),
        ...(field.members ? { members: field.members } : {}),
        ...(field.itemKind ? { itemKind: field.itemKind } : {}),
      });
    });
  }

  for (const shell of shells.values()) {
    const chain = new Set<string>();
    for (let current: RecordType | null = shell; current; current = current.base) {
      if (chain.has(current.name)) {
        issues.push({ path: "types", message: `type '${shell.name}' inherits from itself` });
        shell.base = null;
        break;
      }
      chain.add(current.name);
    }
  }
  return shells;
}

function findDeclaration(type: RecordType, name: string): FieldDeclaration | null {
  for (let current: RecordType | null = type; current; current = current.base) {
    const declaration = current.fields.find((field) => field.name === name);
    if (declaration) {
      return declaration;
    }
  }
  return null;
}

function decodeFields(
  raw: Readonly<Record<string, unknown>>,
  type: RecordType,
  path: string,
  issues: ValidationIssue[],
): Record<string, FieldValue | null> {
  const fields: Record<string, FieldValue | null> = {};
  for (const [name, value] of Object.entries(raw)) {
    const declaration = findDeclaration(type, name);
    if (!declaration) {
      issues.push({ path: `${path}.${name}`, message: `'${type.name}' declares no field '${name}'` });
      continue;
    }
    fields[name] = decodeValue(value, declaration, `${path}.${name}`, issues);
  }
  return fields;
}

function decodeValue(raw: unknown, shape: ValueShape, path: string, issues: ValidationIssue[]): FieldValue | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  const reject = (expected: string): null => {
    issues.push({ path, message: `expected ${expected}` });
    return null;
  };

  switch (shape.kind) {
    case "delegate":
      return reject("no value for a delegate field");
    case "int":
      return isFiniteNumber(raw) && Number.isInteger(raw) ? intValue(raw) : reject("an integer");
    case "float":
      return isFiniteNumber(raw) ? floatValue(raw) : reject("a number");
    case "bool":
      return typeof raw === "boolean" ? boolValue(raw) : reject("a boolean");
    case "string":
      return typeof raw === "string" ? stringValue(raw) : reject("a string");
    case "reference":
      return typeof raw === "string" && raw.length > 0 ? referenceValue(raw) : reject("a record id");
    case "vector2": {
      const components = numericComponents(raw, ["x", "y"]);
      return components ? vector2Value(components[0], components[1]) : reject("[x, y] or { x, y }");
    }
    case "vector3": {
      const components = numericComponents(raw, ["x", "y", "z"]);
      return components
        ? vector3Value(components[0], components[1], components[2])
        : reject("[x, y, z] or { x, y, z }");
    }
    case "color": {
      const components = numericComponents(raw, ["r", "g", "b", "a"], { a: 1 });
      return components
        ? colorValue(components[0], components[1], components[2], components[3])
        : reject("[r, g, b, a?] or { r, g, b, a? }");
    }
    case "enum":
      return decodeEnum(raw, shape.members ?? [], reject);
    case "object":
      if (!isPlainObject(raw)) {
        return reject("an object");
      }
      return shape.schema
        ? objectValue(decodeFields(raw, shape.schema, path, issues))
        : inferValue(raw, path, issues);
    case "list": {
      if (!Array.isArray(raw)) {
        return reject("an array");
      }
      const items: unknown[] = raw;
      const itemShape = listItemShape(shape);
      return listValue(
        items.map((item, index) =>
          itemShape ? decodeValue(item, itemShape, `${path}.${index}`, issues) : inferValue(item, `${path}.${index}`, issues),
        ),
      );
    }
  }
}

function listItemShape(shape: ValueShape): ValueShape | null {
  const kind = shape.itemKind ?? (shape.schema ? "object" : null);
  if (!kind) {
    return null;
  }
  return {
    kind,
    ...(shape.schema ? { schema: shape.schema } : {}),
    ...(shape.members ? { members: shape.members } : {}),
  };
}

function decodeEnum(raw: unknown, members: readonly string[], reject: (expected: string) => null): FieldValue | null {
  if (typeof raw === "string") {
    const ordinal = members.indexOf(raw);
    return ordinal >= 0 ? enumValue(raw, ordinal) : reject(`one of ${members.join(", ")}`);
  }
  if (isFiniteNumber(raw) && Number.isInteger(raw) && raw >= 0 && raw < members.length) {
    return enumValue(members[raw], raw);
  }
  return reject(`one of ${members.join(", ")}`);
}

/** Decodes values of undeclared shape from their JSON type. */
function inferValue(raw: unknown, path: string, issues: ValidationIssue[]): FieldValue | null {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (typeof raw === "string" || typeof raw === "boolean" || isFiniteNumber(raw)) {
    return toFieldValue(raw);
  }
  if (Array.isArray(raw)) {
    const items: unknown[] = raw;
    return listValue(items.map((item, index) => inferValue(item, `${path}.${index}`, issues)));
  }
  if (isPlainObject(raw)) {
    const fields: Record<string, FieldValue | null> = {};
    for (const [name, value] of Object.entries(raw)) {
      fields[name] = inferValue(value, `${path}.${name}`, issues);
    }
    return objectValue(fields);
  }
  issues.push({ path, message: "unsupported value" });
  return null;
}

function numericComponents(
  raw: unknown,
  names: readonly string[],
  defaults: Readonly<Record<string, number>> = {},
): number[] | null {
  const values = componentValues(raw, names, defaults);
  return values !== null && values.every(isFiniteNumber) ? values : null;
}

function componentValues(
  raw: unknown,
  names: readonly string[],
  defaults: Readonly<Record<string, number>>,
): unknown[] | null {
  if (Array.isArray(raw)) {
    const items: unknown[] = raw;
    if (items.length > names.length) {
      return null;
    }
    return names.map((name, index) => (index < items.length ? items[index] : defaults[name]));
  }
  if (isPlainObject(raw)) {
    return names.map((name) => (Object.hasOwn(raw, name) ? raw[name] : defaults[name]));
  }
  return null;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
