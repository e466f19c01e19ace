import type {
  CatalogRecord,
  DeclaredKind,
  FieldDeclaration,
  FieldValue,
  RecordType,
  ValueKind,
} from "../records/types.js";

/** Names every host runtime uses for its own bookkeeping. */
const BUILTIN_RESERVED_FIELDS = ["constructor", "prototype"] as const;
/** Prefix marking host bookkeeping slots (`__proto__`, `__meta`, ...). */
const RESERVED_PREFIX = "__";

const VECTOR2_COMPONENTS = new Set(["x", "y"]);
const VECTOR3_COMPONENTS = new Set(["x", "y", "z"]);
const COLOR_CHANNELS = new Set(["r", "g", "b", "a"]);

/**
 * Resolved field. The head segment is bound to a declaration of
 * {@link owner}; remaining segments walk nested objects, vector components or
 * color channels.
 */
export interface FieldDescriptor {
  /** Field name as requested, dotted segments included. */
  readonly name: string;
  /** Declared kind of the value the descriptor reads. */
  readonly kind: ValueKind;
  /** Type whose declaration matched the head segment. */
  readonly owner: RecordType;
  readonly declaration: FieldDeclaration;
  readonly tail: readonly string[];
}

/** Field advertised by {@link FieldAccessor.listQueryableFields}. */
export interface QueryableField {
  readonly name: string;
  readonly kind: ValueKind;
  readonly typeName: string;
  readonly owner: RecordType;
}

export interface FieldAccessorOptions {
  /** Extra field names hidden from resolution. */
  readonly reservedFields?: readonly string[];
}

interface DeclarationMatch {
  readonly declaration: FieldDeclaration & { readonly kind: ValueKind };
  readonly owner: RecordType;
}

function isQueryableKind(kind: DeclaredKind): kind is ValueKind {
  return kind !== "delegate";
}

/**
 * Resolves field names against registered record types and reads their
 * values. Resolutions, misses included, are cached per (type, name) for the
 * lifetime of the accessor; call {@link clear} after a schema change.
 */
export class FieldAccessor {
  private readonly reserved: ReadonlySet<string>;
  private readonly descriptors = new Map<RecordType, Map<string, FieldDescriptor | null>>();
  private readonly queryable = new Map<RecordType, readonly QueryableField[]>();

  constructor(options: FieldAccessorOptions = {}) {
    this.reserved = new Set([...BUILTIN_RESERVED_FIELDS, ...(options.reservedFields ?? [])]);
  }

  /** Returns whether {@link name} is host bookkeeping rather than data. */
  isReserved(name: string): boolean {
    return name.startsWith(RESERVED_PREFIX) || this.reserved.has(name);
  }

  resolve(type: RecordType, fieldName: string): FieldDescriptor | null {
    let perType = this.descriptors.get(type);
    if (!perType) {
      perType = new Map();
      this.descriptors.set(type, perType);
    }
    const cached = perType.get(fieldName);
    if (cached !== undefined) {
      return cached;
    }
    const descriptor = this.computeDescriptor(type, fieldName);
    perType.set(fieldName, descriptor);
    return descriptor;
  }

  /**
   * Reads the value behind {@link descriptor}. Readers that throw and values
   * whose shape does not match the path degrade to `null`.
   */
  getValue(record: CatalogRecord, descriptor: FieldDescriptor): FieldValue | null {
    try {
      const head = descriptor.declaration;
      let value: FieldValue | null = head.read
        ? head.read(record)
        : Object.hasOwn(record.fields, head.name)
          ? record.fields[head.name]
          : null;
      for (const segment of descriptor.tail) {
        if (value === null || value === undefined) {
          return null;
        }
        value = stepInto(value, segment);
      }
      return value ?? null;
    } catch {
      return null;
    }
  }

  /** Resolves then reads a field; `null` when the field does not exist. */
  readField(record: CatalogRecord, fieldName: string): FieldValue | null {
    const descriptor = this.resolve(record.type, fieldName);
    return descriptor ? this.getValue(record, descriptor) : null;
  }

  /**
   * Lists the queryable fields of a type: its own declarations first, then
   * inherited ones that were not shadowed by any declaration, delegates included.
   */
  listQueryableFields(type: RecordType): readonly QueryableField[] {
    const cached = this.queryable.get(type);
    if (cached) {
      return cached;
    }
    const fields: QueryableField[] = [];
    const seen = new Set<string>();
    for (const field of type.fields) {
      if (this.isReserved(field.name) || seen.has(field.name)) {
        continue;
      }
      // A delegate still shadows the inherited field of the same name.
      seen.add(field.name);
      if (!isQueryableKind(field.kind)) {
        continue;
      }
      fields.push({ name: field.name, kind: field.kind, typeName: describeDeclaration(field), owner: type });
    }
    if (type.base) {
      for (const inherited of this.listQueryableFields(type.base)) {
        if (!seen.has(inherited.name)) {
          seen.add(inherited.name);
          fields.push(inherited);
        }
      }
    }
    this.queryable.set(type, fields);
    return fields;
  }

  /** Drops every cached resolution. */
  clear(): void {
    this.descriptors.clear();
    this.queryable.clear();
  }

  private computeDescriptor(type: RecordType, fieldName: string): FieldDescriptor | null {
    const segments = fieldName.split(".");
    if (segments.some((segment) => segment.length === 0)) {
      return null;
    }
    const [headName, ...tail] = segments;
    const head = this.findDeclaration(type, headName);
    if (!head) {
      return null;
    }

    let kind: ValueKind = head.declaration.kind;
    let schema = head.declaration.schema;
    for (const segment of tail) {
      if (kind === "object" && schema) {
        const nested = this.findDeclaration(schema, segment);
        if (!nested) {
          return null;
        }
        kind = nested.declaration.kind;
        schema = nested.declaration.schema;
        continue;
      }
      if (componentsOf(kind)?.has(segment)) {
        kind = "float";
        schema = undefined;
        continue;
      }
      return null;
    }

    return { name: fieldName, kind, owner: head.owner, declaration: head.declaration, tail };
  }

  /**
   * Walks the base chain; the most-derived declaration wins, and a delegate
   * declaration hides any base field of the same name.
   */
  private findDeclaration(type: RecordType, name: string): DeclarationMatch | null {
    if (this.isReserved(name)) {
      return null;
    }
    for (let current: RecordType | null = type; current; current = current.base) {
      const declaration = current.fields.find((field) => field.name === name);
      if (!declaration) {
        continue;
      }
      const kind = declaration.kind;
      return isQueryableKind(kind) ? { declaration: { ...declaration, kind }, owner: current } : null;
    }
    return null;
  }
}

function componentsOf(kind: ValueKind): ReadonlySet<string> | undefined {
  switch (kind) {
    case "vector2":
      return VECTOR2_COMPONENTS;
    case "vector3":
      return VECTOR3_COMPONENTS;
    case "color":
      return COLOR_CHANNELS;
    default:
      return undefined;
  }
}

function stepInto(value: FieldValue, segment: string): FieldValue | null {
  switch (value.kind) {
    case "object":
      return Object.hasOwn(value.fields, segment) ? value.fields[segment] : null;
    case "vector2":
      return segment === "x" ? { kind: "float", value: value.x } : segment === "y" ? { kind: "float", value: value.y } : null;
    case "vector3":
      if (segment === "x" || segment === "y" || segment === "z") {
        return { kind: "float", value: value[segment] };
      }
      return null;
    case "color":
      if (segment === "r" || segment === "g" || segment === "b" || segment === "a") {
        return { kind: "float", value: value[segment] };
      }
      return null;
    default:
      return null;
  }
}

const KIND_DISPLAY_NAMES: Record<ValueKind, string> = {
  int: "int",
  float: "float",
  bool: "bool",
  string: "string",
  vector2: "Vector2",
  vector3: "Vector3",
  color: "Color",
  enum: "enum",
  object: "object",
  reference: "Ref",
  list: "List",
};

/** Display name of a declared field type (`int`, `Vector3`, `List<Item>`, ...). */
export function describeDeclaration(declaration: FieldDeclaration): string {
  switch (declaration.kind) {
    case "delegate":
      return "delegate";
    case "object":
      return declaration.schema?.name ?? KIND_DISPLAY_NAMES.object;
    case "reference":
      return declaration.schema ? `Ref<${declaration.schema.name}>` : KIND_DISPLAY_NAMES.reference;
    case "list": {
      const item = declaration.schema?.name ?? (declaration.itemKind ? KIND_DISPLAY_NAMES[declaration.itemKind] : "unknown");
      return `List<${item}>`;
    }
    default:
      return KIND_DISPLAY_NAMES[declaration.kind];
  }
}

/** Process-wide accessor used when no accessor is passed explicitly. */
export const defaultFieldAccessor = new FieldAccessor();
