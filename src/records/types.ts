/**
 * Shared type definitions describing catalogued records, their registered
 * schema and the tagged values their fields hold. The query and graph engines
 * only ever observe these structures: records are owned by the host that
 * produced them and are never mutated here.
 */

/** Kinds a field value can take once read from a record. */
export type ValueKind =
  | "int"
  | "float"
  | "bool"
  | "string"
  | "vector2"
  | "vector3"
  | "color"
  | "enum"
  | "object"
  | "reference"
  | "list";

/**
 * Kinds accepted in a field declaration. `delegate` marks callback slots that
 * carry no comparable value and are therefore never queryable.
 */
export type DeclaredKind = ValueKind | "delegate";

export interface IntValue {
  readonly kind: "int";
  readonly value: number;
}

export interface FloatValue {
  readonly kind: "float";
  readonly value: number;
}

export interface BoolValue {
  readonly kind: "bool";
  readonly value: boolean;
}

export interface StringValue {
  readonly kind: "string";
  readonly value: string;
}

export interface Vector2Value {
  readonly kind: "vector2";
  readonly x: number;
  readonly y: number;
}

export interface Vector3Value {
  readonly kind: "vector3";
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export interface ColorValue {
  readonly kind: "color";
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

/** Enum member identified by its declared name and position. */
export interface EnumValue {
  readonly kind: "enum";
  readonly name: string;
  readonly ordinal: number;
}

/** Inline nested object (not a record of its own). */
export interface ObjectValue {
  readonly kind: "object";
  readonly fields: Readonly<Record<string, FieldValue | null>>;
}

/** Pointer to another record, by identity key. */
export interface ReferenceValue {
  readonly kind: "reference";
  readonly target: string;
}

export interface ListValue {
  readonly kind: "list";
  readonly items: ReadonlyArray<FieldValue | null>;
}

export type FieldValue =
  | IntValue
  | FloatValue
  | BoolValue
  | StringValue
  | Vector2Value
  | Vector3Value
  | ColorValue
  | EnumValue
  | ObjectValue
  | ReferenceValue
  | ListValue;

/** Custom reader used when a field is computed rather than stored. */
export type FieldReader = (record: CatalogRecord) => FieldValue | null;

/** Registration of one field on a record type. */
export interface FieldDeclaration {
  readonly name: string;
  readonly kind: DeclaredKind;
  /** Schema of nested `object` values, or of list items when they are objects. */
  readonly schema?: RecordType;
  /** Member names of an `enum` field, in ordinal order. */
  readonly members?: readonly string[];
  /** Kind of the items held by a `list` field. */
  readonly itemKind?: ValueKind;
  readonly read?: FieldReader;
}

/**
 * Registered record type. Field lookups walk {@link base} until a declaration
 * matches, so a derived type may shadow a field declared by its parent.
 */
export interface RecordType {
  readonly name: string;
  readonly base: RecordType | null;
  readonly fields: readonly FieldDeclaration[];
  /** Category used to group the type in the catalog tree. */
  readonly category?: string;
  readonly priority?: number;
}

/**
 * Externally owned record. `id` is the stable identity key (usually a path)
 * used by the dependency graph; it is read, never derived by mutation.
 */
export interface CatalogRecord {
  readonly id: string;
  readonly name: string;
  readonly type: RecordType;
  readonly fields: Readonly<Record<string, FieldValue | null>>;
}

/** Collaborator listing and loading the records of a catalog. */
export interface RecordSource {
  listAllRecords(): Iterable<CatalogRecord>;
  loadByIdentity(key: string): CatalogRecord | null;
  /**
   * Registers a callback fired whenever the record set changes. Returns the
   * matching unsubscribe function. Sources that never change may omit it.
   */
  subscribe?(listener: () => void): () => void;
}

/** Collaborator reporting the records a given record points to. */
export interface ReferenceExtractor {
  referencesOf(record: CatalogRecord): Iterable<CatalogRecord>;
}
