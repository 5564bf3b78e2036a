/**
 * Type graph Intermediate Representation (IR)
 *
 * Schema documents are parsed into SchemaNode trees, which the resolution
 * engine turns into a table of TypeDescriptors keyed by TypePath. Emitters
 * only ever see fully resolved descriptors.
 */

// ============================================================================
// Paths
// ============================================================================

/**
 * Canonical address of a schema node within its document,
 * e.g. "#", "#/properties/address", "#/definitions/Item/items"
 */
export type TypePath = string;

/** TypePath of the document root */
export const ROOT_PATH: TypePath = "#";

// ============================================================================
// Schema Nodes
// ============================================================================

/**
 * Value categories a schema `type` can name
 */
export type ValueCategory =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "null"
  | "object"
  | "array";

/**
 * The `type` keyword, decided once at parse time
 */
export type TypeSpec =
  | { kind: "absent" }
  | { kind: "single"; category: ValueCategory }
  | { kind: "nullable-union"; category: ValueCategory };

export type ItemsSpec =
  | { kind: "absent" }
  | { kind: "single"; schema: SchemaNode }
  | { kind: "tuple"; schemas: readonly SchemaNode[] };

export type AdditionalPropertiesSpec =
  | { kind: "absent" }
  | { kind: "boolean"; allowed: boolean }
  | { kind: "schema"; schema: SchemaNode };

/**
 * A definition nested under `definitions` or `$defs`
 */
export interface SchemaDefinition {
  /** Path segment the definition lives under ("definitions" or "$defs") */
  keyword: "definitions" | "$defs";
  name: string;
  schema: SchemaNode;
}

/**
 * One parsed, immutable schema node
 */
export interface SchemaNode {
  readonly title?: string;
  readonly description?: string;
  readonly type: TypeSpec;
  readonly required: readonly string[];
  readonly properties: ReadonlyMap<string, SchemaNode>;
  readonly items: ItemsSpec;
  readonly format?: string;
  /** Keyed by "<keyword>/<name>" */
  readonly definitions: ReadonlyMap<string, SchemaDefinition>;
  readonly additionalProperties: AdditionalPropertiesSpec;
  /** Internal reference to another node's TypePath */
  readonly ref?: TypePath;
}

// ============================================================================
// Resolved Types
// ============================================================================

/**
 * Built-in value types every target language can name
 */
export type PrimitiveType =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "null"
  | "any"
  | "timestamp";

/**
 * The type of a value: a primitive, another descriptor, or a container of either
 */
export type ValueType =
  | { kind: "primitive"; primitive: PrimitiveType }
  | { kind: "named"; path: TypePath }
  | { kind: "collection"; element: ValueType }
  | { kind: "map"; value: ValueType };

export interface FieldDescriptor {
  /** Generated field identifier */
  name: string;
  /** Property name as it appears on the wire */
  propertyName: string;
  type: ValueType;
  nullable: boolean;
  required: boolean;
}

interface TypeDescriptorBase {
  path: TypePath;
  /** Generated (possibly disambiguated) type name */
  name: string;
  /** Name the type was generated from, before disambiguation */
  originalName: string;
  /** TypePath of the structural parent; empty for the document root */
  parentPath: TypePath | "";
  nullable: boolean;
  comment?: string;
}

export interface PrimitiveDescriptor extends TypeDescriptorBase {
  kind: "primitive";
  primitive: PrimitiveType;
}

export interface StructDescriptor extends TypeDescriptorBase {
  kind: "struct";
  /** Sorted by field name */
  fields: FieldDescriptor[];
}

export interface CollectionDescriptor extends TypeDescriptorBase {
  kind: "collection";
  element: ValueType;
}

export interface MapDescriptor extends TypeDescriptorBase {
  kind: "map";
  value: ValueType;
}

export interface ReferenceDescriptor extends TypeDescriptorBase {
  kind: "reference";
  target: TypePath;
}

export type TypeDescriptor =
  | PrimitiveDescriptor
  | StructDescriptor
  | CollectionDescriptor
  | MapDescriptor
  | ReferenceDescriptor;

// ============================================================================
// Resolution State
// ============================================================================

/**
 * A node whose resolution waits on an unresolved dependency,
 * together with the naming context it was first visited with
 */
export interface DeferredEntry {
  schema: SchemaNode;
  name: string;
  description?: string;
  parentPath: TypePath | "";
}

/**
 * A path whose name is known while its descriptor is still being built.
 * References to claimed paths are resolvable, which lets recursive types close.
 */
export interface TypeClaim {
  name: string;
  nullable: boolean;
}

/**
 * Naming and export policy
 */
export interface NamingOptions {
  /** Name of the root type, used as given */
  rootTypeName: string;
  /** Prepended to every non-root exported type name */
  typeNamePrefix?: string;
  /** Export generated type names (enables the prefix) */
  exportTypes?: boolean;
}

/**
 * Output of the resolution engine
 */
export interface ResolutionResult {
  /** Fully resolved descriptors in emission order (by name) */
  descriptors: TypeDescriptor[];
  /** Whether any type uses the timestamp primitive */
  needsTimestampImport: boolean;
  /** Non-fatal issues found while resolving */
  warnings: string[];
}

// ============================================================================
// Type Guards
// ============================================================================

export function isStructDescriptor(
  descriptor: TypeDescriptor,
): descriptor is StructDescriptor {
  return descriptor.kind === "struct";
}
