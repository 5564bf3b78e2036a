/**
 * IR utilities for type resolution
 *
 * Contains path construction, reference extraction, emission ordering,
 * and ValueType builders.
 */

import type {
  FieldDescriptor,
  PrimitiveType,
  TypeDescriptor,
  TypePath,
  ValueType,
} from "./types";

// ============================================================================
// Paths
// ============================================================================

/**
 * Escape a single JSON Pointer segment
 */
export function escapePathSegment(segment: string): string {
  return segment.replace(/~/g, "~0").replace(/\//g, "~1");
}

/**
 * Append segments to a TypePath
 * e.g. childPath("#", "properties", "a/b") -> "#/properties/a~1b"
 */
export function childPath(parent: TypePath, ...segments: string[]): TypePath {
  return [parent, ...segments.map(escapePathSegment)].join("/");
}

// ============================================================================
// Reference Extraction
// ============================================================================

/**
 * Extract the TypePaths a value type refers to
 */
export function extractValueReferences(type: ValueType): Set<TypePath> {
  const refs = new Set<TypePath>();

  function visit(t: ValueType): void {
    switch (t.kind) {
      case "named":
        refs.add(t.path);
        break;
      case "collection":
        visit(t.element);
        break;
      case "map":
        visit(t.value);
        break;
      case "primitive":
        break;
    }
  }

  visit(type);
  return refs;
}

/**
 * Extract every TypePath a descriptor refers to
 */
export function extractReferences(descriptor: TypeDescriptor): Set<TypePath> {
  switch (descriptor.kind) {
    case "struct": {
      const refs = new Set<TypePath>();
      for (const field of descriptor.fields) {
        for (const ref of extractValueReferences(field.type)) {
          refs.add(ref);
        }
      }
      return refs;
    }
    case "collection":
      return extractValueReferences(descriptor.element);
    case "map":
      return extractValueReferences(descriptor.value);
    case "reference":
      return new Set([descriptor.target]);
    case "primitive":
      return new Set();
  }
}

// ============================================================================
// Ordering
// ============================================================================

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Order fields by generated name, then by wire name
 */
export function compareFields(a: FieldDescriptor, b: FieldDescriptor): number {
  return (
    compareStrings(a.name, b.name) ||
    compareStrings(a.propertyName, b.propertyName)
  );
}

/**
 * Order descriptors for emission: by name, then by path
 */
export function sortDescriptors(
  descriptors: Iterable<TypeDescriptor>,
): TypeDescriptor[] {
  return [...descriptors].sort(
    (a, b) => compareStrings(a.name, b.name) || compareStrings(a.path, b.path),
  );
}

// ============================================================================
// ValueType Builders
// ============================================================================

/**
 * Convenience builders for creating ValueType nodes
 */
export const ir = {
  primitive: (primitive: PrimitiveType): ValueType => ({
    kind: "primitive",
    primitive,
  }),

  any: (): ValueType => ({ kind: "primitive", primitive: "any" }),

  named: (path: TypePath): ValueType => ({ kind: "named", path }),

  collection: (element: ValueType): ValueType => ({
    kind: "collection",
    element,
  }),

  map: (value: ValueType): ValueType => ({ kind: "map", value }),
};
