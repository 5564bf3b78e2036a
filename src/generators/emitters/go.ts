/**
 * Go emitter
 *
 * Converts resolved type descriptors to Go type declarations.
 */

import { isStructDescriptor } from "@/generators/ir/types";
import { alignColumns, createWriter } from "@/utils/writer";

import type {
  FieldDescriptor,
  PrimitiveType,
  StructDescriptor,
  TypeDescriptor,
  TypePath,
  ValueType,
} from "@/generators/ir/types";
import type { Emitter } from "./types";

const primitiveTypes: Record<PrimitiveType, string> = {
  string: "string",
  integer: "int",
  number: "float64",
  boolean: "bool",
  null: "interface{}",
  any: "interface{}",
  timestamp: "time.Time",
};

const untyped = "interface{}";

// ============================================================================
// Go Emitter
// ============================================================================

export const goEmitter: Emitter = {
  fileExtension: ".go",

  emit(result, options) {
    const names = new Map<TypePath, string>(
      result.descriptors.map((descriptor) => [descriptor.path, descriptor.name]),
    );
    const byPath = new Map<TypePath, TypeDescriptor>(
      result.descriptors.map((descriptor) => [descriptor.path, descriptor]),
    );
    const writer = createWriter();
    const warnings: string[] = [];

    writer.writeLine(`package ${options.packageName}`);
    writer.blankLine();
    writer.writeLine(`// generated by "${options.command}" -- DO NOT EDIT`);

    if (result.needsTimestampImport) {
      writer.blankLine();
      writer.writeLine('import "time"');
    }

    for (const descriptor of result.descriptors) {
      writer.blankLine();
      for (const line of commentLines(descriptor.comment)) {
        writer.writeLine(line);
      }
      if (isStructDescriptor(descriptor)) {
        const cycle = findValueCycle(descriptor, byPath);
        if (cycle) {
          warnings.push(recursiveValueWarning(descriptor, cycle));
        }
        writer.writeLine(`type ${descriptor.name} struct {`);
        for (const line of fieldLines(descriptor.fields, names)) {
          writer.writeLine(`\t${line}`);
        }
        writer.writeLine("}");
      } else {
        writer.writeLine(`type ${descriptor.name} ${typeText(descriptor, names)}`);
      }
    }

    return {
      content: writer.toString(),
      warnings,
    };
  },
};

// ============================================================================
// Type Text
// ============================================================================

function commentLines(comment: string | undefined): string[] {
  if (!comment) return [];
  return comment
    .trim()
    .split(/\r?\n/)
    .map((line) => `// ${line}`.trimEnd());
}

function lookupName(names: ReadonlyMap<TypePath, string>, path: TypePath): string {
  const name = names.get(path);
  if (name === undefined) {
    throw new Error(`No type emitted for ${path}`);
  }
  return name;
}

/**
 * Render a value type as Go type text
 */
export function valueTypeText(
  type: ValueType,
  names: ReadonlyMap<TypePath, string>,
): string {
  switch (type.kind) {
    case "primitive":
      return primitiveTypes[type.primitive];
    case "named":
      return lookupName(names, type.path);
    case "collection":
      return `[]${valueTypeText(type.element, names)}`;
    case "map":
      return `map[string]${valueTypeText(type.value, names)}`;
  }
}

function typeText(
  descriptor: Exclude<TypeDescriptor, { kind: "struct" }>,
  names: ReadonlyMap<TypePath, string>,
): string {
  switch (descriptor.kind) {
    case "primitive":
      return primitiveTypes[descriptor.primitive];
    case "collection":
      return `[]${valueTypeText(descriptor.element, names)}`;
    case "map":
      return `map[string]${valueTypeText(descriptor.value, names)}`;
    case "reference":
      return lookupName(names, descriptor.target);
  }
}

// ============================================================================
// Recursive Values
// ============================================================================

interface ValueEdge {
  owner: StructDescriptor;
  field: FieldDescriptor;
  target: StructDescriptor;
}

/** Follow reference descriptors to the struct a path finally names */
function structBehind(
  path: TypePath,
  byPath: ReadonlyMap<TypePath, TypeDescriptor>,
): StructDescriptor | undefined {
  const seen = new Set<TypePath>();
  let descriptor = byPath.get(path);
  while (descriptor?.kind === "reference" && !seen.has(descriptor.path)) {
    seen.add(descriptor.path);
    descriptor = byPath.get(descriptor.target);
  }
  return descriptor && isStructDescriptor(descriptor) ? descriptor : undefined;
}

/** Fields that embed another struct by value (slices, maps and pointers don't) */
function valueEdges(
  owner: StructDescriptor,
  byPath: ReadonlyMap<TypePath, TypeDescriptor>,
): ValueEdge[] {
  return owner.fields.flatMap((field) => {
    if (field.nullable || field.type.kind !== "named") return [];
    const target = structBehind(field.type.path, byPath);
    return target ? [{ owner, field, target }] : [];
  });
}

/**
 * Find a chain of by-value fields leading from a struct back to itself
 */
function findValueCycle(
  start: StructDescriptor,
  byPath: ReadonlyMap<TypePath, TypeDescriptor>,
): ValueEdge[] | undefined {
  const visited = new Set<TypePath>([start.path]);

  const visit = (current: StructDescriptor, trail: ValueEdge[]): ValueEdge[] | undefined => {
    for (const edge of valueEdges(current, byPath)) {
      const chain = [...trail, edge];
      if (edge.target.path === start.path) return chain;
      if (visited.has(edge.target.path)) continue;
      visited.add(edge.target.path);
      const found = visit(edge.target, chain);
      if (found) return found;
    }
    return undefined;
  };

  return visit(start, []);
}

function recursiveValueWarning(descriptor: StructDescriptor, cycle: ValueEdge[]): string {
  const chain = cycle.map((edge) => `${edge.owner.name}.${edge.field.name}`).join(" -> ");
  return `${chain} contains ${descriptor.name} by value, which Go rejects as an invalid recursive type`;
}

/**
 * Render struct fields as aligned `Name Type Tag` lines
 */
function fieldLines(
  fields: readonly FieldDescriptor[],
  names: ReadonlyMap<TypePath, string>,
): string[] {
  return alignColumns(
    fields.map((field) => {
      let type = valueTypeText(field.type, names);
      if (field.nullable && type !== untyped) {
        type = `*${type}`;
      }
      const tag = field.required
        ? `\`json:"${field.propertyName}"\``
        : `\`json:"${field.propertyName},omitempty"\``;
      return [field.name, type, tag];
    }),
  );
}
