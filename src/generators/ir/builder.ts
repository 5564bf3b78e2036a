/**
 * Type graph builder
 *
 * Walks schema nodes recursively and produces one TypeDescriptor per
 * visited TypePath. A node whose dependencies aren't resolvable yet is
 * recorded in the context's deferred set and reported as unresolved
 * (undefined), which makes every caller up the recursion defer too.
 */

import { IdentifierError, UnsupportedSchemaError } from "@/core/errors";
import { singularize } from "@/utils/naming";
import { lookupReference, toFieldName, toTypeName } from "./context";
import { ROOT_PATH } from "./types";
import { childPath, compareFields, ir } from "./utils";

import type { ResolutionContext } from "./context";
import type {
  FieldDescriptor,
  PrimitiveType,
  SchemaNode,
  TypeDescriptor,
  TypePath,
  ValueCategory,
  ValueType,
} from "./types";

type DescriptorBase = Pick<
  TypeDescriptor,
  "path" | "name" | "originalName" | "parentPath" | "nullable" | "comment"
>;

// ============================================================================
// Entry Point
// ============================================================================

/**
 * Resolve a schema node into the descriptor table
 *
 * @returns the TypePath the node resolved to (its own path, or the target
 * of an internal reference), or undefined when the node was deferred
 */
export function resolveNode(
  ctx: ResolutionContext,
  node: SchemaNode,
  proposedName: string,
  proposedDescription: string | undefined,
  path: TypePath,
  parentPath: TypePath | "",
): TypePath | undefined {
  resolveDefinitions(ctx, node, path);

  if (node.ref !== undefined) {
    return path === ROOT_PATH
      ? resolveRootReference(ctx, node, node.ref, proposedDescription)
      : resolveReference(ctx, node, node.ref, proposedName, proposedDescription, path, parentPath);
  }

  const isRoot = path === ROOT_PATH;
  const originalName = isRoot ? ctx.options.rootTypeName : node.title || proposedName;
  const name = isRoot ? originalName : toTypeName(ctx, originalName);
  if (name === "") {
    throw new IdentifierError("type", originalName);
  }

  // The root is always nullable so a root that contains itself stays representable
  const nullable = isRoot || node.type.kind === "nullable-union";
  ctx.claims.set(path, { name, nullable });

  const comment = node.description || proposedDescription;
  const base: DescriptorBase = {
    path,
    name,
    originalName,
    parentPath,
    nullable,
    ...(comment ? { comment } : {}),
  };

  const descriptor = buildDescriptor(ctx, node, base);
  if (!descriptor) {
    ctx.deferred.set(path, {
      schema: node,
      name: proposedName,
      description: proposedDescription,
      parentPath,
    });
    return undefined;
  }

  complete(ctx, descriptor);
  return path;
}

function complete(ctx: ResolutionContext, descriptor: TypeDescriptor): void {
  ctx.descriptors.set(descriptor.path, descriptor);
  ctx.claims.delete(descriptor.path);
  ctx.deferred.delete(descriptor.path);
  ctx.names.add(descriptor.name, descriptor.path);
}

function warn(ctx: ResolutionContext, message: string): void {
  if (!ctx.warnings.includes(message)) {
    ctx.warnings.push(message);
  }
}

// ============================================================================
// Definitions & References
// ============================================================================

/**
 * Resolve nested definitions as independent types parented at `path`.
 * Definitions that can't complete yet defer themselves.
 */
function resolveDefinitions(
  ctx: ResolutionContext,
  node: SchemaNode,
  path: TypePath,
): void {
  for (const definition of node.definitions.values()) {
    const definitionPath = childPath(path, definition.keyword, definition.name);
    if (ctx.descriptors.has(definitionPath) || ctx.aliases.has(definitionPath)) {
      continue;
    }
    resolveNode(
      ctx,
      definition.schema,
      definition.name,
      definition.schema.description,
      definitionPath,
      path,
    );
  }
}

/**
 * References are aliases: no descriptor is created, the target path is returned
 */
function resolveReference(
  ctx: ResolutionContext,
  node: SchemaNode,
  ref: TypePath,
  proposedName: string,
  proposedDescription: string | undefined,
  path: TypePath,
  parentPath: TypePath | "",
): TypePath | undefined {
  const target = lookupReference(ctx, ref);
  if (!target) {
    ctx.deferred.set(path, {
      schema: node,
      name: proposedName,
      description: proposedDescription,
      parentPath,
    });
    return undefined;
  }

  ctx.aliases.set(path, target.path);
  ctx.deferred.delete(path);
  return target.path;
}

/**
 * A root that is only a reference still needs a type carrying the root name
 */
function resolveRootReference(
  ctx: ResolutionContext,
  node: SchemaNode,
  ref: TypePath,
  proposedDescription: string | undefined,
): TypePath | undefined {
  const { rootTypeName } = ctx.options;
  const target = lookupReference(ctx, ref);
  if (!target) {
    ctx.deferred.set(ROOT_PATH, {
      schema: node,
      name: rootTypeName,
      description: proposedDescription,
      parentPath: "",
    });
    return undefined;
  }

  const comment = node.description || proposedDescription;
  complete(ctx, {
    kind: "reference",
    path: ROOT_PATH,
    name: rootTypeName,
    originalName: rootTypeName,
    parentPath: "",
    nullable: true,
    target: target.path,
    ...(comment ? { comment } : {}),
  });
  return ROOT_PATH;
}

// ============================================================================
// Structural Dispatch
// ============================================================================

function categoryOf(node: SchemaNode): ValueCategory | undefined {
  return node.type.kind === "absent" ? undefined : node.type.category;
}

/**
 * Map a value category to a primitive type.
 * `format: "date-time"` wins over the category.
 */
function toPrimitive(
  ctx: ResolutionContext,
  category: ValueCategory | undefined,
  format: string | undefined,
): PrimitiveType {
  if (format === "date-time") {
    ctx.needsTimestampImport = true;
    return "timestamp";
  }

  switch (category) {
    case "string":
    case "integer":
    case "number":
    case "boolean":
    case "null":
      return category;
    default:
      return "any";
  }
}

function buildDescriptor(
  ctx: ResolutionContext,
  node: SchemaNode,
  base: DescriptorBase,
): TypeDescriptor | undefined {
  const category = categoryOf(node);
  const { path } = base;

  if (node.format === "date-time" || (category !== "object" && category !== "array")) {
    return {
      ...base,
      kind: "primitive",
      primitive: toPrimitive(ctx, category, node.format),
    };
  }

  if (category === "array") {
    const element = resolveItems(
      ctx,
      node,
      singularize(base.originalName),
      node.description,
      path,
      path,
    );
    return element && { ...base, kind: "collection", element };
  }

  const hasProperties = node.properties.size > 0;
  const additional = node.additionalProperties;

  if (hasProperties && additional.kind === "schema") {
    throw new UnsupportedSchemaError(
      path,
      "properties can't be combined with an additionalProperties schema",
    );
  }

  if (hasProperties) {
    const fields = buildFields(ctx, node, path);
    return fields && { ...base, kind: "struct", fields };
  }

  if (additional.kind === "schema") {
    const value = resolveNode(
      ctx,
      additional.schema,
      singularize(base.originalName),
      node.description,
      childPath(path, "additionalProperties"),
      path,
    );
    return value === undefined
      ? undefined
      : { ...base, kind: "map", value: ir.named(value) };
  }

  return { ...base, kind: "map", value: ir.any() };
}

/**
 * Resolve the element type of an array node.
 * Only a single schema (or a one-element tuple) yields a typed collection.
 */
function resolveItems(
  ctx: ResolutionContext,
  node: SchemaNode,
  elementName: string,
  description: string | undefined,
  path: TypePath,
  parentPath: TypePath,
): ValueType | undefined {
  const { items } = node;
  if (items.kind === "absent") {
    return ir.any();
  }

  let itemSchema: SchemaNode | undefined =
    items.kind === "single" ? items.schema : items.schemas[0];
  let itemPath = childPath(path, "items");
  if (items.kind === "tuple") {
    if (items.schemas.length !== 1) {
      if (items.schemas.length > 1) {
        warn(ctx, `${path}: tuple items with ${items.schemas.length} schemas are untyped`);
      }
      itemSchema = undefined;
    }
    itemPath = childPath(path, "items", "0");
  }
  if (!itemSchema) {
    return ir.any();
  }

  const element = resolveNode(ctx, itemSchema, elementName, description, itemPath, parentPath);
  return element === undefined ? undefined : ir.named(element);
}

// ============================================================================
// Struct Fields
// ============================================================================

/**
 * Build one field per declared property.
 * Any unresolved field dependency leaves the whole struct unresolved.
 */
function buildFields(
  ctx: ResolutionContext,
  node: SchemaNode,
  path: TypePath,
): FieldDescriptor[] | undefined {
  const required = new Set(node.required);
  const fields: FieldDescriptor[] = [];

  for (const [propertyName, property] of node.properties) {
    const field = buildField(ctx, property, propertyName, required.has(propertyName), path);
    if (!field) {
      return undefined;
    }
    fields.push(field);
  }

  const seen = new Map<string, string>();
  for (const field of fields) {
    const other = seen.get(field.name);
    if (other !== undefined) {
      warn(ctx, `${path}: properties "${other}" and "${field.propertyName}" both generate field ${field.name}`);
    }
    seen.set(field.name, field.propertyName);
  }

  return fields.sort(compareFields);
}

function buildField(
  ctx: ResolutionContext,
  property: SchemaNode,
  propertyName: string,
  required: boolean,
  path: TypePath,
): FieldDescriptor | undefined {
  const name = toFieldName(property.title || propertyName);

  if (property.ref !== undefined) {
    const target = lookupReference(ctx, property.ref);
    return (
      target && {
        name,
        propertyName,
        type: ir.named(target.path),
        nullable: target.nullable,
        required,
      }
    );
  }

  const type = resolveFieldType(
    ctx,
    property,
    name,
    propertyName,
    childPath(path, "properties", propertyName),
    path,
  );
  return (
    type && {
      name,
      propertyName,
      type,
      nullable: property.type.kind === "nullable-union",
      required,
    }
  );
}

/**
 * Field types are inline: nested objects become their own descriptor,
 * maps and arrays become containers of their resolved value type
 */
function resolveFieldType(
  ctx: ResolutionContext,
  property: SchemaNode,
  fieldName: string,
  propertyName: string,
  fieldPath: TypePath,
  path: TypePath,
): ValueType | undefined {
  const category = categoryOf(property);

  if (property.format === "date-time" || (category !== "object" && category !== "array")) {
    return ir.primitive(toPrimitive(ctx, category, property.format));
  }

  if (category === "array") {
    const element = resolveItems(
      ctx,
      property,
      singularize(propertyName),
      property.description,
      fieldPath,
      path,
    );
    return element && ir.collection(element);
  }

  const hasProperties = property.properties.size > 0;
  const additional = property.additionalProperties;

  if (hasProperties && additional.kind === "schema") {
    throw new UnsupportedSchemaError(
      fieldPath,
      "properties can't be combined with an additionalProperties schema",
    );
  }

  if (hasProperties) {
    const nested = resolveNode(ctx, property, fieldName, property.description, fieldPath, path);
    return nested === undefined ? undefined : ir.named(nested);
  }

  if (additional.kind === "schema") {
    const value = resolveNode(
      ctx,
      additional.schema,
      singularize(propertyName),
      property.description,
      childPath(fieldPath, "additionalProperties"),
      path,
    );
    return value === undefined ? undefined : ir.map(ir.named(value));
  }

  return ir.map(ir.any());
}
