/**
 * JSON Schema loading and parsing
 *
 * Validates the raw document shape once with zod and normalizes it into
 * immutable SchemaNodes for the resolution engine.
 */

import { readFile } from "node:fs/promises";

import * as z from "zod";

import { SchemaParseError } from "./errors";

import type {
  AdditionalPropertiesSpec,
  ItemsSpec,
  SchemaDefinition,
  SchemaNode,
  TypeSpec,
  ValueCategory,
} from "@/generators/ir/types";

// =============================================================================
// Raw Schema Shape
// =============================================================================

/**
 * The subset of JSON Schema keywords structgen reads.
 * Unknown keywords are ignored.
 */
export interface RawSchemaObject {
  title?: string;
  description?: string;
  type?: string | string[];
  required?: string[];
  properties?: Record<string, RawSchema>;
  items?: RawSchema | RawSchema[];
  format?: string;
  definitions?: Record<string, RawSchema>;
  $defs?: Record<string, RawSchema>;
  additionalProperties?: RawSchema;
  $ref?: string;
}

/** Boolean schemas are allowed wherever a schema is */
export type RawSchema = boolean | RawSchemaObject;

/**
 * A raw schema after validation. Named schemas are read into maps rather
 * than rebuilt objects, so a key such as "__proto__" survives.
 */
export interface ValidatedSchemaObject
  extends Omit<
    RawSchemaObject,
    "properties" | "items" | "definitions" | "$defs" | "additionalProperties"
  > {
  properties?: Map<string, ValidatedSchema>;
  items?: ValidatedSchema | ValidatedSchema[];
  definitions?: Map<string, ValidatedSchema>;
  $defs?: Map<string, ValidatedSchema>;
  additionalProperties?: ValidatedSchema;
}

export type ValidatedSchema = boolean | ValidatedSchemaObject;

function isJsonObject(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const namedSchemasSchema = z.preprocess(
  (value) => (isJsonObject(value) ? new Map(Object.entries(value)) : value),
  z.map(z.string(), z.lazy(() => rawSchemaSchema)),
);

export const rawSchemaObjectSchema: z.ZodType<ValidatedSchemaObject> = z.lazy(() =>
  z.object({
    title: z.string().optional(),
    description: z.string().optional(),
    type: z.union([z.string(), z.array(z.string())]).optional(),
    required: z.array(z.string()).optional(),
    properties: namedSchemasSchema.optional(),
    items: z.union([rawSchemaSchema, z.array(rawSchemaSchema)]).optional(),
    format: z.string().optional(),
    definitions: namedSchemasSchema.optional(),
    $defs: namedSchemasSchema.optional(),
    additionalProperties: rawSchemaSchema.optional(),
    $ref: z.string().optional(),
  }),
);

export const rawSchemaSchema: z.ZodType<ValidatedSchema> = z.lazy(() =>
  z.union([z.boolean(), rawSchemaObjectSchema]),
);

// =============================================================================
// Normalization
// =============================================================================

const valueCategories: ReadonlySet<string> = new Set<ValueCategory>([
  "string",
  "integer",
  "number",
  "boolean",
  "null",
  "object",
  "array",
]);

function isValueCategory(value: string): value is ValueCategory {
  return valueCategories.has(value);
}

/**
 * Decide the `type` keyword once:
 * - "string" -> single
 * - ["string", "null"] / ["null", "string"] -> nullable-union
 * - ["string"] -> single
 * - anything else -> absent (untyped)
 */
export function parseTypeSpec(
  type: string | string[] | undefined,
  warnings: string[] = [],
): TypeSpec {
  if (type === undefined) {
    return { kind: "absent" };
  }

  const [first, second, ...rest] = typeof type === "string" ? [type] : type;
  let category: string | undefined;
  let nullable = false;

  if (first !== undefined && second === undefined) {
    category = first;
  } else if (
    first !== undefined &&
    second !== undefined &&
    rest.length === 0 &&
    (first === "null" || second === "null")
  ) {
    category = first === "null" ? second : first;
    nullable = true;
  }

  if (category === undefined) {
    return { kind: "absent" };
  }
  if (!isValueCategory(category)) {
    warnings.push(`Unknown type "${category}" is treated as untyped`);
    return { kind: "absent" };
  }
  return nullable
    ? { kind: "nullable-union", category }
    : { kind: "single", category };
}

const emptySchema: ValidatedSchemaObject = {};

function toNodes(
  schemas: ReadonlyMap<string, ValidatedSchema> | undefined,
  warnings: string[],
): Map<string, SchemaNode> {
  const nodes = new Map<string, SchemaNode>();
  for (const [name, schema] of schemas ?? new Map<string, ValidatedSchema>()) {
    nodes.set(name, toSchemaNode(schema, warnings));
  }
  return nodes;
}

function parseItems(items: ValidatedSchemaObject["items"], warnings: string[]): ItemsSpec {
  if (items === undefined) {
    return { kind: "absent" };
  }
  if (Array.isArray(items)) {
    return {
      kind: "tuple",
      schemas: items.map((item) => toSchemaNode(item, warnings)),
    };
  }
  return { kind: "single", schema: toSchemaNode(items, warnings) };
}

function parseAdditionalProperties(
  additional: ValidatedSchemaObject["additionalProperties"],
  warnings: string[],
): AdditionalPropertiesSpec {
  if (additional === undefined) {
    return { kind: "absent" };
  }
  if (typeof additional === "boolean") {
    return { kind: "boolean", allowed: additional };
  }
  return { kind: "schema", schema: toSchemaNode(additional, warnings) };
}

function parseDefinitions(
  schema: ValidatedSchemaObject,
  warnings: string[],
): Map<string, SchemaDefinition> {
  const definitions = new Map<string, SchemaDefinition>();
  for (const keyword of ["definitions", "$defs"] as const) {
    for (const [name, node] of toNodes(schema[keyword], warnings)) {
      definitions.set(`${keyword}/${name}`, { keyword, name, schema: node });
    }
  }
  return definitions;
}

/**
 * Normalize a validated raw schema into a SchemaNode
 */
export function toSchemaNode(raw: ValidatedSchema, warnings: string[] = []): SchemaNode {
  const schema = typeof raw === "boolean" ? emptySchema : raw;

  return {
    ...(schema.title !== undefined ? { title: schema.title } : {}),
    ...(schema.description !== undefined ? { description: schema.description } : {}),
    ...(schema.format !== undefined ? { format: schema.format } : {}),
    ...(schema.$ref !== undefined ? { ref: schema.$ref } : {}),
    type: parseTypeSpec(schema.type, warnings),
    required: schema.required ?? [],
    properties: toNodes(schema.properties, warnings),
    items: parseItems(schema.items, warnings),
    definitions: parseDefinitions(schema, warnings),
    additionalProperties: parseAdditionalProperties(
      schema.additionalProperties,
      warnings,
    ),
  };
}

// =============================================================================
// Documents
// =============================================================================

export interface ParsedSchemaDocument {
  root: SchemaNode;
  warnings: string[];
}

/**
 * Validate and normalize a JSON Schema document
 *
 * @param source - Where the document came from, used in error messages
 */
export function parseSchemaDocument(
  document: unknown,
  source = "schema",
): ParsedSchemaDocument {
  const result = rawSchemaObjectSchema.safeParse(document);
  if (!result.success) {
    throw new SchemaParseError(
      source,
      result.error.issues.map((issue) => {
        const path = issue.path.map(String).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }

  const warnings: string[] = [];
  const root = toSchemaNode(result.data, warnings);
  return { root, warnings: [...new Set(warnings)] };
}

/**
 * Read and parse a JSON Schema file
 */
export async function loadSchemaDocument(path: string): Promise<ParsedSchemaDocument> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (error) {
    throw new SchemaParseError(path, [
      error instanceof Error ? error.message : "Unable to read file",
    ]);
  }

  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new SchemaParseError(path, [
      error instanceof Error ? error.message : "Invalid JSON",
    ]);
  }

  return parseSchemaDocument(document, path);
}
