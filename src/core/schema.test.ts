import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { SchemaParseError } from "./errors";
import { loadSchemaDocument, parseSchemaDocument, parseTypeSpec } from "./schema";

describe("parseTypeSpec", () => {
  it("returns absent without a type", () => {
    expect(parseTypeSpec(undefined)).toEqual({ kind: "absent" });
  });

  it("parses a single type name", () => {
    expect(parseTypeSpec("string")).toEqual({ kind: "single", category: "string" });
  });

  it("parses a one-element type array as a single type", () => {
    expect(parseTypeSpec(["boolean"])).toEqual({ kind: "single", category: "boolean" });
  });

  it("unwraps a union with null in either position", () => {
    expect(parseTypeSpec(["string", "null"])).toEqual({
      kind: "nullable-union",
      category: "string",
    });
    expect(parseTypeSpec(["null", "integer"])).toEqual({
      kind: "nullable-union",
      category: "integer",
    });
  });

  it("treats other unions as untyped", () => {
    expect(parseTypeSpec(["string", "number"])).toEqual({ kind: "absent" });
    expect(parseTypeSpec(["string", "number", "null"])).toEqual({ kind: "absent" });
    expect(parseTypeSpec([])).toEqual({ kind: "absent" });
  });

  it("warns about unknown type names", () => {
    const warnings: string[] = [];
    expect(parseTypeSpec("date", warnings)).toEqual({ kind: "absent" });
    expect(warnings).toEqual(['Unknown type "date" is treated as untyped']);
  });
});

describe("parseSchemaDocument", () => {
  it("normalizes properties in declaration order", () => {
    const { root } = parseSchemaDocument({
      type: "object",
      required: ["b"],
      properties: {
        b: { type: "string" },
        a: { type: ["integer", "null"] },
      },
    });

    expect(root.type).toEqual({ kind: "single", category: "object" });
    expect(root.required).toEqual(["b"]);
    expect([...root.properties.keys()]).toEqual(["b", "a"]);
    expect(root.properties.get("a")?.type).toEqual({
      kind: "nullable-union",
      category: "integer",
    });
  });

  it("parses items as a single schema or a tuple", () => {
    const { root } = parseSchemaDocument({
      type: "object",
      properties: {
        list: { type: "array", items: { type: "string" } },
        pair: { type: "array", items: [{ type: "string" }, { type: "integer" }] },
      },
    });

    expect(root.properties.get("list")?.items.kind).toBe("single");
    const pair = root.properties.get("pair")?.items;
    expect(pair?.kind).toBe("tuple");
    expect(pair?.kind === "tuple" ? pair.schemas.length : 0).toBe(2);
  });

  it("parses additionalProperties as a boolean or a schema", () => {
    const { root } = parseSchemaDocument({
      type: "object",
      properties: {
        closed: { type: "object", additionalProperties: false },
        labels: { type: "object", additionalProperties: { type: "string" } },
      },
    });

    expect(root.properties.get("closed")?.additionalProperties).toEqual({
      kind: "boolean",
      allowed: false,
    });
    expect(root.properties.get("labels")?.additionalProperties.kind).toBe("schema");
  });

  it("reads boolean schemas as empty schemas", () => {
    const { root } = parseSchemaDocument({
      type: "object",
      properties: { anything: true },
    });

    const anything = root.properties.get("anything");
    expect(anything?.type).toEqual({ kind: "absent" });
    expect(anything?.properties.size).toBe(0);
  });

  it("keys definitions and $defs by keyword", () => {
    const { root } = parseSchemaDocument({
      definitions: { address: { type: "object" } },
      $defs: { address: { type: "string" } },
    });

    expect([...root.definitions.keys()]).toEqual(["definitions/address", "$defs/address"]);
    expect(root.definitions.get("$defs/address")?.name).toBe("address");
    expect(root.definitions.get("$defs/address")?.schema.type).toEqual({
      kind: "single",
      category: "string",
    });
  });

  it("keeps title, description, format and $ref", () => {
    const { root } = parseSchemaDocument({
      title: "Event",
      description: "Something that happened",
      type: "string",
      format: "date-time",
      $ref: "#/definitions/event",
    });

    expect(root.title).toBe("Event");
    expect(root.description).toBe("Something that happened");
    expect(root.format).toBe("date-time");
    expect(root.ref).toBe("#/definitions/event");
  });

  it("collects unknown type warnings once", () => {
    const { warnings } = parseSchemaDocument({
      type: "object",
      properties: { a: { type: "uuid" }, b: { type: "uuid" } },
    });

    expect(warnings).toEqual(['Unknown type "uuid" is treated as untyped']);
  });

  it("throws SchemaParseError with the failing path", () => {
    let caught: unknown;
    try {
      parseSchemaDocument({ type: 5 }, "broken.json");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SchemaParseError);
    if (!(caught instanceof SchemaParseError)) return;
    expect(caught.source).toBe("broken.json");
    expect(caught.issues[0]?.startsWith("type: ")).toBe(true);
  });

  it("keeps schemas named __proto__", () => {
    const { root } = parseSchemaDocument(
      JSON.parse(
        '{"type":"object","properties":{"__proto__":{"type":"string"},"a":{"type":"integer"}},"definitions":{"__proto__":{"type":"boolean"}}}',
      ),
    );

    expect([...root.properties.keys()]).toEqual(["__proto__", "a"]);
    expect(root.properties.get("__proto__")?.type).toEqual({ kind: "single", category: "string" });
    expect([...root.definitions.keys()]).toEqual(["definitions/__proto__"]);
  });

  it("rejects documents that aren't objects", () => {
    expect(() => parseSchemaDocument("schema")).toThrow(SchemaParseError);
    expect(() => parseSchemaDocument(true)).toThrow(SchemaParseError);
  });
});

describe("loadSchemaDocument", () => {
  const testDir = join(__dirname, ".test-schema");

  beforeEach(async () => {
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("reads and parses a schema file", async () => {
    const path = join(testDir, "person.json");
    await writeFile(path, JSON.stringify({ type: "object", properties: { name: { type: "string" } } }));

    const { root } = await loadSchemaDocument(path);
    expect([...root.properties.keys()]).toEqual(["name"]);
  });

  it("wraps invalid JSON in SchemaParseError", async () => {
    const path = join(testDir, "broken.json");
    await writeFile(path, "{ not json");

    await expect(loadSchemaDocument(path)).rejects.toThrow(SchemaParseError);
    await expect(loadSchemaDocument(path)).rejects.toThrow(`Invalid schema in ${path}`);
  });

  it("wraps missing files in SchemaParseError", async () => {
    await expect(loadSchemaDocument(join(testDir, "missing.json"))).rejects.toThrow(
      SchemaParseError,
    );
  });
});
