import { existsSync } from "node:fs";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createSilentLogger } from "@/utils/logger";
import { parseConfig } from "./config";
import { NameCollisionError, SchemaParseError } from "./errors";
import { generate, generateFromSchema } from "./generator";

import type { StructgenLogger } from "@/utils/logger";

const orderSchema = {
  description: "A customer order",
  type: "object",
  required: ["id", "items"],
  properties: {
    id: { type: "string" },
    items: {
      type: "array",
      items: {
        type: "object",
        required: ["sku"],
        properties: {
          sku: { type: "string" },
          quantity: { type: "integer" },
        },
      },
    },
    note: { type: ["string", "null"] },
    placedAt: { type: "string", format: "date-time" },
    metadata: { type: "object" },
    shipping: { $ref: "#/definitions/address" },
  },
  definitions: {
    address: {
      description: "Postal address",
      type: "object",
      properties: {
        street: { type: "string" },
        zip_code: { type: "string" },
      },
    },
  },
};

describe("generateFromSchema", () => {
  it("generates a Go file from a schema document", () => {
    const result = generateFromSchema(orderSchema, {
      rootTypeName: "Order",
      packageName: "orders",
      exportTypes: true,
      command: "structgen order.json",
    });

    expect(result.content).toBe(
      [
        "package orders",
        "",
        '// generated by "structgen order.json" -- DO NOT EDIT',
        "",
        'import "time"',
        "",
        "// Postal address",
        "type Address struct {",
        '\tStreet  string `json:"street,omitempty"`',
        '\tZipCode string `json:"zip_code,omitempty"`',
        "}",
        "",
        "type Item struct {",
        '\tQuantity int    `json:"quantity,omitempty"`',
        '\tSku      string `json:"sku"`',
        "}",
        "",
        "// A customer order",
        "type Order struct {",
        '\tID       string                 `json:"id"`',
        '\tItems    []Item                 `json:"items"`',
        '\tMetadata map[string]interface{} `json:"metadata,omitempty"`',
        '\tNote     *string                `json:"note,omitempty"`',
        '\tPlacedAt time.Time              `json:"placedAt,omitempty"`',
        '\tShipping Address                `json:"shipping,omitempty"`',
        "}",
        "",
      ].join("\n"),
    );
    expect(result.rootTypeName).toBe("Order");
    expect(result.typeCount).toBe(3);
    expect(result.warnings).toEqual([]);
  });

  it("defaults to package main and the structgen command", () => {
    const result = generateFromSchema({ type: "string" }, { rootTypeName: "name" });

    expect(result.content).toBe(
      'package main\n\n// generated by "structgen" -- DO NOT EDIT\n\ntype name string\n',
    );
  });

  it("collects parse and resolution warnings in order", () => {
    const result = generateFromSchema(
      {
        type: "object",
        properties: {
          code: { type: "uuid" },
          pair: { type: "array", items: [{ type: "string" }, { type: "string" }] },
        },
      },
      { rootTypeName: "Pair" },
    );

    expect(result.warnings).toEqual([
      'Unknown type "uuid" is treated as untyped',
      "#/properties/pair: tuple items with 2 schemas are untyped",
    ]);
  });

  it("throws resolution errors", () => {
    expect(() =>
      generateFromSchema(
        { type: "object", definitions: { root: { type: "string" } } },
        { rootTypeName: "Root", exportTypes: true },
      ),
    ).toThrow(NameCollisionError);
  });
});

describe("generate", () => {
  const testDir = join(__dirname, ".test-generate");

  beforeEach(async () => {
    await mkdir(testDir, { recursive: true });
    await writeFile(
      join(testDir, "user-profile.json"),
      JSON.stringify({ type: "object", properties: { name: { type: "string" } } }),
    );
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("writes the default output file next to the working directory", async () => {
    const config = parseConfig({ schemas: [{ input: "user-profile.json" }] });

    const result = await generate({
      config,
      logger: createSilentLogger(),
      command: "structgen user-profile.json",
      cwd: testDir,
    });

    const output = join(testDir, "userprofile_schematype.go");
    expect(result.targets).toEqual([
      {
        input: "user-profile.json",
        output,
        rootTypeName: "userProfile",
        typeCount: 1,
        warnings: [],
      },
    ]);
    expect(await readFile(output, "utf-8")).toBe(
      [
        "package main",
        "",
        '// generated by "structgen user-profile.json" -- DO NOT EDIT',
        "",
        "type userProfile struct {",
        '\tName string `json:"name,omitempty"`',
        "}",
        "",
      ].join("\n"),
    );
  });

  it("creates the directory of a configured output file", async () => {
    const config = parseConfig({
      schemas: [{ input: "user-profile.json", output: "models/profile.go", package: "models" }],
    });

    const result = await generate({ config, logger: createSilentLogger(), cwd: testDir });

    expect(result.targets[0]?.output).toBe(join(testDir, "models", "profile.go"));
    expect(result.targets[0]?.rootTypeName).toBe("UserProfile");
    const content = await readFile(join(testDir, "models", "profile.go"), "utf-8");
    expect(content.startsWith("package models\n")).toBe(true);
  });

  it("writes console targets to stdout instead of a file", async () => {
    const chunks: string[] = [];
    const config = parseConfig({
      schemas: [{ input: "user-profile.json", console: true, rootType: "Profile" }],
    });

    const result = await generate({
      config,
      logger: createSilentLogger(),
      cwd: testDir,
      stdout: { write: (chunk: string) => chunks.push(chunk) },
    });

    expect(result.targets[0]?.output).toBeUndefined();
    expect(chunks).toHaveLength(1);
    expect(chunks[0]).toContain("type Profile struct {\n");
    expect(existsSync(join(testDir, "profile_schematype.go"))).toBe(false);
  });

  it("logs warnings and written files", async () => {
    await writeFile(
      join(testDir, "pair.json"),
      JSON.stringify({ type: "array", items: [{ type: "string" }, { type: "integer" }] }),
    );
    const logger: StructgenLogger = { ...createSilentLogger(), warn: vi.fn(), success: vi.fn() };
    const config = parseConfig({ schemas: [{ input: "pair.json" }] });

    await generate({ config, logger, cwd: testDir });

    expect(logger.warn).toHaveBeenCalledWith("#: tuple items with 2 schemas are untyped");
    expect(logger.success).toHaveBeenCalledWith(
      `Generated ${join(testDir, "pair_schematype.go")}`,
    );
  });

  it("rejects with SchemaParseError for a missing schema file", async () => {
    const config = parseConfig({ schemas: [{ input: "missing.json" }] });

    await expect(
      generate({ config, logger: createSilentLogger(), cwd: testDir }),
    ).rejects.toThrow(SchemaParseError);
  });
});
