import { dirname } from "node:path";

import { loadConfig } from "c12";
import * as z from "zod";

import { generateIdentifier, isValidIdentifier } from "@/utils/naming";

import type { NamingOptions } from "@/generators/ir/types";

/**
 * Options for loading the structgen config
 */
export interface LoadConfigOptions {
  /** Path to the config file */
  configPath?: string;
  /** Directory to search for a config file (default: process.cwd()) */
  cwd?: string;
}

/**
 * Result of loading the structgen config
 */
export interface LoadConfigResult {
  /** The validated configuration */
  config: StructgenConfig;
  /** The resolved path to the config file */
  configPath: string;
}

// =============================================================================
// Schema Target Configuration
// =============================================================================

/**
 * Go identifier (used for package and root type names)
 */
const identifierSchema = z
  .string()
  .min(1, "Name is required")
  .refine(isValidIdentifier, "Must be a valid Go identifier");

/**
 * One JSON Schema file and how to generate types from it
 */
export const schemaTargetSchema = z.object({
  /** Path to the JSON Schema file */
  input: z.string().min(1, "Schema input path is required"),
  /** Output file (default: <root type name, lowercased>_schematype.go) */
  output: z.string().min(1).optional(),
  /** Write generated code to stdout instead of a file */
  console: z.boolean().default(false),
  /** Go package name for the generated file */
  package: identifierSchema.default("main"),
  /** Name of the root type (default: generated from the input filename) */
  rootType: identifierSchema.optional(),
  /** Prefix for non-root type names */
  prefix: z.string().optional(),
  /** Export type names (default: true when package isn't "main" or a prefix is set) */
  exportTypes: z.boolean().optional(),
});

export type SchemaTargetConfig = z.output<typeof schemaTargetSchema>;
export type SchemaTargetConfigInput = z.input<typeof schemaTargetSchema>;

// =============================================================================
// Main Config Schema
// =============================================================================

/**
 * Main structgen configuration schema
 */
export const structgenConfigSchema = z.object({
  /** Schema files to generate types from */
  schemas: z
    .array(schemaTargetSchema)
    .min(1, "At least one schema is required")
    .refine((schemas) => {
      const outputs = schemas.flatMap((s) => (s.output ? [s.output] : []));
      return new Set(outputs).size === outputs.length;
    }, "Output files must be unique"),
});

/**
 * The normalized configuration type used internally (after parsing)
 */
export type StructgenConfig = z.output<typeof structgenConfigSchema>;

/**
 * Input configuration type (before defaults applied)
 */
export type StructgenConfigInput = z.input<typeof structgenConfigSchema>;

/**
 * Config schema for validation
 */
export const configSchema = structgenConfigSchema;

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Helper for defining a typed config
 */
export function defineConfig(config: StructgenConfigInput): StructgenConfigInput {
  return config;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((e) => `  - ${e.path.map(String).join(".")}: ${e.message}`)
    .join("\n");
}

/**
 * Validate a config object (e.g. built from CLI flags)
 */
export function parseConfig(config: unknown, source = "configuration"): StructgenConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw new Error(`Invalid configuration in ${source}:\n${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Load and validate the structgen config file
 */
export async function loadStructgenConfig(
  options: LoadConfigOptions = {},
): Promise<LoadConfigResult> {
  const cwd = options.configPath ? dirname(options.configPath) : options.cwd;

  const { config, configFile } = await loadConfig<StructgenConfigInput>({
    name: "structgen",
    cwd,
    configFile: options.configPath,
    rcFile: false,
    globalRc: false,
    dotenv: false,
  });

  if (!config || Object.keys(config).length === 0) {
    throw new Error(
      `No configuration found. Run 'structgen init' to create a config file, pass a schema file, or specify a config file with --config.`,
    );
  }

  const configPath = configFile ?? "structgen.config";
  return {
    config: parseConfig(config, configPath),
    configPath,
  };
}

// =============================================================================
// Default Config Generator
// =============================================================================

/**
 * Generate a config file content
 */
export function generateDefaultConfig(): string {
  return `import { defineConfig } from "structgen"

export default defineConfig({
	schemas: [
		{
			input: "./schema.json",
			// output: "./schema_schematype.go",
			package: "main",
			// rootType: "Schema",
			// prefix: "Schema",
		},
	],
})
`;
}

// =============================================================================
// Naming Policy
// =============================================================================

/**
 * Default root type name: the input file's basename up to its first dot
 * e.g. "./schemas/user-profile.schema.json" -> "userProfile" (package main)
 */
export function defaultRootTypeName(input: string, packageName: string): string {
  const base = input.split(/[\\/]/).pop() ?? input;
  const [stem = base] = base.split(".");
  return generateIdentifier(stem, packageName !== "main");
}

/**
 * Resolve the naming record for one schema target
 */
export function resolveNamingOptions(target: SchemaTargetConfig): NamingOptions {
  const prefix = target.prefix ?? "";
  return {
    rootTypeName:
      target.rootType ?? defaultRootTypeName(target.input, target.package),
    typeNamePrefix: prefix,
    exportTypes: target.exportTypes ?? (target.package !== "main" || prefix !== ""),
  };
}

/**
 * Default output file for a target
 * e.g. root type "UserProfile" -> "userprofile_schematype.go"
 */
export function defaultOutputFile(rootTypeName: string, extension = ".go"): string {
  return `${rootTypeName.toLowerCase()}_schematype${extension}`;
}
