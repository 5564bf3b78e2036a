import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";

import { goEmitter } from "@/generators/emitters/go";
import { resolveSchema } from "@/generators/ir";
import { defaultLogger } from "@/utils/logger";
import { defaultOutputFile, resolveNamingOptions } from "./config";
import { loadSchemaDocument, parseSchemaDocument } from "./schema";

import type { NamingOptions, SchemaNode } from "@/generators/ir/types";
import type { StructgenLogger } from "@/utils/logger";
import type { SchemaTargetConfig, StructgenConfig } from "./config";

/** Command recorded in generated file headers when none is given */
export const defaultCommand = "structgen";

export interface GenerateFromSchemaOptions extends NamingOptions {
  /** Go package name (default: "main") */
  packageName?: string;
  /** Command line recorded in the file header */
  command?: string;
}

export interface GenerateFromSchemaResult {
  /** Generated Go source */
  content: string;
  rootTypeName: string;
  /** Number of generated type declarations */
  typeCount: number;
  warnings: string[];
}

/**
 * Generate Go source from an in-memory JSON Schema document
 */
export function generateFromSchema(
  document: unknown,
  options: GenerateFromSchemaOptions,
): GenerateFromSchemaResult {
  const { root, warnings } = parseSchemaDocument(document);
  return emitDocument(root, warnings, options);
}

function emitDocument(
  root: SchemaNode,
  parseWarnings: string[],
  options: GenerateFromSchemaOptions,
): GenerateFromSchemaResult {
  const resolution = resolveSchema(root, options);
  const emitted = goEmitter.emit(resolution, {
    packageName: options.packageName ?? "main",
    command: options.command ?? defaultCommand,
  });

  return {
    content: emitted.content,
    rootTypeName: options.rootTypeName,
    typeCount: resolution.descriptors.length,
    warnings: [...parseWarnings, ...resolution.warnings, ...emitted.warnings],
  };
}

// =============================================================================
// File Generation
// =============================================================================

export interface GenerateOptions {
  config: StructgenConfig;
  logger?: StructgenLogger;
  /** Command line recorded in file headers */
  command?: string;
  /** Base directory for relative paths (default: process.cwd()) */
  cwd?: string;
  /** Where console targets are written (default: process.stdout) */
  stdout?: { write(chunk: string): unknown };
}

/**
 * Information about one generated schema target
 */
export interface GeneratedTarget {
  input: string;
  /** Absolute output path; undefined for console targets */
  output?: string;
  rootTypeName: string;
  typeCount: number;
  warnings: string[];
}

export interface GenerateResult {
  targets: GeneratedTarget[];
}

async function generateTarget(
  target: SchemaTargetConfig,
  options: GenerateOptions & { cwd: string },
): Promise<GeneratedTarget> {
  const { logger = defaultLogger, command = defaultCommand, cwd } = options;
  const input = resolve(cwd, target.input);
  const naming = resolveNamingOptions(target);

  const { root, warnings } = await loadSchemaDocument(input);
  const result = emitDocument(root, warnings, {
    ...naming,
    packageName: target.package,
    command,
  });

  for (const warning of result.warnings) {
    logger.warn(warning);
  }

  if (target.console) {
    (options.stdout ?? process.stdout).write(result.content);
    return {
      input: target.input,
      rootTypeName: result.rootTypeName,
      typeCount: result.typeCount,
      warnings: result.warnings,
    };
  }

  const output = target.output
    ? resolve(cwd, target.output)
    : join(cwd, defaultOutputFile(result.rootTypeName, goEmitter.fileExtension));
  await mkdir(dirname(output), { recursive: true });
  await writeFile(output, result.content, "utf-8");
  logger.success(`Generated ${output}`);

  return {
    input: target.input,
    output,
    rootTypeName: result.rootTypeName,
    typeCount: result.typeCount,
    warnings: result.warnings,
  };
}

/**
 * Main generation orchestrator
 * Processes all configured schema targets in order
 */
export async function generate(options: GenerateOptions): Promise<GenerateResult> {
  const cwd = options.cwd ?? process.cwd();
  const targets: GeneratedTarget[] = [];

  for (const target of options.config.schemas) {
    targets.push(await generateTarget(target, { ...options, cwd }));
  }

  return { targets };
}
