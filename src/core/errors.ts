/**
 * Error types for structgen
 *
 * Resolution never terminates the process itself. Every failure is thrown as
 * a StructgenError subclass and handled once, at the CLI command boundary,
 * which maps it to an exit code.
 */

import type { TypePath } from "@/generators/ir/types";

// Stable error codes grouped by stage
export enum ErrorCode {
  // Input Errors (E001–E099)
  SCHEMA_PARSE_FAILED = "E001",
  UNSUPPORTED_SCHEMA = "E002",

  // Resolution Errors (E100–E199)
  INVALID_IDENTIFIER = "E100",
  UNRESOLVABLE_REFERENCES = "E101",
  NAME_COLLISION = "E102",
}

export const EXIT_CODES = {
  [ErrorCode.SCHEMA_PARSE_FAILED]: 10,
  [ErrorCode.UNSUPPORTED_SCHEMA]: 11,
  [ErrorCode.INVALID_IDENTIFIER]: 20,
  [ErrorCode.UNRESOLVABLE_REFERENCES]: 21,
  [ErrorCode.NAME_COLLISION]: 22,
} satisfies Record<ErrorCode, number>;

export class StructgenError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

/**
 * Thrown when a schema string contains nothing an identifier can be built from
 */
export class IdentifierError extends StructgenError {
  readonly source: string;

  constructor(kind: "type" | "field", source: string) {
    super(
      ErrorCode.INVALID_IDENTIFIER,
      `Can't generate ${kind} without name (from ${JSON.stringify(source)})`,
    );
    this.source = source;
  }
}

/**
 * Thrown when a deferred resolution round makes no progress
 */
export class UnresolvableReferencesError extends StructgenError {
  readonly paths: TypePath[];

  constructor(paths: Iterable<TypePath>) {
    const sorted = [...paths].sort();
    super(
      ErrorCode.UNRESOLVABLE_REFERENCES,
      `Can't resolve: (${sorted.join(" ")})`,
    );
    this.paths = sorted;
  }
}

/**
 * Thrown when colliding type names can't be disambiguated by parent names
 */
export class NameCollisionError extends StructgenError {
  readonly typeName: string;
  readonly paths: TypePath[];

  constructor(typeName: string, paths: Iterable<TypePath>, reason: string) {
    const sorted = [...paths].sort();
    super(
      ErrorCode.NAME_COLLISION,
      `Can't disambiguate ${typeName}: (${sorted.join(" ")}): ${reason}`,
    );
    this.typeName = typeName;
    this.paths = sorted;
  }
}

/**
 * Thrown for schema shapes the structural dispatch can't classify
 */
export class UnsupportedSchemaError extends StructgenError {
  readonly path: TypePath;

  constructor(path: TypePath, reason: string) {
    super(ErrorCode.UNSUPPORTED_SCHEMA, `Unsupported schema at ${path}: ${reason}`);
    this.path = path;
  }
}

/**
 * Thrown when the schema document can't be read or doesn't match the
 * supported JSON Schema shape
 */
export class SchemaParseError extends StructgenError {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(
      ErrorCode.SCHEMA_PARSE_FAILED,
      `Invalid schema in ${source}:\n${issues.map((issue) => `  - ${issue}`).join("\n")}`,
    );
    this.source = source;
    this.issues = issues;
  }
}

/**
 * Map any thrown value to a process exit code
 */
export function getExitCode(error: unknown): number {
  return error instanceof StructgenError ? error.exitCode : 1;
}
