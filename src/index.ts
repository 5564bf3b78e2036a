// Public API for structgen

// =============================================================================
// Config Helpers
// =============================================================================

export { defineConfig } from "./core/config";

// =============================================================================
// Programmatic Generation
// =============================================================================

export { generate, generateFromSchema } from "./core/generator";

// =============================================================================
// Config Loading (for advanced usage)
// =============================================================================

export {
  configSchema,
  loadStructgenConfig,
  resolveNamingOptions,
} from "./core/config";

// =============================================================================
// Schema Parsing & Type Resolution
// =============================================================================

export { loadSchemaDocument, parseSchemaDocument } from "./core/schema";
export { resolveSchema } from "./generators/ir";
export { goEmitter } from "./generators/emitters/go";

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  getExitCode,
  IdentifierError,
  NameCollisionError,
  SchemaParseError,
  StructgenError,
  UnresolvableReferencesError,
  UnsupportedSchemaError,
} from "./core/errors";

// =============================================================================
// Logger Utilities (for custom integrations)
// =============================================================================

export { createConsolaLogger, createSilentLogger } from "./utils/logger";

// =============================================================================
// Types
// =============================================================================

export type {
  SchemaTargetConfig,
  SchemaTargetConfigInput,
  StructgenConfig,
  StructgenConfigInput,
} from "./core/config";
export type {
  GeneratedTarget,
  GenerateFromSchemaOptions,
  GenerateFromSchemaResult,
  GenerateOptions,
  GenerateResult,
} from "./core/generator";
export type { Emitter, EmitterOptions, EmitterResult } from "./generators/emitters/types";
export type {
  FieldDescriptor,
  NamingOptions,
  ResolutionResult,
  SchemaNode,
  TypeDescriptor,
  TypePath,
  ValueType,
} from "./generators/ir";
export type { StructgenLogger } from "./utils/logger";
