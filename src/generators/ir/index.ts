/**
 * Type resolution engine
 *
 * Turns a parsed schema tree into a deterministic, fully resolved and
 * uniquely named set of TypeDescriptors. Emitters render the result.
 *
 *   schema tree -> builder -> deferred resolver -> deduplicator -> ordered descriptors
 */

import { IdentifierError, UnresolvableReferencesError } from "@/core/errors";
import { isValidIdentifier } from "@/utils/naming";
import { resolveNode } from "./builder";
import { createContext } from "./context";
import { dedupeTypeNames } from "./dedupe";
import { resolveDeferred } from "./deferred";
import { ROOT_PATH } from "./types";
import { extractReferences, sortDescriptors } from "./utils";

import type { ResolutionContext } from "./context";
import type { NamingOptions, ResolutionResult, SchemaNode, TypePath } from "./types";

/**
 * Every reference of every descriptor must point into the descriptor table
 */
function assertFullyResolved(ctx: ResolutionContext): void {
  const dangling = new Set<TypePath>(ctx.claims.keys());
  for (const descriptor of ctx.descriptors.values()) {
    for (const ref of extractReferences(descriptor)) {
      if (!ctx.descriptors.has(ref)) {
        dangling.add(ref);
      }
    }
  }
  if (dangling.size > 0) {
    throw new UnresolvableReferencesError(dangling);
  }
}

/**
 * Resolve a schema document into ordered type descriptors
 */
export function resolveSchema(
  root: SchemaNode,
  options: NamingOptions,
): ResolutionResult {
  if (!isValidIdentifier(options.rootTypeName)) {
    throw new IdentifierError("type", options.rootTypeName);
  }

  const ctx = createContext(options);

  resolveNode(ctx, root, options.rootTypeName, root.description, ROOT_PATH, "");
  resolveDeferred(ctx);
  assertFullyResolved(ctx);
  dedupeTypeNames(ctx);

  return {
    descriptors: sortDescriptors(ctx.descriptors.values()),
    needsTimestampImport: ctx.needsTimestampImport,
    warnings: [...ctx.warnings],
  };
}

export { resolveNode } from "./builder";
export {
  createContext,
  lookupReference,
  NameRegistry,
  toFieldName,
  toTypeName,
} from "./context";
export { dedupeTypeNames } from "./dedupe";
export { resolveDeferred } from "./deferred";
export { isStructDescriptor, ROOT_PATH } from "./types";
export { childPath, extractReferences, ir, sortDescriptors } from "./utils";

export type { ResolutionContext } from "./context";
export type {
  CollectionDescriptor,
  DeferredEntry,
  FieldDescriptor,
  MapDescriptor,
  NamingOptions,
  PrimitiveDescriptor,
  PrimitiveType,
  ReferenceDescriptor,
  ResolutionResult,
  SchemaNode,
  StructDescriptor,
  TypeDescriptor,
  TypePath,
  TypeSpec,
  ValueCategory,
  ValueType,
} from "./types";
