/**
 * Resolution context
 *
 * All mutable state of one resolution run, passed explicitly to the
 * builder, the deferred resolver and the deduplicator.
 */

import { IdentifierError } from "@/core/errors";
import { generateIdentifier } from "@/utils/naming";

import type {
  DeferredEntry,
  NamingOptions,
  TypeClaim,
  TypeDescriptor,
  TypePath,
} from "./types";

// ============================================================================
// Name Registry
// ============================================================================

/**
 * Generated type name -> TypePaths currently claiming it
 */
export class NameRegistry {
  private readonly entries = new Map<string, Set<TypePath>>();

  add(name: string, path: TypePath): void {
    let paths = this.entries.get(name);
    if (!paths) {
      paths = new Set();
      this.entries.set(name, paths);
    }
    paths.add(path);
  }

  remove(name: string, path: TypePath): void {
    const paths = this.entries.get(name);
    if (!paths) return;
    paths.delete(path);
    if (paths.size === 0) {
      this.entries.delete(name);
    }
  }

  get(name: string): ReadonlySet<TypePath> {
    return this.entries.get(name) ?? new Set();
  }

  /**
   * Names claimed by more than one path, sorted
   */
  collisions(): string[] {
    return [...this.entries]
      .filter(([, paths]) => paths.size > 1)
      .map(([name]) => name)
      .sort();
  }

  get size(): number {
    return this.entries.size;
  }
}

// ============================================================================
// Context
// ============================================================================

export interface ResolutionContext {
  options: Required<NamingOptions>;
  /** Completed descriptors */
  descriptors: Map<TypePath, TypeDescriptor>;
  /** Paths whose descriptor is still being built */
  claims: Map<TypePath, TypeClaim>;
  /** Reference-only nodes -> the path they resolved to */
  aliases: Map<TypePath, TypePath>;
  deferred: Map<TypePath, DeferredEntry>;
  names: NameRegistry;
  needsTimestampImport: boolean;
  warnings: string[];
}

export function createContext(options: NamingOptions): ResolutionContext {
  return {
    options: {
      rootTypeName: options.rootTypeName,
      typeNamePrefix: options.typeNamePrefix ?? "",
      exportTypes: options.exportTypes ?? false,
    },
    descriptors: new Map(),
    claims: new Map(),
    aliases: new Map(),
    deferred: new Map(),
    names: new NameRegistry(),
    needsTimestampImport: false,
    warnings: [],
  };
}

/**
 * Generate a non-root type name under the context's export policy
 */
export function toTypeName(ctx: ResolutionContext, source: string): string {
  const { exportTypes, typeNamePrefix } = ctx.options;
  const identifier = generateIdentifier(source, exportTypes);
  if (identifier === "") {
    throw new IdentifierError("type", source);
  }
  return exportTypes ? typeNamePrefix + identifier : identifier;
}

/**
 * Generate a struct field name; fields are always exported
 */
export function toFieldName(source: string): string {
  const identifier = generateIdentifier(source, true);
  if (identifier === "") {
    throw new IdentifierError("field", source);
  }
  return identifier;
}

/**
 * Follow reference aliases to the path that owns a descriptor or claim.
 * Returns undefined while the target is not resolvable yet.
 */
export function lookupReference(
  ctx: ResolutionContext,
  ref: TypePath,
): { path: TypePath; nullable: boolean } | undefined {
  const seen = new Set<TypePath>();
  let current = ref;
  let next = ctx.aliases.get(current);
  while (next !== undefined && !seen.has(current)) {
    seen.add(current);
    current = next;
    next = ctx.aliases.get(current);
  }

  const descriptor = ctx.descriptors.get(current);
  if (descriptor) {
    return { path: current, nullable: descriptor.nullable };
  }
  const claim = ctx.claims.get(current);
  if (claim) {
    return { path: current, nullable: claim.nullable };
  }
  return undefined;
}
