/**
 * Name deduplicator
 *
 * Renames types whose generated names collide by prefixing the original
 * name with the structural parent's original name, e.g. two "Item" types
 * under "Order" and "Invoice" become "OrderItem" and "InvoiceItem".
 *
 * Each round is planned against a snapshot of the colliding names and
 * applied afterwards, so the result doesn't depend on iteration order.
 * A type whose parent is itself colliding waits for a later round:
 * parents are stabilized before their children are renamed.
 */

import { NameCollisionError } from "@/core/errors";
import { toTypeName } from "./context";

import type { ResolutionContext } from "./context";
import type { TypeDescriptor, TypePath } from "./types";

interface PlannedRename {
  descriptor: TypeDescriptor;
  originalName: string;
}

function getDescriptor(ctx: ResolutionContext, path: TypePath): TypeDescriptor {
  const descriptor = ctx.descriptors.get(path);
  if (!descriptor) {
    throw new Error(`Name registry refers to unknown type path ${path}`);
  }
  return descriptor;
}

function planRenames(
  ctx: ResolutionContext,
  colliding: readonly string[],
): PlannedRename[] {
  const pending = new Set(colliding);
  const renames: PlannedRename[] = [];

  for (const name of colliding) {
    const paths = [...ctx.names.get(name)].sort();
    const parents = new Set<TypePath>();

    for (const path of paths) {
      const descriptor = getDescriptor(ctx, path);
      const parent =
        descriptor.parentPath === ""
          ? undefined
          : ctx.descriptors.get(descriptor.parentPath);

      if (parent && pending.has(parent.name)) {
        continue;
      }
      if (!parent || parent.originalName === "") {
        throw new NameCollisionError(name, paths, `${path} has no named parent`);
      }
      if (parents.has(parent.path)) {
        throw new NameCollisionError(
          name,
          paths,
          `types under ${parent.path} can't be told apart by their parent`,
        );
      }

      parents.add(parent.path);
      renames.push({
        descriptor,
        originalName: `${parent.originalName}-${descriptor.originalName}`,
      });
    }
  }

  return renames;
}

/**
 * Rename descriptors until every generated name is unique
 *
 * @returns the number of rounds it took
 */
export function dedupeTypeNames(ctx: ResolutionContext): number {
  const maxRounds = ctx.descriptors.size;
  let rounds = 0;

  for (;;) {
    const colliding = ctx.names.collisions();
    const [first] = colliding;
    if (first === undefined) {
      return rounds;
    }
    if (rounds >= maxRounds) {
      throw new NameCollisionError(
        first,
        ctx.names.get(first),
        "names still collide after renaming every ancestor",
      );
    }
    rounds++;

    for (const { descriptor, originalName } of planRenames(ctx, colliding)) {
      ctx.names.remove(descriptor.name, descriptor.path);
      descriptor.originalName = originalName;
      descriptor.name = toTypeName(ctx, originalName);
      ctx.names.add(descriptor.name, descriptor.path);
    }
  }
}
