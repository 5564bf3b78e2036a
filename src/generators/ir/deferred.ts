/**
 * Deferred reference resolver
 *
 * Retries deferred nodes in rounds until the deferred set is empty.
 * A round that leaves the set unchanged means the remaining nodes depend
 * on something that will never resolve.
 */

import { UnresolvableReferencesError } from "@/core/errors";
import { resolveNode } from "./builder";

import type { ResolutionContext } from "./context";
import type { TypePath } from "./types";

function sameKeys(a: ReadonlySet<TypePath>, b: ReadonlyMap<TypePath, unknown>): boolean {
  if (a.size !== b.size) return false;
  for (const key of a) {
    if (!b.has(key)) return false;
  }
  return true;
}

/**
 * Drain the deferred set
 *
 * @returns the number of rounds it took
 * @throws UnresolvableReferencesError with the stuck paths when a round makes no progress
 */
export function resolveDeferred(ctx: ResolutionContext): number {
  let rounds = 0;

  while (ctx.deferred.size > 0) {
    rounds++;
    const pending = new Set(ctx.deferred.keys());

    for (const path of pending) {
      const entry = ctx.deferred.get(path);
      // Already resolved inline while retrying its parent this round
      if (!entry) continue;
      resolveNode(ctx, entry.schema, entry.name, entry.description, path, entry.parentPath);
    }

    if (sameKeys(pending, ctx.deferred)) {
      throw new UnresolvableReferencesError(pending);
    }
  }

  return rounds;
}
