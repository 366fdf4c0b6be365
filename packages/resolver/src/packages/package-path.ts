/**
 * Package-Path Resolver
 *
 * A node's package is derived from its logical ancestors: the top module
 * and every container, list, rpc, notification, input and output between it
 * and the node. Choice and case never contribute (the navigator skips them).
 * Content written in a submodule, or expanded from another module, gets one
 * extra segment for its origin where it hangs directly off the top module.
 */

import type { NodeId, SchemaNode } from "@yangmodel/frontend";
import type { ResolverContext } from "../context.js";
import { normalizeIdentifier } from "../naming/normalize.js";

export type PackageVariant = "model" | "api";

export type PackagePath = {
  readonly variant: PackageVariant;
  /** Root prefix segments, the variant segment, then node segments */
  readonly parts: readonly string[];
  readonly qualifiedName: string;
};

const SEGMENT_KEYWORDS: ReadonlySet<string> = new Set([
  "container",
  "list",
  "rpc",
  "notification",
  "input",
  "output",
]);

/** input and output carry no argument; they contribute their keyword */
const segmentOf = (ctx: ResolverContext, node: SchemaNode): string =>
  normalizeIdentifier(ctx.naming, node.arg ?? node.keyword).member;

const nodeSegments = (ctx: ResolverContext, id: NodeId): string[] => {
  const nav = ctx.navigator;
  const segments: string[] = [];

  let current = id;
  let parent = nav.logicalParent(current);
  while (parent !== undefined) {
    const parentNode = nav.node(parent);
    const grandparent = nav.logicalParent(parent);

    if (grandparent === undefined) {
      const origin = nav.node(current).originModule;
      if (origin !== undefined && origin.id !== parent.id) {
        segments.unshift(segmentOf(ctx, nav.node(origin)));
      }
      segments.unshift(segmentOf(ctx, parentNode));
    } else if (SEGMENT_KEYWORDS.has(parentNode.keyword)) {
      segments.unshift(segmentOf(ctx, parentNode));
    }

    current = parent;
    parent = grandparent;
  }

  return segments;
};

export const packagePath = (
  ctx: ResolverContext,
  id: NodeId,
  variant: PackageVariant
): PackagePath => {
  const key = `${variant}:${id.id}`;
  const cached = ctx.packageCache.get(key);
  if (cached) return cached;

  const parts = Object.freeze([
    ...ctx.options.rootPackage,
    variant,
    ...nodeSegments(ctx, id),
  ]);
  const path: PackagePath = Object.freeze({
    variant,
    parts,
    qualifiedName: parts.join("."),
  });
  ctx.packageCache.set(key, path);
  return path;
};
