/**
 * Generated units - the per-node records handed to code emission
 */

import type { NodeId } from "@yangmodel/frontend";
import type { ResolverContext } from "../context.js";
import type { KeyParameter } from "../keys/key-chain.js";
import { listKeyLeaves, resolveKeyChain } from "../keys/key-chain.js";
import type { NormalizedName } from "../naming/normalize.js";
import { normalizeIdentifier } from "../naming/normalize.js";
import type { PackagePath } from "../packages/package-path.js";
import { packagePath } from "../packages/package-path.js";
import type { ResolvedType } from "../types/type-resolver.js";
import { resolveType } from "../types/type-resolver.js";
import type { UnitKind } from "./node-kinds.js";
import { classifyNode } from "./node-kinds.js";

export type WalkPhase = "primary" | "augment";

export type LeafDirection = "input" | "output";

export type LeafFacts = {
  readonly node: NodeId;
  readonly name: NormalizedName;
  readonly type: ResolvedType;
  /** leaf-list */
  readonly multiple: boolean;
  readonly isKey: boolean;
  /** Set on rpc parameters */
  readonly direction?: LeafDirection;
};

export type GeneratedUnit = {
  readonly node: NodeId;
  readonly kind: UnitKind;
  readonly phase: WalkPhase;
  readonly name: NormalizedName;
  /** Arguments of the logical ancestors below the module, then the node's own */
  readonly tagpath: string;
  readonly modelPackage: PackagePath;
  readonly apiPackage: PackagePath;
  readonly keys: readonly KeyParameter[];
  readonly leaves: readonly LeafFacts[];
  /** Nearest emitting descendants */
  readonly childUnits: readonly NodeId[];
};

export const walkChildren = (
  ctx: ResolverContext,
  id: NodeId,
  phase: WalkPhase
): readonly NodeId[] =>
  ctx.navigator.children(id, { includeAugments: phase === "augment" });

const segmentOf = (ctx: ResolverContext, id: NodeId): string => {
  const node = ctx.navigator.node(id);
  return node.arg ?? node.keyword;
};

type Contents = {
  readonly leaves: LeafFacts[];
  readonly childUnits: NodeId[];
};

const collectContents = (
  ctx: ResolverContext,
  id: NodeId,
  phase: WalkPhase,
  keyLeaves: ReadonlySet<number>,
  direction: LeafDirection | undefined,
  into: Contents
): void => {
  for (const child of walkChildren(ctx, id, phase)) {
    const node = ctx.navigator.node(child);
    if (node.keyword === "leaf" || node.keyword === "leaf-list") {
      into.leaves.push({
        node: child,
        name: normalizeIdentifier(ctx.naming, node.arg),
        type: resolveType(ctx, child),
        multiple: node.keyword === "leaf-list",
        isKey: keyLeaves.has(child.id),
        ...(direction ? { direction } : {}),
      });
      continue;
    }

    switch (classifyNode(node)) {
      case "emit":
        into.childUnits.push(child);
        break;
      case "recurse": {
        const nested =
          node.keyword === "input" || node.keyword === "output"
            ? node.keyword
            : direction;
        collectContents(ctx, child, phase, keyLeaves, nested, into);
        break;
      }
      case "redirect":
      case "skip":
        break;
    }
  }
};

export const buildUnit = (
  ctx: ResolverContext,
  id: NodeId,
  kind: UnitKind,
  phase: WalkPhase
): GeneratedUnit => {
  const node = ctx.navigator.node(id);
  const keyLeaves = new Set(
    kind === "list" ? listKeyLeaves(ctx, id).map((leaf) => leaf.id) : []
  );
  const contents: Contents = { leaves: [], childUnits: [] };
  collectContents(ctx, id, phase, keyLeaves, undefined, contents);

  const tagpath = [...ctx.navigator.ancestorChain(id, "farthest-first"), id]
    .map((ancestor) => segmentOf(ctx, ancestor))
    .join("/");

  return Object.freeze({
    node: id,
    kind,
    phase,
    name: normalizeIdentifier(ctx.naming, node.arg),
    tagpath,
    modelPackage: packagePath(ctx, id, "model"),
    apiPackage: packagePath(ctx, id, "api"),
    keys: resolveKeyChain(ctx, id),
    leaves: Object.freeze(contents.leaves),
    childUnits: Object.freeze(contents.childUnits),
  });
};

/**
 * The last unit emitted for each node, in order of first emission.
 * Augment-phase units supersede primary-phase ones.
 */
export const latestUnits = (
  units: readonly GeneratedUnit[]
): readonly GeneratedUnit[] => {
  const byNode = new Map<number, GeneratedUnit>();
  for (const unit of units) {
    byNode.set(unit.node.id, unit);
  }
  return [...byNode.values()];
};
