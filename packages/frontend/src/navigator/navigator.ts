/**
 * Schema Navigator
 *
 * Parent and child lookups that see the schema the way generated code does:
 * `choice` and `case` are transparent, submodule content hangs off the
 * module it belongs to, and nodes injected by an `augment` belong to the
 * augment's target. The submodule and augment indexes are computed once when
 * the navigator is created.
 */

import type { NodeId, SchemaNode, SchemaTree } from "../types/schema.js";
import { getNode } from "../types/schema.js";

export type ChildrenOptions = {
  /** Include children injected into the node by resolved augments */
  readonly includeAugments?: boolean;
};

export type AncestorOrder = "nearest-first" | "farthest-first";

export interface SchemaNavigator {
  readonly tree: SchemaTree;
  node(id: NodeId): SchemaNode;
  logicalParent(id: NodeId): NodeId | undefined;
  /** Logical ancestors, excluding the node itself and the top module */
  ancestorChain(id: NodeId, order: AncestorOrder): readonly NodeId[];
  children(id: NodeId, options?: ChildrenOptions): readonly NodeId[];
  /** `children` with choice and case flattened away */
  effectiveChildren(id: NodeId, options?: ChildrenOptions): readonly NodeId[];
  /** Top module a node resolves to */
  moduleOf(id: NodeId): NodeId;
  /** Submodules whose `belongs-to` names the module */
  includedSubmodules(moduleId: NodeId): readonly NodeId[];
}

export const TRANSPARENT_KEYWORDS: ReadonlySet<string> = new Set([
  "choice",
  "case",
]);

export const isTransparent = (node: SchemaNode): boolean =>
  TRANSPARENT_KEYWORDS.has(node.keyword);

const appendTo = (
  index: Map<number, NodeId[]>,
  key: NodeId,
  values: readonly NodeId[]
): void => {
  const existing = index.get(key.id) ?? [];
  index.set(key.id, [...existing, ...values]);
};

export const createNavigator = (tree: SchemaTree): SchemaNavigator => {
  const submodulesByModule = new Map<number, NodeId[]>();
  for (const root of tree.roots) {
    const node = getNode(tree, root);
    if (node.keyword === "submodule" && node.links.mainModule) {
      appendTo(submodulesByModule, node.links.mainModule, [root]);
    }
  }

  const injectedByTarget = new Map<number, NodeId[]>();
  for (const node of tree.nodes) {
    if (node.keyword === "augment" && node.links.augmentTarget) {
      appendTo(injectedByTarget, node.links.augmentTarget, node.children);
    }
  }

  const childrenCache = new Map<string, readonly NodeId[]>();
  const effectiveCache = new Map<string, readonly NodeId[]>();

  const node = (id: NodeId): SchemaNode => getNode(tree, id);

  const logicalParent = (id: NodeId): NodeId | undefined => {
    const current = node(id);
    if (current.parent === undefined) return undefined;

    const parent = node(current.parent);
    if (parent.keyword === "submodule") {
      return parent.links.mainModule ?? parent.id;
    }
    if (parent.parent === undefined) return parent.id;
    if (isTransparent(parent)) return logicalParent(parent.id);
    if (parent.keyword === "augment" && parent.links.augmentTarget) {
      const target = node(parent.links.augmentTarget);
      return isTransparent(target) ? logicalParent(target.id) : target.id;
    }
    return parent.id;
  };

  const ancestorChain = (
    id: NodeId,
    order: AncestorOrder
  ): readonly NodeId[] => {
    const chain: NodeId[] = [];
    let ancestor = logicalParent(id);
    while (ancestor !== undefined) {
      const next = logicalParent(ancestor);
      if (next === undefined) break;
      chain.push(ancestor);
      ancestor = next;
    }
    return order === "nearest-first" ? chain : chain.reverse();
  };

  const includedSubmodules = (moduleId: NodeId): readonly NodeId[] =>
    submodulesByModule.get(moduleId.id) ?? [];

  const children = (
    id: NodeId,
    options: ChildrenOptions = {}
  ): readonly NodeId[] => {
    const includeAugments = options.includeAugments ?? false;
    const key = `${id.id}:${includeAugments}`;
    const cached = childrenCache.get(key);
    if (cached) return cached;

    const current = node(id);
    const included =
      current.keyword === "module"
        ? includedSubmodules(id).flatMap((sub) => node(sub).children)
        : [];
    const injected = includeAugments ? (injectedByTarget.get(id.id) ?? []) : [];

    const result = Object.freeze([...current.children, ...included, ...injected]);
    childrenCache.set(key, result);
    return result;
  };

  const effectiveChildren = (
    id: NodeId,
    options: ChildrenOptions = {}
  ): readonly NodeId[] => {
    const key = `${id.id}:${options.includeAugments ?? false}`;
    const cached = effectiveCache.get(key);
    if (cached) return cached;

    const result = Object.freeze(
      children(id, options).flatMap((child) =>
        isTransparent(node(child)) ? effectiveChildren(child, options) : [child]
      )
    );
    effectiveCache.set(key, result);
    return result;
  };

  const moduleOf = (id: NodeId): NodeId => {
    let current = id;
    let parent = logicalParent(current);
    while (parent !== undefined) {
      current = parent;
      parent = logicalParent(current);
    }
    const top = node(current);
    return top.keyword === "submodule" && top.links.mainModule
      ? top.links.mainModule
      : current;
  };

  return {
    tree,
    node,
    logicalParent,
    ancestorChain,
    children,
    effectiveChildren,
    moduleOf,
    includedSubmodules,
  };
};
