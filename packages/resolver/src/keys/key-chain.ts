/**
 * Key chain composition
 *
 * Addressing an entry of a nested list takes the keys of every enclosing
 * list first, outermost first, then the list's own keys. Parameter names
 * must be unique across the whole chain.
 */

import { createDiagnostic, findChild } from "@yangmodel/frontend";
import type { NodeId } from "@yangmodel/frontend";
import type { ResolverContext } from "../context.js";
import { warnOnce } from "../context.js";
import { normalizeIdentifier } from "../naming/normalize.js";
import type { ResolvedType } from "../types/type-resolver.js";
import { resolveType } from "../types/type-resolver.js";

export type KeyParameter = {
  /** Parameter name, unique within the chain */
  readonly name: string;
  readonly leaf: NodeId;
  /** List declaring the key */
  readonly owner: NodeId;
  readonly type: ResolvedType;
};

const stripPrefix = (name: string): string => {
  const colon = name.indexOf(":");
  return colon === -1 ? name : name.slice(colon + 1);
};

/**
 * Leaves named by a list's `key` statement, in key order. Problems are
 * reported once per list and key name.
 */
export const listKeyLeaves = (
  ctx: ResolverContext,
  listId: NodeId
): readonly NodeId[] => {
  const nav = ctx.navigator;
  const list = nav.node(listId);
  const keyStatement = findChild(nav.tree, listId, "key");
  if (!keyStatement) {
    warnOnce(
      ctx,
      `nokey:${listId.id}`,
      createDiagnostic(
        "YM2004",
        "warning",
        `List '${list.arg ?? ""}' has no key statement`,
        list.position
      )
    );
    return [];
  }

  const names = (keyStatement.arg ?? "")
    .split(/\s+/)
    .filter((name) => name.length > 0)
    .map(stripPrefix);
  const leaves = nav
    .effectiveChildren(listId)
    .map((child) => nav.node(child))
    .filter((child) => child.keyword === "leaf");

  return names.flatMap((name) => {
    const leaf = leaves.find((candidate) => candidate.arg === name);
    if (leaf) return [leaf.id];
    warnOnce(
      ctx,
      `keyleaf:${listId.id}:${name}`,
      createDiagnostic(
        "YM2005",
        "warning",
        `Key '${name}' of list '${list.arg ?? ""}' names no leaf of the list`,
        keyStatement.position
      )
    );
    return [];
  });
};

const uniqueName = (
  ctx: ResolverContext,
  used: ReadonlySet<string>,
  listName: string | undefined,
  keyName: string | undefined
): string => {
  const plain = normalizeIdentifier(ctx.naming, keyName).member;
  if (!used.has(plain)) return plain;

  const qualified = normalizeIdentifier(
    ctx.naming,
    `${listName ?? ""}-${keyName ?? ""}`
  ).member;
  if (!used.has(qualified)) return qualified;

  let counter = 2;
  while (used.has(`${qualified}${counter}`)) counter++;
  return `${qualified}${counter}`;
};

/**
 * Resolve the key parameters needed to address a node: the keys of every
 * enclosing list, then the node's own keys when it is a list.
 */
export const resolveKeyChain = (
  ctx: ResolverContext,
  id: NodeId
): readonly KeyParameter[] => {
  const nav = ctx.navigator;
  const lists = [...nav.ancestorChain(id, "farthest-first"), id].filter(
    (candidate) => nav.node(candidate).keyword === "list"
  );

  const used = new Set<string>();
  const chain: KeyParameter[] = [];
  for (const owner of lists) {
    const listName = nav.node(owner).arg;
    for (const leaf of listKeyLeaves(ctx, owner)) {
      const name = uniqueName(ctx, used, listName, nav.node(leaf).arg);
      used.add(name);
      chain.push({ name, leaf, owner, type: resolveType(ctx, leaf) });
    }
  }
  return chain;
};
