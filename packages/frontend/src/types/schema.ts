/**
 * Schema tree types
 *
 * The tree is an arena: every statement lives in `SchemaTree.nodes` at the
 * index carried by its handle, children are owned by their parent as ordered
 * handle lists, and the parent reference is a plain handle as well. Nodes are
 * frozen once built; resolution only ever reads them.
 */

import type { SourceLocation } from "./diagnostic.js";

// ═══════════════════════════════════════════════════════════════════════════
// HANDLES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Opaque handle to a statement in a schema tree arena.
 */
export type NodeId = {
  readonly __brand: "NodeId";
  readonly id: number;
};

export const makeNodeId = (id: number): NodeId => ({
  __brand: "NodeId",
  id,
});

// ═══════════════════════════════════════════════════════════════════════════
// NODES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Cross-references resolved by the schema parser.
 */
export type NodeLinks = {
  /** On `type` statements naming a derived type: the typedef it names */
  readonly typedef?: NodeId;
  /** On `type leafref` statements: the leaf the path points at */
  readonly leafrefTarget?: NodeId;
  /** On `augment` statements: the node the augment injects into */
  readonly augmentTarget?: NodeId;
  /** On `submodule` statements: the module named by `belongs-to` */
  readonly mainModule?: NodeId;
};

export type SchemaNode = {
  readonly id: NodeId;
  readonly keyword: string;
  /** Absent for argument-less statements such as `input` or some extensions */
  readonly arg: string | undefined;
  readonly parent: NodeId | undefined;
  readonly children: readonly NodeId[];
  /** Module or submodule the statement is written in; undefined on roots */
  readonly originModule: NodeId | undefined;
  readonly position: SourceLocation | undefined;
  readonly links: NodeLinks;
};

export type SchemaTree = {
  readonly nodes: readonly SchemaNode[];
  /** Module and submodule statements, in input order */
  readonly roots: readonly NodeId[];
};

export const getNode = (tree: SchemaTree, id: NodeId): SchemaNode => {
  const node = tree.nodes[id.id];
  if (!node) {
    throw new RangeError(`Node handle ${id.id} is not part of this tree`);
  }
  return node;
};

export const isModuleKeyword = (keyword: string): boolean =>
  keyword === "module" || keyword === "submodule";

/**
 * Find the first child statement with the given keyword.
 */
export const findChild = (
  tree: SchemaTree,
  id: NodeId,
  keyword: string
): SchemaNode | undefined =>
  getNode(tree, id)
    .children.map((child) => getNode(tree, child))
    .find((child) => child.keyword === keyword);
