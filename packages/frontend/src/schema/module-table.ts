/**
 * Module table - top-level modules and submodules keyed by (name, revision)
 */

import type { NodeId, SchemaTree } from "../types/schema.js";
import { findChild, getNode } from "../types/schema.js";

export type ModuleEntry = {
  readonly name: string;
  /** First `revision` substatement; undefined for unrevisioned modules */
  readonly revision: string | undefined;
  readonly node: NodeId;
};

export type ModuleTable = {
  readonly entries: readonly ModuleEntry[];
  readonly byKey: ReadonlyMap<string, ModuleEntry>;
};

const tableKey = (name: string, revision: string | undefined): string =>
  `${name}@${revision ?? ""}`;

export const buildModuleTable = (tree: SchemaTree): ModuleTable => {
  const entries = tree.roots.flatMap((root): ModuleEntry[] => {
    const node = getNode(tree, root);
    if (node.arg === undefined) return [];
    return [
      {
        name: node.arg,
        revision: findChild(tree, root, "revision")?.arg,
        node: root,
      },
    ];
  });

  const byKey = new Map<string, ModuleEntry>();
  for (const entry of entries) {
    byKey.set(tableKey(entry.name, entry.revision), entry);
  }
  return { entries, byKey };
};

/**
 * Look up a module by name. Without a revision the newest revision wins;
 * revisions are ISO dates, so string order is date order.
 */
export const lookupModule = (
  table: ModuleTable,
  name: string,
  revision?: string
): ModuleEntry | undefined => {
  if (revision !== undefined) {
    return table.byKey.get(tableKey(name, revision));
  }

  return table.entries
    .filter((entry) => entry.name === name)
    .reduce<ModuleEntry | undefined>(
      (newest, entry) =>
        newest === undefined || (entry.revision ?? "") > (newest.revision ?? "")
          ? entry
          : newest,
      undefined
    );
};
