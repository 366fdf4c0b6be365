/**
 * Helpers for building schema fixtures in tests
 */

import { formatDiagnostic } from "../types/diagnostic.js";
import type { NodeId } from "../types/schema.js";
import type { BuiltSchemaTree, StatementSpec } from "./builder.js";
import { buildSchemaTree } from "./builder.js";

/**
 * Build a tree, throwing with the formatted diagnostics when the specs are
 * inconsistent.
 */
export const createTestTree = (
  modules: readonly StatementSpec[]
): BuiltSchemaTree => {
  const result = buildSchemaTree(modules);
  if (!result.ok) {
    throw new Error(result.error.map(formatDiagnostic).join("\n"));
  }
  return result.value;
};

export const refOf = (tree: BuiltSchemaTree, label: string): NodeId => {
  const id = tree.refs.get(label);
  if (!id) {
    throw new Error(`No statement labelled '${label}'`);
  }
  return id;
};
