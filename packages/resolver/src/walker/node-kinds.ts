/**
 * How the walker treats each statement keyword
 */

import type { SchemaNode } from "@yangmodel/frontend";

export type StepKind = "emit" | "recurse" | "redirect" | "skip";

export type UnitKind = "container" | "list" | "rpc" | "notification";

export const UNIT_KINDS: readonly UnitKind[] = [
  "container",
  "list",
  "rpc",
  "notification",
];

const STEP_KINDS: ReadonlyMap<string, StepKind> = new Map<string, StepKind>([
  ...UNIT_KINDS.map((kind): [string, StepKind] => [kind, "emit"]),
  ["choice", "recurse"],
  ["case", "recurse"],
  ["input", "recurse"],
  ["output", "recurse"],
  ["augment", "redirect"],
]);

export const classifyNode = (node: SchemaNode): StepKind =>
  STEP_KINDS.get(node.keyword) ?? "skip";

export const unitKindOf = (keyword: string): UnitKind | undefined =>
  UNIT_KINDS.find((kind) => kind === keyword);
