/**
 * Walk steps
 *
 * Each statement the walker reaches is turned into one step by a handler
 * chosen from its keyword. Steps only describe what to do next; the walker
 * applies them.
 */

import type { NodeId, SchemaNode } from "@yangmodel/frontend";
import type { ResolverContext } from "../context.js";
import type { StepKind } from "./node-kinds.js";
import { classifyNode, unitKindOf } from "./node-kinds.js";
import type { GeneratedUnit, WalkPhase } from "./units.js";
import { buildUnit, walkChildren } from "./units.js";

export type EmitStep = {
  readonly kind: "emit";
  readonly unit: GeneratedUnit;
  readonly children: readonly NodeId[];
};

export type RecurseStep = {
  readonly kind: "recurse";
  readonly children: readonly NodeId[];
};

export type RedirectStep = {
  readonly kind: "redirect";
  readonly augment: NodeId;
  /** Module owning the augment target; absent when the target is unresolved */
  readonly targetModule: NodeId | undefined;
};

export type SkipStep = {
  readonly kind: "skip";
};

export type WalkStep = EmitStep | RecurseStep | RedirectStep | SkipStep;

type StepHandler<K extends StepKind> = (
  ctx: ResolverContext,
  node: SchemaNode,
  phase: WalkPhase
) => Extract<WalkStep, { kind: K }>;

const STEP_HANDLERS: { readonly [K in StepKind]: StepHandler<K> } = {
  emit: (ctx, node, phase) => {
    const unitKind = unitKindOf(node.keyword);
    if (!unitKind) {
      throw new Error(`'${node.keyword}' statements do not produce units`);
    }
    return {
      kind: "emit",
      unit: buildUnit(ctx, node.id, unitKind, phase),
      children: walkChildren(ctx, node.id, phase),
    };
  },

  recurse: (ctx, node, phase) => ({
    kind: "recurse",
    children: walkChildren(ctx, node.id, phase),
  }),

  redirect: (ctx, node) => {
    const target = node.links.augmentTarget;
    return {
      kind: "redirect",
      augment: node.id,
      targetModule: target ? ctx.navigator.moduleOf(target) : undefined,
    };
  },

  skip: () => ({ kind: "skip" }),
};

export const planStep = (
  ctx: ResolverContext,
  id: NodeId,
  phase: WalkPhase
): WalkStep => {
  const node = ctx.navigator.node(id);
  const handler = STEP_HANDLERS[classifyNode(node)];
  return handler(ctx, node, phase);
};
