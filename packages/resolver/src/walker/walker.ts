/**
 * Schema Tree Walker
 *
 * Depth-first pre-order walk of one module with an explicit stack. Emitting
 * statements produce units, pass-through statements only contribute their
 * children, and augments are recorded for the augment phase instead of being
 * entered under the augmenting module.
 */

import { createDiagnostic } from "@yangmodel/frontend";
import type { NodeId } from "@yangmodel/frontend";
import type { ResolverContext } from "../context.js";
import { warnOnce } from "../context.js";
import type { RedirectStep } from "./steps.js";
import { planStep } from "./steps.js";
import type { GeneratedUnit, WalkPhase } from "./units.js";
import { walkChildren } from "./units.js";

const recordRedirect = (ctx: ResolverContext, step: RedirectStep): void => {
  if (!step.targetModule) {
    const augment = ctx.navigator.node(step.augment);
    warnOnce(
      ctx,
      `augment:${step.augment.id}`,
      createDiagnostic(
        "YM2003",
        "warning",
        `Augment '${augment.arg ?? ""}' has no resolved target; skipped`,
        augment.position
      )
    );
    return;
  }

  if (!ctx.augmentTargets.has(step.targetModule.id)) {
    ctx.augmentTargets.set(step.targetModule.id, step.targetModule);
  }
};

const pushReversed = (stack: NodeId[], children: readonly NodeId[]): void => {
  for (let i = children.length - 1; i >= 0; i--) {
    const child = children[i];
    if (child) stack.push(child);
  }
};

/**
 * Walk one module and return the units it yields, in pre-order.
 * Augments are only recorded during the primary phase.
 */
export const walkModule = (
  ctx: ResolverContext,
  moduleId: NodeId,
  phase: WalkPhase
): readonly GeneratedUnit[] => {
  const units: GeneratedUnit[] = [];
  const stack: NodeId[] = [];
  pushReversed(stack, walkChildren(ctx, moduleId, phase));

  let next = stack.pop();
  while (next !== undefined) {
    const step = planStep(ctx, next, phase);
    switch (step.kind) {
      case "emit":
        units.push(step.unit);
        pushReversed(stack, step.children);
        break;
      case "recurse":
        pushReversed(stack, step.children);
        break;
      case "redirect":
        if (phase === "primary") recordRedirect(ctx, step);
        break;
      case "skip":
        break;
    }
    next = stack.pop();
  }

  return units;
};
