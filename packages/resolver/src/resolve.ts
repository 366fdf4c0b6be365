/**
 * Resolution run driver
 *
 * One call resolves a set of modules end to end:
 * 1. Validator findings are taken in; fatal ones for the run's modules
 *    abort before anything is walked.
 * 2. Primary phase: each module is walked once in caller order, followed by
 *    its imports when requested.
 * 3. Augment phase: every module targeted by an augment is walked once more
 *    with the injected content included.
 */

import {
  createDiagnostic,
  error,
  findChild,
  lookupModule,
  ok,
  toResolutionDiagnostic,
  classifyValidatorDiagnostic,
} from "@yangmodel/frontend";
import type {
  Diagnostic,
  NodeId,
  Result,
  SchemaTree,
  ValidatorDiagnostic,
} from "@yangmodel/frontend";
import type { ResolverContext, ResolverOptions } from "./context.js";
import { createResolverContext, moduleLabel, warnOnce } from "./context.js";
import type { GeneratedUnit } from "./walker/units.js";
import { walkModule } from "./walker/walker.js";

export type ResolutionInput = {
  readonly tree: SchemaTree;
  /** Modules to resolve, in order; defaults to every root of the tree */
  readonly modules?: readonly NodeId[];
  readonly validatorDiagnostics?: readonly ValidatorDiagnostic[];
};

export type ResolutionResult = {
  /** Every unit in emission order, primary phase first */
  readonly units: readonly GeneratedUnit[];
  /** Warnings; never errors */
  readonly diagnostics: readonly Diagnostic[];
  /** `name@revision` of each module walked again in the augment phase, in the order recorded */
  readonly augmentedModules: readonly string[];
};

const topModule = (ctx: ResolverContext, id: NodeId): NodeId => {
  const node = ctx.navigator.node(id);
  return node.keyword === "submodule" && node.links.mainModule
    ? node.links.mainModule
    : id;
};

const moduleName = (ctx: ResolverContext, id: NodeId): string =>
  ctx.navigator.node(id).arg ?? "";

const intakeFindings = (
  findings: readonly ValidatorDiagnostic[],
  runModules: ReadonlySet<string>,
  ignoreErrors: boolean
): { readonly fatal: Diagnostic[]; readonly warnings: Diagnostic[] } => {
  const fatal: Diagnostic[] = [];
  const warnings: Diagnostic[] = [];
  for (const finding of findings) {
    const applies = runModules.has(finding.module);
    const diagnostic = toResolutionDiagnostic(finding, ignoreErrors || !applies);
    if (classifyValidatorDiagnostic(finding) === "fatal" && diagnostic.severity === "error") {
      fatal.push(diagnostic);
    } else {
      warnings.push(diagnostic);
    }
  }
  return { fatal, warnings };
};

const aborted = (ctx: ResolverContext, before: string): Diagnostic | undefined =>
  ctx.options.signal?.aborted
    ? createDiagnostic(
        "YM3003",
        "error",
        `Resolution aborted before module '${before}'`
      )
    : undefined;

/** Import statements of a module and of the submodules included in it */
const importsOf = (ctx: ResolverContext, moduleId: NodeId): readonly NodeId[] =>
  [moduleId, ...ctx.navigator.includedSubmodules(moduleId)].flatMap((owner) =>
    ctx.navigator
      .node(owner)
      .children.filter((child) => ctx.navigator.node(child).keyword === "import")
  );

const missingImport = (
  ctx: ResolverContext,
  importer: string,
  importId: NodeId,
  name: string,
  revision: string | undefined
): Diagnostic => {
  const label = revision === undefined ? name : `${name}@${revision}`;
  return createDiagnostic(
    "YM3001",
    ctx.options.ignoreErrors ? "warning" : "error",
    `Module '${label}' imported by '${importer}' not found`,
    ctx.navigator.node(importId).position,
    "Add the module to the schema bundle or pass --ignore-errors"
  );
};

/**
 * Walk a module in the primary phase unless already walked, then its
 * imports when requested. Returns a fatal diagnostic when the run must stop.
 */
const walkPrimary = (
  ctx: ResolverContext,
  moduleId: NodeId,
  units: GeneratedUnit[]
): Diagnostic | undefined => {
  if (ctx.visited.has(moduleId.id)) return undefined;

  const name = moduleName(ctx, moduleId);
  const stop = aborted(ctx, name);
  if (stop) return stop;

  ctx.visited.add(moduleId.id);
  const walked = walkModule(ctx, moduleId, "primary");
  units.push(...walked);
  ctx.options.onModule?.(moduleLabel(ctx, moduleId), "primary", walked.length);

  if (!ctx.options.includeImports) return undefined;

  for (const importId of importsOf(ctx, moduleId)) {
    const imported = ctx.navigator.node(importId).arg ?? "";
    const revision = findChild(ctx.navigator.tree, importId, "revision-date")?.arg;
    const entry = lookupModule(ctx.modules, imported, revision);
    if (!entry) {
      const diagnostic = missingImport(ctx, name, importId, imported, revision);
      if (diagnostic.severity === "error") return diagnostic;
      warnOnce(ctx, `import:${imported}@${revision ?? ""}`, diagnostic);
      continue;
    }
    const failure = walkPrimary(ctx, topModule(ctx, entry.node), units);
    if (failure) return failure;
  }
  return undefined;
};

/**
 * Resolve every module of a schema tree into generated units.
 */
export const resolveSchema = (
  input: ResolutionInput,
  options: ResolverOptions
): Result<ResolutionResult, readonly Diagnostic[]> => {
  const ctx = createResolverContext(input.tree, options);

  const modules = (input.modules ?? input.tree.roots).map((id) =>
    topModule(ctx, id)
  );
  const runModules = new Set(modules.map((id) => moduleName(ctx, id)));

  const intake = intakeFindings(
    input.validatorDiagnostics ?? [],
    runModules,
    ctx.options.ignoreErrors
  );
  if (intake.fatal.length > 0) {
    return error(intake.fatal);
  }

  const units: GeneratedUnit[] = [];
  for (const moduleId of modules) {
    const failure = walkPrimary(ctx, moduleId, units);
    if (failure) return error([failure]);
  }

  const augmentedModules: string[] = [];
  for (const target of ctx.augmentTargets.values()) {
    const label = moduleLabel(ctx, target);
    const stop = aborted(ctx, label);
    if (stop) return error([stop]);
    const walked = walkModule(ctx, target, "augment");
    units.push(...walked);
    augmentedModules.push(label);
    ctx.options.onModule?.(label, "augment", walked.length);
  }

  return ok({
    units,
    diagnostics: [...intake.warnings, ...ctx.warnings.diagnostics],
    augmentedModules,
  });
};
