/**
 * Resolver context - the run-scoped owner of every cache and accumulator.
 * One context per run; nothing is shared between runs.
 */

import {
  buildModuleTable,
  createNavigator,
  findChild,
  type Diagnostic,
  type ModuleTable,
  type NodeId,
  type SchemaNavigator,
  type SchemaTree,
} from "@yangmodel/frontend";
import { createNamingState, type NamingState } from "./naming/normalize.js";
import type { ResolvedType } from "./types/type-resolver.js";
import type { PackagePath } from "./packages/package-path.js";
import type { WalkPhase } from "./walker/units.js";

/** Called after each module walk */
export type ModuleProgress = (
  moduleName: string,
  phase: WalkPhase,
  unitCount: number
) => void;

export const DEFAULT_RUNTIME_PACKAGE = "yang.runtime";

export type ResolverOptions = {
  /** Dotted root package every generated package lives under */
  readonly rootPackage: string;
  /** Dotted package of the built-in wrapper types */
  readonly runtimePackage?: string;
  /** Identifiers to escape in addition to the built-in reserved words */
  readonly reservedWords?: readonly string[];
  /** Keep going when the validator reports missing modules */
  readonly ignoreErrors?: boolean;
  /** Also walk the modules named by `import` statements */
  readonly includeImports?: boolean;
  /** Checked before each top-level module */
  readonly signal?: AbortSignal;
  readonly onModule?: ModuleProgress;
};

export type ResolvedOptions = {
  readonly rootPackage: readonly string[];
  readonly runtimePackage: string;
  readonly ignoreErrors: boolean;
  readonly includeImports: boolean;
  readonly signal: AbortSignal | undefined;
  readonly onModule: ModuleProgress | undefined;
};

/**
 * Warnings reported once per stable key.
 */
export type WarningSink = {
  readonly seen: Set<string>;
  readonly diagnostics: Diagnostic[];
};

export type ResolverContext = {
  readonly options: ResolvedOptions;
  readonly navigator: SchemaNavigator;
  readonly modules: ModuleTable;
  readonly naming: NamingState;
  readonly typeCache: Map<number, ResolvedType>;
  readonly packageCache: Map<string, PackagePath>;
  readonly warnings: WarningSink;
  /** Target module handle id → target module, in first-recorded order */
  readonly augmentTargets: Map<number, NodeId>;
  /** Modules already walked in the primary pass */
  readonly visited: Set<number>;
};

const splitPackage = (dotted: string): readonly string[] =>
  dotted.split(".").filter((segment) => segment.length > 0);

export const createResolverContext = (
  tree: SchemaTree,
  options: ResolverOptions
): ResolverContext => ({
  options: {
    rootPackage: splitPackage(options.rootPackage),
    runtimePackage: options.runtimePackage ?? DEFAULT_RUNTIME_PACKAGE,
    ignoreErrors: options.ignoreErrors ?? false,
    includeImports: options.includeImports ?? false,
    signal: options.signal,
    onModule: options.onModule,
  },
  navigator: createNavigator(tree),
  modules: buildModuleTable(tree),
  naming: createNamingState(options.reservedWords),
  typeCache: new Map(),
  packageCache: new Map(),
  warnings: { seen: new Set(), diagnostics: [] },
  augmentTargets: new Map(),
  visited: new Set(),
});

/**
 * `name@revision` of a module, or its bare name when it has no revision.
 */
export const moduleLabel = (
  ctx: Pick<ResolverContext, "navigator">,
  moduleId: NodeId
): string => {
  const name = ctx.navigator.node(moduleId).arg ?? "";
  const revision = findChild(ctx.navigator.tree, moduleId, "revision")?.arg;
  return revision === undefined ? name : `${name}@${revision}`;
};

/**
 * Record a diagnostic unless one was already recorded under the same key.
 */
export const warnOnce = (
  ctx: Pick<ResolverContext, "warnings">,
  key: string,
  diagnostic: Diagnostic
): void => {
  if (ctx.warnings.seen.has(key)) return;
  ctx.warnings.seen.add(key);
  ctx.warnings.diagnostics.push(diagnostic);
};
