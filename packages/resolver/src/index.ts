/**
 * yangmodel resolver - names, types, packages and generated units
 */

export {
  type ResolverOptions,
  type ResolvedOptions,
  type ResolverContext,
  type WarningSink,
  type ModuleProgress,
  DEFAULT_RUNTIME_PACKAGE,
  createResolverContext,
  moduleLabel,
  warnOnce,
} from "./context.js";

export * from "./naming/normalize.js";
export { RESERVED_WORDS } from "./naming/reserved-words.js";
export * from "./types/type-resolver.js";
export * from "./packages/package-path.js";
export * from "./keys/key-chain.js";

export * from "./walker/node-kinds.js";
export * from "./walker/units.js";
export * from "./walker/steps.js";
export * from "./walker/walker.js";

export * from "./resolve.js";
