/**
 * Type Resolver
 *
 * Maps a `type`, `typedef`, `leaf` or `leaf-list` statement onto a wrapper
 * type name and a primitive kind. Typedef chains and leafref indirection are
 * followed to a built-in type; both are acyclic once the parser has linked
 * them, so recursion terminates without an explicit guard.
 */

import { createDiagnostic, findChild, isModuleKeyword } from "@yangmodel/frontend";
import type { NodeId, SchemaNode } from "@yangmodel/frontend";
import type { ResolverContext } from "../context.js";
import { warnOnce } from "../context.js";
import { normalizeIdentifier } from "../naming/normalize.js";
import { packagePath } from "../packages/package-path.js";

export type PrimitiveKind =
  | "boolean"
  | "string"
  | "decimal"
  | "big-integer"
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "uint8"
  | "uint16"
  | "uint32"
  | "uint64";

export type ResolvedType = {
  /** Fully qualified wrapper type name */
  readonly wrapper: string;
  readonly primitive: PrimitiveKind;
};

type BuiltinType = {
  readonly wrapper: string;
  readonly primitive: PrimitiveKind;
};

const builtin = (wrapper: string, primitive: PrimitiveKind): BuiltinType => ({
  wrapper,
  primitive,
});

/**
 * Built-in type keywords. Wrapper names are relative to the runtime package.
 */
export const BUILTIN_TYPES: ReadonlyMap<string, BuiltinType> = new Map([
  ["string", builtin("YangString", "string")],
  ["boolean", builtin("YangBoolean", "boolean")],
  ["enumeration", builtin("YangEnumeration", "string")],
  ["binary", builtin("YangBinary", "string")],
  ["union", builtin("YangUnion", "string")],
  ["empty", builtin("YangEmpty", "string")],
  ["instance-identifier", builtin("YangInstanceIdentifier", "string")],
  ["identityref", builtin("YangIdentityref", "string")],
  ["bits", builtin("YangBits", "big-integer")],
  ["decimal64", builtin("YangDecimal64", "decimal")],
  ["int8", builtin("YangInt8", "int8")],
  ["int16", builtin("YangInt16", "int16")],
  ["int32", builtin("YangInt32", "int32")],
  ["int64", builtin("YangInt64", "int64")],
  ["uint8", builtin("YangUInt8", "uint8")],
  ["uint16", builtin("YangUInt16", "uint16")],
  ["uint32", builtin("YangUInt32", "uint32")],
  ["uint64", builtin("YangUInt64", "uint64")],
]);

const WRAPPED_KEYWORDS: ReadonlySet<string> = new Set([
  "leaf",
  "leaf-list",
  "typedef",
]);

const qualify = (ctx: ResolverContext, wrapper: string): string =>
  `${ctx.options.runtimePackage}.${wrapper}`;

const fallback = (ctx: ResolverContext): ResolvedType => ({
  wrapper: qualify(ctx, "YangString"),
  primitive: "string",
});

const fromTypeStatement = (
  ctx: ResolverContext,
  typeNode: SchemaNode
): ResolvedType => {
  const name = typeNode.arg ?? "";

  if (name === "leafref") {
    const target = typeNode.links.leafrefTarget;
    if (target) return resolveType(ctx, target);
    const pkg = packagePath(ctx, typeNode.id, "model").qualifiedName;
    warnOnce(
      ctx,
      `leafref:${typeNode.id.id}`,
      createDiagnostic(
        "YM2002",
        "warning",
        `Leafref in ${pkg} has no resolved target; using string`,
        typeNode.position
      )
    );
    return fallback(ctx);
  }

  const known = BUILTIN_TYPES.get(name);
  if (known) {
    return { wrapper: qualify(ctx, known.wrapper), primitive: known.primitive };
  }

  const typedefId = typeNode.links.typedef;
  if (!typedefId) {
    const pkg = packagePath(ctx, typeNode.id, "model").qualifiedName;
    warnOnce(
      ctx,
      `typedef:${pkg}:${name}`,
      createDiagnostic(
        "YM2001",
        "warning",
        `Type '${name}' in ${pkg} could not be resolved; using string`,
        typeNode.position,
        "Check that the module defining the type is part of the bundle"
      )
    );
    return fallback(ctx);
  }

  const base = resolveType(ctx, typedefId);
  const typedef = ctx.navigator.node(typedefId);
  const declaredIn =
    typedef.parent === undefined ? undefined : ctx.navigator.node(typedef.parent);
  if (declaredIn && isModuleKeyword(declaredIn.keyword)) {
    const pkg = packagePath(ctx, typedefId, "model").qualifiedName;
    const typeName = normalizeIdentifier(ctx.naming, typedef.arg).type;
    return { wrapper: `${pkg}.${typeName}`, primitive: base.primitive };
  }
  return base;
};

const compute = (ctx: ResolverContext, id: NodeId): ResolvedType => {
  const node = ctx.navigator.node(id);
  if (!WRAPPED_KEYWORDS.has(node.keyword)) {
    return fromTypeStatement(ctx, node);
  }

  const typeNode = findChild(ctx.navigator.tree, id, "type");
  if (typeNode) return fromTypeStatement(ctx, typeNode);

  warnOnce(
    ctx,
    `notype:${id.id}`,
    createDiagnostic(
      "YM2006",
      "warning",
      `${node.keyword} '${node.arg ?? ""}' has no type statement; using string`,
      node.position
    )
  );
  return fallback(ctx);
};

/**
 * Resolve a `type`, `typedef`, `leaf` or `leaf-list` statement.
 * Memoized per node for the run.
 */
export const resolveType = (ctx: ResolverContext, id: NodeId): ResolvedType => {
  const cached = ctx.typeCache.get(id.id);
  if (cached) return cached;

  const resolved = Object.freeze(compute(ctx, id));
  ctx.typeCache.set(id.id, resolved);
  return resolved;
};
