/**
 * Schema tree builder
 *
 * Turns declarative statement specs (the element type of a schema bundle)
 * into a frozen arena. Cross-references are written as `ref` labels and
 * resolved to handles in a second pass, so a spec may point forward.
 */

import type { Diagnostic, SourceLocation } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import type {
  NodeId,
  NodeLinks,
  SchemaNode,
  SchemaTree,
} from "../types/schema.js";
import { isModuleKeyword, makeNodeId } from "../types/schema.js";

export type StatementSpec = {
  readonly keyword: string;
  readonly arg?: string;
  /** Label other statements use to reference this one */
  readonly ref?: string;
  readonly position?: SourceLocation;
  readonly children?: readonly StatementSpec[];
  /** `type` → typedef label */
  readonly typedef?: string;
  /** `type leafref` → target leaf label */
  readonly leafref?: string;
  /** `augment` → target node label */
  readonly augment?: string;
  /** `submodule` → owning module label */
  readonly belongsTo?: string;
  /** Module label overriding the lexically enclosing module */
  readonly origin?: string;
};

export type BuiltSchemaTree = SchemaTree & {
  /** Reference labels from the input, by label */
  readonly refs: ReadonlyMap<string, NodeId>;
};

type Draft = {
  readonly id: NodeId;
  readonly spec: StatementSpec;
  readonly parent: NodeId | undefined;
  readonly enclosingModule: NodeId | undefined;
  readonly children: NodeId[];
};

/**
 * Shorthand for writing statement specs by hand.
 */
export const stmt = (
  keyword: string,
  arg?: string,
  children: readonly StatementSpec[] = [],
  extra: Omit<StatementSpec, "keyword" | "arg" | "children"> = {}
): StatementSpec => ({ ...extra, keyword, arg, children });

const collectDrafts = (
  modules: readonly StatementSpec[],
  drafts: Draft[],
  refs: Map<string, NodeId>,
  diagnostics: Diagnostic[]
): readonly NodeId[] => {
  const visit = (
    spec: StatementSpec,
    parent: Draft | undefined
  ): NodeId => {
    const id = makeNodeId(drafts.length);
    const enclosingModule = parent
      ? isModuleKeyword(parent.spec.keyword)
        ? parent.id
        : parent.enclosingModule
      : undefined;
    const draft: Draft = {
      id,
      spec,
      parent: parent?.id,
      enclosingModule,
      children: [],
    };
    drafts.push(draft);

    if (spec.ref !== undefined) {
      if (refs.has(spec.ref)) {
        diagnostics.push(
          createDiagnostic(
            "YM1007",
            "error",
            `Duplicate reference label '${spec.ref}'`,
            spec.position
          )
        );
      } else {
        refs.set(spec.ref, id);
      }
    }

    for (const child of spec.children ?? []) {
      draft.children.push(visit(child, draft));
    }
    return id;
  };

  return modules.map((module) => visit(module, undefined));
};

const resolveLinks = (
  draft: Draft,
  refs: ReadonlyMap<string, NodeId>,
  diagnostics: Diagnostic[]
): { readonly links: NodeLinks; readonly origin: NodeId | undefined } => {
  const lookup = (
    label: string | undefined,
    field: string
  ): NodeId | undefined => {
    if (label === undefined) return undefined;
    const target = refs.get(label);
    if (!target) {
      diagnostics.push(
        createDiagnostic(
          "YM1006",
          "error",
          `Unknown reference label '${label}' in '${field}' of ${draft.spec.keyword} '${draft.spec.arg ?? ""}'`,
          draft.spec.position
        )
      );
    }
    return target;
  };

  const { spec } = draft;
  const typedef = lookup(spec.typedef, "typedef");
  const leafrefTarget = lookup(spec.leafref, "leafref");
  const augmentTarget = lookup(spec.augment, "augment");
  const mainModule = lookup(spec.belongsTo, "belongsTo");
  const origin = lookup(spec.origin, "origin") ?? draft.enclosingModule;

  return {
    links: {
      ...(typedef ? { typedef } : {}),
      ...(leafrefTarget ? { leafrefTarget } : {}),
      ...(augmentTarget ? { augmentTarget } : {}),
      ...(mainModule ? { mainModule } : {}),
    },
    origin,
  };
};

/**
 * Build a schema tree from module and submodule statement specs.
 */
export const buildSchemaTree = (
  modules: readonly StatementSpec[]
): Result<BuiltSchemaTree, readonly Diagnostic[]> => {
  const drafts: Draft[] = [];
  const refs = new Map<string, NodeId>();
  const diagnostics: Diagnostic[] = [];

  const roots = collectDrafts(modules, drafts, refs, diagnostics);

  const nodes = drafts.map((draft): SchemaNode => {
    const { links, origin } = resolveLinks(draft, refs, diagnostics);
    return Object.freeze({
      id: draft.id,
      keyword: draft.spec.keyword,
      arg: draft.spec.arg,
      parent: draft.parent,
      children: Object.freeze([...draft.children]),
      originModule: origin,
      position: draft.spec.position,
      links: Object.freeze(links),
    });
  });

  if (diagnostics.length > 0) {
    return error(diagnostics);
  }

  return ok({
    nodes: Object.freeze(nodes),
    roots: Object.freeze([...roots]),
    refs,
  });
};
