/**
 * JSON model report - what a template stage needs per generated unit
 */

import {
  latestUnits,
  type GeneratedUnit,
  type ResolutionResult,
  type UnitKind,
  type WalkPhase,
} from "@yangmodel/resolver";

export type ReportKey = {
  readonly name: string;
  readonly wrapper: string;
  readonly primitive: string;
};

export type ReportLeaf = {
  readonly name: string;
  readonly wrapper: string;
  readonly primitive: string;
  readonly multiple: boolean;
  readonly isKey: boolean;
  readonly direction?: "input" | "output";
};

export type ReportUnit = {
  readonly kind: UnitKind;
  readonly phase: WalkPhase;
  readonly tagpath: string;
  readonly member: string;
  readonly type: string;
  readonly modelPackage: string;
  readonly apiPackage: string;
  readonly keys: readonly ReportKey[];
  readonly leaves: readonly ReportLeaf[];
  /** Tagpaths of the nearest child units */
  readonly children: readonly string[];
};

export type ModelReport = {
  readonly rootPackage: string;
  readonly augmentedModules: readonly string[];
  readonly units: readonly ReportUnit[];
};

const toReportUnit = (
  unit: GeneratedUnit,
  tagpaths: ReadonlyMap<number, string>
): ReportUnit => ({
  kind: unit.kind,
  phase: unit.phase,
  tagpath: unit.tagpath,
  member: unit.name.member,
  type: unit.name.type,
  modelPackage: unit.modelPackage.qualifiedName,
  apiPackage: unit.apiPackage.qualifiedName,
  keys: unit.keys.map((key) => ({
    name: key.name,
    wrapper: key.type.wrapper,
    primitive: key.type.primitive,
  })),
  leaves: unit.leaves.map((leaf) => ({
    name: leaf.name.member,
    wrapper: leaf.type.wrapper,
    primitive: leaf.type.primitive,
    multiple: leaf.multiple,
    isKey: leaf.isKey,
    ...(leaf.direction ? { direction: leaf.direction } : {}),
  })),
  children: unit.childUnits.flatMap((child) => {
    const tagpath = tagpaths.get(child.id);
    return tagpath === undefined ? [] : [tagpath];
  }),
});

/**
 * Build the report from the latest unit of every node.
 */
export const buildReport = (
  result: ResolutionResult,
  rootPackage: string
): ModelReport => {
  const units = latestUnits(result.units);
  const tagpaths = new Map(units.map((unit) => [unit.node.id, unit.tagpath]));
  return {
    rootPackage,
    augmentedModules: result.augmentedModules,
    units: units.map((unit) => toReportUnit(unit, tagpaths)),
  };
};
