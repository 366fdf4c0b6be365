/**
 * Intake of findings reported by the external schema validator.
 *
 * The validator runs before resolution and reports `(position, tag,
 * severity)` triples. Resolution reacts to two fixed tag families: the
 * module-not-found family aborts a run, and the soft "x not found" family
 * is demoted to warnings while resolution falls back to string types.
 */

import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";

export type ValidatorDiagnostic = {
  readonly tag: string;
  readonly severity: "error" | "warning";
  /** Name of the top module the finding's position belongs to */
  readonly module: string;
  readonly file?: string;
  readonly line?: number;
  readonly message?: string;
};

export const FATAL_VALIDATOR_TAGS: ReadonlySet<string> = new Set([
  "MODULE_NOT_FOUND",
  "MODULE_NOT_FOUND_REV",
]);

export const SOFT_VALIDATOR_TAGS: ReadonlySet<string> = new Set([
  "TYPE_NOT_FOUND",
  "FEATURE_NOT_FOUND",
  "IDENTITY_NOT_FOUND",
  "GROUPING_NOT_FOUND",
]);

export type ValidatorFindingClass = "fatal" | "soft" | "other";

export const classifyValidatorDiagnostic = (
  finding: ValidatorDiagnostic
): ValidatorFindingClass => {
  if (finding.severity === "error" && FATAL_VALIDATOR_TAGS.has(finding.tag)) {
    return "fatal";
  }
  return SOFT_VALIDATOR_TAGS.has(finding.tag) ? "soft" : "other";
};

const describe = (finding: ValidatorDiagnostic): string =>
  finding.message
    ? `${finding.tag}: ${finding.message}`
    : `${finding.tag} in module '${finding.module}'`;

const locationOf = (finding: ValidatorDiagnostic) =>
  finding.file !== undefined && finding.line !== undefined
    ? { file: finding.file, line: finding.line }
    : undefined;

/**
 * Convert a validator finding into the diagnostic a run reports for it.
 * Fatal findings stay errors unless the caller ignores errors; everything
 * else is carried through as a warning.
 */
export const toResolutionDiagnostic = (
  finding: ValidatorDiagnostic,
  ignoreErrors: boolean
): Diagnostic => {
  if (classifyValidatorDiagnostic(finding) === "fatal" && !ignoreErrors) {
    return createDiagnostic(
      "YM3002",
      "error",
      `Module '${finding.module}' contains errors (${describe(finding)})`,
      locationOf(finding),
      "Fix the missing module or pass --ignore-errors"
    );
  }

  return createDiagnostic(
    "YM2007",
    "warning",
    describe(finding),
    locationOf(finding)
  );
};
