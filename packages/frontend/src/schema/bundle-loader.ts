/**
 * Schema bundle loader - Reads the JSON dump a schema parser writes for a
 * set of modules and rebuilds the linked tree from it.
 *
 * Bundle layout:
 * {
 *   "modules": [StatementSpec, ...],
 *   "diagnostics": [ValidatorDiagnostic, ...]   // optional
 * }
 */

import * as fs from "node:fs";
import * as path from "node:path";
import type { Diagnostic, SourceLocation } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { ok, error, flatMap, map } from "../types/result.js";
import type { ValidatorDiagnostic } from "../validation/validator-diagnostics.js";
import type { BuiltSchemaTree, StatementSpec } from "./builder.js";
import { buildSchemaTree } from "./builder.js";

export type SchemaBundle = {
  readonly tree: BuiltSchemaTree;
  readonly validatorDiagnostics: readonly ValidatorDiagnostic[];
};

type RawBundle = {
  readonly modules: readonly StatementSpec[];
  readonly validatorDiagnostics: readonly ValidatorDiagnostic[];
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const LINK_FIELDS = [
  "ref",
  "typedef",
  "leafref",
  "augment",
  "belongsTo",
  "origin",
] as const;

const invalid = (where: string, problem: string): Diagnostic =>
  createDiagnostic("YM1005", "error", `${where}: ${problem}`);

const parsePosition = (
  value: unknown,
  where: string,
  diagnostics: Diagnostic[]
): SourceLocation | undefined => {
  if (value === undefined) return undefined;
  if (
    !isRecord(value) ||
    typeof value.file !== "string" ||
    typeof value.line !== "number"
  ) {
    diagnostics.push(
      invalid(where, "'position' must be { file: string, line: number }")
    );
    return undefined;
  }
  return typeof value.column === "number"
    ? { file: value.file, line: value.line, column: value.column }
    : { file: value.file, line: value.line };
};

const parseStatement = (
  value: unknown,
  where: string,
  diagnostics: Diagnostic[]
): StatementSpec | undefined => {
  if (!isRecord(value)) {
    diagnostics.push(invalid(where, "statement must be an object"));
    return undefined;
  }
  if (typeof value.keyword !== "string" || value.keyword === "") {
    diagnostics.push(invalid(where, "'keyword' must be a non-empty string"));
    return undefined;
  }
  if (value.arg !== undefined && typeof value.arg !== "string") {
    diagnostics.push(invalid(where, "'arg' must be a string"));
  }

  const labels: Partial<Record<(typeof LINK_FIELDS)[number], string>> = {};
  for (const field of LINK_FIELDS) {
    const label = value[field];
    if (label === undefined) continue;
    if (typeof label === "string") {
      labels[field] = label;
    } else {
      diagnostics.push(invalid(where, `'${field}' must be a string label`));
    }
  }

  const children: StatementSpec[] = [];
  if (value.children !== undefined) {
    if (Array.isArray(value.children)) {
      value.children.forEach((child: unknown, index) => {
        const parsed = parseStatement(
          child,
          `${where}.children[${index}]`,
          diagnostics
        );
        if (parsed) children.push(parsed);
      });
    } else {
      diagnostics.push(invalid(where, "'children' must be an array"));
    }
  }

  return {
    ...labels,
    keyword: value.keyword,
    arg: typeof value.arg === "string" ? value.arg : undefined,
    position: parsePosition(value.position, where, diagnostics),
    children,
  };
};

const parseValidatorDiagnostic = (
  value: unknown,
  where: string,
  diagnostics: Diagnostic[]
): ValidatorDiagnostic | undefined => {
  if (
    !isRecord(value) ||
    typeof value.tag !== "string" ||
    typeof value.module !== "string" ||
    (value.severity !== "error" && value.severity !== "warning")
  ) {
    diagnostics.push(
      createDiagnostic(
        "YM1008",
        "error",
        `${where}: expected { tag: string, module: string, severity: "error" | "warning" }`
      )
    );
    return undefined;
  }

  return {
    tag: value.tag,
    module: value.module,
    severity: value.severity,
    file: typeof value.file === "string" ? value.file : undefined,
    line: typeof value.line === "number" ? value.line : undefined,
    message: typeof value.message === "string" ? value.message : undefined,
  };
};

const validateBundle = (
  data: unknown,
  fileName: string
): Result<RawBundle, readonly Diagnostic[]> => {
  if (!isRecord(data) || !Array.isArray(data.modules)) {
    return error([
      createDiagnostic(
        "YM1004",
        "error",
        `Schema bundle ${fileName} must be an object with a 'modules' array`
      ),
    ]);
  }

  const diagnostics: Diagnostic[] = [];
  const modules = data.modules.flatMap((module: unknown, index) => {
    const parsed = parseStatement(module, `modules[${index}]`, diagnostics);
    return parsed ? [parsed] : [];
  });

  const rawFindings: readonly unknown[] = Array.isArray(data.diagnostics)
    ? data.diagnostics
    : [];
  if (data.diagnostics !== undefined && !Array.isArray(data.diagnostics)) {
    diagnostics.push(
      createDiagnostic("YM1008", "error", "'diagnostics' must be an array")
    );
  }
  const validatorDiagnostics = rawFindings.flatMap((finding, index) => {
    const parsed = parseValidatorDiagnostic(
      finding,
      `diagnostics[${index}]`,
      diagnostics
    );
    return parsed ? [parsed] : [];
  });

  return diagnostics.length > 0
    ? error(diagnostics)
    : ok({ modules, validatorDiagnostics });
};

/**
 * Validate parsed bundle JSON and build its tree.
 */
export const parseSchemaBundle = (
  data: unknown,
  fileName = "<memory>"
): Result<SchemaBundle, readonly Diagnostic[]> =>
  flatMap(validateBundle(data, fileName), (raw) =>
    map(buildSchemaTree(raw.modules), (tree) => ({
      tree,
      validatorDiagnostics: raw.validatorDiagnostics,
    }))
  );

/**
 * Load and parse a schema bundle file.
 *
 * @param filePath - Path to the bundle JSON
 * @returns Result containing the linked tree or diagnostics
 */
export const loadSchemaBundle = (
  filePath: string
): Result<SchemaBundle, readonly Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return error([
      createDiagnostic(
        "YM1001",
        "error",
        `Schema bundle not found: ${filePath}`
      ),
    ]);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return error([
      createDiagnostic(
        "YM1002",
        "error",
        `Failed to read schema bundle: ${err instanceof Error ? err.message : String(err)}`
      ),
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return error([
      createDiagnostic(
        "YM1003",
        "error",
        `Invalid JSON in schema bundle ${path.basename(filePath)}: ${err instanceof Error ? err.message : String(err)}`
      ),
    ]);
  }

  return parseSchemaBundle(parsed, path.basename(filePath));
};
