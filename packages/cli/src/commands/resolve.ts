/**
 * yangmodel resolve command - resolve a schema bundle into a model report
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import {
  formatDiagnostic,
  loadSchemaBundle,
  type Diagnostic,
} from "@yangmodel/frontend";
import { resolveSchema } from "@yangmodel/resolver";
import type { ResolvedConfig, Result } from "../types.js";
import { buildReport } from "./report.js";

export type ResolveSummary = {
  readonly unitCount: number;
  readonly warningCount: number;
  readonly augmentedModules: readonly string[];
  /** Undefined when the report went to stdout */
  readonly outputPath: string | undefined;
};

const printDiagnostics = (diagnostics: readonly Diagnostic[]): void => {
  for (const diagnostic of diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
};

/**
 * Resolve the bundle at `bundlePath` and write the report
 */
export const resolveCommand = (
  bundlePath: string,
  config: ResolvedConfig,
  signal?: AbortSignal
): Result<ResolveSummary, string> => {
  const { quiet, verbose, output } = config;
  // the report owns stdout when no output file is set
  const progress = output === undefined ? console.error : console.log;

  const bundle = loadSchemaBundle(bundlePath);
  if (!bundle.ok) {
    printDiagnostics(bundle.error);
    return { ok: false, error: `Failed to load schema bundle ${bundlePath}` };
  }

  if (verbose) {
    progress(
      `Loaded ${bundle.value.tree.roots.length} module(s), ${bundle.value.tree.nodes.length} statement(s)`
    );
  }

  const result = resolveSchema(
    {
      tree: bundle.value.tree,
      validatorDiagnostics: bundle.value.validatorDiagnostics,
    },
    {
      rootPackage: config.rootPackage,
      runtimePackage: config.runtimePackage,
      reservedWords: config.reservedWords,
      ignoreErrors: config.ignoreErrors,
      includeImports: config.includeImports,
      signal,
      onModule: verbose
        ? (name, phase, unitCount) =>
            progress(`  ${phase} ${name}: ${unitCount} unit(s)`)
        : undefined,
    }
  );
  if (!result.ok) {
    printDiagnostics(result.error);
    return { ok: false, error: "Resolution failed" };
  }

  if (!quiet) {
    printDiagnostics(result.value.diagnostics);
  }

  const report = buildReport(result.value, config.rootPackage);
  const json = `${JSON.stringify(report, null, 2)}\n`;

  if (output === undefined) {
    process.stdout.write(json);
  } else {
    try {
      mkdirSync(dirname(output), { recursive: true });
      writeFileSync(output, json, "utf-8");
    } catch (error) {
      return {
        ok: false,
        error: `Failed to write report: ${error instanceof Error ? error.message : String(error)}`,
      };
    }
  }

  if (verbose) {
    progress(
      `Resolved ${report.units.length} unit(s), ${result.value.diagnostics.length} warning(s)`
    );
    if (result.value.augmentedModules.length > 0) {
      progress(`Augmented: ${result.value.augmentedModules.join(", ")}`);
    }
  }
  if (!quiet && output !== undefined) {
    console.log(`✓ Model report written: ${output}`);
  }

  return {
    ok: true,
    value: {
      unitCount: report.units.length,
      warningCount: result.value.diagnostics.length,
      augmentedModules: result.value.augmentedModules,
      outputPath: output,
    },
  };
};
