/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { DEFAULT_RUNTIME_PACKAGE } from "@yangmodel/resolver";
import type {
  YangModelConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "yangmodel.json";

const PACKAGE_NAME = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;

export const isValidPackageName = (name: string): boolean =>
  PACKAGE_NAME.test(name);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalString = (
  raw: Record<string, unknown>,
  field: string
): Result<string | undefined, string> => {
  const value = raw[field];
  if (value === undefined || typeof value === "string") {
    return { ok: true, value };
  }
  return { ok: false, error: `${CONFIG_FILE_NAME}: '${field}' must be a string` };
};

const optionalBoolean = (
  raw: Record<string, unknown>,
  field: string
): Result<boolean | undefined, string> => {
  const value = raw[field];
  if (value === undefined || typeof value === "boolean") {
    return { ok: true, value };
  }
  return { ok: false, error: `${CONFIG_FILE_NAME}: '${field}' must be a boolean` };
};

/**
 * Validate parsed yangmodel.json content
 */
export const parseConfig = (raw: unknown): Result<YangModelConfig, string> => {
  if (!isRecord(raw)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: expected an object` };
  }

  if (typeof raw.rootPackage !== "string" || raw.rootPackage === "") {
    return { ok: false, error: `${CONFIG_FILE_NAME}: 'rootPackage' is required` };
  }
  if (!isValidPackageName(raw.rootPackage)) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: 'rootPackage' must be a dotted package name, got '${raw.rootPackage}'`,
    };
  }

  const runtimePackage = optionalString(raw, "runtimePackage");
  if (!runtimePackage.ok) return runtimePackage;
  const output = optionalString(raw, "output");
  if (!output.ok) return output;
  const ignoreErrors = optionalBoolean(raw, "ignoreErrors");
  if (!ignoreErrors.ok) return ignoreErrors;
  const includeImports = optionalBoolean(raw, "includeImports");
  if (!includeImports.ok) return includeImports;

  const reserved = raw.reservedWords;
  const reservedWords: string[] = [];
  if (reserved !== undefined) {
    if (!Array.isArray(reserved)) {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: 'reservedWords' must be an array of strings`,
      };
    }
    for (const word of reserved) {
      if (typeof word !== "string") {
        return {
          ok: false,
          error: `${CONFIG_FILE_NAME}: 'reservedWords' must be an array of strings`,
        };
      }
      reservedWords.push(word);
    }
  }

  return {
    ok: true,
    value: {
      rootPackage: raw.rootPackage,
      runtimePackage: runtimePackage.value,
      output: output.value,
      ignoreErrors: ignoreErrors.value,
      includeImports: includeImports.value,
      reservedWords: reserved === undefined ? undefined : reservedWords,
    },
  };
};

/**
 * Load yangmodel.json
 */
export const loadConfig = (
  configPath: string
): Result<YangModelConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return parseConfig(raw);
};

/**
 * Find yangmodel.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args
 * @param projectRoot - Directory containing yangmodel.json; file paths in the config are relative to it
 */
export const resolveConfig = (
  config: YangModelConfig,
  cliOptions: CliOptions,
  projectRoot: string = process.cwd()
): ResolvedConfig => ({
  rootPackage: cliOptions.rootPackage ?? config.rootPackage,
  runtimePackage:
    cliOptions.runtimePackage ??
    config.runtimePackage ??
    DEFAULT_RUNTIME_PACKAGE,
  ignoreErrors: cliOptions.ignoreErrors ?? config.ignoreErrors ?? false,
  includeImports: cliOptions.imports ?? config.includeImports ?? false,
  reservedWords: config.reservedWords ?? [],
  output:
    cliOptions.out ??
    (config.output === undefined
      ? undefined
      : resolve(projectRoot, config.output)),
  verbose: (cliOptions.verbose ?? false) && !(cliOptions.quiet ?? false),
  quiet: cliOptions.quiet ?? false,
});
