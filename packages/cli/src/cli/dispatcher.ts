/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import {
  loadConfig,
  findConfig,
  resolveConfig,
  isValidPackageName,
  CONFIG_FILE_NAME,
} from "../config.js";
import { resolveCommand } from "../commands/resolve.js";
import type { Result, YangModelConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs, type ParsedArgs } from "./parser.js";

/**
 * Load the config file, or stand one up from --root-package when there is none
 */
const loadProjectConfig = (
  parsed: ParsedArgs
): Result<{ config: YangModelConfig; projectRoot: string }, string> => {
  const configPath = parsed.options.config
    ? resolve(process.cwd(), parsed.options.config)
    : findConfig(process.cwd());

  if (!configPath) {
    const rootPackage = parsed.options.rootPackage;
    if (rootPackage === undefined) {
      return {
        ok: false,
        error: `No ${CONFIG_FILE_NAME} found and no --root-package given`,
      };
    }
    return { ok: true, value: { config: { rootPackage }, projectRoot: process.cwd() } };
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) return configResult;
  return {
    ok: true,
    value: { config: configResult.value, projectRoot: dirname(configPath) },
  };
};

/**
 * Main CLI entry point
 */
export const runCli = async (args: string[]): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`yangmodel v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (parsed.unknown.length > 0) {
    console.error(`Error: Unknown option '${parsed.unknown[0]}'`);
    console.error("Run 'yangmodel --help' for usage information");
    return 2;
  }

  switch (parsed.command) {
    case "resolve": {
      if (!parsed.bundleFile) {
        console.error("Error: Schema bundle path required");
        console.error("Usage: yangmodel resolve <bundle.json> [options]");
        return 1;
      }

      const project = loadProjectConfig(parsed);
      if (!project.ok) {
        console.error(`Error: ${project.error}`);
        return 1;
      }

      const config = resolveConfig(
        project.value.config,
        parsed.options,
        project.value.projectRoot
      );
      if (!isValidPackageName(config.rootPackage)) {
        console.error(`Error: Invalid root package '${config.rootPackage}'`);
        return 1;
      }

      const result = resolveCommand(resolve(process.cwd(), parsed.bundleFile), config);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return 1;
      }
      return 0;
    }

    default:
      console.error(`Error: Unknown command '${parsed.command}'`);
      console.error("Run 'yangmodel --help' for usage information");
      return 2;
  }
};
