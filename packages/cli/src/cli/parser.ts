/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  /** First positional argument after the command */
  bundleFile?: string;
  options: CliOptions;
  /** Flags the parser does not know */
  unknown: string[];
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  const unknown: string[] = [];
  let command = "";
  let bundleFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    if (command && !bundleFile && !arg.startsWith("-")) {
      bundleFile = arg;
      continue;
    }

    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, unknown: [] };
      case "-v":
      case "--version":
        return { command: "version", options: {}, unknown: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-p":
      case "--root-package":
        options.rootPackage = args[++i] ?? "";
        break;
      case "--runtime-package":
        options.runtimePackage = args[++i] ?? "";
        break;
      case "--ignore-errors":
        options.ignoreErrors = true;
        break;
      case "--imports":
        options.imports = true;
        break;
      case "-o":
      case "--out":
        options.out = args[++i] ?? "";
        break;
      default:
        unknown.push(arg);
        break;
    }
  }

  return { command, bundleFile, options, unknown };
};
