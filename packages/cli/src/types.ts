/**
 * Type definitions for CLI
 */

export type { Result } from "@yangmodel/frontend";

/**
 * Configuration file (yangmodel.json)
 */
export type YangModelConfig = {
  readonly $schema?: string;
  /** Dotted package every generated package lives under */
  readonly rootPackage: string;
  readonly runtimePackage?: string;
  readonly ignoreErrors?: boolean;
  readonly includeImports?: boolean;
  /** Identifiers escaped in addition to the built-in reserved words */
  readonly reservedWords?: readonly string[];
  /** Report file, relative to the config file; stdout when absent */
  readonly output?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  rootPackage?: string;
  runtimePackage?: string;
  ignoreErrors?: boolean;
  imports?: boolean;
  out?: string;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly rootPackage: string;
  readonly runtimePackage: string;
  readonly ignoreErrors: boolean;
  readonly includeImports: boolean;
  readonly reservedWords: readonly string[];
  /** Absolute or cwd-relative report path; undefined writes to stdout */
  readonly output: string | undefined;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
