/**
 * Diagnostic types for schema resolution
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // Schema bundle loading (YM1001-YM1099)
  | "YM1001" // Bundle file not found
  | "YM1002" // Failed to read bundle file
  | "YM1003" // Invalid JSON in bundle file
  | "YM1004" // Bundle must be an object with a 'modules' array
  | "YM1005" // Invalid statement
  | "YM1006" // Unknown reference label
  | "YM1007" // Duplicate reference label
  | "YM1008" // Invalid validator diagnostic entry
  // Degraded resolution (YM2001-YM2099)
  | "YM2001" // Derived type has no typedef linkage
  | "YM2002" // Leafref has no resolved target
  | "YM2003" // Augment has no resolved target
  | "YM2004" // List has no key statement
  | "YM2005" // Key names a leaf the list does not have
  | "YM2006" // Leaf or typedef without a type statement
  | "YM2007" // Validator finding demoted to a warning
  // Fatal (YM3001-YM3099)
  | "YM3001" // Module not found
  | "YM3002" // Module reported with fatal validator errors
  | "YM3003"; // Resolution aborted

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column?: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const hasErrors = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some(isError);

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    const { file, line, column } = diagnostic.location;
    parts.push(
      column === undefined ? `${file}:${line}` : `${file}:${line}:${column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
