/**
 * yangmodel frontend - schema tree model, bundle loading and navigation
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  hasErrors,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/schema.js";

export * from "./schema/builder.js";
export * from "./schema/bundle-loader.js";
export * from "./schema/module-table.js";
export * from "./schema/test-harness.js";

export * from "./navigator/navigator.js";
export * from "./validation/validator-diagnostics.js";
