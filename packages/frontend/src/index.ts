/**
 * assertlint frontend - TypeScript programs lowered into analysis units
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export * from "./program/index.js";
export * from "./symbol-table/index.js";
export * from "./syntax/index.js";
export * from "./resolver/index.js";
export { createAnalysisUnit, type AnalysisUnit } from "./analysis-unit.js";
export {
  TEST_SOURCE_ROOT,
  TEST_FILE,
  TEST_COMPILER_OPTIONS,
  createTestProgram,
  createTestUnit,
} from "./test-harness.js";
