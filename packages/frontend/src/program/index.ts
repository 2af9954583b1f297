/**
 * Program - Public API
 */

export type { ProgramOptions, AnalysisProgram } from "./types.js";
export { defaultTsConfig } from "./config.js";
export {
  collectSyntaxDiagnostics,
  convertTsDiagnostic,
  getSourceLocation,
} from "./diagnostics.js";
export {
  createProgram,
  createProgramFromSources,
  createCompilerOptions,
} from "./creation.js";
export { scanSourceFiles } from "./discovery.js";
