/**
 * TypeScript compiler configuration
 */

import * as ts from "typescript";

/**
 * Default TypeScript compiler options for analysis.
 * Type errors never block analysis, so the checker is kept permissive.
 */
export const defaultTsConfig: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  experimentalDecorators: true,
  strict: false,
  esModuleInterop: true,
  skipLibCheck: true,
  allowJs: false,
  noEmit: true,
  allowImportingTsExtensions: true,
};
