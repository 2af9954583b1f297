/**
 * Test harness for analysis tests.
 * Builds real TypeScript programs from in-memory sources.
 */

import * as ts from "typescript";
import { formatDiagnostic } from "./types/diagnostic.js";
import { createProgramFromSources } from "./program/creation.js";
import type { AnalysisProgram } from "./program/types.js";
import { type AnalysisUnit, createAnalysisUnit } from "./analysis-unit.js";

export const TEST_SOURCE_ROOT = "/test";
export const TEST_FILE = "/test/sample.test.ts";

/**
 * Hermetic compiler options: no ambient @types packages, a small lib
 */
export const TEST_COMPILER_OPTIONS: ts.CompilerOptions = {
  types: [],
  lib: ["lib.es2022.d.ts"],
};

/**
 * Create a program from sources keyed by absolute path.
 * Throws when the sources do not parse.
 */
export const createTestProgram = (
  files: Readonly<Record<string, string>>
): AnalysisProgram => {
  const result = createProgramFromSources(files, {
    sourceRoot: TEST_SOURCE_ROOT,
    compilerOptions: TEST_COMPILER_OPTIONS,
  });
  if (!result.ok) {
    throw new Error(
      result.error.diagnostics.map(formatDiagnostic).join("\n")
    );
  }
  return result.value;
};

/**
 * Lower a single source text into an analysis unit
 */
export const createTestUnit = (
  source: string,
  fileName: string = TEST_FILE
): AnalysisUnit => {
  const program = createTestProgram({ [fileName]: source });
  const sourceFile = program.sourceFiles[0];
  if (!sourceFile) {
    throw new Error(`Source file not loaded: ${fileName}`);
  }
  return createAnalysisUnit(program, sourceFile);
};
