/**
 * Rule runner - analyses every unit of a program independently
 */

import {
  type AnalysisProgram,
  type Diagnostic,
  type DiagnosticsCollector,
  type ProgramOptions,
  type Result,
  addDiagnostic,
  createAnalysisUnit,
  createDiagnostic,
  createProgram,
  createProgramFromSources,
  map,
  tryCatch,
} from "@assertlint/frontend";
import * as ts from "typescript";
import type { AssertionsInTestsRule } from "./rules/assertions-in-tests.js";

const describeThrown = (thrown: unknown): string =>
  thrown instanceof Error ? thrown.message : String(thrown);

/**
 * Check one file. A failure inside the file is reported against it and
 * never leaks into other files.
 */
export const analyzeSourceFile = (
  program: AnalysisProgram,
  sourceFile: ts.SourceFile,
  rule: AssertionsInTestsRule
): readonly Diagnostic[] => {
  const result = tryCatch(
    () => rule.checkUnit(createAnalysisUnit(program, sourceFile)),
    (thrown) =>
      createDiagnostic(
        "ASL6001",
        "error",
        `Internal error while analysing ${sourceFile.fileName}: ${describeThrown(thrown)}`
      )
  );
  return result.ok ? result.value : [result.error];
};

/**
 * Run the rule over every source file of a program.
 * Configuration warnings come first, then findings in file order.
 */
export const analyzeProgram = (
  program: AnalysisProgram,
  rule: AssertionsInTestsRule
): DiagnosticsCollector =>
  program.sourceFiles
    .flatMap((sourceFile) => analyzeSourceFile(program, sourceFile, rule))
    .reduce(addDiagnostic, rule.customMatchers().diagnostics);

export const analyzeFiles = (
  filePaths: readonly string[],
  options: ProgramOptions,
  rule: AssertionsInTestsRule
): Result<DiagnosticsCollector, DiagnosticsCollector> =>
  map(createProgram(filePaths, options), (program) =>
    analyzeProgram(program, rule)
  );

export const analyzeSources = (
  files: Readonly<Record<string, string>>,
  options: ProgramOptions,
  rule: AssertionsInTestsRule
): Result<DiagnosticsCollector, DiagnosticsCollector> =>
  map(createProgramFromSources(files, options), (program) =>
    analyzeProgram(program, rule)
  );
