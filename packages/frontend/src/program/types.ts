/**
 * Program type definitions
 */

import type * as ts from "typescript";

export type ProgramOptions = {
  /** Directory the analysed files live under */
  readonly sourceRoot: string;
  /** Overrides applied on top of the default compiler options */
  readonly compilerOptions?: ts.CompilerOptions;
};

export type AnalysisProgram = {
  readonly program: ts.Program;
  readonly checker: ts.TypeChecker;
  readonly options: ProgramOptions;
  /** The requested source files, in request order */
  readonly sourceFiles: readonly ts.SourceFile[];
};
