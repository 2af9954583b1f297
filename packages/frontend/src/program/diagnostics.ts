/**
 * TypeScript diagnostics collection and conversion
 */

import * as ts from "typescript";
import {
  type Diagnostic,
  type DiagnosticsCollector,
  type SourceLocation,
  createDiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
} from "../types/diagnostic.js";

/**
 * Collect syntax errors for the analysed files.
 * Semantic errors are ignored: unresolved names simply stay unresolved.
 */
export const collectSyntaxDiagnostics = (
  program: ts.Program,
  sourceFiles: readonly ts.SourceFile[]
): DiagnosticsCollector =>
  sourceFiles
    .flatMap((sourceFile) => program.getSyntacticDiagnostics(sourceFile))
    .reduce((collector, tsDiag) => {
      const diagnostic = convertTsDiagnostic(tsDiag);
      return diagnostic ? addDiagnostic(collector, diagnostic) : collector;
    }, createDiagnosticsCollector());

/**
 * Convert a TypeScript syntax diagnostic
 */
export const convertTsDiagnostic = (
  tsDiag: ts.Diagnostic
): Diagnostic | null => {
  if (tsDiag.category !== ts.DiagnosticCategory.Error) {
    return null;
  }

  const message = ts.flattenDiagnosticMessageText(tsDiag.messageText, "\n");

  const location =
    tsDiag.file && tsDiag.start !== undefined
      ? getSourceLocation(tsDiag.file, tsDiag.start, tsDiag.length ?? 1)
      : undefined;

  return createDiagnostic("ASL9002", "error", message, location);
};

/**
 * Get source location information from TypeScript source file
 */
export const getSourceLocation = (
  file: ts.SourceFile,
  start: number,
  length: number
): SourceLocation => {
  const { line, character } = file.getLineAndCharacterOfPosition(start);
  return {
    file: file.fileName,
    line: line + 1,
    column: character + 1,
    length,
  };
};
