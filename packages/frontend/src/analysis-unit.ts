/**
 * Analysis units - one source file with its lowered tree and resolver
 */

import * as ts from "typescript";
import type { AnalysisProgram } from "./program/types.js";
import { createSymbolTable } from "./symbol-table/creation.js";
import { buildAnalysisTree } from "./syntax/builder.js";
import type { UnitNode } from "./syntax/types.js";
import { createSymbolResolver } from "./resolver/creation.js";
import type { SymbolResolver } from "./resolver/types.js";

export type AnalysisUnit = {
  readonly fileName: string;
  readonly root: UnitNode;
  readonly resolver: SymbolResolver;
};

/**
 * Lower a source file into an analysis unit.
 * Symbol handles are fresh per unit.
 */
export const createAnalysisUnit = (
  program: AnalysisProgram,
  sourceFile: ts.SourceFile
): AnalysisUnit => {
  const symbols = createSymbolTable(program.checker);
  const { root, declarations } = buildAnalysisTree(
    sourceFile,
    program.checker,
    symbols
  );
  return {
    fileName: sourceFile.fileName,
    root,
    resolver: createSymbolResolver(program.checker, symbols, declarations),
  };
};
