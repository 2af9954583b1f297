/**
 * Program creation
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as fs from "node:fs";
import { type Result, ok, error } from "../types/result.js";
import {
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import type { AnalysisProgram, ProgramOptions } from "./types.js";
import { defaultTsConfig } from "./config.js";
import { collectSyntaxDiagnostics } from "./diagnostics.js";

/**
 * Create TypeScript compiler options from analysis options
 */
export const createCompilerOptions = (
  options: ProgramOptions
): ts.CompilerOptions => ({
  ...defaultTsConfig,
  rootDir: options.sourceRoot,
  ...options.compilerOptions,
});

/**
 * Build an analysis program from a TypeScript program and its root files
 */
const finishProgram = (
  program: ts.Program,
  rootNames: readonly string[],
  options: ProgramOptions
): Result<AnalysisProgram, DiagnosticsCollector> => {
  const sourceFiles = rootNames.flatMap((fileName) => {
    const sourceFile = program.getSourceFile(fileName);
    return sourceFile ? [sourceFile] : [];
  });

  const diagnostics = collectSyntaxDiagnostics(program, sourceFiles);
  if (diagnostics.hasErrors) {
    return error(diagnostics);
  }

  return ok({
    program,
    checker: program.getTypeChecker(),
    options,
    sourceFiles,
  });
};

/**
 * Create an analysis program from TypeScript files on disk
 */
export const createProgram = (
  filePaths: readonly string[],
  options: ProgramOptions
): Result<AnalysisProgram, DiagnosticsCollector> => {
  const absolutePaths = filePaths.map((fp) => path.resolve(fp));

  const missing = absolutePaths
    .filter((fp) => !fs.existsSync(fp))
    .reduce(
      (collector, fp) =>
        addDiagnostic(
          collector,
          createDiagnostic("ASL9001", "error", `Source file not found: ${fp}`)
        ),
      createDiagnosticsCollector()
    );
  if (missing.hasErrors) {
    return error(missing);
  }

  const program = ts.createProgram(
    absolutePaths,
    createCompilerOptions(options)
  );
  return finishProgram(program, absolutePaths, options);
};

/**
 * Create an analysis program from in-memory sources keyed by absolute path.
 * Library files and anything not in `files` come from the real file system.
 */
export const createProgramFromSources = (
  files: Readonly<Record<string, string>>,
  options: ProgramOptions
): Result<AnalysisProgram, DiagnosticsCollector> => {
  const tsOptions = createCompilerOptions(options);
  const host = ts.createCompilerHost(tsOptions);
  const sources = new Map(
    Object.entries(files).map(([fileName, text]) => [
      path.resolve(fileName),
      text,
    ])
  );

  const originalGetSourceFile = host.getSourceFile;
  host.getSourceFile = (
    fileName: string,
    languageVersionOrOptions: ts.ScriptTarget | ts.CreateSourceFileOptions,
    onError?: (message: string) => void,
    shouldCreateNewSourceFile?: boolean
  ): ts.SourceFile | undefined => {
    const text = sources.get(fileName);
    if (text !== undefined) {
      return ts.createSourceFile(fileName, text, languageVersionOrOptions, true);
    }
    return originalGetSourceFile.call(
      host,
      fileName,
      languageVersionOrOptions,
      onError,
      shouldCreateNewSourceFile
    );
  };

  const originalFileExists = host.fileExists;
  host.fileExists = (fileName: string): boolean =>
    sources.has(fileName) || originalFileExists.call(host, fileName);

  const originalReadFile = host.readFile;
  host.readFile = (fileName: string): string | undefined =>
    sources.get(fileName) ?? originalReadFile.call(host, fileName);

  const rootNames = [...sources.keys()];
  const program = ts.createProgram(rootNames, tsOptions, host);
  return finishProgram(program, rootNames, options);
};
