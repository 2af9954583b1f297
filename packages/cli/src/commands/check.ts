/**
 * assertlint check - report test methods without assertions
 */

import { relative } from "node:path";
import {
  type Diagnostic,
  type Result,
  ok,
  error,
  createProgram,
  scanSourceFiles,
  formatDiagnostic,
} from "@assertlint/frontend";
import {
  analyzeProgram,
  createAssertionsInTestsRule,
} from "@assertlint/analyzer";
import type { ResolvedConfig } from "../types.js";

export type CheckSummary = {
  readonly files: readonly string[];
  readonly diagnostics: readonly Diagnostic[];
  /** Tests reported for missing assertions */
  readonly findings: number;
  readonly errors: number;
  readonly warnings: number;
};

export type CheckFailure = {
  readonly message: string;
  readonly diagnostics: readonly Diagnostic[];
};

const FINDING_CODE = "ASL1001";

/**
 * Files named on the command line, or every source under the source root
 */
export const collectInputFiles = (
  config: ResolvedConfig
): readonly string[] =>
  config.paths.length > 0 ? config.paths : scanSourceFiles(config.sourceRoot);

/**
 * Run the assertions-in-tests rule over the configured files
 */
export const checkCommand = (
  config: ResolvedConfig
): Result<CheckSummary, CheckFailure> => {
  const files = collectInputFiles(config);
  if (files.length === 0) {
    return ok({ files, diagnostics: [], findings: 0, errors: 0, warnings: 0 });
  }

  const programResult = createProgram(files, {
    sourceRoot: config.sourceRoot,
  });
  if (!programResult.ok) {
    return error({
      message: "Failed to load source files",
      diagnostics: programResult.error.diagnostics,
    });
  }

  const rule = createAssertionsInTestsRule({
    customAssertionMethods: config.customAssertionMethods,
    testDecorator: config.testDecorator,
    testBaseType: config.testBaseType,
    expectedExceptionKey: config.expectedExceptionKey,
  });
  const { diagnostics } = analyzeProgram(programResult.value, rule);

  return ok({
    files,
    diagnostics,
    findings: diagnostics.filter((d) => d.code === FINDING_CODE).length,
    errors: diagnostics.filter((d) => d.severity === "error").length,
    warnings: diagnostics.filter((d) => d.severity === "warning").length,
  });
};

const plural = (count: number, word: string): string =>
  `${count} ${word}${count === 1 ? "" : "s"}`;

/**
 * Print a check summary to the console
 */
export const printCheckReport = (
  summary: CheckSummary,
  config: ResolvedConfig
): void => {
  if (config.verbose) {
    console.log(`Source root: ${config.sourceRoot}`);
    for (const file of summary.files) {
      console.log(`  ${relative(config.projectRoot, file)}`);
    }
  }

  for (const diagnostic of summary.diagnostics) {
    if (diagnostic.severity === "warning" && config.quiet) {
      continue;
    }
    console.log(formatDiagnostic(diagnostic));
  }

  if (config.quiet) {
    return;
  }

  if (summary.files.length === 0) {
    console.log(`No TypeScript sources found under ${config.sourceRoot}`);
    return;
  }

  const checked = `Checked ${plural(summary.files.length, "file")}`;
  if (summary.errors === 0 && summary.warnings === 0) {
    console.log(`✓ ${checked}: no problems found`);
    return;
  }
  console.log(
    `${checked}: ${plural(summary.findings, "test")} without assertions, ` +
      `${plural(summary.errors, "error")}, ${plural(summary.warnings, "warning")}`
  );
};
