/**
 * Test harness for rule tests.
 * Runs the assertions-in-tests rule over in-memory sources.
 */

import {
  type Diagnostic,
  type SymbolRef,
  type SymbolResolver,
  type TypeRef,
  TEST_FILE,
  createTestProgram,
} from "@assertlint/frontend";
import {
  type AssertionsInTestsOptions,
  createAssertionsInTestsRule,
} from "./rules/assertions-in-tests.js";
import { analyzeProgram } from "./runner.js";

/**
 * Ambient declarations shared by rule test sources
 */
export const TEST_PRELUDE = [
  "declare function Test(options?: { expected?: unknown }): MethodDecorator;",
  "declare class TestCase {}",
  "declare function assertValid(value: unknown): void;",
  "declare function compute(value: number): number;",
  "declare namespace Chai {",
  "  interface Assertion {",
  "    equal(value: unknown): Assertion;",
  "  }",
  "  interface AssertStatic {",
  "    strictEqual(actual: unknown, expected: unknown): void;",
  "  }",
  "}",
  "declare const assertion: Chai.Assertion;",
  "declare const chaiAssert: Chai.AssertStatic;",
].join("\n");

export type CheckOutcome = {
  readonly diagnostics: readonly Diagnostic[];
  /** Names of the reported test functions, in report order */
  readonly reported: readonly string[];
};

const reportedName = (
  files: Readonly<Record<string, string>>,
  diagnostic: Diagnostic
): string => {
  const location = diagnostic.location;
  const source = location ? files[location.file] : undefined;
  const line = location ? source?.split("\n")[location.line - 1] : undefined;
  if (!location || line === undefined) {
    return "";
  }
  return line.slice(location.column - 1, location.column - 1 + location.length);
};

/**
 * Check several files, keyed by absolute path, as one program
 */
export const checkFiles = (
  files: Readonly<Record<string, string>>,
  options: AssertionsInTestsOptions = {}
): CheckOutcome => {
  const program = createTestProgram(files);
  const { diagnostics } = analyzeProgram(
    program,
    createAssertionsInTestsRule(options)
  );
  return {
    diagnostics,
    reported: diagnostics
      .filter((d) => d.code === "ASL1001")
      .map((d) => reportedName(files, d)),
  };
};

/**
 * Check `body` (appended to the prelude) as a single test file
 */
export const checkSource = (
  body: string,
  options: AssertionsInTestsOptions = {}
): CheckOutcome =>
  checkFiles({ [TEST_FILE]: `${TEST_PRELUDE}\n${body}` }, options);

/**
 * In-process resolver over a fixed set of declaring types.
 * `supertypes` maps a qualified name to its transitive supertypes.
 */
export const createFakeResolver = (
  declaringTypes: ReadonlyMap<number, TypeRef>,
  supertypes: Readonly<Record<string, readonly string[]>> = {}
): SymbolResolver => ({
  declaration: () => undefined,
  overriddenSymbol: () => undefined,
  enclosingType: (symbol: SymbolRef) => declaringTypes.get(symbol.id),
  isSubtypeOf: (type, typeName) =>
    type.qualifiedName === typeName ||
    (supertypes[type.qualifiedName] ?? []).includes(typeName),
  decoratorValues: () => undefined,
});
