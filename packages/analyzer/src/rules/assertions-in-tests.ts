/**
 * Assertions-in-tests rule
 *
 * Reports test methods that never call an assertion, directly or through a
 * helper declared in the same file.
 */

import type {
  AnalysisUnit,
  Diagnostic,
  SymbolRef,
} from "@assertlint/frontend";
import { createAssertionClassifier } from "../classification/classifier.js";
import {
  DEFAULT_TEST_CONVENTIONS,
  type TestConventions,
} from "../classification/unit-tests.js";
import { BUILTIN_ASSERTION_MATCHERS } from "../matchers/builtin.js";
import {
  type CompiledMatchers,
  compileCustomMatchers,
} from "../matchers/custom.js";
import { findTestsWithoutAssertions } from "./scope-traversal.js";

export type AssertionsInTestsOptions = Partial<TestConventions> & {
  /** Comma-separated `<qualified type>#<method name>` entries */
  readonly customAssertionMethods?: string;
  readonly onHelperScan?: (symbol: SymbolRef) => void;
};

export type AssertionsInTestsRule = {
  readonly conventions: TestConventions;
  /** Compiled on first access, then shared by every unit */
  readonly customMatchers: () => CompiledMatchers;
  readonly checkUnit: (unit: AnalysisUnit) => readonly Diagnostic[];
};

export const createAssertionsInTestsRule = (
  options: AssertionsInTestsOptions = {}
): AssertionsInTestsRule => {
  const conventions: TestConventions = {
    testDecorator:
      options.testDecorator ?? DEFAULT_TEST_CONVENTIONS.testDecorator,
    testBaseType: options.testBaseType ?? DEFAULT_TEST_CONVENTIONS.testBaseType,
    expectedExceptionKey:
      options.expectedExceptionKey ??
      DEFAULT_TEST_CONVENTIONS.expectedExceptionKey,
  };

  let compiled: CompiledMatchers | undefined;
  const customMatchers = (): CompiledMatchers => {
    compiled ??= compileCustomMatchers(options.customAssertionMethods ?? "");
    return compiled;
  };

  const checkUnit = (unit: AnalysisUnit): readonly Diagnostic[] => {
    const classifier = createAssertionClassifier({
      resolver: unit.resolver,
      builtinMatchers: BUILTIN_ASSERTION_MATCHERS,
      customMatchers: customMatchers().matchers,
      onHelperScan: options.onHelperScan,
    });
    return findTestsWithoutAssertions(unit.root, {
      resolver: unit.resolver,
      classifier,
      conventions,
    });
  };

  return { conventions, customMatchers, checkUnit };
};
