/**
 * Scope traversal for the assertions-in-tests rule
 *
 * Walks one unit depth-first with a stack of scope frames, one per entered
 * function declaration, method, constructor or accessor. A call site can only
 * mark the innermost frame, so assertions in a local function never count for
 * the test that declares it. Inline arrow functions and function expressions
 * open no frame: `values.forEach((v) => assertValid(v))` asserts for the test.
 */

import {
  type AnalysisNode,
  type CallSiteNode,
  type Diagnostic,
  type FunctionNode,
  type SymbolResolver,
  type UnitNode,
  createDiagnostic,
} from "@assertlint/frontend";
import type { AssertionClassifier } from "../classification/classifier.js";
import {
  type TestConventions,
  expectAssertion,
  isTestFunction,
} from "../classification/unit-tests.js";

export const MISSING_ASSERTION_MESSAGE =
  "Add at least one assertion to this test case.";

type ScopeFrame = {
  readonly isTestScope: boolean;
  hasAssertion: boolean;
};

export type TraversalContext = {
  readonly resolver: SymbolResolver;
  readonly classifier: AssertionClassifier;
  readonly conventions: TestConventions;
};

export const findTestsWithoutAssertions = (
  root: UnitNode,
  context: TraversalContext
): readonly Diagnostic[] => {
  const { resolver, classifier, conventions } = context;
  const frames: ScopeFrame[] = [];
  const findings: Diagnostic[] = [];

  const visitCallSite = (site: CallSiteNode): void => {
    const frame = frames.at(-1);
    if (
      frame &&
      frame.isTestScope &&
      !frame.hasAssertion &&
      classifier.isAssertionSite(site)
    ) {
      frame.hasAssertion = true;
    }
  };

  const visitFunction = (fn: FunctionNode): void => {
    if (!fn.hasBody) {
      return;
    }
    if (!fn.opensScope) {
      fn.children.forEach(visit);
      return;
    }
    const frame: ScopeFrame = {
      isTestScope: isTestFunction(fn, resolver, conventions),
      hasAssertion: false,
    };
    frames.push(frame);
    fn.children.forEach(visit);
    frames.pop();

    if (
      frame.isTestScope &&
      !frame.hasAssertion &&
      !expectAssertion(fn, resolver, conventions)
    ) {
      findings.push(
        createDiagnostic(
          "ASL1001",
          "error",
          MISSING_ASSERTION_MESSAGE,
          fn.nameLocation
        )
      );
    }
  };

  const visit = (node: AnalysisNode): void => {
    switch (node.kind) {
      case "function":
        visitFunction(node);
        return;
      case "class":
        node.children.forEach(visit);
        return;
      case "invocation":
      case "construction":
        node.children.forEach(visit);
        visitCallSite(node);
        return;
      case "reference":
        visitCallSite(node);
        return;
    }
  };

  frames.push({ isTestScope: false, hasAssertion: false });
  root.children.forEach(visit);
  frames.pop();

  return findings;
};
