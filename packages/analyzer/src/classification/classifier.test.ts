/**
 * Tests for the assertion classifier and its helper memo
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  type AnalysisUnit,
  type FunctionNode,
  type SymbolRef,
  childrenOf,
  createTestUnit,
} from "@assertlint/frontend";
import { createAssertionClassifier } from "./classifier.js";
import { BUILTIN_ASSERTION_MATCHERS } from "../matchers/builtin.js";
import { checkSource, TEST_PRELUDE } from "../test-harness.js";

const findFunction = (unit: AnalysisUnit, name: string): FunctionNode => {
  const fn = childrenOf(unit.root).find(
    (child): child is FunctionNode =>
      child.kind === "function" && child.name === name
  );
  if (!fn) {
    throw new Error(`function ${name} not found`);
  }
  return fn;
};

const symbolOf = (unit: AnalysisUnit, name: string): SymbolRef => {
  const symbol = findFunction(unit, name).symbol;
  if (!symbol) {
    throw new Error(`function ${name} has no symbol`);
  }
  return symbol;
};

const HELPERS = [
  TEST_PRELUDE,
  "function validateUser(user: unknown): void {",
  "  chaiAssert.strictEqual(user, user);",
  "}",
  "function prepare(): number {",
  "  return compute(1);",
  "}",
  "function walk(n: number): void {",
  "  walk(n - 1);",
  "}",
].join("\n");

describe("Assertion Classifier", () => {
  const unit = createTestUnit(HELPERS);

  const classifierFor = (scans: string[]) =>
    createAssertionClassifier({
      resolver: unit.resolver,
      builtinMatchers: BUILTIN_ASSERTION_MATCHERS,
      customMatchers: [],
      onHelperScan: (symbol) => scans.push(symbol.name),
    });

  it("should classify by name before resolving the symbol", () => {
    const scans: string[] = [];
    const classifier = classifierFor(scans);

    for (const name of ["assertEquals", "verify", "fail", "shouldBeOk", "check", "expect"]) {
      expect(classifier.isAssertion(name, undefined)).to.equal(true);
    }
    expect(classifier.isAssertion("prepare", symbolOf(unit, "validateUser"))).to.equal(true);
    expect(classifier.isAssertion("assertEquals", symbolOf(unit, "prepare"))).to.equal(true);
    expect(scans).to.deep.equal(["validateUser"]);
  });

  it("should treat unresolved calls as non-assertions", () => {
    const classifier = classifierFor([]);
    expect(classifier.isAssertion("run", undefined)).to.equal(false);
    expect(classifier.isAssertion(undefined, undefined)).to.equal(false);
  });

  it("should scan a helper body once and reuse the answer", () => {
    const scans: string[] = [];
    const classifier = classifierFor(scans);
    const validateUser = symbolOf(unit, "validateUser");

    expect(classifier.isAssertion(undefined, validateUser)).to.equal(true);
    expect(classifier.isAssertion(undefined, validateUser)).to.equal(true);
    expect(scans).to.deep.equal(["validateUser"]);
  });

  it("should cache negative answers", () => {
    const scans: string[] = [];
    const classifier = classifierFor(scans);
    const prepare = symbolOf(unit, "prepare");

    expect(classifier.isAssertion(undefined, prepare)).to.equal(false);
    expect(classifier.isAssertion(undefined, prepare)).to.equal(false);
    expect(scans).to.deep.equal(["prepare"]);
  });

  it("should answer false for a helper that only recurses", () => {
    const scans: string[] = [];
    const classifier = classifierFor(scans);

    expect(classifier.isAssertion(undefined, symbolOf(unit, "walk"))).to.equal(false);
    expect(scans).to.deep.equal(["walk"]);
  });

  it("should keep one memo per classifier", () => {
    const scans: string[] = [];
    const validateUser = symbolOf(unit, "validateUser");

    classifierFor(scans).isAssertion(undefined, validateUser);
    classifierFor(scans).isAssertion(undefined, validateUser);

    expect(scans).to.deep.equal(["validateUser", "validateUser"]);
  });

  it("should scan a helper shared by several tests once per file", () => {
    const scans: string[] = [];
    const { reported } = checkSource(
      [
        "function validateUser(user: unknown): void {",
        "  chaiAssert.strictEqual(user, user);",
        "}",
        "class Suite {",
        "  @Test()",
        "  first(): void {",
        "    validateUser(1);",
        "  }",
        "  @Test()",
        "  second(): void {",
        "    validateUser(2);",
        "  }",
        "}",
      ].join("\n"),
      { onHelperScan: (symbol) => scans.push(symbol.name) }
    );

    expect(reported).to.deep.equal([]);
    expect(scans).to.deep.equal(["validateUser"]);
  });
});
