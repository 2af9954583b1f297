/**
 * assertlint analyzer - assertion detection in test methods
 */

export * from "./matchers/index.js";
export * from "./classification/index.js";
export {
  type AssertionsInTestsOptions,
  type AssertionsInTestsRule,
  createAssertionsInTestsRule,
} from "./rules/assertions-in-tests.js";
export {
  MISSING_ASSERTION_MESSAGE,
  type TraversalContext,
  findTestsWithoutAssertions,
} from "./rules/scope-traversal.js";
export {
  analyzeSourceFile,
  analyzeProgram,
  analyzeFiles,
  analyzeSources,
} from "./runner.js";
