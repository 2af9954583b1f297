/**
 * Classification - Public API
 */

export {
  ASSERTION_NAME_PATTERN,
  type ClassifierContext,
  type AssertionClassifier,
  createAssertionClassifier,
} from "./classifier.js";
export { type LocalAssertionMemo, createLocalAssertionMemo } from "./memo.js";
export {
  type TestConventions,
  DEFAULT_TEST_CONVENTIONS,
  isTestFunction,
  expectAssertion,
} from "./unit-tests.js";
export { isCallSite, callSiteName, someCallSite } from "./call-sites.js";
