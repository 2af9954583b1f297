/**
 * Assertion classifier
 */

import type {
  CallSiteNode,
  SymbolRef,
  SymbolResolver,
} from "@assertlint/frontend";
import { type MatcherSet, anyMatch } from "../matchers/call-matcher.js";
import { callSiteName } from "./call-sites.js";
import { createLocalAssertionMemo } from "./memo.js";

export const ASSERTION_NAME_PATTERN =
  /^(assert|verify|fail|should|check|expect).*$/;

export type ClassifierContext = {
  readonly resolver: SymbolResolver;
  readonly builtinMatchers: MatcherSet;
  readonly customMatchers: MatcherSet;
  /** Called once each time a local helper body is scanned */
  readonly onHelperScan?: (symbol: SymbolRef) => void;
};

export type AssertionClassifier = {
  readonly isAssertion: (
    callName: string | undefined,
    symbol: SymbolRef | undefined
  ) => boolean;
  readonly isAssertionSite: (site: CallSiteNode) => boolean;
};

/**
 * Create the classifier for one analysis unit. The helper memo it owns
 * lives exactly as long as the classifier.
 */
export const createAssertionClassifier = (
  context: ClassifierContext
): AssertionClassifier => {
  const { resolver, builtinMatchers, customMatchers } = context;

  const isAssertion = (
    callName: string | undefined,
    symbol: SymbolRef | undefined
  ): boolean =>
    (callName !== undefined && ASSERTION_NAME_PATTERN.test(callName)) ||
    anyMatch(builtinMatchers, symbol, resolver) ||
    anyMatch(customMatchers, symbol, resolver) ||
    (symbol !== undefined && memo.hasLocalAssertion(symbol));

  const isAssertionSite = (site: CallSiteNode): boolean =>
    isAssertion(callSiteName(site), site.symbol);

  const memo = createLocalAssertionMemo(
    resolver,
    isAssertionSite,
    context.onHelperScan
  );

  return { isAssertion, isAssertionSite };
};
