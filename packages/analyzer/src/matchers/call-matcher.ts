/**
 * Call matchers and matcher sets
 */

import type { SymbolRef, SymbolResolver } from "@assertlint/frontend";
import {
  type NameCriterion,
  type TypeCriterion,
  matchesName,
  matchesType,
} from "./criteria.js";

/**
 * Recognises calls by declaring type and simple name.
 * Arity is never constrained.
 */
export type CallMatcher = {
  readonly type: TypeCriterion;
  readonly name: NameCriterion;
  readonly parameters: "any";
};

/**
 * Disjunction of matchers; order only affects how soon a match is found
 */
export type MatcherSet = readonly CallMatcher[];

export const method = (
  type: TypeCriterion,
  name: NameCriterion
): CallMatcher => ({
  type,
  name,
  parameters: "any",
});

export const matchesCall = (
  matcher: CallMatcher,
  symbol: SymbolRef,
  resolver: SymbolResolver
): boolean =>
  matchesName(matcher.name, symbol.name) &&
  matchesType(matcher.type, symbol, resolver);

export const anyMatch = (
  matchers: MatcherSet,
  symbol: SymbolRef | undefined,
  resolver: SymbolResolver
): boolean =>
  symbol !== undefined &&
  matchers.some((matcher) => matchesCall(matcher, symbol, resolver));
