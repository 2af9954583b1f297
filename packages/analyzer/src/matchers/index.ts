/**
 * Matchers - Public API
 */

export {
  type TypeCriterion,
  type NameCriterion,
  exactType,
  subtypeOf,
  anyType,
  exactName,
  namePrefix,
  anyName,
  matchesType,
  matchesName,
} from "./criteria.js";
export {
  type CallMatcher,
  type MatcherSet,
  method,
  matchesCall,
  anyMatch,
} from "./call-matcher.js";
export {
  type CompiledMatchers,
  parseCustomMatcher,
  compileCustomMatchers,
} from "./custom.js";
export { BUILTIN_ASSERTION_MATCHERS, parseMatcherTable } from "./builtin.js";
