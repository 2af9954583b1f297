/**
 * Unit test recognition
 */

import type {
  FunctionNode,
  SymbolRef,
  SymbolResolver,
} from "@assertlint/frontend";

export type TestConventions = {
  /** Decorator marking a test method, matched by simple name */
  readonly testDecorator: string;
  /** Legacy base class whose `test*` methods are tests */
  readonly testBaseType: string;
  /** Decorator option that declares an expected exception */
  readonly expectedExceptionKey: string;
};

export const DEFAULT_TEST_CONVENTIONS: TestConventions = {
  testDecorator: "Test",
  testBaseType: "TestCase",
  expectedExceptionKey: "expected",
};

const LEGACY_TEST_PREFIX = "test";

const overrideChain = (
  symbol: SymbolRef,
  resolver: SymbolResolver
): readonly SymbolRef[] => {
  const chain: SymbolRef[] = [];
  const seen = new Set<number>();
  for (
    let current: SymbolRef | undefined = symbol;
    current && !seen.has(current.id);
    current = resolver.overriddenSymbol(current)
  ) {
    seen.add(current.id);
    chain.push(current);
  }
  return chain;
};

export const isTestFunction = (
  fn: FunctionNode,
  resolver: SymbolResolver,
  conventions: TestConventions
): boolean => {
  const symbol = fn.symbol;
  if (!fn.hasBody || !symbol) {
    return false;
  }

  const marked = overrideChain(symbol, resolver).some(
    (candidate) =>
      resolver.decoratorValues(candidate, conventions.testDecorator) !==
      undefined
  );
  if (marked) {
    return true;
  }

  const enclosingType = resolver.enclosingType(symbol);
  return (
    enclosingType !== undefined &&
    resolver.isSubtypeOf(enclosingType, conventions.testBaseType) &&
    fn.name.startsWith(LEGACY_TEST_PREFIX)
  );
};

/**
 * Tests declaring an expected exception pass by throwing it, so they need
 * no explicit assertion.
 */
export const expectAssertion = (
  fn: FunctionNode,
  resolver: SymbolResolver,
  conventions: TestConventions
): boolean =>
  fn.symbol !== undefined &&
  (resolver
    .decoratorValues(fn.symbol, conventions.testDecorator)
    ?.some((value) => value.name === conventions.expectedExceptionKey) ??
    false);
