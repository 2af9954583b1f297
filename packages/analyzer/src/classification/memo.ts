/**
 * Local helper memo
 *
 * Caches, per symbol, whether a helper declared in the current unit
 * contains an assertion anywhere in its body. Each symbol is scanned at most
 * once. A lookup that re-enters a symbol still being scanned (direct or
 * mutual recursion) answers false, and a helper whose scan saw that false is
 * cached as false. With mutual recursion the answer for each helper depends
 * on which one the unit reaches first.
 */

import type {
  CallSiteNode,
  SymbolRef,
  SymbolResolver,
} from "@assertlint/frontend";
import { someCallSite } from "./call-sites.js";

type MemoState = "inProgress" | boolean;

export type LocalAssertionMemo = {
  readonly hasLocalAssertion: (symbol: SymbolRef) => boolean;
};

export const createLocalAssertionMemo = (
  resolver: SymbolResolver,
  isAssertionSite: (site: CallSiteNode) => boolean,
  onHelperScan?: (symbol: SymbolRef) => void
): LocalAssertionMemo => {
  const states = new Map<number, MemoState>();

  const hasLocalAssertion = (symbol: SymbolRef): boolean => {
    const state = states.get(symbol.id);
    if (state !== undefined) {
      return state === true;
    }

    const declaration = resolver.declaration(symbol);
    if (!declaration) {
      states.set(symbol.id, false);
      return false;
    }

    states.set(symbol.id, "inProgress");
    onHelperScan?.(symbol);
    const result = someCallSite(declaration, isAssertionSite);
    states.set(symbol.id, result);
    return result;
  };

  return { hasLocalAssertion };
};
