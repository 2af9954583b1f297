/**
 * Symbol resolution contract
 */

import type { SymbolRef, TypeRef } from "../symbol-table/types.js";
import type { FunctionNode } from "../syntax/types.js";

/**
 * One named value of a decorator's options object,
 * e.g. `expected: TypeError` in `@Test({ expected: TypeError })`
 */
export type DecoratorValue = {
  readonly name: string;
  /** Source text of the value expression */
  readonly value: string;
};

export type SymbolResolver = {
  /** Declaration with a body in the current unit, if any */
  readonly declaration: (symbol: SymbolRef) => FunctionNode | undefined;
  /** Base class member this method overrides */
  readonly overriddenSymbol: (symbol: SymbolRef) => SymbolRef | undefined;
  /** Class, interface or namespace declaring the symbol */
  readonly enclosingType: (symbol: SymbolRef) => TypeRef | undefined;
  /** Reflexive, transitive over `extends` and `implements` */
  readonly isSubtypeOf: (type: TypeRef, typeName: string) => boolean;
  /**
   * Named values of the decorator on the symbol's declaration, or undefined
   * when the decorator is absent. A bare `@Test` yields an empty list.
   */
  readonly decoratorValues: (
    symbol: SymbolRef,
    decoratorName: string
  ) => readonly DecoratorValue[] | undefined;
};
