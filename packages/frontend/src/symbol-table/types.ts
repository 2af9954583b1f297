/**
 * Symbol table type definitions
 */

import * as ts from "typescript";

/**
 * Opaque handle to a resolved function, method or constructor.
 * Ids are unique within one analysis unit.
 */
export type SymbolRef = {
  readonly id: number;
  readonly name: string;
};

/**
 * Handle to a class, interface or namespace that declares members.
 */
export type TypeRef = {
  readonly id: number;
  readonly qualifiedName: string;
};

export type SymbolEntry =
  | {
      readonly kind: "member";
      readonly ref: SymbolRef;
      readonly symbol: ts.Symbol;
    }
  | {
      readonly kind: "constructor";
      readonly ref: SymbolRef;
      readonly classSymbol: ts.Symbol;
    };

export type TypeEntry = {
  readonly ref: TypeRef;
  readonly symbol: ts.Symbol;
};

export type SymbolTable = {
  readonly refForSymbol: (symbol: ts.Symbol) => SymbolRef;
  readonly refForConstructor: (classSymbol: ts.Symbol) => SymbolRef;
  readonly refForType: (symbol: ts.Symbol) => TypeRef;
  readonly symbolEntry: (ref: SymbolRef) => SymbolEntry | undefined;
  readonly typeEntry: (ref: TypeRef) => TypeEntry | undefined;
};
