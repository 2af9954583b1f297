/**
 * Analysis tree
 *
 * A closed, lowered view of a TypeScript source file that keeps only what the
 * assertion rules care about: classes, function-like declarations and the
 * three kinds of call sites. Every other syntax node is transparent, its
 * interesting descendants are lifted into the nearest lowered ancestor.
 */

import type { SourceLocation } from "../types/diagnostic.js";
import type { SymbolRef } from "../symbol-table/types.js";

export type UnitNode = {
  readonly kind: "unit";
  readonly fileName: string;
  readonly children: readonly AnalysisNode[];
};

export type ClassNode = {
  readonly kind: "class";
  readonly name: string;
  readonly children: readonly AnalysisNode[];
};

/**
 * Function declaration, method, constructor, accessor, function expression
 * or arrow function.
 */
export type FunctionNode = {
  readonly kind: "function";
  readonly name: string;
  readonly nameLocation: SourceLocation;
  readonly symbol?: SymbolRef;
  /** False for abstract methods, overload signatures and ambient declarations */
  readonly hasBody: boolean;
  /**
   * False for function expressions and arrow functions written inline, whose
   * call sites belong to the enclosing function. Class property initialisers
   * are members and open their own scope.
   */
  readonly opensScope: boolean;
  readonly children: readonly AnalysisNode[];
};

export type InvocationNode = {
  readonly kind: "invocation";
  /** Identifier the callee is invoked through, absent for computed callees */
  readonly calleeName?: string;
  readonly symbol?: SymbolRef;
  readonly location: SourceLocation;
  readonly children: readonly AnalysisNode[];
};

/**
 * A function or method passed as a value, e.g. `values.forEach(assertValid)`
 */
export type ReferenceNode = {
  readonly kind: "reference";
  readonly name: string;
  readonly symbol?: SymbolRef;
  readonly location: SourceLocation;
};

export type ConstructionNode = {
  readonly kind: "construction";
  readonly symbol?: SymbolRef;
  readonly location: SourceLocation;
  readonly children: readonly AnalysisNode[];
};

export type CallSiteNode = InvocationNode | ReferenceNode | ConstructionNode;

export type AnalysisNode = ClassNode | FunctionNode | CallSiteNode;

export type AnyNode = UnitNode | AnalysisNode;

export const childrenOf = (node: AnyNode): readonly AnalysisNode[] =>
  node.kind === "reference" ? [] : node.children;
