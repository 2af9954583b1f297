/**
 * Symbol helpers over the TypeScript checker
 */

import * as ts from "typescript";
import * as path from "node:path";

/**
 * Follow import aliases to the declared symbol.
 * Returns undefined when the alias target cannot be resolved.
 */
export const resolveAlias = (
  checker: ts.TypeChecker,
  symbol: ts.Symbol | undefined
): ts.Symbol | undefined => {
  if (!symbol) {
    return undefined;
  }
  const target =
    (symbol.flags & ts.SymbolFlags.Alias) !== 0
      ? checker.getAliasedSymbol(symbol)
      : symbol;
  return target.declarations && target.declarations.length > 0
    ? target
    : undefined;
};

const QUOTED_MODULE_PREFIX = /^"([^"]*)"(?:\.(.*))?$/;

/**
 * Fully qualified name of a type symbol.
 *
 * Source-file module prefixes are dropped (`"/src/a".Helper` becomes
 * `Helper`), ambient module names lose their quotes (`"chai".Assertion`
 * becomes `chai.Assertion`).
 */
export const qualifiedTypeName = (
  checker: ts.TypeChecker,
  symbol: ts.Symbol
): string => {
  const fullName = checker.getFullyQualifiedName(symbol);
  const match = QUOTED_MODULE_PREFIX.exec(fullName);
  if (!match) {
    return fullName;
  }
  const moduleName = match[1] ?? "";
  const rest = match[2];
  if (rest === undefined) {
    return moduleName;
  }
  return path.isAbsolute(moduleName) ? rest : `${moduleName}.${rest}`;
};

const isFunctionInitializer = (node: ts.Node | undefined): boolean =>
  node !== undefined &&
  (ts.isArrowFunction(node) || ts.isFunctionExpression(node));

/**
 * Whether a symbol names something that can be called: a function, a method,
 * or a variable/property initialised with a function expression.
 */
export const isCallableSymbol = (symbol: ts.Symbol): boolean => {
  if ((symbol.flags & (ts.SymbolFlags.Function | ts.SymbolFlags.Method)) !== 0) {
    return true;
  }
  const declaration = symbol.valueDeclaration;
  return (
    declaration !== undefined &&
    (ts.isVariableDeclaration(declaration) ||
      ts.isPropertyDeclaration(declaration)) &&
    isFunctionInitializer(declaration.initializer)
  );
};
