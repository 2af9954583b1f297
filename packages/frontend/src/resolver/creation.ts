/**
 * Symbol resolver over the TypeScript checker
 */

import * as ts from "typescript";
import type { SymbolRef, SymbolTable, TypeRef } from "../symbol-table/types.js";
import { qualifiedTypeName, resolveAlias } from "../symbol-table/helpers.js";
import { getExtendsExpression } from "../syntax/helpers.js";
import type { FunctionNode } from "../syntax/types.js";
import { findDecoratorValues } from "./decorators.js";
import type { SymbolResolver } from "./types.js";

const primaryDeclaration = (symbol: ts.Symbol): ts.Declaration | undefined =>
  symbol.valueDeclaration ?? symbol.declarations?.[0];

const isVariableWrapper = (node: ts.Node): boolean =>
  ts.isVariableDeclaration(node) ||
  ts.isVariableDeclarationList(node) ||
  ts.isVariableStatement(node);

/**
 * Create the resolver for one analysis unit.
 * `declarations` holds the function bodies available in this unit only.
 */
export const createSymbolResolver = (
  checker: ts.TypeChecker,
  symbols: SymbolTable,
  declarations: ReadonlyMap<number, FunctionNode>
): SymbolResolver => {
  const containerSymbol = (declaration: ts.Node): ts.Symbol | undefined => {
    let current = declaration.parent;
    while (current && isVariableWrapper(current)) {
      current = current.parent;
    }
    if (!current) {
      return undefined;
    }
    if (ts.isClassLike(current) || ts.isInterfaceDeclaration(current)) {
      return current.name ? checker.getSymbolAtLocation(current.name) : undefined;
    }
    if (ts.isModuleBlock(current)) {
      return checker.getSymbolAtLocation(current.parent.name);
    }
    return undefined;
  };

  const superTypeSymbols = (symbol: ts.Symbol): readonly ts.Symbol[] =>
    (symbol.declarations ?? []).flatMap((declaration) =>
      ts.isClassLike(declaration) || ts.isInterfaceDeclaration(declaration)
        ? (declaration.heritageClauses ?? []).flatMap((clause) =>
            clause.types.flatMap((type) => {
              const base = resolveAlias(
                checker,
                checker.getSymbolAtLocation(type.expression)
              );
              return base ? [base] : [];
            })
          )
        : []
    );

  const enclosingType = (ref: SymbolRef): TypeRef | undefined => {
    const entry = symbols.symbolEntry(ref);
    if (!entry) {
      return undefined;
    }
    if (entry.kind === "constructor") {
      return symbols.refForType(entry.classSymbol);
    }
    const declaration = primaryDeclaration(entry.symbol);
    const container = declaration ? containerSymbol(declaration) : undefined;
    return container ? symbols.refForType(container) : undefined;
  };

  const isSubtypeOf = (type: TypeRef, typeName: string): boolean => {
    const entry = symbols.typeEntry(type);
    if (!entry) {
      return false;
    }
    const visited = new Set<ts.Symbol>();
    const pending: ts.Symbol[] = [entry.symbol];
    for (let current = pending.pop(); current; current = pending.pop()) {
      if (visited.has(current)) {
        continue;
      }
      visited.add(current);
      if (qualifiedTypeName(checker, current) === typeName) {
        return true;
      }
      pending.push(...superTypeSymbols(current));
    }
    return false;
  };

  const overriddenSymbol = (ref: SymbolRef): SymbolRef | undefined => {
    const entry = symbols.symbolEntry(ref);
    if (!entry || entry.kind !== "member") {
      return undefined;
    }
    const declaration = primaryDeclaration(entry.symbol);
    const owner = declaration?.parent;
    if (!owner || !ts.isClassLike(owner)) {
      return undefined;
    }
    const extendsExpression = getExtendsExpression(owner);
    if (!extendsExpression) {
      return undefined;
    }
    const inherited = checker
      .getTypeAtLocation(extendsExpression)
      .getProperty(entry.symbol.getName());
    return inherited && inherited !== entry.symbol
      ? symbols.refForSymbol(inherited)
      : undefined;
  };

  const decoratorValues = (ref: SymbolRef, decoratorName: string) => {
    const entry = symbols.symbolEntry(ref);
    return entry && entry.kind === "member"
      ? findDecoratorValues(entry.symbol, decoratorName)
      : undefined;
  };

  return {
    declaration: (ref) => declarations.get(ref.id),
    overriddenSymbol,
    enclosingType,
    isSubtypeOf,
    decoratorValues,
  };
};
