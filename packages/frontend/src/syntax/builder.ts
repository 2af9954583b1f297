/**
 * Analysis tree builder - lowers a TypeScript source file
 */

import * as ts from "typescript";
import type { SymbolRef, SymbolTable } from "../symbol-table/types.js";
import { isCallableSymbol, resolveAlias } from "../symbol-table/helpers.js";
import {
  getExtendsExpression,
  getFunctionName,
  getFunctionNameNode,
  getNodeLocation,
  isTypeLevelNode,
} from "./helpers.js";
import type {
  AnalysisNode,
  ClassNode,
  ConstructionNode,
  FunctionNode,
  InvocationNode,
  ReferenceNode,
  UnitNode,
} from "./types.js";

export type BuiltTree = {
  readonly root: UnitNode;
  /** Function nodes with a body, keyed by symbol id */
  readonly declarations: ReadonlyMap<number, FunctionNode>;
};

/**
 * Build the analysis tree for a source file, registering every resolved
 * symbol in the unit's symbol table.
 */
export const buildAnalysisTree = (
  sourceFile: ts.SourceFile,
  checker: ts.TypeChecker,
  symbols: SymbolTable
): BuiltTree => {
  const declarations = new Map<number, FunctionNode>();

  const constructorRefOf = (
    classSymbol: ts.Symbol | undefined
  ): SymbolRef | undefined =>
    classSymbol && (classSymbol.flags & ts.SymbolFlags.Class) !== 0
      ? symbols.refForConstructor(classSymbol)
      : undefined;

  const classSymbolOf = (
    declaration: ts.ClassLikeDeclaration
  ): ts.Symbol | undefined => {
    if (declaration.name) {
      return checker.getSymbolAtLocation(declaration.name);
    }
    const parent = declaration.parent;
    return ts.isVariableDeclaration(parent)
      ? checker.getSymbolAtLocation(parent.name)
      : undefined;
  };

  const functionSymbol = (
    node: ts.FunctionLikeDeclaration
  ): SymbolRef | undefined => {
    if (ts.isConstructorDeclaration(node)) {
      return constructorRefOf(classSymbolOf(node.parent));
    }
    const nameNode = getFunctionNameNode(node);
    const symbol = nameNode
      ? resolveAlias(checker, checker.getSymbolAtLocation(nameNode))
      : undefined;
    return symbol ? symbols.refForSymbol(symbol) : undefined;
  };

  const superConstructorSymbol = (call: ts.CallExpression): SymbolRef | undefined => {
    const enclosingClass = ts.findAncestor(call, ts.isClassLike);
    const extendsExpression = enclosingClass
      ? getExtendsExpression(enclosingClass)
      : undefined;
    return extendsExpression
      ? constructorRefOf(
          resolveAlias(
            checker,
            checker.getSymbolAtLocation(extendsExpression.expression)
          )
        )
      : undefined;
  };

  const calleeSymbol = (
    call: ts.CallExpression,
    nameNode: ts.MemberName | undefined
  ): SymbolRef | undefined => {
    if (call.expression.kind === ts.SyntaxKind.SuperKeyword) {
      return superConstructorSymbol(call);
    }
    const direct = nameNode
      ? resolveAlias(checker, checker.getSymbolAtLocation(nameNode))
      : undefined;
    if (direct) {
      return symbols.refForSymbol(direct);
    }
    const declaration = checker.getResolvedSignature(call)?.declaration;
    if (
      declaration &&
      !ts.isJSDocSignature(declaration) &&
      declaration.name !== undefined
    ) {
      const fromSignature = resolveAlias(
        checker,
        checker.getSymbolAtLocation(declaration.name)
      );
      return fromSignature ? symbols.refForSymbol(fromSignature) : undefined;
    }
    return undefined;
  };

  const memberNameOf = (expression: ts.Expression): ts.MemberName | undefined =>
    ts.isIdentifier(expression)
      ? expression
      : ts.isPropertyAccessExpression(expression)
        ? expression.name
        : undefined;

  const lowerReference = (argument: ts.Expression): ReferenceNode | undefined => {
    const nameNode = memberNameOf(argument);
    if (!nameNode) {
      return undefined;
    }
    const symbol = resolveAlias(checker, checker.getSymbolAtLocation(nameNode));
    if (!symbol || !isCallableSymbol(symbol)) {
      return undefined;
    }
    return {
      kind: "reference",
      name: nameNode.text,
      symbol: symbols.refForSymbol(symbol),
      location: getNodeLocation(sourceFile, argument),
    };
  };

  const lowerArguments = (
    args: ts.NodeArray<ts.Expression> | undefined
  ): readonly AnalysisNode[] =>
    (args ?? []).flatMap((argument) => {
      const reference = lowerReference(argument);
      return reference ? [...lower(argument), reference] : lower(argument);
    });

  const lowerChildren = (node: ts.Node): readonly AnalysisNode[] => {
    const children: AnalysisNode[] = [];
    ts.forEachChild(node, (child) => {
      children.push(...lower(child));
    });
    return children;
  };

  const lowerFunction = (node: ts.FunctionLikeDeclaration): FunctionNode => {
    const nameNode = getFunctionNameNode(node);
    const symbol = functionSymbol(node);
    const functionNode: FunctionNode = {
      kind: "function",
      name: getFunctionName(node, sourceFile),
      nameLocation: getNodeLocation(sourceFile, nameNode ?? node),
      symbol,
      hasBody: node.body !== undefined,
      opensScope: opensScope(node),
      children: lowerChildren(node),
    };
    if (symbol && functionNode.hasBody && !declarations.has(symbol.id)) {
      declarations.set(symbol.id, functionNode);
    }
    return functionNode;
  };

  const lowerClass = (node: ts.ClassLikeDeclaration): ClassNode => ({
    kind: "class",
    name: node.name?.text ?? "<anonymous>",
    children: lowerChildren(node),
  });

  const lowerInvocation = (node: ts.CallExpression): InvocationNode => {
    const nameNode = memberNameOf(node.expression);
    return {
      kind: "invocation",
      calleeName: nameNode?.text,
      symbol: calleeSymbol(node, nameNode),
      location: getNodeLocation(sourceFile, node),
      children: [...lower(node.expression), ...lowerArguments(node.arguments)],
    };
  };

  const lowerConstruction = (node: ts.NewExpression): ConstructionNode => ({
    kind: "construction",
    symbol: constructorRefOf(
      resolveAlias(checker, checker.getSymbolAtLocation(node.expression))
    ),
    location: getNodeLocation(sourceFile, node),
    children: [...lower(node.expression), ...lowerArguments(node.arguments)],
  });

  const lower = (node: ts.Node): readonly AnalysisNode[] => {
    if (isTypeLevelNode(node)) {
      return [];
    }
    if (ts.isClassLike(node)) {
      return [lowerClass(node)];
    }
    if (isFunctionLikeDeclaration(node)) {
      return [lowerFunction(node)];
    }
    if (ts.isCallExpression(node)) {
      return [lowerInvocation(node)];
    }
    if (ts.isNewExpression(node)) {
      return [lowerConstruction(node)];
    }
    return lowerChildren(node);
  };

  const root: UnitNode = {
    kind: "unit",
    fileName: sourceFile.fileName,
    children: lowerChildren(sourceFile),
  };

  return { root, declarations };
};

const isFunctionLikeDeclaration = (
  node: ts.Node
): node is ts.FunctionLikeDeclaration =>
  ts.isFunctionDeclaration(node) ||
  ts.isMethodDeclaration(node) ||
  ts.isConstructorDeclaration(node) ||
  ts.isGetAccessorDeclaration(node) ||
  ts.isSetAccessorDeclaration(node) ||
  ts.isFunctionExpression(node) ||
  ts.isArrowFunction(node);

const opensScope = (node: ts.FunctionLikeDeclaration): boolean =>
  !(ts.isFunctionExpression(node) || ts.isArrowFunction(node)) ||
  ts.isPropertyDeclaration(node.parent);
