/**
 * Syntax helper functions
 */

import * as ts from "typescript";
import type { SourceLocation } from "../types/diagnostic.js";

/**
 * Get location information for a node
 */
export const getNodeLocation = (
  sourceFile: ts.SourceFile,
  node: ts.Node
): SourceLocation => {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(
    node.getStart(sourceFile)
  );
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length: node.getWidth(sourceFile),
  };
};

/**
 * Nodes that only exist at the type level and can never contain a call
 */
export const isTypeLevelNode = (node: ts.Node): boolean =>
  ts.isTypeNode(node) ||
  ts.isInterfaceDeclaration(node) ||
  ts.isTypeAliasDeclaration(node) ||
  ts.isImportDeclaration(node) ||
  ts.isImportEqualsDeclaration(node) ||
  ts.isExportDeclaration(node) ||
  ts.isDecorator(node);

/**
 * Declared name of a function-like node.
 * Function expressions and arrows borrow the name of the variable or
 * property they initialise.
 */
export const getFunctionNameNode = (
  node: ts.FunctionLikeDeclaration
): ts.Node | undefined => {
  if (ts.isConstructorDeclaration(node)) {
    return node
      .getChildren()
      .find((child) => child.kind === ts.SyntaxKind.ConstructorKeyword);
  }
  if (node.name) {
    return node.name;
  }
  const parent = node.parent;
  if (
    ts.isVariableDeclaration(parent) ||
    ts.isPropertyDeclaration(parent) ||
    ts.isPropertyAssignment(parent)
  ) {
    return parent.name;
  }
  return undefined;
};

export const getFunctionName = (
  node: ts.FunctionLikeDeclaration,
  sourceFile: ts.SourceFile
): string => {
  if (ts.isConstructorDeclaration(node)) {
    return "constructor";
  }
  const nameNode = getFunctionNameNode(node);
  if (!nameNode) {
    return "<anonymous>";
  }
  if (
    ts.isIdentifier(nameNode) ||
    ts.isPrivateIdentifier(nameNode) ||
    ts.isStringLiteral(nameNode)
  ) {
    return nameNode.text;
  }
  return nameNode.getText(sourceFile);
};

/**
 * First type in the `extends` clause of a class or interface
 */
export const getExtendsExpression = (
  declaration: ts.ClassLikeDeclaration | ts.InterfaceDeclaration
): ts.ExpressionWithTypeArguments | undefined =>
  declaration.heritageClauses
    ?.find((clause) => clause.token === ts.SyntaxKind.ExtendsKeyword)
    ?.types.at(0);
