/**
 * Decorator lookup on declarations
 */

import * as ts from "typescript";
import type { DecoratorValue } from "./types.js";

const decoratorName = (decorator: ts.Decorator): string | undefined => {
  const expression = ts.isCallExpression(decorator.expression)
    ? decorator.expression.expression
    : decorator.expression;
  if (ts.isIdentifier(expression)) {
    return expression.text;
  }
  if (ts.isPropertyAccessExpression(expression)) {
    return expression.name.text;
  }
  return undefined;
};

const propertyName = (name: ts.PropertyName): string | undefined =>
  ts.isIdentifier(name) ||
  ts.isStringLiteral(name) ||
  ts.isNumericLiteral(name)
    ? name.text
    : undefined;

/**
 * Named values from the first argument when it is an object literal
 */
const namedValues = (decorator: ts.Decorator): readonly DecoratorValue[] => {
  if (!ts.isCallExpression(decorator.expression)) {
    return [];
  }
  const options = decorator.expression.arguments[0];
  if (!options || !ts.isObjectLiteralExpression(options)) {
    return [];
  }
  return options.properties.flatMap((property): DecoratorValue[] => {
    if (ts.isPropertyAssignment(property)) {
      const name = propertyName(property.name);
      return name === undefined
        ? []
        : [{ name, value: property.initializer.getText() }];
    }
    if (ts.isShorthandPropertyAssignment(property)) {
      return [{ name: property.name.text, value: property.name.text }];
    }
    return [];
  });
};

/**
 * Find a decorator by simple name (`@Test`, `@Test()`, `@suite.Test()`)
 * across all declarations of a symbol.
 */
export const findDecoratorValues = (
  symbol: ts.Symbol,
  name: string
): readonly DecoratorValue[] | undefined => {
  for (const declaration of symbol.declarations ?? []) {
    if (!ts.canHaveDecorators(declaration)) {
      continue;
    }
    const decorator = ts
      .getDecorators(declaration)
      ?.find((candidate) => decoratorName(candidate) === name);
    if (decorator) {
      return namedValues(decorator);
    }
  }
  return undefined;
};
