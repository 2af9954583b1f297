/**
 * Type and name criteria for call matchers
 */

import type { SymbolRef, SymbolResolver } from "@assertlint/frontend";

export type TypeCriterion =
  | { readonly kind: "exact"; readonly name: string }
  | { readonly kind: "subtypeOf"; readonly name: string }
  | { readonly kind: "any" };

export type NameCriterion =
  | { readonly kind: "exact"; readonly name: string }
  | { readonly kind: "prefix"; readonly prefix: string }
  | { readonly kind: "any" };

export const exactType = (name: string): TypeCriterion => ({
  kind: "exact",
  name,
});

export const subtypeOf = (name: string): TypeCriterion => ({
  kind: "subtypeOf",
  name,
});

export const anyType = (): TypeCriterion => ({ kind: "any" });

export const exactName = (name: string): NameCriterion => ({
  kind: "exact",
  name,
});

export const namePrefix = (prefix: string): NameCriterion => ({
  kind: "prefix",
  prefix,
});

export const anyName = (): NameCriterion => ({ kind: "any" });

/**
 * Evaluate a type criterion against the type declaring `symbol`.
 * A symbol whose declaring type is unknown only satisfies `any`.
 */
export const matchesType = (
  criterion: TypeCriterion,
  symbol: SymbolRef,
  resolver: SymbolResolver
): boolean => {
  if (criterion.kind === "any") {
    return true;
  }
  const declaringType = resolver.enclosingType(symbol);
  if (!declaringType) {
    return false;
  }
  return criterion.kind === "exact"
    ? declaringType.qualifiedName === criterion.name
    : resolver.isSubtypeOf(declaringType, criterion.name);
};

export const matchesName = (criterion: NameCriterion, name: string): boolean => {
  switch (criterion.kind) {
    case "exact":
      return name === criterion.name;
    case "prefix":
      return name.startsWith(criterion.prefix);
    case "any":
      return true;
  }
};
