/**
 * Built-in assertion matchers
 *
 * Known assertion-library entry points, fluent assertion chains and mock
 * verification APIs. The table lives in data/builtin-matchers.json and is
 * loaded and validated once per process.
 */

import { createRequire } from "node:module";
import { type CallMatcher, type MatcherSet, method } from "./call-matcher.js";
import type { NameCriterion, TypeCriterion } from "./criteria.js";

const require = createRequire(import.meta.url);

type Json = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is Json =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseTypeCriterion = (value: unknown): TypeCriterion | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  if (value.kind === "any") {
    return { kind: "any" };
  }
  if (
    (value.kind === "exact" || value.kind === "subtypeOf") &&
    typeof value.name === "string"
  ) {
    return { kind: value.kind, name: value.name };
  }
  return undefined;
};

const parseNameCriterion = (value: unknown): NameCriterion | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  if (value.kind === "any") {
    return { kind: "any" };
  }
  if (value.kind === "exact" && typeof value.name === "string") {
    return { kind: "exact", name: value.name };
  }
  if (value.kind === "prefix" && typeof value.prefix === "string") {
    return { kind: "prefix", prefix: value.prefix };
  }
  return undefined;
};

/**
 * Parse a matcher table. Throws on a malformed table.
 */
export const parseMatcherTable = (table: unknown): MatcherSet => {
  if (!isRecord(table) || !Array.isArray(table.matchers)) {
    throw new Error("Matcher table must be an object with a 'matchers' array");
  }
  return table.matchers.map((entry: unknown, index): CallMatcher => {
    const type = isRecord(entry) ? parseTypeCriterion(entry.type) : undefined;
    const name = isRecord(entry) ? parseNameCriterion(entry.name) : undefined;
    if (!type || !name) {
      throw new Error(`Invalid matcher at index ${index} in matcher table`);
    }
    return method(type, name);
  });
};

export const BUILTIN_ASSERTION_MATCHERS: MatcherSet = Object.freeze(
  parseMatcherTable(require("../../data/builtin-matchers.json"))
);
