/**
 * Symbol table creation
 */

import * as ts from "typescript";
import { qualifiedTypeName } from "./helpers.js";
import type {
  SymbolEntry,
  SymbolRef,
  SymbolTable,
  TypeEntry,
  TypeRef,
} from "./types.js";

const CONSTRUCTOR_NAME = "constructor";

/**
 * Create an empty symbol table for one analysis unit.
 * Handles are allocated lazily and are stable for the table's lifetime.
 */
export const createSymbolTable = (checker: ts.TypeChecker): SymbolTable => {
  const members = new Map<ts.Symbol, SymbolEntry>();
  const constructors = new Map<ts.Symbol, SymbolEntry>();
  const types = new Map<ts.Symbol, TypeEntry>();
  const entriesById = new Map<number, SymbolEntry>();
  const typesById = new Map<number, TypeEntry>();
  let nextSymbolId = 1;
  let nextTypeId = 1;

  const register = (entry: SymbolEntry): SymbolRef => {
    entriesById.set(entry.ref.id, entry);
    return entry.ref;
  };

  const refForSymbol = (symbol: ts.Symbol): SymbolRef => {
    const existing = members.get(symbol);
    if (existing) {
      return existing.ref;
    }
    const name = symbol.getName();
    const entry: SymbolEntry = {
      kind: "member",
      ref: {
        id: nextSymbolId++,
        name: name === "__constructor" ? CONSTRUCTOR_NAME : name,
      },
      symbol,
    };
    members.set(symbol, entry);
    return register(entry);
  };

  const refForConstructor = (classSymbol: ts.Symbol): SymbolRef => {
    const existing = constructors.get(classSymbol);
    if (existing) {
      return existing.ref;
    }
    const entry: SymbolEntry = {
      kind: "constructor",
      ref: { id: nextSymbolId++, name: CONSTRUCTOR_NAME },
      classSymbol,
    };
    constructors.set(classSymbol, entry);
    return register(entry);
  };

  const refForType = (symbol: ts.Symbol): TypeRef => {
    const existing = types.get(symbol);
    if (existing) {
      return existing.ref;
    }
    const entry: TypeEntry = {
      ref: { id: nextTypeId++, qualifiedName: qualifiedTypeName(checker, symbol) },
      symbol,
    };
    types.set(symbol, entry);
    typesById.set(entry.ref.id, entry);
    return entry.ref;
  };

  return {
    refForSymbol,
    refForConstructor,
    refForType,
    symbolEntry: (ref) => entriesById.get(ref.id),
    typeEntry: (ref) => typesById.get(ref.id),
  };
};
