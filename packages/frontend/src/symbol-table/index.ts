/**
 * Symbol table - Public API
 */

export type {
  SymbolRef,
  TypeRef,
  SymbolEntry,
  TypeEntry,
  SymbolTable,
} from "./types.js";
export { createSymbolTable } from "./creation.js";
export {
  resolveAlias,
  qualifiedTypeName,
  isCallableSymbol,
} from "./helpers.js";
