/**
 * Resolver - Public API
 */

export type { SymbolResolver, DecoratorValue } from "./types.js";
export { createSymbolResolver } from "./creation.js";
export { findDecoratorValues } from "./decorators.js";
