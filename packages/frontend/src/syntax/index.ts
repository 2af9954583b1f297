/**
 * Analysis tree - Public API
 */

export type {
  UnitNode,
  ClassNode,
  FunctionNode,
  InvocationNode,
  ReferenceNode,
  ConstructionNode,
  CallSiteNode,
  AnalysisNode,
  AnyNode,
} from "./types.js";
export { childrenOf } from "./types.js";
export { buildAnalysisTree, type BuiltTree } from "./builder.js";
export { getNodeLocation } from "./helpers.js";
