/**
 * Call site helpers over the analysis tree
 */

import {
  type AnyNode,
  type AnalysisNode,
  type CallSiteNode,
  childrenOf,
} from "@assertlint/frontend";

export const isCallSite = (node: AnalysisNode): node is CallSiteNode =>
  node.kind === "invocation" ||
  node.kind === "reference" ||
  node.kind === "construction";

/**
 * Name a call site is classified under. Constructions have none.
 */
export const callSiteName = (node: CallSiteNode): string | undefined => {
  switch (node.kind) {
    case "invocation":
      return node.calleeName;
    case "reference":
      return node.name;
    case "construction":
      return undefined;
  }
};

/**
 * Whether any call site below `node` satisfies `predicate`.
 * Nested functions are searched too. Arguments and receivers are tested
 * before the call that consumes them; the walk stops at the first hit.
 */
export const someCallSite = (
  node: AnyNode,
  predicate: (site: CallSiteNode) => boolean
): boolean =>
  childrenOf(node).some(
    (child) =>
      someCallSite(child, predicate) ||
      (isCallSite(child) && predicate(child))
  );
