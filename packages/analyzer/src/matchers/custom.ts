/**
 * Custom assertion method matchers from configuration
 *
 * Format: comma-separated `<qualified type>#<method name>` entries, where a
 * trailing `*` on the method name matches by prefix:
 *
 *   "com.example.Helper#checkSomething*, Verifier#ensure"
 */

import {
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "@assertlint/frontend";
import { type CallMatcher, type MatcherSet, method } from "./call-matcher.js";
import { exactName, exactType, namePrefix } from "./criteria.js";

export type CompiledMatchers = {
  readonly matchers: MatcherSet;
  /** One warning per dropped entry */
  readonly diagnostics: DiagnosticsCollector;
};

const WILDCARD = "*";

/**
 * Split on `#`, dropping trailing empty parts: `a#b#` reads as `a#b`
 */
const splitEntry = (entry: string): string[] => {
  const parts = entry.split("#");
  while (parts.length > 0 && parts.at(-1) === "") {
    parts.pop();
  }
  return parts;
};

/**
 * Parse one entry, or undefined when it is malformed
 */
export const parseCustomMatcher = (entry: string): CallMatcher | undefined => {
  const parts = splitEntry(entry).map((part) => part.trim());
  const [typeName, methodName] = parts;
  if (parts.length !== 2 || !typeName || !methodName) {
    return undefined;
  }
  return method(
    exactType(typeName),
    methodName.endsWith(WILDCARD)
      ? namePrefix(methodName.slice(0, -WILDCARD.length))
      : exactName(methodName)
  );
};

/**
 * Compile the `customAssertionMethods` setting.
 * Blank entries are skipped, malformed ones are dropped with a warning.
 */
export const compileCustomMatchers = (config: string): CompiledMatchers =>
  config
    .split(",")
    .filter((entry) => entry.trim() !== "")
    .reduce<CompiledMatchers>(
      (compiled, entry) => {
        const matcher = parseCustomMatcher(entry);
        return matcher
          ? {
              matchers: [...compiled.matchers, matcher],
              diagnostics: compiled.diagnostics,
            }
          : {
              matchers: compiled.matchers,
              diagnostics: addDiagnostic(
                compiled.diagnostics,
                createDiagnostic(
                  "ASL2001",
                  "warning",
                  `Unable to create a matcher for custom assertion method '${entry.trim()}'`,
                  undefined,
                  "Use <qualified type>#<method name>, optionally ending in *"
                )
              ),
            };
      },
      { matchers: [], diagnostics: createDiagnosticsCollector() }
    );
