/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
assertlint - finds test methods that never assert v${VERSION}

USAGE:
  assertlint <command> [options] [files...]

COMMANDS:
  check [files...]          Report test methods without assertions
                            (scans the source root when no files are given)
  init                      Create a default assertlint.json

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  -q, --quiet               Only print findings and errors
  -c, --config <file>       Config file path (default: nearest assertlint.json)

CHECK OPTIONS:
  -s, --src <dir>                     Source root directory
  --custom-assertion-methods <list>   Extra assertion methods, comma-separated
                                      <qualified type>#<method name>[*]
  --test-decorator <name>             Decorator marking test methods (default: Test)
  --test-base-type <name>             Legacy test base class (default: TestCase)
  --expected-exception-key <name>     Decorator option exempting a test
                                      (default: expected)

INIT OPTIONS:
  -f, --force               Overwrite an existing assertlint.json

EXIT CODES:
  0  No findings
  1  Findings or analysis errors
  2  Unknown command or option
  3  Configuration error
  4  Source files could not be loaded

EXAMPLES:
  assertlint init
  assertlint check
  assertlint check test/user.test.ts
  assertlint check --custom-assertion-methods "com.example.Helper#check*"
`);
};
