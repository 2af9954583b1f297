/**
 * Type definitions for CLI
 */

/**
 * assertlint configuration file (assertlint.json)
 */
export type AssertlintConfig = {
  readonly $schema?: string;
  /** Directory scanned for test sources when no paths are given */
  readonly sourceRoot?: string;
  /** Comma-separated `<qualified type>#<method name>` entries */
  readonly customAssertionMethods?: string;
  readonly testDecorator?: string;
  readonly testBaseType?: string;
  readonly expectedExceptionKey?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  src?: string;
  customAssertionMethods?: string;
  testDecorator?: string;
  testBaseType?: string;
  expectedExceptionKey?: string;
  force?: boolean;
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string;
  readonly sourceRoot: string;
  /** Explicit files to check; empty means scan sourceRoot */
  readonly paths: readonly string[];
  readonly customAssertionMethods: string;
  readonly testDecorator: string;
  readonly testBaseType: string;
  readonly expectedExceptionKey: string;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
