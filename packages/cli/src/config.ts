/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { type Result, ok, error } from "@assertlint/frontend";
import { DEFAULT_TEST_CONVENTIONS } from "@assertlint/analyzer";
import type { AssertlintConfig, CliOptions, ResolvedConfig } from "./types.js";

export const CONFIG_FILE_NAME = "assertlint.json";

const CONFIG_FIELDS = [
  "$schema",
  "sourceRoot",
  "customAssertionMethods",
  "testDecorator",
  "testBaseType",
  "expectedExceptionKey",
] as const;

type ConfigField = (typeof CONFIG_FIELDS)[number];

const isConfigField = (key: string): key is ConfigField =>
  CONFIG_FIELDS.some((field) => field === key);

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Validate parsed JSON as an assertlint configuration
 */
export const parseConfig = (
  value: unknown
): Result<AssertlintConfig, string> => {
  if (!isRecord(value)) {
    return error(`${CONFIG_FILE_NAME} must contain a JSON object`);
  }

  const config: { -readonly [K in ConfigField]?: string } = {};
  for (const [key, fieldValue] of Object.entries(value)) {
    if (!isConfigField(key)) {
      return error(`Unknown field '${key}' in ${CONFIG_FILE_NAME}`);
    }
    if (typeof fieldValue !== "string") {
      return error(`Field '${key}' in ${CONFIG_FILE_NAME} must be a string`);
    }
    config[key] = fieldValue;
  }

  return ok(config);
};

/**
 * Load assertlint.json
 */
export const loadConfig = (
  configPath: string
): Result<AssertlintConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    return parseConfig(JSON.parse(content));
  } catch (err) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
};

/**
 * Find assertlint.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find assertlint.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args.
 * CLI flags win over file values; file values win over defaults.
 */
export const resolveConfig = (
  config: AssertlintConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  paths: readonly string[] = [],
  cwd: string = process.cwd()
): ResolvedConfig => ({
  projectRoot,
  sourceRoot: cliOptions.src
    ? resolve(cwd, cliOptions.src)
    : resolve(projectRoot, config.sourceRoot ?? "."),
  paths: paths.map((p) => resolve(cwd, p)),
  customAssertionMethods:
    cliOptions.customAssertionMethods ?? config.customAssertionMethods ?? "",
  testDecorator:
    cliOptions.testDecorator ??
    config.testDecorator ??
    DEFAULT_TEST_CONVENTIONS.testDecorator,
  testBaseType:
    cliOptions.testBaseType ??
    config.testBaseType ??
    DEFAULT_TEST_CONVENTIONS.testBaseType,
  expectedExceptionKey:
    cliOptions.expectedExceptionKey ??
    config.expectedExceptionKey ??
    DEFAULT_TEST_CONVENTIONS.expectedExceptionKey,
  verbose: cliOptions.verbose ?? false,
  quiet: cliOptions.quiet ?? false,
});
