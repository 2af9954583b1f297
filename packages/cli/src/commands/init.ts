/**
 * assertlint init - create assertlint.json
 */

import { existsSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { type Result, ok, error } from "@assertlint/frontend";
import { DEFAULT_TEST_CONVENTIONS } from "@assertlint/analyzer";
import { CONFIG_FILE_NAME } from "../config.js";
import type { AssertlintConfig } from "../types.js";

export type InitOptions = {
  readonly force?: boolean;
  readonly sourceRoot?: string;
};

/**
 * Generate the default configuration
 */
export const generateConfig = (sourceRoot = "."): AssertlintConfig => ({
  sourceRoot,
  customAssertionMethods: "",
  testDecorator: DEFAULT_TEST_CONVENTIONS.testDecorator,
  testBaseType: DEFAULT_TEST_CONVENTIONS.testBaseType,
  expectedExceptionKey: DEFAULT_TEST_CONVENTIONS.expectedExceptionKey,
});

/**
 * Write assertlint.json into a directory
 * @returns the path of the written file
 */
export const initProject = (
  cwd: string,
  options: InitOptions = {}
): Result<string, string> => {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  if (existsSync(configPath) && !options.force) {
    return error(
      `${CONFIG_FILE_NAME} already exists. Use --force to overwrite it.`
    );
  }

  try {
    const config = generateConfig(options.sourceRoot);
    writeFileSync(configPath, JSON.stringify(config, null, 2) + "\n", "utf-8");
    return ok(configPath);
  } catch (err) {
    return error(
      `Failed to write ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
};
