/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { formatDiagnostic } from "@assertlint/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { initProject } from "../commands/init.js";
import { checkCommand, printCheckReport } from "../commands/check.js";
import type { AssertlintConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`assertlint v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (parsed.unknownOption !== undefined) {
    console.error(`Error: Unknown option '${parsed.unknownOption}'`);
    console.error("Run 'assertlint --help' for usage information");
    return 2;
  }

  // Handle init (doesn't need config)
  if (parsed.command === "init") {
    const result = initProject(cwd, {
      force: parsed.options.force,
      sourceRoot: parsed.options.src,
    });
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return 3;
    }
    if (!parsed.options.quiet) {
      console.log(`✓ Created ${result.value}`);
    }
    return 0;
  }

  if (parsed.command !== "check") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'assertlint --help' for usage information");
    return 2;
  }

  // Load config; an explicit --config must exist, otherwise defaults apply
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: AssertlintConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return 3;
    }
    fileConfig = configResult.value;
  }

  // Project root is the directory containing assertlint.json
  const projectRoot = configPath ? dirname(configPath) : cwd;

  const config = resolveConfig(
    fileConfig,
    parsed.options,
    projectRoot,
    parsed.paths,
    cwd
  );

  if (config.verbose) {
    console.log(
      configPath ? `Using ${configPath}` : "No assertlint.json found, using defaults"
    );
  }

  const result = checkCommand(config);
  if (!result.ok) {
    console.error(`Error: ${result.error.message}`);
    for (const diagnostic of result.error.diagnostics) {
      console.error(formatDiagnostic(diagnostic));
    }
    return 4;
  }

  printCheckReport(result.value, config);
  return result.value.errors > 0 ? 1 : 0;
};
