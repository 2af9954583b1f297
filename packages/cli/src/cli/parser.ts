/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  /** Positional arguments after the command */
  paths: string[];
  options: CliOptions;
  /** First unrecognised option, reported by the dispatcher */
  unknownOption?: string;
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const paths: string[] = [];
  let unknownOption: string | undefined;
  let onlyPositional = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Everything after "--" is a path, even when it starts with "-"
    if (arg === "--") {
      onlyPositional = true;
      continue;
    }

    if (onlyPositional || !arg.startsWith("-")) {
      if (!command) {
        command = arg;
      } else {
        paths.push(arg);
      }
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", paths: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", paths: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-f":
      case "--force":
        options.force = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-s":
      case "--src":
        options.src = args[++i] ?? "";
        break;
      case "--custom-assertion-methods":
        options.customAssertionMethods = args[++i] ?? "";
        break;
      case "--test-decorator":
        options.testDecorator = args[++i] ?? "";
        break;
      case "--test-base-type":
        options.testBaseType = args[++i] ?? "";
        break;
      case "--expected-exception-key":
        options.expectedExceptionKey = args[++i] ?? "";
        break;
      default:
        unknownOption ??= arg;
    }
  }

  return { command, paths, options, unknownOption };
};
