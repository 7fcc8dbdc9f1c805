/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

/**
 * Parse CLI arguments
 */
export const parseArgs = (
  args: readonly string[]
): {
  command: string;
  sourceFile?: string;
  options: CliOptions;
} => {
  const options: CliOptions = {};
  let command = "";
  let sourceFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command
    if (command && !sourceFile && !arg.startsWith("-")) {
      sourceFile = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-o":
      case "--out":
        options.out = args[++i] ?? "";
        break;
      case "--null-value-strategy":
        options.nullValueStrategy = args[++i] ?? "";
        break;
      case "--unmapped-target-policy":
        options.unmappedTargetPolicy = args[++i] ?? "";
        break;
    }
  }

  return { command, sourceFile, options };
};
