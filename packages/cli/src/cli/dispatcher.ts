/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { formatDiagnostic } from "@mapweave/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import { checkCommand } from "../commands/check.js";
import type { CommandFailure, MapweaveConfig } from "../types.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Print a command failure and map it to an exit code
 */
const reportFailure = (failure: CommandFailure): number => {
  switch (failure.kind) {
    case "io":
      console.error(`Error: ${failure.message}`);
      return 1;
    case "diagnostics":
      for (const diagnostic of failure.diagnostics.diagnostics) {
        console.error(formatDiagnostic(diagnostic));
      }
      return 5;
  }
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  workingDirectory: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`mapweave v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (parsed.command !== "generate" && parsed.command !== "check") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'mapweave --help' for usage information");
    return 2;
  }

  if (!parsed.sourceFile) {
    console.error("Error: Source file required");
    console.error(`Usage: mapweave ${parsed.command} <file.ts>`);
    return 1;
  }

  // mapweave.json is optional unless named explicitly
  const configPath = parsed.options.config
    ? resolve(workingDirectory, parsed.options.config)
    : findConfig(workingDirectory);

  let fileConfig: MapweaveConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return 3;
    }
    fileConfig = configResult.value;
  }

  const projectRoot = configPath ? dirname(configPath) : workingDirectory;
  const config = resolveConfig(
    fileConfig,
    parsed.options,
    projectRoot,
    workingDirectory,
    parsed.sourceFile
  );
  if (!config.ok) {
    console.error(`Error: ${config.error}`);
    return 1;
  }

  if (config.value.verbose && configPath) {
    console.log(`Using ${configPath}`);
  }

  const result =
    parsed.command === "generate"
      ? generateCommand(config.value)
      : checkCommand(config.value);
  return result.ok ? 0 : reportFailure(result.error);
};
