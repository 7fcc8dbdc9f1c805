/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  NullValueStrategy,
  Result,
  UnmappedTargetPolicy,
  ok,
  error,
} from "@mapweave/frontend";
import type { MapweaveConfig, CliOptions, ResolvedConfig } from "./types.js";

export const CONFIG_FILE_NAME = "mapweave.json";

const NULL_VALUE_STRATEGIES: readonly NullValueStrategy[] = ["propagate", "mapToDefault"];
const UNMAPPED_TARGET_POLICIES: readonly UnmappedTargetPolicy[] = ["ignore", "warn", "error"];

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const choiceOf = <T extends string>(
  value: unknown,
  choices: readonly T[]
): T | undefined => choices.find((choice) => choice === value);

const optionalString = (
  source: Readonly<Record<string, unknown>>,
  key: string,
  path: string
): Result<string | undefined, string> => {
  const value = source[key];
  if (value === undefined) {
    return ok(undefined);
  }
  if (typeof value === "string") {
    return ok(value);
  }
  return error(`${CONFIG_FILE_NAME}: '${path}' must be a string`);
};

const optionalChoice = <T extends string>(
  source: Readonly<Record<string, unknown>>,
  key: string,
  choices: readonly T[]
): Result<T | undefined, string> => {
  const value = source[key];
  if (value === undefined) {
    return ok(undefined);
  }
  const choice = choiceOf(value, choices);
  return choice !== undefined
    ? ok(choice)
    : error(`${CONFIG_FILE_NAME}: '${key}' must be one of ${choices.join(", ")}`);
};

const validateEmit = (value: unknown): Result<MapweaveConfig["emit"], string> => {
  if (value === undefined) {
    return ok(undefined);
  }
  if (!isRecord(value)) {
    return error(`${CONFIG_FILE_NAME}: 'emit' must be an object`);
  }
  const indentValue = value["indent"];
  const indent = typeof indentValue === "number" ? indentValue : undefined;
  if (
    indentValue !== undefined &&
    (indent === undefined || !Number.isInteger(indent) || indent < 0)
  ) {
    return error(`${CONFIG_FILE_NAME}: 'emit.indent' must be a non-negative integer`);
  }
  const header = optionalString(value, "header", "emit.header");
  if (!header.ok) {
    return header;
  }
  return ok({ indent, header: header.value });
};

/**
 * Check the shape of a parsed mapweave.json
 */
export const validateConfig = (value: unknown): Result<MapweaveConfig, string> => {
  if (!isRecord(value)) {
    return error(`${CONFIG_FILE_NAME}: expected a JSON object`);
  }

  const schema = optionalString(value, "$schema", "$schema");
  const outputDirectory = optionalString(value, "outputDirectory", "outputDirectory");
  const nullValueStrategy = optionalChoice(value, "nullValueStrategy", NULL_VALUE_STRATEGIES);
  const unmappedTargetPolicy = optionalChoice(
    value,
    "unmappedTargetPolicy",
    UNMAPPED_TARGET_POLICIES
  );
  const emit = validateEmit(value["emit"]);

  if (!schema.ok) return schema;
  if (!outputDirectory.ok) return outputDirectory;
  if (!nullValueStrategy.ok) return nullValueStrategy;
  if (!unmappedTargetPolicy.ok) return unmappedTargetPolicy;
  if (!emit.ok) return emit;

  return ok({
    $schema: schema.value,
    outputDirectory: outputDirectory.value,
    nullValueStrategy: nullValueStrategy.value,
    unmappedTargetPolicy: unmappedTargetPolicy.value,
    emit: emit.value,
  });
};

/**
 * Load mapweave.json
 */
export const loadConfig = (configPath: string): Result<MapweaveConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return validateConfig(parsed);
  } catch (err) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`
    );
  }
};

/**
 * Find mapweave.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find mapweave.json or hit root
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

const cliChoice = <T extends string>(
  value: string | undefined,
  option: string,
  choices: readonly T[]
): Result<T | undefined, string> => {
  if (value === undefined) {
    return ok(undefined);
  }
  const choice = choiceOf(value, choices);
  return choice !== undefined
    ? ok(choice)
    : error(`--${option} must be one of ${choices.join(", ")}, got '${value}'`);
};

/**
 * Resolve final configuration from file + CLI args. CLI options win over
 * the file; mapper tags later win over both.
 *
 * @param projectRoot - Directory containing mapweave.json
 * @param workingDirectory - Base of paths given on the command line
 */
export const resolveConfig = (
  config: MapweaveConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  workingDirectory: string,
  sourceFile?: string
): Result<ResolvedConfig, string> => {
  const nullValueStrategy = cliChoice(
    cliOptions.nullValueStrategy,
    "null-value-strategy",
    NULL_VALUE_STRATEGIES
  );
  if (!nullValueStrategy.ok) {
    return nullValueStrategy;
  }
  const unmappedTargetPolicy = cliChoice(
    cliOptions.unmappedTargetPolicy,
    "unmapped-target-policy",
    UNMAPPED_TARGET_POLICIES
  );
  if (!unmappedTargetPolicy.ok) {
    return unmappedTargetPolicy;
  }

  const outputDirectory =
    cliOptions.out !== undefined
      ? resolve(workingDirectory, cliOptions.out)
      : config.outputDirectory !== undefined
        ? resolve(projectRoot, config.outputDirectory)
        : undefined;

  return ok({
    projectRoot,
    sourceFile: sourceFile !== undefined ? resolve(workingDirectory, sourceFile) : undefined,
    outputDirectory,
    nullValueStrategy: nullValueStrategy.value ?? config.nullValueStrategy,
    unmappedTargetPolicy: unmappedTargetPolicy.value ?? config.unmappedTargetPolicy,
    indent: config.emit?.indent ?? 2,
    header: config.emit?.header,
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  });
};
