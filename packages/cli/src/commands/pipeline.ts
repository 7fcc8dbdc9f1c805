/**
 * Shared discovery and resolution steps of the generate and check commands
 */

import { readFileSync } from "node:fs";
import { basename, dirname, join, relative, sep } from "node:path";
import {
  DiagnosticsCollector,
  Result,
  createDiagnosticsCollector,
  discoverMappers,
  formatDiagnostic,
  isDiagnosticError,
  mergeDiagnostics,
  ok,
  error,
} from "@mapweave/frontend";
import { MapperResolution, resolveMapper } from "@mapweave/resolver";
import type { CommandFailure, ResolvedConfig } from "../types.js";

export type PipelineOutput = {
  readonly sourceFile: string;
  readonly outputFile: string;
  readonly resolutions: readonly MapperResolution[];
  /** Warnings and errors of discovery and every mapper */
  readonly diagnostics: DiagnosticsCollector;
};

/**
 * `user-mapper.ts` generates `user-mapper.impl.ts`
 */
export const outputFileFor = (
  sourceFile: string,
  outputDirectory: string | undefined
): string => {
  const name = basename(sourceFile).replace(/\.ts$/, "");
  return join(outputDirectory ?? dirname(sourceFile), `${name}.impl.ts`);
};

/**
 * Module specifier the generated module imports the mapper's module by
 */
export const importPathFor = (sourceFile: string, outputFile: string): string => {
  const path = relative(dirname(outputFile), sourceFile)
    .split(sep)
    .join("/")
    .replace(/\.ts$/, ".js");
  return path.startsWith(".") ? path : `./${path}`;
};

/**
 * Print diagnostics; warnings are left out in quiet mode
 */
export const reportDiagnostics = (
  diagnostics: DiagnosticsCollector,
  config: Pick<ResolvedConfig, "quiet">
): void => {
  for (const diagnostic of diagnostics.diagnostics) {
    if (isDiagnosticError(diagnostic) || !config.quiet) {
      console.error(formatDiagnostic(diagnostic));
    }
  }
};

/**
 * Discover and resolve every mapper of the configured source file
 */
export const resolveMappers = (
  config: ResolvedConfig
): Result<PipelineOutput, CommandFailure> => {
  const sourceFile = config.sourceFile;
  if (sourceFile === undefined) {
    return error({ kind: "io", message: "Source file required" });
  }

  let source: string;
  try {
    source = readFileSync(sourceFile, "utf-8");
  } catch (err) {
    return error({
      kind: "io",
      message: `Can't read ${sourceFile}: ${err instanceof Error ? err.message : String(err)}`,
    });
  }

  const outputFile = outputFileFor(sourceFile, config.outputDirectory);
  const discovered = discoverMappers(source, {
    fileName: sourceFile,
    importPath: importPathFor(sourceFile, outputFile),
  });
  if (!discovered.ok) {
    return error({ kind: "diagnostics", diagnostics: discovered.error });
  }

  if (config.verbose) {
    console.log(`Discovered ${discovered.value.length} mapper(s) in ${sourceFile}`);
  }

  const resolutions = discovered.value.map((mapper) =>
    resolveMapper(mapper, {
      verbose: config.verbose,
      nullValueStrategy: config.nullValueStrategy,
      unmappedTargetPolicy: config.unmappedTargetPolicy,
    })
  );
  const diagnostics = resolutions.reduce(
    (collected, resolution) => mergeDiagnostics(collected, resolution.diagnostics),
    createDiagnosticsCollector()
  );

  if (diagnostics.hasErrors) {
    return error({ kind: "diagnostics", diagnostics });
  }
  return ok({ sourceFile, outputFile, resolutions, diagnostics });
};
