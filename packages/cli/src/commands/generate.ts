/**
 * mapweave generate command - write mapper implementations
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { basename, dirname } from "node:path";
import { Result, ok, error } from "@mapweave/frontend";
import { emitMappers } from "@mapweave/emitter";
import type { CommandFailure, ResolvedConfig } from "../types.js";
import { reportDiagnostics, resolveMappers } from "./pipeline.js";

export type GenerateOutput = {
  readonly outputFile: string;
  readonly mapperCount: number;
};

export const generateCommand = (
  config: ResolvedConfig
): Result<GenerateOutput, CommandFailure> => {
  const resolved = resolveMappers(config);
  if (!resolved.ok) {
    return resolved;
  }

  const { sourceFile, outputFile, resolutions, diagnostics } = resolved.value;
  reportDiagnostics(diagnostics, config);

  const code = emitMappers(
    resolutions.map((resolution) => resolution.generated),
    basename(sourceFile),
    { indent: config.indent, header: config.header }
  );

  try {
    mkdirSync(dirname(outputFile), { recursive: true });
    writeFileSync(outputFile, code, "utf-8");
  } catch (err) {
    return error({
      kind: "io",
      message: `Can't write ${outputFile}: ${err instanceof Error ? err.message : String(err)}`,
    });
  }

  if (!config.quiet) {
    console.log(`Generated ${outputFile}`);
  }
  return ok({ outputFile, mapperCount: resolutions.length });
};
