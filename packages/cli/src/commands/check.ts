/**
 * mapweave check command - report diagnostics without writing anything
 */

import { Result, ok } from "@mapweave/frontend";
import type { CommandFailure, ResolvedConfig } from "../types.js";
import { reportDiagnostics, resolveMappers } from "./pipeline.js";

export const checkCommand = (
  config: ResolvedConfig
): Result<number, CommandFailure> => {
  const resolved = resolveMappers(config);
  if (!resolved.ok) {
    return resolved;
  }

  const { sourceFile, resolutions, diagnostics } = resolved.value;
  reportDiagnostics(diagnostics, config);
  if (!config.quiet) {
    console.log(`Checked ${resolutions.length} mapper(s) in ${sourceFile}`);
  }
  return ok(resolutions.length);
};
