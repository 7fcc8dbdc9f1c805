/**
 * mapweave emitter - public API
 */

import { GeneratedMapper } from "@mapweave/resolver";
import { EmitterOptions } from "./types.js";
import { emitModule } from "./core/module-emitter.js";

/**
 * Emit the implementation module of a single mapper
 */
export const emitMapper = (
  generated: GeneratedMapper,
  options: EmitterOptions = {}
): string => emitModule([generated], generated.mapper.importPath, options);

/**
 * Emit the implementation classes of every mapper declared in one module
 */
export const emitMappers = (
  mappers: readonly GeneratedMapper[],
  sourceName: string,
  options: EmitterOptions = {}
): string => emitModule(mappers, sourceName, options);

export { emitModule } from "./core/module-emitter.js";
