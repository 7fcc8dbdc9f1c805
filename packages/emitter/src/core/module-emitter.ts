/**
 * Main module emission logic
 */

import { GeneratedMapper } from "@mapweave/resolver";
import { EmitterContext, EmitterOptions, createContext, indentLines, indent } from "../types.js";
import { emitMappingMethod } from "../statement-emitter.js";
import { generateFileHeader } from "../constants.js";
import { collectImports, emitImports } from "./imports.js";

const emitClass = (generated: GeneratedMapper, context: EmitterContext): string => {
  const mapper = generated.mapper;
  const heritage =
    mapper.declarationKind === "interface"
      ? `implements ${mapper.name}`
      : `extends ${mapper.name}`;

  const memberContext = indent(context);
  const members = generated.methods.map((method) =>
    indentLines(emitMappingMethod(method, memberContext), memberContext).join("\n")
  );

  return [
    `export class ${generated.implementationName} ${heritage} {`,
    members.join("\n\n"),
    "}",
  ].join("\n");
};

/**
 * Emit one module holding the implementation classes of `mappers`
 *
 * @param sourceName - Module the mappers were declared in, for the header
 */
export const emitModule = (
  mappers: readonly GeneratedMapper[],
  sourceName: string,
  options: EmitterOptions = {}
): string => {
  const context = createContext(options);
  const header = generateFileHeader(sourceName, options.header);
  const imports = emitImports(collectImports(mappers));
  const classes = mappers.map((generated) => emitClass(generated, context));

  return [header, imports.join("\n"), "", classes.join("\n\n"), ""].join("\n");
};
