/**
 * mapweave emitter - renders generated mappers as TypeScript
 */

export * from "./types.js";
export * from "./constants.js";
export * from "./type-emitter.js";
export * from "./expression-emitter.js";
export * from "./statement-emitter.js";
export { collectImports, emitImports } from "./core/imports.js";
export { emitMapper, emitMappers, emitModule } from "./emitter.js";
