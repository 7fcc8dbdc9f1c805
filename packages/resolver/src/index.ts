/**
 * mapweave resolver - decides how values of one type become another
 */

export * from "./conversion/types.js";
export * from "./conversion/simple-conversion.js";
export * from "./conversion/registry.js";
export * from "./conversion/builtin.js";
export * from "./candidates/name-similarity.js";
export * from "./candidates/candidate-index.js";
export * from "./forge/queue.js";
export * from "./forge/naming.js";
export * from "./model/assignment.js";
export * from "./context.js";
export * from "./session.js";
export * from "./resolver.js";
export * from "./lifecycle.js";
export * from "./builders/types.js";
export * from "./builders/container-mapping.js";
export * from "./builders/bean-mapping.js";
export * from "./mapper-generator.js";
