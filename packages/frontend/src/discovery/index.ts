/**
 * Mapper discovery from TypeScript source
 */

import * as ts from "typescript";
import { MapperDescriptor } from "../model/mapper.js";
import { TypeDescriptor } from "../model/type-descriptor.js";
import {
  DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import { Result, ok, error } from "../types/result.js";
import { DiscoveryScope, collectDeclarations } from "./scope.js";
import { discoverMapper, isMapperDeclaration } from "./mappers.js";

export type DiscoveryOptions = {
  readonly fileName: string;
  /** Module specifier generated code imports the mapper's types from */
  readonly importPath: string;
};

export const parseSourceFile = (fileName: string, source: string): ts.SourceFile =>
  ts.createSourceFile(fileName, source, ts.ScriptTarget.Latest, true, ts.ScriptKind.TS);

/**
 * Discover every `@mapper` declaration of a module
 */
export const discoverMappers = (
  source: string,
  options: DiscoveryOptions
): Result<readonly MapperDescriptor[], DiagnosticsCollector> => {
  const sourceFile = parseSourceFile(options.fileName, source);
  let diagnostics = createDiagnosticsCollector();

  const scope: DiscoveryScope = {
    sourceFile,
    importPath: options.importPath,
    declarations: collectDeclarations(sourceFile),
    cache: new Map<string, TypeDescriptor>(),
    inProgress: new Set<string>(),
    report: (diagnostic) => {
      diagnostics = addDiagnostic(diagnostics, diagnostic);
    },
  };

  const declarations = sourceFile.statements.filter(isMapperDeclaration);
  if (declarations.length === 0) {
    return error(
      addDiagnostic(
        diagnostics,
        createDiagnostic(
          "MWV2004",
          "error",
          `No @mapper declaration found in ${options.fileName}.`,
          undefined,
          "Tag an interface or abstract class with @mapper."
        )
      )
    );
  }

  const mappers = declarations.flatMap((declaration) => {
    const mapper = discoverMapper(declaration, scope);
    return mapper ? [mapper] : [];
  });

  return diagnostics.hasErrors ? error(diagnostics) : ok(mappers);
};

export type { DiscoveryScope, TypeDeclaration, TypeEnv } from "./scope.js";
export { collectDeclarations } from "./scope.js";
export { convertType, convertTypeParameters, instantiate } from "./type-converter.js";
export type { ConvertedType } from "./type-converter.js";
export { discoverMapper, isMapperDeclaration } from "./mappers.js";
export type { MapperDeclaration } from "./mappers.js";
export { getDocTags, parseMappingTag, parseOptions } from "./jsdoc.js";
export type { DocTag } from "./jsdoc.js";
