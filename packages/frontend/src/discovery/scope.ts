/**
 * State shared while discovering the mappers of one source file
 */

import * as ts from "typescript";
import { Diagnostic, DiagnosticCode, createDiagnostic } from "../types/diagnostic.js";
import { TypeDescriptor } from "../model/type-descriptor.js";
import { getNodeLocation } from "./helpers.js";

export type TypeDeclaration =
  | ts.InterfaceDeclaration
  | ts.ClassDeclaration
  | ts.TypeAliasDeclaration;

export type DiscoveryScope = {
  readonly sourceFile: ts.SourceFile;
  /** Module the emitted code imports the discovered names from */
  readonly importPath: string;
  readonly declarations: ReadonlyMap<string, TypeDeclaration>;
  /** Instantiated declarations by name and type arguments */
  readonly cache: Map<string, TypeDescriptor>;
  /** Aliases whose target is being converted */
  readonly inProgress: Set<string>;
  readonly report: (diagnostic: Diagnostic) => void;
};

/** Type variables in scope, by name */
export type TypeEnv = ReadonlyMap<string, TypeDescriptor>;

export const emptyEnv: TypeEnv = new Map();

export const reportAt = (
  scope: DiscoveryScope,
  node: ts.Node,
  code: DiagnosticCode,
  message: string,
  hint?: string
): void =>
  scope.report(
    createDiagnostic(code, "error", message, getNodeLocation(scope.sourceFile, node), hint)
  );

/**
 * Top-level interfaces, classes and type aliases by name.
 * The first declaration of a name wins.
 */
export const collectDeclarations = (
  sourceFile: ts.SourceFile
): ReadonlyMap<string, TypeDeclaration> => {
  const declarations = new Map<string, TypeDeclaration>();
  for (const statement of sourceFile.statements) {
    if (
      (ts.isInterfaceDeclaration(statement) ||
        ts.isClassDeclaration(statement) ||
        ts.isTypeAliasDeclaration(statement)) &&
      statement.name &&
      !declarations.has(statement.name.text)
    ) {
      declarations.set(statement.name.text, statement);
    }
  }
  return declarations;
};
