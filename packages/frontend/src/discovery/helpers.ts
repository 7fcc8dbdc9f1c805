/**
 * Discovery helper functions
 */

import * as ts from "typescript";
import { SourceLocation } from "../types/diagnostic.js";

/**
 * Get location information for a node
 */
export const getNodeLocation = (
  sourceFile: ts.SourceFile,
  node: ts.Node
): SourceLocation => {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(
    node.getStart(sourceFile)
  );
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length: node.getWidth(sourceFile),
  };
};

const hasModifier = (node: ts.Node, kind: ts.SyntaxKind): boolean =>
  ts.canHaveModifiers(node) &&
  (ts.getModifiers(node)?.some((m) => m.kind === kind) ?? false);

export const isAbstractNode = (node: ts.Node): boolean =>
  hasModifier(node, ts.SyntaxKind.AbstractKeyword);

export const isReadonlyNode = (node: ts.Node): boolean =>
  hasModifier(node, ts.SyntaxKind.ReadonlyKeyword);

/**
 * Members other code can't call: static, private and `#private` ones
 */
export const isHiddenMember = (node: ts.ClassElement): boolean =>
  hasModifier(node, ts.SyntaxKind.StaticKeyword) ||
  hasModifier(node, ts.SyntaxKind.PrivateKeyword) ||
  (node.name !== undefined && ts.isPrivateIdentifier(node.name));

/**
 * Plain identifier text of a member or parameter name
 */
export const nameText = (name: ts.Node | undefined): string | undefined =>
  name && (ts.isIdentifier(name) || ts.isStringLiteral(name))
    ? name.text
    : undefined;
