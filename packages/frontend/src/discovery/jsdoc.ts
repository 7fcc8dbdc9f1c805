/**
 * JSDoc tag reading and parsing of mapweave tags
 */

import * as ts from "typescript";
import { PropertyMappingConfig } from "../model/method.js";
import { Result, ok, error } from "../types/result.js";

export type DocTag = {
  readonly name: string;
  /** Tag comment with surrounding whitespace removed */
  readonly text: string;
  readonly node: ts.JSDocTag;
};

const tagText = (tag: ts.JSDocTag): string => {
  const comment = ts.getTextOfJSDocComment(tag.comment)?.trim() ?? "";
  // `@throws {RangeError}` carries its name as a type expression
  if (ts.isJSDocThrowsTag(tag) && tag.typeExpression) {
    const typeName = tag.typeExpression.type.getText();
    return comment.length > 0 ? `${typeName} ${comment}` : typeName;
  }
  return comment;
};

export const getDocTags = (node: ts.Node): readonly DocTag[] =>
  ts.getJSDocTags(node).map((tag) => ({
    name: tag.tagName.text,
    text: tagText(tag),
    node: tag,
  }));

export const tagsNamed = (
  tags: readonly DocTag[],
  name: string
): readonly DocTag[] => tags.filter((tag) => tag.name === name);

/**
 * First word of a tag; `@qualifier fancy names` yields `fancy`
 */
export const firstWord = (tag: DocTag): string | undefined =>
  tag.text.split(/\s+/).find((word) => word.length > 0);

const OPTION_PATTERN = /([A-Za-z]+)(?:=(?:"([^"]*)"|(\S+)))?/g;

/**
 * `target=name source="full name" ignore` as a map; flags map to true
 */
export const parseOptions = (
  text: string
): ReadonlyMap<string, string | true> => {
  const options = new Map<string, string | true>();
  for (const match of text.matchAll(OPTION_PATTERN)) {
    const [, key, quoted, bare] = match;
    if (key !== undefined) {
      options.set(key, quoted ?? bare ?? true);
    }
  }
  return options;
};

const MAPPING_OPTIONS: ReadonlySet<string> = new Set([
  "target",
  "source",
  "ignore",
  "constant",
  "qualifiedBy",
  "format",
]);

const stringOption = (
  options: ReadonlyMap<string, string | true>,
  key: string
): string | undefined => {
  const value = options.get(key);
  return typeof value === "string" ? value : undefined;
};

/**
 * Parse `@mapping target=<t> [source=<s>] [ignore] [constant=<c>]
 * [qualifiedBy=<q>[,<q>]] [format=<f>]`
 */
export const parseMappingTag = (
  text: string
): Result<PropertyMappingConfig, string> => {
  const options = parseOptions(text);

  const unknown = [...options.keys()].filter((k) => !MAPPING_OPTIONS.has(k));
  if (unknown.length > 0) {
    return error(`unknown option(s) ${unknown.join(", ")}`);
  }

  const target = stringOption(options, "target");
  if (target === undefined) {
    return error("target=<property> is required");
  }

  const source = stringOption(options, "source");
  const constant = stringOption(options, "constant");
  const ignore = options.get("ignore") === true;
  if ([source, constant].filter((v) => v !== undefined).length + (ignore ? 1 : 0) > 1) {
    return error("source, constant and ignore exclude each other");
  }

  const qualifiedBy = stringOption(options, "qualifiedBy");
  return ok({
    target,
    source,
    ignore,
    constant,
    qualifiers: qualifiedBy ? qualifiedBy.split(",").filter((q) => q.length > 0) : [],
    format: stringOption(options, "format"),
  });
};

/**
 * Value of a tag restricted to a fixed set of words
 */
export const parseChoice = <T extends string>(
  tag: DocTag,
  choices: readonly T[]
): T | undefined => {
  const word = firstWord(tag);
  return choices.find((choice) => choice === word);
};
