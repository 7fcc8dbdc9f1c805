/**
 * Name generation for forged methods
 */

import { TypeDescriptor, getTypeBound } from "@mapweave/frontend";

const CONTAINER_SUFFIX: Readonly<Record<string, string>> = {
  list: "List",
  set: "Set",
  array: "Array",
  map: "Map",
  iterable: "Iterable",
};

const capitalize = (text: string): string =>
  text.charAt(0).toUpperCase() + text.slice(1);

const decapitalize = (text: string): string =>
  text.charAt(0).toLowerCase() + text.slice(1);

const simpleName = (name: string): string => {
  const dot = name.lastIndexOf(".");
  return dot >= 0 ? name.slice(dot + 1) : name;
};

/**
 * Identifier-safe description of a type:
 * `Array<number>` is `numberArray`, `Map<string, Date>` is `stringDateMap`.
 */
export const describeForName = (
  type: TypeDescriptor,
  stack: readonly TypeDescriptor[] = []
): string => {
  const suffix = CONTAINER_SUFFIX[type.container];
  if (suffix === undefined || stack.includes(type)) {
    return decapitalize(simpleName(type.name)).replace(/[^A-Za-z0-9_$]/g, "_");
  }
  const inner = [...stack, type];
  const args = type.typeParameters.map((t, i) => {
    const part = describeForName(getTypeBound(t), inner);
    return i === 0 ? part : capitalize(part);
  });
  return `${args.join("")}${suffix}`;
};

/**
 * `numberArrayToStringArray`
 */
export const generateForgedMethodName = (
  source: TypeDescriptor,
  target: TypeDescriptor
): string =>
  `${describeForName(source)}To${capitalize(describeForName(target))}`;

/**
 * Parameter name of a forged method, after its container kind
 */
export const forgedParameterName = (source: TypeDescriptor): string =>
  source.container === "none" ? "source" : source.container;

const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "await", "break", "case", "catch", "class", "const", "continue",
  "debugger", "default", "delete", "do", "else", "enum", "export",
  "extends", "false", "finally", "for", "function", "if", "implements",
  "import", "in", "instanceof", "interface", "let", "new", "null",
  "package", "private", "protected", "public", "return", "static",
  "super", "switch", "this", "throw", "true", "try", "typeof", "var",
  "void", "while", "with", "yield",
]);

/**
 * `base`, or `base1`, `base2`, ... when taken or reserved
 */
export const safeVariableName = (
  base: string,
  taken: readonly string[]
): string => {
  let name = base;
  for (let i = 1; taken.includes(name) || RESERVED_WORDS.has(name); i++) {
    name = `${base}${i}`;
  }
  return name;
};
