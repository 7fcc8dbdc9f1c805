/**
 * Conversion of TypeScript type syntax into type descriptors
 */

import * as ts from "typescript";
import {
  PropertyDescriptor,
  TypeDescriptor,
  containerType,
  objectType,
  typeKey,
  typeVariable,
} from "../model/type-descriptor.js";
import {
  bigintType,
  booleanType,
  bufferType,
  dateType,
  numberType,
  stringType,
} from "../model/well-known.js";
import { DiscoveryScope, TypeDeclaration, TypeEnv, reportAt } from "./scope.js";
import { isAbstractNode, isHiddenMember, isReadonlyNode, nameText } from "./helpers.js";

export type ConvertedType = {
  readonly type: TypeDescriptor;
  /** The declared type was a union with null or undefined */
  readonly nullable: boolean;
};

type ContainerForm = {
  readonly name: string;
  readonly arity: number;
  /** Builds the descriptor around a parameter list that may still be filled */
  readonly build: (typeParameters: TypeDescriptor[]) => TypeDescriptor;
};

const CONTAINER_FORMS: readonly ContainerForm[] = [
  { name: "Array", arity: 1, build: (p) => containerType("Array", "array", p) },
  {
    name: "ReadonlyArray",
    arity: 1,
    build: (p) =>
      containerType("ReadonlyArray", "list", p, containerType("Array", "array", p)),
  },
  { name: "Set", arity: 1, build: (p) => containerType("Set", "set", p) },
  {
    name: "ReadonlySet",
    arity: 1,
    build: (p) => containerType("ReadonlySet", "set", p, containerType("Set", "set", p)),
  },
  {
    name: "Iterable",
    arity: 1,
    build: (p) =>
      containerType("Iterable", "iterable", p, containerType("Array", "array", p)),
  },
  { name: "Map", arity: 2, build: (p) => containerType("Map", "map", p) },
  {
    name: "ReadonlyMap",
    arity: 2,
    build: (p) => containerType("ReadonlyMap", "map", p, containerType("Map", "map", p)),
  },
  { name: "Record", arity: 2, build: (p) => containerType("Record", "map", p) },
];

const CONTAINERS: ReadonlyMap<string, ContainerForm> = new Map(
  CONTAINER_FORMS.map((form) => [form.name, form])
);

const NAMED_BUILTINS: ReadonlyMap<string, TypeDescriptor> = new Map([
  ["Date", dateType],
  ["Buffer", bufferType],
]);

const KEYWORD_TYPES: ReadonlyMap<ts.SyntaxKind, TypeDescriptor> = new Map([
  [ts.SyntaxKind.StringKeyword, stringType],
  [ts.SyntaxKind.NumberKeyword, numberType],
  [ts.SyntaxKind.BooleanKeyword, booleanType],
  [ts.SyntaxKind.BigIntKeyword, bigintType],
]);

type ContainerSyntax = {
  readonly form: ContainerForm;
  readonly args: readonly ts.TypeNode[];
};

const unwrap = (node: ts.TypeNode): ts.TypeNode =>
  ts.isParenthesizedTypeNode(node) ? unwrap(node.type) : node;

const referenceName = (node: ts.TypeReferenceNode): string =>
  ts.isIdentifier(node.typeName) ? node.typeName.text : node.typeName.getText();

const isShadowed = (name: string, env: TypeEnv, scope: DiscoveryScope): boolean =>
  env.has(name) || scope.declarations.has(name);

/**
 * `T[]`, `readonly T[]` and references to the built-in containers
 */
const containerSyntax = (
  node: ts.TypeNode,
  env: TypeEnv,
  scope: DiscoveryScope
): ContainerSyntax | undefined => {
  const array = CONTAINERS.get("Array");
  const readonlyArray = CONTAINERS.get("ReadonlyArray");
  if (ts.isArrayTypeNode(node) && array) {
    return { form: array, args: [node.elementType] };
  }
  if (
    ts.isTypeOperatorNode(node) &&
    node.operator === ts.SyntaxKind.ReadonlyKeyword &&
    ts.isArrayTypeNode(node.type) &&
    readonlyArray
  ) {
    return { form: readonlyArray, args: [node.type.elementType] };
  }
  if (ts.isTypeReferenceNode(node)) {
    const name = referenceName(node);
    const form = CONTAINERS.get(name);
    if (form && !isShadowed(name, env, scope)) {
      return { form, args: node.typeArguments ?? [] };
    }
  }
  return undefined;
};

const checkArity = (
  node: ts.Node,
  name: string,
  expected: number,
  actual: number,
  scope: DiscoveryScope
): boolean => {
  if (expected === actual) {
    return true;
  }
  reportAt(
    scope,
    node,
    "MWV2001",
    `Type "${name}" takes ${expected} type argument(s), got ${actual}.`
  );
  return false;
};

const convertArguments = (
  args: readonly ts.TypeNode[],
  env: TypeEnv,
  scope: DiscoveryScope
): TypeDescriptor[] | undefined => {
  const converted: TypeDescriptor[] = [];
  for (const arg of args) {
    const type = convertType(arg, env, scope);
    if (!type) {
      return undefined;
    }
    converted.push(type.type);
  }
  return converted;
};

const isNullish = (node: ts.TypeNode): boolean =>
  node.kind === ts.SyntaxKind.UndefinedKeyword ||
  (ts.isLiteralTypeNode(node) && node.literal.kind === ts.SyntaxKind.NullKeyword);

/**
 * Convert a type node. Reports and returns undefined for unsupported syntax.
 */
export const convertType = (
  node: ts.TypeNode,
  env: TypeEnv,
  scope: DiscoveryScope
): ConvertedType | undefined => {
  const target = unwrap(node);
  if (ts.isUnionTypeNode(target)) {
    const rest = target.types.filter((t) => !isNullish(t));
    const [only] = rest;
    if (rest.length !== 1 || !only) {
      reportAt(
        scope,
        target,
        "MWV2001",
        `Union type "${target.getText()}" isn't supported.`,
        "Only unions with null or undefined can be mapped."
      );
      return undefined;
    }
    const converted = convertType(only, env, scope);
    return converted ? { type: converted.type, nullable: true } : undefined;
  }

  const type = convertNonNullable(target, env, scope);
  return type ? { type, nullable: false } : undefined;
};

const convertNonNullable = (
  node: ts.TypeNode,
  env: TypeEnv,
  scope: DiscoveryScope
): TypeDescriptor | undefined => {
  const keyword = KEYWORD_TYPES.get(node.kind);
  if (keyword) {
    return keyword;
  }

  const container = containerSyntax(node, env, scope);
  if (container) {
    const { form, args } = container;
    if (!checkArity(node, form.name, form.arity, args.length, scope)) {
      return undefined;
    }
    const params = convertArguments(args, env, scope);
    return params ? form.build(params) : undefined;
  }

  if (ts.isTypeReferenceNode(node)) {
    return convertReference(node, env, scope);
  }

  reportAt(scope, node, "MWV2001", `Type "${node.getText()}" isn't supported.`);
  return undefined;
};

const convertReference = (
  node: ts.TypeReferenceNode,
  env: TypeEnv,
  scope: DiscoveryScope
): TypeDescriptor | undefined => {
  const name = referenceName(node);
  const args = node.typeArguments ?? [];

  const variable = env.get(name);
  if (variable) {
    return checkArity(node, name, 0, args.length, scope) ? variable : undefined;
  }

  const declaration = scope.declarations.get(name);
  if (declaration) {
    return instantiate(declaration, args, node, env, scope);
  }

  const builtin = NAMED_BUILTINS.get(name);
  if (builtin) {
    return checkArity(node, name, 0, args.length, scope) ? builtin : undefined;
  }

  reportAt(
    scope,
    node,
    "MWV2002",
    `Unknown type "${name}".`,
    "Declare the type in the mapper's module."
  );
  return undefined;
};

/**
 * Instantiate a local declaration for the given type arguments
 */
export const instantiate = (
  declaration: TypeDeclaration,
  argNodes: readonly ts.TypeNode[],
  node: ts.Node,
  env: TypeEnv,
  scope: DiscoveryScope
): TypeDescriptor | undefined => {
  const name = declaration.name?.text ?? "";
  const declared = declaration.typeParameters ?? [];
  if (!checkArity(node, name, declared.length, argNodes.length, scope)) {
    return undefined;
  }
  const args = convertArguments(argNodes, env, scope);
  return args ? instantiateWith(declaration, name, args, scope) : undefined;
};

const instantiateWith = (
  declaration: TypeDeclaration,
  name: string,
  args: readonly TypeDescriptor[],
  scope: DiscoveryScope
): TypeDescriptor | undefined => {
  const key = args.length > 0 ? `${name}<${args.map(typeKey).join(",")}>` : name;
  const cached = scope.cache.get(key);
  if (cached) {
    return cached;
  }

  const env = new Map<string, TypeDescriptor>();
  (declaration.typeParameters ?? []).forEach((parameter, i) => {
    const arg = args[i];
    if (arg) {
      env.set(parameter.name.text, arg);
    }
  });

  if (ts.isTypeAliasDeclaration(declaration)) {
    return instantiateAlias(declaration, name, key, args, env, scope);
  }

  const kind = ts.isInterfaceDeclaration(declaration)
    ? "interface"
    : isAbstractNode(declaration)
      ? "abstractClass"
      : "class";
  const properties: PropertyDescriptor[] = [];
  const superTypes: TypeDescriptor[] = [];
  const type = objectType(kind, name, {
    typeParameters: args,
    superTypes,
    properties,
    importPath: scope.importPath,
  });
  // Cached before members are converted so self-references resolve to it
  scope.cache.set(key, type);

  superTypes.push(...convertHeritage(declaration, env, scope));
  properties.push(...convertMembers(declaration.members, env, scope));
  for (const superType of superTypes) {
    for (const inherited of superType.properties) {
      if (!properties.some((p) => p.name === inherited.name)) {
        properties.push(inherited);
      }
    }
  }
  return type;
};

const instantiateAlias = (
  declaration: ts.TypeAliasDeclaration,
  name: string,
  key: string,
  args: readonly TypeDescriptor[],
  env: TypeEnv,
  scope: DiscoveryScope
): TypeDescriptor | undefined => {
  const target = unwrap(declaration.type);

  if (ts.isTypeLiteralNode(target)) {
    const properties: PropertyDescriptor[] = [];
    const type = objectType("interface", name, {
      typeParameters: args,
      properties,
      importPath: scope.importPath,
    });
    scope.cache.set(key, type);
    properties.push(...convertMembers(target.members, env, scope));
    return type;
  }

  const container = containerSyntax(target, env, scope);
  if (container) {
    const { form, args: argNodes } = container;
    if (!checkArity(target, form.name, form.arity, argNodes.length, scope)) {
      return undefined;
    }
    const params: TypeDescriptor[] = [];
    const type = form.build(params);
    scope.cache.set(key, type);
    const converted = convertArguments(argNodes, env, scope);
    if (!converted) {
      scope.cache.delete(key);
      return undefined;
    }
    params.push(...converted);
    return type;
  }

  if (scope.inProgress.has(key)) {
    reportAt(
      scope,
      declaration,
      "MWV2001",
      `Type alias "${name}" refers to itself outside an object or container type.`
    );
    return undefined;
  }

  scope.inProgress.add(key);
  try {
    const converted = convertType(target, env, scope);
    if (converted) {
      scope.cache.set(key, converted.type);
    }
    return converted?.type;
  } finally {
    scope.inProgress.delete(key);
  }
};

const convertHeritage = (
  declaration: ts.InterfaceDeclaration | ts.ClassDeclaration,
  env: TypeEnv,
  scope: DiscoveryScope
): readonly TypeDescriptor[] =>
  (declaration.heritageClauses ?? [])
    .flatMap((clause) => clause.types)
    .flatMap((heritage) => {
      const name = ts.isIdentifier(heritage.expression)
        ? heritage.expression.text
        : heritage.expression.getText();
      const superDeclaration = scope.declarations.get(name);
      if (!superDeclaration) {
        reportAt(scope, heritage, "MWV2002", `Unknown type "${name}".`);
        return [];
      }
      const type = instantiate(
        superDeclaration,
        heritage.typeArguments ?? [],
        heritage,
        env,
        scope
      );
      return type ? [type] : [];
    });

const isMappedProperty = (
  member: ts.Node
): member is ts.PropertySignature | ts.PropertyDeclaration =>
  ts.isPropertySignature(member) ||
  (ts.isPropertyDeclaration(member) && !isHiddenMember(member));

const convertMembers = (
  members: ts.NodeArray<ts.TypeElement> | ts.NodeArray<ts.ClassElement>,
  env: TypeEnv,
  scope: DiscoveryScope
): readonly PropertyDescriptor[] => {
  const properties: PropertyDescriptor[] = [];
  for (const member of members) {
    if (!isMappedProperty(member)) {
      continue;
    }

    const name = nameText(member.name);
    if (name === undefined) {
      continue;
    }
    if (!member.type) {
      reportAt(
        scope,
        member,
        "MWV2001",
        `Property "${name}" needs a type annotation.`
      );
      continue;
    }

    const converted = convertType(member.type, env, scope);
    if (converted) {
      properties.push({
        name,
        type: converted.type,
        optional: member.questionToken !== undefined,
        nullable: converted.nullable,
        readonly: isReadonlyNode(member),
      });
    }
  }
  return properties;
};

/**
 * Method type parameters as type variables, bounds included
 */
export const convertTypeParameters = (
  parameters: readonly ts.TypeParameterDeclaration[] | undefined,
  env: TypeEnv,
  scope: DiscoveryScope
): { readonly env: TypeEnv; readonly variables: readonly TypeDescriptor[] } => {
  const current = new Map<string, TypeDescriptor>(env);
  const variables: TypeDescriptor[] = [];
  for (const parameter of parameters ?? []) {
    const bound = parameter.constraint
      ? convertType(parameter.constraint, current, scope)?.type
      : undefined;
    const variable = typeVariable(parameter.name.text, bound);
    variables.push(variable);
    current.set(parameter.name.text, variable);
  }
  return { env: current, variables };
};
