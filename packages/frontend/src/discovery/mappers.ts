/**
 * Mapper declarations: interfaces and abstract classes tagged `@mapper`
 */

import * as ts from "typescript";
import {
  DeclaredMethod,
  MethodConfig,
  MethodRole,
  NullValueStrategy,
  ParameterDescriptor,
  PropertyMappingConfig,
  SelectionConfig,
} from "../model/method.js";
import { MapperConfig, MapperDescriptor, UnmappedTargetPolicy } from "../model/mapper.js";
import { voidType } from "../model/well-known.js";
import { DiscoveryScope, TypeEnv, emptyEnv, reportAt } from "./scope.js";
import { convertType, convertTypeParameters } from "./type-converter.js";
import { getNodeLocation, isAbstractNode, isHiddenMember, nameText } from "./helpers.js";
import {
  DocTag,
  firstWord,
  getDocTags,
  parseChoice,
  parseMappingTag,
  tagsNamed,
} from "./jsdoc.js";

export type MapperDeclaration = ts.InterfaceDeclaration | ts.ClassDeclaration;

const NULL_VALUE_STRATEGIES: readonly NullValueStrategy[] = ["propagate", "mapToDefault"];
const UNMAPPED_TARGET_POLICIES: readonly UnmappedTargetPolicy[] = ["ignore", "warn", "error"];

const ROLE_TAGS: ReadonlyMap<string, MethodRole> = new Map([
  ["factory", "factory"],
  ["beforeMapping", "beforeMapping"],
  ["afterMapping", "afterMapping"],
]);

export const isMapperDeclaration = (node: ts.Node): node is MapperDeclaration =>
  (ts.isInterfaceDeclaration(node) || ts.isClassDeclaration(node)) &&
  getDocTags(node).some((tag) => tag.name === "mapper");

const malformed = (scope: DiscoveryScope, tag: DocTag, reason: string): void =>
  reportAt(scope, tag.node, "MWV2003", `Malformed @${tag.name} tag: ${reason}.`);

/**
 * Words of every tag named `name`; each tag needs at least one word
 */
const tagWords = (
  scope: DiscoveryScope,
  tags: readonly DocTag[],
  name: string
): readonly string[] =>
  tagsNamed(tags, name).flatMap((tag) => {
    const word = firstWord(tag);
    if (word === undefined) {
      malformed(scope, tag, "a value is required");
      return [];
    }
    return [word];
  });

const singleWord = (
  scope: DiscoveryScope,
  tags: readonly DocTag[],
  name: string
): string | undefined => {
  const words = tagWords(scope, tags, name);
  const [first] = words;
  const [, second] = tagsNamed(tags, name);
  if (words.length > 1 && second) {
    malformed(scope, second, "the tag can appear only once");
  }
  return first;
};

const choiceTag = <T extends string>(
  scope: DiscoveryScope,
  tags: readonly DocTag[],
  name: string,
  choices: readonly T[]
): T | undefined => {
  const [tag] = tagsNamed(tags, name);
  if (!tag) {
    return undefined;
  }
  const choice = parseChoice(tag, choices);
  if (choice === undefined) {
    malformed(scope, tag, `expected one of ${choices.join(", ")}`);
  }
  return choice;
};

const selectionConfig = (
  scope: DiscoveryScope,
  tags: readonly DocTag[],
  part: "element" | "key" | "value"
): SelectionConfig => ({
  qualifiers: tagWords(scope, tags, `${part}Qualifier`),
  format: singleWord(scope, tags, `${part}Format`),
});

const methodConfig = (
  scope: DiscoveryScope,
  tags: readonly DocTag[]
): MethodConfig => {
  const propertyMappings: PropertyMappingConfig[] = [];
  for (const tag of tagsNamed(tags, "mapping")) {
    const parsed = parseMappingTag(tag.text);
    if (parsed.ok) {
      propertyMappings.push(parsed.value);
    } else {
      malformed(scope, tag, parsed.error);
    }
  }

  return {
    propertyMappings,
    element: selectionConfig(scope, tags, "element"),
    key: selectionConfig(scope, tags, "key"),
    value: selectionConfig(scope, tags, "value"),
    nullValueStrategy: choiceTag(scope, tags, "nullValueStrategy", NULL_VALUE_STRATEGIES),
  };
};

const methodRole = (
  scope: DiscoveryScope,
  tags: readonly DocTag[]
): MethodRole => {
  const roleTags = tags.filter((tag) => ROLE_TAGS.has(tag.name));
  const [first, second] = roleTags;
  if (second) {
    malformed(scope, second, `a method can't be both @${first?.name} and @${second.name}`);
  }
  return (first && ROLE_TAGS.get(first.name)) ?? "mapping";
};

type MethodNode = ts.MethodSignature | ts.MethodDeclaration;

const convertParameters = (
  node: MethodNode,
  mappingTarget: string | undefined,
  env: TypeEnv,
  scope: DiscoveryScope
): readonly ParameterDescriptor[] | undefined => {
  const parameters: ParameterDescriptor[] = [];
  for (const parameter of node.parameters) {
    const name = nameText(parameter.name);
    if (name === undefined || !parameter.type) {
      reportAt(
        scope,
        parameter,
        "MWV2001",
        "Mapping method parameters need a plain name and a type annotation."
      );
      return undefined;
    }
    const converted = convertType(parameter.type, env, scope);
    if (!converted) {
      return undefined;
    }
    parameters.push({
      name,
      type: converted.type,
      nullable: converted.nullable || parameter.questionToken !== undefined,
      isMappingTarget: name === mappingTarget,
    });
  }
  return parameters;
};

const discoverMethod = (
  node: MethodNode,
  isAbstract: boolean,
  scope: DiscoveryScope
): DeclaredMethod | undefined => {
  const name = nameText(node.name);
  if (name === undefined) {
    return undefined;
  }

  const tags = getDocTags(node);
  const { env, variables } = convertTypeParameters(node.typeParameters, emptyEnv, scope);

  const mappingTargetTag = tagsNamed(tags, "mappingTarget")[0];
  const mappingTarget = singleWord(scope, tags, "mappingTarget");
  const parameters = convertParameters(node, mappingTarget, env, scope);
  if (!parameters) {
    return undefined;
  }
  const target = parameters.find((p) => p.isMappingTarget);
  if (mappingTarget !== undefined && !target && mappingTargetTag) {
    malformed(scope, mappingTargetTag, `method '${name}' has no parameter "${mappingTarget}"`);
    return undefined;
  }

  if (!node.type) {
    reportAt(scope, node, "MWV2001", `Method '${name}' needs a return type annotation.`);
    return undefined;
  }
  const returnsVoid = node.type.kind === ts.SyntaxKind.VoidKeyword;
  const returned = returnsVoid ? undefined : convertType(node.type, env, scope);
  if (!returnsVoid && !returned) {
    return undefined;
  }

  return {
    origin: "declared",
    name,
    typeParameters: variables,
    parameters,
    resultType: returned?.type ?? target?.type ?? voidType,
    returnsVoid,
    role: methodRole(scope, tags),
    isUpdateMethod: target !== undefined,
    isAbstract,
    qualifiers: tagWords(scope, tags, "qualifier"),
    config: methodConfig(scope, tags),
    location: getNodeLocation(scope.sourceFile, node),
    thrownTypes: tagWords(scope, tags, "throws"),
  };
};

const mapperMethods = (
  declaration: MapperDeclaration,
  scope: DiscoveryScope
): readonly DeclaredMethod[] => {
  if (ts.isInterfaceDeclaration(declaration)) {
    return declaration.members
      .filter(ts.isMethodSignature)
      .flatMap((member) => discoverMethod(member, true, scope) ?? []);
  }
  return declaration.members
    .filter(ts.isMethodDeclaration)
    .filter((member) => !isHiddenMember(member))
    .flatMap((member) => discoverMethod(member, isAbstractNode(member), scope) ?? []);
};

const mapperConfig = (
  scope: DiscoveryScope,
  tags: readonly DocTag[]
): MapperConfig => ({
  nullValueStrategy: choiceTag(scope, tags, "nullValueStrategy", NULL_VALUE_STRATEGIES),
  unmappedTargetPolicy: choiceTag(
    scope,
    tags,
    "unmappedTargetPolicy",
    UNMAPPED_TARGET_POLICIES
  ),
  implementationName: singleWord(scope, tags, "implementationName"),
});

export const discoverMapper = (
  declaration: MapperDeclaration,
  scope: DiscoveryScope
): MapperDescriptor | undefined => {
  const name = declaration.name?.text;
  if (name === undefined) {
    return undefined;
  }

  if (ts.isClassDeclaration(declaration) && !isAbstractNode(declaration)) {
    reportAt(
      scope,
      declaration,
      "MWV2003",
      `Mapper class '${name}' must be abstract.`,
      "Declare the mapper as an interface or an abstract class."
    );
    return undefined;
  }

  if (declaration.typeParameters && declaration.typeParameters.length > 0) {
    reportAt(scope, declaration, "MWV2001", `Mapper '${name}' can't be generic.`);
    return undefined;
  }

  const tags = getDocTags(declaration);
  return {
    name,
    declarationKind: ts.isInterfaceDeclaration(declaration) ? "interface" : "abstractClass",
    importPath: scope.importPath,
    methods: mapperMethods(declaration, scope),
    config: mapperConfig(scope, tags),
    types: scope.cache,
    location: getNodeLocation(scope.sourceFile, declaration),
  };
};
