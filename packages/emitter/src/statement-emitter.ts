/**
 * Mapping methods rendered as class members
 */

import {
  MethodDescriptor,
  ParameterDescriptor,
  defaultValueFor,
  sourceParameters,
  thrownTypesOf,
} from "@mapweave/frontend";
import {
  BeanMappingMethod,
  ContainerMappingMethod,
  LifecycleCallbackReference,
  MappingMethod,
  PropertyMapping,
  safeVariableName,
} from "@mapweave/resolver";
import { EmitterContext, nestLines } from "./types.js";
import { emitNullableType, emitType, emitTypeParameters } from "./type-emitter.js";
import {
  EmittedValue,
  emitConstruction,
  emitDefaultValue,
  emitValue,
} from "./expression-emitter.js";

/**
 * The single nullable source a method checks before mapping
 */
const guardedSource = (method: MethodDescriptor): ParameterDescriptor | undefined => {
  const sources = sourceParameters(method);
  const [only] = sources;
  return sources.length === 1 && only?.nullable ? only : undefined;
};

const returnsNullForNullSource = (mapping: MappingMethod): boolean =>
  guardedSource(mapping.method) !== undefined &&
  !mapping.method.returnsVoid &&
  !mapping.mapNullToDefault;

const nullGuard = (mapping: MappingMethod, context: EmitterContext): readonly string[] => {
  const source = guardedSource(mapping.method);
  if (!source) {
    return [];
  }
  const method = mapping.method;
  const exit = method.returnsVoid
    ? "return;"
    : mapping.mapNullToDefault
      ? `return ${emitDefaultValue(defaultValueFor(method.resultType))};`
      : "return null;";
  return [`if (${source.name} == null) {`, ...nestLines([exit], context), "}"];
};

const callbackStatements = (
  callbacks: readonly LifecycleCallbackReference[],
  result: string
): readonly string[] =>
  callbacks.map((callback) => {
    const args = callback.arguments.map((arg) =>
      arg.kind === "source" ? arg.parameter.name : result
    );
    return `this.${callback.method.name}(${args.join(", ")});`;
  });

const signature = (mapping: MappingMethod): string => {
  const method = mapping.method;
  const visibility = method.origin === "forged" ? "private" : "public";
  const parameters = method.parameters
    .map((p) => `${p.name}: ${emitNullableType(p.type, p.nullable)}`)
    .join(", ");
  const returned = method.returnsVoid
    ? "void"
    : returnsNullForNullSource(mapping)
      ? `${emitType(method.resultType)} | null`
      : emitType(method.resultType);
  return `${visibility} ${method.name}${emitTypeParameters(method.typeParameters)}(${parameters}): ${returned} {`;
};

const thrownTypesDoc = (method: MethodDescriptor): readonly string[] => {
  const thrown = thrownTypesOf(method);
  if (thrown.length === 0) {
    return [];
  }
  return ["/**", ...thrown.map((name) => ` * @throws {${name}}`), " */"];
};

const resultName = (method: MethodDescriptor): string =>
  safeVariableName(
    "result",
    method.parameters.map((p) => p.name)
  );

/**
 * A null-checked property skips its conversion and keeps the null source
 */
const propertyValue = (
  property: PropertyMapping,
  context: EmitterContext
): EmittedValue => {
  const value = emitValue(property.assignment, context);
  if (!property.nullCheck) {
    return value;
  }
  const ref = property.assignment.sourceReference;
  return { ...value, expression: `${ref} == null ? ${ref} : ${value.expression}` };
};

const beanBody = (
  mapping: BeanMappingMethod,
  context: EmitterContext
): readonly string[] => {
  const construction = mapping.construction;
  const result =
    construction.kind === "existing" ? construction.reference : resultName(mapping.method);
  const lines: string[] = [...callbackStatements(mapping.beforeMapping, result)];

  const values = mapping.propertyMappings.map((property) => ({
    name: property.target.name,
    value: propertyValue(property, context),
  }));
  for (const { value } of values) {
    lines.push(...value.statements);
  }

  if (construction.kind === "objectLiteral") {
    lines.push(
      `const ${result}: ${emitType(construction.type)} = {`,
      ...nestLines(
        values.map(({ name, value }) => `${name}: ${value.expression},`),
        context
      ),
      "};"
    );
  } else {
    if (construction.kind !== "existing") {
      lines.push(`const ${result} = ${emitConstruction(construction)};`);
    }
    lines.push(...values.map(({ name, value }) => `${result}.${name} = ${value.expression};`));
  }

  lines.push(...callbackStatements(mapping.afterMapping, result));
  if (!mapping.method.returnsVoid) {
    lines.push(`return ${result};`);
  }
  return lines;
};

const containerBody = (
  mapping: ContainerMappingMethod,
  context: EmitterContext
): readonly string[] => {
  const filled = emitValue(mapping.mapping, context, resultName(mapping.method));
  const result = filled.expression;
  return [
    ...callbackStatements(mapping.beforeMapping, result),
    ...filled.statements,
    ...callbackStatements(mapping.afterMapping, result),
    ...(mapping.method.returnsVoid ? [] : [`return ${result};`]),
  ];
};

/**
 * Render a mapping method, doc comment included, relative to the class body
 */
export const emitMappingMethod = (
  mapping: MappingMethod,
  context: EmitterContext
): readonly string[] => {
  const body = mapping.kind === "bean" ? beanBody(mapping, context) : containerBody(mapping, context);
  return [
    ...thrownTypesDoc(mapping.method),
    signature(mapping),
    ...nestLines([...nullGuard(mapping, context), ...body], context),
    "}",
  ];
};
