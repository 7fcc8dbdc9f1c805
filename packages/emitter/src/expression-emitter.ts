/**
 * Assignment rendering: the expression a value is read through and the
 * statements that must run before it
 */

import {
  DefaultValue,
  TypeDescriptor,
  defaultValueFor,
  isRecordType,
} from "@mapweave/frontend";
import {
  Assignment,
  Construction,
  ContainerMappingAssignment,
  safeVariableName,
} from "@mapweave/resolver";
import { EmitterContext, nestLines } from "./types.js";
import { emitType } from "./type-emitter.js";

export type EmittedValue = {
  /** Statements to run first, relative to the enclosing block */
  readonly statements: readonly string[];
  readonly expression: string;
};

/**
 * A fresh, empty instance of a concrete type
 */
export const emitNewInstance = (type: TypeDescriptor): string => {
  if (type.container === "array") {
    return "[]";
  }
  if (isRecordType(type)) {
    return "{}";
  }
  return `new ${emitType(type)}()`;
};

const emitObjectDefaults = (
  type: TypeDescriptor,
  stack: readonly TypeDescriptor[]
): string => {
  const inner = [...stack, type];
  const entries = type.properties
    .filter((p) => !p.optional)
    .map((p) => {
      if (p.nullable) {
        return `${p.name}: null`;
      }
      const value = defaultValueFor(p.type);
      return value.kind === "newInstance" && inner.includes(value.type)
        ? `${p.name}: undefined`
        : `${p.name}: ${emitDefault(value, inner)}`;
    });
  return entries.length > 0 ? `{ ${entries.join(", ")} }` : "{}";
};

const emitDefault = (
  value: DefaultValue,
  stack: readonly TypeDescriptor[]
): string => {
  switch (value.kind) {
    case "literal":
      return value.text;
    case "emptyContainer":
      return emitNewInstance(value.type);
    case "newInstance":
      return value.type.kind === "class"
        ? emitNewInstance(value.type)
        : emitObjectDefaults(value.type, stack);
    case "undefined":
      return "undefined";
  }
};

/**
 * Default value expression; interfaces become object literals of their
 * required properties' defaults
 */
export const emitDefaultValue = (value: DefaultValue): string =>
  emitDefault(value, []);

/**
 * Initial value of a constructed result
 */
export const emitConstruction = (construction: Construction): string => {
  switch (construction.kind) {
    case "factory":
      return `this.${construction.method.name}()`;
    case "default":
      return emitNewInstance(construction.type);
    case "objectLiteral":
      return "{}";
    case "existing":
      return construction.reference;
  }
};

const withNullDefault = (assignment: Assignment, expression: string): string => {
  if (!assignment.nullDefault) {
    return expression;
  }
  const ref = assignment.sourceReference;
  const fallback = emitDefaultValue(assignment.nullDefault);
  return expression === ref
    ? `${ref} ?? ${fallback}`
    : `${ref} == null ? ${fallback} : ${expression}`;
};

/**
 * Render an assignment. Container mappings fill a result variable named
 * after `resultName`.
 */
export const emitValue = (
  assignment: Assignment,
  context: EmitterContext,
  resultName = "result"
): EmittedValue => {
  switch (assignment.kind) {
    case "direct":
      return {
        statements: [],
        expression: withNullDefault(assignment, assignment.sourceReference),
      };

    case "converted": {
      const { open, close } = assignment.conversion;
      return {
        statements: [],
        expression: withNullDefault(
          assignment,
          `${open}${assignment.sourceReference}${close}`
        ),
      };
    }

    case "methodCall":
      return {
        statements: [],
        expression: withNullDefault(
          assignment,
          `this.${assignment.method.name}(${assignment.sourceReference})`
        ),
      };

    case "localVariable": {
      const inner = emitValue(assignment.inner, context);
      return {
        statements: [
          ...inner.statements,
          `const ${assignment.name} = ${withNullDefault(assignment, inner.expression)};`,
        ],
        expression: assignment.name,
      };
    }

    case "containerMapping":
      return emitContainerMapping(assignment, context, resultName);
  }
};

/**
 * Type whose methods add to the result: the constructed type, or the
 * declared target type when the result comes from elsewhere
 */
const collectionType = (assignment: ContainerMappingAssignment): TypeDescriptor => {
  const construction = assignment.construction;
  switch (construction.kind) {
    case "default":
    case "objectLiteral":
      return construction.type;
    case "factory":
      return construction.method.resultType;
    case "existing":
      return assignment.targetType;
  }
};

const clearStatements = (
  type: TypeDescriptor,
  result: string,
  context: EmitterContext
): readonly string[] => {
  if (isRecordType(type)) {
    return [
      `for (const key of Object.keys(${result})) {`,
      ...nestLines([`delete ${result}[key];`], context),
      "}",
    ];
  }
  if (type.container === "set" || type.container === "map") {
    return [`${result}.clear();`];
  }
  return [`${result}.length = 0;`];
};

const shapeVariables = (assignment: ContainerMappingAssignment): readonly string[] =>
  assignment.shape.kind === "iterable"
    ? [assignment.shape.elementVariable]
    : [assignment.shape.entryVariable, assignment.shape.key.name, assignment.shape.value.name];

const emitContainerMapping = (
  assignment: ContainerMappingAssignment,
  context: EmitterContext,
  resultName: string
): EmittedValue => {
  const construction = assignment.construction;
  const target = collectionType(assignment);
  const statements: string[] = [];

  let result: string;
  if (construction.kind === "existing") {
    result = construction.reference;
    statements.push(...clearStatements(target, result, context));
  } else {
    result = safeVariableName(resultName, [
      assignment.sourceReference,
      ...shapeVariables(assignment),
    ]);
    statements.push(
      construction.kind === "factory"
        ? `const ${result} = ${emitConstruction(construction)};`
        : `const ${result}: ${emitType(target)} = ${emitConstruction(construction)};`
    );
  }

  const source = assignment.sourceReference;
  const shape = assignment.shape;
  const body: string[] = [];
  let loopHead: string;

  if (shape.kind === "iterable") {
    const element = emitValue(shape.element, context);
    body.push(...element.statements);
    body.push(
      target.container === "set"
        ? `${result}.add(${element.expression});`
        : `${result}.push(${element.expression});`
    );
    loopHead = `for (const ${shape.elementVariable} of ${source}) {`;
  } else {
    const key = emitValue(shape.key, context);
    const value = emitValue(shape.value, context);
    body.push(...key.statements, ...value.statements);
    body.push(
      isRecordType(target)
        ? `${result}[${key.expression}] = ${value.expression};`
        : `${result}.set(${key.expression}, ${value.expression});`
    );
    const entries = isRecordType(assignment.sourceType) ? `Object.entries(${source})` : source;
    loopHead = `for (const ${shape.entryVariable} of ${entries}) {`;
  }

  statements.push(loopHead, ...nestLines(body, context), "}");
  return { statements, expression: result };
};
