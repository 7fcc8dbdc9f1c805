/**
 * Assignments: resolved descriptions of how one value becomes another
 */

import {
  DefaultValue,
  MethodDescriptor,
  TypeDescriptor,
  typeKey,
} from "@mapweave/frontend";
import { TypeConversion } from "../conversion/types.js";

type AssignmentBase = {
  /** Expression the assignment reads from */
  readonly sourceReference: string;
  readonly sourceType: TypeDescriptor;
  readonly targetType: TypeDescriptor;
  /** Present when a null source yields the target's default value */
  readonly nullDefault?: DefaultValue;
};

export type DirectAssignment = AssignmentBase & {
  readonly kind: "direct";
};

export type ConvertedAssignment = AssignmentBase & {
  readonly kind: "converted";
  readonly conversion: TypeConversion;
};

export type MethodCallAssignment = AssignmentBase & {
  readonly kind: "methodCall";
  readonly method: MethodDescriptor;
};

/**
 * How the target container comes to exist
 */
export type Construction =
  | { readonly kind: "factory"; readonly method: MethodDescriptor }
  | { readonly kind: "default"; readonly type: TypeDescriptor }
  | { readonly kind: "objectLiteral"; readonly type: TypeDescriptor }
  | { readonly kind: "existing"; readonly reference: string };

export type ContainerShape =
  | {
      readonly kind: "iterable";
      readonly elementVariable: string;
      readonly element: Assignment;
    }
  | {
      readonly kind: "map";
      readonly entryVariable: string;
      readonly key: LocalVariableAssignment;
      readonly value: LocalVariableAssignment;
    };

export type ContainerMappingAssignment = AssignmentBase & {
  readonly kind: "containerMapping";
  readonly shape: ContainerShape;
  readonly construction: Construction;
};

export type LocalVariableAssignment = AssignmentBase & {
  readonly kind: "localVariable";
  readonly name: string;
  readonly inner: Assignment;
};

export type Assignment =
  | DirectAssignment
  | ConvertedAssignment
  | MethodCallAssignment
  | ContainerMappingAssignment
  | LocalVariableAssignment;

export const wrapInLocalVariable = (
  inner: Assignment,
  name: string
): LocalVariableAssignment => ({
  kind: "localVariable",
  name,
  inner,
  sourceReference: inner.sourceReference,
  sourceType: inner.sourceType,
  targetType: inner.targetType,
});

const constructionImportTypes = (
  construction: Construction
): readonly TypeDescriptor[] =>
  construction.kind === "default" ? [construction.type] : [];

const defaultImportTypes = (
  value: DefaultValue | undefined
): readonly TypeDescriptor[] =>
  value && (value.kind === "newInstance" || value.kind === "emptyContainer")
    ? [value.type]
    : [];

/**
 * Types the emitted code of an assignment refers to
 */
export const assignmentImportTypes = (
  assignment: Assignment
): readonly TypeDescriptor[] => {
  const own = defaultImportTypes(assignment.nullDefault);
  switch (assignment.kind) {
    case "direct":
    case "methodCall":
      return own;
    case "converted":
      return [...own, ...assignment.conversion.importTypes];
    case "localVariable":
      return [...own, assignment.targetType, ...assignmentImportTypes(assignment.inner)];
    case "containerMapping": {
      const shape = assignment.shape;
      const children =
        shape.kind === "iterable"
          ? assignmentImportTypes(shape.element)
          : [
              ...assignmentImportTypes(shape.key),
              ...assignmentImportTypes(shape.value),
            ];
      return [...own, ...constructionImportTypes(assignment.construction), ...children];
    }
  }
};

/**
 * Error kinds the emitted code of an assignment may raise. Method calls
 * report the callee's thrown types as they are at the time of the call.
 */
export const assignmentThrownTypes = (
  assignment: Assignment
): readonly string[] => {
  switch (assignment.kind) {
    case "direct":
      return [];
    case "converted":
      return assignment.conversion.thrownTypes;
    case "methodCall":
      return [...assignment.method.thrownTypes];
    case "localVariable":
      return assignmentThrownTypes(assignment.inner);
    case "containerMapping": {
      const shape = assignment.shape;
      const children =
        shape.kind === "iterable"
          ? assignmentThrownTypes(shape.element)
          : [...assignmentThrownTypes(shape.key), ...assignmentThrownTypes(shape.value)];
      return dedupe(children);
    }
  }
};

/**
 * Methods called anywhere inside an assignment
 */
export const calledMethods = (
  assignment: Assignment
): readonly MethodDescriptor[] => {
  switch (assignment.kind) {
    case "direct":
    case "converted":
      return [];
    case "methodCall":
      return [assignment.method];
    case "localVariable":
      return calledMethods(assignment.inner);
    case "containerMapping": {
      const shape = assignment.shape;
      const factory =
        assignment.construction.kind === "factory"
          ? [assignment.construction.method]
          : [];
      return shape.kind === "iterable"
        ? [...factory, ...calledMethods(shape.element)]
        : [...factory, ...calledMethods(shape.key), ...calledMethods(shape.value)];
    }
  }
};

const dedupe = (values: readonly string[]): readonly string[] => [
  ...new Set(values),
];

/**
 * De-duplicate types by key, keeping the first occurrence
 */
export const uniqueTypes = (
  types: readonly TypeDescriptor[]
): readonly TypeDescriptor[] => {
  const seen = new Map<string, TypeDescriptor>();
  for (const type of types) {
    const key = typeKey(type);
    if (!seen.has(key)) {
      seen.set(key, type);
    }
  }
  return [...seen.values()];
};
