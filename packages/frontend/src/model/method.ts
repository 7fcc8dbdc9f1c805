/**
 * Method descriptors for declared and forged mapping methods
 */

import { SourceLocation } from "../types/diagnostic.js";
import { TypeDescriptor, typeKey } from "./type-descriptor.js";

export type MethodRole = "mapping" | "factory" | "beforeMapping" | "afterMapping";

export type NullValueStrategy = "propagate" | "mapToDefault";

export type ParameterDescriptor = {
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly nullable: boolean;
  /** The existing target an update method writes into */
  readonly isMappingTarget: boolean;
};

/**
 * Explicit configuration of one target property (`@mapping`)
 */
export type PropertyMappingConfig = {
  readonly target: string;
  readonly source?: string;
  readonly ignore: boolean;
  readonly constant?: string;
  readonly qualifiers: readonly string[];
  readonly format?: string;
};

/**
 * Selection hints for container elements, map keys and map values
 */
export type SelectionConfig = {
  readonly qualifiers: readonly string[];
  readonly format?: string;
};

export type MethodConfig = {
  readonly propertyMappings: readonly PropertyMappingConfig[];
  readonly element: SelectionConfig;
  readonly key: SelectionConfig;
  readonly value: SelectionConfig;
  readonly nullValueStrategy?: NullValueStrategy;
};

export const emptySelection: SelectionConfig = { qualifiers: [] };

export const emptyMethodConfig: MethodConfig = {
  propertyMappings: [],
  element: emptySelection,
  key: emptySelection,
  value: emptySelection,
};

type MethodBase = {
  readonly name: string;
  readonly typeParameters: readonly TypeDescriptor[];
  readonly parameters: readonly ParameterDescriptor[];
  /** Built type; for update methods the type of the mapping target */
  readonly resultType: TypeDescriptor;
  readonly returnsVoid: boolean;
  readonly role: MethodRole;
  readonly isUpdateMethod: boolean;
  /** Abstract methods get a generated body */
  readonly isAbstract: boolean;
  readonly qualifiers: readonly string[];
  readonly config: MethodConfig;
  readonly location?: SourceLocation;
};

export type DeclaredMethod = MethodBase & {
  readonly origin: "declared";
  readonly thrownTypes: readonly string[];
};

/**
 * Selection state a forged method was created under.
 * Two forged methods with equal types but different contexts are distinct.
 */
export type ForgedContext = {
  readonly qualifiers: readonly string[];
  readonly formatting?: string;
  readonly nullValueStrategy: NullValueStrategy;
};

export type ForgedMethod = MethodBase & {
  readonly origin: "forged";
  /** Grows while the bodies of the forged method and its callees are built */
  readonly thrownTypes: Set<string>;
  readonly forgedContext: ForgedContext;
  /** The method and value whose mapping made this method necessary */
  readonly requestedBy: {
    readonly method: MethodDescriptor;
    readonly description: string;
  };
};

export type MethodDescriptor = DeclaredMethod | ForgedMethod;

export const sourceParameters = (
  method: MethodDescriptor
): readonly ParameterDescriptor[] =>
  method.parameters.filter((p) => !p.isMappingTarget);

export const mappingTargetParameter = (
  method: MethodDescriptor
): ParameterDescriptor | undefined =>
  method.parameters.find((p) => p.isMappingTarget);

export const forgedContextKey = (context: ForgedContext): string =>
  [
    [...context.qualifiers].sort().join("+"),
    context.formatting ?? "",
    context.nullValueStrategy,
  ].join("|");

/**
 * Signature identity used for de-duplication. Declared methods are keyed
 * by name as well, forged methods by their types and forged context.
 */
export const methodKey = (method: MethodDescriptor): string => {
  const params = method.parameters
    .map((p) => (p.isMappingTarget ? `@${typeKey(p.type)}` : typeKey(p.type)))
    .join(",");
  const signature = `(${params})=>${typeKey(method.resultType)}`;

  return method.origin === "forged"
    ? `forged:${signature}[${forgedContextKey(method.forgedContext)}]`
    : `${method.role}:${method.name}${signature}`;
};

/**
 * Union thrown types into a forged method. Declared methods advertise a
 * fixed set and are left alone. Returns true when the set grew.
 */
export const addThrownTypes = (
  method: MethodDescriptor,
  thrownTypes: Iterable<string>
): boolean => {
  if (method.origin !== "forged") {
    return false;
  }
  const before = method.thrownTypes.size;
  for (const thrown of thrownTypes) {
    method.thrownTypes.add(thrown);
  }
  return method.thrownTypes.size > before;
};

export const thrownTypesOf = (method: MethodDescriptor): readonly string[] => [
  ...method.thrownTypes,
];
