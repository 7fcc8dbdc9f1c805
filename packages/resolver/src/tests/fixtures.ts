/**
 * Builders for method and mapper descriptors used across resolver tests
 */

import {
  DeclaredMethod,
  ForgedMethod,
  MapperConfig,
  MapperDescriptor,
  MethodConfig,
  MethodDescriptor,
  MethodRole,
  ParameterDescriptor,
  PropertyDescriptor,
  SelectionConfig,
  TypeDescriptor,
  emptyMethodConfig,
  objectType,
} from "@mapweave/frontend";
import { ResolutionContext } from "../context.js";
import { ResolutionResult } from "../resolver.js";
import {
  ConvertedAssignment,
  MethodCallAssignment,
} from "../model/assignment.js";

export const location = {
  file: "/src/mapper.ts",
  line: 1,
  column: 1,
  length: 1,
};

export const param = (
  name: string,
  type: TypeDescriptor,
  isMappingTarget = false
): ParameterDescriptor => ({ name, type, nullable: false, isMappingTarget });

export const prop = (
  name: string,
  type: TypeDescriptor,
  readonly = false
): PropertyDescriptor => ({
  name,
  type,
  optional: false,
  nullable: false,
  readonly,
});

export const iface = (
  name: string,
  properties: readonly PropertyDescriptor[]
): TypeDescriptor =>
  objectType("interface", name, { properties, importPath: "./models.js" });

type MethodInit = {
  readonly parameters?: readonly ParameterDescriptor[];
  readonly role?: MethodRole;
  readonly isAbstract?: boolean;
  readonly returnsVoid?: boolean;
  readonly qualifiers?: readonly string[];
  readonly config?: Partial<MethodConfig>;
  readonly thrownTypes?: readonly string[];
};

/**
 * A declared method `name(source: source): result`
 */
export const method = (
  name: string,
  source: TypeDescriptor | undefined,
  result: TypeDescriptor,
  init: MethodInit = {}
): DeclaredMethod => {
  const parameters =
    init.parameters ?? (source ? [param("source", source)] : []);
  return {
    origin: "declared",
    name,
    typeParameters: [],
    parameters,
    resultType: result,
    returnsVoid: init.returnsVoid ?? false,
    role: init.role ?? "mapping",
    isUpdateMethod: parameters.some((p) => p.isMappingTarget),
    isAbstract: init.isAbstract ?? false,
    qualifiers: init.qualifiers ?? [],
    config: { ...emptyMethodConfig, ...init.config },
    location,
    thrownTypes: init.thrownTypes ?? [],
  };
};

/** An abstract method the generator builds a body for */
export const abstractMethod = (
  name: string,
  source: TypeDescriptor | undefined,
  result: TypeDescriptor,
  init: MethodInit = {}
): DeclaredMethod => method(name, source, result, { ...init, isAbstract: true });

export const selection = (
  qualifiers: readonly string[],
  format?: string
): SelectionConfig => ({ qualifiers, format });

export const mapper = (
  methods: readonly DeclaredMethod[],
  config: MapperConfig = {}
): MapperDescriptor => ({
  name: "UserMapper",
  declarationKind: "interface",
  importPath: "./user-mapper.js",
  methods,
  config,
  types: new Map(),
  location,
});

export const contextFor = (
  enclosing: MethodDescriptor,
  overrides: Partial<ResolutionContext> = {}
): ResolutionContext => ({
  method: enclosing,
  sourceReference: "source",
  description: "value",
  qualifiers: [],
  nullValueStrategy: "propagate",
  ...overrides,
});

export const forgedMethod = (
  name: string,
  source: TypeDescriptor,
  result: TypeDescriptor,
  requester: MethodDescriptor
): ForgedMethod => ({
  origin: "forged",
  name,
  typeParameters: [],
  parameters: [param("list", source)],
  resultType: result,
  returnsVoid: false,
  role: "mapping",
  isUpdateMethod: false,
  isAbstract: true,
  qualifiers: [],
  config: emptyMethodConfig,
  location,
  thrownTypes: new Set(),
  forgedContext: { qualifiers: [], nullValueStrategy: "propagate" },
  requestedBy: { method: requester, description: "value" },
});

export const expectMethodCall = (
  result: ResolutionResult
): MethodCallAssignment => {
  if (!result.ok || result.value.kind !== "methodCall") {
    throw new Error("Expected a method call assignment");
  }
  return result.value;
};

export const expectConverted = (
  result: ResolutionResult
): ConvertedAssignment => {
  if (!result.ok || result.value.kind !== "converted") {
    throw new Error("Expected a converted assignment");
  }
  return result.value;
};
