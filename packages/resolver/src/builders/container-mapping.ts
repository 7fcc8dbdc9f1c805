/**
 * Builds iterable and map mapping methods
 */

import {
  Diagnostic,
  MethodDescriptor,
  NullValueStrategy,
  TypeDescriptor,
  addThrownTypes,
  createDiagnostic,
  describeType,
  elementType,
  isRecordType,
  keyType,
  mappingTargetParameter,
  sourceParameters,
  stringType,
  valueType,
  Result,
  ok,
  error,
} from "@mapweave/frontend";
import {
  Assignment,
  Construction,
  ContainerShape,
  assignmentThrownTypes,
  wrapInLocalVariable,
} from "../model/assignment.js";
import { ResolutionContext, narrowContext } from "../context.js";
import {
  reportResolutionFailure,
  resolveAssignment,
  resolveConstruction,
  rootMethodOf,
} from "../resolver.js";
import { ResolutionSession } from "../session.js";
import { bindLifecycleCallbacks } from "../lifecycle.js";
import { describeForName, safeVariableName } from "../forge/naming.js";
import { ContainerMappingMethod } from "./types.js";

/** Part of a container that could not be mapped */
export type ContainerPart = "element" | "key" | "value";

export type ContainerBuildFailure =
  /** An element, key or value has no resolution */
  | { readonly kind: "unresolved"; readonly part: ContainerPart }
  /** The result can't be constructed; already reported */
  | { readonly kind: "construction" }
  /** Not a single-source container to container method */
  | { readonly kind: "shape" };

export type ContainerBuildResult = Result<
  ContainerMappingMethod,
  ContainerBuildFailure
>;

const unresolved = (part: ContainerPart): ContainerBuildResult =>
  error({ kind: "unresolved", part });

const PART_CODES = {
  element: "MWV1003",
  key: "MWV1004",
  value: "MWV1005",
} as const;

const PART_DESCRIPTIONS: Readonly<Record<ContainerPart, string>> = {
  element: "iterable element",
  key: "map key",
  value: "map value",
};

export const unresolvedPartDiagnostic = (
  method: MethodDescriptor,
  part: ContainerPart,
  source: TypeDescriptor,
  target: TypeDescriptor
): Diagnostic => {
  const root = rootMethodOf(method);
  return createDiagnostic(
    PART_CODES[part],
    "error",
    `Can't map ${PART_DESCRIPTIONS[part]} "${describeType(source)}" to "${describeType(target)}" in method '${root.name}'.`,
    root.location,
    "Declare a mapping method or conversion for the element types."
  );
};

const resolvePart = (
  session: ResolutionSession,
  part: ContainerPart,
  source: TypeDescriptor,
  target: TypeDescriptor,
  context: ResolutionContext
): Assignment | undefined => {
  const result = resolveAssignment(session, source, target, context);
  if (result.ok) {
    addThrownTypes(context.method, assignmentThrownTypes(result.value));
    return result.value;
  }
  reportResolutionFailure(session, result.error, context, () =>
    unresolvedPartDiagnostic(context.method, part, source, target)
  );
  return undefined;
};

const partContext = (
  context: ResolutionContext,
  part: ContainerPart,
  sourceReference: string
): ResolutionContext =>
  narrowContext(context, {
    sourceReference,
    description: PART_DESCRIPTIONS[part],
    selection: context.method.config[part],
  });

/**
 * Build the body of a container method. Failures of declared methods are
 * reported here; failures of forged methods are left to their requester.
 */
export const buildContainerMappingMethod = (
  session: ResolutionSession,
  method: MethodDescriptor,
  defaultNullValueStrategy: NullValueStrategy
): ContainerBuildResult => {
  const [sourceParameter] = sourceParameters(method);
  if (!sourceParameter) {
    return error({ kind: "shape" });
  }

  const source = sourceParameter.type;
  const target = method.resultType;
  const nullValueStrategy =
    method.config.nullValueStrategy ?? defaultNullValueStrategy;
  const taken = method.parameters.map((p) => p.name);
  const context: ResolutionContext = {
    method,
    sourceReference: sourceParameter.name,
    description: "result",
    qualifiers: [],
    nullValueStrategy,
  };

  let shape: ContainerShape;
  let failed: ContainerPart | undefined;

  if (source.container === "map") {
    const entryVariable = safeVariableName("entry", taken);
    const keyVariable = safeVariableName("key", [...taken, entryVariable]);
    const valueVariable = safeVariableName("value", [
      ...taken,
      entryVariable,
      keyVariable,
    ]);

    // Record entries come back from Object.entries with string keys
    const keySource = isRecordType(source) ? stringType : keyType(source);
    const keyTarget = keyType(target);
    const valueSource = valueType(source);
    const valueTarget = valueType(target);
    if (!keySource || !keyTarget || !valueSource || !valueTarget) {
      return error({ kind: "shape" });
    }

    const key = resolvePart(
      session,
      "key",
      keySource,
      keyTarget,
      partContext(context, "key", `${entryVariable}[0]`)
    );
    if (!key) {
      failed = "key";
      if (method.origin === "forged") {
        return unresolved(failed);
      }
    }

    const value = resolvePart(
      session,
      "value",
      valueSource,
      valueTarget,
      partContext(context, "value", `${entryVariable}[1]`)
    );
    if (!value) {
      failed = failed ?? "value";
    }

    if (!key || !value) {
      return unresolved(failed ?? "value");
    }

    shape = {
      kind: "map",
      entryVariable,
      key: wrapInLocalVariable(key, keyVariable),
      value: wrapInLocalVariable(value, valueVariable),
    };
  } else {
    const elementSource = elementType(source);
    const elementTarget = elementType(target);
    if (!elementSource || !elementTarget) {
      return error({ kind: "shape" });
    }

    const elementVariable = safeVariableName(
      describeForName(elementSource),
      taken
    );
    const element = resolvePart(
      session,
      "element",
      elementSource,
      elementTarget,
      partContext(context, "element", elementVariable)
    );
    if (!element) {
      return unresolved("element");
    }

    shape = { kind: "iterable", elementVariable, element };
  }

  const construction = containerConstruction(session, target, context);
  if (!construction) {
    return error({ kind: "construction" });
  }

  return ok({
    kind: "container",
    method,
    mapNullToDefault: nullValueStrategy === "mapToDefault",
    beforeMapping: bindLifecycleCallbacks(session, method, "beforeMapping"),
    afterMapping: bindLifecycleCallbacks(session, method, "afterMapping"),
    mapping: {
      kind: "containerMapping",
      sourceReference: sourceParameter.name,
      sourceType: source,
      targetType: target,
      shape,
      construction,
    },
  });
};

const containerConstruction = (
  session: ResolutionSession,
  target: TypeDescriptor,
  context: ResolutionContext
): Construction | undefined => {
  const mappingTarget = mappingTargetParameter(context.method);
  if (mappingTarget) {
    return { kind: "existing", reference: mappingTarget.name };
  }
  return resolveConstruction(session, target, context);
};
