/**
 * Mapping resolver: decides how a source value becomes a target value
 */

import {
  DefaultValue,
  Diagnostic,
  ForgedMethod,
  MethodDescriptor,
  SourceLocation,
  TypeDescriptor,
  addThrownTypes,
  createDiagnostic,
  defaultValueFor,
  describeType,
  elementType,
  isAssignableTo,
  isIterableContainer,
  keyType,
  valueType,
  Result,
  ok,
  error,
} from "@mapweave/frontend";
import { Assignment, Construction } from "./model/assignment.js";
import { ResolutionContext, forgedContextOf } from "./context.js";
import { ResolutionSession } from "./session.js";
import {
  forgedParameterName,
  generateForgedMethodName,
} from "./forge/naming.js";

export type ResolutionFailure =
  | {
      readonly kind: "noConversionPath";
      readonly source: TypeDescriptor;
      readonly target: TypeDescriptor;
    }
  | {
      readonly kind: "ambiguousMethod";
      readonly source: TypeDescriptor;
      readonly target: TypeDescriptor;
      readonly candidates: readonly MethodDescriptor[];
    }
  | {
      readonly kind: "cyclicForgeAttempt";
      readonly source: TypeDescriptor;
      readonly target: TypeDescriptor;
      readonly method: MethodDescriptor;
    };

export type ResolutionResult = Result<Assignment, ResolutionFailure>;

type AssignmentBase = {
  readonly sourceReference: string;
  readonly sourceType: TypeDescriptor;
  readonly targetType: TypeDescriptor;
  readonly nullDefault?: DefaultValue;
};

/**
 * The declared method a chain of forged methods started from
 */
export const rootMethodOf = (method: MethodDescriptor): MethodDescriptor => {
  let current = method;
  while (current.origin === "forged") {
    current = current.requestedBy.method;
  }
  return current;
};

export const locationOf = (
  method: MethodDescriptor
): SourceLocation | undefined => rootMethodOf(method).location;

/**
 * Container pairs the resolver can forge a helper method for
 */
export const isForgeable = (
  source: TypeDescriptor,
  target: TypeDescriptor
): boolean => {
  if (isIterableContainer(source) && isIterableContainer(target)) {
    return elementType(source) !== undefined && elementType(target) !== undefined;
  }
  if (source.container === "map" && target.container === "map") {
    return (
      keyType(source) !== undefined &&
      valueType(source) !== undefined &&
      keyType(target) !== undefined &&
      valueType(target) !== undefined
    );
  }
  return false;
};

const methodCall = (
  session: ResolutionSession,
  method: MethodDescriptor,
  base: AssignmentBase,
  context: ResolutionContext
): ResolutionResult => {
  if (session.queue.isInFlight(method)) {
    return error({
      kind: "cyclicForgeAttempt",
      source: base.sourceType,
      target: base.targetType,
      method,
    });
  }

  addThrownTypes(context.method, method.thrownTypes);
  return ok({ kind: "methodCall", method, ...base });
};

const forgeContainerMethod = (
  session: ResolutionSession,
  source: TypeDescriptor,
  target: TypeDescriptor,
  context: ResolutionContext
): MethodDescriptor => {
  const selection = {
    qualifiers: context.qualifiers,
    format: context.formatting,
  };

  const forged: ForgedMethod = {
    origin: "forged",
    name: session.index.reserveName(generateForgedMethodName(source, target)),
    typeParameters: [],
    parameters: [
      {
        name: forgedParameterName(source),
        type: source,
        nullable: false,
        isMappingTarget: false,
      },
    ],
    resultType: target,
    returnsVoid: false,
    role: "mapping",
    isUpdateMethod: false,
    isAbstract: true,
    qualifiers: [],
    config: {
      propertyMappings: [],
      element: selection,
      key: selection,
      value: selection,
      nullValueStrategy: context.nullValueStrategy,
    },
    location: context.method.location,
    thrownTypes: new Set(),
    forgedContext: forgedContextOf(context),
    requestedBy: { method: context.method, description: context.description },
  };

  // Registration must happen before enqueueing: an identical signature
  // registered first is reused and never queued twice
  const registered = session.index.register(forged);
  if (registered !== forged) {
    return registered;
  }

  session.queue.enqueue({ method: forged, source, target });

  if (session.verbose) {
    console.log(
      `Forged ${forged.name}(${describeType(source)}): ${describeType(target)}`
    );
  }

  return forged;
};

/**
 * Resolve the assignment of a `source` value to a `target` value.
 *
 * Order: identity, conversion, registered method, forged container method.
 * Failures are returned, not reported; see reportResolutionFailure.
 */
export const resolveAssignment = (
  session: ResolutionSession,
  source: TypeDescriptor,
  target: TypeDescriptor,
  context: ResolutionContext
): ResolutionResult => {
  const base: AssignmentBase = {
    sourceReference: context.sourceReference,
    sourceType: source,
    targetType: target,
    ...(context.nullValueStrategy === "mapToDefault"
      ? { nullDefault: defaultValueFor(target) }
      : {}),
  };

  if (isAssignableTo(source, target)) {
    return ok({ kind: "direct", ...base });
  }

  const provider = session.conversions.lookup(source, target);
  if (provider) {
    const conversion = provider.to({
      sourceType: source,
      targetType: target,
      formatting: context.formatting,
    });
    addThrownTypes(context.method, conversion.thrownTypes);
    return ok({ kind: "converted", conversion, ...base });
  }

  const outcome = session.index.find(source, target, context);
  switch (outcome.kind) {
    case "unique":
      return methodCall(session, outcome.method, base, context);
    case "ambiguous":
      return error({
        kind: "ambiguousMethod",
        source,
        target,
        candidates: outcome.methods,
      });
    case "noMatch":
      break;
  }

  if (isForgeable(source, target)) {
    const forged = forgeContainerMethod(session, source, target, context);
    return methodCall(session, forged, base, context);
  }

  return error({ kind: "noConversionPath", source, target });
};

/**
 * Report a failure according to the propagation policy: ambiguity and
 * cycles always surface; a missing path is reported through `noPath`
 * unless the enclosing method is forged, whose requester reports instead.
 */
export const reportResolutionFailure = (
  session: ResolutionSession,
  failure: ResolutionFailure,
  context: ResolutionContext,
  noPath: () => Diagnostic
): void => {
  const root = rootMethodOf(context.method);
  const mapping = `${context.description} "${describeType(failure.source)}" to "${describeType(failure.target)}"`;

  switch (failure.kind) {
    case "ambiguousMethod":
      session.report(
        createDiagnostic(
          "MWV1002",
          "error",
          `Ambiguous mapping methods found for mapping ${mapping} in method '${root.name}'.`,
          root.location,
          "Narrow the selection with a qualifier.",
          failure.candidates.map((m) => m.name)
        )
      );
      return;

    case "cyclicForgeAttempt":
      session.report(
        createDiagnostic(
          "MWV1006",
          "error",
          `Can't map ${mapping} in method '${root.name}': method '${failure.method.name}' would have to call itself for its own elements.`,
          root.location,
          "A container type that contains itself can't be mapped element-wise."
        )
      );
      return;

    case "noConversionPath":
      if (context.method.origin !== "forged") {
        session.report(noPath());
      }
      return;
  }
};

/**
 * How a fresh instance of `type` is obtained: a factory method, the
 * implementation type of an abstract container, or the type itself.
 * Reports and returns undefined when no construction exists.
 */
export const resolveConstruction = (
  session: ResolutionSession,
  type: TypeDescriptor,
  context: ResolutionContext
): Construction | undefined => {
  const root = rootMethodOf(context.method);
  const outcome = session.index.findFactory(type, context);

  switch (outcome.kind) {
    case "unique":
      addThrownTypes(context.method, outcome.method.thrownTypes);
      return { kind: "factory", method: outcome.method };

    case "ambiguous":
      session.report(
        createDiagnostic(
          "MWV1007",
          "error",
          `Ambiguous factory methods found for creating "${describeType(type)}" in method '${root.name}'.`,
          root.location,
          undefined,
          outcome.methods.map((m) => m.name)
        )
      );
      return undefined;

    case "noMatch":
      break;
  }

  if (type.implementationType) {
    return { kind: "default", type: type.implementationType };
  }

  if (type.kind === "abstractClass") {
    session.report(
      createDiagnostic(
        "MWV1009",
        "error",
        `Can't create an instance of abstract type "${describeType(type)}" in method '${root.name}'.`,
        root.location,
        "Declare a factory method returning the type."
      )
    );
    return undefined;
  }

  if (type.kind === "interface") {
    return { kind: "objectLiteral", type };
  }

  return { kind: "default", type };
};
