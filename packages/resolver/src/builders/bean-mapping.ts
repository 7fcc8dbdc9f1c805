/**
 * Builds property-by-property mapping methods
 */

import {
  MethodDescriptor,
  NullValueStrategy,
  ParameterDescriptor,
  PropertyDescriptor,
  PropertyMappingConfig,
  TypeDescriptor,
  UnmappedTargetPolicy,
  createDiagnostic,
  describeType,
  emptySelection,
  mappingTargetParameter,
  sourceParameters,
  stringType,
} from "@mapweave/frontend";
import { Construction } from "../model/assignment.js";
import { ResolutionContext, narrowContext } from "../context.js";
import {
  reportResolutionFailure,
  resolveAssignment,
  resolveConstruction,
} from "../resolver.js";
import { ResolutionSession } from "../session.js";
import { bindLifecycleCallbacks } from "../lifecycle.js";
import { BeanMappingMethod, PropertyMapping, PropertySource } from "./types.js";

export type BeanMappingOptions = {
  readonly nullValueStrategy: NullValueStrategy;
  readonly unmappedTargetPolicy: UnmappedTargetPolicy;
};

type SourceCandidate = {
  readonly source: PropertySource;
  readonly type: TypeDescriptor;
  readonly reference: string;
  /** The value read may be null or undefined */
  readonly nullable: boolean;
};

const propertyCandidate = (
  parameter: ParameterDescriptor,
  property: PropertyDescriptor
): SourceCandidate => ({
  source: { kind: "property", parameter, property },
  type: property.type,
  reference: `${parameter.name}.${property.name}`,
  nullable: property.optional || property.nullable,
});

/**
 * Source values a target property name can be read from: `param.prop`,
 * a property of any source parameter, or a whole parameter.
 */
const findSources = (
  sources: readonly ParameterDescriptor[],
  name: string
): readonly SourceCandidate[] => {
  const dot = name.indexOf(".");
  if (dot > 0) {
    const parameter = sources.find((p) => p.name === name.slice(0, dot));
    const property = parameter?.type.properties.find(
      (p) => p.name === name.slice(dot + 1)
    );
    return parameter && property ? [propertyCandidate(parameter, property)] : [];
  }

  const fromProperties = sources.flatMap((parameter) =>
    parameter.type.properties
      .filter((p) => p.name === name)
      .map((property) => propertyCandidate(parameter, property))
  );
  if (fromProperties.length > 0 || sources.length < 2) {
    return fromProperties;
  }

  return sources
    .filter((p) => p.name === name)
    .map((parameter) => ({
      source: { kind: "parameter", parameter },
      type: parameter.type,
      reference: parameter.name,
      nullable: parameter.nullable,
    }));
};

const constantCandidate = (value: string): SourceCandidate => ({
  source: { kind: "constant", value },
  type: stringType,
  reference: JSON.stringify(value),
  nullable: false,
});

const writableProperties = (
  type: TypeDescriptor,
  construction: Construction
): readonly PropertyDescriptor[] =>
  type.properties.filter(
    (p) => !p.readonly || construction.kind === "objectLiteral"
  );

/**
 * Build a bean mapping method. Unresolvable properties are reported and
 * left out; the method itself is returned so later methods still resolve.
 */
export const buildBeanMappingMethod = (
  session: ResolutionSession,
  method: MethodDescriptor,
  options: BeanMappingOptions
): BeanMappingMethod | undefined => {
  const nullValueStrategy =
    method.config.nullValueStrategy ?? options.nullValueStrategy;
  const sources = sourceParameters(method);
  const targetType = method.resultType;
  const location = method.location;

  const baseContext: ResolutionContext = {
    method,
    sourceReference: "",
    description: "result",
    qualifiers: [],
    nullValueStrategy,
  };

  const mappingTarget = mappingTargetParameter(method);
  const construction: Construction | undefined = mappingTarget
    ? { kind: "existing", reference: mappingTarget.name }
    : resolveConstruction(session, targetType, baseContext);
  if (!construction) {
    return undefined;
  }

  const targets = writableProperties(targetType, construction);
  const explicit = new Map<string, PropertyMappingConfig>(
    method.config.propertyMappings.map((m) => [m.target, m])
  );

  for (const name of explicit.keys()) {
    if (!targetType.properties.some((p) => p.name === name)) {
      session.report(
        createDiagnostic(
          "MWV1011",
          "error",
          `Unknown property "${name}" in result type "${describeType(targetType)}" of method '${method.name}'.`,
          location
        )
      );
    }
  }

  const propertyMappings: PropertyMapping[] = [];

  for (const target of targets) {
    const config = explicit.get(target.name);
    if (config?.ignore) {
      continue;
    }

    const candidates =
      config?.constant !== undefined
        ? [constantCandidate(config.constant)]
        : findSources(sources, config?.source ?? target.name);

    const [candidate] = candidates;
    if (candidates.length > 1) {
      session.report(
        createDiagnostic(
          "MWV1010",
          "error",
          `Several possible source properties for target property "${target.name}" in method '${method.name}'.`,
          location,
          "Name the source with an explicit mapping.",
          candidates.map((c) => c.reference)
        )
      );
      continue;
    }

    if (!candidate) {
      if (config?.source !== undefined) {
        session.report(
          createDiagnostic(
            "MWV1011",
            "error",
            `Unknown source property "${config.source}" for target property "${target.name}" in method '${method.name}'.`,
            location
          )
        );
      } else if (options.unmappedTargetPolicy !== "ignore") {
        session.report(
          createDiagnostic(
            "MWV1008",
            options.unmappedTargetPolicy,
            `Unmapped target property "${target.name}" in method '${method.name}'.`,
            location
          )
        );
      }
      continue;
    }

    const context = narrowContext(baseContext, {
      sourceReference: candidate.reference,
      description: `property '${target.name}'`,
      selection: config ?? emptySelection,
      targetPropertyName: target.name,
    });

    const result = resolveAssignment(session, candidate.type, target.type, context);
    if (!result.ok) {
      reportResolutionFailure(session, result.error, context, () =>
        createDiagnostic(
          "MWV1001",
          "error",
          `Can't map property "${describeType(candidate.type)} ${candidate.reference}" to "${describeType(target.type)} ${target.name}" in method '${method.name}'.`,
          location,
          "Declare a mapping method or conversion for these types."
        )
      );
      continue;
    }

    const assignment = result.value;
    propertyMappings.push({
      target,
      source: candidate.source,
      assignment,
      nullCheck:
        candidate.nullable &&
        nullValueStrategy === "propagate" &&
        assignment.kind !== "direct",
    });
  }

  return {
    kind: "bean",
    method,
    construction,
    propertyMappings,
    mapNullToDefault: nullValueStrategy === "mapToDefault",
    beforeMapping: bindLifecycleCallbacks(session, method, "beforeMapping"),
    afterMapping: bindLifecycleCallbacks(session, method, "afterMapping"),
  };
};
