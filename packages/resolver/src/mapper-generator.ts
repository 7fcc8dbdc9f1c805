/**
 * Mapper generation: builds every mapping method of a mapper, drains the
 * forge queue and settles forged methods.
 */

import {
  DeclaredMethod,
  DiagnosticsCollector,
  ForgedMethod,
  MapperDescriptor,
  MethodDescriptor,
  NullValueStrategy,
  TypeDescriptor,
  UnmappedTargetPolicy,
  addThrownTypes,
  createDiagnostic,
  elementType,
  implementationNameOf,
  isContainer,
  keyType,
  valueType,
  Result,
  ok,
  error,
} from "@mapweave/frontend";
import {
  Assignment,
  Construction,
  assignmentImportTypes,
  calledMethods,
  uniqueTypes,
} from "./model/assignment.js";
import { ResolutionSession, SessionOptions, createResolutionSession } from "./session.js";
import { isForgeable } from "./resolver.js";
import {
  ContainerBuildResult,
  ContainerPart,
  buildContainerMappingMethod,
  unresolvedPartDiagnostic,
} from "./builders/container-mapping.js";
import { buildBeanMappingMethod } from "./builders/bean-mapping.js";
import { MappingMethod } from "./builders/types.js";

export type GeneratorOptions = SessionOptions & {
  /** Used when neither the mapper nor the method sets a strategy */
  readonly nullValueStrategy?: NullValueStrategy;
  readonly unmappedTargetPolicy?: UnmappedTargetPolicy;
};

export type GeneratedMapper = {
  readonly mapper: MapperDescriptor;
  readonly implementationName: string;
  /** Declared methods first, then forged methods in creation order */
  readonly methods: readonly MappingMethod[];
  /** Types the generated module refers to by name */
  readonly importTypes: readonly TypeDescriptor[];
};

export type MapperResolution = {
  readonly generated: GeneratedMapper;
  readonly diagnostics: DiagnosticsCollector;
};

/** Why a forged method has no body: the innermost part that failed */
type ForgeFailure = {
  readonly method: ForgedMethod;
  readonly part?: ContainerPart;
};

/**
 * Reason a declared abstract method can't get a generated body
 */
const unsupportedShape = (method: DeclaredMethod): string | undefined => {
  if (method.role !== "mapping") {
    return `${method.role} methods need a body`;
  }
  const mappingTargets = method.parameters.filter((p) => p.isMappingTarget);
  const sources = method.parameters.filter((p) => !p.isMappingTarget);
  if (mappingTargets.length > 1) {
    return "only one parameter can be the mapping target";
  }
  if (sources.length === 0) {
    return "a mapping method needs at least one source parameter";
  }
  if (method.returnsVoid && !method.isUpdateMethod) {
    return "a method returning void must have a mapping target";
  }

  const [source] = sources;
  const target = method.resultType;
  if (source && (isContainer(source.type) || isContainer(target))) {
    if (sources.length > 1) {
      return "container mapping methods take a single source parameter";
    }
    if (!isForgeable(source.type, target)) {
      return "can't map between a container and a non-container type, or between iterables and maps";
    }
  }
  return undefined;
};

const isContainerMethod = (method: MethodDescriptor): boolean =>
  method.parameters.some((p) => !p.isMappingTarget && isContainer(p.type)) ||
  isContainer(method.resultType);

const methodAssignments = (method: MappingMethod): readonly Assignment[] =>
  method.kind === "container"
    ? [method.mapping]
    : method.propertyMappings.map((m) => m.assignment);

const constructionCallees = (
  construction: Construction
): readonly MethodDescriptor[] =>
  construction.kind === "factory" ? [construction.method] : [];

const calleesOf = (method: MappingMethod): readonly MethodDescriptor[] => [
  ...(method.kind === "bean" ? constructionCallees(method.construction) : []),
  ...methodAssignments(method).flatMap(calledMethods),
];

const partTypes = (
  method: ForgedMethod,
  part: ContainerPart
): readonly [TypeDescriptor, TypeDescriptor] | undefined => {
  const [parameter] = method.parameters;
  if (!parameter) {
    return undefined;
  }
  const pick =
    part === "element" ? elementType : part === "key" ? keyType : valueType;
  const source = pick(parameter.type);
  const target = pick(method.resultType);
  return source && target ? [source, target] : undefined;
};

/**
 * Settle forged methods: failures spread to forged callers until nothing
 * changes. Returns the failures keyed by method.
 */
const propagateFailures = (
  forged: ReadonlyMap<ForgedMethod, ContainerBuildResult>
): ReadonlyMap<MethodDescriptor, ForgeFailure> => {
  const failures = new Map<MethodDescriptor, ForgeFailure>();
  for (const [method, result] of forged) {
    if (!result.ok) {
      failures.set(method, {
        method,
        part: result.error.kind === "unresolved" ? result.error.part : undefined,
      });
    }
  }

  let changed = true;
  while (changed) {
    changed = false;
    for (const [method, result] of forged) {
      if (!result.ok || failures.has(method)) {
        continue;
      }
      const failedCallee = calledMethods(result.value.mapping).find((m) =>
        failures.has(m)
      );
      if (failedCallee) {
        // Keep the innermost cause so the diagnostic names the real types
        failures.set(method, failures.get(failedCallee) ?? { method });
        changed = true;
      }
    }
  }
  return failures;
};

/**
 * Union callee thrown types into forged methods until a fixed point
 */
const propagateThrownTypes = (methods: readonly MappingMethod[]): void => {
  let changed = true;
  while (changed) {
    changed = false;
    for (const method of methods) {
      for (const callee of calleesOf(method)) {
        if (addThrownTypes(method.method, callee.thrownTypes)) {
          changed = true;
        }
      }
    }
  }
};

const reportFailedCallees = (
  session: ResolutionSession,
  method: MappingMethod,
  failures: ReadonlyMap<MethodDescriptor, ForgeFailure>
): void => {
  const reported = new Set<MethodDescriptor>();
  for (const callee of calleesOf(method)) {
    const failure = failures.get(callee);
    if (!failure || reported.has(callee)) {
      continue;
    }
    reported.add(callee);

    // Construction failures were reported when they occurred
    const part = failure.part;
    const types = part ? partTypes(failure.method, part) : undefined;
    if (part && types) {
      session.report(
        unresolvedPartDiagnostic(method.method, part, types[0], types[1])
      );
    }
  }
};

const signatureTypes = (method: MethodDescriptor): readonly TypeDescriptor[] => [
  ...method.parameters.map((p) => p.type),
  ...(method.returnsVoid ? [] : [method.resultType]),
];

/**
 * Named types reachable from `types` through type parameters
 */
const namedTypes = (types: readonly TypeDescriptor[]): readonly TypeDescriptor[] => {
  const seen = new Set<TypeDescriptor>();
  const named: TypeDescriptor[] = [];
  const visit = (type: TypeDescriptor): void => {
    if (seen.has(type)) {
      return;
    }
    seen.add(type);
    if (type.importPath !== undefined) {
      named.push(type);
    }
    type.typeParameters.forEach(visit);
    if (type.bound) {
      visit(type.bound);
    }
  };
  types.forEach(visit);
  return named;
};

const collectImportTypes = (
  methods: readonly MappingMethod[]
): readonly TypeDescriptor[] =>
  uniqueTypes(
    namedTypes(
      methods.flatMap((method) => [
        ...signatureTypes(method.method),
        ...methodAssignments(method).flatMap(assignmentImportTypes),
        ...(method.kind === "bean" && method.construction.kind === "default"
          ? [method.construction.type]
          : []),
      ])
    )
  );

/**
 * Resolve every abstract mapping method of a mapper. Always yields the
 * generated mapper together with the diagnostics collected on the way.
 */
export const resolveMapper = (
  mapper: MapperDescriptor,
  options: GeneratorOptions = {}
): MapperResolution => {
  const session = createResolutionSession(mapper.methods, options);
  const nullValueStrategy =
    mapper.config.nullValueStrategy ?? options.nullValueStrategy ?? "propagate";
  const unmappedTargetPolicy =
    mapper.config.unmappedTargetPolicy ?? options.unmappedTargetPolicy ?? "warn";

  const declared: MappingMethod[] = [];

  for (const method of mapper.methods) {
    if (!method.isAbstract) {
      continue;
    }

    const reason = unsupportedShape(method);
    if (reason) {
      session.report(
        createDiagnostic(
          "MWV1012",
          "error",
          `Can't generate method '${method.name}': ${reason}.`,
          method.location
        )
      );
      continue;
    }

    if (isContainerMethod(method)) {
      const result = session.queue.track(method, () =>
        buildContainerMappingMethod(session, method, nullValueStrategy)
      );
      if (result.ok) {
        declared.push(result.value);
      }
      continue;
    }

    const bean = buildBeanMappingMethod(session, method, {
      nullValueStrategy,
      unmappedTargetPolicy,
    });
    if (bean) {
      declared.push(bean);
    }
  }

  const forgedResults = new Map<ForgedMethod, ContainerBuildResult>();
  const drained = session.queue.drain((entry) => {
    forgedResults.set(
      entry.method,
      buildContainerMappingMethod(session, entry.method, nullValueStrategy)
    );
  });
  if (session.verbose && drained > 0) {
    console.log(`Generated ${drained} forged method(s) for ${mapper.name}`);
  }

  const failures = propagateFailures(forgedResults);
  for (const method of declared) {
    reportFailedCallees(session, method, failures);
  }

  const forged = [...forgedResults.entries()].flatMap(([method, result]) =>
    result.ok && !failures.has(method) ? [result.value] : []
  );
  const methods = [...declared, ...forged];
  propagateThrownTypes(forged);

  return {
    generated: {
      mapper,
      implementationName: implementationNameOf(mapper),
      methods,
      importTypes: collectImportTypes(methods),
    },
    diagnostics: session.diagnostics(),
  };
};

/**
 * Generate a mapper, failing when any error diagnostic was reported
 */
export const generateMapper = (
  mapper: MapperDescriptor,
  options: GeneratorOptions = {}
): Result<MapperResolution, DiagnosticsCollector> => {
  const resolution = resolveMapper(mapper, options);
  return resolution.diagnostics.hasErrors
    ? error(resolution.diagnostics)
    : ok(resolution);
};
