/**
 * Index of declared and forged methods the resolver can delegate to
 */

import {
  MethodDescriptor,
  MethodRole,
  TypeDescriptor,
  forgedContextKey,
  isAssignableTo,
  methodKey,
  sourceParameters,
  typeEquals,
} from "@mapweave/frontend";
import { ResolutionContext, forgedContextOf } from "../context.js";
import { NameSimilarity, levenshteinSimilarity } from "./name-similarity.js";

export type ResolutionOutcome =
  | { readonly kind: "noMatch" }
  | { readonly kind: "unique"; readonly method: MethodDescriptor }
  | {
      readonly kind: "ambiguous";
      readonly methods: readonly MethodDescriptor[];
    };

export type CandidateIndex = {
  /** Mapping methods converting `source` into `target` */
  readonly find: (
    source: TypeDescriptor,
    target: TypeDescriptor,
    context: ResolutionContext
  ) => ResolutionOutcome;
  /** Zero-argument factory methods building exactly `type` */
  readonly findFactory: (
    type: TypeDescriptor,
    context: ResolutionContext
  ) => ResolutionOutcome;
  /**
   * Insert a method. Registering a known signature is a no-op that
   * returns the method registered first.
   */
  readonly register: (method: MethodDescriptor) => MethodDescriptor;
  readonly lifecycleMethods: (
    role: "beforeMapping" | "afterMapping"
  ) => readonly MethodDescriptor[];
  /** Reserve a method name not used by any registered method */
  readonly reserveName: (base: string) => string;
  readonly methods: () => readonly MethodDescriptor[];
};

export type CandidateIndexOptions = {
  readonly nameSimilarity?: NameSimilarity;
};

const NO_MATCH: ResolutionOutcome = { kind: "noMatch" };

const carriesAll = (
  method: MethodDescriptor,
  qualifiers: readonly string[]
): boolean => qualifiers.every((q) => method.qualifiers.includes(q));

const acceptsExactly = (
  method: MethodDescriptor,
  source: TypeDescriptor,
  target: TypeDescriptor
): boolean => {
  const [parameter] = sourceParameters(method);
  return (
    parameter !== undefined &&
    typeEquals(parameter.type, source) &&
    typeEquals(method.resultType, target)
  );
};

/**
 * Pick one method out of type-compatible candidates:
 * qualifiers first, then the most specific signature, then name similarity.
 */
export const selectCandidate = (
  candidates: readonly MethodDescriptor[],
  context: Pick<ResolutionContext, "qualifiers" | "targetPropertyName">,
  nameSimilarity: NameSimilarity,
  isExact: (method: MethodDescriptor) => boolean = () => true
): ResolutionOutcome => {
  let pool = candidates;

  if (context.qualifiers.length > 0) {
    const qualified = pool.filter((m) => carriesAll(m, context.qualifiers));
    const [only] = qualified;
    if (qualified.length === 1 && only) {
      return { kind: "unique", method: only };
    }
    if (qualified.length > 1) {
      pool = qualified;
    }
  } else {
    const unqualified = pool.filter((m) => m.qualifiers.length === 0);
    if (unqualified.length > 0) {
      pool = unqualified;
    }
  }

  const exact = pool.filter(isExact);
  if (exact.length > 0) {
    pool = exact;
  }

  const [first] = pool;
  if (!first) {
    return NO_MATCH;
  }
  if (pool.length === 1) {
    return { kind: "unique", method: first };
  }

  const propertyName = context.targetPropertyName;
  const scored = pool.map((method) => ({
    method,
    score:
      propertyName !== undefined ? nameSimilarity(method.name, propertyName) : 0,
  }));
  const best = Math.max(...scored.map((s) => s.score));
  const top = scored.filter((s) => s.score === best).map((s) => s.method);
  const [winner] = top;

  return top.length === 1 && winner
    ? { kind: "unique", method: winner }
    : { kind: "ambiguous", methods: top };
};

export const createCandidateIndex = (
  initialMethods: readonly MethodDescriptor[],
  options: CandidateIndexOptions = {}
): CandidateIndex => {
  const nameSimilarity = options.nameSimilarity ?? levenshteinSimilarity;
  const methods: MethodDescriptor[] = [];
  const byKey = new Map<string, MethodDescriptor>();
  const names = new Set<string>();

  const register = (method: MethodDescriptor): MethodDescriptor => {
    const key = methodKey(method);
    const existing = byKey.get(key);
    if (existing) {
      return existing;
    }
    byKey.set(key, method);
    methods.push(method);
    names.add(method.name);
    return method;
  };

  for (const method of initialMethods) {
    register(method);
  }

  const isMappingCandidate = (
    method: MethodDescriptor,
    source: TypeDescriptor,
    target: TypeDescriptor,
    context: ResolutionContext
  ): boolean => {
    if (
      method.role !== "mapping" ||
      method.isUpdateMethod ||
      method.returnsVoid
    ) {
      return false;
    }

    const params = sourceParameters(method);
    const [parameter] = params;
    if (params.length !== 1 || !parameter) {
      return false;
    }

    if (
      method.origin === "forged" &&
      forgedContextKey(method.forgedContext) !==
        forgedContextKey(forgedContextOf(context))
    ) {
      return false;
    }

    return (
      isAssignableTo(source, parameter.type) &&
      isAssignableTo(method.resultType, target)
    );
  };

  return {
    find: (source, target, context) =>
      selectCandidate(
        methods.filter((m) => isMappingCandidate(m, source, target, context)),
        context,
        nameSimilarity,
        (m) => acceptsExactly(m, source, target)
      ),

    findFactory: (type, context) => {
      const factories = methods.filter(
        (m) =>
          m.role === "factory" &&
          sourceParameters(m).length === 0 &&
          (typeEquals(m.resultType, type) ||
            (type.implementationType !== undefined &&
              typeEquals(m.resultType, type.implementationType)))
      );
      return selectCandidate(
        factories,
        { qualifiers: context.qualifiers },
        nameSimilarity
      );
    },

    register,

    lifecycleMethods: (role: MethodRole) =>
      methods.filter((m) => m.role === role),

    reserveName: (base) => {
      let name = base;
      for (let i = 1; names.has(name); i++) {
        name = `${base}${i}`;
      }
      names.add(name);
      return name;
    },

    methods: () => [...methods],
  };
};
