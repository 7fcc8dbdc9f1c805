/**
 * Resolution session: the registries and queue one mapper generation shares
 */

import {
  Diagnostic,
  DiagnosticsCollector,
  MethodDescriptor,
  addDiagnostic,
  createDiagnosticsCollector,
} from "@mapweave/frontend";
import { ConversionRegistry } from "./conversion/registry.js";
import { createConversionRegistry } from "./conversion/builtin.js";
import {
  CandidateIndex,
  createCandidateIndex,
} from "./candidates/candidate-index.js";
import { NameSimilarity } from "./candidates/name-similarity.js";
import { ForgeQueue, createForgeQueue } from "./forge/queue.js";

export type SessionOptions = {
  /** Sealed conversion registry; the built-in one when omitted */
  readonly conversions?: ConversionRegistry;
  readonly nameSimilarity?: NameSimilarity;
  /** Log forged methods as they are created */
  readonly verbose?: boolean;
};

export type ResolutionSession = {
  /** Read-only after initialisation */
  readonly conversions: ConversionRegistry;
  /** Extended with forged methods during resolution */
  readonly index: CandidateIndex;
  readonly queue: ForgeQueue;
  readonly report: (diagnostic: Diagnostic) => void;
  readonly diagnostics: () => DiagnosticsCollector;
  readonly verbose: boolean;
};

export const createResolutionSession = (
  methods: readonly MethodDescriptor[],
  options: SessionOptions = {}
): ResolutionSession => {
  const conversions = options.conversions ?? createConversionRegistry();
  if (!conversions.isSealed()) {
    throw new Error(
      "Internal error: resolution sessions require a sealed conversion registry"
    );
  }

  let collector = createDiagnosticsCollector();

  return {
    conversions,
    index: createCandidateIndex(methods, {
      nameSimilarity: options.nameSimilarity,
    }),
    queue: createForgeQueue(),
    report: (diagnostic) => {
      collector = addDiagnostic(collector, diagnostic);
    },
    diagnostics: () => collector,
    verbose: options.verbose ?? false,
  };
};
