/**
 * Per-call resolution context
 */

import {
  ForgedContext,
  MethodDescriptor,
  NullValueStrategy,
  SelectionConfig,
} from "@mapweave/frontend";

export type ResolutionContext = {
  /** Enclosing method, for thrown-type aggregation and name collisions */
  readonly method: MethodDescriptor;
  readonly sourceReference: string;
  /** What is being mapped, for diagnostics ("property 'name'", "map key") */
  readonly description: string;
  readonly qualifiers: readonly string[];
  readonly targetPropertyName?: string;
  readonly nullValueStrategy: NullValueStrategy;
  readonly formatting?: string;
};

/**
 * Derive the context of a nested resolution. Selection hints are
 * replaced, never merged, so a key mapping does not inherit the
 * qualifiers of a sibling value mapping.
 */
export const narrowContext = (
  context: ResolutionContext,
  narrowing: {
    readonly sourceReference: string;
    readonly description: string;
    readonly selection?: SelectionConfig;
    readonly targetPropertyName?: string;
  }
): ResolutionContext => ({
  method: context.method,
  sourceReference: narrowing.sourceReference,
  description: narrowing.description,
  qualifiers: narrowing.selection?.qualifiers ?? [],
  targetPropertyName: narrowing.targetPropertyName,
  nullValueStrategy: context.nullValueStrategy,
  formatting: narrowing.selection?.format,
});

export const forgedContextOf = (context: ResolutionContext): ForgedContext => ({
  qualifiers: context.qualifiers,
  formatting: context.formatting,
  nullValueStrategy: context.nullValueStrategy,
});
