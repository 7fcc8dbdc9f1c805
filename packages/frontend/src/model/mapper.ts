/**
 * Mapper descriptors produced by discovery
 */

import { SourceLocation } from "../types/diagnostic.js";
import { DeclaredMethod, NullValueStrategy } from "./method.js";
import { TypeDescriptor } from "./type-descriptor.js";

export type UnmappedTargetPolicy = "ignore" | "warn" | "error";

export type MapperConfig = {
  readonly nullValueStrategy?: NullValueStrategy;
  readonly unmappedTargetPolicy?: UnmappedTargetPolicy;
  readonly implementationName?: string;
};

export type MapperDescriptor = {
  readonly name: string;
  readonly declarationKind: "interface" | "abstractClass";
  /** Module the mapper and its types are imported from */
  readonly importPath: string;
  readonly methods: readonly DeclaredMethod[];
  readonly config: MapperConfig;
  /** Types declared in the mapper's module, by name */
  readonly types: ReadonlyMap<string, TypeDescriptor>;
  readonly location?: SourceLocation;
};

export const implementationNameOf = (mapper: MapperDescriptor): string =>
  mapper.config.implementationName ?? `${mapper.name}Impl`;
