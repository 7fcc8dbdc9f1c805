/**
 * Mapping methods handed to the emitter
 */

import {
  MethodDescriptor,
  ParameterDescriptor,
  PropertyDescriptor,
} from "@mapweave/frontend";
import {
  Assignment,
  Construction,
  ContainerMappingAssignment,
} from "../model/assignment.js";

export type CallbackArgument =
  | { readonly kind: "source"; readonly parameter: ParameterDescriptor }
  | { readonly kind: "target" };

export type LifecycleCallbackReference = {
  readonly method: MethodDescriptor;
  readonly arguments: readonly CallbackArgument[];
};

type MappingMethodBase = {
  readonly method: MethodDescriptor;
  readonly beforeMapping: readonly LifecycleCallbackReference[];
  readonly afterMapping: readonly LifecycleCallbackReference[];
  /** A null source yields the default value instead of null */
  readonly mapNullToDefault: boolean;
};

export type ContainerMappingMethod = MappingMethodBase & {
  readonly kind: "container";
  readonly mapping: ContainerMappingAssignment;
};

export type PropertySource =
  | {
      readonly kind: "property";
      readonly parameter: ParameterDescriptor;
      readonly property: PropertyDescriptor;
    }
  | { readonly kind: "parameter"; readonly parameter: ParameterDescriptor }
  | { readonly kind: "constant"; readonly value: string };

export type PropertyMapping = {
  readonly target: PropertyDescriptor;
  readonly source: PropertySource;
  readonly assignment: Assignment;
  /**
   * The source may be null or undefined and the assignment would not pass
   * it through: a null source is written as is, unconverted
   */
  readonly nullCheck: boolean;
};

export type BeanMappingMethod = MappingMethodBase & {
  readonly kind: "bean";
  readonly construction: Construction;
  readonly propertyMappings: readonly PropertyMapping[];
};

export type MappingMethod = ContainerMappingMethod | BeanMappingMethod;
