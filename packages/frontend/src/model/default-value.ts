/**
 * Default values used by the map-null-to-default policy
 */

import { TypeDescriptor } from "./type-descriptor.js";

export type DefaultValue =
  | { readonly kind: "literal"; readonly text: string }
  | { readonly kind: "emptyContainer"; readonly type: TypeDescriptor }
  | { readonly kind: "newInstance"; readonly type: TypeDescriptor }
  | { readonly kind: "undefined" };

const PRIMITIVE_DEFAULTS: ReadonlyMap<string, string> = new Map([
  ["string", '""'],
  ["number", "0"],
  ["boolean", "false"],
  ["bigint", "0n"],
]);

/**
 * Default value of a target type. Abstract containers default to an empty
 * instance of their implementation type.
 */
export const defaultValueFor = (type: TypeDescriptor): DefaultValue => {
  if (type.kind === "primitive") {
    const text = PRIMITIVE_DEFAULTS.get(type.name);
    return text !== undefined ? { kind: "literal", text } : { kind: "undefined" };
  }

  if (type.container !== "none") {
    return { kind: "emptyContainer", type: type.implementationType ?? type };
  }

  if (type.kind === "class" || type.kind === "interface") {
    return { kind: "newInstance", type };
  }

  return { kind: "undefined" };
};
