/**
 * Well-known types shared by discovery and the conversion registry
 */

import { builtinType, primitiveType } from "./type-descriptor.js";

export const stringType = primitiveType("string");
export const numberType = primitiveType("number");
export const booleanType = primitiveType("boolean");
export const bigintType = primitiveType("bigint");

export const dateType = builtinType("Date");
export const bufferType = builtinType("Buffer", "node:buffer");

/** Result type of methods that return nothing */
export const voidType = builtinType("void");
