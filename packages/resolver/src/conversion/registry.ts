/**
 * Conversion registry keyed by ordered (source, target) pairs
 */

import { TypeDescriptor, typeKey } from "@mapweave/frontend";
import { ConversionProvider } from "./types.js";
import { reverseConversion } from "./simple-conversion.js";

export type ConversionRegistry = {
  readonly lookup: (
    source: TypeDescriptor,
    target: TypeDescriptor
  ) => ConversionProvider | undefined;
  /**
   * Register the forward pair and its reverse.
   * Throws once the registry is sealed.
   */
  readonly register: (
    source: TypeDescriptor,
    target: TypeDescriptor,
    provider: ConversionProvider
  ) => void;
  readonly seal: () => ConversionRegistry;
  readonly isSealed: () => boolean;
};

const pairKey = (source: TypeDescriptor, target: TypeDescriptor): string =>
  `${typeKey(source)}->${typeKey(target)}`;

/**
 * Only primitive and builtin, non-container types take part in
 * conversions; everything else goes through methods or forging.
 */
const isConvertible = (type: TypeDescriptor): boolean =>
  (type.kind === "primitive" || type.kind === "builtin") &&
  type.container === "none";

export const createEmptyConversionRegistry = (): ConversionRegistry => {
  const providers = new Map<string, ConversionProvider>();
  let sealed = false;

  const registry: ConversionRegistry = {
    lookup: (source, target) => {
      if (!isConvertible(source) || !isConvertible(target)) {
        return undefined;
      }
      return providers.get(pairKey(source, target));
    },

    register: (source, target, provider) => {
      if (sealed) {
        throw new Error(
          `Internal error: conversion ${pairKey(source, target)} registered after the registry was sealed`
        );
      }
      providers.set(pairKey(source, target), provider);
      providers.set(pairKey(target, source), reverseConversion(provider));
    },

    seal: () => {
      sealed = true;
      return registry;
    },

    isSealed: () => sealed,
  };

  return registry;
};
