/**
 * Providers built from a pair of expression templates
 */

import { TypeDescriptor } from "@mapweave/frontend";
import {
  ConversionContext,
  ConversionProvider,
  TypeConversion,
} from "./types.js";

/** Opening and closing expression part */
export type ExpressionPair = readonly [open: string, close: string];

export type SimpleConversionDefinition = {
  readonly to: (context: ConversionContext) => ExpressionPair;
  readonly from: (context: ConversionContext) => ExpressionPair;
  readonly toImportTypes?: readonly TypeDescriptor[];
  readonly fromImportTypes?: readonly TypeDescriptor[];
  readonly toThrownTypes?: readonly string[];
  readonly fromThrownTypes?: readonly string[];
};

const conversion = (
  [open, close]: ExpressionPair,
  importTypes: readonly TypeDescriptor[] | undefined,
  thrownTypes: readonly string[] | undefined
): TypeConversion => ({
  open,
  close,
  importTypes: importTypes ?? [],
  thrownTypes: thrownTypes ?? [],
});

export const createSimpleConversion = (
  definition: SimpleConversionDefinition
): ConversionProvider => ({
  to: (context) =>
    conversion(
      definition.to(context),
      definition.toImportTypes,
      definition.toThrownTypes
    ),
  from: (context) =>
    conversion(
      definition.from(context),
      definition.fromImportTypes,
      definition.fromThrownTypes
    ),
});

/**
 * Swap the directions of a provider
 */
export const reverseConversion = (
  provider: ConversionProvider
): ConversionProvider => ({
  to: provider.from,
  from: provider.to,
});
