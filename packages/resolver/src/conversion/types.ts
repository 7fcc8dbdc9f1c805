/**
 * Conversion provider contract
 */

import { TypeDescriptor } from "@mapweave/frontend";

export type ConversionContext = {
  readonly sourceType: TypeDescriptor;
  readonly targetType: TypeDescriptor;
  /** Formatting hint such as a number pattern or a locale */
  readonly formatting?: string;
};

/**
 * Expression fragments wrapping a value reference: `open + ref + close`
 */
export type TypeConversion = {
  readonly open: string;
  readonly close: string;
  /** Types the emitter must import for the expression */
  readonly importTypes: readonly TypeDescriptor[];
  /** Error kinds the expression may raise at run time */
  readonly thrownTypes: readonly string[];
};

/**
 * Stateless strategy keyed by an ordered (source, target) pair.
 * `to` converts source to target, `from` converts back.
 */
export type ConversionProvider = {
  readonly to: (context: ConversionContext) => TypeConversion;
  readonly from: (context: ConversionContext) => TypeConversion;
};
