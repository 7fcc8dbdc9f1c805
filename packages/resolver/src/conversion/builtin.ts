/**
 * Built-in conversions between primitive and well-known types
 */

import {
  bigintType,
  booleanType,
  bufferType,
  dateType,
  numberType,
  stringType,
} from "@mapweave/frontend";
import { ConversionRegistry, createEmptyConversionRegistry } from "./registry.js";
import { ExpressionPair, createSimpleConversion } from "./simple-conversion.js";

const DECIMAL_PATTERN = /^[#0,]*(?:\.([#0]+))?$/;

const quote = (text: string): string => JSON.stringify(text);

const call = (name: string): ExpressionPair => [`${name}(`, ")"];

/**
 * `#.00` style patterns become toFixed, anything else is taken as a locale
 */
const numberToString = (formatting: string | undefined): ExpressionPair => {
  if (formatting === undefined) {
    return call("String");
  }
  const decimal = DECIMAL_PATTERN.exec(formatting);
  if (decimal) {
    const digits = decimal[1]?.length ?? 0;
    return ["(", `).toFixed(${digits})`];
  }
  return ["(", `).toLocaleString(${quote(formatting)})`];
};

const dateToString = (formatting: string | undefined): ExpressionPair =>
  formatting === undefined
    ? ["(", ").toISOString()"]
    : ["(", `).toLocaleString(${quote(formatting)})`];

const encoding = (formatting: string | undefined): string =>
  quote(formatting ?? "utf-8");

export const registerBuiltinConversions = (
  registry: ConversionRegistry
): ConversionRegistry => {
  registry.register(
    numberType,
    stringType,
    createSimpleConversion({
      to: (ctx) => numberToString(ctx.formatting),
      from: () => call("Number"),
    })
  );

  registry.register(
    booleanType,
    stringType,
    createSimpleConversion({
      to: () => call("String"),
      from: () => ["(", ' === "true")'],
    })
  );

  registry.register(
    bigintType,
    stringType,
    createSimpleConversion({
      to: () => call("String"),
      from: () => call("BigInt"),
      fromThrownTypes: ["SyntaxError"],
    })
  );

  registry.register(
    bigintType,
    numberType,
    createSimpleConversion({
      to: () => call("Number"),
      from: () => call("BigInt"),
      fromThrownTypes: ["RangeError"],
    })
  );

  registry.register(
    dateType,
    stringType,
    createSimpleConversion({
      to: (ctx) => dateToString(ctx.formatting),
      from: () => ["new Date(", ")"],
    })
  );

  registry.register(
    dateType,
    numberType,
    createSimpleConversion({
      to: () => ["(", ").getTime()"],
      from: () => ["new Date(", ")"],
    })
  );

  registry.register(
    bufferType,
    stringType,
    createSimpleConversion({
      to: (ctx) => ["(", `).toString(${encoding(ctx.formatting)})`],
      from: (ctx) => ["Buffer.from(", `, ${encoding(ctx.formatting)})`],
      fromImportTypes: [bufferType],
    })
  );

  return registry;
};

/**
 * Registry holding the built-in conversions, sealed
 */
export const createConversionRegistry = (): ConversionRegistry =>
  registerBuiltinConversions(createEmptyConversionRegistry()).seal();
