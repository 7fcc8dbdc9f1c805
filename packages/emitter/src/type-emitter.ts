/**
 * Type descriptors rendered as TypeScript type syntax
 */

import { TypeDescriptor } from "@mapweave/frontend";

const needsParentheses = (text: string): boolean => /[\s|&]/.test(text);

const emit = (type: TypeDescriptor, stack: readonly TypeDescriptor[]): string => {
  // A type that contains itself has no name of its own to refer to
  if (stack.includes(type)) {
    return "unknown";
  }
  const inner = [...stack, type];
  const args = type.typeParameters.map((t) => emit(t, inner));

  const [element] = args;
  if (type.container === "array" && type.name === "Array" && element !== undefined) {
    return needsParentheses(element) ? `(${element})[]` : `${element}[]`;
  }

  return args.length > 0 ? `${type.name}<${args.join(", ")}>` : type.name;
};

/**
 * `Array<number>` renders as `number[]`, everything else by name
 */
export const emitType = (type: TypeDescriptor): string => emit(type, []);

/**
 * Type of a parameter or property that may hold null or undefined
 */
export const emitNullableType = (type: TypeDescriptor, nullable: boolean): string =>
  nullable ? `${emitType(type)} | null | undefined` : emitType(type);

/**
 * `<T extends Base, U>` for a method's type variables
 */
export const emitTypeParameters = (
  variables: readonly TypeDescriptor[]
): string => {
  if (variables.length === 0) {
    return "";
  }
  const declared = variables.map((variable) =>
    variable.bound ? `${variable.name} extends ${emitType(variable.bound)}` : variable.name
  );
  return `<${declared.join(", ")}>`;
};
