/**
 * Type descriptors: the immutable view of a type the resolver works on
 */

export type TypeKind =
  | "primitive"
  | "builtin"
  | "class"
  | "abstractClass"
  | "interface"
  | "typeVariable";

export type ContainerKind = "none" | "list" | "set" | "array" | "map" | "iterable";

export type PropertyDescriptor = {
  readonly name: string;
  readonly type: TypeDescriptor;
  readonly optional: boolean;
  /** True when the declared type is a union with null or undefined */
  readonly nullable: boolean;
  readonly readonly: boolean;
};

export type TypeDescriptor = {
  readonly kind: TypeKind;
  /** Qualified name ("string", "Array", "models.User") */
  readonly name: string;
  readonly typeParameters: readonly TypeDescriptor[];
  readonly container: ContainerKind;
  /**
   * Instantiable substitute for abstract types
   * (ReadonlyArray<T> is built as Array<T>).
   */
  readonly implementationType?: TypeDescriptor;
  /** Declared bound of a type variable (`T extends Bound`) */
  readonly bound?: TypeDescriptor;
  readonly superTypes: readonly TypeDescriptor[];
  readonly properties: readonly PropertyDescriptor[];
  /** Module the emitter imports the name from */
  readonly importPath?: string;
};

type ObjectTypeInit = {
  readonly typeParameters?: readonly TypeDescriptor[];
  readonly superTypes?: readonly TypeDescriptor[];
  readonly properties?: readonly PropertyDescriptor[];
  readonly importPath?: string;
};

/**
 * Built-in container descriptor. `typeParameters` is kept by reference so
 * recursive aliases can fill it after the descriptor exists.
 */
export const containerType = (
  name: string,
  container: ContainerKind,
  typeParameters: readonly TypeDescriptor[],
  implementationType?: TypeDescriptor
): TypeDescriptor => ({
  kind: "builtin",
  name,
  typeParameters,
  container,
  implementationType,
  superTypes: [],
  properties: [],
});

export const primitiveType = (
  name: "string" | "number" | "boolean" | "bigint"
): TypeDescriptor => ({
  kind: "primitive",
  name,
  typeParameters: [],
  container: "none",
  superTypes: [],
  properties: [],
});

export const builtinType = (
  name: string,
  importPath?: string
): TypeDescriptor => ({
  kind: "builtin",
  name,
  typeParameters: [],
  container: "none",
  superTypes: [],
  properties: [],
  importPath,
});

export const objectType = (
  kind: "class" | "abstractClass" | "interface",
  name: string,
  init: ObjectTypeInit = {}
): TypeDescriptor => ({
  kind,
  name,
  typeParameters: init.typeParameters ?? [],
  container: "none",
  superTypes: init.superTypes ?? [],
  properties: init.properties ?? [],
  importPath: init.importPath,
});

export const typeVariable = (
  name: string,
  bound?: TypeDescriptor
): TypeDescriptor => ({
  kind: "typeVariable",
  name,
  typeParameters: [],
  container: "none",
  bound,
  superTypes: [],
  properties: [],
});

export const arrayType = (element: TypeDescriptor): TypeDescriptor =>
  containerType("Array", "array", [element]);

export const readonlyArrayType = (element: TypeDescriptor): TypeDescriptor =>
  containerType("ReadonlyArray", "list", [element], arrayType(element));

export const setType = (element: TypeDescriptor): TypeDescriptor =>
  containerType("Set", "set", [element]);

export const readonlySetType = (element: TypeDescriptor): TypeDescriptor =>
  containerType("ReadonlySet", "set", [element], setType(element));

export const iterableType = (element: TypeDescriptor): TypeDescriptor =>
  containerType("Iterable", "iterable", [element], arrayType(element));

export const mapType = (
  key: TypeDescriptor,
  value: TypeDescriptor
): TypeDescriptor => containerType("Map", "map", [key, value]);

export const readonlyMapType = (
  key: TypeDescriptor,
  value: TypeDescriptor
): TypeDescriptor =>
  containerType("ReadonlyMap", "map", [key, value], mapType(key, value));

export const recordType = (
  key: TypeDescriptor,
  value: TypeDescriptor
): TypeDescriptor => containerType("Record", "map", [key, value]);

/**
 * Most specific type usable for resolution: the bound of a type variable,
 * the variable itself when it is unbounded, the type for everything else.
 */
export const getTypeBound = (type: TypeDescriptor): TypeDescriptor =>
  type.kind === "typeVariable" ? (type.bound ?? type) : type;

/**
 * Canonical key of a type. Self-references are written as `^n`, where n
 * counts the enclosing levels back to the referenced descriptor.
 */
export const typeKey = (type: TypeDescriptor): string => keyOf(type, []);

const keyOf = (
  type: TypeDescriptor,
  stack: readonly TypeDescriptor[]
): string => {
  const index = stack.lastIndexOf(type);
  if (index >= 0) {
    return `^${stack.length - 1 - index}`;
  }

  const inner = [...stack, type];
  if (type.kind === "typeVariable") {
    return type.bound
      ? `?${type.name} extends ${keyOf(type.bound, inner)}`
      : `?${type.name}`;
  }

  if (type.typeParameters.length === 0) {
    return type.name;
  }

  const args = type.typeParameters.map((t) => keyOf(t, inner)).join(",");
  return `${type.name}<${args}>`;
};

export const typeEquals = (a: TypeDescriptor, b: TypeDescriptor): boolean =>
  a === b || typeKey(a) === typeKey(b);

/**
 * Human readable type name for diagnostics
 */
export const describeType = (type: TypeDescriptor): string =>
  describeOf(type, []);

const describeOf = (
  type: TypeDescriptor,
  stack: readonly TypeDescriptor[]
): string => {
  if (stack.includes(type) || type.typeParameters.length === 0) {
    return type.name;
  }
  const inner = [...stack, type];
  const args = type.typeParameters.map((t) => describeOf(t, inner));
  return `${type.name}<${args.join(", ")}>`;
};

/**
 * Whether a value of `source` can be used where `target` is expected
 * without any conversion. Container type parameters are invariant.
 */
export const isAssignableTo = (
  source: TypeDescriptor,
  target: TypeDescriptor
): boolean => assignable(source, target, new Set());

const assignable = (
  source: TypeDescriptor,
  target: TypeDescriptor,
  visited: Set<TypeDescriptor>
): boolean => {
  if (typeEquals(source, target)) {
    return true;
  }

  if (target.kind === "typeVariable") {
    return target.bound === undefined || assignable(source, target.bound, visited);
  }

  if (
    target.implementationType &&
    typeEquals(source, target.implementationType)
  ) {
    return true;
  }

  if (visited.has(source)) {
    return false;
  }
  visited.add(source);

  if (source.kind === "typeVariable") {
    return source.bound !== undefined && assignable(source.bound, target, visited);
  }

  return source.superTypes.some((superType) =>
    assignable(superType, target, visited)
  );
};

export const isContainer = (type: TypeDescriptor): boolean =>
  type.container !== "none";

export const isIterableContainer = (type: TypeDescriptor): boolean =>
  type.container === "list" ||
  type.container === "set" ||
  type.container === "array" ||
  type.container === "iterable";

/**
 * Plain-object maps; their entries are read back with string keys
 */
export const isRecordType = (type: TypeDescriptor): boolean =>
  type.container === "map" && type.name === "Record";

export const elementType = (type: TypeDescriptor): TypeDescriptor | undefined => {
  const element = isIterableContainer(type) ? type.typeParameters[0] : undefined;
  return element ? getTypeBound(element) : undefined;
};

export const keyType = (type: TypeDescriptor): TypeDescriptor | undefined => {
  const key = type.container === "map" ? type.typeParameters[0] : undefined;
  return key ? getTypeBound(key) : undefined;
};

export const valueType = (type: TypeDescriptor): TypeDescriptor | undefined => {
  const value = type.container === "map" ? type.typeParameters[1] : undefined;
  return value ? getTypeBound(value) : undefined;
};
