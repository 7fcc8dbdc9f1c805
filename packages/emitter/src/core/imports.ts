/**
 * Import declarations of an emitted module
 */

import { TypeDescriptor } from "@mapweave/frontend";
import { GeneratedMapper } from "@mapweave/resolver";

type ImportedName = {
  readonly name: string;
  /** Only used in type positions */
  readonly typeOnly: boolean;
};

/**
 * Interfaces only appear in type positions; classes may be constructed
 * and builtins such as Buffer are values too
 */
const isTypeOnly = (type: TypeDescriptor): boolean => type.kind === "interface";

const mapperImport = (generated: GeneratedMapper): ImportedName => ({
  name: generated.mapper.name,
  typeOnly: generated.mapper.declarationKind === "interface",
});

/**
 * Group the names every mapper needs by module, in first-seen module
 * order with names sorted
 */
export const collectImports = (
  mappers: readonly GeneratedMapper[]
): ReadonlyMap<string, readonly ImportedName[]> => {
  const modules = new Map<string, Map<string, boolean>>();
  const add = (path: string, imported: ImportedName): void => {
    const names = modules.get(path) ?? new Map<string, boolean>();
    modules.set(path, names);
    names.set(imported.name, (names.get(imported.name) ?? true) && imported.typeOnly);
  };

  for (const generated of mappers) {
    add(generated.mapper.importPath, mapperImport(generated));
    for (const type of generated.importTypes) {
      if (type.importPath !== undefined) {
        add(type.importPath, { name: type.name, typeOnly: isTypeOnly(type) });
      }
    }
  }

  const grouped = new Map<string, readonly ImportedName[]>();
  for (const [path, names] of modules) {
    grouped.set(
      path,
      [...names.entries()]
        .map(([name, typeOnly]) => ({ name, typeOnly }))
        .sort((a, b) => a.name.localeCompare(b.name))
    );
  }
  return grouped;
};

/**
 * `import type { ... }` when every name is a type, `import { ... }`
 * otherwise
 */
export const emitImports = (
  imports: ReadonlyMap<string, readonly ImportedName[]>
): readonly string[] =>
  [...imports.entries()].map(([path, names]) => {
    const typeOnly = names.every((n) => n.typeOnly);
    const list = names.map((n) => n.name).join(", ");
    return `import ${typeOnly ? "type " : ""}{ ${list} } from "${path}";`;
  });
