/**
 * Shared constants for the mapweave emitter
 */

/**
 * Generate the header comment of an emitted module
 *
 * @param sourceName - Module the mappers were declared in
 */
export const generateFileHeader = (
  sourceName: string,
  header?: string
): string => {
  const lines =
    header !== undefined
      ? header.split("\n").map((line) => `// ${line}`.trimEnd())
      : [
          `// Generated by mapweave from ${sourceName}`,
          "// WARNING: Do not modify this file manually",
        ];
  return [...lines, ""].join("\n");
};
