/**
 * Emitter options and context
 */

export type EmitterOptions = {
  /** Indentation width in spaces (default 2) */
  readonly indent?: number;
  /** Comment placed at the top of the module instead of the default one */
  readonly header?: string;
};

export type EmitterContext = {
  readonly indentLevel: number;
  readonly options: EmitterOptions;
};

export const createContext = (options: EmitterOptions): EmitterContext => ({
  indentLevel: 0,
  options,
});

/**
 * Increase indentation level
 */
export const indent = (context: EmitterContext): EmitterContext => ({
  ...context,
  indentLevel: context.indentLevel + 1,
});

/**
 * Get indentation string for current level
 */
export const getIndent = (context: EmitterContext): string => {
  const spaces = context.options.indent ?? 2;
  return " ".repeat(spaces * context.indentLevel);
};

/**
 * Indent every line of `lines` at the context's level
 */
export const indentLines = (
  lines: readonly string[],
  context: EmitterContext
): readonly string[] => {
  const ind = getIndent(context);
  return lines.map((line) => (line.length > 0 ? `${ind}${line}` : line));
};

/**
 * Lines of a nested block, one level deeper than their surroundings
 */
export const nestLines = (
  lines: readonly string[],
  context: EmitterContext
): readonly string[] => indentLines(lines, indent({ ...context, indentLevel: 0 }));
