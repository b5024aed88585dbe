/**
 * Processor Package - Formatting Utilities
 *
 * Indentation, escaping and identifier helpers for source generation.
 */

/* =============================================================================
 * INDENTATION
 * ============================================================================= */

/**
 * Indent all non-empty lines of a string.
 */
export function indent(text: string, indentStr: string = "    ", levels: number = 1): string {
  const prefix = indentStr.repeat(levels);
  return text
    .split("\n")
    .map(line => line.length > 0 ? prefix + line : line)
    .join("\n");
}

/* =============================================================================
 * STRING ESCAPING
 * ============================================================================= */

/**
 * Escape a string for use in a double-quoted string literal.
 */
export function escapeString(str: string): string {
  return str
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
}

/* =============================================================================
 * IDENTIFIERS
 * ============================================================================= */

/**
 * Capitalize the first letter of a string.
 */
export function capitalize(str: string): string {
  return str.charAt(0).toUpperCase() + str.slice(1);
}

/**
 * Fully qualified name of a generated type.
 */
export function qualifiedName(namespace: string, simpleName: string): string {
  return namespace.length === 0 ? simpleName : `${namespace}.${simpleName}`;
}

/* =============================================================================
 * MODULE SPECIFIERS
 * ============================================================================= */

/**
 * Relative ES module specifier from a file in `fromNamespace` to `modulePath`.
 *
 * Namespaces map to directories ("a.b" → "a/b"); module paths are already
 * "/"-separated and relative to the same root.
 */
export function relativeModuleSpecifier(fromNamespace: string, modulePath: string): string {
  const from = fromNamespace.length === 0 ? [] : fromNamespace.split(".");
  const to = modulePath.split("/");

  let common = 0;
  while (common < from.length && common < to.length - 1 && from[common] === to[common]) {
    common++;
  }

  const ups = from.length - common;
  const prefix = ups === 0 ? "./" : "../".repeat(ups);
  return `${prefix}${to.slice(common).join("/")}.js`;
}
