/**
 * TypeScript Host - Components
 *
 * A component is one named value of a value type: a constructor parameter
 * property of a record, or a property of an interface-like declaration.
 */

import ts from "typescript";
import { findConstructor } from "../model/kinds.js";

export interface Component {
  readonly name: string;

  /** May be left unset when building */
  readonly optional: boolean;
}

/**
 * Constructor parameter properties of a record class, in parameter order.
 * A parameter with `?` or an initializer is optional.
 */
export function recordComponents(node: ts.ClassDeclaration): Component[] {
  const ctor = findConstructor(node);
  if (ctor === undefined) return [];
  return ctor.parameters.flatMap(p => ts.isIdentifier(p.name)
    ? [{ name: p.name.text, optional: p.questionToken !== undefined || p.initializer !== undefined }]
    : []);
}

export interface InterfaceMembers {
  readonly components: Component[];

  /** Names of members that are not properties */
  readonly invalid: string[];

  /** Property names that can't be used as a parameter or local */
  readonly unusableNames: string[];
}

/**
 * Instance members of an interface or abstract class, inherited ones
 * included. Anything declared other than as a property is invalid.
 */
export function interfaceMembers(
  node: ts.InterfaceDeclaration | ts.ClassDeclaration,
  checker: ts.TypeChecker,
): InterfaceMembers {
  const components: Component[] = [];
  const invalid: string[] = [];
  const unusableNames: string[] = [];
  const symbol = node.name === undefined ? undefined : checker.getSymbolAtLocation(node.name);
  if (symbol === undefined) return { components, invalid, unusableNames };

  for (const property of checker.getPropertiesOfType(checker.getDeclaredTypeOfSymbol(symbol))) {
    const declarations = property.declarations ?? [];
    if (declarations.length > 0 && declarations.every(d => ts.isPropertySignature(d) || ts.isPropertyDeclaration(d))) {
      if (!isBindingName(property.name)) {
        unusableNames.push(property.name);
        continue;
      }
      components.push({ name: property.name, optional: (property.flags & ts.SymbolFlags.Optional) !== 0 });
    } else {
      invalid.push(property.name);
    }
  }
  return { components, invalid, unusableNames };
}

const STRICT_MODE_RESTRICTED = new Set(["await", "arguments", "eval"]);

/**
 * Whether `name` can be written as a parameter or `const` name in a module.
 */
export function isBindingName(name: string): boolean {
  if (!ts.isIdentifierText(name, ts.ScriptTarget.Latest) || STRICT_MODE_RESTRICTED.has(name)) {
    return false;
  }
  const token = ts.stringToToken(name);
  return token === undefined ||
    token < ts.SyntaxKind.FirstReservedWord ||
    token > ts.SyntaxKind.LastFutureReservedWord;
}

/**
 * Required components first, each group in declaration order.
 */
export function requiredFirst(components: readonly Component[]): Component[] {
  return [...components.filter(c => !c.optional), ...components.filter(c => c.optional)];
}
