/**
 * TypeScript Host - Directive Decorators
 *
 * Reads `@RecordBuilder()`, `@RecordBuilder.Include<[A, B]>({...})`,
 * `@RecordInterface({...})` and `@RecordInterface.Include<[A, B]>({...})`
 * from class declarations. Decorators are recognized by callee name; a
 * namespace import qualifier (`@vg.RecordBuilder()`) is ignored.
 */

import ts from "typescript";
import {
  DirectiveAttribute,
  DirectiveIdentity,
  type AttributeValue,
  type DirectiveIdentityType,
  type DirectiveMirror,
  type TypeReference,
} from "@valuegen/processor";
import type { TsDeclaration } from "../model/declaration.js";
import type { TsProject } from "../model/project.js";
import { decoratorsOf, getProp, readBooleanProp, readStringProp, unwrapDecorator } from "./ast-helpers.js";

/** Decorator callee name → directive identity */
export const DECORATOR_IDENTITIES: ReadonlyMap<string, DirectiveIdentityType> = new Map([
  ["RecordBuilder", DirectiveIdentity.BUILDER],
  ["RecordBuilder.Include", DirectiveIdentity.BUILDER_INCLUDE],
  ["RecordInterface", DirectiveIdentity.INTERFACE],
  ["RecordInterface.Include", DirectiveIdentity.INTERFACE_INCLUDE],
]);

/**
 * Identity for a decorator callee name, matching on the last one or two
 * segments.
 */
export function identityForCallee(name: string): DirectiveIdentityType | undefined {
  const segments = name.split(".");
  const tail = segments.slice(-2).join(".");
  return DECORATOR_IDENTITIES.get(tail) ?? DECORATOR_IDENTITIES.get(segments[segments.length - 1] ?? "");
}

export interface TsDirectiveMirror extends DirectiveMirror<TsDeclaration> {
  /** Attributes written with a value that is not a compile-time constant */
  readonly nonConstant: readonly string[];
}

/**
 * All directives on a class, in decorator order.
 */
export function readDirectives(node: ts.ClassDeclaration, project: TsProject): TsDirectiveMirror[] {
  const mirrors: TsDirectiveMirror[] = [];
  for (const dec of decoratorsOf(node)) {
    const unwrapped = unwrapDecorator(dec);
    if (unwrapped === null) continue;
    const identity = identityForCallee(unwrapped.name);
    if (identity === undefined) continue;
    mirrors.push(createMirror(identity, unwrapped.args, unwrapped.typeArgs, project));
  }
  return mirrors;
}

/* =============================================================================
 * MIRRORS
 * ============================================================================= */

function createMirror(
  identity: DirectiveIdentityType,
  args: readonly ts.Expression[],
  typeArgs: readonly ts.TypeNode[],
  project: TsProject,
): TsDirectiveMirror {
  const attributes = new Map<string, AttributeValue<TsDeclaration>>();
  const nonConstant: string[] = [];
  const { checker } = project;

  const first = args[0];
  if (first !== undefined && ts.isObjectLiteralExpression(first)) {
    const patternProp = getProp(first, DirectiveAttribute.NAMESPACE_PATTERN);
    if (patternProp !== undefined) {
      const pattern = readStringProp(patternProp, checker);
      if (pattern === undefined) nonConstant.push(DirectiveAttribute.NAMESPACE_PATTERN);
      else attributes.set(DirectiveAttribute.NAMESPACE_PATTERN, { kind: "string", value: pattern });
    }
    const addBuilderProp = getProp(first, DirectiveAttribute.ADD_BUILDER);
    if (addBuilderProp !== undefined) {
      const addBuilder = readBooleanProp(addBuilderProp, checker);
      if (addBuilder === undefined) nonConstant.push(DirectiveAttribute.ADD_BUILDER);
      else attributes.set(DirectiveAttribute.ADD_BUILDER, { kind: "boolean", value: addBuilder });
    }
  }

  const targets = typeArgs[0];
  if (targets !== undefined) {
    attributes.set(DirectiveAttribute.TARGETS, {
      kind: "types",
      value: targetTypeNodes(targets).map(t => createTypeReference(t, project)),
    });
  }

  return {
    identity,
    value: (name) => attributes.get(name),
    nonConstant,
  };
}

/**
 * `[A, B]` lists its elements; a single type is a one-element list.
 */
function targetTypeNodes(node: ts.TypeNode): readonly ts.TypeNode[] {
  if (!ts.isTupleTypeNode(node)) return [node];
  return node.elements.map(e => ts.isNamedTupleMember(e) ? e.type : e);
}

/* =============================================================================
 * TYPE REFERENCES
 * ============================================================================= */

export function createTypeReference(node: ts.TypeNode, project: TsProject): TypeReference<TsDeclaration> {
  return {
    text: node.getText(),
    resolve: () => resolveTypeNode(node, project),
  };
}

/**
 * Resolve a type reference to a declaration in the project, following import
 * aliases. Declarations in declaration files or outside the root are not
 * resolvable.
 */
export function resolveTypeNode(node: ts.TypeNode, project: TsProject): TsDeclaration | null {
  if (!ts.isTypeReferenceNode(node)) return null;

  let symbol = project.checker.getSymbolAtLocation(node.typeName);
  if (symbol !== undefined && (symbol.flags & ts.SymbolFlags.Alias) !== 0) {
    symbol = project.checker.getAliasedSymbol(symbol);
  }

  for (const decl of symbol?.declarations ?? []) {
    if ((ts.isClassDeclaration(decl) || ts.isInterfaceDeclaration(decl)) && project.contains(decl.getSourceFile())) {
      return project.declarationFor(decl);
    }
  }
  return null;
}
