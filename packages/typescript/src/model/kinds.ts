/**
 * TypeScript Host - Declaration Kinds
 *
 * Maps syntax to the symbolic kind names the engine validates against.
 */

import ts from "typescript";
import { KindName } from "@valuegen/processor";
import type { DeclarationSyntax } from "./declaration.js";

export const TsKindName = {
  ...KindName,
  CLASS: "CLASS",
  MODULE: "MODULE",
  ENUM: "ENUM",
  TYPE_ALIAS: "TYPE_ALIAS",
  FUNCTION: "FUNCTION",
} as const;

export type TsKindNameType = (typeof TsKindName)[keyof typeof TsKindName];

export function declarationKindName(node: DeclarationSyntax): TsKindNameType {
  if (ts.isSourceFile(node)) return TsKindName.NAMESPACE;
  if (ts.isInterfaceDeclaration(node)) return TsKindName.INTERFACE;
  if (ts.isModuleDeclaration(node)) return TsKindName.MODULE;
  if (ts.isEnumDeclaration(node)) return TsKindName.ENUM;
  if (ts.isTypeAliasDeclaration(node)) return TsKindName.TYPE_ALIAS;
  if (ts.isFunctionDeclaration(node)) return TsKindName.FUNCTION;
  if (isRecordClass(node)) return TsKindName.RECORD;
  if (isAbstractInterfaceClass(node)) return TsKindName.INTERFACE;
  return TsKindName.CLASS;
}

/**
 * A record: a concrete class whose constructor declares only public readonly
 * parameter properties, and that declares no instance properties itself.
 */
export function isRecordClass(node: ts.ClassDeclaration): boolean {
  if (hasModifier(node, ts.SyntaxKind.AbstractKeyword)) return false;

  const ctor = findConstructor(node);
  if (ctor === undefined) return false;
  if (!ctor.parameters.every(isPublicReadonlyParameter)) return false;

  return !node.members.some(m => ts.isPropertyDeclaration(m) && !hasModifier(m, ts.SyntaxKind.StaticKeyword));
}

/**
 * An abstract class used as an interface: no constructor, and every instance
 * member abstract.
 */
export function isAbstractInterfaceClass(node: ts.ClassDeclaration): boolean {
  if (!hasModifier(node, ts.SyntaxKind.AbstractKeyword)) return false;
  return node.members.every(m =>
    !ts.isConstructorDeclaration(m) &&
    (hasModifier(m, ts.SyntaxKind.AbstractKeyword) || hasModifier(m, ts.SyntaxKind.StaticKeyword)) &&
    !ts.isClassStaticBlockDeclaration(m));
}

export function findConstructor(node: ts.ClassDeclaration): ts.ConstructorDeclaration | undefined {
  return node.members.find((m): m is ts.ConstructorDeclaration => ts.isConstructorDeclaration(m) && m.body !== undefined);
}

export function hasModifier(node: ts.Node, kind: ts.SyntaxKind): boolean {
  const modifiers = ts.canHaveModifiers(node) ? ts.getModifiers(node) : undefined;
  return modifiers?.some(m => m.kind === kind) ?? false;
}

function isPublicReadonlyParameter(param: ts.ParameterDeclaration): boolean {
  return ts.isIdentifier(param.name) &&
    hasModifier(param, ts.SyntaxKind.ReadonlyKeyword) &&
    !hasModifier(param, ts.SyntaxKind.PrivateKeyword) &&
    !hasModifier(param, ts.SyntaxKind.ProtectedKeyword);
}
