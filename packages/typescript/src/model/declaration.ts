/**
 * TypeScript Host - Declaration Nodes
 *
 * `TsDeclaration` is the engine's view of a declaration in a TypeScript
 * program. Source files are namespaces; classes, interfaces, TS namespaces,
 * enums, type aliases and functions are the declarations inside them.
 */

import ts from "typescript";
import type { DeclarationNode } from "@valuegen/processor";
import { readDirectives, type TsDirectiveMirror } from "../directives/read.js";
import { declarationKindName } from "./kinds.js";
import type { TsProject } from "./project.js";

export type DeclarationSyntax =
  | ts.SourceFile
  | ts.ClassDeclaration
  | ts.InterfaceDeclaration
  | ts.ModuleDeclaration
  | ts.EnumDeclaration
  | ts.TypeAliasDeclaration
  | ts.FunctionDeclaration;

export function isDeclarationSyntax(node: ts.Node): node is DeclarationSyntax {
  return ts.isSourceFile(node) ||
    ts.isClassDeclaration(node) ||
    ts.isInterfaceDeclaration(node) ||
    ts.isModuleDeclaration(node) ||
    ts.isEnumDeclaration(node) ||
    ts.isTypeAliasDeclaration(node) ||
    ts.isFunctionDeclaration(node);
}

export class TsDeclaration implements DeclarationNode<TsDeclaration> {
  #directives: readonly TsDirectiveMirror[] | undefined;

  constructor(
    readonly node: DeclarationSyntax,
    readonly project: TsProject,
  ) {}

  get kindName(): string {
    return declarationKindName(this.node);
  }

  get simpleName(): string {
    if (ts.isSourceFile(this.node)) {
      const namespace = this.project.namespaceOf(this.node);
      return namespace.slice(namespace.lastIndexOf(".") + 1);
    }
    return this.node.name?.text ?? "default";
  }

  get qualifiedName(): string {
    if (ts.isSourceFile(this.node)) {
      return this.project.namespaceOf(this.node);
    }
    const outer = this.enclosing?.qualifiedName ?? "";
    return outer.length > 0 ? `${outer}.${this.simpleName}` : this.simpleName;
  }

  get enclosing(): TsDeclaration | null {
    let current = this.node.parent;
    while (current !== undefined) {
      if (isDeclarationSyntax(current)) {
        return this.project.declarationFor(current);
      }
      current = current.parent;
    }
    return null;
  }

  get sourceFile(): ts.SourceFile {
    return this.node.getSourceFile();
  }

  /**
   * Reference to this declaration from its file's top level, e.g. "Shapes.Point"
   * for a class inside `namespace Shapes`.
   */
  get localPath(): string {
    const names: string[] = [];
    for (let current: TsDeclaration | null = this; current !== null; current = current.enclosing) {
      if (ts.isSourceFile(current.node)) break;
      names.unshift(current.simpleName);
    }
    return names.join(".");
  }

  findDirective(identity: string): TsDirectiveMirror | null {
    return this.directives().find(d => d.identity === identity) ?? null;
  }

  directives(): readonly TsDirectiveMirror[] {
    if (this.#directives === undefined) {
      this.#directives = ts.isClassDeclaration(this.node) ? readDirectives(this.node, this.project) : [];
    }
    return this.#directives;
  }
}
