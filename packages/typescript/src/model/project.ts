/**
 * TypeScript Host - Project
 *
 * Wraps a `ts.Program` with the path conventions the engine works against:
 * a source file is a namespace named after its directory relative to the
 * project root, and generated code imports project modules by "/"-separated
 * paths relative to that root.
 */

import ts from "typescript";
import { posix } from "node:path";
import { TsDeclaration, type DeclarationSyntax } from "./declaration.js";

const SOURCE_EXTENSION = /\.(?:c|m)?tsx?$/;

export class TsProject {
  readonly checker: ts.TypeChecker;
  readonly rootDir: string;
  readonly #declarations = new Map<ts.Node, TsDeclaration>();

  constructor(readonly program: ts.Program, rootDir: string) {
    this.checker = program.getTypeChecker();
    this.rootDir = normalizePath(rootDir).replace(/\/+$/, "");
  }

  /**
   * The one TsDeclaration for a syntax node; identity is stable per project.
   */
  declarationFor(node: DeclarationSyntax): TsDeclaration {
    let declaration = this.#declarations.get(node);
    if (declaration === undefined) {
      declaration = new TsDeclaration(node, this);
      this.#declarations.set(node, declaration);
    }
    return declaration;
  }

  /**
   * Non-declaration source files under the project root, in program order.
   */
  projectFiles(): ts.SourceFile[] {
    return this.program.getSourceFiles().filter(sf => this.contains(sf));
  }

  contains(sourceFile: ts.SourceFile): boolean {
    if (sourceFile.isDeclarationFile) return false;
    const relative = this.#relativePath(sourceFile);
    return relative.length > 0 && !relative.startsWith("../") && !posix.isAbsolute(relative);
  }

  /**
   * Module path of a source file: relative to the root, no extension.
   * "src/geo/point.ts" under "src" → "geo/point".
   */
  modulePath(sourceFile: ts.SourceFile): string {
    return this.#relativePath(sourceFile).replace(SOURCE_EXTENSION, "");
  }

  /**
   * Dotted namespace of a source file ("" for files directly under the root).
   */
  namespaceOf(sourceFile: ts.SourceFile): string {
    const dir = posix.dirname(this.modulePath(sourceFile));
    return dir === "." ? "" : dir.split("/").join(".");
  }

  #relativePath(sourceFile: ts.SourceFile): string {
    return posix.relative(this.rootDir, normalizePath(sourceFile.fileName));
  }
}

/**
 * Module path of a generated declaration in `namespace`.
 */
export function generatedModulePath(namespace: string, simpleName: string): string {
  return namespace.length === 0 ? simpleName : `${namespace.split(".").join("/")}/${simpleName}`;
}

export function normalizePath(path: string): string {
  return path.replace(/\\/g, "/");
}
